/**
 * Sequential model batches against the platform: import, delete-all,
 * verify and the delete → import → verify sync cycle.
 */

import type { Logger } from 'pino';
import {
  effectiveDisplayName,
  remoteModelLabel,
  type ModelConfig,
  type RemoteModel,
} from '../domain/model-config';
import type { PlatformClient } from '../infrastructure/platform-client';
import { createTimer } from '../lib/logger';
import { sleep } from '../shared/async';
import {
  Failure,
  Success,
  type BatchOperation,
  type ProgressEmitter,
  type Result,
} from '../types/core';

export interface RecordOutcome {
  name: string;
  ok: boolean;
  error?: string;
}

export interface BatchReport {
  operation: BatchOperation;
  outcomes: RecordOutcome[];
  succeeded: number;
  failed: number;
  ok: boolean;
  /** Set when the batch could not start, e.g. listing remote models failed */
  error?: string;
}

export interface ImportOptions {
  /** Delete remote entries with the same display name before creating */
  replaceExisting?: boolean;
}

export interface SyncReport {
  ok: boolean;
  /** Stage that stopped the cycle, when it did not complete */
  stage?: 'delete' | 'import';
  /** Cycle completed but some models failed their health check */
  degraded: boolean;
  deleted: BatchReport;
  imported?: BatchReport;
  verified?: BatchReport;
}

export interface ModelManagerOptions {
  client: PlatformClient;
  logger: Logger;
  importDelayMs?: number;
  deleteDelayMs?: number;
  progress?: ProgressEmitter;
  sleep?: (ms: number) => Promise<void>;
}

function summarize(
  operation: BatchOperation,
  outcomes: RecordOutcome[],
  error?: string,
): BatchReport {
  const succeeded = outcomes.filter((outcome) => outcome.ok).length;
  const failed = outcomes.length - succeeded;
  const report: BatchReport = {
    operation,
    outcomes,
    succeeded,
    failed,
    ok: failed === 0 && error === undefined,
  };
  if (error !== undefined) {
    report.error = error;
  }
  return report;
}

function toOutcome(name: string, result: Result<unknown>): RecordOutcome {
  return result.ok ? { name, ok: true } : { name, ok: false, error: result.error };
}

export class ModelManager {
  private readonly client: PlatformClient;
  private readonly logger: Logger;
  private readonly importDelayMs: number;
  private readonly deleteDelayMs: number;
  private readonly progress: ProgressEmitter | undefined;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: ModelManagerOptions) {
    this.client = options.client;
    this.logger = options.logger.child({ component: 'ModelManager' });
    this.importDelayMs = options.importDelayMs ?? 500;
    this.deleteDelayMs = options.deleteDelayMs ?? 300;
    this.progress = options.progress;
    this.wait = options.sleep ?? sleep;
  }

  async listModels(): Promise<Result<RemoteModel[]>> {
    return this.client.listModels();
  }

  /**
   * Create every record in order. A failed record does not stop the batch.
   */
  async importModels(models: ModelConfig[], options: ImportOptions = {}): Promise<BatchReport> {
    const timer = createTimer(this.logger, 'import', { total: models.length });
    let existing = new Set<string>();

    if (options.replaceExisting) {
      const listed = await this.client.listModels();
      if (!listed.ok) {
        timer.error(listed.error);
        return summarize('import', [], `Failed to list models: ${listed.error}`);
      }
      existing = new Set(listed.value.map(remoteModelLabel));
    }

    const outcomes = await this.runBatch('import', models, effectiveDisplayName, this.importDelayMs, async (model) => {
      const name = effectiveDisplayName(model);
      if (existing.has(name)) {
        const removed = await this.client.deleteModel(name);
        if (!removed.ok) {
          return Failure(`Failed to replace existing model: ${removed.error}`);
        }
        this.logger.debug({ model: name }, 'Removed existing model before import');
      }
      return this.client.createModel(model);
    });

    const report = summarize('import', outcomes);
    timer.end({ succeeded: report.succeeded, failed: report.failed });
    return report;
  }

  /**
   * Delete every model the platform lists.
   */
  async deleteAllModels(): Promise<BatchReport> {
    const listed = await this.client.listModels();
    if (!listed.ok) {
      this.logger.error({ error: listed.error }, 'Failed to list models');
      return summarize('delete', [], `Failed to list models: ${listed.error}`);
    }
    if (listed.value.length === 0) {
      this.logger.info('No models registered');
      return summarize('delete', []);
    }

    const timer = createTimer(this.logger, 'delete', { total: listed.value.length });
    const outcomes = await this.runBatch('delete', listed.value, remoteModelLabel, this.deleteDelayMs, (entry) =>
      this.client.deleteModel(remoteModelLabel(entry)),
    );
    const report = summarize('delete', outcomes);
    timer.end({ succeeded: report.succeeded, failed: report.failed });
    return report;
  }

  /**
   * Health-check one model. Only a successful call reporting connectivity passes.
   */
  async verifyModel(name: string): Promise<RecordOutcome> {
    const result = await this.client.checkHealth(name);
    if (!result.ok) {
      this.logger.warn({ model: name, error: result.error }, 'Health check failed');
      return { name, ok: false, error: result.error };
    }
    if (!result.value) {
      this.logger.warn({ model: name }, 'Model is not reachable');
      return { name, ok: false, error: 'connectivity check failed' };
    }
    this.logger.info({ model: name }, 'Model connectivity verified');
    return { name, ok: true };
  }

  /**
   * Health-check every model the platform lists.
   */
  async verifyAllModels(): Promise<BatchReport> {
    const listed = await this.client.listModels();
    if (!listed.ok) {
      this.logger.error({ error: listed.error }, 'Failed to list models');
      return summarize('verify', [], `Failed to list models: ${listed.error}`);
    }

    const outcomes = await this.runBatch('verify', listed.value, remoteModelLabel, 0, async (entry) => {
      const outcome = await this.verifyModel(remoteModelLabel(entry));
      return outcome.ok ? Success(undefined) : Failure(outcome.error ?? 'connectivity check failed');
    });
    return summarize('verify', outcomes);
  }

  /**
   * Delete all, import, then verify all. Verify failures leave the cycle
   * successful but degraded.
   */
  async sync(models: ModelConfig[], options: ImportOptions = {}): Promise<SyncReport> {
    const deleted = await this.deleteAllModels();
    if (!deleted.ok) {
      return { ok: false, stage: 'delete', degraded: false, deleted };
    }

    const imported = await this.importModels(models, options);
    if (!imported.ok) {
      return { ok: false, stage: 'import', degraded: false, deleted, imported };
    }

    const verified = await this.verifyAllModels();
    return { ok: true, degraded: !verified.ok, deleted, imported, verified };
  }

  private async runBatch<T>(
    operation: BatchOperation,
    items: T[],
    nameOf: (item: T) => string,
    delayMs: number,
    action: (item: T) => Promise<Result<unknown>>,
  ): Promise<RecordOutcome[]> {
    const outcomes: RecordOutcome[] = [];
    const total = items.length;

    for (const [offset, item] of items.entries()) {
      const index = offset + 1;
      const name = nameOf(item);
      this.progress?.emit({ operation, index, total, name, status: 'starting' });

      const outcome = toOutcome(name, await action(item));
      outcomes.push(outcome);

      if (outcome.ok) {
        this.logger.debug({ operation, model: name, index, total }, `${operation} succeeded`);
        this.progress?.emit({ operation, index, total, name, status: 'completed' });
      } else {
        this.logger.warn({ operation, model: name, index, total, error: outcome.error }, `${operation} failed`);
        const update = { operation, index, total, name, status: 'failed' as const };
        this.progress?.emit(outcome.error === undefined ? update : { ...update, message: outcome.error });
      }

      if (index < total && delayMs > 0) {
        await this.wait(delayMs);
      }
    }

    return outcomes;
  }
}
