/**
 * Model configuration file loader
 */

import { readFile } from 'node:fs/promises';
import { types } from 'node:util';
import { parse as parseDotenv } from 'dotenv';
import type { Logger } from 'pino';
import type { DuplicatePolicy, PlaceholderPolicy } from '../config/app-config';
import {
  createModelConfigSchema,
  DEFAULT_MODEL_FACTORY,
  ModelsFileSchema,
  type ModelConfig,
} from '../domain/model-config';
import {
  ConfigurationError,
  ErrorCodes,
  isApplicationError,
  ValidationError,
  type Violation,
} from '../lib/errors';
import { resolveRecordPlaceholders, type EnvMap, type ResolvedRecord } from './env-resolver';

export interface LoadModelsOptions {
  env: EnvMap;
  logger: Logger;
  unresolvedPlaceholders?: PlaceholderPolicy;
  duplicateNames?: DuplicatePolicy;
  defaultFactory?: string;
}

export interface UnresolvedPlaceholder {
  model: string;
  variable: string;
}

export interface LoadedModels {
  models: ModelConfig[];
  unresolved: UnresolvedPlaceholder[];
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return types.isNativeError(error) && 'code' in error;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readConfigText(path: string, what: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigurationError(`${what} '${path}' does not exist`, ErrorCodes.CONFIG_NOT_FOUND, {
        path,
      });
    }
    throw new ConfigurationError(
      `Failed to read ${what.toLowerCase()} '${path}'`,
      ErrorCodes.CONFIG_INVALID,
      { path },
      types.isNativeError(error) ? error : undefined,
    );
  }
}

function parseJson(text: string, path: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = types.isNativeError(error) ? error.message : String(error);
    throw new ConfigurationError(
      `Configuration file '${path}' is not valid JSON: ${reason}`,
      ErrorCodes.CONFIG_PARSE_FAILED,
      { path },
      types.isNativeError(error) ? error : undefined,
    );
  }
}

interface LoadedRecord {
  model: ModelConfig;
  unresolved: string[];
}

function applyDuplicatePolicy(records: LoadedRecord[], policy: DuplicatePolicy): LoadedRecord[] {
  const positions = new Map<string, number>();
  const duplicates = new Set<string>();
  const result: LoadedRecord[] = [];

  for (const record of records) {
    const name = record.model.model_name;
    const existing = positions.get(name);
    if (existing === undefined) {
      positions.set(name, result.length);
      result.push(record);
      continue;
    }
    duplicates.add(name);
    result[existing] = record;
  }

  if (duplicates.size > 0 && policy === 'reject') {
    const names = [...duplicates];
    throw new ConfigurationError(
      `Duplicate model_name in configuration: ${names.join(', ')}`,
      ErrorCodes.DUPLICATE_MODEL_NAME,
      { names },
    );
  }

  return result;
}

/**
 * Load, resolve and validate model records from a JSON configuration file
 */
export async function loadModelsFile(
  path: string,
  options: LoadModelsOptions,
): Promise<LoadedModels> {
  const {
    env,
    logger,
    unresolvedPlaceholders = 'keep',
    duplicateNames = 'reject',
    defaultFactory = DEFAULT_MODEL_FACTORY,
  } = options;

  const text = await readConfigText(path, 'Configuration file');
  const document = ModelsFileSchema.safeParse(parseJson(text, path));
  if (!document.success) {
    throw new ValidationError(`Configuration file '${path}' must contain a "models" array`, [
      { field: 'models', message: document.error.issues[0]?.message ?? 'Required' },
    ]);
  }

  const schema = createModelConfigSchema(defaultFactory);
  const records: LoadedRecord[] = [];
  const violations: Violation[] = [];

  document.data.models.forEach((raw, index) => {
    const prefix = `models[${index}]`;
    if (!isPlainObject(raw)) {
      violations.push({ field: prefix, message: 'Expected an object' });
      return;
    }

    let resolved: ResolvedRecord;
    try {
      resolved = resolveRecordPlaceholders(raw, env, unresolvedPlaceholders);
    } catch (error) {
      if (isApplicationError(error)) {
        throw new ConfigurationError(`${prefix}: ${error.message}`, error.code, {
          ...error.details,
          record: index,
        });
      }
      throw error;
    }

    const parsed = schema.safeParse(resolved.record);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        const field = issue.path.length > 0 ? `${prefix}.${issue.path.join('.')}` : prefix;
        violations.push({ field, message: issue.message });
      }
      return;
    }

    records.push({ model: parsed.data, unresolved: resolved.unresolved });
  });

  if (violations.length > 0) {
    throw new ValidationError(`Invalid model configuration in '${path}'`, violations, { path });
  }

  const unique = applyDuplicatePolicy(records, duplicateNames);
  if (unique.length === 0) {
    throw new ConfigurationError(
      `Configuration file '${path}' defines no models`,
      ErrorCodes.CONFIG_EMPTY,
      { path },
    );
  }

  const unresolved: UnresolvedPlaceholder[] = unique.flatMap((record) =>
    record.unresolved.map((variable) => ({ model: record.model.model_name, variable })),
  );
  for (const { model, variable } of unresolved) {
    logger.warn({ model, variable }, `Environment variable '${variable}' is not set`);
  }
  logger.debug({ path, count: unique.length }, 'Model configuration loaded');

  return { models: unique.map((record) => record.model), unresolved };
}

/**
 * Read a dotenv file into a plain map without touching process.env
 */
export async function parseEnvFile(path: string): Promise<Record<string, string>> {
  const text = await readConfigText(path, 'Environment file');
  return parseDotenv(text);
}
