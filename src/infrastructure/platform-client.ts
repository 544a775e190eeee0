/**
 * Model platform API client
 *
 * Thin wrapper over fetch for the platform's /api/model endpoints. Every
 * operation resolves to a Result; HTTP and network failures never throw.
 */

import { types } from 'node:util';
import { z } from 'zod';
import type { Logger } from 'pino';
import {
  RemoteModelSchema,
  toCreatePayload,
  type ModelConfig,
  type RemoteModel,
} from '../domain/model-config';
import { Failure, Success, type Result } from '../types/core';

export type FetchFn = typeof fetch;

export interface PlatformClientOptions {
  baseUrl: string;
  token?: string | undefined;
  /** Per-request timeout in milliseconds */
  timeout: number;
  logger: Logger;
  fetch?: FetchFn;
}

/**
 * Client for the platform's model registry.
 */
export interface PlatformClient {
  /** Register one model. Succeeds on HTTP 200. */
  createModel: (record: ModelConfig) => Promise<Result<void>>;

  /** List every registered model. */
  listModels: () => Promise<Result<RemoteModel[]>>;

  /** Delete a model by its display name. */
  deleteModel: (displayName: string) => Promise<Result<void>>;

  /** Run the platform's connectivity check; the value is the reported connectivity. */
  checkHealth: (displayName: string) => Promise<Result<boolean>>;
}

interface HttpReply {
  status: number;
  text: string;
}

const ListResponseSchema = z
  .object({
    data: z.array(RemoteModelSchema).nullish(),
  })
  .passthrough();

const HealthResponseSchema = z
  .object({
    data: z
      .object({
        connectivity: z.boolean().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Human-readable detail from an error response body
 */
export function extractErrorDetail(text: string): string {
  if (text.trim() === '') {
    return 'unknown error';
  }
  const parsed = parseJson(text);
  if (typeof parsed === 'object' && parsed !== null && 'detail' in parsed) {
    const { detail } = parsed;
    if (typeof detail === 'string') {
      return detail;
    }
    if (detail !== undefined && detail !== null) {
      return JSON.stringify(detail);
    }
  }
  return text;
}

// fetch aborts with a DOMException, which is not a native Error
const isAbortError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';

const httpFailure = <T>(reply: HttpReply): Result<T> =>
  Failure(`HTTP ${reply.status}: ${extractErrorDetail(reply.text)}`);

/**
 * Create a platform client
 * @param options - base URL, credentials, timeout and logger
 * @returns PlatformClient bound to the base URL
 */
export const createPlatformClient = (options: PlatformClientOptions): PlatformClient => {
  const { token, timeout, logger } = options;
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const fetchFn: FetchFn = options.fetch ?? fetch;

  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }

  async function send(
    method: 'GET' | 'POST',
    path: string,
    query?: Record<string, string>,
    body?: unknown,
  ): Promise<Result<HttpReply>> {
    const search = query ? `?${new URLSearchParams(query).toString()}` : '';
    const url = `${baseUrl}${path}${search}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const init: RequestInit = { method, headers, signal: controller.signal };
      if (body !== undefined) {
        init.body = JSON.stringify(body);
      }
      const response = await fetchFn(url, init);
      const text = await response.text();
      logger.debug({ method, url, status: response.status }, 'Platform API response');
      return Success({ status: response.status, text });
    } catch (error) {
      if (isAbortError(error)) {
        logger.debug({ method, url, timeout }, 'Platform API request timed out');
        return Failure(`Request timed out after ${timeout} ms`);
      }
      const message = types.isNativeError(error) ? error.message : String(error);
      logger.debug({ method, url, error: message }, 'Platform API request failed');
      return Failure(`Request failed: ${message}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  return {
    async createModel(record: ModelConfig): Promise<Result<void>> {
      const reply = await send('POST', '/api/model/create', undefined, toCreatePayload(record));
      if (!reply.ok) return reply;
      return reply.value.status === 200 ? Success(undefined) : httpFailure(reply.value);
    },

    async listModels(): Promise<Result<RemoteModel[]>> {
      const reply = await send('GET', '/api/model/list');
      if (!reply.ok) return reply;
      if (reply.value.status !== 200) return httpFailure(reply.value);

      const parsed = ListResponseSchema.safeParse(parseJson(reply.value.text));
      if (!parsed.success) {
        return Failure(`Unexpected model list response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
      }
      return Success(parsed.data.data ?? []);
    },

    async deleteModel(displayName: string): Promise<Result<void>> {
      const reply = await send('POST', '/api/model/delete', { display_name: displayName });
      if (!reply.ok) return reply;
      return reply.value.status === 200 ? Success(undefined) : httpFailure(reply.value);
    },

    async checkHealth(displayName: string): Promise<Result<boolean>> {
      const reply = await send('POST', '/api/model/healthcheck', { display_name: displayName });
      if (!reply.ok) return reply;
      if (reply.value.status !== 200) return httpFailure(reply.value);

      const parsed = HealthResponseSchema.safeParse(parseJson(reply.value.text));
      if (!parsed.success) {
        return Failure('Unexpected healthcheck response');
      }
      return Success(parsed.data.data?.connectivity === true);
    },
  };
};
