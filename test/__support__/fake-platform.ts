/**
 * In-process stand-in for the model platform's /api/model endpoints.
 * Exposes a fetch-compatible function and records every request.
 */

import { z } from 'zod';
import type { FetchFn } from '../../src/infrastructure/platform-client';

export interface RecordedRequest {
  method: string;
  url: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  rawBody: string | undefined;
}

const StoredModelSchema = z.object({
  model_name: z.string(),
  display_name: z.string(),
  model_type: z.string(),
  model_factory: z.string(),
  base_url: z.string(),
  api_key: z.string(),
  max_tokens: z.number(),
});

export type StoredModel = z.infer<typeof StoredModelSchema>;

const json = (status: number, body: unknown): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

export class FakePlatform {
  readonly models = new Map<string, StoredModel>();
  readonly requests: RecordedRequest[] = [];
  /** Display names whose health check reports no connectivity */
  readonly unreachable = new Set<string>();
  /** Display names the create endpoint rejects */
  readonly rejectCreate = new Set<string>();
  /** When set, the list endpoint answers 500 with an empty body */
  failList = false;

  constructor(readonly origin = 'http://platform.test') {}

  seed(...models: Array<Partial<StoredModel> & { display_name: string }>): void {
    for (const model of models) {
      this.models.set(model.display_name, {
        model_name: model.display_name,
        model_type: 'llm',
        model_factory: 'OpenAI-API-Compatible',
        base_url: 'https://provider.test/v1',
        api_key: '',
        max_tokens: 0,
        ...model,
      });
    }
  }

  snapshot(): StoredModel[] {
    return [...this.models.values()].sort((a, b) => a.display_name.localeCompare(b.display_name));
  }

  readonly fetch: FetchFn = async (input, init) => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const url = new URL(href);
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url: url.href,
      path: url.pathname,
      query: Object.fromEntries(url.searchParams.entries()),
      headers,
      rawBody: typeof init?.body === 'string' ? init.body : undefined,
    };
    this.requests.push(request);
    return this.handle(request);
  };

  private handle(request: RecordedRequest): Response {
    const name = request.query.display_name ?? '';

    switch (`${request.method} ${request.path}`) {
      case 'GET /api/model/list':
        if (this.failList) return new Response('', { status: 500 });
        return json(200, { code: 200, message: 'success', data: this.snapshot() });

      case 'POST /api/model/create': {
        const parsed = StoredModelSchema.safeParse(JSON.parse(request.rawBody ?? '{}'));
        if (!parsed.success) {
          return json(422, { detail: parsed.error.issues });
        }
        const body = parsed.data;
        if (this.rejectCreate.has(body.display_name)) {
          return json(400, { detail: 'Invalid model configuration' });
        }
        if (this.models.has(body.display_name)) {
          return json(409, { detail: `Name ${body.display_name} is already in use` });
        }
        this.models.set(body.display_name, body);
        return json(200, { code: 200, message: 'Model created successfully' });
      }

      case 'POST /api/model/delete':
        if (!this.models.delete(name)) {
          return json(404, { detail: 'Model not found' });
        }
        return json(200, { code: 200, message: 'Model deleted successfully' });

      case 'POST /api/model/healthcheck':
        if (!this.models.has(name)) {
          return json(404, { detail: 'Model not found' });
        }
        return json(200, { code: 200, data: { connectivity: !this.unreachable.has(name) } });

      default:
        return new Response('Not Found', { status: 404 });
    }
  }
}
