/**
 * Model configuration records and remote model entries
 */

import { z } from 'zod';

export const MODEL_TYPES = [
  'llm',
  'embedding',
  'multi_embedding',
  'vlm',
  'rerank',
  'stt',
  'tts',
] as const;

export const ModelTypeSchema = z.enum(MODEL_TYPES);
export type ModelType = z.infer<typeof ModelTypeSchema>;

export const DEFAULT_MODEL_FACTORY = 'OpenAI-API-Compatible';

// Values are sent as written; only blank ones are rejected
const requiredText = (message: string) =>
  z.string().refine((value) => value.trim() !== '', message);

/**
 * Build the record schema; the factory default is configurable
 */
export const createModelConfigSchema = (defaultFactory: string = DEFAULT_MODEL_FACTORY) =>
  z.object({
    model_name: requiredText('model_name is required'),
    model_type: ModelTypeSchema,
    base_url: requiredText('base_url is required'),
    api_key: z.string().default(''),
    display_name: z.string().default(''),
    model_factory: z.string().min(1).default(defaultFactory),
    max_tokens: z.number().int().nonnegative().default(0),
  });

export const ModelConfigSchema = createModelConfigSchema();
export type ModelConfig = z.infer<typeof ModelConfigSchema>;

/**
 * Top-level document shape; records are validated one by one afterwards
 */
export const ModelsFileSchema = z.object({
  models: z.array(z.unknown()),
});

export const RemoteModelSchema = z
  .object({
    model_name: z.string().nullish(),
    display_name: z.string().nullish(),
    model_type: z.string().nullish(),
    model_factory: z.string().nullish(),
    base_url: z.string().nullish(),
    connect_status: z.string().nullish(),
  })
  .passthrough();

export type RemoteModel = z.infer<typeof RemoteModelSchema>;

export interface CreateModelPayload {
  model_factory: string;
  model_name: string;
  model_type: ModelType;
  base_url: string;
  api_key: string;
  max_tokens: number;
  display_name: string;
}

export function effectiveDisplayName(record: ModelConfig): string {
  return record.display_name || record.model_name;
}

export function toCreatePayload(record: ModelConfig): CreateModelPayload {
  return {
    model_factory: record.model_factory,
    model_name: record.model_name,
    model_type: record.model_type,
    base_url: record.base_url,
    api_key: record.api_key,
    max_tokens: record.max_tokens,
    display_name: effectiveDisplayName(record),
  };
}

export function remoteModelLabel(entry: RemoteModel): string {
  return entry.display_name || entry.model_name || 'Unknown';
}
