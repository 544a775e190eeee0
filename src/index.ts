/**
 * modelctl library entry point
 */

export { createAppConfig, type AppConfig, type StackConfig, type ConfigOverrides } from './config';
export {
  MODEL_TYPES,
  ModelConfigSchema,
  RemoteModelSchema,
  effectiveDisplayName,
  remoteModelLabel,
  toCreatePayload,
  type ModelConfig,
  type ModelType,
  type RemoteModel,
  type CreateModelPayload,
} from './domain/model-config';
export {
  createPlatformClient,
  type PlatformClient,
  type PlatformClientOptions,
} from './infrastructure/platform-client';
export { CommandExecutor, type CommandOptions, type CommandResult } from './infrastructure/command-executor';
export { createDockerClient, type DockerClient } from './infrastructure/docker';
export {
  ApplicationError,
  CommandError,
  ConfigurationError,
  ErrorCodes,
  ValidationError,
  describeError,
  isApplicationError,
} from './lib/errors';
export { createLogger, createTimer, type Logger } from './lib/logger';
export { resolvePlaceholders, resolveRecordPlaceholders, type EnvMap } from './models/env-resolver';
export { loadModelsFile, parseEnvFile, type LoadedModels } from './models/config-loader';
export {
  ModelManager,
  type BatchReport,
  type RecordOutcome,
  type SyncReport,
} from './models/model-manager';
export { deployStack } from './stack/deploy';
export { resetStack } from './stack/reset';
export type { StackReport, StackStep } from './stack/types';
export { runCli } from './cli/run';
export { Success, Failure, type Result } from './types/core';
