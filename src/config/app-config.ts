/**
 * Application Configuration
 *
 * Single source of truth for settings, validated with Zod.
 * Precedence: CLI overrides, then environment variables, then defaults.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigurationError, ErrorCodes } from '../lib/errors';

const CONSTANTS = {
  API: {
    BASE_URL: 'http://localhost:5010',
    TIMEOUT: 30000, // 30s
    // setTimeout fires at once above this
    MAX_TIMEOUT: 2_147_483_647,
  },
  BATCH: {
    IMPORT_DELAY_MS: 500,
    DELETE_DELAY_MS: 300,
  },
  MODELS: {
    DEFAULT_FACTORY: 'OpenAI-API-Compatible',
  },
  STACK: {
    COMPOSE_DIR: 'docker',
    IMAGE: 'nexent/nexent',
    DOCKERFILE: 'make/main/Dockerfile',
    DEPLOY_SCRIPT: './deploy.sh',
    DATA_ROOT: 'nexent-data',
    IMAGE_ENV: {
      NEXENT_IMAGE: 'nexent/nexent:latest',
      NEXENT_WEB_IMAGE: 'nexent/nexent-web:latest',
      NEXENT_DATA_PROCESS_IMAGE: 'nexent/nexent-data-process:latest',
    },
    CONTAINERS: [
      'nexent-elasticsearch',
      'nexent-postgresql',
      'nexent',
      'nexent-web',
      'nexent-data-process',
      'nexent-redis',
      'nexent-minio',
      'nexent-openssh-server',
    ],
  },
} as const;

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production');
const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('warn');

export const PlaceholderPolicySchema = z.enum(['keep', 'error']);
export const DuplicatePolicySchema = z.enum(['reject', 'overwrite']);

export type PlaceholderPolicy = z.infer<typeof PlaceholderPolicySchema>;
export type DuplicatePolicy = z.infer<typeof DuplicatePolicySchema>;

const AppConfigSchema = z.object({
  server: z.object({
    nodeEnv: NodeEnvSchema,
    logLevel: LogLevelSchema,
  }),
  api: z.object({
    baseUrl: z.string().url().default(CONSTANTS.API.BASE_URL),
    token: z.string().min(1).optional(),
    timeout: z.coerce
      .number()
      .int()
      .positive()
      .max(CONSTANTS.API.MAX_TIMEOUT)
      .default(CONSTANTS.API.TIMEOUT),
  }),
  batch: z.object({
    importDelayMs: z.coerce.number().int().min(0).default(CONSTANTS.BATCH.IMPORT_DELAY_MS),
    deleteDelayMs: z.coerce.number().int().min(0).default(CONSTANTS.BATCH.DELETE_DELAY_MS),
  }),
  models: z.object({
    unresolvedPlaceholders: PlaceholderPolicySchema.default('keep'),
    duplicateNames: DuplicatePolicySchema.default('reject'),
    defaultFactory: z.string().min(1).default(CONSTANTS.MODELS.DEFAULT_FACTORY),
  }),
  stack: z.object({
    rootDir: z.string().min(1),
    composeDir: z.string().min(1).default(CONSTANTS.STACK.COMPOSE_DIR),
    dockerSocket: z.string().min(1).optional(),
    image: z.string().min(1).default(CONSTANTS.STACK.IMAGE),
    dockerfile: z.string().min(1).default(CONSTANTS.STACK.DOCKERFILE),
    skipBuild: z.boolean().default(false),
    imageEnv: z.record(z.string()).default({ ...CONSTANTS.STACK.IMAGE_ENV }),
    deployScript: z.string().min(1).default(CONSTANTS.STACK.DEPLOY_SCRIPT),
    /** Where the deploy script keeps platform data; removed by reset */
    dataRoot: z.string().min(1),
    deployArgs: z.array(z.string()),
    containers: z.array(z.string().min(1)).default([...CONSTANTS.STACK.CONTAINERS]),
    dataDirs: z.array(z.string().min(1)),
    stopAllRemaining: z.boolean().default(false),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type StackConfig = AppConfig['stack'];

/**
 * Values supplied on the command line; undefined means "not given"
 */
export interface ConfigOverrides {
  logLevel?: string;
  baseUrl?: string;
  token?: string;
  timeout?: string | number;
  unresolvedPlaceholders?: string;
  duplicateNames?: string;
  stackDir?: string;
  dataRoot?: string;
  dataDirs?: string[];
  skipBuild?: boolean;
  stopAllRemaining?: boolean;
}

/**
 * Treat empty strings as unset so `FOO= modelctl` falls back to defaults
 */
function getEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function defaultDeployArgs(dataRoot: string): string[] {
  return [
    '--mode',
    '1',
    '--version',
    '1',
    '--is-mainland',
    'N',
    '--enable-terminal',
    'N',
    '--root-dir',
    dataRoot,
  ];
}

/**
 * Create configuration from an explicit environment and CLI overrides
 */
export function createAppConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): AppConfig {
  const rootDir = overrides.stackDir ?? getEnvValue(env, 'STACK_ROOT_DIR') ?? process.cwd();
  const dataRoot = resolve(
    rootDir,
    overrides.dataRoot ??
      getEnvValue(env, 'STACK_DATA_ROOT') ??
      join(homedir(), CONSTANTS.STACK.DATA_ROOT),
  );

  const rawConfig = {
    server: {
      nodeEnv: getEnvValue(env, 'NODE_ENV'),
      logLevel: overrides.logLevel ?? getEnvValue(env, 'LOG_LEVEL'),
    },
    api: {
      baseUrl: overrides.baseUrl ?? getEnvValue(env, 'MODELCTL_BASE_URL'),
      token: overrides.token ?? getEnvValue(env, 'MODELCTL_TOKEN'),
      timeout: overrides.timeout ?? getEnvValue(env, 'MODELCTL_TIMEOUT'),
    },
    batch: {
      importDelayMs: getEnvValue(env, 'MODELCTL_IMPORT_DELAY_MS'),
      deleteDelayMs: getEnvValue(env, 'MODELCTL_DELETE_DELAY_MS'),
    },
    models: {
      unresolvedPlaceholders:
        overrides.unresolvedPlaceholders ?? getEnvValue(env, 'MODELCTL_MISSING_ENV'),
      duplicateNames: overrides.duplicateNames ?? getEnvValue(env, 'MODELCTL_DUPLICATES'),
    },
    stack: {
      rootDir,
      dockerSocket: getEnvValue(env, 'DOCKER_SOCKET'),
      skipBuild: overrides.skipBuild,
      dataRoot,
      deployArgs: defaultDeployArgs(dataRoot),
      dataDirs: overrides.dataDirs ?? splitList(getEnvValue(env, 'STACK_DATA_DIRS')) ?? [dataRoot],
      stopAllRemaining: overrides.stopAllRemaining,
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    throw new ConfigurationError(
      `Configuration validation failed: ${summary}`,
      ErrorCodes.CONFIG_INVALID,
      { issues },
    );
  }

  return result.data;
}
