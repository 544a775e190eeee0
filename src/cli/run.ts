/**
 * modelctl command-line interface
 *
 * Exactly one mode runs per invocation; runCli resolves to the process exit code.
 */

import { Command, CommanderError, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { createAppConfig, type AppConfig } from '../config/app-config';
import { remoteModelLabel } from '../domain/model-config';
import { CommandExecutor } from '../infrastructure/command-executor';
import { createDockerClient, type DockerClient } from '../infrastructure/docker/client';
import { createPlatformClient, type FetchFn } from '../infrastructure/platform-client';
import { describeError, ErrorCodes, isApplicationError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { loadModelsFile, parseEnvFile, type LoadedModels } from '../models/config-loader';
import { ModelManager, type BatchReport } from '../models/model-manager';
import { deployStack } from '../stack/deploy';
import { resetStack } from '../stack/reset';
import type { StackExecutor, StackReport } from '../stack/types';
import type { BatchOperation, ProgressEmitter } from '../types/core';

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  fetch?: FetchFn;
  logger?: Logger;
  executor?: StackExecutor;
  docker?: DockerClient;
  sleep?: (ms: number) => Promise<void>;
}

interface CliOptions {
  config?: string;
  sync?: string;
  deleteAll?: boolean;
  verify?: string;
  verifyAll?: boolean;
  list?: boolean;
  deployStack?: boolean;
  resetStack?: boolean;
  validate?: boolean;
  replaceExisting?: boolean;
  baseUrl?: string;
  token?: string;
  envFile?: string;
  onMissingEnv?: string;
  duplicates?: string;
  timeout?: string;
  logLevel?: string;
  skipBuild?: boolean;
  stopAll?: boolean;
  stackDir?: string;
  dataRoot?: string;
  dataDir?: string[];
}

interface CliContext {
  options: CliOptions;
  config: AppConfig;
  env: NodeJS.ProcessEnv;
  logger: Logger;
  deps: CliDeps;
}

const OPERATION_LABELS: Record<BatchOperation, string> = {
  import: 'Import',
  delete: 'Delete',
  verify: 'Verify',
};

function readPackageVersion(): string {
  // src/cli/ -> root, dist/src/cli/ -> root
  const packageJsonPath = __dirname.includes('dist')
    ? join(__dirname, '../../../package.json')
    : join(__dirname, '../../package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
  } catch {
    return '0.0.0';
  }
  return '0.0.0';
}

export function createProgram(): Command {
  return new Command()
    .name('modelctl')
    .description('Register, remove and health-check model entries on the model platform')
    .version(readPackageVersion())
    .option('--config <file>', 'import every model in a JSON configuration file')
    .option('--sync <file>', 'delete all models, import the file, then verify all models')
    .option('--delete-all', 'delete every registered model')
    .option('--verify <name>', 'check connectivity of one model (by display name)')
    .option('--verify-all', 'check connectivity of every registered model')
    .option('--list', 'list registered models')
    .option('--deploy-stack', 'build the platform image and deploy the container stack')
    .option('--reset-stack', 'tear down the container stack and remove its data')
    .option('--validate', 'with --config/--sync: validate the file without calling the API')
    .option('--replace-existing', 'delete same-named models before importing them')
    .option('--base-url <url>', 'platform API base URL (default: http://localhost:5010)')
    .option('--token <token>', 'bearer token for the platform API')
    .option('--env-file <path>', 'dotenv file used to resolve ${VAR} placeholders')
    .addOption(
      new Option('--on-missing-env <policy>', 'unresolved ${VAR} placeholders').choices([
        'keep',
        'error',
      ]),
    )
    .addOption(
      new Option('--duplicates <policy>', 'duplicate model_name entries').choices([
        'reject',
        'overwrite',
      ]),
    )
    .option('--timeout <ms>', 'per-request timeout in milliseconds')
    .addOption(
      new Option('--log-level <level>', 'logging level').choices([
        'fatal',
        'error',
        'warn',
        'info',
        'debug',
        'trace',
        'silent',
      ]),
    )
    .option('--skip-build', 'with --deploy-stack: reuse the existing image')
    .option('--stop-all', 'with --reset-stack: also stop and remove every other container')
    .option('--stack-dir <path>', 'platform checkout containing the compose directory')
    .option('--data-root <path>', 'platform data directory (default: ~/nexent-data)')
    .option('--data-dir <path...>', 'data directories removed by --reset-stack (default: the data root)')
    .addHelpText(
      'after',
      `

Examples:
  $ modelctl --config models.json                 Import models from a file
  $ modelctl --config models.json --validate      Check a file without calling the API
  $ modelctl --sync models.json --env-file .env   Delete, import and verify in one go
  $ modelctl --verify "GPT-4o"                    Check one model
  $ modelctl --verify-all                         Check every model
  $ modelctl --reset-stack --data-dir ~/platform-data

Environment Variables:
  MODELCTL_BASE_URL        Platform API base URL
  MODELCTL_TOKEN           Bearer token
  MODELCTL_TIMEOUT         Per-request timeout (ms)
  MODELCTL_MISSING_ENV     keep | error
  MODELCTL_DUPLICATES      reject | overwrite
  STACK_ROOT_DIR           Platform checkout for --deploy-stack/--reset-stack
  STACK_DATA_ROOT          Platform data directory passed to the deploy script
  STACK_DATA_DIRS          Comma-separated data directories for --reset-stack
  LOG_LEVEL                Logging level
`,
    )
    .exitOverride();
}

function createManager(ctx: CliContext): ModelManager {
  const { config, logger, deps } = ctx;
  const client = createPlatformClient({
    baseUrl: config.api.baseUrl,
    token: config.api.token,
    timeout: config.api.timeout,
    logger,
    ...(deps.fetch ? { fetch: deps.fetch } : {}),
  });

  const progress: ProgressEmitter = {
    emit(update) {
      if (update.status === 'starting') return;
      const marker = update.status === 'completed' ? '✅' : '❌';
      const suffix = update.message ? `: ${update.message}` : '';
      console.log(
        `[${update.index}/${update.total}] ${marker} ${OPERATION_LABELS[update.operation]} ${update.name}${suffix}`,
      );
    },
  };

  return new ModelManager({
    client,
    logger,
    importDelayMs: config.batch.importDelayMs,
    deleteDelayMs: config.batch.deleteDelayMs,
    progress,
    ...(deps.sleep ? { sleep: deps.sleep } : {}),
  });
}

/**
 * A missing env file only warns; the process environment still applies
 */
async function readEnvFile(path: string): Promise<Record<string, string>> {
  try {
    return await parseEnvFile(path);
  } catch (error) {
    if (isApplicationError(error) && error.code === ErrorCodes.CONFIG_NOT_FOUND) {
      console.error(`⚠️  Environment file '${path}' does not exist; some models may not work`);
      return {};
    }
    throw error;
  }
}

async function loadModels(ctx: CliContext, path: string): Promise<LoadedModels> {
  const { options, config, env, logger } = ctx;
  const fileEnv = options.envFile ? await readEnvFile(options.envFile) : {};
  return loadModelsFile(path, {
    env: { ...env, ...fileEnv },
    logger,
    unresolvedPlaceholders: config.models.unresolvedPlaceholders,
    duplicateNames: config.models.duplicateNames,
    defaultFactory: config.models.defaultFactory,
  });
}

function printSummary(report: BatchReport, verb: string): void {
  if (report.error !== undefined) {
    console.error(`❌ ${report.error}`);
    return;
  }
  console.log(`📊 ${verb} finished: ${report.succeeded} succeeded, ${report.failed} failed`);
}

async function runValidate(ctx: CliContext, path: string): Promise<number> {
  const { models, unresolved } = await loadModels(ctx, path);
  for (const { model, variable } of unresolved) {
    console.error(`⚠️  Environment variable '${variable}' is not set (model ${model})`);
  }
  console.log(`✅ Configuration valid: ${models.length} model(s)`);
  return 0;
}

async function runImport(ctx: CliContext, path: string): Promise<number> {
  const { models } = await loadModels(ctx, path);
  console.log(`🚀 Importing ${models.length} model(s) from ${path}`);
  const report = await createManager(ctx).importModels(models, {
    replaceExisting: ctx.options.replaceExisting ?? false,
  });
  printSummary(report, 'Import');
  return report.ok ? 0 : 1;
}

async function runDeleteAll(ctx: CliContext): Promise<number> {
  const report = await createManager(ctx).deleteAllModels();
  if (report.ok && report.outcomes.length === 0) {
    console.log('📋 No models found');
    return 0;
  }
  printSummary(report, 'Delete');
  if (report.ok) {
    console.log('✅ All models deleted');
    return 0;
  }
  console.error('❌ Some models could not be deleted');
  return 1;
}

async function runVerify(ctx: CliContext, name: string): Promise<number> {
  const outcome = await createManager(ctx).verifyModel(name);
  if (outcome.ok) {
    console.log(`✅ Model '${name}' is reachable`);
    return 0;
  }
  console.error(`❌ Model '${name}' failed verification: ${outcome.error ?? 'unknown error'}`);
  return 1;
}

function reportVerification(report: BatchReport): number {
  if (report.error !== undefined) {
    console.error(`❌ ${report.error}`);
    return 1;
  }
  if (report.outcomes.length === 0) {
    console.log('📋 No models found');
    return 0;
  }
  console.log(
    `📊 Verification finished: ${report.succeeded}/${report.outcomes.length} models reachable`,
  );
  const failed = report.outcomes.filter((outcome) => !outcome.ok).map((outcome) => outcome.name);
  if (failed.length > 0) {
    console.error(`❌ Unreachable models: ${failed.join(', ')}`);
    return 1;
  }
  console.log('✅ All models reachable');
  return 0;
}

async function runVerifyAll(ctx: CliContext): Promise<number> {
  return reportVerification(await createManager(ctx).verifyAllModels());
}

async function runList(ctx: CliContext): Promise<number> {
  const listed = await createManager(ctx).listModels();
  if (!listed.ok) {
    console.error(`❌ Failed to list models: ${listed.error}`);
    return 1;
  }
  for (const entry of listed.value) {
    const details = [entry.model_type, entry.model_factory].filter(Boolean).join(', ');
    console.log(`• ${remoteModelLabel(entry)}${details ? ` (${details})` : ''}`);
  }
  console.log(`📋 ${listed.value.length} model(s)`);
  return 0;
}

async function runSync(ctx: CliContext, path: string): Promise<number> {
  const { models } = await loadModels(ctx, path);
  console.log(`🔄 Syncing ${models.length} model(s) from ${path}: delete → import → verify`);

  const report = await createManager(ctx).sync(models, {
    replaceExisting: ctx.options.replaceExisting ?? false,
  });

  printSummary(report.deleted, 'Delete');
  if (report.stage === 'delete') {
    console.error('❌ Sync stopped: delete failed');
    return 1;
  }
  if (report.imported) printSummary(report.imported, 'Import');
  if (report.stage === 'import') {
    console.error('❌ Sync stopped: import failed');
    return 1;
  }
  if (report.verified && reportVerification(report.verified) !== 0) {
    console.error('⚠️  Some models are unreachable, but the sync completed');
    return 0;
  }
  console.log('🎉 Sync complete: all models imported and reachable');
  return 0;
}

function printStackReport(report: StackReport): void {
  for (const step of report.steps) {
    const marker = step.skipped ? '⏭️ ' : step.ok ? '✅' : '❌';
    const detail = step.detail ? `: ${step.detail}` : '';
    const line = `${marker} ${step.name}${detail}`;
    if (step.ok) console.log(line);
    else console.error(line);
  }
  for (const warning of report.warnings) {
    console.error(`⚠️  ${warning}`);
  }
}

function stackDeps(ctx: CliContext): { executor: StackExecutor; docker: DockerClient; logger: Logger } {
  const { deps, logger, config } = ctx;
  return {
    executor: deps.executor ?? new CommandExecutor(logger),
    docker: deps.docker ?? createDockerClient(logger, config.stack.dockerSocket),
    logger,
  };
}

async function runDeployStack(ctx: CliContext): Promise<number> {
  console.log(`🚀 Deploying stack from ${ctx.config.stack.rootDir}`);
  const report = await deployStack(ctx.config.stack, stackDeps(ctx));
  printStackReport(report);
  if (!report.ok) {
    console.error('❌ Stack deployment failed');
    return 1;
  }
  console.log('✅ Stack deployed');
  return 0;
}

async function runResetStack(ctx: CliContext): Promise<number> {
  console.log(`🧹 Resetting stack in ${ctx.config.stack.rootDir}`);
  const report = await resetStack(ctx.config.stack, stackDeps(ctx));
  printStackReport(report);
  console.log(
    report.ok ? '✅ Reset complete' : '✅ Reset complete with warnings; the stack can be redeployed',
  );
  return 0;
}

async function dispatch(ctx: CliContext, program: Command): Promise<number> {
  const { options } = ctx;

  if (options.config !== undefined) {
    return options.validate ? runValidate(ctx, options.config) : runImport(ctx, options.config);
  }
  if (options.sync !== undefined) {
    return options.validate ? runValidate(ctx, options.sync) : runSync(ctx, options.sync);
  }
  if (options.deleteAll) return runDeleteAll(ctx);
  if (options.verify !== undefined) return runVerify(ctx, options.verify);
  if (options.verifyAll) return runVerifyAll(ctx);
  if (options.list) return runList(ctx);
  if (options.deployStack) return runDeployStack(ctx);
  if (options.resetStack) return runResetStack(ctx);

  program.outputHelp();
  return 0;
}

/**
 * Parse `args` (without the node and script entries) and run the selected mode
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const program = createProgram();

  try {
    program.parse(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const env = deps.env ?? process.env;

  try {
    const config = createAppConfig(env, {
      logLevel: options.logLevel,
      baseUrl: options.baseUrl,
      token: options.token,
      timeout: options.timeout,
      unresolvedPlaceholders: options.onMissingEnv,
      duplicateNames: options.duplicates,
      stackDir: options.stackDir,
      dataRoot: options.dataRoot,
      dataDirs: options.dataDir,
      skipBuild: options.skipBuild,
      stopAllRemaining: options.stopAll,
    });
    const logger =
      deps.logger ??
      createLogger({ level: config.server.logLevel, environment: config.server.nodeEnv });

    return await dispatch({ options, config, env, logger, deps }, program);
  } catch (error) {
    console.error(`❌ ${describeError(error)}`);
    return 1;
  }
}
