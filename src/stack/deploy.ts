/**
 * Build the platform image, write the compose .env and run the platform's
 * deploy script. Stops at the first failing step.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { StackConfig } from '../config/app-config';
import { describeError } from '../lib/errors';
import type { StackDeps, StackReport, StackStep } from './types';

/**
 * Render the compose .env: the example file followed by one KEY=value line
 * per image variable
 */
export function renderEnvFile(example: string, imageEnv: Record<string, string>): string {
  const separator = example === '' || example.endsWith('\n') ? '' : '\n';
  const lines = Object.entries(imageEnv).map(([key, value]) => `${key}=${value}\n`);
  return `${example}${separator}${lines.join('')}`;
}

export async function deployStack(config: StackConfig, deps: StackDeps): Promise<StackReport> {
  const { executor, docker } = deps;
  const logger = deps.logger.child({ component: 'deployStack' });
  const rootDir = resolve(config.rootDir);
  const composeDir = resolve(rootDir, config.composeDir);
  const steps: StackStep[] = [];

  const finish = (step: StackStep): StackReport => {
    steps.push(step);
    if (!step.ok) {
      logger.error({ step: step.name, detail: step.detail }, 'Stack deployment failed');
    }
    return { ok: step.ok, steps, warnings: [] };
  };

  if (!(await executor.isAvailable('docker'))) {
    return finish({ name: 'preflight', ok: false, detail: 'docker CLI not found on PATH' });
  }
  steps.push({ name: 'preflight', ok: true });

  if (config.skipBuild) {
    steps.push({ name: 'build', ok: true, skipped: true });
  } else {
    logger.info({ image: config.image, dockerfile: config.dockerfile }, 'Building image');
    const built = await docker.buildImage({
      context: rootDir,
      dockerfile: config.dockerfile,
      tag: config.image,
    });
    if (!built.ok) {
      return finish({ name: 'build', ok: false, detail: built.error });
    }
    steps.push({ name: 'build', ok: true, detail: built.value.imageId || config.image });
  }

  const envPath = join(composeDir, '.env');
  try {
    const example = await readFile(join(composeDir, '.env.example'), 'utf-8');
    await writeFile(envPath, renderEnvFile(example, config.imageEnv), 'utf-8');
    steps.push({ name: 'configure', ok: true, detail: envPath });
  } catch (error) {
    return finish({ name: 'configure', ok: false, detail: describeError(error) });
  }

  logger.info({ script: config.deployScript, cwd: composeDir }, 'Running deploy script');
  try {
    await executor.run(config.deployScript, config.deployArgs, {
      cwd: composeDir,
      timeout: 0,
      onOutput: (chunk) => {
        for (const line of chunk.split('\n')) {
          if (line.trim() !== '') logger.info({ output: line }, 'deploy');
        }
      },
    });
  } catch (error) {
    return finish({ name: 'deploy', ok: false, detail: describeError(error) });
  }

  return finish({ name: 'deploy', ok: true });
}
