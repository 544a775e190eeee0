/**
 * Best-effort teardown of the platform stack: compose down, forced
 * container cleanup when that fails, data directory removal and pruning.
 */

import { rm } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { StackConfig } from '../config/app-config';
import { describeError } from '../lib/errors';
import type { Result } from '../types/core';
import type { StackDeps, StackReport, StackStep } from './types';

export async function resetStack(config: StackConfig, deps: StackDeps): Promise<StackReport> {
  const { executor, docker } = deps;
  const logger = deps.logger.child({ component: 'resetStack' });
  const rootDir = resolve(config.rootDir);
  const composeDir = resolve(rootDir, config.composeDir);
  const steps: StackStep[] = [];
  const warnings: string[] = [];

  const warn = (message: string): void => {
    warnings.push(message);
    logger.warn(message);
  };
  const check = <T>(result: Result<T>): T | undefined => {
    if (result.ok) return result.value;
    warn(result.error);
    return undefined;
  };

  let composeDown = true;
  try {
    await executor.run('docker', ['compose', 'down', '-v'], { cwd: composeDir, timeout: 120000 });
    steps.push({ name: 'compose-down', ok: true });
  } catch (error) {
    composeDown = false;
    const detail = describeError(error);
    warn(`docker compose down failed: ${detail}`);
    steps.push({ name: 'compose-down', ok: false, detail });
  }

  if (!composeDown) {
    let stopped = 0;
    for (const name of config.containers) {
      // Absent or already-stopped containers are expected here
      const stop = await docker.stopContainer(name);
      if (stop.ok) stopped++;
      else logger.debug({ container: name, error: stop.error }, 'Stop skipped');

      const remove = await docker.removeContainer(name);
      if (!remove.ok) logger.debug({ container: name, error: remove.error }, 'Remove skipped');
    }

    if (config.stopAllRemaining) {
      const running = check(await docker.listContainerIds()) ?? [];
      for (const id of running) {
        check(await docker.stopContainer(id));
      }
      const all = check(await docker.listContainerIds({ all: true })) ?? [];
      for (const id of all) {
        check(await docker.removeContainer(id));
      }
    }
    steps.push({ name: 'force-stop', ok: true, detail: `${stopped} stopped` });
  }

  let removedDirs = 0;
  for (const dir of config.dataDirs) {
    const target = resolve(rootDir, dir);
    try {
      await rm(target, { recursive: true, force: true });
      removedDirs++;
      logger.info({ dir: target }, 'Data directory removed');
    } catch (error) {
      warn(`Failed to remove ${target}: ${describeError(error)}`);
    }
  }
  steps.push({
    name: 'remove-data',
    ok: removedDirs === config.dataDirs.length,
    detail: `${removedDirs}/${config.dataDirs.length} removed`,
  });

  const containers = check(await docker.pruneContainers());
  const volumes = check(await docker.pruneVolumes());
  steps.push({
    name: 'prune',
    ok: containers !== undefined && volumes !== undefined,
    detail: `${containers?.removed ?? 0} containers, ${volumes?.removed ?? 0} volumes`,
  });

  return { ok: warnings.length === 0, steps, warnings };
}
