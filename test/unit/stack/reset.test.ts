import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdir, mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createAppConfig, type StackConfig } from '../../../src/config/app-config';
import { CommandError } from '../../../src/lib/errors';
import { resetStack } from '../../../src/stack/reset';
import { FakeDocker, FakeExecutor } from '../../__support__/fake-stack';
import { createTestLogger } from '../../__support__/logger';

describe('resetStack', () => {
  const logger = createTestLogger();
  let root: string;
  let config: StackConfig;
  let docker: FakeDocker;
  let executor: FakeExecutor;

  const failComposeDown = (): void => {
    executor.failures.set('docker', new CommandError('boom', 'docker compose down -v', 1, ''));
  };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'modelctl-reset-'));
    await mkdir(join(root, 'docker'));
    await mkdir(join(root, 'data', 'postgres'), { recursive: true });
    await writeFile(join(root, 'data', 'postgres', 'PG_VERSION'), '16', 'utf-8');
    config = createAppConfig({}, { stackDir: root, dataDirs: ['data/postgres', 'data/minio'] }).stack;
    docker = new FakeDocker();
    executor = new FakeExecutor();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('tears down through compose, removes data and prunes', async () => {
    const report = await resetStack(config, { executor, docker, logger });

    expect(report).toEqual({
      ok: true,
      steps: [
        { name: 'compose-down', ok: true },
        { name: 'remove-data', ok: true, detail: '2/2 removed' },
        { name: 'prune', ok: true, detail: '2 containers, 1 volumes' },
      ],
      warnings: [],
    });
    expect(executor.runs[0]).toMatchObject({
      command: 'docker',
      args: ['compose', 'down', '-v'],
      options: { cwd: join(root, 'docker'), timeout: 120000 },
    });
    expect(docker.calls).toEqual(['prune containers', 'prune volumes']);
    await expect(stat(join(root, 'data', 'postgres'))).rejects.toThrow(/ENOENT/);
  });

  it('force-stops the platform containers when compose fails', async () => {
    failComposeDown();
    docker.missing.add('nexent-redis');

    const report = await resetStack(config, { executor, docker, logger });

    expect(report.ok).toBe(false);
    expect(report.warnings).toEqual(['docker compose down failed: boom (COMMAND_FAILED)']);
    expect(report.steps.slice(0, 2)).toEqual([
      { name: 'compose-down', ok: false, detail: 'boom (COMMAND_FAILED)' },
      { name: 'force-stop', ok: true, detail: '7 stopped' },
    ]);
    expect(docker.calls.slice(0, 4)).toEqual([
      'stop nexent-elasticsearch',
      'remove nexent-elasticsearch',
      'stop nexent-postgresql',
      'remove nexent-postgresql',
    ]);
    expect(docker.calls).not.toContain('list');
  });

  it('stops and removes every remaining container when asked to', async () => {
    failComposeDown();
    docker.running = ['c1'];
    docker.stopped = ['c2'];
    docker.missing.add('c2');

    const report = await resetStack({ ...config, stopAllRemaining: true }, { executor, docker, logger });

    expect(report.warnings).toEqual([
      'docker compose down failed: boom (COMMAND_FAILED)',
      'Failed to remove container c2: no such container',
    ]);
    expect(docker.calls.slice(16, 21)).toEqual(['list', 'stop c1', 'list all', 'remove c1', 'remove c2']);
  });

  it('keeps going when pruning fails', async () => {
    docker.pruneVolumesError = 'daemon unavailable';

    const report = await resetStack(config, { executor, docker, logger });

    expect(report.ok).toBe(false);
    expect(report.warnings).toEqual(['Failed to prune volumes: daemon unavailable']);
    expect(report.steps[2]).toEqual({ name: 'prune', ok: false, detail: '2 containers, 0 volumes' });
  });
});
