import { describe, it, expect } from '@jest/globals';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { createAppConfig } from '../../../src/config/app-config';
import { ConfigurationError, ErrorCodes } from '../../../src/lib/errors';

describe('createAppConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = createAppConfig({}, { stackDir: '/srv/stack' });

    expect(config.server).toEqual({ nodeEnv: 'production', logLevel: 'warn' });
    expect(config.api).toEqual({ baseUrl: 'http://localhost:5010', timeout: 30000 });
    expect(config.batch).toEqual({ importDelayMs: 500, deleteDelayMs: 300 });
    expect(config.models).toEqual({
      unresolvedPlaceholders: 'keep',
      duplicateNames: 'reject',
      defaultFactory: 'OpenAI-API-Compatible',
    });
    expect(config.stack.rootDir).toBe('/srv/stack');
    expect(config.stack.composeDir).toBe('docker');
    expect(config.stack.skipBuild).toBe(false);
    expect(config.stack.dataRoot).toBe(join(homedir(), 'nexent-data'));
    expect(config.stack.dataDirs).toEqual([join(homedir(), 'nexent-data')]);
    expect(config.stack.containers).toHaveLength(8);
    expect(config.stack.deployArgs).toEqual([
      '--mode',
      '1',
      '--version',
      '1',
      '--is-mainland',
      'N',
      '--enable-terminal',
      'N',
      '--root-dir',
      join(homedir(), 'nexent-data'),
    ]);
  });

  it('feeds the data root to the deploy script and to reset', () => {
    const config = createAppConfig({ STACK_DATA_ROOT: '/srv/platform-data' }, { stackDir: '/srv/stack' });

    expect(config.stack.dataRoot).toBe('/srv/platform-data');
    expect(config.stack.deployArgs.slice(-2)).toEqual(['--root-dir', '/srv/platform-data']);
    expect(config.stack.dataDirs).toEqual(['/srv/platform-data']);
  });

  it('resolves a relative data root against the stack directory', () => {
    const config = createAppConfig({ STACK_DATA_ROOT: '/srv/ignored' }, { stackDir: '/srv/stack', dataRoot: 'data' });

    expect(config.stack.dataRoot).toBe('/srv/stack/data');
    expect(config.stack.deployArgs.slice(-1)).toEqual(['/srv/stack/data']);
  });

  it('keeps explicit data directories instead of the data root', () => {
    const config = createAppConfig({}, { stackDir: '/srv/stack', dataRoot: 'data', dataDirs: ['cache'] });

    expect(config.stack.dataDirs).toEqual(['cache']);
  });

  it('rejects a timeout that setTimeout cannot honour', () => {
    expect(() => createAppConfig({}, { timeout: '3000000000' })).toThrow(/api\.timeout: /);
    expect(createAppConfig({}, { timeout: '2147483647' }).api.timeout).toBe(2147483647);
  });

  it('reads settings from the environment', () => {
    const config = createAppConfig({
      MODELCTL_BASE_URL: 'http://platform.test:8080',
      MODELCTL_TOKEN: 'test-token',
      MODELCTL_TIMEOUT: '5000',
      MODELCTL_IMPORT_DELAY_MS: '0',
      MODELCTL_DELETE_DELAY_MS: '10',
      MODELCTL_MISSING_ENV: 'error',
      MODELCTL_DUPLICATES: 'overwrite',
      LOG_LEVEL: 'debug',
      STACK_DATA_DIRS: 'data/a, data/b,,',
    });

    expect(config.api).toEqual({ baseUrl: 'http://platform.test:8080', token: 'test-token', timeout: 5000 });
    expect(config.batch).toEqual({ importDelayMs: 0, deleteDelayMs: 10 });
    expect(config.models.unresolvedPlaceholders).toBe('error');
    expect(config.models.duplicateNames).toBe('overwrite');
    expect(config.server.logLevel).toBe('debug');
    expect(config.stack.dataDirs).toEqual(['data/a', 'data/b']);
  });

  it('lets command-line overrides win over the environment', () => {
    const config = createAppConfig(
      { MODELCTL_BASE_URL: 'http://env.test', MODELCTL_TOKEN: 'env-token', LOG_LEVEL: 'debug' },
      { baseUrl: 'http://cli.test', token: 'test-secret', logLevel: 'error', timeout: '100' },
    );

    expect(config.api).toEqual({ baseUrl: 'http://cli.test', token: 'test-secret', timeout: 100 });
    expect(config.server.logLevel).toBe('error');
  });

  it('treats empty environment values as unset', () => {
    const config = createAppConfig({ MODELCTL_BASE_URL: '', MODELCTL_TOKEN: '  ' });

    expect(config.api.baseUrl).toBe('http://localhost:5010');
    expect(config.api.token).toBeUndefined();
  });

  it('rejects invalid values with every failing field', () => {
    const attempt = (): unknown => createAppConfig({ MODELCTL_TIMEOUT: 'soon', MODELCTL_BASE_URL: 'not a url' });

    expect(attempt).toThrow(ConfigurationError);
    expect(attempt).toThrow(/api\.baseUrl: .*; api\.timeout: /);
    try {
      attempt();
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCodes.CONFIG_INVALID });
    }
  });
});
