import { describe, it, expect } from '@jest/globals';
import { runInNewContext } from 'node:vm';
import {
  ApplicationError,
  CommandError,
  ConfigurationError,
  ErrorCodes,
  ValidationError,
  describeError,
  isApplicationError,
} from '../../../src/lib/errors';

describe('errors', () => {
  it('appends the code to user messages', () => {
    const error = new ConfigurationError("Configuration file 'x.json' does not exist", ErrorCodes.CONFIG_NOT_FOUND);

    expect(error.name).toBe('ConfigurationError');
    expect(error.getUserMessage()).toBe("Configuration file 'x.json' does not exist (CONFIG_NOT_FOUND)");
    expect(isApplicationError(error)).toBe(true);
  });

  it('lists validation violations', () => {
    const error = new ValidationError('Invalid model configuration', [
      { field: 'models[0].base_url', message: 'Required' },
      { field: 'models[1]', message: 'Expected an object' },
    ]);

    expect(error.code).toBe(ErrorCodes.VALIDATION_FAILED);
    expect(error.getUserMessage()).toBe(
      [
        'Invalid model configuration (VALIDATION_FAILED)',
        '  • models[0].base_url: Required',
        '  • models[1]: Expected an object',
      ].join('\n'),
    );
  });

  it('keeps command context in details', () => {
    const error = new CommandError('Command exited with code 2: docker ps', 'docker ps', 2, 'denied');

    expect(error.code).toBe(ErrorCodes.COMMAND_FAILED);
    expect(error.details).toEqual({ command: 'docker ps', exitCode: 2, stderr: 'denied' });
  });

  it('keeps the cause', () => {
    const cause = new Error('root');
    const error = new ApplicationError('outer', ErrorCodes.INTERNAL_ERROR, undefined, cause);

    expect(error.cause).toBe(cause);
    expect(error.details).toEqual({});
  });

  it('describes any thrown value', () => {
    expect(describeError(new ApplicationError('boom'))).toBe('boom (INTERNAL_ERROR)');
    expect(describeError(new Error('plain'))).toBe('plain');
    expect(describeError('text')).toBe('text');
  });

  it('describes errors created in another realm', () => {
    const foreign: unknown = runInNewContext("new Error('ENOENT: no such file')");

    expect(foreign instanceof Error).toBe(false);
    expect(describeError(foreign)).toBe('ENOENT: no such file');
  });
});
