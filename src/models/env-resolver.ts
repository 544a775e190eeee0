/**
 * `${NAME}` placeholder substitution against an explicit environment map
 */

import type { PlaceholderPolicy } from '../config/app-config';
import { ConfigurationError, ErrorCodes } from '../lib/errors';

export type EnvMap = Readonly<Record<string, string | undefined>>;

export interface ResolvedValue {
  value: string;
  unresolved: string[];
}

const PLACEHOLDER_PATTERN = /\$\{([^}]+)\}/g;

/**
 * Replace every `${NAME}` in `value` with `env[NAME]`.
 *
 * Substituted text is not scanned again. Names missing from `env` are either
 * left in place (`keep`) or rejected (`error`).
 */
export function resolvePlaceholders(
  value: string,
  env: EnvMap,
  policy: PlaceholderPolicy = 'keep',
): ResolvedValue {
  const unresolved: string[] = [];

  const resolved = value.replace(PLACEHOLDER_PATTERN, (match: string, name: string) => {
    const replacement = env[name];
    if (replacement !== undefined) {
      return replacement;
    }
    if (policy === 'error') {
      throw new ConfigurationError(
        `Environment variable '${name}' is not set`,
        ErrorCodes.UNRESOLVED_PLACEHOLDER,
        { variable: name },
      );
    }
    unresolved.push(name);
    return match;
  });

  return { value: resolved, unresolved };
}

export interface ResolvedRecord {
  record: Record<string, unknown>;
  unresolved: string[];
}

/**
 * Resolve placeholders in every string field of a raw record. Non-string
 * fields pass through untouched.
 */
export function resolveRecordPlaceholders(
  record: Record<string, unknown>,
  env: EnvMap,
  policy: PlaceholderPolicy = 'keep',
): ResolvedRecord {
  const output: Record<string, unknown> = {};
  const unresolved: string[] = [];

  for (const [key, fieldValue] of Object.entries(record)) {
    if (typeof fieldValue === 'string') {
      const result = resolvePlaceholders(fieldValue, env, policy);
      output[key] = result.value;
      unresolved.push(...result.unresolved);
    } else {
      output[key] = fieldValue;
    }
  }

  return { record: output, unresolved };
}
