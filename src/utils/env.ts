import { ConfigurationError } from './errors';

/**
 * Environment variable helpers. Each takes the environment explicitly so
 * configuration can be loaded from a fixture in tests.
 */

export type Env = Record<string, string | undefined>;

export function getEnvOptional(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return undefined;
}

export function getEnvNumber(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a valid number`, { key, value });
  }
  return parsed;
}

export function getEnvBoolean(env: Env, key: string): boolean | undefined {
  const value = env[key];
  if (value === undefined || value === '') {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}
