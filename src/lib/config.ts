/**
 * Environment-backed defaults shared by the CLIs.
 * The scripts load .env (dotenv) before calling loadDefaults().
 */
import { DEFAULT_NUM_WORKERS } from './batch';
import { DEFAULT_TIMEOUT_MS } from './client';
import { DEFAULT_MAX_RETRIES } from './retry';

export type ClientDefaults = {
  host: string;
  username: string | undefined;
  password: string | undefined;
  timeoutMs: number;
  workers: number;
  maxRetries: number;
  mode: string;
  confidence: number;
};

function numberFromEnv(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export function loadDefaults(env: NodeJS.ProcessEnv = process.env): ClientDefaults {
  return {
    host: env.DETECTX_HOST || '192.168.1.100',
    username: env.DETECTX_USERNAME || undefined,
    password: env.DETECTX_PASSWORD || undefined,
    timeoutMs: numberFromEnv(env, 'DETECTX_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    workers: numberFromEnv(env, 'DETECTX_WORKERS', DEFAULT_NUM_WORKERS),
    maxRetries: numberFromEnv(env, 'DETECTX_MAX_RETRIES', DEFAULT_MAX_RETRIES),
    mode: env.DETECTX_MODE || '',
    confidence: numberFromEnv(env, 'DETECTX_CONFIDENCE', 0),
  };
}

// ==========================================
// CLI VALUE PARSING
// ==========================================

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || (value.startsWith('-') && !/^-\d/.test(value))) {
    throw new ConfigError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseNumber(
  value: string,
  flag: string,
  range: { min?: number; max?: number; integer?: boolean } = {}
): number {
  const parsed = Number(value);
  const { min = -Infinity, max = Infinity, integer = false } = range;
  if (!Number.isFinite(parsed) || parsed < min || parsed > max || (integer && !Number.isInteger(parsed))) {
    const bounds =
      Number.isFinite(min) && Number.isFinite(max) ? ` (must be ${min}-${max})` : '';
    throw new ConfigError(`Invalid value for ${flag}: ${value}${bounds}`);
  }
  return parsed;
}

export function parseChoice<T extends string>(value: string, flag: string, choices: readonly T[]): T {
  const match = choices.find((c) => c === value);
  if (!match) {
    throw new ConfigError(`Invalid value for ${flag}: ${value} (must be ${choices.join(', ')})`);
  }
  return match;
}
