import { ConfigError } from './errors.js';
import type { SupervisorConfig } from './types.js';

const DEFAULT_PORT = 8080;
const DEFAULT_BIND_ADDRESS = '0.0.0.0';
const DEFAULT_THREADS = 1;
const DEFAULT_GRACEFUL_TIMEOUT_S = 30;
const DEFAULT_WORKER_TIMEOUT_S = 30;
const DEFAULT_KEEPALIVE_S = 2;
const DEFAULT_BACKLOG = 2048;
const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

function present(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function parseInteger(name: string, value: string | undefined, fallback: number, min: number, max: number): number {
  const trimmed = present(value);
  if (trimmed === null) {
    return fallback;
  }
  const parsed = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(`Invalid ${name}: '${value}'. Expected integer in range ${min}-${max}.`);
  }
  return parsed;
}

/** Durations are given in seconds, fractions allowed. */
function parseSeconds(name: string, value: string | undefined, fallbackSeconds: number): number {
  const trimmed = present(value);
  if (trimmed === null) {
    return fallbackSeconds * 1000;
  }
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(`Invalid ${name}: '${value}'. Expected a non-negative number of seconds.`);
  }
  return Math.round(parsed * 1000);
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  const trimmed = present(value);
  if (trimmed === null) {
    return fallback;
  }

  const normalized = trimmed.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  throw new ConfigError(`Invalid ${name}: '${value}'. Expected true/false, 1/0, yes/no, on/off.`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SupervisorConfig {
  return Object.freeze({
    port: parseInteger('PORT', env.PORT, DEFAULT_PORT, 0, 65535),
    bindAddress: present(env.BIND_ADDRESS) ?? DEFAULT_BIND_ADDRESS,
    threads: parseInteger('THREADS', env.THREADS, DEFAULT_THREADS, 1, 1024),
    gracePeriodMs: parseSeconds('GRACEFUL_TIMEOUT', env.GRACEFUL_TIMEOUT, DEFAULT_GRACEFUL_TIMEOUT_S),
    workerTimeoutMs: parseSeconds('WORKER_TIMEOUT', env.WORKER_TIMEOUT, DEFAULT_WORKER_TIMEOUT_S),
    keepAliveMs: parseSeconds('KEEPALIVE', env.KEEPALIVE, DEFAULT_KEEPALIVE_S),
    backlog: parseInteger('BACKLOG', env.BACKLOG, DEFAULT_BACKLOG, 1, 65535),
    maxBodyBytes: parseInteger('MAX_BODY_BYTES', env.MAX_BODY_BYTES, DEFAULT_MAX_BODY_BYTES, 0, Number.MAX_SAFE_INTEGER),
    appModule: present(env.APP_MODULE),
    corsEnabled: parseBoolean('CORS_ENABLED', env.CORS_ENABLED, false),
    statusRoutes: parseBoolean('STATUS_ROUTES', env.STATUS_ROUTES, true),
  });
}

/** Config with overrides applied, frozen like the loaded one. */
export function withOverrides(base: SupervisorConfig, overrides: Partial<SupervisorConfig> = {}): SupervisorConfig {
  return Object.freeze({ ...base, ...overrides });
}
