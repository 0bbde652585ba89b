import os from 'os';
import path from 'path';
import { ConfigError } from '../utils/errors';
import type { RestampPolicy } from '../services/metrics/CircuitBreakerStore';
import { DEFAULT_SERVICES_FILE, expandHome } from './catalog';

export interface CollectorConfig {
  dbPath: string;
  /** null disables the JSON file the dashboard reads */
  outputFile: string | null;
  servicesFile: string;
  minIntervalMs: number;
  slowTtlMs: number;
  requestTimeoutMs: number;
  cycleDeadlineMs: number;
  breaker: {
    failureThreshold: number;
    cooldownMs: number;
    restampPolicy: RestampPolicy;
  };
  telemetryWindow: number;
  tokensPerLocalQuery: number;
  port: number;
}

const RESTAMP_POLICIES: ReadonlySet<string> = new Set(['sliding', 'fixed']);

function isRestampPolicy(value: string): value is RestampPolicy {
  return RESTAMP_POLICIES.has(value);
}

function parseIntegerEnv(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
  min: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return defaultValue;

  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got "${raw}")`, name);
  }
  return value;
}

function parseRestampPolicy(raw: string | undefined): RestampPolicy {
  if (!raw) return 'sliding';
  const normalized = raw.toLowerCase().trim();
  if (!isRestampPolicy(normalized)) {
    throw new ConfigError(`CB_RESTAMP must be "sliding" or "fixed" (got "${raw}")`, 'CB_RESTAMP');
  }
  return normalized;
}

export function defaultDataDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.local', 'share', 'stack-pulse');
}

/**
 * Build the collector configuration from environment variables.
 * Throws ConfigError on the first invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): CollectorConfig {
  const dataDir = env.METRICS_DATA_DIR ? expandHome(env.METRICS_DATA_DIR, homeDir) : defaultDataDir(homeDir);

  const outputFile = env.METRICS_OUTPUT_FILE === undefined
    ? path.join(dataDir, 'ai_metrics.json')
    : env.METRICS_OUTPUT_FILE.trim() === ''
      ? null
      : expandHome(env.METRICS_OUTPUT_FILE, homeDir);

  return {
    dbPath: env.METRICS_DB_PATH ? expandHome(env.METRICS_DB_PATH, homeDir) : path.join(dataDir, 'state.sqlite'),
    outputFile,
    servicesFile: env.METRICS_SERVICES_FILE ? expandHome(env.METRICS_SERVICES_FILE, homeDir) : DEFAULT_SERVICES_FILE,
    minIntervalMs: parseIntegerEnv(env, 'METRICS_MIN_INTERVAL_MS', 10000, 0),
    slowTtlMs: parseIntegerEnv(env, 'METRICS_SLOW_TTL_MS', 30000, 0),
    requestTimeoutMs: parseIntegerEnv(env, 'METRICS_REQUEST_TIMEOUT_MS', 1000, 1),
    cycleDeadlineMs: parseIntegerEnv(env, 'METRICS_CYCLE_DEADLINE_MS', 5000, 1),
    breaker: {
      failureThreshold: parseIntegerEnv(env, 'CB_THRESHOLD', 3, 1),
      cooldownMs: parseIntegerEnv(env, 'CB_COOLDOWN_MS', 60000, 0),
      restampPolicy: parseRestampPolicy(env.CB_RESTAMP),
    },
    telemetryWindow: parseIntegerEnv(env, 'TELEMETRY_WINDOW', 100, 1),
    tokensPerLocalQuery: parseIntegerEnv(env, 'TOKENS_PER_LOCAL_QUERY', 500, 0),
    port: parseIntegerEnv(env, 'PORT', 3001, 1),
  };
}

export * from './catalog';
