import 'dotenv/config';
import type { Config } from '../types/config.js';
import { DEFAULT_CONFIG } from '../../config/default.js';
import { isLogLevel } from './logger.js';

function env(key: string): string {
  const v = process.env[key];
  if (!v) throw new Error(`Missing env: ${key}`);
  return v;
}

function optEnv(key: string): string | undefined {
  return process.env[key] || undefined;
}

function numEnv(key: string, fallback: number): number {
  const raw = optEnv(key);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) throw new Error(`Invalid number in env ${key}: ${raw}`);
  return n;
}

export interface Secrets {
  SUPABASE_URL: string;
  SUPABASE_KEY: string;
}

export function loadSecrets(): Secrets {
  return {
    SUPABASE_URL: env('SUPABASE_URL'),
    SUPABASE_KEY: env('SUPABASE_SERVICE_KEY'),
  };
}

/** DEFAULT_CONFIG with environment overrides applied. */
export function loadConfig(): Config {
  const d = DEFAULT_CONFIG;
  const level = optEnv('LOG_LEVEL');
  if (level !== undefined && !isLogLevel(level)) throw new Error(`Invalid LOG_LEVEL: ${level}`);

  return {
    ...d,
    bookmakerId: optEnv('BOOKMAKER_ID') ?? d.bookmakerId,
    thresholds: {
      ...d.thresholds,
      openerWindowSec: numEnv('OPENER_WINDOW_SEC', d.thresholds.openerWindowSec),
      quarterEndThresholdSec: numEnv('QUARTER_END_THRESHOLD_SEC', d.thresholds.quarterEndThresholdSec),
      clockToleranceSec: numEnv('CLOCK_TOLERANCE_SEC', d.thresholds.clockToleranceSec),
      stallAfterSec: numEnv('STALL_AFTER_SEC', d.thresholds.stallAfterSec),
      finalLookupAfterStartSec: numEnv('FINAL_LOOKUP_AFTER_START_SEC', d.thresholds.finalLookupAfterStartSec),
    },
    polling: {
      ...d.polling,
      idleIntervalSec: numEnv('IDLE_INTERVAL_SEC', d.polling.idleIntervalSec),
    },
    source: {
      ...d.source,
      token: env('BETSAPI_KEY'),
      baseUrl: optEnv('BETSAPI_BASE') ?? d.source.baseUrl,
    },
    rosterIntervalMs: numEnv('ROSTER_INTERVAL_MS', d.rosterIntervalMs),
    logLevel: level ?? d.logLevel,
  };
}
