import { cpus } from 'os';
import { ConfigError } from '@/errors';
import type { Env } from '@/types/env';
import { isLogLevel, type LogLevel } from '@/utils/logger';

export interface InspectorConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  /** Empty list means any origin */
  allowedOrigins: string[];
  probe: {
    step: number;
    maxAttempts: number;
    leadingBytes: number;
  };
  report: {
    outputDir: string;
    shardSize: number;
    concurrency: number;
  };
}

export const DEFAULT_PROBE_STEP = 1048576;
export const DEFAULT_MAX_ATTEMPTS = 20;
export const DEFAULT_LEADING_BYTES = 8192;
export const DEFAULT_REPORT_DIR = 'reports';
export const DEFAULT_SHARD_SIZE = 1000;

export function getDefaultConcurrency(): number {
  return Math.max(cpus().length, 1);
}

/**
 * Parse a strictly positive integer setting. Blank values fall back to the default.
 */
export function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < 1 || !Number.isSafeInteger(parsed)) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseAllowedOrigins(value?: string): string[] {
  if (!value) return [];
  const trimmed = value.trim();
  if (!trimmed || trimmed === '*') return [];

  return trimmed
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env): InspectorConfig {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${env.LOG_LEVEL}"`);
  }

  return {
    port: parsePositiveInt('PORT', env.PORT, 3000),
    host: env.HOST?.trim() || '0.0.0.0',
    logLevel,
    allowedOrigins: parseAllowedOrigins(env.ALLOWED_ORIGINS),
    probe: {
      step: parsePositiveInt('PROBE_STEP', env.PROBE_STEP, DEFAULT_PROBE_STEP),
      maxAttempts: parsePositiveInt('PROBE_MAX_ATTEMPTS', env.PROBE_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
      leadingBytes: parsePositiveInt('LEADING_BYTES', env.LEADING_BYTES, DEFAULT_LEADING_BYTES),
    },
    report: {
      outputDir: env.REPORT_DIR?.trim() || DEFAULT_REPORT_DIR,
      shardSize: parsePositiveInt('REPORT_SHARD_SIZE', env.REPORT_SHARD_SIZE, DEFAULT_SHARD_SIZE),
      concurrency: parsePositiveInt('REPORT_CONCURRENCY', env.REPORT_CONCURRENCY, getDefaultConcurrency()),
    },
  };
}
