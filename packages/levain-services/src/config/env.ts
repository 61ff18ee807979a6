/**
 * Environment Configuration
 *
 * Environment variables:
 * - LOG_LEVEL (default: info)
 * - NODE_ENV (default: production)
 * - LEVAIN_SNAPSHOT_DIR (default: .levain/snapshots)
 *
 * Entry points load `.env` through `dotenv/config` before importing this package.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LogLevelSchema = z.enum(LOG_LEVELS);

export const DEFAULT_SNAPSHOT_DIR = '.levain/snapshots';

/**
 * Unknown levels fall back to info.
 */
export function getLogLevel(): LogLevel {
  const parsed = LogLevelSchema.safeParse(process.env.LOG_LEVEL?.toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

export function getNodeEnv(): string {
  return process.env.NODE_ENV ?? 'production';
}

export function isDevelopment(): boolean {
  return getNodeEnv() === 'development';
}

export function getSnapshotDir(): string {
  return process.env.LEVAIN_SNAPSHOT_DIR || DEFAULT_SNAPSHOT_DIR;
}
