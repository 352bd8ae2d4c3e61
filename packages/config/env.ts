/**
 * Environment Variable Utilities
 *
 * Typed readers used by the per-area config modules. Unset or blank
 * variables fall back to the default; malformed ones are rejected at boot
 * by validateEnv().
 */

import { getLogger } from '@kernel/logger';

const logger = getLogger('config');

function readTrimmed(name: string): string | undefined {
  const trimmed = process.env[name]?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Parse integer environment variable with default
 */
export function parseIntEnv(name: string, defaultValue: number): number {
  const value = readTrimmed(name);
  if (value === undefined) return defaultValue;
  // Number() + isInteger rejects '3.14', which parseInt would truncate to 3
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : defaultValue;
}

/**
 * Parse float environment variable with default
 */
export function parseFloatEnv(name: string, defaultValue: number): number {
  const value = readTrimmed(name);
  if (value === undefined) return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

/**
 * Parse a comma-separated list of integers, falling back to the default
 * when the variable is unset. Non-integer entries are dropped with a warning.
 */
export function parseIntArrayEnv(name: string, defaultValue: readonly number[]): number[] {
  const value = readTrimmed(name);
  if (value === undefined) return [...defaultValue];

  const parsed: number[] = [];
  for (const item of value.split(',').map(s => s.trim()).filter(Boolean)) {
    const n = Number(item);
    if (Number.isInteger(n)) {
      parsed.push(n);
    } else {
      logger.warn('Ignoring non-integer list entry', { name, item });
    }
  }
  return parsed;
}
