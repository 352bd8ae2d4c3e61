/**
 * Shared Configuration Package
 *
 * Environment variable validation and typed per-area configuration.
 *
 * @example
 * ```typescript
 * import { validateEnv, syncConfig } from '@config';
 *
 * // Validate at startup
 * validateEnv();
 *
 * const intervalMs = syncConfig.intervalMinutes * 60_000;
 * ```
 *
 * @module @config
 */

// ============================================================================
// Environment Utilities
// ============================================================================
export { parseIntEnv, parseFloatEnv, parseIntArrayEnv } from './env';

// ============================================================================
// Validation
// ============================================================================
export { envSchema, type EnvConfig } from './schema';
export { validateConfig, validateEnv, type ValidationResult } from './validation';

// ============================================================================
// Area Configuration
// ============================================================================
export { dbConfig } from './database';
export { httpConfig } from './http';
export { pncpConfig, PNCP_MIN_PAGE_SIZE, PNCP_MAX_PAGE_SIZE, PNCP_MAX_WINDOW_DAYS } from './pncp';
export { retryConfig } from './retry';
export { searchConfig, MAX_RESULT_WINDOW } from './search';
export { syncConfig } from './sync';
