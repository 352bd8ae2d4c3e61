/**
 * Startup Configuration Validation
 *
 * Parses process.env through the zod envSchema and reports every problem at
 * once, so a misconfigured deployment fails at boot instead of mid-sync.
 */

import { envSchema, type EnvConfig } from './schema';

export interface ValidationResult {
  valid: boolean;
  /** Variables that failed validation, with the reason */
  invalid: Array<{ key: string; reason: string }>;
  /** Parsed environment (only when valid) */
  env?: EnvConfig;
}

/**
 * Validate configuration without throwing
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result = envSchema.safeParse(env);
  if (result.success) {
    return { valid: true, invalid: [], env: result.data };
  }

  const invalid: Array<{ key: string; reason: string }> = [];
  for (const issue of result.error.issues) {
    const key = issue.path.map(String).join('.') || '(root)';
    if (!invalid.some(i => i.key === key)) {
      invalid.push({ key, reason: issue.message });
    }
  }

  return { valid: false, invalid };
}

/**
 * Validate configuration, throwing with a combined message on failure
 * @throws Error listing every invalid variable
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = validateConfig(env);
  if (!result.valid || !result.env) {
    const lines = result.invalid.map(i => `  - ${i.key}: ${i.reason}`);
    throw new Error(`Invalid environment configuration:\n${lines.join('\n')}`);
  }
  return result.env;
}
