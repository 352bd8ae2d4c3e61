/**
 * HTTP Server Configuration
 */

import { parseIntEnv } from './env';

export const httpConfig = {
  /** Listen port */
  port: parseIntEnv('PORT', 5001),

  /** Listen address */
  host: process.env['HOST'] || '0.0.0.0',

  /** Per-request timeout in milliseconds */
  requestTimeoutMs: parseIntEnv('HTTP_REQUEST_TIMEOUT_MS', 30000),

  /** Maximum request body size in bytes */
  bodyLimit: parseIntEnv('HTTP_BODY_LIMIT', 1024 * 1024),
} as const;
