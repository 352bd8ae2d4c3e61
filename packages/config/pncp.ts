/**
 * Procurement Portal (PNCP) Configuration
 */

import { parseIntEnv } from './env';

/** Page-size bounds accepted by /v1/contratacoes/publicacao */
export const PNCP_MIN_PAGE_SIZE = 10;
export const PNCP_MAX_PAGE_SIZE = 50;

/** Longest date range a single query may span */
export const PNCP_MAX_WINDOW_DAYS = 365;

export const pncpConfig = {
  /** API base URL (without the /v1 segment) */
  baseUrl: (process.env['PNCP_BASE_URL'] || 'https://pncp.gov.br/api/consulta').replace(/\/+$/, ''),

  /** Per-request timeout in milliseconds */
  timeoutMs: parseIntEnv('PNCP_TIMEOUT_MS', 30000),

  /** Default page size requested by sync runs */
  pageSize: parseIntEnv('PNCP_PAGE_SIZE', PNCP_MAX_PAGE_SIZE),
} as const;
