import fetch from 'node-fetch';
import { z } from 'zod';

import { pncpConfig, retryConfig, PNCP_MAX_PAGE_SIZE, PNCP_MAX_WINDOW_DAYS, PNCP_MIN_PAGE_SIZE } from '@config';
import { ValidationError, getErrorMessage, toError } from '@errors';
import { getLogger } from '@kernel/logger';
import { AbortError, isRetryableStatus } from '@kernel/retry';

import type { FetchPageParams, ProcurementSource, SourcePage } from '../../application/ports/ProcurementSource';
import { addDays, parseYmd } from '../../domain/dates';
import { SourceSchemaError, SourceUnavailableError } from '../../domain/errors';
import { toPncpRawRecord } from '../../domain/RawRecord';

const logger = getLogger('licitacoes:pncp');

/**
* PNCP Source Client
*
* One page of `GET /v1/contratacoes/publicacao` per call. Retries belong to
* the caller; this client reports whether a failure is worth retrying.
*/

// ============================================================================
// Type Definitions
// ============================================================================

export interface PncpClientOptions {
  /** API base URL, without the /v1 segment */
  baseUrl: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
}

const envelopeSchema = z.object({
  data: z.array(z.unknown()).nullish(),
  content: z.array(z.unknown()).nullish(),
  totalRegistros: z.number().int().nonnegative().nullish(),
  totalPaginas: z.number().int().nonnegative().nullish(),
  numeroPagina: z.number().int().nullish(),
  paginasRestantes: z.number().int().nullish(),
  empty: z.boolean().nullish(),
});

// ============================================================================
// Helpers
// ============================================================================

/**
* Page size accepted by PNCP
*/
export function clampPageSize(tamanhoPagina: number): number {
  const n = Number.isFinite(tamanhoPagina) ? Math.trunc(tamanhoPagina) : PNCP_MAX_PAGE_SIZE;
  return Math.min(PNCP_MAX_PAGE_SIZE, Math.max(PNCP_MIN_PAGE_SIZE, n));
}

function validateParams(params: FetchPageParams): void {
  parseYmd(params.dataInicial, 'dataInicial');
  parseYmd(params.dataFinal, 'dataFinal');
  if (params.dataInicial > params.dataFinal) {
    throw new ValidationError('dataInicial must not be after dataFinal', {
      dataInicial: params.dataInicial,
      dataFinal: params.dataFinal,
    });
  }
  if (addDays(params.dataInicial, PNCP_MAX_WINDOW_DAYS - 1) < params.dataFinal) {
    throw new ValidationError(`Date range must not exceed ${PNCP_MAX_WINDOW_DAYS} days`, {
      dataInicial: params.dataInicial,
      dataFinal: params.dataFinal,
    });
  }
  if (!Number.isInteger(params.pagina) || params.pagina < 1) {
    throw new ValidationError('pagina must be an integer >= 1', { pagina: params.pagina });
  }
  if (!Number.isInteger(params.codigoModalidade) || params.codigoModalidade < 1) {
    throw new ValidationError('codigoModalidade must be a positive integer', {
      codigoModalidade: params.codigoModalidade,
    });
  }
}

function isRetryableSourceStatus(status: number): boolean {
  return status >= 500 || isRetryableStatus(status, retryConfig.retryableStatuses);
}

// ============================================================================
// Client
// ============================================================================

export class PncpClient implements ProcurementSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: PncpClientOptions = { baseUrl: pncpConfig.baseUrl, timeoutMs: pncpConfig.timeoutMs }) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
  }

  buildUrl(params: FetchPageParams): string {
    const url = new URL(`${this.baseUrl}/v1/contratacoes/publicacao`);
    url.searchParams.set('dataInicial', params.dataInicial);
    url.searchParams.set('dataFinal', params.dataFinal);
    url.searchParams.set('codigoModalidadeContratacao', String(params.codigoModalidade));
    url.searchParams.set('pagina', String(params.pagina));
    url.searchParams.set('tamanhoPagina', String(clampPageSize(params.tamanhoPagina)));
    return url.toString();
  }

  /**
  * Fetch one page of publications
  * @throws ValidationError for malformed parameters
  * @throws SourceUnavailableError for network failures, timeouts and non-2xx responses
  * @throws SourceSchemaError for a body that is not the expected envelope
  * @throws AbortError when `signal` fires
  */
  async fetchPage(params: FetchPageParams, signal?: AbortSignal): Promise<SourcePage> {
    validateParams(params);
    if (signal?.aborted) {
      throw new AbortError('PNCP request aborted');
    }

    const url = this.buildUrl(params);
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let status: number;
    let body: string;
    try {
      logger.debug('Fetching PNCP page', { pagina: params.pagina, codigoModalidade: params.codigoModalidade });
      const response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
      status = response.status;
      body = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw new AbortError('PNCP request aborted');
      }
      const message = timedOut
        ? `PNCP request timed out after ${this.timeoutMs}ms`
        : `PNCP request failed: ${getErrorMessage(error)}`;
      throw new SourceUnavailableError(message, null, true, 1, { cause: toError(error) });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }

    // 204: PNCP's "nothing published in this range"
    if (status === 204) {
      return { records: [], hasNextPage: false, totalRecords: 0, totalPages: 0 };
    }

    if (status < 200 || status >= 300) {
      throw new SourceUnavailableError(
        `PNCP responded ${status}: ${body.slice(0, 200)}`,
        status,
        isRetryableSourceStatus(status)
      );
    }

    return this.parsePage(body, params.pagina);
  }

  private parsePage(body: string, pagina: number): SourcePage {
    if (body.trim() === '') {
      return { records: [], hasNextPage: false, totalRecords: 0, totalPages: 0 };
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new SourceSchemaError(`PNCP page ${pagina} is not JSON: ${body.slice(0, 100)}`, pagina);
    }

    const parsed = envelopeSchema.safeParse(json);
    if (!parsed.success) {
      throw new SourceSchemaError(
        `PNCP page ${pagina} has an unexpected envelope: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        pagina
      );
    }

    const envelope = parsed.data;
    const items = envelope.data ?? envelope.content;
    if (!items) {
      throw new SourceSchemaError(`PNCP page ${pagina} has no data array`, pagina);
    }

    const records = items.map(toPncpRawRecord);
    const currentPage = envelope.numeroPagina ?? pagina;
    const totalPages = envelope.totalPaginas ?? currentPage;
    const hasNextPage = envelope.paginasRestantes !== undefined && envelope.paginasRestantes !== null
      ? envelope.paginasRestantes > 0
      : currentPage < totalPages;

    return {
      records,
      hasNextPage: records.length > 0 && hasNextPage,
      totalRecords: envelope.totalRegistros ?? records.length,
      totalPages,
    };
  }
}
