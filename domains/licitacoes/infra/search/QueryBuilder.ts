import type { estypes } from '@elastic/elasticsearch';
import { z } from 'zod';

import { MAX_RESULT_WINDOW, searchConfig } from '@config';
import { ValidationError } from '@errors';

import type { EngineSearchRequest, RawSearchResponse } from '../../application/ports/SearchIndex';
import type { LicitacaoSummary } from '../../domain/entities/Licitacao';
import { BRASILIA_OFFSET, HAS_OFFSET } from '../../domain/dates';
import { summarySourceSchema, toSummary } from './mapping';

/**
* Query Builder
*
* Pure translation between API-level search requests and the engine's query
* DSL, in both directions. Nothing here performs I/O; engine field names stay
* on this side of the boundary.
*/

// ============================================================================
// Type Definitions
// ============================================================================

export const AGGREGATION_NAMES = [
  'modalidades',
  'ufs',
  'situacoes',
  'publicacoesPorMes',
  'valorEstimado',
] as const;

export type AggregationName = typeof AGGREGATION_NAMES[number];

export interface SearchRequest {
  q?: string | undefined;
  modalidade?: string | undefined;
  uf?: string | undefined;
  valorMin?: number | undefined;
  valorMax?: number | undefined;
  /** YYYY-MM-DD (whole Brasília day) or ISO date-time */
  dataAberturaMin?: string | undefined;
  dataAberturaMax?: string | undefined;
  page?: number | undefined;
  size?: number | undefined;
  aggregations?: readonly AggregationName[] | undefined;
}

export interface BucketCount {
  key: string;
  count: number;
}

export interface StatsSummary {
  count: number;
  sum: number;
  avg: number | null;
  min: number | null;
  max: number | null;
}

export interface SearchAggregations {
  modalidades?: BucketCount[];
  ufs?: BucketCount[];
  situacoes?: BucketCount[];
  publicacoesPorMes?: BucketCount[];
  valorEstimado?: StatsSummary;
}

export interface SearchResult {
  total: number;
  page: number;
  size: number;
  pages: number;
  items: LicitacaoSummary[];
  aggregations: SearchAggregations;
}

export interface QueryBuilderOptions {
  defaultPageSize: number;
  maxPageSize: number;
  termsSize: number;
  maxResultWindow: number;
}

/**
* Engine request plus the pagination it was built for
*/
export interface BuiltSearch {
  engine: EngineSearchRequest;
  page: number;
  size: number;
  aggregations: readonly AggregationName[];
}

const DEFAULT_OPTIONS: QueryBuilderOptions = {
  defaultPageSize: searchConfig.defaultPageSize,
  maxPageSize: searchConfig.maxPageSize,
  termsSize: searchConfig.termsAggregationSize,
  maxResultWindow: MAX_RESULT_WINDOW,
};

// ============================================================================
// Request Translation
// ============================================================================

const TEXT_FIELDS = ['objeto_compra^3', 'informacao_complementar', 'orgao_nome'];

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
* Date-only bounds cover the whole Brasília day; date-times without an offset
* are Brasília time
*/
function dateBound(value: string, edge: 'start' | 'end'): string {
  if (!DATE_ONLY.test(value)) {
    return HAS_OFFSET.test(value) ? value : `${value}${BRASILIA_OFFSET}`;
  }
  return edge === 'start'
    ? `${value}T00:00:00.000${BRASILIA_OFFSET}`
    : `${value}T23:59:59.999${BRASILIA_OFFSET}`;
}

function buildFilters(request: SearchRequest): estypes.QueryDslQueryContainer[] {
  const filters: estypes.QueryDslQueryContainer[] = [];

  const modalidade = request.modalidade?.trim();
  if (modalidade) {
    filters.push({ term: { modalidade } });
  }

  const uf = request.uf?.trim();
  if (uf) {
    filters.push({ term: { uf: uf.toUpperCase() } });
  }

  if (request.valorMin !== undefined || request.valorMax !== undefined) {
    filters.push({
      range: {
        valor_estimado: {
          ...(request.valorMin !== undefined && { gte: request.valorMin }),
          ...(request.valorMax !== undefined && { lte: request.valorMax }),
        },
      },
    });
  }

  if (request.dataAberturaMin !== undefined || request.dataAberturaMax !== undefined) {
    filters.push({
      range: {
        data_abertura_proposta: {
          ...(request.dataAberturaMin !== undefined && { gte: dateBound(request.dataAberturaMin, 'start') }),
          ...(request.dataAberturaMax !== undefined && { lte: dateBound(request.dataAberturaMax, 'end') }),
        },
      },
    });
  }

  return filters;
}

function buildAggregations(
  names: readonly AggregationName[],
  termsSize: number
): Record<string, estypes.AggregationsAggregationContainer> {
  const aggs: Record<string, estypes.AggregationsAggregationContainer> = {};
  for (const name of names) {
    switch (name) {
      case 'modalidades':
        aggs[name] = { terms: { field: 'modalidade', size: termsSize } };
        break;
      case 'ufs':
        aggs[name] = { terms: { field: 'uf', size: termsSize } };
        break;
      case 'situacoes':
        aggs[name] = { terms: { field: 'situacao', size: termsSize } };
        break;
      case 'publicacoesPorMes':
        aggs[name] = {
          date_histogram: {
            field: 'data_publicacao',
            calendar_interval: 'month',
            format: 'yyyy-MM',
            time_zone: BRASILIA_OFFSET,
            min_doc_count: 1,
          },
        };
        break;
      case 'valorEstimado':
        aggs[name] = { stats: { field: 'valor_estimado' } };
        break;
    }
  }
  return aggs;
}

/**
* Translate a search request into the engine's query DSL
* @throws ValidationError for a page that is not a positive integer
*/
export function buildSearchQuery(
  request: SearchRequest,
  options: QueryBuilderOptions = DEFAULT_OPTIONS
): BuiltSearch {
  const page = request.page ?? 1;
  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError('page must be a positive integer', { page });
  }

  const requestedSize = Math.trunc(request.size ?? options.defaultPageSize);
  const size = Math.min(Math.max(1, requestedSize), options.maxPageSize);

  const q = request.q?.trim() ?? '';
  const filters = buildFilters(request);

  const query: estypes.QueryDslQueryContainer = q
    ? {
      bool: {
        must: [{
          multi_match: {
            query: q,
            fields: TEXT_FIELDS,
            type: 'best_fields',
            operator: 'and',
            fuzziness: 'AUTO',
          },
        }],
        filter: filters,
      },
    }
    : {
      bool: {
        must: [{ match_all: {} }],
        filter: filters,
      },
    };

  const sort: estypes.SortCombinations[] = q
    ? [
      { _score: { order: 'desc' } },
      { data_abertura_proposta: { order: 'desc', missing: '_last' } },
      { internal_id: { order: 'asc' } },
    ]
    : [
      { data_abertura_proposta: { order: 'desc', missing: '_last' } },
      { internal_id: { order: 'asc' } },
    ];

  // The engine rejects from + size past the result window: trim the page at the
  // edge and ask only for the total beyond it
  const from = (page - 1) * size;
  const beyondWindow = from >= options.maxResultWindow;

  const aggregations = [...new Set(request.aggregations ?? [])];

  const engine: EngineSearchRequest = {
    query,
    sort,
    from: beyondWindow ? 0 : from,
    size: beyondWindow ? 0 : Math.min(size, options.maxResultWindow - from),
    track_total_hits: true,
  };
  if (aggregations.length > 0) {
    engine.aggs = buildAggregations(aggregations, options.termsSize);
  }

  return { engine, page, size, aggregations };
}

/**
* Aggregations over the whole index, without hits
*/
export function buildAggregationQuery(
  names: readonly AggregationName[],
  options: QueryBuilderOptions = DEFAULT_OPTIONS
): BuiltSearch {
  const aggregations = [...new Set(names)];
  return {
    engine: {
      query: { match_all: {} },
      sort: [],
      from: 0,
      size: 0,
      track_total_hits: true,
      aggs: buildAggregations(aggregations, options.termsSize),
    },
    page: 1,
    size: 0,
    aggregations,
  };
}

// ============================================================================
// Response Shaping
// ============================================================================

const bucketsSchema = z.object({
  buckets: z.array(z.object({
    key: z.union([z.string(), z.number()]),
    key_as_string: z.string().optional(),
    doc_count: z.number(),
  })),
});

const statsSchema = z.object({
  count: z.number(),
  sum: z.number().nullish(),
  avg: z.number().nullish(),
  min: z.number().nullish(),
  max: z.number().nullish(),
});

function shapeBuckets(raw: unknown): BucketCount[] {
  const parsed = bucketsSchema.safeParse(raw);
  if (!parsed.success) return [];
  return parsed.data.buckets.map(b => ({
    key: b.key_as_string ?? String(b.key),
    count: b.doc_count,
  }));
}

function shapeStats(raw: unknown): StatsSummary {
  const parsed = statsSchema.safeParse(raw);
  if (!parsed.success) {
    return { count: 0, sum: 0, avg: null, min: null, max: null };
  }
  const s = parsed.data;
  return {
    count: s.count,
    sum: s.sum ?? 0,
    avg: s.avg ?? null,
    min: s.min ?? null,
    max: s.max ?? null,
  };
}

export function shapeAggregations(
  names: readonly AggregationName[],
  raw: Record<string, unknown>
): SearchAggregations {
  const result: SearchAggregations = {};
  for (const name of names) {
    if (name === 'valorEstimado') {
      result.valorEstimado = shapeStats(raw[name]);
    } else {
      result[name] = shapeBuckets(raw[name]);
    }
  }
  return result;
}

/**
* Flatten an engine response into the API-level result
*/
export function shapeSearchResponse(raw: RawSearchResponse, built: BuiltSearch): SearchResult {
  return {
    total: raw.total,
    page: built.page,
    size: built.size,
    pages: raw.total === 0 || built.size === 0 ? 0 : Math.ceil(raw.total / built.size),
    items: raw.hits.map(hit => toSummary(summarySourceSchema.parse(hit.source))),
    aggregations: shapeAggregations(built.aggregations, raw.aggregations),
  };
}
