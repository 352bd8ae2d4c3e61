/**
 * Test Mocks: Search Index
 *
 * In-memory stand-in for Elasticsearch. Evaluates the subset of the query DSL
 * the query builder emits: bool must/filter, match_all, multi_match (token
 * AND-matching with ASCII folding), term, range, field sorts, from/size, and
 * terms / date_histogram / stats aggregations.
 */

import type {
  EngineSearchRequest,
  RawSearchResponse,
  SearchHealth,
  SearchIndex,
} from '@domain/licitacoes/application/ports/SearchIndex';
import type { Licitacao } from '@domain/licitacoes/domain/entities/Licitacao';
import { IndexWriteFailureError, SearchUnavailableError, type IndexWriteItemFailure } from '@domain/licitacoes/domain/errors';
import { isPlainObject } from '@domain/licitacoes/domain/RawRecord';
import { toIndexDocument, type LicitacaoDocument } from '@domain/licitacoes/infra/search/mapping';

type Doc = Record<string, unknown>;

interface Evaluation {
  matches: boolean;
  score: number;
}

const BRASILIA_OFFSET_MS = 3 * 60 * 60 * 1000;

function tokenize(text: string): string[] {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(token => token.length > 0);
}

function asNumber(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/** Single `{ field: body }` entry of a leaf query or sort clause */
function singleEntry(value: unknown): [string, unknown] | null {
  if (!isPlainObject(value)) return null;
  const entries = Object.entries(value);
  return entries.length === 1 && entries[0] ? entries[0] : null;
}

function asClauses(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

// ============================================================================
// Query evaluation
// ============================================================================

function evaluate(query: unknown, doc: Doc): Evaluation {
  if (!isPlainObject(query)) {
    throw new Error(`Unsupported query: ${JSON.stringify(query)}`);
  }

  if ('match_all' in query) {
    return { matches: true, score: 1 };
  }

  if (isPlainObject(query['bool'])) {
    const bool = query['bool'];
    let score = 0;
    for (const clause of asClauses(bool['must'])) {
      const result = evaluate(clause, doc);
      if (!result.matches) return { matches: false, score: 0 };
      score += result.score;
    }
    for (const clause of asClauses(bool['filter'])) {
      if (!evaluate(clause, doc).matches) return { matches: false, score: 0 };
    }
    return { matches: true, score };
  }

  if (isPlainObject(query['multi_match'])) {
    return evaluateMultiMatch(query['multi_match'], doc);
  }

  const term = singleEntry(query['term']);
  if (term) {
    const [field, expected] = term;
    const value = isPlainObject(expected) ? expected['value'] : expected;
    return { matches: doc[field] === value, score: 0 };
  }

  const range = singleEntry(query['range']);
  if (range) {
    const [field, bounds] = range;
    return { matches: isPlainObject(bounds) && inRange(doc[field], bounds), score: 0 };
  }

  throw new Error(`Unsupported query: ${JSON.stringify(query)}`);
}

function evaluateMultiMatch(body: Record<string, unknown>, doc: Doc): Evaluation {
  const queryTokens = tokenize(String(body['query'] ?? ''));
  const fields = Array.isArray(body['fields']) ? body['fields'] : [];
  let best = 0;

  for (const entry of fields) {
    const [field = '', boostText] = String(entry).split('^');
    const boost = boostText ? Number(boostText) : 1;
    const value = doc[field];
    if (typeof value !== 'string') continue;
    const fieldTokens = new Set(tokenize(value));
    if (queryTokens.length > 0 && queryTokens.every(token => fieldTokens.has(token))) {
      best = Math.max(best, boost * queryTokens.length);
    }
  }

  return { matches: best > 0, score: best };
}

function inRange(raw: unknown, bounds: Record<string, unknown>): boolean {
  const value = asNumber(raw);
  if (value === null) return false;
  const gte = asNumber(bounds['gte']);
  const lte = asNumber(bounds['lte']);
  if (bounds['gte'] !== undefined && (gte === null || value < gte)) return false;
  if (bounds['lte'] !== undefined && (lte === null || value > lte)) return false;
  return true;
}

// ============================================================================
// Sorting
// ============================================================================

interface Scored {
  doc: Doc;
  score: number;
}

function compareBy(sort: unknown[]): (a: Scored, b: Scored) => number {
  return (a, b) => {
    for (const clause of sort) {
      const entry = singleEntry(clause);
      if (!entry) continue;
      const [field, options] = entry;
      const desc = isPlainObject(options) && options['order'] === 'desc';
      const left = field === '_score' ? a.score : a.doc[field];
      const right = field === '_score' ? b.score : b.doc[field];

      // Missing values sort last in either direction
      const leftMissing = left === null || left === undefined;
      const rightMissing = right === null || right === undefined;
      if (leftMissing || rightMissing) {
        if (leftMissing && rightMissing) continue;
        return leftMissing ? 1 : -1;
      }

      const l = asNumber(left);
      const r = asNumber(right);
      let ascending: number;
      if (l !== null && r !== null) {
        if (l === r) continue;
        ascending = l < r ? -1 : 1;
      } else {
        const ls = String(left);
        const rs = String(right);
        if (ls === rs) continue;
        ascending = ls < rs ? -1 : 1;
      }
      return desc ? -ascending : ascending;
    }
    return 0;
  };
}

// ============================================================================
// Aggregations
// ============================================================================

function aggregate(body: unknown, docs: Doc[]): unknown {
  if (!isPlainObject(body)) return {};

  if (isPlainObject(body['terms'])) {
    const field = String(body['terms']['field']);
    const size = typeof body['terms']['size'] === 'number' ? body['terms']['size'] : 10;
    const counts = new Map<string, number>();
    for (const doc of docs) {
      const value = doc[field];
      if (value === null || value === undefined) continue;
      counts.set(String(value), (counts.get(String(value)) ?? 0) + 1);
    }
    const buckets = [...counts.entries()]
      .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : 1))
      .slice(0, size)
      .map(([key, docCount]) => ({ key, doc_count: docCount }));
    return { buckets };
  }

  if (isPlainObject(body['date_histogram'])) {
    const field = String(body['date_histogram']['field']);
    const months = new Map<string, { key: number; doc_count: number }>();
    for (const doc of docs) {
      const ms = asNumber(doc[field]);
      if (ms === null) continue;
      const local = new Date(ms - BRASILIA_OFFSET_MS);
      const year = local.getUTCFullYear();
      const month = local.getUTCMonth();
      const label = `${year}-${String(month + 1).padStart(2, '0')}`;
      const bucket = months.get(label) ?? { key: Date.UTC(year, month, 1) + BRASILIA_OFFSET_MS, doc_count: 0 };
      bucket.doc_count++;
      months.set(label, bucket);
    }
    const buckets = [...months.entries()]
      .sort((a, b) => a[1].key - b[1].key)
      .map(([label, bucket]) => ({ key: bucket.key, key_as_string: label, doc_count: bucket.doc_count }));
    return { buckets };
  }

  if (isPlainObject(body['stats'])) {
    const field = String(body['stats']['field']);
    const values = docs
      .map(doc => doc[field])
      .filter((value): value is number => typeof value === 'number');
    const sum = values.reduce((total, value) => total + value, 0);
    return values.length === 0
      ? { count: 0, sum: 0, avg: null, min: null, max: null }
      : {
        count: values.length,
        sum,
        avg: sum / values.length,
        min: Math.min(...values),
        max: Math.max(...values),
      };
  }

  throw new Error(`Unsupported aggregation: ${JSON.stringify(body)}`);
}

// ============================================================================
// Index
// ============================================================================

export class InMemorySearchIndex implements SearchIndex {
  private readonly docs = new Map<number, LicitacaoDocument>();
  private readonly pendingFailures = new Map<number, number>();
  readonly batches: number[][] = [];
  readonly requests: EngineSearchRequest[] = [];
  createCount = 0;
  reachable = true;

  /** The next `times` index attempts of each id fail */
  failIds(internalIds: number[], times = 1): this {
    for (const id of internalIds) {
      this.pendingFailures.set(id, times);
    }
    return this;
  }

  async createIndex(): Promise<void> {
    if (!this.reachable) throw new SearchUnavailableError();
    this.createCount++;
  }

  async indexBatch(docs: Licitacao[]): Promise<void> {
    if (docs.length === 0) return;
    this.batches.push(docs.map(d => d.internalId));

    const failures: IndexWriteItemFailure[] = [];
    for (const doc of docs) {
      const remaining = this.pendingFailures.get(doc.internalId) ?? 0;
      if (!this.reachable || remaining > 0) {
        if (remaining > 0) this.pendingFailures.set(doc.internalId, remaining - 1);
        failures.push({ internalId: doc.internalId, reason: 'es_rejected_execution_exception' });
        continue;
      }
      this.docs.set(doc.internalId, toIndexDocument(doc));
    }

    if (failures.length > 0) {
      throw new IndexWriteFailureError(failures);
    }
  }

  async indexDocument(doc: Licitacao): Promise<void> {
    await this.indexBatch([doc]);
  }

  async deleteDocument(internalId: number): Promise<void> {
    this.docs.delete(internalId);
  }

  async search(request: EngineSearchRequest): Promise<RawSearchResponse> {
    if (!this.reachable) throw new SearchUnavailableError();
    this.requests.push(request);

    const scored: Scored[] = [];
    for (const document of this.docs.values()) {
      const doc: Doc = { ...document };
      const result = evaluate(request.query, doc);
      if (result.matches) scored.push({ doc, score: result.score });
    }
    scored.sort(compareBy(request.sort));

    const aggregations: Record<string, unknown> = {};
    for (const [name, body] of Object.entries(request.aggs ?? {})) {
      aggregations[name] = aggregate(body, scored.map(s => s.doc));
    }

    return {
      total: scored.length,
      hits: scored.slice(request.from, request.from + request.size).map(s => ({
        id: String(s.doc['internal_id']),
        score: s.score,
        source: s.doc,
      })),
      aggregations,
    };
  }

  async healthCheck(): Promise<SearchHealth> {
    return this.reachable
      ? { reachable: true, clusterStatus: 'green' }
      : { reachable: false, clusterStatus: 'unknown' };
  }

  /** Indexed document by internalId */
  get(internalId: number): LicitacaoDocument | undefined {
    return this.docs.get(internalId);
  }

  get size(): number {
    return this.docs.size;
  }
}
