import { z } from 'zod';

import { BRASILIA_OFFSET, HAS_OFFSET } from './dates';
import type { LicitacaoInput } from './entities/Licitacao';
import { NormalizationError } from './errors';
import { isPlainObject, type RawRecord } from './RawRecord';

/**
* Record Normalizer
*
* Maps a raw PNCP record onto the canonical LicitacaoInput. Pure: the same
* record always yields the same result, and nothing here performs I/O.
*/

// ============================================================================
// Type Definitions
// ============================================================================

export type NormalizeResult =
  | { ok: true; value: LicitacaoInput }
  | { ok: false; error: NormalizationError };

// ============================================================================
// Coercions
// ============================================================================

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const PLAIN_DECIMAL = /^-?\d+(\.\d+)?$/;
const BR_DECIMAL = /^-?\d{1,3}(\.\d{3})*(,\d+)?$|^-?\d+(,\d+)?$/;
const NUL = /\u0000/g;

// valor_estimado is NUMERIC(18, 2)
export const MAX_VALOR_ESTIMADO = 1e16;

/**
* Parse "1234.56" or the pt-BR "1.234,56"; a comma marks the pt-BR form
*/
export function parseDecimal(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed.includes(',')) {
    if (!BR_DECIMAL.test(trimmed)) return null;
    return Number(trimmed.replace(/\./g, '').replace(',', '.'));
  }
  if (!PLAIN_DECIMAL.test(trimmed)) return null;
  return Number(trimmed);
}

/**
* Parse an ISO date-time, assuming Brasília time when no offset is given
*/
export function parseSourceDateTime(value: string): Date | null {
  const trimmed = value.trim();
  let iso = trimmed;
  if (DATE_ONLY.test(trimmed)) {
    iso = `${trimmed}T00:00:00${BRASILIA_OFFSET}`;
  } else if (!HAS_OFFSET.test(trimmed)) {
    iso = `${trimmed}${BRASILIA_OFFSET}`;
  }
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? null : date;
}

const requiredText = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .trim()
  .min(1, 'must not be blank');

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform(v => {
    if (v === null || v === undefined) return null;
    const text = String(v).trim();
    return text === '' ? null : text;
  });

const optionalAmount = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v, ctx) => {
    if (v === null || v === undefined) return null;
    let amount: number;
    if (typeof v === 'number') {
      if (!Number.isFinite(v)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a finite number' });
        return z.NEVER;
      }
      amount = v;
    } else {
      if (v.trim() === '') return null;
      const parsed = parseDecimal(v);
      if (parsed === null || !Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is not a decimal number' });
        return z.NEVER;
      }
      amount = parsed;
    }
    if (amount < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must not be negative' });
      return z.NEVER;
    }
    if (amount >= MAX_VALOR_ESTIMADO) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is too large to store' });
      return z.NEVER;
    }
    return amount;
  });

const optionalDateTime = z
  .string({ invalid_type_error: 'must be an ISO date-time string' })
  .nullish()
  .transform((v, ctx) => {
    if (v === null || v === undefined || v.trim() === '') return null;
    const parsed = parseSourceDateTime(v);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is not a valid date-time' });
      return z.NEVER;
    }
    return parsed;
  });

const optionalInteger = z
  .union([z.number().int(), z.string().trim().regex(/^\d+$/)])
  .nullish()
  .transform(v => (v === null || v === undefined ? null : Number(v)));

// ============================================================================
// Record Schema
// ============================================================================

const pncpRecordSchema = z.object({
  numeroControlePNCP: requiredText,
  objetoCompra: requiredText,
  informacaoComplementar: optionalText,
  modalidadeId: optionalInteger,
  modalidadeNome: requiredText,
  orgaoEntidade: z.object(
    {
      razaoSocial: requiredText,
      cnpj: optionalText,
    },
    { required_error: 'is required', invalid_type_error: 'must be an object' }
  ),
  unidadeOrgao: z
    .object({
      ufSigla: optionalText,
      municipioNome: optionalText,
    }, { invalid_type_error: 'must be an object' })
    .nullish(),
  valorTotalEstimado: optionalAmount,
  dataAberturaProposta: optionalDateTime,
  dataEncerramentoProposta: optionalDateTime,
  dataPublicacaoPncp: optionalDateTime,
  situacaoCompraNome: optionalText,
  linkSistemaOrigem: optionalText,
});

// ============================================================================
// Normalization
// ============================================================================

function valueAt(payload: Record<string, unknown>, path: (string | number)[]): unknown {
  let current: unknown = payload;
  for (const key of path) {
    if (!isPlainObject(current)) return undefined;
    current = current[String(key)];
  }
  return current;
}

interface NulHit {
  path: string[];
  text: string;
}

/**
* First string or key holding a NUL character, which PostgreSQL text and jsonb reject
*/
function findNul(value: unknown, path: string[] = []): NulHit | null {
  if (typeof value === 'string') {
    return value.includes('\u0000') ? { path, text: value } : null;
  }
  if (Array.isArray(value)) {
    for (const [i, item] of value.entries()) {
      const hit = findNul(item, [...path, String(i)]);
      if (hit) return hit;
    }
    return null;
  }
  if (isPlainObject(value)) {
    for (const [key, item] of Object.entries(value)) {
      if (key.includes('\u0000')) return { path: [...path, key], text: key };
      const hit = findNul(item, [...path, key]);
      if (hit) return hit;
    }
  }
  return null;
}

function stripNul(text: string): string {
  return text.replace(NUL, '');
}

/**
* External id of a raw record, when it has a usable one
*/
export function rawExternalId(raw: RawRecord): string | null {
  const id = raw.numeroControlePNCP;
  if (typeof id !== 'string') return null;
  const trimmed = id.trim();
  return trimmed === '' ? null : trimmed;
}

/**
* Normalize a raw record
* @returns The canonical fields, or the first offending field with its raw value
*/
export function normalize(raw: RawRecord): NormalizeResult {
  const nul = findNul(raw.payload);
  if (nul) {
    const externalId = rawExternalId(raw);
    return {
      ok: false,
      error: new NormalizationError(
        stripNul(nul.path.join('.')),
        stripNul(nul.text),
        'contains a NUL character',
        externalId === null ? null : stripNul(externalId)
      ),
    };
  }

  const result = pncpRecordSchema.safeParse(raw);

  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path ?? [];
    const field = path.length > 0 ? path.join('.') : '(record)';
    return {
      ok: false,
      error: new NormalizationError(
        field,
        valueAt(raw.payload, path),
        issue?.message ?? 'is invalid',
        rawExternalId(raw)
      ),
    };
  }

  const r = result.data;
  return {
    ok: true,
    value: {
      externalId: r.numeroControlePNCP,
      objetoCompra: r.objetoCompra,
      informacaoComplementar: r.informacaoComplementar,
      orgao: r.orgaoEntidade.razaoSocial,
      orgaoCnpj: r.orgaoEntidade.cnpj,
      modalidade: r.modalidadeNome,
      codigoModalidade: r.modalidadeId,
      uf: r.unidadeOrgao?.ufSigla?.toUpperCase() ?? null,
      municipio: r.unidadeOrgao?.municipioNome ?? null,
      valorEstimado: r.valorTotalEstimado,
      dataAberturaProposta: r.dataAberturaProposta,
      dataEncerramentoProposta: r.dataEncerramentoProposta,
      dataPublicacao: r.dataPublicacaoPncp,
      situacao: r.situacaoCompraNome,
      linkSistemaOrigem: r.linkSistemaOrigem,
      rawPayload: raw.payload,
    },
  };
}
