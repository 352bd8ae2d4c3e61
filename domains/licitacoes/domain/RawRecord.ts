/**
* A record as received from a procurement source, before normalization.
*
* Fields are typed `unknown` on purpose: nothing about them has been checked
* yet. `payload` keeps the record exactly as it arrived and is stored
* alongside the normalized entity.
*/
export interface PncpRawRecord {
  readonly source: 'pncp';
  readonly numeroControlePNCP?: unknown;
  readonly objetoCompra?: unknown;
  readonly informacaoComplementar?: unknown;
  readonly modalidadeId?: unknown;
  readonly modalidadeNome?: unknown;
  readonly orgaoEntidade?: unknown;
  readonly unidadeOrgao?: unknown;
  readonly valorTotalEstimado?: unknown;
  readonly dataAberturaProposta?: unknown;
  readonly dataEncerramentoProposta?: unknown;
  readonly dataPublicacaoPncp?: unknown;
  readonly situacaoCompraNome?: unknown;
  readonly linkSistemaOrigem?: unknown;
  readonly payload: Record<string, unknown>;
}

export type RawRecord = PncpRawRecord;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
* Wrap one element of a PNCP `data` array.
* Elements that are not objects yield a record with no fields.
*/
export function toPncpRawRecord(value: unknown): PncpRawRecord {
  if (!isPlainObject(value)) {
    return { source: 'pncp', payload: {} };
  }
  return {
    source: 'pncp',
    numeroControlePNCP: value['numeroControlePNCP'],
    objetoCompra: value['objetoCompra'],
    informacaoComplementar: value['informacaoComplementar'],
    modalidadeId: value['modalidadeId'],
    modalidadeNome: value['modalidadeNome'],
    orgaoEntidade: value['orgaoEntidade'],
    unidadeOrgao: value['unidadeOrgao'],
    valorTotalEstimado: value['valorTotalEstimado'],
    dataAberturaProposta: value['dataAberturaProposta'],
    dataEncerramentoProposta: value['dataEncerramentoProposta'],
    dataPublicacaoPncp: value['dataPublicacaoPncp'],
    situacaoCompraNome: value['situacaoCompraNome'],
    linkSistemaOrigem: value['linkSistemaOrigem'],
    payload: value,
  };
}
