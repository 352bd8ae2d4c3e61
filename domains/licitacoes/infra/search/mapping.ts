import type { estypes } from '@elastic/elasticsearch';
import { z } from 'zod';

import type { Licitacao, LicitacaoSummary } from '../../domain/entities/Licitacao';

/**
* Index layout for Licitação documents.
*
* Free-text fields go through a Portuguese analyzer that folds accents, so
* "licitacao" matches "licitação". Filter and aggregation fields are keywords.
*/

export const PORTUGUESE_ANALYZER = 'portugues_folded';

export const INDEX_SETTINGS: estypes.IndicesIndexSettings = {
  analysis: {
    analyzer: {
      [PORTUGUESE_ANALYZER]: {
        type: 'custom',
        tokenizer: 'standard',
        filter: ['lowercase', 'asciifolding', 'portuguese_stop', 'portuguese_light_stemmer'],
      },
    },
    filter: {
      portuguese_stop: { type: 'stop', stopwords: '_portuguese_' },
      portuguese_light_stemmer: { type: 'stemmer', language: 'light_portuguese' },
    },
  },
};

const analyzedText = (withKeyword: boolean): estypes.MappingProperty => ({
  type: 'text',
  analyzer: PORTUGUESE_ANALYZER,
  ...(withKeyword && { fields: { keyword: { type: 'keyword', ignore_above: 256 } } }),
});

export const INDEX_MAPPINGS: estypes.MappingTypeMapping = {
  dynamic: 'strict',
  properties: {
    internal_id: { type: 'long' },
    external_id: { type: 'keyword' },
    objeto_compra: analyzedText(false),
    informacao_complementar: analyzedText(false),
    orgao_nome: analyzedText(true),
    orgao_cnpj: { type: 'keyword' },
    modalidade: { type: 'keyword' },
    codigo_modalidade: { type: 'long' },
    uf: { type: 'keyword' },
    municipio: { type: 'keyword' },
    valor_estimado: { type: 'scaled_float', scaling_factor: 100 },
    data_abertura_proposta: { type: 'date' },
    data_encerramento_proposta: { type: 'date' },
    data_publicacao: { type: 'date' },
    situacao: { type: 'keyword' },
    link_sistema_origem: { type: 'keyword', index: false },
    synced_at: { type: 'date' },
  },
};

// ============================================================================
// Documents
// ============================================================================

export interface LicitacaoDocument {
  internal_id: number;
  external_id: string;
  objeto_compra: string;
  informacao_complementar: string | null;
  orgao_nome: string;
  orgao_cnpj: string | null;
  modalidade: string;
  codigo_modalidade: number | null;
  uf: string | null;
  municipio: string | null;
  valor_estimado: number | null;
  data_abertura_proposta: string | null;
  data_encerramento_proposta: string | null;
  data_publicacao: string | null;
  situacao: string | null;
  link_sistema_origem: string | null;
  synced_at: string;
}

/**
* Project an entity onto its search document; rawPayload is never indexed
*/
export function toIndexDocument(l: Licitacao): LicitacaoDocument {
  return {
    internal_id: l.internalId,
    external_id: l.externalId,
    objeto_compra: l.objetoCompra,
    informacao_complementar: l.informacaoComplementar,
    orgao_nome: l.orgao,
    orgao_cnpj: l.orgaoCnpj,
    modalidade: l.modalidade,
    codigo_modalidade: l.codigoModalidade,
    uf: l.uf,
    municipio: l.municipio,
    valor_estimado: l.valorEstimado,
    data_abertura_proposta: l.dataAberturaProposta?.toISOString() ?? null,
    data_encerramento_proposta: l.dataEncerramentoProposta?.toISOString() ?? null,
    data_publicacao: l.dataPublicacao?.toISOString() ?? null,
    situacao: l.situacao,
    link_sistema_origem: l.linkSistemaOrigem,
    synced_at: l.syncedAt.toISOString(),
  };
}

const nullableString = z.string().nullish().transform(v => v ?? null);
const nullableNumber = z.number().nullish().transform(v => v ?? null);

/**
* Schema of the `_source` fields read back into summaries
*/
export const summarySourceSchema = z.object({
  internal_id: z.number().int(),
  external_id: z.string(),
  objeto_compra: z.string(),
  orgao_nome: z.string(),
  modalidade: z.string(),
  uf: nullableString,
  municipio: nullableString,
  valor_estimado: nullableNumber,
  data_abertura_proposta: nullableString,
  data_publicacao: nullableString,
  situacao: nullableString,
});

export function toSummary(source: z.infer<typeof summarySourceSchema>): LicitacaoSummary {
  return {
    id: source.internal_id,
    externalId: source.external_id,
    objetoCompra: source.objeto_compra,
    orgao: source.orgao_nome,
    modalidade: source.modalidade,
    uf: source.uf,
    municipio: source.municipio,
    valorEstimado: source.valor_estimado,
    dataAberturaProposta: source.data_abertura_proposta,
    dataPublicacao: source.data_publicacao,
    situacao: source.situacao,
  };
}
