import { Pool, PoolClient } from 'pg';

import { getLogger } from '@kernel/logger';
import { toError } from '@errors';

import { Licitacao, type LicitacaoInput } from '../../domain/entities/Licitacao';
import { isPlainObject } from '../../domain/RawRecord';
import type { LicitacaoRepository, ReindexMode } from '../../application/ports/LicitacaoRepository';
import { translatePgError } from './pgErrors';

const logger = getLogger('licitacoes:repository');

const MAX_SCAN_LIMIT = 5000;

const COLUMNS = `internal_id, external_id, objeto_compra, informacao_complementar, orgao, orgao_cnpj,
  modalidade, codigo_modalidade, uf, municipio, valor_estimado, data_abertura_proposta,
  data_encerramento_proposta, data_publicacao, situacao, link_sistema_origem, raw_payload,
  synced_at, indexed_at`;

export interface LicitacaoRow {
  internal_id: string | number;
  external_id: string;
  objeto_compra: string;
  informacao_complementar: string | null;
  orgao: string;
  orgao_cnpj: string | null;
  modalidade: string;
  codigo_modalidade: number | null;
  uf: string | null;
  municipio: string | null;
  /** NUMERIC comes back as a string */
  valor_estimado: string | number | null;
  data_abertura_proposta: Date | null;
  data_encerramento_proposta: Date | null;
  data_publicacao: Date | null;
  situacao: string | null;
  link_sistema_origem: string | null;
  raw_payload: unknown;
  synced_at: Date;
  indexed_at: Date | null;
}

export function mapRowToLicitacao(row: LicitacaoRow): Licitacao {
  return Licitacao.reconstitute({
    internalId: Number(row.internal_id),
    externalId: row.external_id,
    objetoCompra: row.objeto_compra,
    informacaoComplementar: row.informacao_complementar,
    orgao: row.orgao,
    orgaoCnpj: row.orgao_cnpj,
    modalidade: row.modalidade,
    codigoModalidade: row.codigo_modalidade,
    uf: row.uf,
    municipio: row.municipio,
    valorEstimado: row.valor_estimado === null ? null : Number(row.valor_estimado),
    dataAberturaProposta: row.data_abertura_proposta,
    dataEncerramentoProposta: row.data_encerramento_proposta,
    dataPublicacao: row.data_publicacao,
    situacao: row.situacao,
    linkSistemaOrigem: row.link_sistema_origem,
    rawPayload: isPlainObject(row.raw_payload) ? row.raw_payload : {},
    syncedAt: row.synced_at,
    indexedAt: row.indexed_at,
  });
}

function isoOrNull(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

/**
* Repository implementation for Licitacao using PostgreSQL
*
* Upserts go through a single UNNEST statement keyed on external_id, so a
* batch either lands whole or not at all. internal_id is an identity column
* and is never touched by the update branch.
*/
export class PostgresLicitacaoRepository implements LicitacaoRepository {
  constructor(private pool: Pool) {}

  private getQueryable(client?: PoolClient): Pool | PoolClient {
    return client || this.pool;
  }

  async upsertBatch(inputs: LicitacaoInput[], client?: PoolClient): Promise<Licitacao[]> {
    if (inputs.length === 0) return [];

    const shouldManageTransaction = !client;
    const conn = client ?? await this.pool.connect();

    try {
      if (shouldManageTransaction) {
        await conn.query('BEGIN');
      }

      const { rows } = await conn.query<LicitacaoRow>(
        `INSERT INTO licitacoes (
          external_id, objeto_compra, informacao_complementar, orgao, orgao_cnpj,
          modalidade, codigo_modalidade, uf, municipio, valor_estimado,
          data_abertura_proposta, data_encerramento_proposta, data_publicacao,
          situacao, link_sistema_origem, raw_payload, synced_at
        )
        SELECT t.external_id, t.objeto_compra, t.informacao_complementar, t.orgao, t.orgao_cnpj,
          t.modalidade, t.codigo_modalidade, t.uf, t.municipio, t.valor_estimado,
          t.data_abertura_proposta, t.data_encerramento_proposta, t.data_publicacao,
          t.situacao, t.link_sistema_origem, t.raw_payload::jsonb, now()
        FROM UNNEST(
          $1::text[], $2::text[], $3::text[], $4::text[], $5::text[],
          $6::text[], $7::int[], $8::text[], $9::text[], $10::numeric[],
          $11::timestamptz[], $12::timestamptz[], $13::timestamptz[],
          $14::text[], $15::text[], $16::text[]
        ) AS t(
          external_id, objeto_compra, informacao_complementar, orgao, orgao_cnpj,
          modalidade, codigo_modalidade, uf, municipio, valor_estimado,
          data_abertura_proposta, data_encerramento_proposta, data_publicacao,
          situacao, link_sistema_origem, raw_payload
        )
        ON CONFLICT (external_id) DO UPDATE SET
          objeto_compra = EXCLUDED.objeto_compra,
          informacao_complementar = EXCLUDED.informacao_complementar,
          orgao = EXCLUDED.orgao,
          orgao_cnpj = EXCLUDED.orgao_cnpj,
          modalidade = EXCLUDED.modalidade,
          codigo_modalidade = EXCLUDED.codigo_modalidade,
          uf = EXCLUDED.uf,
          municipio = EXCLUDED.municipio,
          valor_estimado = EXCLUDED.valor_estimado,
          data_abertura_proposta = EXCLUDED.data_abertura_proposta,
          data_encerramento_proposta = EXCLUDED.data_encerramento_proposta,
          data_publicacao = EXCLUDED.data_publicacao,
          situacao = EXCLUDED.situacao,
          link_sistema_origem = EXCLUDED.link_sistema_origem,
          raw_payload = EXCLUDED.raw_payload,
          synced_at = EXCLUDED.synced_at
        RETURNING ${COLUMNS}`,
        [
          inputs.map(i => i.externalId),
          inputs.map(i => i.objetoCompra),
          inputs.map(i => i.informacaoComplementar),
          inputs.map(i => i.orgao),
          inputs.map(i => i.orgaoCnpj),
          inputs.map(i => i.modalidade),
          inputs.map(i => i.codigoModalidade),
          inputs.map(i => i.uf),
          inputs.map(i => i.municipio),
          inputs.map(i => i.valorEstimado),
          inputs.map(i => isoOrNull(i.dataAberturaProposta)),
          inputs.map(i => isoOrNull(i.dataEncerramentoProposta)),
          inputs.map(i => isoOrNull(i.dataPublicacao)),
          inputs.map(i => i.situacao),
          inputs.map(i => i.linkSistemaOrigem),
          inputs.map(i => JSON.stringify(i.rawPayload)),
        ]
      );

      if (shouldManageTransaction) {
        await conn.query('COMMIT');
      }

      // RETURNING order is not guaranteed; hand rows back in input order
      const byExternalId = new Map(rows.map(row => [row.external_id, mapRowToLicitacao(row)]));
      return inputs
        .map(i => byExternalId.get(i.externalId))
        .filter((l): l is Licitacao => l !== undefined);
    } catch (error) {
      if (shouldManageTransaction) {
        await conn.query('ROLLBACK').catch((rollbackError: unknown) => {
          logger.error('Rollback failed', toError(rollbackError), { count: inputs.length });
        });
      }
      logger.error('Failed to upsert licitacoes', toError(error), { count: inputs.length });
      throw translatePgError(error);
    } finally {
      if (shouldManageTransaction) {
        conn.release();
      }
    }
  }

  async markIndexed(internalIds: number[], at: Date, client?: PoolClient): Promise<void> {
    if (internalIds.length === 0) return;

    try {
      // synced_at is stamped by the database clock; never record indexing before it
      await this.getQueryable(client).query(
        `UPDATE licitacoes SET indexed_at = GREATEST($2::timestamptz, synced_at)
        WHERE internal_id = ANY($1::bigint[])`,
        [internalIds, at]
      );
    } catch (error) {
      logger.error('Failed to mark licitacoes as indexed', toError(error), { count: internalIds.length });
      throw translatePgError(error);
    }
  }

  async findById(internalId: number, client?: PoolClient): Promise<Licitacao | null> {
    try {
      const { rows } = await this.getQueryable(client).query<LicitacaoRow>(
        `SELECT ${COLUMNS} FROM licitacoes WHERE internal_id = $1`,
        [internalId]
      );
      const row = rows[0];
      return row ? mapRowToLicitacao(row) : null;
    } catch (error) {
      logger.error('Failed to get licitacao by id', toError(error), { internalId });
      throw translatePgError(error);
    }
  }

  async findForReindex(
    mode: ReindexMode,
    limit: number,
    afterId: number,
    client?: PoolClient
  ): Promise<Licitacao[]> {
    const safeLimit = Math.min(Math.max(1, limit), MAX_SCAN_LIMIT);
    const lagging = mode === 'lagging'
      ? 'AND (indexed_at IS NULL OR indexed_at < synced_at)'
      : '';

    try {
      const { rows } = await this.getQueryable(client).query<LicitacaoRow>(
        `SELECT ${COLUMNS} FROM licitacoes
        WHERE internal_id > $1 ${lagging}
        ORDER BY internal_id
        LIMIT $2`,
        [afterId, safeLimit]
      );
      return rows.map(mapRowToLicitacao);
    } catch (error) {
      logger.error('Failed to scan licitacoes for reindex', toError(error), { mode, afterId });
      throw translatePgError(error);
    }
  }

  async countIndexLag(client?: PoolClient): Promise<number> {
    try {
      const { rows } = await this.getQueryable(client).query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM licitacoes WHERE indexed_at IS NULL OR indexed_at < synced_at'
      );
      return Number(rows[0]?.count ?? 0);
    } catch (error) {
      logger.error('Failed to count index lag', toError(error));
      throw translatePgError(error);
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.warn('Database ping failed', { error: toError(error).message });
      return false;
    }
  }
}
