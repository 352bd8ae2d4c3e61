import type { PoolClient } from 'pg';

import type { Licitacao, LicitacaoInput } from '../../domain/entities/Licitacao';

export type ReindexMode = 'lagging' | 'all';

/**
* Repository interface for the system of record.
*
* Upserts are keyed by `externalId`: an existing row is updated in place and
* keeps its `internalId`. All methods accept an optional client for
* transaction participation.
*/
export interface LicitacaoRepository {
  /**
  * Insert or update a batch, returning the stored rows with their internalIds
  *
  * @param inputs - Records with distinct externalIds
  * @throws {StoreConflictError} On a serialization failure or deadlock; safe to retry
  */
  upsertBatch(inputs: LicitacaoInput[], client?: PoolClient): Promise<Licitacao[]>;

  /**
  * Set indexed_at for the given internalIds
  */
  markIndexed(internalIds: number[], at: Date, client?: PoolClient): Promise<void>;

  findById(internalId: number, client?: PoolClient): Promise<Licitacao | null>;

  /**
  * Keyset-paginated scan for the reindexer, ordered by internalId
  *
  * @param afterId - Return rows with internalId greater than this
  */
  findForReindex(mode: ReindexMode, limit: number, afterId: number, client?: PoolClient): Promise<Licitacao[]>;

  /**
  * Number of rows whose latest upsert has not been indexed
  */
  countIndexLag(client?: PoolClient): Promise<number>;

  /**
  * Cheap reachability probe
  */
  ping(): Promise<boolean>;
}
