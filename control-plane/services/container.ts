import { Client } from '@elastic/elasticsearch';
import { Pool } from 'pg';

import { pncpConfig, searchConfig } from '@config';
import { getLogger } from '@kernel/logger';

import { LicitacaoSearchService } from '../../domains/licitacoes/application/LicitacaoSearchService';
import { Reindexer } from '../../domains/licitacoes/application/Reindexer';
import { SyncOrchestrator } from '../../domains/licitacoes/application/SyncOrchestrator';
import { SyncScheduler } from '../../domains/licitacoes/application/SyncScheduler';
import { PncpClient } from '../../domains/licitacoes/infra/pncp/PncpClient';
import { PostgresLicitacaoRepository } from '../../domains/licitacoes/infra/persistence/PostgresLicitacaoRepository';
import { PostgresSyncRunRepository } from '../../domains/licitacoes/infra/persistence/PostgresSyncRunRepository';
import { PostgresSyncWatermarkRepository } from '../../domains/licitacoes/infra/persistence/PostgresSyncWatermarkRepository';
import { ElasticsearchIndexService } from '../../domains/licitacoes/infra/search/ElasticsearchIndexService';

const logger = getLogger('container');

export interface ContainerConfig {
  dbPool: Pool;
  /** Defaults to a client built from searchConfig */
  esClient?: Client;
  modalidades: readonly number[];
  lookbackDays: number;
}

/**
* Build an Elasticsearch client from searchConfig
*/
export function createSearchClient(): Client {
  const auth = searchConfig.username && searchConfig.password
    ? { username: searchConfig.username, password: searchConfig.password }
    : undefined;

  return new Client({
    node: searchConfig.host,
    requestTimeout: searchConfig.requestTimeoutMs,
    ...(auth ? { auth } : {}),
  });
}

/**
* Dependency Injection Container
* Wires adapters to application services; every service is a lazy singleton
*/
export class Container {
  private _esClient: Client | undefined;
  private _licitacoes: PostgresLicitacaoRepository | undefined;
  private _watermarks: PostgresSyncWatermarkRepository | undefined;
  private _runs: PostgresSyncRunRepository | undefined;
  private _index: ElasticsearchIndexService | undefined;
  private _source: PncpClient | undefined;
  private _orchestrator: SyncOrchestrator | undefined;
  private _scheduler: SyncScheduler | undefined;
  private _searchService: LicitacaoSearchService | undefined;
  private _reindexer: Reindexer | undefined;

  constructor(private readonly config: ContainerConfig) {}

  get db(): Pool {
    return this.config.dbPool;
  }

  get esClient(): Client {
    return this._esClient ??= this.config.esClient ?? createSearchClient();
  }

  // ============================================================================
  // Adapters
  // ============================================================================

  get licitacoes(): PostgresLicitacaoRepository {
    return this._licitacoes ??= new PostgresLicitacaoRepository(this.db);
  }

  get watermarks(): PostgresSyncWatermarkRepository {
    return this._watermarks ??= new PostgresSyncWatermarkRepository(this.db);
  }

  get runs(): PostgresSyncRunRepository {
    return this._runs ??= new PostgresSyncRunRepository(this.db);
  }

  get index(): ElasticsearchIndexService {
    return this._index ??= new ElasticsearchIndexService(this.esClient, { index: searchConfig.index });
  }

  get source(): PncpClient {
    return this._source ??= new PncpClient({ baseUrl: pncpConfig.baseUrl, timeoutMs: pncpConfig.timeoutMs });
  }

  // ============================================================================
  // Application services
  // ============================================================================

  get orchestrator(): SyncOrchestrator {
    return this._orchestrator ??= new SyncOrchestrator({
      source: this.source,
      licitacoes: this.licitacoes,
      watermarks: this.watermarks,
      runs: this.runs,
      index: this.index,
    });
  }

  get scheduler(): SyncScheduler {
    return this._scheduler ??= new SyncScheduler(this.orchestrator, {
      modalidades: this.config.modalidades,
      lookbackDays: this.config.lookbackDays,
    });
  }

  get searchService(): LicitacaoSearchService {
    return this._searchService ??= new LicitacaoSearchService(this.index, this.licitacoes);
  }

  get reindexer(): Reindexer {
    return this._reindexer ??= new Reindexer(this.licitacoes, this.index);
  }

  /**
  * Release the search client; the pool is owned by the caller
  */
  async close(): Promise<void> {
    if (this._scheduler) {
      await this._scheduler.stop();
    }
    if (this._esClient) {
      await this._esClient.close();
      logger.info('Search client closed');
    }
  }
}

export function initializeContainer(config: ContainerConfig): Container {
  return new Container(config);
}
