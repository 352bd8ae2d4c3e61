import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';

import { httpConfig } from '@config';
import { AppError, ErrorCodes } from '@errors';
import { errors as errHelpers, sendAppError, sendError } from '@errors/responses';
import { getLogger } from '@kernel/logger';

import type { LicitacaoSearchService } from '../../domains/licitacoes/application/LicitacaoSearchService';
import type { Reindexer } from '../../domains/licitacoes/application/Reindexer';
import type { SyncOrchestrator } from '../../domains/licitacoes/application/SyncOrchestrator';
import type { SyncRunRepository } from '../../domains/licitacoes/application/ports/SyncRunRepository';
import { healthRoutes } from './routes/health';
import { licitacoesRoutes } from './routes/licitacoes';
import { syncRoutes } from './routes/sync';

const logger = getLogger('http');

/**
* What the routes call; the container provides the real services
*/
export interface ApiDeps {
  search: Pick<LicitacaoSearchService, 'search' | 'getById' | 'listModalidades' | 'listUfs' | 'stats' | 'health'>;
  sync: Pick<SyncOrchestrator, 'runSync'>;
  runs: Pick<SyncRunRepository, 'listRecent'>;
  reindexer: Pick<Reindexer, 'reindex'>;
}

/**
* Build the HTTP app without listening, so tests can drive it with inject()
*/
export async function buildServer(deps: ApiDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    bodyLimit: httpConfig.bodyLimit,
    requestTimeout: httpConfig.requestTimeoutMs,
    trustProxy: true,
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.debug('Request completed', {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTimeMs: Math.round(reply.elapsedTime),
    });
  });

  app.setErrorHandler(async (error: FastifyError, _request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        logger.error('Request failed', error, { code: error.code });
      }
      return sendAppError(reply, error);
    }

    // Malformed JSON, wrong content type, oversized body
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return sendError(reply, error.statusCode, ErrorCodes.VALIDATION_ERROR, error.message);
    }

    logger.error('Unhandled request error', error);
    return errHelpers.internal(reply);
  });

  app.setNotFoundHandler(async (_request, reply) => errHelpers.notFound(reply, 'Route'));

  await app.register(async (instance) => licitacoesRoutes(instance, deps));
  await app.register(async (instance) => syncRoutes(instance, deps));
  await app.register(async (instance) => healthRoutes(instance, deps));

  return app;
}
