import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { errors } from '@errors/responses';

import type { ApiDeps } from '../http';

const ymd = z.string().regex(/^\d{8}$/, 'Must be YYYYMMDD');

const SyncBodySchema = z.object({
  dataInicial: ymd,
  dataFinal: ymd,
  codigoModalidadeContratacao: z.number().int().positive(),
  tamanhoPagina: z.number().int().positive().optional(),
}).strict();

const ReindexBodySchema = z.object({
  mode: z.enum(['lagging', 'all']).default('lagging'),
}).strict();

const RunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
}).strict();

export async function syncRoutes(app: FastifyInstance, deps: ApiDeps): Promise<void> {
  app.post('/sync', async (req, reply) => {
    const parseResult = SyncBodySchema.safeParse(req.body ?? {});
    if (!parseResult.success) {
      return errors.validationFailed(reply, parseResult.error.issues);
    }

    const body = parseResult.data;
    const outcome = await deps.sync.runSync({
      dataInicial: body.dataInicial,
      dataFinal: body.dataFinal,
      codigoModalidade: body.codigoModalidadeContratacao,
      tamanhoPagina: body.tamanhoPagina,
    });

    // The outcome is the body either way; a failed run is an upstream failure
    return reply.status(outcome.status === 'failed' ? 502 : 200).send(outcome);
  });

  app.get('/sync/runs', async (req, reply) => {
    const parseResult = RunsQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      return errors.validationFailed(reply, parseResult.error.issues);
    }

    return reply.send(await deps.runs.listRecent(parseResult.data.limit));
  });

  app.post('/reindex', async (req, reply) => {
    const parseResult = ReindexBodySchema.safeParse(req.body ?? {});
    if (!parseResult.success) {
      return errors.validationFailed(reply, parseResult.error.issues);
    }

    return reply.send(await deps.reindexer.reindex(parseResult.data.mode));
  });
}
