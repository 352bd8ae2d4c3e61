import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { errors } from '@errors/responses';

import { AGGREGATION_NAMES, type AggregationName } from '../../../domains/licitacoes/infra/search/QueryBuilder';
import type { ApiDeps } from '../http';

const dateBound = z.string().trim().regex(
  /^\d{4}-\d{2}-\d{2}(T[\d:.]+(Z|[+-]\d{2}:\d{2})?)?$/,
  'Must be YYYY-MM-DD or an ISO date-time'
);

function isAggregationName(value: string): value is AggregationName {
  return AGGREGATION_NAMES.some(name => name === value);
}

const aggsParam = z.string().transform((value, ctx) => {
  const names = value.split(',').map(s => s.trim()).filter(s => s.length > 0);
  const result: AggregationName[] = [];
  for (const name of names) {
    if (!isAggregationName(name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown aggregation "${name}". Expected one of: ${AGGREGATION_NAMES.join(', ')}`,
      });
      return z.NEVER;
    }
    result.push(name);
  }
  return result;
});

// Unknown query parameters are rejected
const SearchQuerySchema = z.object({
  q: z.string().trim().max(200).optional(),
  modalidade: z.string().trim().min(1).max(200).optional(),
  uf: z.string().trim().regex(/^[A-Za-z]{2}$/, 'Must be a two-letter UF').optional(),
  valor_min: z.coerce.number().nonnegative().optional(),
  valor_max: z.coerce.number().nonnegative().optional(),
  data_abertura_min: dateBound.optional(),
  data_abertura_max: dateBound.optional(),
  page: z.coerce.number().int().min(1).default(1),
  size: z.coerce.number().int().min(1).optional(),
  aggs: aggsParam.optional(),
}).strict().refine(
  (data) => data.valor_min === undefined || data.valor_max === undefined || data.valor_min <= data.valor_max,
  { message: 'valor_min must not exceed valor_max', path: ['valor_min'] }
);

const IdParamsSchema = z.object({
  internalId: z.coerce.number().int().positive(),
});

export async function licitacoesRoutes(app: FastifyInstance, deps: ApiDeps): Promise<void> {
  app.get('/licitacoes', async (req, reply) => {
    const parseResult = SearchQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      return errors.validationFailed(reply, parseResult.error.issues);
    }

    const query = parseResult.data;
    const result = await deps.search.search({
      q: query.q,
      modalidade: query.modalidade,
      uf: query.uf,
      valorMin: query.valor_min,
      valorMax: query.valor_max,
      dataAberturaMin: query.data_abertura_min,
      dataAberturaMax: query.data_abertura_max,
      page: query.page,
      size: query.size,
      aggregations: query.aggs,
    });

    return reply.send({ success: true, data: result });
  });

  app.get('/licitacoes/:internalId', async (req, reply) => {
    const parseResult = IdParamsSchema.safeParse(req.params);
    if (!parseResult.success) {
      return errors.validationFailed(reply, parseResult.error.issues);
    }

    const licitacao = await deps.search.getById(parseResult.data.internalId);
    return reply.send(licitacao.toJSON());
  });

  app.get('/modalidades', async (_req, reply) => {
    return reply.send(await deps.search.listModalidades());
  });

  app.get('/ufs', async (_req, reply) => {
    return reply.send(await deps.search.listUfs());
  });

  app.get('/stats', async (_req, reply) => {
    return reply.send(await deps.search.stats());
  });
}
