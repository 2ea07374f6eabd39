import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RunStore } from '../../runs/store.js';
import type { RouteOpts } from '../types.js';

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  branch: z.string().min(1).optional(),
});

export async function registerRunRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const store = new RunStore(opts.db);

  fastify.get('/v1/runs', async (req, reply) => {
    const query = ListQuerySchema.safeParse(req.query);
    if (!query.success) {
      return reply.status(400).send({ error: query.error.issues[0]?.message ?? 'invalid query' });
    }
    const { limit, offset, branch } = query.data;
    const runs = store.listRuns({ limit, offset, branch });
    return { runs, limit, offset };
  });

  fastify.get<{ Params: { id: string } }>('/v1/runs/:id', async (req, reply) => {
    const run = store.getRun(req.params.id);
    if (!run) return reply.status(404).send({ error: 'Run not found' });
    return run;
  });
}
