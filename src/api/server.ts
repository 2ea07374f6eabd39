import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import { resolve } from 'node:path';
import { getWorkspacePaths } from '../workspace/paths.js';
import { openDb } from '../workspace/db.js';
import { readWorkspaceConfig } from '../workspace/config.js';
import { loadPipelineDefinition } from '../pipeline/loader.js';
import { createEngineServices } from '../runtime/services.js';
import { RunStore } from '../runs/store.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { BackgroundRunDispatcher } from './dispatcher.js';
import { registerHookRoutes } from './routes/hooks.js';
import { registerRunRoutes } from './routes/runs.js';
import type { RouteOpts } from './types.js';

const VERSION = '0.1.0';

export interface ServerOptions {
  host?: string;
  port?: number;
  cwd?: string;
}

/**
 * The fastify app with every route registered. Runs triggered by webhooks are
 * drained when the app closes.
 */
export async function buildApp(routeOpts: RouteOpts): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
    trustProxy: false,
  });

  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 minute',
  });

  fastify.addHook('onSend', async (_req, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
  });

  fastify.addHook('onClose', async () => {
    await routeOpts.dispatcher.drain();
  });

  fastify.get('/v1/health', async () => ({ status: 'ok', version: VERSION }));

  await registerHookRoutes(fastify, routeOpts);
  await registerRunRoutes(fastify, routeOpts);

  return fastify;
}

export async function createServer(opts: ServerOptions = {}) {
  const host = opts.host ?? process.env['PIPEWRIGHT_API_HOST'] ?? '127.0.0.1';
  const port = opts.port ?? parseInt(process.env['PIPEWRIGHT_API_PORT'] ?? '7800', 10);

  const isLoopback = host === '127.0.0.1' || host === 'localhost' || host === '::1';
  const webhookSecret = process.env['PIPEWRIGHT_WEBHOOK_SECRET'] || undefined;
  if (!isLoopback && !webhookSecret) {
    logger.warn('Non-loopback bind without PIPEWRIGHT_WEBHOOK_SECRET: anyone who can reach it can trigger runs.', { host });
  }

  const paths = getWorkspacePaths(opts.cwd);
  const config = readWorkspaceConfig(paths.config);
  const db = openDb(paths.stateDb);
  const pipelinePath = resolve(paths.projectRoot, config.pipeline_file);

  const dispatcher = new BackgroundRunDispatcher({
    loadDefinition: () => loadPipelineDefinition(pipelinePath),
    services: createEngineServices({ paths, config }),
    store: new RunStore(db),
    maxParallel: config.concurrency.max_parallel,
  });

  const fastify = await buildApp({ db, dispatcher, webhookSecret });
  return { fastify, host, port };
}

export async function startServer(opts: ServerOptions = {}): Promise<void> {
  const { fastify, host, port } = await createServer(opts);

  try {
    await fastify.listen({ host, port });
    logger.info('pipewright API server listening', { host, port, url: `http://${host}:${port}/v1` });
  } catch (err) {
    logger.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  }
}
