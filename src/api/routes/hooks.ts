import type { FastifyInstance } from 'fastify';
import { parsePushWebhook, verifyWebhookSignature } from '../../pipeline/trigger.js';
import { errorMessage, isDefinitionProblem } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import type { RouteOpts } from '../types.js';

declare module 'fastify' {
  interface FastifyRequest {
    rawBody?: Buffer;
  }
}

const SIGNATURE_HEADER = 'x-hub-signature-256';
const EVENT_HEADER = 'x-github-event';

export async function registerHookRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  // Signatures cover the exact bytes sent, so keep them next to the parsed body
  fastify.addContentTypeParser('application/json', { parseAs: 'buffer' }, (req, body, done) => {
    const raw = typeof body === 'string' ? Buffer.from(body) : body;
    req.rawBody = raw;
    try {
      done(null, raw.length > 0 ? JSON.parse(raw.toString('utf8')) : {});
    } catch (err) {
      done(err instanceof Error ? Object.assign(err, { statusCode: 400 }) : new Error(String(err)), undefined);
    }
  });

  fastify.post(
    '/v1/hooks/push',
    { config: { rateLimit: { max: 60, timeWindow: '1 minute' } } },
    async (req, reply) => {
      if (opts.webhookSecret) {
        const signature = req.headers[SIGNATURE_HEADER];
        const valid = verifyWebhookSignature(
          req.rawBody ?? Buffer.alloc(0),
          typeof signature === 'string' ? signature : undefined,
          opts.webhookSecret,
        );
        if (!valid) {
          logger.warn('Rejected webhook with bad signature', { ip: req.ip });
          return reply.status(401).send({ error: 'Invalid signature' });
        }
      }

      const eventType = req.headers[EVENT_HEADER];
      if (eventType === 'ping') return reply.status(200).send({ ok: true });
      if (typeof eventType === 'string' && eventType !== 'push') {
        return reply.status(202).send({ triggered: false, reason: `ignored event: ${eventType}` });
      }

      const event = parsePushWebhook(req.body);
      if (!event) {
        return reply.status(202).send({ triggered: false, reason: 'not a branch push' });
      }

      try {
        const result = opts.dispatcher.dispatch(event);
        if (!result.triggered) return reply.status(202).send({ triggered: false });
        logger.info('Run triggered by webhook', { run_id: result.runId, branch: event.branch, sha: event.sha });
        return reply.status(202).send({ triggered: true, run_id: result.runId });
      } catch (err) {
        if (isDefinitionProblem(err)) {
          return reply.status(422).send({ error: err.message });
        }
        logger.error('Failed to dispatch webhook run', { error: errorMessage(err) });
        return reply.status(500).send({ error: 'Failed to start run' });
      }
    },
  );
}
