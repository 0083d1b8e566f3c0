import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import { createServer as createHttpServer } from 'node:http';
import { createServer as createHttpsServer } from 'node:https';
import { ulid } from 'ulid';
import { buildMetricsPipeline, type PipelineDeps } from './pipeline.js';
import { replyWithRequestError } from './access-log.js';
import { RequestError } from './errors.js';
import type { ServerConfig } from './config.js';
import type { TlsMaterial } from './tls.js';

export type LifecycleState = 'created' | 'listening' | 'shutting_down' | 'stopped';

export interface ServerOpts extends Omit<PipelineDeps, 'log'> {
  logger: FastifyBaseLogger;
  tls?: TlsMaterial;
  /** Reported by GET /health. */
  getState?: () => LifecycleState;
}

export async function createServer(config: ServerConfig, opts: ServerOpts): Promise<FastifyInstance> {
  const { tls } = opts;
  const startedAt = Date.now();

  const app = Fastify({
    logger: opts.logger,
    disableRequestLogging: true,
    genReqId: () => ulid(),
    serverFactory: (handler) => (tls
      ? createHttpsServer({ cert: tls.cert, key: tls.key }, handler)
      : createHttpServer(handler)),
  });

  await app.register(helmet, { global: true });

  // Echo X-Request-ID
  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  app.setErrorHandler(async (err, request, reply) => {
    if (err.statusCode && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send();
    }
    return replyWithRequestError(request, reply, new RequestError('INTERNAL', err.message, { cause: err }));
  });

  if (config.endpoint !== '/health') {
    app.get('/health', async () => ({
      status: 'ok' as const,
      state: opts.getState?.() ?? 'created',
      uptime_s: Math.round((Date.now() - startedAt) / 1000),
    }));
  }

  const pipeline = buildMetricsPipeline(config, { ...opts, log: app.log });
  app.route({
    method: 'GET',
    url: config.endpoint,
    preHandler: pipeline.preHandler,
    handler: pipeline.handler,
  });
  app.log.info({ endpoint: config.endpoint }, 'registered metrics handler');

  return app;
}
