import type { FastifyBaseLogger, FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { RequestError, describeCause } from './errors.js';
import { logServed, replyWithRequestError } from './access-log.js';
import { createGenerator, type MetricsGenerator } from './metrics/generator.js';
import { serializeMetrics, type MetricEnvelope } from './metrics/types.js';
import { requireBasicAuthToken } from './middleware/auth.js';
import { injectRandomErrors } from './middleware/fault-injection.js';
import { mathRandom, systemClock, type Clock, type RandomSource } from './random.js';
import type { ServerConfig } from './config.js';

export interface PipelineDeps {
  random?: RandomSource;
  clock?: Clock;
  /** Replaces the random generator; tests use it to count invocations. */
  generator?: MetricsGenerator;
  serialize?: (metrics: readonly MetricEnvelope[]) => string;
  log?: FastifyBaseLogger;
}

export interface MetricsPipeline {
  /** Outermost first: fault injection, then auth. */
  preHandler: preHandlerAsyncHookHandler[];
  handler: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply>;
}

export function buildMetricsPipeline(
  config: Pick<ServerConfig, 'minCount' | 'maxCount' | 'authToken' | 'failProb'>,
  deps: PipelineDeps = {},
): MetricsPipeline {
  const random = deps.random ?? mathRandom;
  const generate = deps.generator ?? createGenerator(
    { min: config.minCount, max: config.maxCount },
    { random, clock: deps.clock ?? systemClock },
  );
  const serialize = deps.serialize ?? serializeMetrics;

  const preHandler: preHandlerAsyncHookHandler[] = [];
  if (config.failProb > 0) {
    preHandler.push(injectRandomErrors(config.failProb, random));
    deps.log?.info({ fail_prob: config.failProb }, 'enabling random fail injector for incoming requests');
  }
  if (config.authToken) {
    preHandler.push(requireBasicAuthToken(config.authToken));
    deps.log?.info('enabling authentication for incoming requests');
  }

  async function handler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
    const metrics = generate();
    let body: string;
    try {
      body = serialize(metrics);
    } catch (err) {
      return replyWithRequestError(request, reply, new RequestError('SERIALIZATION', describeCause(err), { cause: err }));
    }
    logServed(request, metrics.length);
    return reply.header('Content-Type', 'application/json; charset=utf-8').send(body);
  }

  return { preHandler, handler };
}
