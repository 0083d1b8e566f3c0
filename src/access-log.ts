import type { FastifyReply, FastifyRequest } from 'fastify';
import { RequestError } from './errors.js';

export function requestPath(req: FastifyRequest): string {
  try { return new URL(req.url, 'http://local').pathname; }
  catch { return req.url.split('?')[0]; }
}

/** One record per served metrics request. */
export function logServed(req: FastifyRequest, numMetrics: number): void {
  const path = requestPath(req);
  req.log.info({ method: req.method, path, num_metrics: numMetrics }, `${req.method} ${path}`);
}

export function replyWithRequestError(req: FastifyRequest, reply: FastifyReply, err: RequestError): FastifyReply {
  const path = requestPath(req);
  req.log.error({ method: req.method, path, err }, `${req.method} ${path}`);
  return reply.code(err.statusCode).send();
}
