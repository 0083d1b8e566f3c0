import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { RequestError } from '../errors.js';
import { replyWithRequestError } from '../access-log.js';
import { mathRandom, type RandomSource } from '../random.js';

export function isValidProbability(p: number): boolean {
  return Number.isFinite(p) && p >= 0 && p <= 1;
}

/**
 * Fail a request with 500 when a uniform draw u in [0, 1) satisfies u <= prob.
 * prob = 0 can still fire on an exact 0 draw; callers leave the hook out entirely in that case.
 */
export function injectRandomErrors(prob: number, random: RandomSource = mathRandom): preHandlerAsyncHookHandler {
  if (!isValidProbability(prob)) {
    throw new RangeError(`random error probability must be in the [0, 1] range, got ${prob}`);
  }
  return async function randomErrors(request: FastifyRequest, reply: FastifyReply) {
    if (random.next() <= prob) {
      return replyWithRequestError(request, reply, new RequestError('INJECTED_FAULT', 'injected error'));
    }
  };
}
