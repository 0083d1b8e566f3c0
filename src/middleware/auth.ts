import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { RequestError } from '../errors.js';
import { replyWithRequestError } from '../access-log.js';

export interface BasicCredentials {
  username: string;
  password: string;
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** Decode an `Authorization: Basic ...` header. Undefined when absent or malformed. */
export function parseBasicAuth(header: string | undefined): BasicCredentials | undefined {
  if (!header) return undefined;
  const prefix = 'basic ';
  if (header.length < prefix.length || header.slice(0, prefix.length).toLowerCase() !== prefix) return undefined;
  const encoded = header.slice(prefix.length);
  if (encoded.length % 4 !== 0 || !BASE64.test(encoded)) return undefined;
  const decoded = Buffer.from(encoded, 'base64').toString('utf8');
  const sep = decoded.indexOf(':');
  if (sep < 0) return undefined;
  return { username: decoded.slice(0, sep), password: decoded.slice(sep + 1) };
}

/**
 * Gate requests on the Basic auth username matching `token`. The password is not checked.
 */
export function requireBasicAuthToken(token: string): preHandlerAsyncHookHandler {
  return async function basicAuth(request: FastifyRequest, reply: FastifyReply) {
    const creds = parseBasicAuth(request.headers.authorization);
    if (!creds || creds.username !== token) {
      return replyWithRequestError(request, reply, new RequestError('UNAUTHORIZED', 'authentication failed'));
    }
  };
}
