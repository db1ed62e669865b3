import { createHash, timingSafeEqual } from 'node:crypto';

import { UnauthorizedClientError } from '@hpcfleet/cluster-model';
import type { FastifyInstance, FastifyRequest } from 'fastify';

const BEARER_PREFIX = 'bearer ';

const digest = (value: string): Buffer => createHash('sha256').update(value).digest();

export function getBearerToken(request: FastifyRequest): string | null {
  const authHeader = request.headers.authorization;
  if (!authHeader) {
    return null;
  }
  const trimmed = authHeader.trim();
  if (!trimmed.toLowerCase().startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = trimmed.slice(BEARER_PREFIX.length).trim();
  return token || null;
}

/** Requires a configured bearer token on every `/v3` route; no tokens disables the check. */
export const registerAuth = (app: FastifyInstance, tokens: string[]) => {
  if (tokens.length === 0) {
    return;
  }
  const accepted = tokens.map(digest);

  app.addHook('onRequest', async (request, reply) => {
    if (!request.url.startsWith('/v3/')) {
      return;
    }
    const token = getBearerToken(request);
    const candidate = digest(token ?? '');
    if (!token || !accepted.some((expected) => timingSafeEqual(expected, candidate))) {
      const error = new UnauthorizedClientError();
      return reply.status(error.statusCode).send(error.toResponse());
    }
  });
};
