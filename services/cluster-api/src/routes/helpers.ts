import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';

import type { AwsGateways } from '../aws';
import { resolveRegion } from '../common/params';
import { mapErrorToResponse } from '../errors';
import type { AppContext } from '../types';

export const parseOrThrow = <T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
};

export const sendError = (request: FastifyRequest, reply: FastifyReply, error: unknown) => {
  const mapped = mapErrorToResponse(error);
  if (mapped.statusCode >= 500) {
    request.log.error({ err: error }, 'Request failed');
  }
  return reply.status(mapped.statusCode).send(mapped.body);
};

export const gatewaysFor = (ctx: AppContext, ...regions: Array<string | undefined>): AwsGateways =>
  ctx.gateways(resolveRegion(regions, ctx.config.defaultRegion));
