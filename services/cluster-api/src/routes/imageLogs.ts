import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { logEventsQuerySchema, pageQuerySchema } from '../common/params';
import type { AppContext } from '../types';
import { gatewaysFor, parseOrThrow, sendError } from './helpers';

const imageParamsSchema = z.object({ imageId: z.string() });
const logStreamParamsSchema = imageParamsSchema.extend({ logStreamName: z.string() });

export const registerImageLogRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/v3/images/custom/:imageId/logstreams', async (request, reply) => {
    try {
      const { imageId } = parseOrThrow(imageParamsSchema, request.params);
      const query = parseOrThrow(pageQuerySchema, request.query);
      return await ctx.services.images.listLogStreams(gatewaysFor(ctx, query.region), imageId, query.nextToken);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.get('/v3/images/custom/:imageId/logstreams/:logStreamName', async (request, reply) => {
    try {
      const { imageId, logStreamName } = parseOrThrow(logStreamParamsSchema, request.params);
      const { region, ...query } = parseOrThrow(logEventsQuerySchema, request.query);
      return await ctx.services.images.getLogEvents(gatewaysFor(ctx, region), imageId, logStreamName, query);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.get('/v3/images/custom/:imageId/stackevents', async (request, reply) => {
    try {
      const { imageId } = parseOrThrow(imageParamsSchema, request.params);
      const query = parseOrThrow(pageQuerySchema, request.query);
      return await ctx.services.images.getStackEvents(gatewaysFor(ctx, query.region), imageId, query.nextToken);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });
};
