import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { logEventsQuerySchema, pageQuerySchema, stringParam } from '../common/params';
import type { AppContext } from '../types';
import { gatewaysFor, parseOrThrow, sendError } from './helpers';

const clusterParamsSchema = z.object({ clusterName: z.string() });
const logStreamParamsSchema = clusterParamsSchema.extend({ logStreamName: z.string() });

const filtersParam = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : [value]));

const listLogStreamsQuerySchema = z.object({
  region: stringParam.optional(),
  nextToken: stringParam.optional(),
  filters: filtersParam.optional()
});

export const registerClusterLogRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/v3/clusters/:clusterName/logstreams', async (request, reply) => {
    try {
      const { clusterName } = parseOrThrow(clusterParamsSchema, request.params);
      const query = parseOrThrow(listLogStreamsQuerySchema, request.query);
      return await ctx.services.clusterLogs.listLogStreams(gatewaysFor(ctx, query.region), clusterName, {
        filters: query.filters,
        nextToken: query.nextToken
      });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.get('/v3/clusters/:clusterName/logstreams/:logStreamName', async (request, reply) => {
    try {
      const { clusterName, logStreamName } = parseOrThrow(logStreamParamsSchema, request.params);
      const { region, ...query } = parseOrThrow(logEventsQuerySchema, request.query);
      return await ctx.services.clusterLogs.getLogEvents(gatewaysFor(ctx, region), clusterName, logStreamName, query);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.get('/v3/clusters/:clusterName/stackevents', async (request, reply) => {
    try {
      const { clusterName } = parseOrThrow(clusterParamsSchema, request.params);
      const query = parseOrThrow(pageQuerySchema, request.query);
      return await ctx.services.clusterLogs.getStackEvents(gatewaysFor(ctx, query.region), clusterName, query.nextToken);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });
};
