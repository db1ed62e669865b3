import { updateComputeFleetRequestSchema } from '@hpcfleet/cluster-model';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { regionQuerySchema } from '../common/params';
import type { AppContext } from '../types';
import { gatewaysFor, parseOrThrow, sendError } from './helpers';

const clusterParamsSchema = z.object({ clusterName: z.string() });

export const registerComputeFleetRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/v3/clusters/:clusterName/computefleet', async (request, reply) => {
    try {
      const { clusterName } = parseOrThrow(clusterParamsSchema, request.params);
      const query = parseOrThrow(regionQuerySchema, request.query);
      return await ctx.services.computeFleet.describe(gatewaysFor(ctx, query.region), clusterName);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.patch('/v3/clusters/:clusterName/computefleet', async (request, reply) => {
    try {
      const { clusterName } = parseOrThrow(clusterParamsSchema, request.params);
      const query = parseOrThrow(regionQuerySchema, request.query);
      const body = parseOrThrow(updateComputeFleetRequestSchema, request.body);
      await ctx.services.computeFleet.update(gatewaysFor(ctx, query.region), clusterName, body.status);
      ctx.metrics.computeFleetRequests.inc({ status: body.status });
      return reply.status(204).send();
    } catch (error) {
      return sendError(request, reply, error);
    }
  });
};
