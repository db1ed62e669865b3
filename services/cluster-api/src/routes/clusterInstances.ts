import { nodeTypeSchema } from '@hpcfleet/cluster-model';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { booleanParam, stringParam } from '../common/params';
import type { AppContext } from '../types';
import { gatewaysFor, parseOrThrow, sendError } from './helpers';

const clusterParamsSchema = z.object({ clusterName: z.string() });

const describeInstancesQuerySchema = z.object({
  region: stringParam.optional(),
  nextToken: stringParam.optional(),
  nodeType: stringParam.pipe(nodeTypeSchema).optional(),
  queueName: stringParam.optional()
});

const deleteInstancesQuerySchema = z.object({
  region: stringParam.optional(),
  force: booleanParam.optional()
});

export const registerClusterInstanceRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/v3/clusters/:clusterName/instances', async (request, reply) => {
    try {
      const { clusterName } = parseOrThrow(clusterParamsSchema, request.params);
      const query = parseOrThrow(describeInstancesQuerySchema, request.query);
      return await ctx.services.clusterInstances.describe(gatewaysFor(ctx, query.region), clusterName, {
        nextToken: query.nextToken,
        nodeType: query.nodeType,
        queueName: query.queueName
      });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.delete('/v3/clusters/:clusterName/instances', async (request, reply) => {
    try {
      const { clusterName } = parseOrThrow(clusterParamsSchema, request.params);
      const query = parseOrThrow(deleteInstancesQuerySchema, request.query);
      await ctx.services.clusterInstances.deleteComputeInstances(
        gatewaysFor(ctx, query.region),
        clusterName,
        query.force ?? false
      );
      return reply.status(202).send();
    } catch (error) {
      return sendError(request, reply, error);
    }
  });
};
