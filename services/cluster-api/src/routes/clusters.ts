import {
  clusterStatusSchema,
  createClusterRequestSchema,
  updateClusterRequestSchema
} from '@hpcfleet/cluster-model';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { booleanParam, listParam, regionQuerySchema, stringParam, validationQuerySchema } from '../common/params';
import type { AppContext } from '../types';
import { gatewaysFor, parseOrThrow, sendError } from './helpers';

const clusterParamsSchema = z.object({ clusterName: z.string() });

const listClustersQuerySchema = z.object({
  region: stringParam.optional(),
  nextToken: stringParam.optional(),
  clusterStatus: listParam.pipe(z.array(clusterStatusSchema)).optional()
});

const updateClusterQuerySchema = validationQuerySchema.omit({ rollbackOnFailure: true }).extend({
  forceUpdate: booleanParam.optional()
});

const deleteClusterQuerySchema = regionQuerySchema.extend({
  clientToken: stringParam.optional()
});

export const registerClusterRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/v3/clusters', async (request, reply) => {
    try {
      const query = parseOrThrow(validationQuerySchema, request.query);
      const body = parseOrThrow(createClusterRequestSchema, request.body);
      const gateways = gatewaysFor(ctx, query.region, body.region);
      const result = await ctx.services.clusters.createCluster(gateways, body, {
        suppressValidators: query.suppressValidators,
        validationFailureLevel: query.validationFailureLevel,
        dryrun: query.dryrun,
        rollbackOnFailure: query.rollbackOnFailure,
        clientToken: query.clientToken
      });
      ctx.metrics.clusterOperations.inc({ operation: 'create' });
      return reply.status(202).send(result);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.get('/v3/clusters', async (request, reply) => {
    try {
      const query = parseOrThrow(listClustersQuerySchema, request.query);
      const gateways = gatewaysFor(ctx, query.region);
      return await ctx.services.clusters.listClusters(gateways, {
        nextToken: query.nextToken,
        clusterStatus: query.clusterStatus
      });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.get('/v3/clusters/:clusterName', async (request, reply) => {
    try {
      const { clusterName } = parseOrThrow(clusterParamsSchema, request.params);
      const query = parseOrThrow(regionQuerySchema, request.query);
      return await ctx.services.clusters.describeCluster(gatewaysFor(ctx, query.region), clusterName);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.put('/v3/clusters/:clusterName', async (request, reply) => {
    try {
      const { clusterName } = parseOrThrow(clusterParamsSchema, request.params);
      const query = parseOrThrow(updateClusterQuerySchema, request.query);
      const body = parseOrThrow(updateClusterRequestSchema, request.body);
      const result = await ctx.services.clusters.updateCluster(gatewaysFor(ctx, query.region), clusterName, body, {
        suppressValidators: query.suppressValidators,
        validationFailureLevel: query.validationFailureLevel,
        dryrun: query.dryrun,
        forceUpdate: query.forceUpdate,
        clientToken: query.clientToken
      });
      ctx.metrics.clusterOperations.inc({ operation: 'update' });
      return reply.status(202).send(result);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.delete('/v3/clusters/:clusterName', async (request, reply) => {
    try {
      const { clusterName } = parseOrThrow(clusterParamsSchema, request.params);
      const query = parseOrThrow(deleteClusterQuerySchema, request.query);
      const result = await ctx.services.clusters.deleteCluster(
        gatewaysFor(ctx, query.region),
        clusterName,
        query.clientToken
      );
      ctx.metrics.clusterOperations.inc({ operation: 'delete' });
      return reply.status(202).send(result);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });
};
