import { buildImageRequestSchema, imageStatusFilteringOptionSchema } from '@hpcfleet/cluster-model';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { booleanParam, regionQuerySchema, stringParam, validationQuerySchema } from '../common/params';
import type { AppContext } from '../types';
import { gatewaysFor, parseOrThrow, sendError } from './helpers';

const imageParamsSchema = z.object({ imageId: z.string() });

const listImagesQuerySchema = z.object({
  region: stringParam.optional(),
  nextToken: stringParam.optional(),
  imageStatus: stringParam.pipe(imageStatusFilteringOptionSchema)
});

const deleteImageQuerySchema = regionQuerySchema.extend({
  force: booleanParam.optional()
});

const officialImagesQuerySchema = regionQuerySchema.extend({
  os: stringParam.optional(),
  architecture: stringParam.optional()
});

export const registerImageRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/v3/images/custom', async (request, reply) => {
    try {
      const query = parseOrThrow(validationQuerySchema, request.query);
      const body = parseOrThrow(buildImageRequestSchema, request.body);
      const result = await ctx.services.images.buildImage(gatewaysFor(ctx, query.region, body.region), body, {
        suppressValidators: query.suppressValidators,
        validationFailureLevel: query.validationFailureLevel,
        dryrun: query.dryrun,
        rollbackOnFailure: query.rollbackOnFailure,
        clientToken: query.clientToken
      });
      ctx.metrics.imageOperations.inc({ operation: 'build' });
      return reply.status(202).send(result);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.get('/v3/images/custom', async (request, reply) => {
    try {
      const query = parseOrThrow(listImagesQuerySchema, request.query);
      return await ctx.services.images.listImages(gatewaysFor(ctx, query.region), query.imageStatus, query.nextToken);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.get('/v3/images/custom/:imageId', async (request, reply) => {
    try {
      const { imageId } = parseOrThrow(imageParamsSchema, request.params);
      const query = parseOrThrow(regionQuerySchema, request.query);
      return await ctx.services.images.describeImage(gatewaysFor(ctx, query.region), imageId);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.delete('/v3/images/custom/:imageId', async (request, reply) => {
    try {
      const { imageId } = parseOrThrow(imageParamsSchema, request.params);
      const query = parseOrThrow(deleteImageQuerySchema, request.query);
      const result = await ctx.services.images.deleteImage(gatewaysFor(ctx, query.region), imageId, query.force ?? false);
      ctx.metrics.imageOperations.inc({ operation: 'delete' });
      return reply.status(202).send(result);
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  app.get('/v3/images/official', async (request, reply) => {
    try {
      const query = parseOrThrow(officialImagesQuerySchema, request.query);
      return await ctx.services.images.describeOfficialImages(gatewaysFor(ctx, query.region), {
        os: query.os,
        architecture: query.architecture
      });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });
};
