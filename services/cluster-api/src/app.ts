import cors from '@fastify/cors';
import fastify, { type FastifyInstance } from 'fastify';

import { createSdkGatewayFactory, type AwsGatewayFactory } from './aws';
import { registerAuth } from './auth';
import { ClusterInstancesService } from './clusters/clusterInstances';
import { ClusterLogsService } from './clusters/clusterLogs';
import { ClusterService } from './clusters/clusterService';
import { ComputeFleetService } from './clusters/computeFleet';
import type { ClusterApiConfig } from './config';
import { mapErrorToResponse } from './errors';
import { ImageService } from './images/imageService';
import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { registerClusterInstanceRoutes } from './routes/clusterInstances';
import { registerClusterLogRoutes } from './routes/clusterLogs';
import { registerClusterRoutes } from './routes/clusters';
import { registerComputeFleetRoutes } from './routes/computeFleet';
import { registerHealthRoutes } from './routes/health';
import { registerImageLogRoutes } from './routes/imageLogs';
import { registerImageRoutes } from './routes/images';
import type { AppContext } from './types';

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export interface CreateAppOptions {
  /** Replaces the SDK-backed gateways, e.g. with in-memory fakes. */
  gateways?: AwsGatewayFactory;
  generateSuffix?: () => string;
  now?: () => Date;
}

export const createApp = async (config: ClusterApiConfig, options: CreateAppOptions = {}): Promise<CreateAppResult> => {
  const logger = createLogger(config.logLevel);
  const app = fastify({ logger });
  await app.register(cors, { origin: true, credentials: true });

  const metrics = createMetrics();
  const readiness = { artifacts: Boolean(config.artifactsBucket) };
  metrics.readinessGauge.set({ component: 'artifacts' }, readiness.artifacts ? 1 : 0);
  if (!readiness.artifacts) {
    app.log.warn('HPCFLEET_ARTIFACTS_BUCKET is not set; create, update and build operations will fail');
  }

  const computeFleet = new ComputeFleetService(app.log, options.now);
  const ctx: AppContext = {
    config,
    gateways: options.gateways ?? createSdkGatewayFactory({ artifactsBucket: config.artifactsBucket ?? '' }),
    services: {
      clusters: new ClusterService({
        logger: app.log,
        computeFleet,
        officialImageOwners: config.officialImageOwners,
        generateSuffix: options.generateSuffix
      }),
      computeFleet,
      clusterInstances: new ClusterInstancesService(app.log),
      clusterLogs: new ClusterLogsService(),
      images: new ImageService({
        logger: app.log,
        officialImageOwners: config.officialImageOwners,
        generateSuffix: options.generateSuffix
      })
    },
    metrics,
    readiness
  };

  registerAuth(app, config.apiTokens);
  registerHealthRoutes(app, ctx);
  registerClusterRoutes(app, ctx);
  registerComputeFleetRoutes(app, ctx);
  registerClusterInstanceRoutes(app, ctx);
  registerClusterLogRoutes(app, ctx);
  registerImageRoutes(app, ctx);
  registerImageLogRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send(mapped.body);
  });

  return { app, ctx };
};
