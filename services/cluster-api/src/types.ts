import type { AwsGatewayFactory } from './aws';
import type { ClusterInstancesService } from './clusters/clusterInstances';
import type { ClusterLogsService } from './clusters/clusterLogs';
import type { ClusterService } from './clusters/clusterService';
import type { ComputeFleetService } from './clusters/computeFleet';
import type { ClusterApiConfig } from './config';
import type { ImageService } from './images/imageService';
import type { ClusterApiMetrics } from './metrics';

export interface ReadinessState {
  artifacts: boolean;
}

export interface AppServices {
  clusters: ClusterService;
  computeFleet: ComputeFleetService;
  clusterInstances: ClusterInstancesService;
  clusterLogs: ClusterLogsService;
  images: ImageService;
}

export interface AppContext {
  config: ClusterApiConfig;
  gateways: AwsGatewayFactory;
  services: AppServices;
  metrics: ClusterApiMetrics;
  readiness: ReadinessState;
}
