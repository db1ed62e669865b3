import { Counter, Gauge, Registry } from 'prom-client';

export interface ClusterApiMetrics {
  register: Registry;
  clusterOperations: Counter<'operation'>;
  imageOperations: Counter<'operation'>;
  computeFleetRequests: Counter<'status'>;
  readinessGauge: Gauge<'component'>;
}

export const createMetrics = (): ClusterApiMetrics => {
  const register = new Registry();

  const clusterOperations = new Counter({
    name: 'hpcfleet_cluster_operations_total',
    help: 'Cluster operations submitted to CloudFormation',
    registers: [register],
    labelNames: ['operation'] as const
  });

  const imageOperations = new Counter({
    name: 'hpcfleet_image_operations_total',
    help: 'Image operations submitted to CloudFormation and EC2',
    registers: [register],
    labelNames: ['operation'] as const
  });

  const computeFleetRequests = new Counter({
    name: 'hpcfleet_compute_fleet_requests_total',
    help: 'Accepted compute fleet status requests',
    registers: [register],
    labelNames: ['status'] as const
  });

  const readinessGauge = new Gauge({
    name: 'hpcfleet_component_ready',
    help: 'Readiness state per component (1 ready, 0 not ready)',
    registers: [register],
    labelNames: ['component'] as const
  });

  return {
    register,
    clusterOperations,
    imageOperations,
    computeFleetRequests,
    readinessGauge
  };
};
