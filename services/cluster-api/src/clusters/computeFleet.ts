import {
  BadRequestException,
  InternalServiceException,
  computeFleetTableName,
  isStableClusterStackStatus,
  type ComputeFleetStatusResponse,
  type RequestedComputeFleetStatus
} from '@hpcfleet/cluster-model';

import type { AwsGateways, StackRecord } from '../aws';
import type { Logger } from '../logger';
import { ComputeFleetStatusManager } from './computeFleetStatusManager';
import { clusterScheduler, requireClusterStack } from './stacks';

const BATCH_ENVIRONMENT_OUTPUT = 'BatchComputeEnvironmentArn';

export class ComputeFleetService {
  constructor(
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  private manager(gateways: AwsGateways, stack: StackRecord): ComputeFleetStatusManager {
    return new ComputeFleetStatusManager(
      gateways.fleetStatus,
      computeFleetTableName(stack.stackName),
      this.logger,
      this.now
    );
  }

  /** Fleet status of an already resolved cluster stack. */
  async statusOf(gateways: AwsGateways, stack: StackRecord): Promise<ComputeFleetStatusResponse> {
    if (clusterScheduler(stack) === 'awsbatch') {
      const environment = stack.outputs[BATCH_ENVIRONMENT_OUTPUT];
      if (!environment) {
        return { status: 'UNKNOWN' };
      }
      try {
        const state = await gateways.batch.getComputeEnvironmentState(environment);
        return { status: state ?? 'UNKNOWN' };
      } catch (error) {
        this.logger.warn({ err: error, environment }, 'Failed to read compute environment state');
        return { status: 'UNKNOWN' };
      }
    }
    return this.manager(gateways, stack).getStatus();
  }

  async describe(gateways: AwsGateways, clusterName: string): Promise<ComputeFleetStatusResponse> {
    const stack = await requireClusterStack(gateways, clusterName);
    return this.statusOf(gateways, stack);
  }

  async update(gateways: AwsGateways, clusterName: string, status: RequestedComputeFleetStatus): Promise<void> {
    const stack = await requireClusterStack(gateways, clusterName);
    if (!isStableClusterStackStatus(stack.status)) {
      throw new BadRequestException(
        `cluster '${clusterName}' is in '${stack.status}' state. The compute fleet can be updated only when the cluster is stable.`
      );
    }

    if (clusterScheduler(stack) === 'awsbatch') {
      if (status !== 'ENABLED' && status !== 'DISABLED') {
        throw new BadRequestException('the awsbatch scheduler accepts only the ENABLED and DISABLED statuses.');
      }
      const environment = stack.outputs[BATCH_ENVIRONMENT_OUTPUT];
      if (!environment) {
        throw new InternalServiceException(`Could not find the compute environment of cluster '${clusterName}'.`);
      }
      await gateways.batch.updateComputeEnvironmentState(environment, status);
      this.logger.info({ clusterName, status }, 'Compute environment state updated');
      return;
    }

    const manager = this.manager(gateways, stack);
    if (status === 'START_REQUESTED') {
      await manager.start();
    } else if (status === 'STOP_REQUESTED') {
      await manager.stop();
    } else {
      throw new BadRequestException('the slurm scheduler accepts only the START_REQUESTED and STOP_REQUESTED statuses.');
    }
  }
}
