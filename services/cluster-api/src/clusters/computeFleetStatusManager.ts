import {
  ConflictException,
  InternalServiceException,
  START_TRANSITION,
  STOP_TRANSITION,
  computeFleetStatusSchema,
  planStatusTransition,
  type ComputeFleetStatusResponse,
  type FleetTransition,
  type TransitionPlan
} from '@hpcfleet/cluster-model';

import { ConditionalUpdateFailedError, type ComputeFleetStatusTable } from '../aws';
import type { Logger } from '../logger';

/**
 * Reads and requests Slurm compute fleet status through the cluster's DynamoDB table.
 * The head node daemon moves requested states to their in-progress and final values.
 */
export class ComputeFleetStatusManager {
  constructor(
    private readonly table: ComputeFleetStatusTable,
    private readonly tableName: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getStatus(): Promise<ComputeFleetStatusResponse> {
    try {
      const item = await this.table.getStatus(this.tableName);
      const status = computeFleetStatusSchema.safeParse(item?.status);
      if (!item || !status.success) {
        this.logger.warn({ table: this.tableName }, 'Compute fleet status item missing or unreadable');
        return { status: 'UNKNOWN' };
      }
      return { status: status.data, lastStatusUpdatedTime: item.lastStatusUpdatedTime };
    } catch (error) {
      this.logger.warn({ err: error, table: this.tableName }, 'Failed to read compute fleet status');
      return { status: 'UNKNOWN' };
    }
  }

  start(): Promise<TransitionPlan> {
    return this.request(START_TRANSITION);
  }

  stop(): Promise<TransitionPlan> {
    return this.request(STOP_TRANSITION);
  }

  private async request(transition: FleetTransition): Promise<TransitionPlan> {
    const current = await this.getStatus();
    const plan = planStatusTransition(current.status, transition);
    switch (plan.kind) {
      case 'unknown':
        throw new InternalServiceException('Could not retrieve compute fleet status.');
      case 'noop-final':
      case 'noop-pending':
        this.logger.info({ table: this.tableName, status: current.status }, 'Compute fleet already in requested state');
        return plan;
      case 'put':
        try {
          await this.table.updateStatusIfCurrent(this.tableName, {
            expected: plan.from,
            next: plan.to,
            updatedAt: this.now().toISOString()
          });
        } catch (error) {
          if (error instanceof ConditionalUpdateFailedError) {
            throw new ConflictException(
              `compute fleet status changed while applying ${plan.to}; current status is no longer ${plan.from}.`
            );
          }
          throw error;
        }
        this.logger.info({ table: this.tableName, from: plan.from, to: plan.to }, 'Compute fleet status requested');
        return plan;
    }
  }
}
