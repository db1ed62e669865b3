import { BatchClient, DescribeComputeEnvironmentsCommand, UpdateComputeEnvironmentCommand } from '@aws-sdk/client-batch';

import { callAws } from './errors';
import type { BatchGateway } from './types';

export const createBatchGateway = (client: BatchClient): BatchGateway => ({
  async getComputeEnvironmentState(arn) {
    const response = await callAws('describe_compute_environments', () =>
      client.send(new DescribeComputeEnvironmentsCommand({ computeEnvironments: [arn] }))
    );
    const state = response.computeEnvironments?.[0]?.state;
    return state === 'ENABLED' || state === 'DISABLED' ? state : null;
  },

  async updateComputeEnvironmentState(arn, state) {
    await callAws('update_compute_environment', () =>
      client.send(new UpdateComputeEnvironmentCommand({ computeEnvironment: arn, state }))
    );
  }
});
