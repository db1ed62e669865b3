import {
  BadRequestException,
  NODE_TYPE_TAG_VALUES,
  TAGS,
  type DescribeClusterInstancesResponse,
  type NodeType
} from '@hpcfleet/cluster-model';

import type { AwsGateways } from '../aws';
import type { Logger } from '../logger';
import { clusterInstanceFilters, describeAllInstances, toClusterInstance } from './instances';
import { clusterScheduler, requireClusterStack, validateClusterName } from './stacks';

export class ClusterInstancesService {
  constructor(private readonly logger: Logger) {}

  async describe(
    gateways: AwsGateways,
    clusterName: string,
    query: { nextToken?: string; nodeType?: NodeType; queueName?: string } = {}
  ): Promise<DescribeClusterInstancesResponse> {
    validateClusterName(clusterName);
    const page = await gateways.ec2.describeInstances(
      clusterInstanceFilters(clusterName, { nodeType: query.nodeType, queueName: query.queueName }),
      query.nextToken
    );
    return { instances: page.items.map(toClusterInstance), nextToken: page.nextToken };
  }

  /** Terminates every compute node; with `force` the cluster stack need not exist. */
  async deleteComputeInstances(gateways: AwsGateways, clusterName: string, force = false): Promise<void> {
    validateClusterName(clusterName);
    const stack = force
      ? await gateways.cloudFormation.describeStack(clusterName)
      : await requireClusterStack(gateways, clusterName);
    if (stack && clusterScheduler(stack) === 'awsbatch') {
      throw new BadRequestException('the delete cluster instances operation does not support AWS Batch clusters.');
    }

    const instances = await describeAllInstances(gateways.ec2, clusterInstanceFilters(clusterName, { nodeType: 'COMPUTE' }));
    const ids = instances
      .filter((instance) => instance.tags[TAGS.nodeType] === NODE_TYPE_TAG_VALUES.COMPUTE)
      .map((instance) => instance.instanceId);
    await gateways.ec2.terminateInstances(ids);
    this.logger.info({ clusterName, region: gateways.region, terminated: ids.length }, 'Compute instances terminated');
  }
}
