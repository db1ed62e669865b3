import {
  BadRequestException,
  parseLogStreamFilters,
  type GetLogEventsResponse,
  type GetStackEventsResponse,
  type ListLogStreamsResponse
} from '@hpcfleet/cluster-model';

import type { AwsGateways, StackRecord } from '../aws';
import { getLogEvents, listLogStreams, parseLogEventsRequest, type LogEventsRequest } from '../common/logs';
import { getStackEvents } from '../common/stacks';
import { findHeadNode } from './instances';
import { requireClusterStack } from './stacks';

const logGroupOf = (stack: StackRecord): string => {
  const logGroup = stack.outputs.LogGroupName;
  if (!logGroup) {
    throw new BadRequestException(`CloudWatch logging is not enabled for cluster ${stack.stackName}.`);
  }
  return logGroup;
};

export class ClusterLogsService {
  async listLogStreams(
    gateways: AwsGateways,
    clusterName: string,
    query: { filters?: string[]; nextToken?: string } = {}
  ): Promise<ListLogStreamsResponse> {
    const filter = parseLogStreamFilters(query.filters);
    const stack = await requireClusterStack(gateways, clusterName);
    const logGroupName = logGroupOf(stack);

    let prefix: string | undefined;
    if (filter.kind === 'prefix') {
      prefix = filter.prefix;
    } else if (filter.kind === 'head-node') {
      const headNode = await findHeadNode(gateways.ec2, clusterName);
      if (!headNode || !headNode.privateDnsName) {
        throw new BadRequestException(`the head node of cluster ${clusterName} is not available.`);
      }
      prefix = headNode.privateDnsName.split('.')[0];
    }

    return listLogStreams(gateways.logs, logGroupName, { prefix, nextToken: query.nextToken });
  }

  async getLogEvents(
    gateways: AwsGateways,
    clusterName: string,
    logStreamName: string,
    request: LogEventsRequest
  ): Promise<GetLogEventsResponse> {
    const options = parseLogEventsRequest(request);
    const stack = await requireClusterStack(gateways, clusterName);
    return getLogEvents(gateways.logs, logGroupOf(stack), logStreamName, options);
  }

  async getStackEvents(gateways: AwsGateways, clusterName: string, nextToken?: string): Promise<GetStackEventsResponse> {
    const stack = await requireClusterStack(gateways, clusterName);
    return getStackEvents(gateways.cloudFormation, stack.stackName, nextToken);
  }
}
