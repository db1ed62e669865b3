import {
  TAGS,
  toIsoTimestamp,
  type GetStackEventsResponse,
  type StackEvent,
  type Tag
} from '@hpcfleet/cluster-model';

import type { CloudFormationGateway, StackEventRecord } from '../aws';

export const toStackEvent = (record: StackEventRecord): StackEvent => ({
  stackId: record.stackId,
  eventId: record.eventId,
  stackName: record.stackName,
  logicalResourceId: record.logicalResourceId,
  physicalResourceId: record.physicalResourceId,
  resourceType: record.resourceType,
  timestamp: toIsoTimestamp(record.timestamp),
  resourceStatus: record.resourceStatus,
  resourceStatusReason: record.resourceStatusReason,
  resourceProperties: record.resourceProperties,
  clientRequestToken: record.clientRequestToken
});

export const getStackEvents = async (
  cloudFormation: CloudFormationGateway,
  stackName: string,
  nextToken?: string
): Promise<GetStackEventsResponse> => {
  const page = await cloudFormation.describeStackEvents(stackName, nextToken);
  return { events: page.items.map(toStackEvent), nextToken: page.nextToken };
};

export const toTagList = (tags: Record<string, string>): Tag[] =>
  Object.entries(tags).map(([key, value]) => ({ key, value }));

export const stackVersion = (tags: Record<string, string>): string => tags[TAGS.version] ?? 'UNKNOWN';
