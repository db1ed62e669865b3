import {
  NODE_TYPE_TAG_VALUES,
  TAGS,
  instanceStateSchema,
  toIsoTimestamp,
  type ClusterInstance,
  type EC2Instance,
  type NodeType
} from '@hpcfleet/cluster-model';

import type { Ec2Filter, Ec2Gateway, InstanceRecord, Page } from '../aws';

const LIVE_STATES = ['pending', 'running', 'stopping', 'stopped', 'shutting-down'];

export const clusterInstanceFilters = (
  clusterName: string,
  options: { nodeType?: NodeType; queueName?: string } = {}
): Ec2Filter[] => {
  const filters: Ec2Filter[] = [
    { name: `tag:${TAGS.clusterName}`, values: [clusterName] },
    { name: 'instance-state-name', values: LIVE_STATES }
  ];
  if (options.nodeType) {
    filters.push({ name: `tag:${TAGS.nodeType}`, values: [NODE_TYPE_TAG_VALUES[options.nodeType]] });
  }
  if (options.queueName) {
    filters.push({ name: `tag:${TAGS.queueName}`, values: [options.queueName] });
  }
  return filters;
};

export const describeAllInstances = async (ec2: Ec2Gateway, filters: Ec2Filter[]): Promise<InstanceRecord[]> => {
  const instances: InstanceRecord[] = [];
  let nextToken: string | undefined;
  do {
    const page: Page<InstanceRecord> = await ec2.describeInstances(filters, nextToken);
    instances.push(...page.items);
    nextToken = page.nextToken;
  } while (nextToken);
  return instances;
};

export const findHeadNode = async (ec2: Ec2Gateway, clusterName: string): Promise<InstanceRecord | null> => {
  const page = await ec2.describeInstances(clusterInstanceFilters(clusterName, { nodeType: 'HEAD' }));
  return page.items[0] ?? null;
};

export const toEc2Instance = (record: InstanceRecord): EC2Instance => {
  const state = instanceStateSchema.safeParse(record.state);
  return {
    instanceId: record.instanceId,
    instanceType: record.instanceType,
    launchTime: toIsoTimestamp(record.launchTime),
    privateIpAddress: record.privateIpAddress,
    publicIpAddress: record.publicIpAddress,
    state: state.success ? state.data : 'pending'
  };
};

export const toClusterInstance = (record: InstanceRecord): ClusterInstance => ({
  ...toEc2Instance(record),
  nodeType: record.tags[TAGS.nodeType] === NODE_TYPE_TAG_VALUES.HEAD ? 'HEAD' : 'COMPUTE',
  queueName: record.tags[TAGS.queueName],
  computeResourceName: record.tags[TAGS.computeResourceName]
});
