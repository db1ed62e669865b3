import {
  BadRequestException,
  CLUSTER_NAME_PATTERN,
  HPCFLEET_VERSION,
  InternalServiceException,
  NotFoundException,
  TAGS,
  isMajorCompatible,
  schedulerTypeSchema,
  toClusterStatus,
  type ClusterInfoSummary,
  type SchedulerType
} from '@hpcfleet/cluster-model';

import type { ArtifactStore, AwsGateways, StackRecord } from '../aws';
import { stackVersion } from '../common/stacks';

export const validateClusterName = (clusterName: string): void => {
  if (!CLUSTER_NAME_PATTERN.test(clusterName)) {
    throw new BadRequestException(
      `Error: The cluster name '${clusterName}' can contain only alphanumeric characters (case-sensitive) and hyphens. ` +
        "It must start with an alphabetic character and can't be longer than 60 characters."
    );
  }
};

export const isClusterStack = (stack: StackRecord): boolean => TAGS.clusterName in stack.tags && !stack.parentId;

/** Looks up the cluster's root stack; absent or non-cluster stacks are a 404. */
export const requireClusterStack = async (gateways: AwsGateways, clusterName: string): Promise<StackRecord> => {
  validateClusterName(clusterName);
  const stack = await gateways.cloudFormation.describeStack(clusterName);
  if (!stack || !isClusterStack(stack) || stack.status === 'DELETE_COMPLETE') {
    throw new NotFoundException(`cluster '${clusterName}' does not exist`);
  }
  return stack;
};

export const assertMajorCompatible = (stack: StackRecord): void => {
  if (!isMajorCompatible(stack.tags[TAGS.version], HPCFLEET_VERSION)) {
    throw new BadRequestException(
      `cluster '${stack.stackName}' belongs to an incompatible hpcfleet major version (${stackVersion(stack.tags)}).`
    );
  }
};

export const clusterScheduler = (stack: StackRecord): SchedulerType | undefined => {
  const parsed = schedulerTypeSchema.safeParse(stack.tags[TAGS.scheduler] ?? stack.outputs.Scheduler);
  return parsed.success ? parsed.data : undefined;
};

export const toClusterSummary = (stack: StackRecord, region: string): ClusterInfoSummary => {
  const scheduler = clusterScheduler(stack);
  return {
    clusterName: stack.stackName,
    region,
    version: stackVersion(stack.tags),
    cloudformationStackArn: stack.stackId,
    cloudformationStackStatus: stack.status,
    clusterStatus: toClusterStatus(stack.status),
    scheduler: scheduler ? { type: scheduler } : undefined
  };
};

export const requireArtifacts = (gateways: AwsGateways): ArtifactStore => {
  if (!gateways.artifacts.bucket) {
    throw new InternalServiceException('artifacts bucket is not configured. Set HPCFLEET_ARTIFACTS_BUCKET.');
  }
  return gateways.artifacts;
};
