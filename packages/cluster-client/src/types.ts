import type {
  ClusterStatus,
  ImageStatusFilteringOption,
  NodeType,
  RequestedComputeFleetStatus,
  ValidationLevel
} from '@hpcfleet/cluster-model';

export type TokenProvider = string | (() => string | null | undefined | Promise<string | null | undefined>);

export interface HpcFleetClientOptions {
  baseUrl: string;
  token?: TokenProvider;
  userAgent?: string;
  fetchTimeoutMs?: number;
}

export type QueryValue = string | number | boolean | string[] | undefined;

export interface RegionOptions {
  region?: string;
}

export interface PageOptions extends RegionOptions {
  nextToken?: string;
}

export interface ValidationOptions extends RegionOptions {
  suppressValidators?: string[];
  validationFailureLevel?: ValidationLevel;
  dryrun?: boolean;
  clientToken?: string;
}

export interface CreateClusterInput extends ValidationOptions {
  clusterName: string;
  clusterConfiguration: string;
  rollbackOnFailure?: boolean;
}

export interface UpdateClusterInput extends ValidationOptions {
  clusterName: string;
  clusterConfiguration: string;
  forceUpdate?: boolean;
}

export interface DeleteClusterInput extends RegionOptions {
  clusterName: string;
  clientToken?: string;
}

export interface ListClustersInput extends PageOptions {
  clusterStatus?: ClusterStatus[];
}

export interface UpdateComputeFleetInput extends RegionOptions {
  clusterName: string;
  status: RequestedComputeFleetStatus;
}

export interface DescribeClusterInstancesInput extends PageOptions {
  clusterName: string;
  nodeType?: NodeType;
  queueName?: string;
}

export interface DeleteClusterInstancesInput extends RegionOptions {
  clusterName: string;
  force?: boolean;
}

export interface ListLogStreamsInput extends PageOptions {
  filters?: string[];
}

export interface GetLogEventsInput extends PageOptions {
  logStreamName: string;
  startFromHead?: boolean;
  limit?: number;
  startTime?: string;
  endTime?: string;
}

export interface BuildImageInput extends ValidationOptions {
  imageId: string;
  imageConfiguration: string;
  rollbackOnFailure?: boolean;
}

export interface ListImagesInput extends PageOptions {
  imageStatus: ImageStatusFilteringOption;
}

export interface DeleteImageInput extends RegionOptions {
  imageId: string;
  force?: boolean;
}

export interface ListOfficialImagesInput extends RegionOptions {
  os?: string;
  architecture?: string;
}
