import { z } from 'zod';

import { SUPPORTED_ARCHITECTURES, SUPPORTED_OSES, SUPPORTED_SCHEDULERS } from './constants';

export const cloudFormationStackStatusSchema = z.enum([
  'CREATE_IN_PROGRESS',
  'CREATE_FAILED',
  'CREATE_COMPLETE',
  'ROLLBACK_IN_PROGRESS',
  'ROLLBACK_FAILED',
  'ROLLBACK_COMPLETE',
  'DELETE_IN_PROGRESS',
  'DELETE_FAILED',
  'DELETE_COMPLETE',
  'UPDATE_IN_PROGRESS',
  'UPDATE_COMPLETE_CLEANUP_IN_PROGRESS',
  'UPDATE_COMPLETE',
  'UPDATE_FAILED',
  'UPDATE_ROLLBACK_IN_PROGRESS',
  'UPDATE_ROLLBACK_FAILED',
  'UPDATE_ROLLBACK_COMPLETE_CLEANUP_IN_PROGRESS',
  'UPDATE_ROLLBACK_COMPLETE',
  'REVIEW_IN_PROGRESS',
  'IMPORT_IN_PROGRESS',
  'IMPORT_COMPLETE',
  'IMPORT_ROLLBACK_IN_PROGRESS',
  'IMPORT_ROLLBACK_FAILED',
  'IMPORT_ROLLBACK_COMPLETE'
]);

export const clusterStatusSchema = z.enum([
  'CREATE_IN_PROGRESS',
  'CREATE_FAILED',
  'CREATE_COMPLETE',
  'DELETE_IN_PROGRESS',
  'DELETE_FAILED',
  'DELETE_COMPLETE',
  'UPDATE_IN_PROGRESS',
  'UPDATE_COMPLETE',
  'UPDATE_FAILED'
]);

export const computeFleetStatusSchema = z.enum([
  'START_REQUESTED',
  'STARTING',
  'RUNNING',
  'PROTECTED',
  'STOP_REQUESTED',
  'STOPPING',
  'STOPPED',
  'UNKNOWN',
  'ENABLED',
  'DISABLED'
]);

export const requestedComputeFleetStatusSchema = z.enum([
  'START_REQUESTED',
  'STOP_REQUESTED',
  'ENABLED',
  'DISABLED'
]);

export const instanceStateSchema = z.enum(['pending', 'running', 'shutting-down', 'terminated', 'stopping', 'stopped']);

export const nodeTypeSchema = z.enum(['HEAD', 'COMPUTE']);

export const validationLevelSchema = z.enum(['INFO', 'WARNING', 'ERROR']);

export const imageBuildStatusSchema = z.enum([
  'BUILD_IN_PROGRESS',
  'BUILD_FAILED',
  'BUILD_COMPLETE',
  'DELETE_IN_PROGRESS',
  'DELETE_FAILED',
  'DELETE_COMPLETE'
]);

export const imageStatusFilteringOptionSchema = z.enum(['AVAILABLE', 'PENDING', 'FAILED']);

export const schedulerTypeSchema = z.enum(SUPPORTED_SCHEDULERS);
export const osSchema = z.enum(SUPPORTED_OSES);
export const architectureSchema = z.enum(SUPPORTED_ARCHITECTURES);

export const configValidationMessageSchema = z.object({
  id: z.string().optional(),
  type: z.string(),
  level: validationLevelSchema,
  message: z.string()
});

export const changeSchema = z.object({
  parameter: z.string(),
  currentValue: z.string().nullable(),
  requestedValue: z.string().nullable()
});

export const updateErrorSchema = changeSchema.extend({
  message: z.string()
});

export const tagSchema = z.object({
  key: z.string(),
  value: z.string()
});

export const schedulerSchema = z.object({
  type: schedulerTypeSchema
});

export const clusterInfoSummarySchema = z.object({
  clusterName: z.string(),
  region: z.string(),
  version: z.string(),
  cloudformationStackArn: z.string(),
  cloudformationStackStatus: cloudFormationStackStatusSchema,
  clusterStatus: clusterStatusSchema,
  scheduler: schedulerSchema.optional()
});

export const ec2InstanceSchema = z.object({
  instanceId: z.string(),
  instanceType: z.string(),
  launchTime: z.string(),
  privateIpAddress: z.string(),
  publicIpAddress: z.string().optional(),
  state: instanceStateSchema
});

export const clusterInstanceSchema = ec2InstanceSchema.extend({
  nodeType: nodeTypeSchema,
  queueName: z.string().optional(),
  computeResourceName: z.string().optional()
});

export const failureSchema = z.object({
  failureCode: z.string(),
  failureReason: z.string()
});

export const describeClusterResponseSchema = z.object({
  clusterName: z.string(),
  region: z.string(),
  version: z.string(),
  cloudFormationStackStatus: cloudFormationStackStatusSchema,
  clusterStatus: clusterStatusSchema,
  scheduler: schedulerSchema.optional(),
  cloudformationStackArn: z.string(),
  creationTime: z.string(),
  lastUpdatedTime: z.string(),
  clusterConfiguration: z.object({ url: z.string() }),
  computeFleetStatus: computeFleetStatusSchema,
  tags: z.array(tagSchema),
  headNode: ec2InstanceSchema.optional(),
  failures: z.array(failureSchema).optional()
});

export const computeFleetStatusResponseSchema = z.object({
  status: computeFleetStatusSchema,
  lastStatusUpdatedTime: z.string().optional()
});

export const logStreamSchema = z.object({
  logStreamName: z.string(),
  creationTime: z.string(),
  firstEventTimestamp: z.string().optional(),
  lastEventTimestamp: z.string().optional(),
  lastIngestionTime: z.string().optional(),
  uploadSequenceToken: z.string().optional(),
  logStreamArn: z.string()
});

export const logEventSchema = z.object({
  timestamp: z.string(),
  message: z.string()
});

export const stackEventSchema = z.object({
  stackId: z.string(),
  eventId: z.string(),
  stackName: z.string(),
  logicalResourceId: z.string(),
  physicalResourceId: z.string(),
  resourceType: z.string(),
  timestamp: z.string(),
  resourceStatus: z.string(),
  resourceStatusReason: z.string().optional(),
  resourceProperties: z.string().optional(),
  clientRequestToken: z.string().optional()
});

export const ec2AmiInfoSchema = z.object({
  amiId: z.string(),
  amiName: z.string().optional(),
  architecture: z.string().optional(),
  state: z.string().optional(),
  description: z.string().optional(),
  tags: z.array(tagSchema).optional()
});

export const imageInfoSummarySchema = z.object({
  imageId: z.string(),
  ec2AmiInfo: ec2AmiInfoSchema.optional(),
  region: z.string(),
  version: z.string(),
  cloudformationStackArn: z.string().optional(),
  imageBuildStatus: imageBuildStatusSchema,
  cloudformationStackStatus: cloudFormationStackStatusSchema.optional()
});

export const describeImageResponseSchema = z.object({
  imageId: z.string(),
  region: z.string(),
  version: z.string(),
  imageBuildStatus: imageBuildStatusSchema,
  imageConfiguration: z.object({ url: z.string() }),
  creationTime: z.string().optional(),
  ec2AmiInfo: ec2AmiInfoSchema.optional(),
  cloudformationStackArn: z.string().optional(),
  cloudformationStackStatus: cloudFormationStackStatusSchema.optional(),
  cloudformationStackStatusReason: z.string().optional(),
  cloudformationStackCreationTime: z.string().optional(),
  cloudformationStackTags: z.array(tagSchema).optional(),
  imageBuildLogsArn: z.string().optional()
});

export const amiInfoSchema = z.object({
  amiId: z.string(),
  name: z.string(),
  os: z.string(),
  architecture: z.string(),
  version: z.string()
});

export const createClusterRequestSchema = z.object({
  clusterName: z.string(),
  clusterConfiguration: z.string(),
  region: z.string().optional()
});

export const updateClusterRequestSchema = z.object({
  clusterConfiguration: z.string()
});

export const updateComputeFleetRequestSchema = z.object({
  status: requestedComputeFleetStatusSchema
});

export const buildImageRequestSchema = z.object({
  imageId: z.string(),
  imageConfiguration: z.string(),
  region: z.string().optional()
});

export type CloudFormationStackStatus = z.infer<typeof cloudFormationStackStatusSchema>;
export type ClusterStatus = z.infer<typeof clusterStatusSchema>;
export type ComputeFleetStatus = z.infer<typeof computeFleetStatusSchema>;
export type RequestedComputeFleetStatus = z.infer<typeof requestedComputeFleetStatusSchema>;
export type InstanceState = z.infer<typeof instanceStateSchema>;
export type NodeType = z.infer<typeof nodeTypeSchema>;
export type ValidationLevel = z.infer<typeof validationLevelSchema>;
export type ImageBuildStatus = z.infer<typeof imageBuildStatusSchema>;
export type ImageStatusFilteringOption = z.infer<typeof imageStatusFilteringOptionSchema>;
export type ConfigValidationMessage = z.infer<typeof configValidationMessageSchema>;
export type Change = z.infer<typeof changeSchema>;
export type UpdateError = z.infer<typeof updateErrorSchema>;
export type Tag = z.infer<typeof tagSchema>;
export type ClusterInfoSummary = z.infer<typeof clusterInfoSummarySchema>;
export type EC2Instance = z.infer<typeof ec2InstanceSchema>;
export type ClusterInstance = z.infer<typeof clusterInstanceSchema>;
export type Failure = z.infer<typeof failureSchema>;
export type DescribeClusterResponse = z.infer<typeof describeClusterResponseSchema>;
export type ComputeFleetStatusResponse = z.infer<typeof computeFleetStatusResponseSchema>;
export type LogStream = z.infer<typeof logStreamSchema>;
export type LogEvent = z.infer<typeof logEventSchema>;
export type StackEvent = z.infer<typeof stackEventSchema>;
export type Ec2AmiInfo = z.infer<typeof ec2AmiInfoSchema>;
export type ImageInfoSummary = z.infer<typeof imageInfoSummarySchema>;
export type DescribeImageResponse = z.infer<typeof describeImageResponseSchema>;
export type AmiInfo = z.infer<typeof amiInfoSchema>;
export type CreateClusterRequest = z.infer<typeof createClusterRequestSchema>;
export type UpdateClusterRequest = z.infer<typeof updateClusterRequestSchema>;
export type UpdateComputeFleetRequest = z.infer<typeof updateComputeFleetRequestSchema>;
export type BuildImageRequest = z.infer<typeof buildImageRequestSchema>;

export interface CreateClusterResponse {
  cluster: ClusterInfoSummary;
  validationMessages?: ConfigValidationMessage[];
}

export interface UpdateClusterResponse {
  cluster: ClusterInfoSummary;
  validationMessages?: ConfigValidationMessage[];
  changeSet: Change[];
}

export interface DeleteClusterResponse {
  cluster: ClusterInfoSummary;
}

export interface ListClustersResponse {
  clusters: ClusterInfoSummary[];
  nextToken?: string;
}

export interface DescribeClusterInstancesResponse {
  instances: ClusterInstance[];
  nextToken?: string;
}

export interface ListLogStreamsResponse {
  logStreams: LogStream[];
  nextToken?: string;
}

export interface GetLogEventsResponse {
  events: LogEvent[];
  nextToken?: string;
  prevToken?: string;
}

export interface GetStackEventsResponse {
  events: StackEvent[];
  nextToken?: string;
}

export interface BuildImageResponse {
  image: ImageInfoSummary;
  validationMessages?: ConfigValidationMessage[];
}

export interface DeleteImageResponse {
  image: ImageInfoSummary;
}

export interface ListImagesResponse {
  images: ImageInfoSummary[];
  nextToken?: string;
}

export interface DescribeOfficialImagesResponse {
  images: AmiInfo[];
}
