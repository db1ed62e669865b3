import type { CloudFormationStackStatus, ComputeFleetStatus, Ec2Lookup } from '@hpcfleet/cluster-model';

export interface Page<T> {
  items: T[];
  nextToken?: string;
}

export interface StackRecord {
  stackName: string;
  stackId: string;
  status: CloudFormationStackStatus;
  statusReason?: string;
  creationTime: Date;
  lastUpdatedTime?: Date;
  tags: Record<string, string>;
  outputs: Record<string, string>;
  parentId?: string;
}

export interface StackEventRecord {
  stackId: string;
  eventId: string;
  stackName: string;
  logicalResourceId: string;
  physicalResourceId: string;
  resourceType: string;
  timestamp: Date;
  resourceStatus: string;
  resourceStatusReason?: string;
  resourceProperties?: string;
  clientRequestToken?: string;
}

export interface StackSubmission {
  stackName: string;
  templateUrl: string;
  tags: Record<string, string>;
  clientRequestToken?: string;
}

export interface CloudFormationGateway {
  describeStack(stackName: string): Promise<StackRecord | null>;
  listStacks(nextToken?: string): Promise<Page<StackRecord>>;
  createStack(input: StackSubmission & { disableRollback: boolean }): Promise<string>;
  updateStack(input: StackSubmission): Promise<void>;
  deleteStack(stackName: string, clientRequestToken?: string): Promise<void>;
  describeStackEvents(stackName: string, nextToken?: string): Promise<Page<StackEventRecord>>;
}

export interface Ec2Filter {
  name: string;
  values: string[];
}

export interface InstanceRecord {
  instanceId: string;
  instanceType: string;
  launchTime: Date;
  state: string;
  privateIpAddress: string;
  publicIpAddress?: string;
  privateDnsName: string;
  imageId?: string;
  tags: Record<string, string>;
}

export interface AmiRecord {
  imageId: string;
  name?: string;
  architecture?: string;
  state?: string;
  description?: string;
  creationDate?: string;
  tags: Record<string, string>;
  snapshotIds: string[];
}

export interface Ec2Gateway extends Ec2Lookup {
  describeInstances(filters: Ec2Filter[], nextToken?: string): Promise<Page<InstanceRecord>>;
  terminateInstances(instanceIds: string[]): Promise<void>;
  describeAmis(query: { owners?: string[]; filters?: Ec2Filter[]; imageIds?: string[] }): Promise<AmiRecord[]>;
  deregisterImage(imageId: string): Promise<void>;
  deleteSnapshot(snapshotId: string): Promise<void>;
}

export interface LogStreamRecord {
  logStreamName: string;
  creationTime: number;
  firstEventTimestamp?: number;
  lastEventTimestamp?: number;
  lastIngestionTime?: number;
  uploadSequenceToken?: string;
  arn: string;
}

export interface LogEventRecord {
  timestamp: number;
  message: string;
}

export interface LogEventsQuery {
  logGroupName: string;
  logStreamName: string;
  startTime?: Date;
  endTime?: Date;
  startFromHead?: boolean;
  limit?: number;
  nextToken?: string;
}

export interface LogEventsPage {
  events: LogEventRecord[];
  nextForwardToken?: string;
  nextBackwardToken?: string;
}

export interface CloudWatchLogsGateway {
  logGroupExists(logGroupName: string): Promise<boolean>;
  describeLogStreams(input: { logGroupName: string; prefix?: string; nextToken?: string }): Promise<Page<LogStreamRecord>>;
  getLogEvents(query: LogEventsQuery): Promise<LogEventsPage>;
}

export interface FleetStatusItem {
  status: string;
  lastStatusUpdatedTime?: string;
}

export interface FleetStatusUpdate {
  expected: ComputeFleetStatus;
  next: ComputeFleetStatus;
  updatedAt: string;
}

export interface ComputeFleetStatusTable {
  getStatus(tableName: string): Promise<FleetStatusItem | null>;
  /** Writes `next` only while the stored status still equals `expected`. */
  updateStatusIfCurrent(tableName: string, update: FleetStatusUpdate): Promise<void>;
}

export type ComputeEnvironmentState = 'ENABLED' | 'DISABLED';

export interface BatchGateway {
  getComputeEnvironmentState(arn: string): Promise<ComputeEnvironmentState | null>;
  updateComputeEnvironmentState(arn: string, state: ComputeEnvironmentState): Promise<void>;
}

export interface ArtifactStore {
  readonly bucket: string;
  putObject(key: string, body: string, contentType: string): Promise<void>;
  getObjectText(key: string): Promise<string | null>;
  presignGetUrl(key: string, expiresInSeconds: number): Promise<string>;
  deletePrefix(prefix: string): Promise<void>;
  objectUrl(key: string): string;
}

export interface AwsGateways {
  region: string;
  cloudFormation: CloudFormationGateway;
  ec2: Ec2Gateway;
  logs: CloudWatchLogsGateway;
  fleetStatus: ComputeFleetStatusTable;
  batch: BatchGateway;
  artifacts: ArtifactStore;
}

export type AwsGatewayFactory = (region: string) => AwsGateways;
