import {
  BadRequestException,
  CLUSTER_ARTIFACTS_PREFIX,
  CLUSTER_CONFIG_KEY,
  CLUSTER_IMPLIED_CONFIG_KEY,
  CLUSTER_TEMPLATE_KEY,
  CLUSTER_VALIDATORS,
  ConflictException,
  CreateClusterBadRequestException,
  DryrunOperationException,
  HPCFLEET_VERSION,
  InternalServiceException,
  TAGS,
  UpdateClusterBadRequestException,
  checkChangeSet,
  computeChangeSet,
  dumpConfig,
  isExactVersion,
  isFailedClusterStatus,
  isStableClusterStackStatus,
  parseClusterConfig,
  toChangeSet,
  toClusterStatus,
  toIsoTimestamp,
  type ClusterConfig,
  type ClusterStatus,
  type CreateClusterRequest,
  type CreateClusterResponse,
  type DeleteClusterResponse,
  type DescribeClusterResponse,
  type Failure,
  type ListClustersResponse,
  type UpdateClusterRequest,
  type UpdateClusterResponse
} from '@hpcfleet/cluster-model';
import { customAlphabet } from 'nanoid';

import type { AwsGateways, StackRecord } from '../aws';
import { toTagList } from '../common/stacks';
import { reportedMessages, validateConfiguration, type ValidationOptions } from '../common/validation';
import { latestOfficialImage } from '../images/officialImages';
import type { Logger } from '../logger';
import { buildClusterTemplate } from './clusterTemplate';
import type { ComputeFleetService } from './computeFleet';
import { clusterInstanceFilters, describeAllInstances, findHeadNode, toEc2Instance } from './instances';
import {
  assertMajorCompatible,
  isClusterStack,
  requireArtifacts,
  requireClusterStack,
  toClusterSummary,
  validateClusterName
} from './stacks';

export interface CreateClusterOptions extends ValidationOptions {
  rollbackOnFailure?: boolean;
  clientToken?: string;
}

export interface UpdateClusterOptions extends ValidationOptions {
  forceUpdate?: boolean;
  clientToken?: string;
}

export interface ClusterServiceOptions {
  logger: Logger;
  computeFleet: ComputeFleetService;
  officialImageOwners: string[];
  generateSuffix?: () => string;
  presignExpirySeconds?: number;
}

const INVALID_CONFIGURATION = 'Invalid cluster configuration.';

const FAILURE_CODES: Partial<Record<ClusterStatus, string>> = {
  CREATE_FAILED: 'ClusterCreationFailure',
  UPDATE_FAILED: 'ClusterUpdateFailure',
  DELETE_FAILED: 'ClusterDeletionFailure'
};

const defaultSuffix = customAlphabet('abcdefghijklmnopqrstuvwxyz0123456789', 16);

const assertRegionMatches = (config: ClusterConfig, region: string) => {
  if (config.Region && config.Region !== region) {
    throw new BadRequestException(
      `region is set in both parameter and configuration with conflicting values: ${region} != ${config.Region}`
    );
  }
};

export class ClusterService {
  private readonly logger: Logger;
  private readonly generateSuffix: () => string;
  private readonly presignExpirySeconds: number;

  constructor(private readonly options: ClusterServiceOptions) {
    this.logger = options.logger;
    this.generateSuffix = options.generateSuffix ?? defaultSuffix;
    this.presignExpirySeconds = options.presignExpirySeconds ?? 3600;
  }

  async createCluster(
    gateways: AwsGateways,
    request: CreateClusterRequest,
    options: CreateClusterOptions = {}
  ): Promise<CreateClusterResponse> {
    const { clusterName } = request;
    validateClusterName(clusterName);
    if (!request.clusterConfiguration.trim()) {
      throw new BadRequestException('configuration is required and cannot be empty');
    }

    const existing = await gateways.cloudFormation.describeStack(clusterName);
    if (existing && existing.status !== 'DELETE_COMPLETE') {
      throw new ConflictException(`cluster '${clusterName}' already exists`);
    }

    const parsed = parseClusterConfig(request.clusterConfiguration);
    if (!parsed.success) {
      throw new CreateClusterBadRequestException(INVALID_CONFIGURATION, parsed.messages);
    }
    const config = parsed.config;
    assertRegionMatches(config, gateways.region);

    const outcome = await validateConfiguration(CLUSTER_VALIDATORS, config, gateways.ec2, options);
    if (outcome.failed) {
      throw new CreateClusterBadRequestException(INVALID_CONFIGURATION, outcome.messages);
    }
    const validationMessages = reportedMessages(outcome.messages);
    if (options.dryrun) {
      throw new DryrunOperationException({ validationMessages });
    }

    const artifacts = requireArtifacts(gateways);
    const artifactDirectory = `${CLUSTER_ARTIFACTS_PREFIX}/${clusterName}-${this.generateSuffix()}`;
    let stackId: string;
    try {
      const templateUrl = await this.uploadArtifacts(gateways, clusterName, config, request.clusterConfiguration, artifactDirectory);
      stackId = await gateways.cloudFormation.createStack({
        stackName: clusterName,
        templateUrl,
        tags: this.stackTags(clusterName, config, artifacts.bucket, artifactDirectory),
        disableRollback: options.rollbackOnFailure === false,
        clientRequestToken: options.clientToken
      });
    } catch (error) {
      await this.cleanupArtifacts(gateways, artifactDirectory);
      throw error;
    }
    this.logger.info({ clusterName, region: gateways.region, stackId }, 'Cluster creation submitted');

    return {
      cluster: {
        clusterName,
        region: gateways.region,
        version: HPCFLEET_VERSION,
        cloudformationStackArn: stackId,
        cloudformationStackStatus: 'CREATE_IN_PROGRESS',
        clusterStatus: 'CREATE_IN_PROGRESS',
        scheduler: { type: config.Scheduling.Scheduler }
      },
      validationMessages
    };
  }

  async listClusters(
    gateways: AwsGateways,
    query: { nextToken?: string; clusterStatus?: ClusterStatus[] } = {}
  ): Promise<ListClustersResponse> {
    const page = await gateways.cloudFormation.listStacks(query.nextToken);
    const statuses = query.clusterStatus && query.clusterStatus.length > 0 ? new Set(query.clusterStatus) : null;
    const clusters = page.items
      .filter(isClusterStack)
      .filter((stack) => !statuses || statuses.has(toClusterStatus(stack.status)))
      .map((stack) => toClusterSummary(stack, gateways.region));
    return { clusters, nextToken: page.nextToken };
  }

  async describeCluster(gateways: AwsGateways, clusterName: string): Promise<DescribeClusterResponse> {
    const stack = await requireClusterStack(gateways, clusterName);
    assertMajorCompatible(stack);

    const summary = toClusterSummary(stack, gateways.region);
    const [configurationUrl, fleet, headNode] = await Promise.all([
      this.configurationUrl(gateways, stack),
      this.options.computeFleet.statusOf(gateways, stack),
      findHeadNode(gateways.ec2, clusterName)
    ]);

    const response: DescribeClusterResponse = {
      clusterName: summary.clusterName,
      region: summary.region,
      version: summary.version,
      cloudFormationStackStatus: stack.status,
      clusterStatus: summary.clusterStatus,
      scheduler: summary.scheduler,
      cloudformationStackArn: stack.stackId,
      creationTime: toIsoTimestamp(stack.creationTime),
      lastUpdatedTime: toIsoTimestamp(stack.lastUpdatedTime ?? stack.creationTime),
      clusterConfiguration: { url: configurationUrl },
      computeFleetStatus: fleet.status,
      tags: toTagList(stack.tags)
    };
    if (headNode) {
      response.headNode = toEc2Instance(headNode);
    }
    if (isFailedClusterStatus(summary.clusterStatus)) {
      response.failures = [this.failureOf(stack, summary.clusterStatus)];
    }
    return response;
  }

  async updateCluster(
    gateways: AwsGateways,
    clusterName: string,
    request: UpdateClusterRequest,
    options: UpdateClusterOptions = {}
  ): Promise<UpdateClusterResponse> {
    const stack = await requireClusterStack(gateways, clusterName);
    if (!isExactVersion(stack.tags[TAGS.version], HPCFLEET_VERSION)) {
      throw new BadRequestException(
        `cluster '${clusterName}' can be updated only with the same hpcfleet version used to create it.`
      );
    }
    if (!isStableClusterStackStatus(stack.status)) {
      throw new BadRequestException(`cluster '${clusterName}' is in '${stack.status}' state and cannot be updated.`);
    }

    const parsed = parseClusterConfig(request.clusterConfiguration);
    if (!parsed.success) {
      throw new UpdateClusterBadRequestException(INVALID_CONFIGURATION, {
        configurationValidationErrors: parsed.messages
      });
    }
    const config = parsed.config;
    assertRegionMatches(config, gateways.region);

    const outcome = await validateConfiguration(CLUSTER_VALIDATORS, config, gateways.ec2, options);
    if (outcome.failed) {
      throw new UpdateClusterBadRequestException(INVALID_CONFIGURATION, {
        configurationValidationErrors: outcome.messages
      });
    }
    const validationMessages = reportedMessages(outcome.messages);

    const current = await this.currentConfig(gateways, stack);
    const changes = computeChangeSet(current, config);
    if (changes.length === 0) {
      throw new BadRequestException('No changes found in your cluster configuration.');
    }
    const changeSet = toChangeSet(changes);

    const fleet = await this.options.computeFleet.statusOf(gateways, stack);
    const updateValidationErrors = checkChangeSet(changes, {
      fleetStopped: fleet.status === 'STOPPED' || fleet.status === 'DISABLED',
      forceUpdate: options.forceUpdate ?? false
    });
    if (updateValidationErrors.length > 0) {
      throw new UpdateClusterBadRequestException('Update failure', { updateValidationErrors, changeSet });
    }
    if (options.dryrun) {
      throw new DryrunOperationException({ changeSet, validationMessages });
    }

    // New directory per update: the cluster_dir tag rolls back with the stack and keeps naming the deployed config.
    const artifacts = requireArtifacts(gateways);
    const artifactDirectory = `${CLUSTER_ARTIFACTS_PREFIX}/${clusterName}-${this.generateSuffix()}`;
    try {
      const templateUrl = await this.uploadArtifacts(gateways, clusterName, config, request.clusterConfiguration, artifactDirectory);
      await gateways.cloudFormation.updateStack({
        stackName: clusterName,
        templateUrl,
        tags: this.stackTags(clusterName, config, artifacts.bucket, artifactDirectory),
        clientRequestToken: options.clientToken
      });
    } catch (error) {
      await this.cleanupArtifacts(gateways, artifactDirectory);
      throw error;
    }
    this.logger.info({ clusterName, region: gateways.region, changes: changeSet.length }, 'Cluster update submitted');

    return {
      cluster: {
        ...toClusterSummary(stack, gateways.region),
        cloudformationStackStatus: 'UPDATE_IN_PROGRESS',
        clusterStatus: 'UPDATE_IN_PROGRESS'
      },
      validationMessages,
      changeSet
    };
  }

  async deleteCluster(gateways: AwsGateways, clusterName: string, clientToken?: string): Promise<DeleteClusterResponse> {
    const stack = await requireClusterStack(gateways, clusterName);
    if (stack.status === 'DELETE_IN_PROGRESS') {
      return { cluster: toClusterSummary(stack, gateways.region) };
    }

    await gateways.cloudFormation.deleteStack(clusterName, clientToken);
    const compute = await describeAllInstances(gateways.ec2, clusterInstanceFilters(clusterName, { nodeType: 'COMPUTE' }));
    await gateways.ec2.terminateInstances(compute.map((instance) => instance.instanceId));
    this.logger.info({ clusterName, region: gateways.region, terminated: compute.length }, 'Cluster deletion submitted');

    return {
      cluster: {
        ...toClusterSummary(stack, gateways.region),
        cloudformationStackStatus: 'DELETE_IN_PROGRESS',
        clusterStatus: 'DELETE_IN_PROGRESS'
      }
    };
  }

  private stackTags(clusterName: string, config: ClusterConfig, bucket: string, artifactDirectory: string) {
    const tags: Record<string, string> = {};
    for (const tag of config.Tags ?? []) {
      tags[tag.Key] = tag.Value;
    }
    return {
      ...tags,
      [TAGS.version]: HPCFLEET_VERSION,
      [TAGS.clusterName]: clusterName,
      [TAGS.scheduler]: config.Scheduling.Scheduler,
      [TAGS.s3Bucket]: bucket,
      [TAGS.clusterDir]: artifactDirectory
    };
  }

  /** Writes the configuration files and the template; returns the template URL. */
  private async uploadArtifacts(
    gateways: AwsGateways,
    clusterName: string,
    config: ClusterConfig,
    source: string,
    artifactDirectory: string
  ): Promise<string> {
    const artifacts = requireArtifacts(gateways);
    const [vpcId, imageId] = await Promise.all([this.resolveVpc(gateways, config), this.resolveImage(gateways, config)]);
    const template = buildClusterTemplate({
      clusterName,
      region: gateways.region,
      version: HPCFLEET_VERSION,
      config,
      vpcId,
      imageId,
      artifactsBucket: artifacts.bucket,
      artifactDirectory
    });

    const templateKey = `${artifactDirectory}/${CLUSTER_TEMPLATE_KEY}`;
    await artifacts.putObject(`${artifactDirectory}/${CLUSTER_CONFIG_KEY}`, source, 'application/yaml');
    await artifacts.putObject(`${artifactDirectory}/${CLUSTER_IMPLIED_CONFIG_KEY}`, dumpConfig(config), 'application/yaml');
    await artifacts.putObject(templateKey, JSON.stringify(template, null, 2), 'application/json');
    return artifacts.objectUrl(templateKey);
  }

  private async cleanupArtifacts(gateways: AwsGateways, artifactDirectory: string): Promise<void> {
    try {
      await gateways.artifacts.deletePrefix(`${artifactDirectory}/`);
    } catch (error) {
      this.logger.warn({ err: error, artifactDirectory }, 'Failed to remove cluster artifacts');
    }
  }

  private async resolveVpc(gateways: AwsGateways, config: ClusterConfig): Promise<string> {
    const subnetId = config.HeadNode.Networking.SubnetId;
    const subnets = await gateways.ec2.describeSubnets([subnetId]);
    const subnet = subnets.get(subnetId);
    if (!subnet) {
      throw new BadRequestException(`subnet '${subnetId}' does not exist.`);
    }
    return subnet.vpcId;
  }

  private async resolveImage(gateways: AwsGateways, config: ClusterConfig): Promise<string> {
    if (config.Image.CustomAmi) {
      return config.Image.CustomAmi;
    }
    const instanceType = config.HeadNode.InstanceType;
    const types = await gateways.ec2.describeInstanceTypes([instanceType]);
    const architecture = types.get(instanceType)?.architectures[0];
    if (!architecture) {
      throw new BadRequestException(`unable to determine the architecture of instance type '${instanceType}'.`);
    }
    const image = await latestOfficialImage(gateways.ec2, this.options.officialImageOwners, {
      version: HPCFLEET_VERSION,
      os: config.Image.Os,
      architecture
    });
    if (!image) {
      throw new BadRequestException(
        `no official image found for os '${config.Image.Os}' and architecture '${architecture}'.`
      );
    }
    return image.info.amiId;
  }

  private async currentConfig(gateways: AwsGateways, stack: StackRecord): Promise<ClusterConfig> {
    const directory = stack.tags[TAGS.clusterDir];
    const source = directory
      ? await requireArtifacts(gateways).getObjectText(`${directory}/${CLUSTER_IMPLIED_CONFIG_KEY}`)
      : null;
    const parsed = source ? parseClusterConfig(source) : null;
    if (!parsed || !parsed.success) {
      throw new InternalServiceException(`unable to load the configuration of cluster '${stack.stackName}'.`);
    }
    return parsed.config;
  }

  private async configurationUrl(gateways: AwsGateways, stack: StackRecord): Promise<string> {
    const directory = stack.tags[TAGS.clusterDir];
    if (!directory || !gateways.artifacts.bucket) {
      return 'NOT_AVAILABLE';
    }
    try {
      return await gateways.artifacts.presignGetUrl(`${directory}/${CLUSTER_CONFIG_KEY}`, this.presignExpirySeconds);
    } catch (error) {
      this.logger.warn({ err: error, clusterName: stack.stackName }, 'Cluster configuration URL unavailable');
      return 'NOT_AVAILABLE';
    }
  }

  private failureOf(stack: StackRecord, status: ClusterStatus): Failure {
    return {
      failureCode: FAILURE_CODES[status] ?? 'ClusterFailure',
      failureReason: stack.statusReason ?? `Cluster is in ${status} state.`
    };
  }
}
