import {
  BadRequestException,
  BuildImageBadRequestException,
  ConflictException,
  DryrunOperationException,
  HPCFLEET_VERSION,
  IMAGE_ARTIFACTS_PREFIX,
  IMAGE_CONFIG_KEY,
  IMAGE_ID_PATTERN,
  IMAGE_TEMPLATE_KEY,
  IMAGE_VALIDATORS,
  NotFoundException,
  SUPPORTED_ARCHITECTURES,
  SUPPORTED_OSES,
  TAGS,
  imageLogGroupName,
  parseImageConfig,
  toImageBuildStatus,
  toIsoTimestamp,
  type BuildImageRequest,
  type BuildImageResponse,
  type CloudFormationStackStatus,
  type DeleteImageResponse,
  type DescribeImageResponse,
  type DescribeOfficialImagesResponse,
  type Ec2AmiInfo,
  type GetLogEventsResponse,
  type GetStackEventsResponse,
  type ImageInfoSummary,
  type ImageStatusFilteringOption,
  type ListImagesResponse,
  type ListLogStreamsResponse
} from '@hpcfleet/cluster-model';
import { customAlphabet } from 'nanoid';

import type { AmiRecord, AwsGateways, StackRecord } from '../aws';
import { getLogEvents, listLogStreams, parseLogEventsRequest, type LogEventsRequest } from '../common/logs';
import { getStackEvents, stackVersion, toTagList } from '../common/stacks';
import { reportedMessages, validateConfiguration, type ValidationOptions } from '../common/validation';
import { requireArtifacts } from '../clusters/stacks';
import type { Logger } from '../logger';
import { buildImageTemplate } from './imageTemplate';
import { listOfficialImages } from './officialImages';

export interface BuildImageOptions extends ValidationOptions {
  rollbackOnFailure?: boolean;
  clientToken?: string;
}

export interface ImageServiceOptions {
  logger: Logger;
  officialImageOwners: string[];
  generateSuffix?: () => string;
  presignExpirySeconds?: number;
}

const PENDING_STATUSES: ReadonlySet<CloudFormationStackStatus> = new Set(['CREATE_IN_PROGRESS', 'DELETE_IN_PROGRESS']);
const FAILED_STATUSES: ReadonlySet<CloudFormationStackStatus> = new Set([
  'CREATE_FAILED',
  'ROLLBACK_IN_PROGRESS',
  'ROLLBACK_FAILED',
  'ROLLBACK_COMPLETE',
  'DELETE_FAILED'
]);

const defaultSuffix = customAlphabet('abcdefghijklmnopqrstuvwxyz0123456789', 16);

const isImageStack = (stack: StackRecord): boolean => TAGS.imageId in stack.tags && !stack.parentId;

const toEc2AmiInfo = (ami: AmiRecord): Ec2AmiInfo => ({
  amiId: ami.imageId,
  amiName: ami.name,
  architecture: ami.architecture,
  state: ami.state,
  description: ami.description,
  tags: toTagList(ami.tags)
});

const validateImageId = (imageId: string) => {
  if (!IMAGE_ID_PATTERN.test(imageId)) {
    throw new BadRequestException(
      `Error: The image id '${imageId}' can contain only alphanumeric characters (case-sensitive) and hyphens. ` +
        "It must start with an alphabetic character and can't be longer than 128 characters."
    );
  }
};

export class ImageService {
  private readonly logger: Logger;
  private readonly generateSuffix: () => string;
  private readonly presignExpirySeconds: number;

  constructor(private readonly options: ImageServiceOptions) {
    this.logger = options.logger;
    this.generateSuffix = options.generateSuffix ?? defaultSuffix;
    this.presignExpirySeconds = options.presignExpirySeconds ?? 3600;
  }

  async buildImage(
    gateways: AwsGateways,
    request: BuildImageRequest,
    options: BuildImageOptions = {}
  ): Promise<BuildImageResponse> {
    const { imageId } = request;
    validateImageId(imageId);
    if (!request.imageConfiguration.trim()) {
      throw new BadRequestException('configuration is required and cannot be empty');
    }

    const [ami, stack] = await Promise.all([this.findAmi(gateways, imageId), this.findStack(gateways, imageId)]);
    if (ami || stack) {
      throw new ConflictException(`image '${imageId}' already exists`);
    }

    const parsed = parseImageConfig(request.imageConfiguration);
    if (!parsed.success) {
      throw new BuildImageBadRequestException('Invalid image configuration.', parsed.messages);
    }
    const config = parsed.config;
    if (config.Region && config.Region !== gateways.region) {
      throw new BadRequestException(
        `region is set in both parameter and configuration with conflicting values: ${gateways.region} != ${config.Region}`
      );
    }

    const outcome = await validateConfiguration(IMAGE_VALIDATORS, config, gateways.ec2, options);
    if (outcome.failed) {
      throw new BuildImageBadRequestException('Invalid image configuration.', outcome.messages);
    }
    const validationMessages = reportedMessages(outcome.messages);
    if (options.dryrun) {
      throw new DryrunOperationException({ validationMessages });
    }

    const artifacts = requireArtifacts(gateways);
    const artifactDirectory = `${IMAGE_ARTIFACTS_PREFIX}/${imageId}-${this.generateSuffix()}`;
    const configKey = `${artifactDirectory}/${IMAGE_CONFIG_KEY}`;
    const templateKey = `${artifactDirectory}/${IMAGE_TEMPLATE_KEY}`;
    const template = buildImageTemplate({
      imageId,
      version: HPCFLEET_VERSION,
      config,
      artifactsBucket: artifacts.bucket,
      artifactDirectory
    });

    let stackId: string;
    try {
      await artifacts.putObject(configKey, request.imageConfiguration, 'application/yaml');
      await artifacts.putObject(templateKey, JSON.stringify(template, null, 2), 'application/json');
      stackId = await gateways.cloudFormation.createStack({
        stackName: imageId,
        templateUrl: artifacts.objectUrl(templateKey),
        tags: {
          ...Object.fromEntries((config.Build.Tags ?? []).map((tag) => [tag.Key, tag.Value])),
          [TAGS.imageId]: imageId,
          [TAGS.version]: HPCFLEET_VERSION,
          [TAGS.imageName]: config.Image.Name ?? imageId,
          [TAGS.s3Bucket]: artifacts.bucket,
          [TAGS.imageDir]: artifactDirectory,
          [TAGS.buildConfig]: artifacts.objectUrl(configKey),
          [TAGS.buildLog]: imageLogGroupName(imageId)
        },
        disableRollback: options.rollbackOnFailure === false,
        clientRequestToken: options.clientToken
      });
    } catch (error) {
      try {
        await artifacts.deletePrefix(`${artifactDirectory}/`);
      } catch (cleanupError) {
        this.logger.warn({ err: cleanupError, artifactDirectory }, 'Failed to remove image artifacts');
      }
      throw error;
    }
    this.logger.info({ imageId, region: gateways.region, stackId }, 'Image build submitted');

    return {
      image: {
        imageId,
        region: gateways.region,
        version: HPCFLEET_VERSION,
        cloudformationStackArn: stackId,
        imageBuildStatus: 'BUILD_IN_PROGRESS',
        cloudformationStackStatus: 'CREATE_IN_PROGRESS'
      },
      validationMessages
    };
  }

  async listImages(
    gateways: AwsGateways,
    imageStatus: ImageStatusFilteringOption,
    nextToken?: string
  ): Promise<ListImagesResponse> {
    if (imageStatus === 'AVAILABLE') {
      const amis = await gateways.ec2.describeAmis({
        owners: ['self'],
        filters: [{ name: 'tag-key', values: [TAGS.imageId] }]
      });
      return { images: amis.map((ami) => this.amiSummary(gateways, ami)) };
    }

    const statuses = imageStatus === 'PENDING' ? PENDING_STATUSES : FAILED_STATUSES;
    const page = await gateways.cloudFormation.listStacks(nextToken);
    const images = page.items
      .filter((stack) => isImageStack(stack) && statuses.has(stack.status))
      .map((stack) => this.stackSummary(gateways, stack));
    return { images, nextToken: page.nextToken };
  }

  async describeImage(gateways: AwsGateways, imageId: string): Promise<DescribeImageResponse> {
    validateImageId(imageId);
    const ami = await this.findAmi(gateways, imageId);
    if (ami) {
      return {
        imageId,
        region: gateways.region,
        version: stackVersion(ami.tags),
        imageBuildStatus: 'BUILD_COMPLETE',
        imageConfiguration: { url: await this.configurationUrl(gateways, ami.tags[TAGS.imageDir]) },
        creationTime: ami.creationDate,
        ec2AmiInfo: toEc2AmiInfo(ami)
      };
    }

    const stack = await this.findStack(gateways, imageId);
    if (!stack) {
      throw new NotFoundException(`No image or stack associated with image id '${imageId}'.`);
    }
    return {
      imageId,
      region: gateways.region,
      version: stackVersion(stack.tags),
      imageBuildStatus: toImageBuildStatus(stack.status),
      imageConfiguration: { url: await this.configurationUrl(gateways, stack.tags[TAGS.imageDir]) },
      cloudformationStackArn: stack.stackId,
      cloudformationStackStatus: stack.status,
      cloudformationStackStatusReason: stack.statusReason,
      cloudformationStackCreationTime: toIsoTimestamp(stack.creationTime),
      cloudformationStackTags: toTagList(stack.tags),
      imageBuildLogsArn: stack.tags[TAGS.buildLog]
    };
  }

  async deleteImage(gateways: AwsGateways, imageId: string, force = false): Promise<DeleteImageResponse> {
    validateImageId(imageId);
    const [ami, stack] = await Promise.all([this.findAmi(gateways, imageId), this.findStack(gateways, imageId)]);
    if (!ami && !stack) {
      throw new NotFoundException(`No image or stack associated with image id '${imageId}'.`);
    }

    if (ami) {
      if (!force) {
        const page = await gateways.ec2.describeInstances([
          { name: 'image-id', values: [ami.imageId] },
          { name: 'instance-state-name', values: ['pending', 'running', 'stopping', 'stopped', 'shutting-down'] }
        ]);
        if (page.items.length > 0) {
          const ids = page.items.map((instance) => instance.instanceId).join(', ');
          throw new BadRequestException(
            `image '${imageId}' is used by instances ${ids}. Terminate them or use the force parameter to delete the image.`
          );
        }
      }
      await gateways.ec2.deregisterImage(ami.imageId);
      for (const snapshotId of ami.snapshotIds) {
        await gateways.ec2.deleteSnapshot(snapshotId);
      }
    }
    if (stack && stack.status !== 'DELETE_IN_PROGRESS') {
      await gateways.cloudFormation.deleteStack(stack.stackName);
    }
    this.logger.info({ imageId, region: gateways.region, ami: ami?.imageId }, 'Image deletion submitted');

    return {
      image: {
        imageId,
        region: gateways.region,
        version: stackVersion((ami ?? stack)?.tags ?? {}),
        imageBuildStatus: 'DELETE_IN_PROGRESS',
        ec2AmiInfo: ami ? toEc2AmiInfo(ami) : undefined,
        cloudformationStackArn: stack?.stackId,
        cloudformationStackStatus: stack ? 'DELETE_IN_PROGRESS' : undefined
      }
    };
  }

  async describeOfficialImages(
    gateways: AwsGateways,
    query: { os?: string; architecture?: string } = {}
  ): Promise<DescribeOfficialImagesResponse> {
    const os = query.os === undefined ? undefined : SUPPORTED_OSES.find((value) => value === query.os);
    if (query.os !== undefined && !os) {
      throw new BadRequestException(`os '${query.os}' is not supported. Supported values: ${SUPPORTED_OSES.join(', ')}.`);
    }
    const architecture =
      query.architecture === undefined
        ? undefined
        : SUPPORTED_ARCHITECTURES.find((value) => value === query.architecture);
    if (query.architecture !== undefined && !architecture) {
      throw new BadRequestException(
        `architecture '${query.architecture}' is not supported. Supported values: ${SUPPORTED_ARCHITECTURES.join(', ')}.`
      );
    }
    const images = await listOfficialImages(gateways.ec2, this.options.officialImageOwners, {
      version: HPCFLEET_VERSION,
      os,
      architecture
    });
    return { images: images.map((image) => image.info) };
  }

  async listLogStreams(gateways: AwsGateways, imageId: string, nextToken?: string): Promise<ListLogStreamsResponse> {
    const logGroupName = await this.requireLogGroup(gateways, imageId);
    return listLogStreams(gateways.logs, logGroupName, { nextToken });
  }

  async getLogEvents(
    gateways: AwsGateways,
    imageId: string,
    logStreamName: string,
    request: LogEventsRequest
  ): Promise<GetLogEventsResponse> {
    const options = parseLogEventsRequest(request);
    const logGroupName = await this.requireLogGroup(gateways, imageId);
    return getLogEvents(gateways.logs, logGroupName, logStreamName, options);
  }

  async getStackEvents(gateways: AwsGateways, imageId: string, nextToken?: string): Promise<GetStackEventsResponse> {
    validateImageId(imageId);
    const stack = await this.findStack(gateways, imageId);
    if (!stack) {
      throw new NotFoundException(`Unable to find the stack of image '${imageId}'.`);
    }
    return getStackEvents(gateways.cloudFormation, stack.stackName, nextToken);
  }

  private async requireLogGroup(gateways: AwsGateways, imageId: string): Promise<string> {
    validateImageId(imageId);
    const logGroupName = imageLogGroupName(imageId);
    if (!(await gateways.logs.logGroupExists(logGroupName))) {
      throw new NotFoundException(`Unable to find image logs, please double check if image id=${imageId} is correct.`);
    }
    return logGroupName;
  }

  private async findAmi(gateways: AwsGateways, imageId: string): Promise<AmiRecord | null> {
    const amis = await gateways.ec2.describeAmis({
      owners: ['self'],
      filters: [{ name: `tag:${TAGS.imageId}`, values: [imageId] }]
    });
    return amis[0] ?? null;
  }

  private async findStack(gateways: AwsGateways, imageId: string): Promise<StackRecord | null> {
    const stack = await gateways.cloudFormation.describeStack(imageId);
    return stack && isImageStack(stack) && stack.status !== 'DELETE_COMPLETE' ? stack : null;
  }

  private async configurationUrl(gateways: AwsGateways, directory: string | undefined): Promise<string> {
    if (!directory || !gateways.artifacts.bucket) {
      return 'NOT_AVAILABLE';
    }
    try {
      return await gateways.artifacts.presignGetUrl(`${directory}/${IMAGE_CONFIG_KEY}`, this.presignExpirySeconds);
    } catch (error) {
      this.logger.warn({ err: error, directory }, 'Image configuration URL unavailable');
      return 'NOT_AVAILABLE';
    }
  }

  private amiSummary(gateways: AwsGateways, ami: AmiRecord): ImageInfoSummary {
    return {
      imageId: ami.tags[TAGS.imageId],
      ec2AmiInfo: toEc2AmiInfo(ami),
      region: gateways.region,
      version: stackVersion(ami.tags),
      imageBuildStatus: 'BUILD_COMPLETE'
    };
  }

  private stackSummary(gateways: AwsGateways, stack: StackRecord): ImageInfoSummary {
    return {
      imageId: stack.tags[TAGS.imageId],
      region: gateways.region,
      version: stackVersion(stack.tags),
      cloudformationStackArn: stack.stackId,
      imageBuildStatus: toImageBuildStatus(stack.status),
      cloudformationStackStatus: stack.status
    };
  }
}
