import {
  MAX_NUMBER_OF_COMPUTE_RESOURCES,
  MAX_NUMBER_OF_QUEUES,
  MAX_RESOURCE_NAME_LENGTH,
  MAX_STORAGE_COUNT,
  QUEUE_NAME_PATTERN,
  SUPPORTED_OSES_FOR_SCHEDULER,
  TAG_PREFIX
} from '../constants';
import { listQueues, type ClusterConfig } from '../config/clusterConfig';
import type { ConfigValidationMessage } from '../schema';
import {
  validateKmsKeyEncrypted,
  validateVolumeIops,
  validateVolumeThroughput,
  validateVolumeTypeSize,
  type EbsVolume
} from './ebs';
import { message, type Validator } from './types';

const STORAGE_TYPES = ['Ebs', 'Efs', 'FsxLustre'] as const;

const CIDR_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

export const isValidCidr = (value: string): boolean => {
  const match = CIDR_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const octets = match.slice(1, 5).map(Number);
  const prefix = Number(match[5]);
  return octets.every((octet) => octet <= 255) && prefix <= 32;
};

const ebsVolumes = (config: ClusterConfig): EbsVolume[] => {
  const root = config.HeadNode.LocalStorage.RootVolume;
  const volumes: EbsVolume[] = [
    {
      location: 'HeadNode.LocalStorage.RootVolume',
      volumeType: root.VolumeType,
      size: root.Size,
      encrypted: root.Encrypted,
      kmsKeyId: root.KmsKeyId
    }
  ];
  for (const storage of config.SharedStorage ?? []) {
    if (storage.StorageType === 'Ebs' && storage.EbsSettings && !storage.EbsSettings.VolumeId) {
      const settings = storage.EbsSettings;
      volumes.push({
        location: `SharedStorage[${storage.Name}]`,
        volumeType: settings.VolumeType,
        size: settings.Size,
        iops: settings.Iops,
        throughput: settings.Throughput,
        encrypted: settings.Encrypted,
        kmsKeyId: settings.KmsKeyId
      });
    }
  }
  return volumes;
};

const resourceNameProblems = (kind: string, name: string): string | null => {
  if (!QUEUE_NAME_PATTERN.test(name)) {
    return `Invalid name '${name}'. ${kind} names must begin with a lowercase letter and contain only lowercase letters, digits and hyphens.`;
  }
  if (name.length > MAX_RESOURCE_NAME_LENGTH) {
    return `Invalid name '${name}'. ${kind} names can be at most ${MAX_RESOURCE_NAME_LENGTH} characters long.`;
  }
  return null;
};

const duplicates = (values: string[]): string[] => {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      repeated.add(value);
    }
    seen.add(value);
  }
  return [...repeated];
};

export const schedulerOsValidator: Validator<ClusterConfig> = {
  type: 'SchedulerOsValidator',
  validate: (config) => {
    const scheduler = config.Scheduling.Scheduler;
    const supported = SUPPORTED_OSES_FOR_SCHEDULER[scheduler];
    if (supported.includes(config.Image.Os)) {
      return [];
    }
    return [
      message(
        'SchedulerOsValidator',
        'ERROR',
        `${scheduler} scheduler supports the following operating systems: ${supported.join(', ')}.`
      )
    ];
  }
};

export const queueNameValidator: Validator<ClusterConfig> = {
  type: 'QueueNameValidator',
  validate: (config) => {
    const messages: ConfigValidationMessage[] = [];
    for (const queue of listQueues(config)) {
      const problem = resourceNameProblems('Queue', queue.name);
      if (problem) {
        messages.push(message('QueueNameValidator', 'ERROR', problem));
      } else if (queue.name === 'default') {
        messages.push(message('QueueNameValidator', 'ERROR', "It is forbidden to use 'default' as a queue name."));
      }
    }
    return messages;
  }
};

export const computeResourceNameValidator: Validator<ClusterConfig> = {
  type: 'ComputeResourceNameValidator',
  validate: (config) =>
    listQueues(config).flatMap((queue) =>
      queue.computeResources.flatMap((resource) => {
        const problem = resourceNameProblems('Compute resource', resource.name);
        return problem ? [message('ComputeResourceNameValidator', 'ERROR', problem)] : [];
      })
    )
};

export const duplicateNameValidator: Validator<ClusterConfig> = {
  type: 'DuplicateNameValidator',
  validate: (config) => {
    const messages: ConfigValidationMessage[] = [];
    const queues = listQueues(config);
    for (const name of duplicates(queues.map((queue) => queue.name))) {
      messages.push(message('DuplicateNameValidator', 'ERROR', `Duplicate queue name '${name}'. Queue names must be unique.`));
    }
    for (const queue of queues) {
      for (const name of duplicates(queue.computeResources.map((resource) => resource.name))) {
        messages.push(
          message(
            'DuplicateNameValidator',
            'ERROR',
            `Duplicate compute resource name '${name}' in queue '${queue.name}'. Compute resource names must be unique.`
          )
        );
      }
    }
    for (const name of duplicates((config.SharedStorage ?? []).map((storage) => storage.Name))) {
      messages.push(
        message('DuplicateNameValidator', 'ERROR', `Duplicate shared storage name '${name}'. Storage names must be unique.`)
      );
    }
    return messages;
  }
};

export const maxCountValidator: Validator<ClusterConfig> = {
  type: 'MaxCountValidator',
  validate: (config) => {
    const messages: ConfigValidationMessage[] = [];
    const queues = listQueues(config);
    if (queues.length > MAX_NUMBER_OF_QUEUES) {
      messages.push(
        message(
          'MaxCountValidator',
          'ERROR',
          `Invalid number of queues (${queues.length}) specified. Currently only supports up to ${MAX_NUMBER_OF_QUEUES} queues.`
        )
      );
    }
    for (const queue of queues) {
      if (queue.computeResources.length > MAX_NUMBER_OF_COMPUTE_RESOURCES) {
        messages.push(
          message(
            'MaxCountValidator',
            'ERROR',
            `Invalid number of compute resources (${queue.computeResources.length}) specified for queue '${queue.name}'. ` +
              `Currently only supports up to ${MAX_NUMBER_OF_COMPUTE_RESOURCES} compute resources.`
          )
        );
      }
    }
    return messages;
  }
};

export const computeResourceSizeValidator: Validator<ClusterConfig> = {
  type: 'ComputeResourceSizeValidator',
  validate: (config) => {
    const messages: ConfigValidationMessage[] = [];
    for (const queue of config.Scheduling.SlurmQueues ?? []) {
      for (const resource of queue.ComputeResources) {
        if (resource.MaxCount < 1) {
          messages.push(
            message(
              'ComputeResourceSizeValidator',
              'ERROR',
              `Compute resource '${resource.Name}' in queue '${queue.Name}': MaxCount must be at least 1.`
            )
          );
        } else if (resource.MinCount > resource.MaxCount) {
          messages.push(
            message(
              'ComputeResourceSizeValidator',
              'ERROR',
              `Compute resource '${resource.Name}' in queue '${queue.Name}': MinCount must be lower than or equal to MaxCount.`
            )
          );
        }
      }
    }
    for (const queue of config.Scheduling.AwsBatchQueues ?? []) {
      for (const resource of queue.ComputeResources) {
        if (resource.MinvCpus > resource.MaxvCpus) {
          messages.push(
            message(
              'ComputeResourceSizeValidator',
              'ERROR',
              `Compute resource '${resource.Name}' in queue '${queue.Name}': MinvCpus must be lower than or equal to MaxvCpus.`
            )
          );
        } else if (resource.DesiredvCpus < resource.MinvCpus || resource.DesiredvCpus > resource.MaxvCpus) {
          messages.push(
            message(
              'ComputeResourceSizeValidator',
              'ERROR',
              `Compute resource '${resource.Name}' in queue '${queue.Name}': DesiredvCpus must be between MinvCpus and MaxvCpus.`
            )
          );
        }
      }
    }
    return messages;
  }
};

export const numberOfStorageValidator: Validator<ClusterConfig> = {
  type: 'NumberOfStorageValidator',
  validate: (config) => {
    const storages = config.SharedStorage ?? [];
    return STORAGE_TYPES.flatMap((storageType) => {
      const count = storages.filter((storage) => storage.StorageType === storageType).length;
      const max = MAX_STORAGE_COUNT[storageType];
      if (count <= max) {
        return [];
      }
      return [
        message(
          'NumberOfStorageValidator',
          'ERROR',
          `Too many ${storageType} shared storage specified in the configuration. A cluster supports at most ${max} ${storageType}.`
        )
      ];
    });
  }
};

export const duplicateMountDirValidator: Validator<ClusterConfig> = {
  type: 'DuplicateMountDirValidator',
  validate: (config) => {
    const normalize = (dir: string) => (dir.startsWith('/') ? dir : `/${dir}`).replace(/\/+$/, '');
    return duplicates((config.SharedStorage ?? []).map((storage) => normalize(storage.MountDir))).map((dir) =>
      message(
        'DuplicateMountDirValidator',
        'ERROR',
        `Mount directory '${dir}' is used by more than one shared storage. Mount directories must be unique.`
      )
    );
  }
};

export const ebsVolumeTypeSizeValidator: Validator<ClusterConfig> = {
  type: 'EbsVolumeTypeSizeValidator',
  validate: (config) => ebsVolumes(config).flatMap(validateVolumeTypeSize)
};

export const ebsVolumeIopsValidator: Validator<ClusterConfig> = {
  type: 'EbsVolumeIopsValidator',
  validate: (config) => ebsVolumes(config).flatMap(validateVolumeIops)
};

export const ebsVolumeThroughputValidator: Validator<ClusterConfig> = {
  type: 'EbsVolumeThroughputValidator',
  validate: (config) => ebsVolumes(config).flatMap(validateVolumeThroughput)
};

export const kmsKeyIdEncryptedValidator: Validator<ClusterConfig> = {
  type: 'KmsKeyIdEncryptedValidator',
  validate: (config) => {
    const messages = ebsVolumes(config).flatMap(validateKmsKeyEncrypted);
    for (const storage of config.SharedStorage ?? []) {
      const efs = storage.EfsSettings;
      if (storage.StorageType === 'Efs' && efs?.KmsKeyId && !efs.Encrypted) {
        messages.push(
          message(
            'KmsKeyIdEncryptedValidator',
            'ERROR',
            `SharedStorage[${storage.Name}]: Kms Key Id ${efs.KmsKeyId} is specified, the encrypted state must be True.`
          )
        );
      }
    }
    return messages;
  }
};

export const tagKeyValidator: Validator<ClusterConfig> = {
  type: 'TagKeyValidator',
  validate: (config) =>
    (config.Tags ?? [])
      .filter((tag) => tag.Key.startsWith(TAG_PREFIX))
      .map((tag) =>
        message(
          'TagKeyValidator',
          'ERROR',
          `The tag key '${tag.Key}' is invalid: the prefix '${TAG_PREFIX}' is reserved and cannot be used.`
        )
      )
};

export const cidrValidator: Validator<ClusterConfig> = {
  type: 'CidrValidator',
  validate: (config) => {
    const allowed = config.HeadNode.Ssh.AllowedIps;
    if (isValidCidr(allowed)) {
      return [];
    }
    return [message('CidrValidator', 'ERROR', `Invalid CIDR '${allowed}' in HeadNode.Ssh.AllowedIps.`)];
  }
};

export const sshAllowedIpsValidator: Validator<ClusterConfig> = {
  type: 'SshAllowedIpsValidator',
  validate: (config) => {
    if (config.HeadNode.Ssh.AllowedIps !== '0.0.0.0/0') {
      return [];
    }
    return [
      message(
        'SshAllowedIpsValidator',
        'WARNING',
        'SSH access to the head node is open to 0.0.0.0/0. Restrict HeadNode.Ssh.AllowedIps to the networks that need it.'
      )
    ];
  }
};

export const spotCapacityValidator: Validator<ClusterConfig> = {
  type: 'SpotCapacityValidator',
  validate: (config) =>
    listQueues(config)
      .filter((queue) => queue.capacityType === 'SPOT')
      .map((queue) =>
        message(
          'SpotCapacityValidator',
          'INFO',
          `Queue '${queue.name}' uses SPOT capacity; its instances can be interrupted when capacity is reclaimed.`
        )
      )
};

const allInstanceTypes = (config: ClusterConfig): string[] => {
  const types = new Set<string>([config.HeadNode.InstanceType]);
  for (const queue of listQueues(config)) {
    for (const resource of queue.computeResources) {
      for (const instanceType of resource.instanceTypes) {
        // Batch accepts instance families and 'optimal'; only concrete sizes can be looked up.
        if (instanceType.includes('.')) {
          types.add(instanceType);
        }
      }
    }
  }
  return [...types];
};

export const instanceTypeValidator: Validator<ClusterConfig> = {
  type: 'InstanceTypeValidator',
  validate: async (config, lookup) => {
    const requested = allInstanceTypes(config);
    const known = await lookup.describeInstanceTypes(requested);
    return requested
      .filter((instanceType) => !known.has(instanceType))
      .map((instanceType) =>
        message('InstanceTypeValidator', 'ERROR', `The instance type '${instanceType}' is not supported.`)
      );
  }
};

export const keyPairValidator: Validator<ClusterConfig> = {
  type: 'KeyPairValidator',
  validate: async (config, lookup) => {
    const keyName = config.HeadNode.Ssh.KeyName;
    if (!keyName) {
      return [
        message(
          'KeyPairValidator',
          'WARNING',
          'No key pair is specified. You will not be able to connect to the head node over SSH unless the AMI allows another way to log in.'
        )
      ];
    }
    const existing = await lookup.describeKeyPairs([keyName]);
    if (existing.has(keyName)) {
      return [];
    }
    return [message('KeyPairValidator', 'ERROR', `The key pair '${keyName}' does not exist.`)];
  }
};

export const subnetsValidator: Validator<ClusterConfig> = {
  type: 'SubnetsValidator',
  validate: async (config, lookup) => {
    const subnetIds = [
      ...new Set([config.HeadNode.Networking.SubnetId, ...listQueues(config).flatMap((queue) => queue.subnetIds)])
    ];
    const subnets = await lookup.describeSubnets(subnetIds);
    const messages: ConfigValidationMessage[] = subnetIds
      .filter((subnetId) => !subnets.has(subnetId))
      .map((subnetId) => message('SubnetsValidator', 'ERROR', `The subnet '${subnetId}' does not exist.`));
    const vpcs = new Set([...subnets.values()].map((subnet) => subnet.vpcId));
    if (vpcs.size > 1) {
      messages.push(
        message(
          'SubnetsValidator',
          'ERROR',
          `The head node and compute subnets must belong to the same VPC. Found: ${[...vpcs].sort().join(', ')}.`
        )
      );
    }
    return messages;
  }
};

export const customAmiValidator: Validator<ClusterConfig> = {
  type: 'CustomAmiValidator',
  validate: async (config, lookup) => {
    const amiId = config.Image.CustomAmi;
    if (!amiId) {
      return [];
    }
    const images = await lookup.describeImages([amiId]);
    const image = images.get(amiId);
    if (!image) {
      return [message('CustomAmiValidator', 'ERROR', `The custom AMI '${amiId}' does not exist.`)];
    }
    const headNodeType = config.HeadNode.InstanceType;
    const instanceTypes = await lookup.describeInstanceTypes([headNodeType]);
    const info = instanceTypes.get(headNodeType);
    if (info && !info.architectures.includes(image.architecture)) {
      return [
        message(
          'CustomAmiValidator',
          'ERROR',
          `The architecture of the custom AMI '${amiId}' (${image.architecture}) is not compatible with the head node instance type '${headNodeType}' (${info.architectures.join(', ')}).`
        )
      ];
    }
    return [];
  }
};

export const instanceArchitectureValidator: Validator<ClusterConfig> = {
  type: 'InstanceArchitectureValidator',
  validate: async (config, lookup) => {
    const types = allInstanceTypes(config);
    const infos = await lookup.describeInstanceTypes(types);
    const head = infos.get(config.HeadNode.InstanceType);
    if (!head) {
      return [];
    }
    const messages: ConfigValidationMessage[] = [];
    for (const instanceType of types) {
      const info = infos.get(instanceType);
      if (!info || instanceType === config.HeadNode.InstanceType) {
        continue;
      }
      if (!info.architectures.some((architecture) => head.architectures.includes(architecture))) {
        messages.push(
          message(
            'InstanceArchitectureValidator',
            'ERROR',
            `The compute instance type '${instanceType}' does not share an architecture with the head node instance type '${config.HeadNode.InstanceType}'.`
          )
        );
      }
    }
    return messages;
  }
};

export const CLUSTER_VALIDATORS: ReadonlyArray<Validator<ClusterConfig>> = [
  schedulerOsValidator,
  queueNameValidator,
  computeResourceNameValidator,
  duplicateNameValidator,
  maxCountValidator,
  computeResourceSizeValidator,
  numberOfStorageValidator,
  duplicateMountDirValidator,
  ebsVolumeTypeSizeValidator,
  ebsVolumeIopsValidator,
  ebsVolumeThroughputValidator,
  kmsKeyIdEncryptedValidator,
  tagKeyValidator,
  cidrValidator,
  sshAllowedIpsValidator,
  spotCapacityValidator,
  instanceTypeValidator,
  keyPairValidator,
  subnetsValidator,
  customAmiValidator,
  instanceArchitectureValidator
];
