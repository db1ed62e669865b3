export const HPCFLEET_VERSION = '3.0.0';

export const TAG_PREFIX = 'hpcfleet:';

export const TAGS = {
  version: `${TAG_PREFIX}version`,
  clusterName: `${TAG_PREFIX}cluster-name`,
  scheduler: `${TAG_PREFIX}scheduler`,
  nodeType: `${TAG_PREFIX}node-type`,
  queueName: `${TAG_PREFIX}queue-name`,
  computeResourceName: `${TAG_PREFIX}compute-resource-name`,
  s3Bucket: `${TAG_PREFIX}s3_bucket`,
  clusterDir: `${TAG_PREFIX}cluster_dir`,
  imageId: `${TAG_PREFIX}image_id`,
  imageName: `${TAG_PREFIX}image_name`,
  buildConfig: `${TAG_PREFIX}build_config`,
  buildLog: `${TAG_PREFIX}build_log`,
  imageDir: `${TAG_PREFIX}s3_image_dir`
} as const;

export const NODE_TYPE_TAG_VALUES = {
  HEAD: 'HeadNode',
  COMPUTE: 'Compute'
} as const;

export const CLUSTER_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9-]{0,59}$/;
export const IMAGE_ID_PATTERN = /^[a-zA-Z][a-zA-Z0-9-]{0,127}$/;
export const IMAGE_NAME_PATTERN = /^[-_A-Za-z0-9{][-_A-Za-z0-9\s:{}.]{0,1023}$/;
export const QUEUE_NAME_PATTERN = /^[a-z][a-z0-9-]*$/;
export const MAX_RESOURCE_NAME_LENGTH = 25;

export const SUPPORTED_REGIONS = [
  'af-south-1',
  'ap-east-1',
  'ap-northeast-1',
  'ap-northeast-2',
  'ap-south-1',
  'ap-southeast-1',
  'ap-southeast-2',
  'ca-central-1',
  'cn-north-1',
  'cn-northwest-1',
  'eu-central-1',
  'eu-north-1',
  'eu-south-1',
  'eu-west-1',
  'eu-west-2',
  'eu-west-3',
  'me-south-1',
  'sa-east-1',
  'us-east-1',
  'us-east-2',
  'us-gov-east-1',
  'us-gov-west-1',
  'us-west-1',
  'us-west-2'
] as const;

export const SUPPORTED_OSES = ['alinux2', 'centos7', 'ubuntu1804', 'ubuntu2004'] as const;
export type SupportedOs = (typeof SUPPORTED_OSES)[number];

export const SUPPORTED_SCHEDULERS = ['slurm', 'awsbatch'] as const;
export type SchedulerType = (typeof SUPPORTED_SCHEDULERS)[number];

export const SUPPORTED_OSES_FOR_SCHEDULER: Record<SchedulerType, readonly SupportedOs[]> = {
  slurm: SUPPORTED_OSES,
  awsbatch: ['alinux2']
};

export const SUPPORTED_ARCHITECTURES = ['x86_64', 'arm64'] as const;
export type Architecture = (typeof SUPPORTED_ARCHITECTURES)[number];

/** Fragment of the official AMI name identifying the operating system. */
export const OS_IMAGE_NAME_PART: Record<SupportedOs, string> = {
  alinux2: 'amzn2-hvm',
  centos7: 'centos7-hvm',
  ubuntu1804: 'ubuntu-1804-lts-hvm',
  ubuntu2004: 'ubuntu-2004-lts-hvm'
};

export const OS_ROOT_DEVICE: Record<SupportedOs, string> = {
  alinux2: '/dev/xvda',
  centos7: '/dev/sda1',
  ubuntu1804: '/dev/sda1',
  ubuntu2004: '/dev/sda1'
};

export const MAX_NUMBER_OF_QUEUES = 10;
export const MAX_NUMBER_OF_COMPUTE_RESOURCES = 5;

export const MAX_STORAGE_COUNT = {
  Ebs: 5,
  Efs: 1,
  FsxLustre: 1
} as const;

export const COMPUTE_FLEET_TABLE_PREFIX = 'hpcfleet-';
export const COMPUTE_FLEET_ITEM_ID = 'COMPUTE_FLEET';

export const DEFAULT_LOG_RETENTION_DAYS = 14;
export const LOG_RETENTION_DAYS = [1, 3, 5, 7, 14, 30, 60, 90, 120, 150, 180, 365, 400, 545, 731, 1827, 3653] as const;

export const CLUSTER_ARTIFACTS_PREFIX = 'hpcfleet/clusters';
export const IMAGE_ARTIFACTS_PREFIX = 'hpcfleet/images';
export const CLUSTER_CONFIG_KEY = 'cluster-config.yaml';
export const CLUSTER_IMPLIED_CONFIG_KEY = 'cluster-config-with-implied-values.yaml';
export const CLUSTER_TEMPLATE_KEY = 'hpcfleet.cfn.json';
export const IMAGE_CONFIG_KEY = 'image-config.yaml';
export const IMAGE_TEMPLATE_KEY = 'image.cfn.json';

export const IMAGE_LOG_GROUP_PREFIX = '/aws/imagebuilder/HpcFleetImage-';
export const CLUSTER_LOG_GROUP_PREFIX = '/aws/hpcfleet/';

export const computeFleetTableName = (clusterName: string): string => `${COMPUTE_FLEET_TABLE_PREFIX}${clusterName}`;

export const imageLogGroupName = (imageId: string): string => `${IMAGE_LOG_GROUP_PREFIX}${imageId}`;
