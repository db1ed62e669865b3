import {
  CLUSTER_CONFIG_KEY,
  CLUSTER_LOG_GROUP_PREFIX,
  NODE_TYPE_TAG_VALUES,
  OS_ROOT_DEVICE,
  TAGS,
  computeFleetTableName,
  type AwsBatchQueue,
  type ClusterConfig,
  type SlurmComputeResource,
  type SlurmQueue
} from '@hpcfleet/cluster-model';

import {
  ec2AssumeRolePolicy,
  getAtt,
  logicalIdSuffix,
  ref,
  toCfnTags,
  type CloudFormationTemplate,
  type TemplateResource
} from '../common/template';

export interface ClusterTemplateInput {
  clusterName: string;
  region: string;
  version: string;
  config: ClusterConfig;
  vpcId: string;
  imageId: string;
  artifactsBucket: string;
  artifactDirectory: string;
}

const HEAD_NODE_SECURITY_GROUP = 'HeadNodeSecurityGroup';
const COMPUTE_SECURITY_GROUP = 'ComputeSecurityGroup';

const userData = (settings: Record<string, string | number | boolean | undefined>) => {
  const defined = Object.fromEntries(Object.entries(settings).filter(([, value]) => value !== undefined));
  const script = [
    '#!/bin/bash',
    'set -e',
    'mkdir -p /etc/hpcfleet',
    "cat > /etc/hpcfleet/bootstrap.json <<'BOOTSTRAP'",
    JSON.stringify(defined, null, 2),
    'BOOTSTRAP',
    ''
  ].join('\n');
  return { 'Fn::Base64': script };
};

const headNodeGroups = (config: ClusterConfig): unknown[] => {
  const networking = config.HeadNode.Networking;
  const base = networking.SecurityGroups ?? [ref(HEAD_NODE_SECURITY_GROUP)];
  return [...base, ...(networking.AdditionalSecurityGroups ?? [])];
};

const queueGroups = (queue: SlurmQueue | AwsBatchQueue): unknown[] => {
  const base = queue.Networking.SecurityGroups ?? [ref(COMPUTE_SECURITY_GROUP)];
  return [...base, ...(queue.Networking.AdditionalSecurityGroups ?? [])];
};

const queuesNeedingComputeGroup = (config: ClusterConfig): boolean =>
  [...(config.Scheduling.SlurmQueues ?? []), ...(config.Scheduling.AwsBatchQueues ?? [])].some(
    (queue) => queue.Networking.SecurityGroups === undefined
  );

const securityGroups = (input: ClusterTemplateInput, resources: Record<string, TemplateResource>) => {
  const { config, clusterName, vpcId } = input;
  const createHead = config.HeadNode.Networking.SecurityGroups === undefined;
  const createCompute = queuesNeedingComputeGroup(config);

  if (createHead) {
    resources[HEAD_NODE_SECURITY_GROUP] = {
      Type: 'AWS::EC2::SecurityGroup',
      Properties: {
        GroupDescription: `Enable access to the head node of ${clusterName}`,
        VpcId: vpcId,
        SecurityGroupIngress: [
          { IpProtocol: 'tcp', FromPort: 22, ToPort: 22, CidrIp: config.HeadNode.Ssh.AllowedIps }
        ]
      }
    };
  }
  if (createCompute) {
    resources[COMPUTE_SECURITY_GROUP] = {
      Type: 'AWS::EC2::SecurityGroup',
      Properties: {
        GroupDescription: `Allow access to the compute nodes of ${clusterName}`,
        VpcId: vpcId
      }
    };
    resources.ComputeSecurityGroupIngress = {
      Type: 'AWS::EC2::SecurityGroupIngress',
      Properties: {
        IpProtocol: '-1',
        FromPort: 0,
        ToPort: 65535,
        GroupId: ref(COMPUTE_SECURITY_GROUP),
        SourceSecurityGroupId: ref(COMPUTE_SECURITY_GROUP)
      }
    };
  }
  if (createHead && createCompute) {
    resources.HeadNodeFromComputeIngress = {
      Type: 'AWS::EC2::SecurityGroupIngress',
      Properties: {
        IpProtocol: '-1',
        FromPort: 0,
        ToPort: 65535,
        GroupId: ref(HEAD_NODE_SECURITY_GROUP),
        SourceSecurityGroupId: ref(COMPUTE_SECURITY_GROUP)
      }
    };
    resources.ComputeFromHeadNodeIngress = {
      Type: 'AWS::EC2::SecurityGroupIngress',
      Properties: {
        IpProtocol: '-1',
        FromPort: 0,
        ToPort: 65535,
        GroupId: ref(COMPUTE_SECURITY_GROUP),
        SourceSecurityGroupId: ref(HEAD_NODE_SECURITY_GROUP)
      }
    };
  }
};

const instanceRole = (input: ClusterTemplateInput, withFleetTable: boolean, withLogs: boolean): TemplateResource => {
  const statements: unknown[] = [
    {
      Sid: 'Artifacts',
      Effect: 'Allow',
      Action: ['s3:GetObject'],
      Resource: `arn:aws:s3:::${input.artifactsBucket}/${input.artifactDirectory}/*`
    },
    {
      Sid: 'Ec2Describe',
      Effect: 'Allow',
      Action: ['ec2:DescribeInstances', 'ec2:DescribeInstanceStatus', 'ec2:DescribeTags'],
      Resource: '*'
    }
  ];
  if (withFleetTable) {
    statements.push(
      {
        Sid: 'ComputeFleetStatus',
        Effect: 'Allow',
        Action: ['dynamodb:GetItem', 'dynamodb:PutItem', 'dynamodb:UpdateItem', 'dynamodb:Query'],
        Resource: getAtt('ComputeFleetStatusTable', 'Arn')
      },
      {
        Sid: 'ComputeFleetScaling',
        Effect: 'Allow',
        Action: ['ec2:RunInstances', 'ec2:TerminateInstances', 'ec2:CreateTags', 'iam:PassRole'],
        Resource: '*'
      }
    );
  }
  if (withLogs) {
    statements.push({
      Sid: 'CloudWatchLogs',
      Effect: 'Allow',
      Action: ['logs:CreateLogStream', 'logs:PutLogEvents', 'logs:DescribeLogStreams'],
      Resource: getAtt('ClusterLogGroup', 'Arn')
    });
  }
  return {
    Type: 'AWS::IAM::Role',
    Properties: {
      AssumeRolePolicyDocument: ec2AssumeRolePolicy(),
      Path: '/hpcfleet/',
      Policies: [{ PolicyName: 'hpcfleet-node', PolicyDocument: { Version: '2012-10-17', Statement: statements } }]
    }
  };
};

const baseBootstrap = (input: ClusterTemplateInput) => ({
  clusterName: input.clusterName,
  region: input.region,
  version: input.version,
  scheduler: input.config.Scheduling.Scheduler,
  artifactsBucket: input.artifactsBucket,
  clusterConfig: `${input.artifactDirectory}/${CLUSTER_CONFIG_KEY}`
});

const headNode = (input: ClusterTemplateInput, withFleetTable: boolean): TemplateResource => {
  const { config } = input;
  const rootVolume = config.HeadNode.LocalStorage.RootVolume;
  return {
    Type: 'AWS::EC2::Instance',
    Properties: {
      InstanceType: config.HeadNode.InstanceType,
      ImageId: input.imageId,
      KeyName: config.HeadNode.Ssh.KeyName,
      IamInstanceProfile: ref('InstanceProfile'),
      Monitoring: config.Monitoring.DetailedMonitoring,
      NetworkInterfaces: [
        {
          DeviceIndex: '0',
          SubnetId: config.HeadNode.Networking.SubnetId,
          GroupSet: headNodeGroups(config)
        }
      ],
      BlockDeviceMappings: [
        {
          DeviceName: OS_ROOT_DEVICE[config.Image.Os],
          Ebs: {
            VolumeSize: rootVolume.Size,
            VolumeType: rootVolume.VolumeType,
            Encrypted: rootVolume.Encrypted,
            KmsKeyId: rootVolume.KmsKeyId,
            DeleteOnTermination: true
          }
        }
      ],
      UserData: userData({
        ...baseBootstrap(input),
        nodeType: NODE_TYPE_TAG_VALUES.HEAD,
        computeFleetStatusTable: withFleetTable ? computeFleetTableName(input.clusterName) : undefined,
        scaledownIdletime: config.Scheduling.SlurmSettings?.ScaledownIdletime
      }),
      Tags: toCfnTags(
        {
          Name: 'HeadNode',
          [TAGS.clusterName]: input.clusterName,
          [TAGS.nodeType]: NODE_TYPE_TAG_VALUES.HEAD,
          [TAGS.version]: input.version
        },
        config.Tags
      )
    }
  };
};

const launchTemplate = (
  input: ClusterTemplateInput,
  queue: SlurmQueue,
  resource: SlurmComputeResource,
  placementGroup: unknown
): TemplateResource => ({
  Type: 'AWS::EC2::LaunchTemplate',
  Properties: {
    LaunchTemplateName: `${input.clusterName}-${queue.Name}-${resource.Name}`,
    LaunchTemplateData: {
      InstanceType: resource.InstanceType,
      ImageId: input.imageId,
      KeyName: input.config.HeadNode.Ssh.KeyName,
      IamInstanceProfile: { Name: ref('InstanceProfile') },
      Monitoring: { Enabled: input.config.Monitoring.DetailedMonitoring },
      NetworkInterfaces: [
        { DeviceIndex: 0, SubnetId: queue.Networking.SubnetIds[0], Groups: queueGroups(queue) }
      ],
      InstanceMarketOptions:
        queue.CapacityType === 'SPOT'
          ? {
              MarketType: 'spot',
              SpotOptions: {
                SpotInstanceType: 'one-time',
                InstanceInterruptionBehavior: 'terminate',
                MaxPrice: resource.SpotPrice === undefined ? undefined : String(resource.SpotPrice)
              }
            }
          : undefined,
      Placement: placementGroup === undefined ? undefined : { GroupName: placementGroup },
      TagSpecifications: [
        {
          ResourceType: 'instance',
          Tags: toCfnTags(
            {
              Name: 'Compute',
              [TAGS.clusterName]: input.clusterName,
              [TAGS.nodeType]: NODE_TYPE_TAG_VALUES.COMPUTE,
              [TAGS.queueName]: queue.Name,
              [TAGS.computeResourceName]: resource.Name,
              [TAGS.version]: input.version
            },
            input.config.Tags
          )
        }
      ],
      UserData: userData({
        ...baseBootstrap(input),
        nodeType: NODE_TYPE_TAG_VALUES.COMPUTE,
        queueName: queue.Name,
        computeResourceName: resource.Name,
        disableHyperthreading: resource.DisableSimultaneousMultithreading
      })
    }
  }
});

const slurmResources = (input: ClusterTemplateInput, resources: Record<string, TemplateResource>) => {
  for (const queue of input.config.Scheduling.SlurmQueues ?? []) {
    let placementGroup: unknown;
    const placement = queue.Networking.PlacementGroup;
    if (placement.Enabled) {
      if (placement.Id) {
        placementGroup = placement.Id;
      } else {
        const groupId = `PlacementGroup${logicalIdSuffix(queue.Name)}`;
        resources[groupId] = { Type: 'AWS::EC2::PlacementGroup', Properties: { Strategy: 'cluster' } };
        placementGroup = ref(groupId);
      }
    }
    for (const resource of queue.ComputeResources) {
      resources[`LaunchTemplate${logicalIdSuffix(queue.Name, resource.Name)}`] = launchTemplate(
        input,
        queue,
        resource,
        placementGroup
      );
    }
  }
};

/** Adds Batch resources and returns the logical id of the first compute environment. */
const batchResources = (input: ClusterTemplateInput, resources: Record<string, TemplateResource>): string | null => {
  let first: string | null = null;
  for (const queue of input.config.Scheduling.AwsBatchQueues ?? []) {
    const environments: string[] = [];
    for (const resource of queue.ComputeResources) {
      const environmentId = `ComputeEnvironment${logicalIdSuffix(queue.Name, resource.Name)}`;
      resources[environmentId] = {
        Type: 'AWS::Batch::ComputeEnvironment',
        Properties: {
          Type: 'MANAGED',
          State: 'ENABLED',
          ComputeResources: {
            Type: queue.CapacityType === 'SPOT' ? 'SPOT' : 'EC2',
            MinvCpus: resource.MinvCpus,
            DesiredvCpus: resource.DesiredvCpus,
            MaxvCpus: resource.MaxvCpus,
            InstanceTypes: resource.InstanceTypes,
            Subnets: queue.Networking.SubnetIds,
            SecurityGroupIds: queueGroups(queue),
            InstanceRole: getAtt('InstanceProfile', 'Arn'),
            ImageId: input.imageId,
            BidPercentage: resource.SpotBidPercentage,
            Tags: {
              [TAGS.clusterName]: input.clusterName,
              [TAGS.nodeType]: NODE_TYPE_TAG_VALUES.COMPUTE,
              [TAGS.queueName]: queue.Name,
              [TAGS.computeResourceName]: resource.Name
            }
          }
        }
      };
      environments.push(environmentId);
      first = first ?? environmentId;
    }
    resources[`JobQueue${logicalIdSuffix(queue.Name)}`] = {
      Type: 'AWS::Batch::JobQueue',
      Properties: {
        JobQueueName: `${input.clusterName}-${queue.Name}`,
        Priority: 1,
        State: 'ENABLED',
        ComputeEnvironmentOrder: environments.map((environment, index) => ({
          Order: index + 1,
          ComputeEnvironment: ref(environment)
        }))
      }
    };
  }
  return first;
};

const dashboard = (input: ClusterTemplateInput): TemplateResource => {
  const metric = (name: string) => ['AWS/EC2', name, 'InstanceId', '${HeadNodeId}'];
  const body = {
    widgets: [
      {
        type: 'metric',
        x: 0,
        y: 0,
        width: 12,
        height: 6,
        properties: {
          title: 'Head Node Instance',
          region: input.region,
          metrics: [metric('CPUUtilization'), metric('NetworkIn'), metric('NetworkOut')]
        }
      }
    ]
  };
  return {
    Type: 'AWS::CloudWatch::Dashboard',
    Properties: {
      DashboardName: `${input.clusterName}-${input.region}`,
      DashboardBody: { 'Fn::Sub': [JSON.stringify(body), { HeadNodeId: ref('HeadNode') }] }
    }
  };
};

export const buildClusterTemplate = (input: ClusterTemplateInput): CloudFormationTemplate => {
  const { config, clusterName } = input;
  const resources: Record<string, TemplateResource> = {};
  const outputs: CloudFormationTemplate['Outputs'] = {};
  const logs = config.Monitoring.Logs.CloudWatch;
  const slurm = config.Scheduling.Scheduler === 'slurm';

  if (logs.Enabled) {
    resources.ClusterLogGroup = {
      Type: 'AWS::Logs::LogGroup',
      DeletionPolicy: logs.DeletionPolicy,
      Properties: {
        LogGroupName: `${CLUSTER_LOG_GROUP_PREFIX}${clusterName}`,
        RetentionInDays: logs.RetentionInDays
      }
    };
    outputs.LogGroupName = { Description: 'Log group of the cluster', Value: ref('ClusterLogGroup') };
  }

  if (slurm) {
    resources.ComputeFleetStatusTable = {
      Type: 'AWS::DynamoDB::Table',
      Properties: {
        TableName: computeFleetTableName(clusterName),
        AttributeDefinitions: [{ AttributeName: 'Id', AttributeType: 'S' }],
        KeySchema: [{ AttributeName: 'Id', KeyType: 'HASH' }],
        BillingMode: 'PAY_PER_REQUEST'
      }
    };
    outputs.ComputeFleetStatusTableName = { Value: ref('ComputeFleetStatusTable') };
  }

  resources.InstanceRole = instanceRole(input, slurm, logs.Enabled);
  resources.InstanceProfile = {
    Type: 'AWS::IAM::InstanceProfile',
    Properties: { Path: '/hpcfleet/', Roles: [ref('InstanceRole')] }
  };

  securityGroups(input, resources);
  resources.HeadNode = headNode(input, slurm);
  if (config.HeadNode.Networking.ElasticIp) {
    resources.HeadNodeElasticIp = {
      Type: 'AWS::EC2::EIP',
      Properties: { Domain: 'vpc', InstanceId: ref('HeadNode') }
    };
  }

  if (slurm) {
    slurmResources(input, resources);
  } else {
    const environment = batchResources(input, resources);
    if (environment) {
      outputs.BatchComputeEnvironmentArn = { Value: ref(environment) };
    }
  }

  if (config.Monitoring.Dashboards.CloudWatch.Enabled) {
    resources.CloudwatchDashboard = dashboard(input);
  }

  outputs.HeadNodeInstanceId = { Description: 'Head node instance id', Value: ref('HeadNode') };
  outputs.Scheduler = { Value: config.Scheduling.Scheduler };

  return {
    AWSTemplateFormatVersion: '2010-09-09',
    Description: `hpcfleet cluster ${clusterName}`,
    Resources: resources,
    Outputs: outputs
  };
};
