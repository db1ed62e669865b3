import { TAGS, imageLogGroupName, type ImageConfig } from '@hpcfleet/cluster-model';

import { ec2AssumeRolePolicy, getAtt, ref, toCfnTags, type CloudFormationTemplate } from '../common/template';

export interface ImageTemplateInput {
  imageId: string;
  version: string;
  config: ImageConfig;
  artifactsBucket: string;
  artifactDirectory: string;
  /** Root device of the parent image, `/dev/xvda` when unknown. */
  rootDeviceName?: string;
}

const MANAGED_POLICIES = [
  'arn:aws:iam::aws:policy/AmazonSSMManagedInstanceCore',
  'arn:aws:iam::aws:policy/EC2InstanceProfileForImageBuilder'
];

const componentDocument = (imageId: string, updateOsPackages: boolean) =>
  JSON.stringify({
    name: `hpcfleet-${imageId}`,
    schemaVersion: 1.0,
    phases: [
      {
        name: 'build',
        steps: [
          {
            name: 'PrepareHost',
            action: 'ExecuteBash',
            inputs: {
              commands: [
                'set -e',
                updateOsPackages ? '(yum -y update || apt-get -y upgrade)' : 'echo "skipping OS package update"',
                'mkdir -p /opt/hpcfleet'
              ]
            }
          }
        ]
      }
    ]
  });

export const buildImageTemplate = (input: ImageTemplateInput): CloudFormationTemplate => {
  const { config, imageId } = input;
  const build = config.Build;
  const rootVolume = config.Image.RootVolume;
  const amiTags = toCfnTags(
    {
      [TAGS.imageId]: imageId,
      [TAGS.version]: input.version,
      [TAGS.imageName]: config.Image.Name ?? imageId,
      [TAGS.imageDir]: input.artifactDirectory,
      [TAGS.s3Bucket]: input.artifactsBucket
    },
    config.Image.Tags
  );
  const amiTagMap = Object.fromEntries(amiTags.map((tag) => [tag.Key, tag.Value]));
  const buildTags = Object.fromEntries(
    toCfnTags({ [TAGS.imageId]: imageId }, build.Tags).map((tag) => [tag.Key, tag.Value])
  );

  const components = [
    { ComponentArn: ref('HpcFleetComponent') },
    ...(build.Components ?? []).map((component, index) =>
      component.Type === 'arn' ? { ComponentArn: component.Value } : { ComponentArn: ref(`ScriptComponent${index}`) }
    )
  ];

  const resources: CloudFormationTemplate['Resources'] = {
    BuildLogGroup: {
      Type: 'AWS::Logs::LogGroup',
      DeletionPolicy: 'Retain',
      Properties: { LogGroupName: imageLogGroupName(imageId), RetentionInDays: 14 }
    },
    InstanceRole: {
      Type: 'AWS::IAM::Role',
      Properties: {
        AssumeRolePolicyDocument: ec2AssumeRolePolicy(),
        Path: '/hpcfleet/',
        ManagedPolicyArns: [
          ...MANAGED_POLICIES,
          ...(build.Iam?.AdditionalIamPolicies ?? []).map((policy) => policy.Policy)
        ]
      }
    },
    InstanceProfile: {
      Type: 'AWS::IAM::InstanceProfile',
      Properties: { Path: '/hpcfleet/', Roles: [ref('InstanceRole')] }
    },
    HpcFleetComponent: {
      Type: 'AWS::ImageBuilder::Component',
      Properties: {
        Name: `${imageId}-hpcfleet`,
        Version: input.version,
        Platform: 'Linux',
        Data: componentDocument(imageId, build.UpdateOsPackages.Enabled),
        Tags: buildTags
      }
    },
    ImageRecipe: {
      Type: 'AWS::ImageBuilder::ImageRecipe',
      Properties: {
        Name: imageId,
        Version: input.version,
        ParentImage: build.ParentImage,
        Components: components,
        BlockDeviceMappings: [
          {
            DeviceName: input.rootDeviceName ?? '/dev/xvda',
            Ebs: {
              VolumeSize: rootVolume.Size,
              VolumeType: rootVolume.VolumeType,
              Encrypted: rootVolume.Encrypted,
              KmsKeyId: rootVolume.KmsKeyId,
              DeleteOnTermination: true
            }
          }
        ],
        Tags: buildTags
      }
    },
    InfrastructureConfiguration: {
      Type: 'AWS::ImageBuilder::InfrastructureConfiguration',
      Properties: {
        Name: imageId,
        InstanceProfileName: build.Iam?.InstanceProfile ?? ref('InstanceProfile'),
        InstanceTypes: [build.InstanceType],
        SubnetId: build.SubnetId,
        SecurityGroupIds: build.SecurityGroupIds,
        TerminateInstanceOnFailure: config.DevSettings.TerminateInstanceOnFailure,
        Tags: buildTags
      }
    },
    DistributionConfiguration: {
      Type: 'AWS::ImageBuilder::DistributionConfiguration',
      Properties: {
        Name: imageId,
        Distributions: [
          {
            Region: { Ref: 'AWS::Region' },
            AmiDistributionConfiguration: { Name: `${config.Image.Name ?? imageId} {{ imagebuilder:buildDate }}`, AmiTags: amiTagMap }
          }
        ],
        Tags: buildTags
      }
    },
    Image: {
      Type: 'AWS::ImageBuilder::Image',
      DependsOn: ['BuildLogGroup'],
      Properties: {
        ImageRecipeArn: ref('ImageRecipe'),
        InfrastructureConfigurationArn: ref('InfrastructureConfiguration'),
        DistributionConfigurationArn: ref('DistributionConfiguration'),
        Tags: buildTags
      }
    }
  };

  (build.Components ?? []).forEach((component, index) => {
    if (component.Type === 'script') {
      resources[`ScriptComponent${index}`] = {
        Type: 'AWS::ImageBuilder::Component',
        Properties: {
          Name: `${imageId}-script-${index}`,
          Version: input.version,
          Platform: 'Linux',
          Uri: component.Value,
          Tags: buildTags
        }
      };
    }
  });

  return {
    AWSTemplateFormatVersion: '2010-09-09',
    Description: `hpcfleet image ${imageId}`,
    Resources: resources,
    Outputs: {
      ImageArn: { Value: getAtt('Image', 'Arn') },
      AmiId: { Value: getAtt('Image', 'ImageId') },
      BuildLogGroupName: { Value: ref('BuildLogGroup') }
    }
  };
};
