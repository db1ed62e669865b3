import { IMAGE_NAME_PATTERN, TAG_PREFIX } from '../constants';
import type { ImageConfig } from '../config/imageConfig';
import type { ConfigValidationMessage } from '../schema';
import { validateKmsKeyEncrypted, validateVolumeTypeSize, type EbsVolume } from './ebs';
import { message, type Validator } from './types';

const rootVolume = (config: ImageConfig): EbsVolume => ({
  location: 'Image.RootVolume',
  volumeType: config.Image.RootVolume.VolumeType,
  size: config.Image.RootVolume.Size,
  encrypted: config.Image.RootVolume.Encrypted,
  kmsKeyId: config.Image.RootVolume.KmsKeyId
});

/** Parent images given as Image Builder ARNs are resolved by the build itself. */
const parentAmiId = (config: ImageConfig): string | null =>
  config.Build.ParentImage.startsWith('ami-') ? config.Build.ParentImage : null;

export const imageNameValidator: Validator<ImageConfig> = {
  type: 'ImageNameValidator',
  validate: (config) => {
    const name = config.Image.Name;
    if (name === undefined || IMAGE_NAME_PATTERN.test(name)) {
      return [];
    }
    return [
      message(
        'ImageNameValidator',
        'ERROR',
        `Image name '${name}' is invalid. It must be 1 to 1024 characters long and may contain letters, digits, spaces and the characters -_:{}.`
      )
    ];
  }
};

export const imageInstanceTypeValidator: Validator<ImageConfig> = {
  type: 'InstanceTypeValidator',
  validate: async (config, lookup) => {
    const instanceType = config.Build.InstanceType;
    const known = await lookup.describeInstanceTypes([instanceType]);
    if (known.has(instanceType)) {
      return [];
    }
    return [message('InstanceTypeValidator', 'ERROR', `The instance type '${instanceType}' is not supported.`)];
  }
};

export const parentImageValidator: Validator<ImageConfig> = {
  type: 'ParentImageValidator',
  validate: async (config, lookup) => {
    const amiId = parentAmiId(config);
    if (!amiId) {
      return [];
    }
    const images = await lookup.describeImages([amiId]);
    const image = images.get(amiId);
    if (!image) {
      return [message('ParentImageValidator', 'ERROR', `The parent image '${amiId}' does not exist.`)];
    }
    const instanceTypes = await lookup.describeInstanceTypes([config.Build.InstanceType]);
    const info = instanceTypes.get(config.Build.InstanceType);
    if (info && !info.architectures.includes(image.architecture)) {
      return [
        message(
          'ParentImageValidator',
          'ERROR',
          `The architecture of the parent image '${amiId}' (${image.architecture}) is not compatible with the build instance type '${config.Build.InstanceType}' (${info.architectures.join(', ')}).`
        )
      ];
    }
    return [];
  }
};

export const rootVolumeSizeValidator: Validator<ImageConfig> = {
  type: 'RootVolumeSizeValidator',
  validate: async (config, lookup) => {
    const size = config.Image.RootVolume.Size;
    const amiId = parentAmiId(config);
    if (size === undefined || !amiId) {
      return [];
    }
    const images = await lookup.describeImages([amiId]);
    const parentSize = images.get(amiId)?.rootVolumeSize;
    if (parentSize === undefined || size >= parentSize) {
      return [];
    }
    return [
      message(
        'RootVolumeSizeValidator',
        'ERROR',
        `Root volume size ${size} GB is less than the minimum required size ${parentSize} GB that equals parent image volume size.`
      )
    ];
  }
};

export const imageKmsKeyIdEncryptedValidator: Validator<ImageConfig> = {
  type: 'KmsKeyIdEncryptedValidator',
  validate: (config) => validateKmsKeyEncrypted(rootVolume(config))
};

export const imageEbsVolumeTypeSizeValidator: Validator<ImageConfig> = {
  type: 'EbsVolumeTypeSizeValidator',
  validate: (config) => (config.Image.RootVolume.Size === undefined ? [] : validateVolumeTypeSize(rootVolume(config)))
};

export const imageTagKeyValidator: Validator<ImageConfig> = {
  type: 'TagKeyValidator',
  validate: (config) =>
    [...(config.Image.Tags ?? []), ...(config.Build.Tags ?? [])]
      .filter((tag) => tag.Key.startsWith(TAG_PREFIX))
      .map((tag) =>
        message(
          'TagKeyValidator',
          'ERROR',
          `The tag key '${tag.Key}' is invalid: the prefix '${TAG_PREFIX}' is reserved and cannot be used.`
        )
      )
};

export const componentUrlValidator: Validator<ImageConfig> = {
  type: 'ComponentUrlValidator',
  validate: (config) => {
    const messages: ConfigValidationMessage[] = [];
    for (const component of config.Build.Components ?? []) {
      if (component.Type === 'script' && !/^(s3|https):\/\/\S+$/.test(component.Value)) {
        messages.push(
          message(
            'ComponentUrlValidator',
            'ERROR',
            `The script component '${component.Value}' must be an s3:// or https:// URL.`
          )
        );
      }
      if (component.Type === 'arn' && !component.Value.startsWith('arn:')) {
        messages.push(
          message('ComponentUrlValidator', 'ERROR', `The component '${component.Value}' is not a valid ARN.`)
        );
      }
    }
    return messages;
  }
};

export const securityGroupsWithoutSubnetValidator: Validator<ImageConfig> = {
  type: 'SecurityGroupsWithoutSubnetValidator',
  validate: (config) => {
    if (!config.Build.SecurityGroupIds?.length || config.Build.SubnetId) {
      return [];
    }
    return [
      message(
        'SecurityGroupsWithoutSubnetValidator',
        'WARNING',
        'Build.SecurityGroupIds are specified without Build.SubnetId; the security groups must belong to the default VPC.'
      )
    ];
  }
};

export const IMAGE_VALIDATORS: ReadonlyArray<Validator<ImageConfig>> = [
  imageNameValidator,
  imageInstanceTypeValidator,
  parentImageValidator,
  rootVolumeSizeValidator,
  imageKmsKeyIdEncryptedValidator,
  imageEbsVolumeTypeSizeValidator,
  imageTagKeyValidator,
  componentUrlValidator,
  securityGroupsWithoutSubnetValidator
];
