import {
  DeleteSnapshotCommand,
  DeregisterImageCommand,
  DescribeImagesCommand,
  DescribeInstancesCommand,
  DescribeInstanceTypesCommand,
  DescribeKeyPairsCommand,
  DescribeSubnetsCommand,
  EC2Client,
  TerminateInstancesCommand,
  type Filter,
  type Image,
  type InstanceTypeInfo as SdkInstanceTypeInfo,
  type Tag
} from '@aws-sdk/client-ec2';
import {
  SUPPORTED_ARCHITECTURES,
  type Architecture,
  type ImageInfo,
  type InstanceTypeInfo,
  type SubnetInfo
} from '@hpcfleet/cluster-model';

import { callAws } from './errors';
import type { AmiRecord, Ec2Filter, Ec2Gateway, InstanceRecord } from './types';

const isArchitecture = (value: string | undefined): value is Architecture =>
  SUPPORTED_ARCHITECTURES.some((architecture) => architecture === value);

const toFilters = (filters: Ec2Filter[] | undefined): Filter[] | undefined =>
  filters?.map((filter) => ({ Name: filter.name, Values: filter.values }));

const toTagMap = (tags: Tag[] | undefined): Record<string, string> => {
  const result: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key) {
      result[tag.Key] = tag.Value ?? '';
    }
  }
  return result;
};

const rootVolumeSize = (image: Image): number | undefined =>
  image.BlockDeviceMappings?.find((mapping) => mapping.DeviceName === image.RootDeviceName)?.Ebs?.VolumeSize;

const toAmiRecord = (image: Image): AmiRecord => ({
  imageId: image.ImageId ?? '',
  name: image.Name,
  architecture: image.Architecture,
  state: image.State,
  description: image.Description,
  creationDate: image.CreationDate,
  tags: toTagMap(image.Tags),
  snapshotIds: (image.BlockDeviceMappings ?? []).flatMap((mapping) =>
    mapping.Ebs?.SnapshotId ? [mapping.Ebs.SnapshotId] : []
  )
});

export const createEc2Gateway = (client: EC2Client): Ec2Gateway => ({
  async describeInstances(filters, nextToken) {
    const response = await callAws('describe_instances', () =>
      client.send(new DescribeInstancesCommand({ Filters: toFilters(filters), NextToken: nextToken }))
    );
    const items: InstanceRecord[] = [];
    for (const reservation of response.Reservations ?? []) {
      for (const instance of reservation.Instances ?? []) {
        items.push({
          instanceId: instance.InstanceId ?? '',
          instanceType: instance.InstanceType ?? '',
          launchTime: instance.LaunchTime ?? new Date(0),
          state: instance.State?.Name ?? 'pending',
          privateIpAddress: instance.PrivateIpAddress ?? '',
          publicIpAddress: instance.PublicIpAddress,
          privateDnsName: instance.PrivateDnsName ?? '',
          imageId: instance.ImageId,
          tags: toTagMap(instance.Tags)
        });
      }
    }
    return { items, nextToken: response.NextToken };
  },

  async terminateInstances(instanceIds) {
    if (instanceIds.length === 0) {
      return;
    }
    await callAws('terminate_instances', () => client.send(new TerminateInstancesCommand({ InstanceIds: instanceIds })));
  },

  async describeAmis(query) {
    const images: Image[] = [];
    let nextToken: string | undefined;
    do {
      const response = await callAws('describe_images', () =>
        client.send(
          new DescribeImagesCommand({
            Owners: query.owners,
            ImageIds: query.imageIds,
            Filters: toFilters(query.filters),
            NextToken: nextToken
          })
        )
      );
      images.push(...(response.Images ?? []));
      nextToken = response.NextToken;
    } while (nextToken);
    return images.map(toAmiRecord);
  },

  async deregisterImage(imageId) {
    await callAws('deregister_image', () => client.send(new DeregisterImageCommand({ ImageId: imageId })));
  },

  async deleteSnapshot(snapshotId) {
    await callAws('delete_snapshot', () => client.send(new DeleteSnapshotCommand({ SnapshotId: snapshotId })));
  },

  async describeInstanceTypes(instanceTypes) {
    const result = new Map<string, InstanceTypeInfo>();
    if (instanceTypes.length === 0) {
      return result;
    }
    // Filtering by name lets types newer than this SDK through; unknown names are absent.
    const entries: SdkInstanceTypeInfo[] = [];
    let nextToken: string | undefined;
    do {
      const response = await callAws('describe_instance_types', () =>
        client.send(
          new DescribeInstanceTypesCommand({
            Filters: [{ Name: 'instance-type', Values: instanceTypes }],
            NextToken: nextToken
          })
        )
      );
      entries.push(...(response.InstanceTypes ?? []));
      nextToken = response.NextToken;
    } while (nextToken);
    for (const entry of entries) {
      if (!entry.InstanceType) {
        continue;
      }
      result.set(entry.InstanceType, {
        instanceType: entry.InstanceType,
        architectures: (entry.ProcessorInfo?.SupportedArchitectures ?? []).filter(isArchitecture),
        vcpus: entry.VCpuInfo?.DefaultVCpus ?? 0
      });
    }
    return result;
  },

  async describeImages(imageIds) {
    const result = new Map<string, ImageInfo>();
    if (imageIds.length === 0) {
      return result;
    }
    const response = await callAws('describe_images', () =>
      client.send(new DescribeImagesCommand({ Filters: [{ Name: 'image-id', Values: imageIds }] }))
    );
    for (const image of response.Images ?? []) {
      if (image.ImageId && isArchitecture(image.Architecture)) {
        result.set(image.ImageId, {
          imageId: image.ImageId,
          architecture: image.Architecture,
          rootVolumeSize: rootVolumeSize(image)
        });
      }
    }
    return result;
  },

  async describeKeyPairs(keyNames) {
    if (keyNames.length === 0) {
      return new Set<string>();
    }
    const response = await callAws('describe_key_pairs', () =>
      client.send(new DescribeKeyPairsCommand({ Filters: [{ Name: 'key-name', Values: keyNames }] }))
    );
    return new Set((response.KeyPairs ?? []).flatMap((pair) => (pair.KeyName ? [pair.KeyName] : [])));
  },

  async describeSubnets(subnetIds) {
    const result = new Map<string, SubnetInfo>();
    if (subnetIds.length === 0) {
      return result;
    }
    const response = await callAws('describe_subnets', () =>
      client.send(new DescribeSubnetsCommand({ Filters: [{ Name: 'subnet-id', Values: subnetIds }] }))
    );
    for (const subnet of response.Subnets ?? []) {
      if (subnet.SubnetId && subnet.VpcId) {
        result.set(subnet.SubnetId, {
          subnetId: subnet.SubnetId,
          vpcId: subnet.VpcId,
          availabilityZone: subnet.AvailabilityZone ?? ''
        });
      }
    }
    return result;
  }
});
