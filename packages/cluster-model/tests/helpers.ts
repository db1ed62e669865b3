import { stringify } from 'yaml';

import type { Ec2Lookup, ImageInfo, InstanceTypeInfo, SubnetInfo } from '../src';

export const baseClusterDocument = () => ({
  Image: { Os: 'alinux2' },
  HeadNode: {
    InstanceType: 't3.micro',
    Networking: { SubnetId: 'subnet-head' },
    Ssh: { KeyName: 'test-key', AllowedIps: '10.0.0.0/16' }
  },
  Scheduling: {
    Scheduler: 'slurm',
    SlurmQueues: [
      {
        Name: 'queue1',
        Networking: { SubnetIds: ['subnet-compute'] },
        ComputeResources: [{ Name: 'compute1', InstanceType: 'c5.xlarge', MinCount: 0, MaxCount: 10 }]
      }
    ]
  }
});

export const toYaml = (document: unknown): string => stringify(document);

export class FakeEc2Lookup implements Ec2Lookup {
  instanceTypes = new Map<string, InstanceTypeInfo>([
    ['t3.micro', { instanceType: 't3.micro', architectures: ['x86_64'], vcpus: 2 }],
    ['c5.xlarge', { instanceType: 'c5.xlarge', architectures: ['x86_64'], vcpus: 4 }],
    ['m6g.large', { instanceType: 'm6g.large', architectures: ['arm64'], vcpus: 2 }]
  ]);
  images = new Map<string, ImageInfo>();
  keyPairs = new Set<string>(['test-key']);
  subnets = new Map<string, SubnetInfo>([
    ['subnet-head', { subnetId: 'subnet-head', vpcId: 'vpc-1', availabilityZone: 'us-east-1a' }],
    ['subnet-compute', { subnetId: 'subnet-compute', vpcId: 'vpc-1', availabilityZone: 'us-east-1b' }]
  ]);

  async describeInstanceTypes(instanceTypes: string[]) {
    return pick(this.instanceTypes, instanceTypes);
  }

  async describeImages(imageIds: string[]) {
    return pick(this.images, imageIds);
  }

  async describeKeyPairs(keyNames: string[]) {
    return new Set(keyNames.filter((name) => this.keyPairs.has(name)));
  }

  async describeSubnets(subnetIds: string[]) {
    return pick(this.subnets, subnetIds);
  }
}

function pick<T>(source: Map<string, T>, keys: string[]): Map<string, T> {
  const result = new Map<string, T>();
  for (const key of keys) {
    const value = source.get(key);
    if (value !== undefined) {
      result.set(key, value);
    }
  }
  return result;
}
