import type { TestContext } from 'node:test';

import { stringify } from 'yaml';

import { createApp } from '../src/app';
import type { ClusterApiConfig } from '../src/config';
import { createFakeGateways, TEST_BUCKET, TEST_REGION, type FakeGateways } from './fakes';

export const makeConfig = (overrides: Partial<ClusterApiConfig> = {}): ClusterApiConfig => ({
  host: '127.0.0.1',
  port: 0,
  logLevel: 'silent',
  defaultRegion: TEST_REGION,
  artifactsBucket: TEST_BUCKET,
  officialImageOwners: ['amazon'],
  apiTokens: [],
  enableMetrics: true,
  ...overrides
});

export const clusterDocument = () => ({
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

/** Official AMI the fake EC2 returns for alinux2 on x86_64. */
export const addOfficialImage = (gateways: FakeGateways) => {
  gateways.ec2.amis.push({
    owner: 'amazon',
    imageId: 'ami-official',
    name: 'hpcfleet-3.0.0-amzn2-hvm-x86_64-202401010000',
    architecture: 'x86_64',
    state: 'available',
    creationDate: '2024-01-01T00:00:00.000Z',
    tags: {},
    snapshotIds: []
  });
};

export const startApp = async (
  t: TestContext,
  options: { config?: Partial<ClusterApiConfig>; gateways?: FakeGateways } = {}
) => {
  const gateways = options.gateways ?? createFakeGateways();
  const { app, ctx } = await createApp(makeConfig(options.config), {
    gateways: () => gateways,
    generateSuffix: () => 'testsuffix',
    now: () => new Date('2024-02-01T10:00:00.000Z')
  });
  t.after(async () => {
    await app.close();
  });
  return { app, ctx, gateways };
};
