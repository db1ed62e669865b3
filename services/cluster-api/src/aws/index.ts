import { BatchClient } from '@aws-sdk/client-batch';
import { CloudFormationClient } from '@aws-sdk/client-cloudformation';
import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { EC2Client } from '@aws-sdk/client-ec2';
import { S3Client } from '@aws-sdk/client-s3';

import { createBatchGateway } from './batch';
import { createCloudFormationGateway } from './cloudformation';
import { createComputeFleetStatusTable } from './dynamodb';
import { createEc2Gateway } from './ec2';
import { createCloudWatchLogsGateway } from './logs';
import { createArtifactStore } from './s3';
import type { AwsGatewayFactory, AwsGateways } from './types';

export * from './types';
export * from './errors';

/** Builds SDK-backed gateways, one set per region. */
export const createSdkGatewayFactory = (options: { artifactsBucket: string }): AwsGatewayFactory => {
  const cache = new Map<string, AwsGateways>();
  return (region) => {
    const cached = cache.get(region);
    if (cached) {
      return cached;
    }
    const gateways: AwsGateways = {
      region,
      cloudFormation: createCloudFormationGateway(new CloudFormationClient({ region })),
      ec2: createEc2Gateway(new EC2Client({ region })),
      logs: createCloudWatchLogsGateway(new CloudWatchLogsClient({ region })),
      fleetStatus: createComputeFleetStatusTable(new DynamoDBClient({ region })),
      batch: createBatchGateway(new BatchClient({ region })),
      artifacts: createArtifactStore(new S3Client({ region }), options.artifactsBucket, region)
    };
    cache.set(region, gateways);
    return gateways;
  };
};
