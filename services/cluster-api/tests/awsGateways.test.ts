import assert from 'node:assert/strict';
import { test } from 'node:test';

import { EC2Client, type DescribeInstanceTypesCommandOutput } from '@aws-sdk/client-ec2';

import { AwsClientError } from '../src/aws';
import { statusUpdateInput } from '../src/aws/dynamodb';
import { createEc2Gateway } from '../src/aws/ec2';

/** EC2 client that answers from `pages` in order and records every request input. */
const stubEc2 = (pages: DescribeInstanceTypesCommandOutput[], failure?: Error) => {
  const client = new EC2Client({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' }
  });
  const inputs: unknown[] = [];
  client.middlewareStack.add(
    () => async (args) => {
      inputs.push(args.input);
      if (failure) {
        throw failure;
      }
      return { output: pages.shift() ?? { $metadata: {} }, response: {} };
    },
    { step: 'initialize', name: 'stubResponses' }
  );
  return { gateway: createEc2Gateway(client), inputs };
};

test('looks up instance types by name across pages, including names the sdk does not list', async () => {
  const { gateway, inputs } = stubEc2([
    {
      $metadata: {},
      InstanceTypes: [
        { InstanceType: 'c5.xlarge', ProcessorInfo: { SupportedArchitectures: ['x86_64'] }, VCpuInfo: { DefaultVCpus: 4 } }
      ],
      NextToken: 'page-2'
    },
    {
      $metadata: {},
      InstanceTypes: [
        { InstanceType: 'm6g.large', ProcessorInfo: { SupportedArchitectures: ['arm64'] }, VCpuInfo: { DefaultVCpus: 2 } }
      ]
    }
  ]);

  const types = await gateway.describeInstanceTypes(['c5.xlarge', 'm6g.large', 'zz9.next']);

  const filters = [{ Name: 'instance-type', Values: ['c5.xlarge', 'm6g.large', 'zz9.next'] }];
  assert.deepEqual(inputs, [
    { Filters: filters, NextToken: undefined },
    { Filters: filters, NextToken: 'page-2' }
  ]);
  assert.deepEqual(
    [...types.entries()],
    [
      ['c5.xlarge', { instanceType: 'c5.xlarge', architectures: ['x86_64'], vcpus: 4 }],
      ['m6g.large', { instanceType: 'm6g.large', architectures: ['arm64'], vcpus: 2 }]
    ]
  );
});

test('skips the instance type lookup when nothing is requested', async () => {
  const { gateway, inputs } = stubEc2([]);

  const types = await gateway.describeInstanceTypes([]);

  assert.equal(types.size, 0);
  assert.deepEqual(inputs, []);
});

test('reports instance type lookup failures as aws client errors', async () => {
  const failure = new Error('Request limit exceeded.');
  failure.name = 'RequestLimitExceeded';
  const { gateway } = stubEc2([], failure);

  await assert.rejects(
    gateway.describeInstanceTypes(['c5.xlarge']),
    (error: unknown) =>
      error instanceof AwsClientError &&
      error.operation === 'describe_instance_types' &&
      error.code === 'RequestLimitExceeded' &&
      error.message === 'Request limit exceeded.'
  );
});

test('updates only the status fields of the compute fleet item', () => {
  assert.deepEqual(
    statusUpdateInput('hpcfleet-demo', {
      expected: 'RUNNING',
      next: 'STOP_REQUESTED',
      updatedAt: '2024-01-02T00:00:00.000Z'
    }),
    {
      TableName: 'hpcfleet-demo',
      Key: { Id: 'COMPUTE_FLEET' },
      UpdateExpression: 'SET #data.#status = :next, #data.#updated = :updated',
      ConditionExpression: '#data.#status = :expected',
      ExpressionAttributeNames: { '#data': 'Data', '#status': 'status', '#updated': 'lastStatusUpdatedTime' },
      ExpressionAttributeValues: {
        ':next': 'STOP_REQUESTED',
        ':updated': '2024-01-02T00:00:00.000Z',
        ':expected': 'RUNNING'
      }
    }
  );
});
