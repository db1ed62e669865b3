import assert from 'node:assert/strict';
import { test } from 'node:test';

import { dumpConfig, parseClusterConfig } from '@hpcfleet/cluster-model';
import pino from 'pino';

import { ClusterService } from '../src/clusters/clusterService';
import { ComputeFleetService } from '../src/clusters/computeFleet';
import {
  createCustomResourceHandler,
  flattenData,
  type CustomResourceEvent,
  type CustomResourceResponse
} from '../src/customResource/handler';
import { clusterStackTags, createFakeGateways, type FakeGateways } from './fakes';
import { addOfficialImage, clusterDocument, toYaml } from './testApp';

const COMMON = {
  ServiceToken: 'arn:aws:lambda:us-east-1:123456789012:function:hpcfleet-provider',
  ResponseURL: 'https://example.invalid/response',
  StackId: 'arn:aws:cloudformation:us-east-1:123456789012:stack/parent/1',
  RequestId: 'request-1',
  LogicalResourceId: 'Cluster',
  ResourceType: 'Custom::HpcFleetCluster'
};

const FUNCTION_ARN = 'arn:aws:lambda:us-east-1:123456789012:function:hpcfleet-provider';

const setStackStatus = (gateways: FakeGateways, status: 'CREATE_COMPLETE' | 'CREATE_FAILED' | 'DELETE_COMPLETE') => {
  const stack = gateways.cloudFormation.stacks.get('demo');
  if (stack) {
    stack.status = status;
  }
};

const setup = (options: { remainingMs?: number; onSleep?: (gateways: FakeGateways) => void } = {}) => {
  const gateways = createFakeGateways();
  addOfficialImage(gateways);
  const logger = pino({ level: 'silent' });
  const sent: Array<{ url: string; response: CustomResourceResponse }> = [];
  const reinvoked: Array<{ functionArn: string; event: CustomResourceEvent }> = [];
  const handler = createCustomResourceHandler({
    clusters: new ClusterService({
      logger,
      computeFleet: new ComputeFleetService(logger),
      officialImageOwners: ['amazon'],
      generateSuffix: () => 'testsuffix'
    }),
    gateways: () => gateways,
    region: 'us-east-1',
    logger,
    sendResponse: async (url, response) => {
      sent.push({ url, response });
    },
    reinvoke: async (functionArn, event) => {
      reinvoked.push({ functionArn, event });
    },
    sleep: async () => {
      options.onSleep?.(gateways);
    }
  });
  const clock = { remainingMs: options.remainingMs ?? 900_000 };
  const context = { getRemainingTimeInMillis: () => clock.remainingMs, invokedFunctionArn: FUNCTION_ARN };
  const handle = (event: CustomResourceEvent) => handler(event, context);
  const invoke = async (event: CustomResourceEvent) => {
    const response = await handle(event);
    assert.ok(response, 'expected a response to CloudFormation');
    return response;
  };
  return { gateways, sent, reinvoked, clock, handle, invoke };
};

const seedExistingCluster = (gateways: FakeGateways) => {
  gateways.cloudFormation.addStack({ stackName: 'demo', status: 'CREATE_COMPLETE', tags: clusterStackTags('demo') });
  const parsed = parseClusterConfig(toYaml(clusterDocument()));
  assert.ok(parsed.success);
  gateways.artifacts.objects.set(
    'hpcfleet/clusters/demo-existing/cluster-config-with-implied-values.yaml',
    dumpConfig(parsed.config)
  );
};

test('creates a cluster and waits for it to complete', async () => {
  const { gateways, sent, invoke } = setup({ onSleep: (fakes) => setStackStatus(fakes, 'CREATE_COMPLETE') });

  const response = await invoke({
    ...COMMON,
    RequestType: 'Create',
    ResourceProperties: { ServiceToken: COMMON.ServiceToken, ClusterName: 'demo', ClusterConfiguration: clusterDocument() }
  });

  assert.equal(response.Status, 'SUCCESS');
  assert.equal(response.PhysicalResourceId, 'demo');
  assert.equal(response.Data.clusterName, 'demo');
  assert.equal(response.Data.clusterStatus, 'CREATE_COMPLETE');
  assert.equal(response.Data['scheduler.type'], 'slurm');
  assert.equal(gateways.cloudFormation.created.length, 1);
  assert.deepEqual(sent, [{ url: COMMON.ResponseURL, response }]);
});

test('reports validation failures ordered by level', async () => {
  const { sent, invoke } = setup();
  const document = clusterDocument();

  const response = await invoke({
    ...COMMON,
    RequestType: 'Create',
    ResourceProperties: {
      ServiceToken: COMMON.ServiceToken,
      ClusterName: 'demo',
      ValidationFailureLevel: 'INFO',
      ClusterConfiguration: {
        ...document,
        HeadNode: { ...document.HeadNode, Ssh: { KeyName: 'test-key', AllowedIps: '0.0.0.0/0' } },
        Scheduling: {
          Scheduler: 'slurm',
          SlurmQueues: [{ ...document.Scheduling.SlurmQueues[0], CapacityType: 'SPOT' }]
        }
      }
    }
  });

  assert.equal(response.Status, 'FAILED');
  const reason = JSON.parse(response.Reason);
  assert.equal(reason.message, 'Bad Request: Invalid cluster configuration.');
  assert.deepEqual(
    reason.configurationValidationErrors.map((entry: { type: string; level: string }) => [entry.level, entry.type]),
    [
      ['INFO', 'SpotCapacityValidator'],
      ['WARNING', 'SshAllowedIpsValidator']
    ]
  );
  assert.equal(sent.length, 1);
});

test('continues waiting in a new invocation when time runs short', async () => {
  const { gateways, sent, reinvoked, clock, handle } = setup({ remainingMs: 30_000 });
  const event: CustomResourceEvent = {
    ...COMMON,
    RequestType: 'Create',
    ResourceProperties: { ServiceToken: COMMON.ServiceToken, ClusterName: 'demo', ClusterConfiguration: toYaml(clusterDocument()) }
  };

  assert.equal(await handle(event), null);
  assert.deepEqual(sent, []);
  assert.equal(reinvoked.length, 1);
  const [{ functionArn, event: next }] = reinvoked;
  assert.equal(functionArn, FUNCTION_ARN);
  assert.equal(next.RequestId, 'request-1');
  assert.equal(next.hpcfleetPoll?.clusterName, 'demo');
  assert.equal(next.hpcfleetPoll?.target, 'CREATE_COMPLETE');
  assert.equal(next.hpcfleetPoll?.physicalResourceId, 'demo');

  setStackStatus(gateways, 'CREATE_COMPLETE');
  clock.remainingMs = 900_000;
  const resumed = await handle(next);

  assert.ok(resumed);
  assert.equal(resumed.Status, 'SUCCESS');
  assert.equal(resumed.PhysicalResourceId, 'demo');
  assert.equal(resumed.Data.clusterStatus, 'CREATE_COMPLETE');
  assert.equal(gateways.cloudFormation.created.length, 1);
  assert.equal(reinvoked.length, 1);
  assert.deepEqual(sent, [{ url: COMMON.ResponseURL, response: resumed }]);
});

test('keeps the cluster name as physical id once the create was submitted', async () => {
  const { gateways, invoke } = setup({
    onSleep: (fakes) => {
      const stack = fakes.cloudFormation.stacks.get('demo');
      if (stack) {
        stack.status = 'CREATE_FAILED';
        stack.statusReason = 'Resource creation cancelled';
      }
    }
  });

  const response = await invoke({
    ...COMMON,
    RequestType: 'Create',
    ResourceProperties: { ServiceToken: COMMON.ServiceToken, ClusterName: 'demo', ClusterConfiguration: clusterDocument() }
  });

  assert.equal(response.Status, 'FAILED');
  assert.equal(response.PhysicalResourceId, 'demo');
  assert.equal(response.Reason, 'cluster demo reached CREATE_FAILED: Resource creation cancelled');
  assert.equal(gateways.cloudFormation.created.length, 1);
});

test('rolls back a create that never started without touching an existing cluster', async () => {
  const { gateways, invoke } = setup();
  seedExistingCluster(gateways);
  const invalid = {
    ServiceToken: COMMON.ServiceToken,
    ClusterName: 'demo',
    ValidationFailureLevel: 'error',
    ClusterConfiguration: clusterDocument()
  };

  const rejected = await invoke({ ...COMMON, RequestType: 'Create', ResourceProperties: invalid });
  assert.equal(rejected.Status, 'FAILED');
  assert.equal(rejected.PhysicalResourceId, 'Cluster:not-created');

  const rollback = await invoke({
    ...COMMON,
    RequestType: 'Delete',
    PhysicalResourceId: rejected.PhysicalResourceId,
    ResourceProperties: invalid
  });
  assert.equal(rollback.Status, 'SUCCESS');
  assert.equal(rollback.PhysicalResourceId, 'Cluster:not-created');
  assert.deepEqual(gateways.cloudFormation.deleted, []);

  const conflicting = await invoke({
    ...COMMON,
    RequestType: 'Create',
    ResourceProperties: { ...invalid, ValidationFailureLevel: 'ERROR' }
  });
  assert.equal(conflicting.Status, 'FAILED');
  assert.equal(conflicting.PhysicalResourceId, 'Cluster:not-created');
  assert.equal(gateways.cloudFormation.stacks.get('demo')?.status, 'CREATE_COMPLETE');
});

test('treats an update without changes as success and refuses renames', async () => {
  const { gateways, invoke } = setup();
  seedExistingCluster(gateways);
  const properties = { ServiceToken: COMMON.ServiceToken, ClusterName: 'demo', ClusterConfiguration: clusterDocument() };

  const unchanged = await invoke({
    ...COMMON,
    RequestType: 'Update',
    PhysicalResourceId: 'demo',
    ResourceProperties: properties,
    OldResourceProperties: properties
  });
  assert.equal(unchanged.Status, 'SUCCESS');
  assert.equal(unchanged.Data.clusterStatus, 'CREATE_COMPLETE');
  assert.deepEqual(gateways.cloudFormation.updated, []);

  const renamed = await invoke({
    ...COMMON,
    RequestType: 'Update',
    PhysicalResourceId: 'demo',
    ResourceProperties: properties,
    OldResourceProperties: { ...properties, ClusterName: 'previous' }
  });
  assert.equal(renamed.Status, 'FAILED');
  assert.equal(renamed.Reason, 'Cannot update the ClusterName property.');
});

test('deletes the cluster unless it is retained', async () => {
  const { gateways, invoke } = setup({ onSleep: (fakes) => setStackStatus(fakes, 'DELETE_COMPLETE') });
  seedExistingCluster(gateways);
  const properties = { ServiceToken: COMMON.ServiceToken, ClusterName: 'demo', ClusterConfiguration: clusterDocument() };

  const retained = await invoke({
    ...COMMON,
    RequestType: 'Delete',
    PhysicalResourceId: 'demo',
    ResourceProperties: { ...properties, DeletionPolicy: 'Retain' }
  });
  assert.equal(retained.Status, 'SUCCESS');
  assert.deepEqual(gateways.cloudFormation.deleted, []);

  const deleted = await invoke({ ...COMMON, RequestType: 'Delete', PhysicalResourceId: 'demo', ResourceProperties: properties });
  assert.equal(deleted.Status, 'SUCCESS');
  assert.deepEqual(gateways.cloudFormation.deleted, ['demo']);

  const missing = await invoke({ ...COMMON, RequestType: 'Delete', PhysicalResourceId: 'ghost', ResourceProperties: { ...properties, ClusterName: 'ghost' } });
  assert.equal(missing.Status, 'SUCCESS');
});

test('flattens nested response data into string attributes', () => {
  assert.deepEqual(flattenData({ headNode: { instanceId: 'i-head', port: 22 }, tags: [{ key: 'a' }], skipped: undefined }), {
    'headNode.instanceId': 'i-head',
    'headNode.port': '22',
    tags: '[{"key":"a"}]'
  });
});
