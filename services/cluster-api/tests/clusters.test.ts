import assert from 'node:assert/strict';
import { test } from 'node:test';

import { TAGS, dumpConfig, parseClusterConfig } from '@hpcfleet/cluster-model';

import { AwsClientError } from '../src/aws';
import { clusterStackTags, createFakeGateways, type FakeGateways } from './fakes';
import { addOfficialImage, clusterDocument, startApp, toYaml } from './testApp';

const STACK_ARN = 'arn:aws:cloudformation:us-east-1:123456789012:stack/demo/1';
const MAX_COUNT_PATH = 'Scheduling.SlurmQueues[queue1].ComputeResources[compute1].MaxCount';

const withMaxCount = (maxCount: number) => {
  const document = clusterDocument();
  document.Scheduling.SlurmQueues[0].ComputeResources[0].MaxCount = maxCount;
  return toYaml(document);
};

const seedExistingCluster = (gateways: FakeGateways, options: { version?: string } = {}) => {
  gateways.cloudFormation.addStack({
    stackName: 'demo',
    status: 'CREATE_COMPLETE',
    tags: clusterStackTags('demo', options)
  });
  const parsed = parseClusterConfig(toYaml(clusterDocument()));
  assert.ok(parsed.success);
  gateways.artifacts.objects.set(
    'hpcfleet/clusters/demo-existing/cluster-config-with-implied-values.yaml',
    dumpConfig(parsed.config)
  );
};

test('creates a cluster stack from a configuration', async (t) => {
  const gateways = createFakeGateways();
  addOfficialImage(gateways);
  const { app } = await startApp(t, { gateways });

  const response = await app.inject({
    method: 'POST',
    url: '/v3/clusters',
    payload: { clusterName: 'demo', clusterConfiguration: toYaml(clusterDocument()) }
  });

  assert.equal(response.statusCode, 202);
  assert.deepEqual(response.json(), {
    cluster: {
      clusterName: 'demo',
      region: 'us-east-1',
      version: '3.0.0',
      cloudformationStackArn: STACK_ARN,
      cloudformationStackStatus: 'CREATE_IN_PROGRESS',
      clusterStatus: 'CREATE_IN_PROGRESS',
      scheduler: { type: 'slurm' }
    }
  });

  const [submission] = gateways.cloudFormation.created;
  assert.equal(
    submission.templateUrl,
    'https://test-artifacts.s3.us-east-1.amazonaws.com/hpcfleet/clusters/demo-testsuffix/hpcfleet.cfn.json'
  );
  assert.equal(submission.disableRollback, false);
  assert.deepEqual(submission.tags, {
    [TAGS.version]: '3.0.0',
    [TAGS.clusterName]: 'demo',
    [TAGS.scheduler]: 'slurm',
    [TAGS.s3Bucket]: 'test-artifacts',
    [TAGS.clusterDir]: 'hpcfleet/clusters/demo-testsuffix'
  });
  assert.deepEqual(
    [...gateways.artifacts.objects.keys()],
    [
      'hpcfleet/clusters/demo-testsuffix/cluster-config.yaml',
      'hpcfleet/clusters/demo-testsuffix/cluster-config-with-implied-values.yaml',
      'hpcfleet/clusters/demo-testsuffix/hpcfleet.cfn.json'
    ]
  );

  const template = JSON.parse(gateways.artifacts.objects.get('hpcfleet/clusters/demo-testsuffix/hpcfleet.cfn.json') ?? '{}');
  assert.equal(template.Resources.HeadNode.Properties.ImageId, 'ami-official');
  assert.equal(template.Resources.ComputeFleetStatusTable.Properties.TableName, 'hpcfleet-demo');
});

test('rejects a cluster that already exists', async (t) => {
  const { app, gateways } = await startApp(t);
  gateways.cloudFormation.addStack({ stackName: 'demo', status: 'CREATE_COMPLETE', tags: clusterStackTags('demo') });

  const response = await app.inject({
    method: 'POST',
    url: '/v3/clusters',
    payload: { clusterName: 'demo', clusterConfiguration: toYaml(clusterDocument()) }
  });

  assert.equal(response.statusCode, 409);
  assert.deepEqual(response.json(), { message: "cluster 'demo' already exists" });
});

test('reports schema errors of an invalid configuration', async (t) => {
  const { app, gateways } = await startApp(t);
  const document = clusterDocument();

  const response = await app.inject({
    method: 'POST',
    url: '/v3/clusters',
    payload: {
      clusterName: 'demo',
      clusterConfiguration: toYaml({ ...document, HeadNode: { ...document.HeadNode, Foo: 'bar' } })
    }
  });

  assert.equal(response.statusCode, 400);
  assert.deepEqual(response.json(), {
    message: 'Bad Request: Invalid cluster configuration.',
    configurationValidationErrors: [
      { type: 'ConfigSchemaValidator', level: 'ERROR', message: "HeadNode: Unrecognized key(s) in object: 'Foo'" }
    ]
  });
  assert.equal(gateways.cloudFormation.created.length, 0);
});

test('returns validation messages on dryrun without creating anything', async (t) => {
  const { app, gateways } = await startApp(t);
  const document = clusterDocument();
  document.HeadNode.Ssh.AllowedIps = '0.0.0.0/0';
  const payload = { clusterName: 'demo', clusterConfiguration: toYaml(document) };
  const warning = {
    type: 'SshAllowedIpsValidator',
    level: 'WARNING',
    message: 'SSH access to the head node is open to 0.0.0.0/0. Restrict HeadNode.Ssh.AllowedIps to the networks that need it.'
  };

  const dryrun = await app.inject({ method: 'POST', url: '/v3/clusters?dryrun=true', payload });
  assert.equal(dryrun.statusCode, 412);
  assert.deepEqual(dryrun.json(), {
    message: 'Request would have succeeded, but DryRun flag is set.',
    validationMessages: [warning]
  });

  const strict = await app.inject({ method: 'POST', url: '/v3/clusters?validationFailureLevel=WARNING', payload });
  assert.equal(strict.statusCode, 400);
  assert.deepEqual(strict.json(), {
    message: 'Bad Request: Invalid cluster configuration.',
    configurationValidationErrors: [warning]
  });

  const suppressed = await app.inject({
    method: 'POST',
    url: '/v3/clusters?dryrun=true&suppressValidators=type:SshAllowedIpsValidator',
    payload
  });
  assert.deepEqual(suppressed.json(), { message: 'Request would have succeeded, but DryRun flag is set.' });
  assert.equal(gateways.cloudFormation.created.length, 0);
});

test('validates cluster names and regions', async (t) => {
  const { app } = await startApp(t, { config: { defaultRegion: undefined } });

  const badName = await app.inject({ method: 'GET', url: '/v3/clusters/bad_name?region=us-east-1' });
  assert.equal(badName.statusCode, 400);
  assert.equal(
    badName.json().message,
    "Bad Request: Error: The cluster name 'bad_name' can contain only alphanumeric characters (case-sensitive) and hyphens. It must start with an alphabetic character and can't be longer than 60 characters."
  );

  const noRegion = await app.inject({ method: 'GET', url: '/v3/clusters' });
  assert.equal(noRegion.statusCode, 400);
  assert.deepEqual(noRegion.json(), { message: 'Bad Request: region needs to be set' });

  const unsupported = await app.inject({ method: 'GET', url: '/v3/clusters?region=mars-1' });
  assert.deepEqual(unsupported.json(), { message: "Bad Request: invalid or unsupported region 'mars-1'" });
});

test('lists cluster stacks filtered by status', async (t) => {
  const { app, gateways } = await startApp(t);
  gateways.cloudFormation.addStack({ stackName: 'demo', status: 'CREATE_COMPLETE', tags: clusterStackTags('demo') });
  gateways.cloudFormation.addStack({ stackName: 'old', status: 'DELETE_IN_PROGRESS', tags: clusterStackTags('old') });
  gateways.cloudFormation.addStack({ stackName: 'unrelated', status: 'CREATE_COMPLETE' });
  gateways.cloudFormation.addStack({
    stackName: 'demo-nested',
    status: 'CREATE_COMPLETE',
    tags: clusterStackTags('demo'),
    parentId: STACK_ARN
  });

  const all = await app.inject({ method: 'GET', url: '/v3/clusters' });
  assert.deepEqual(
    all.json().clusters.map((cluster: { clusterName: string }) => cluster.clusterName),
    ['demo', 'old']
  );

  const filtered = await app.inject({ method: 'GET', url: '/v3/clusters?clusterStatus=CREATE_COMPLETE' });
  assert.deepEqual(filtered.json(), {
    clusters: [
      {
        clusterName: 'demo',
        region: 'us-east-1',
        version: '3.0.0',
        cloudformationStackArn: STACK_ARN,
        cloudformationStackStatus: 'CREATE_COMPLETE',
        clusterStatus: 'CREATE_COMPLETE',
        scheduler: { type: 'slurm' }
      }
    ]
  });

  const invalid = await app.inject({ method: 'GET', url: '/v3/clusters?clusterStatus=BROKEN' });
  assert.equal(invalid.statusCode, 400);
});

test('describes a running cluster with its head node and fleet status', async (t) => {
  const { app, gateways } = await startApp(t);
  gateways.cloudFormation.addStack({ stackName: 'demo', status: 'CREATE_COMPLETE', tags: clusterStackTags('demo') });
  gateways.fleetStatus.setStatus('hpcfleet-demo', 'RUNNING');
  gateways.ec2.addInstance({
    instanceId: 'i-head',
    instanceType: 't3.micro',
    privateIpAddress: '10.0.0.5',
    publicIpAddress: '54.0.0.1',
    tags: { [TAGS.clusterName]: 'demo', [TAGS.nodeType]: 'HeadNode' }
  });

  const response = await app.inject({ method: 'GET', url: '/v3/clusters/demo' });

  assert.equal(response.statusCode, 200);
  const body = response.json();
  assert.equal(body.clusterStatus, 'CREATE_COMPLETE');
  assert.equal(body.cloudFormationStackStatus, 'CREATE_COMPLETE');
  assert.equal(body.computeFleetStatus, 'RUNNING');
  assert.equal(body.creationTime, '2024-01-01T00:00:00.000Z');
  assert.equal(body.lastUpdatedTime, '2024-01-01T00:00:00.000Z');
  assert.equal(
    body.clusterConfiguration.url,
    'https://test-artifacts.s3.amazonaws.com/hpcfleet/clusters/demo-existing/cluster-config.yaml?expires=3600'
  );
  assert.deepEqual(body.headNode, {
    instanceId: 'i-head',
    instanceType: 't3.micro',
    launchTime: '2024-01-01T00:00:00.000Z',
    privateIpAddress: '10.0.0.5',
    publicIpAddress: '54.0.0.1',
    state: 'running'
  });
  assert.deepEqual(body.tags[1], { key: TAGS.clusterName, value: 'demo' });
  assert.equal(body.failures, undefined);
});

test('reports the failure of a cluster that did not create', async (t) => {
  const { app, gateways } = await startApp(t);
  gateways.cloudFormation.addStack({
    stackName: 'demo',
    status: 'ROLLBACK_COMPLETE',
    statusReason: 'The following resource(s) failed to create: [HeadNode].',
    tags: clusterStackTags('demo')
  });

  const response = await app.inject({ method: 'GET', url: '/v3/clusters/demo' });

  assert.equal(response.json().clusterStatus, 'CREATE_FAILED');
  assert.deepEqual(response.json().failures, [
    { failureCode: 'ClusterCreationFailure', failureReason: 'The following resource(s) failed to create: [HeadNode].' }
  ]);
});

test('refuses clusters that are missing or from another major version', async (t) => {
  const { app, gateways } = await startApp(t);
  gateways.cloudFormation.addStack({
    stackName: 'legacy',
    status: 'CREATE_COMPLETE',
    tags: clusterStackTags('legacy', { version: '2.11.0' })
  });

  const missing = await app.inject({ method: 'GET', url: '/v3/clusters/ghost' });
  assert.equal(missing.statusCode, 404);
  assert.deepEqual(missing.json(), { message: "cluster 'ghost' does not exist" });

  const legacy = await app.inject({ method: 'GET', url: '/v3/clusters/legacy' });
  assert.equal(legacy.statusCode, 400);
  assert.deepEqual(legacy.json(), {
    message: "Bad Request: cluster 'legacy' belongs to an incompatible hpcfleet major version (2.11.0)."
  });
});

test('updates a cluster when the change set is allowed', async (t) => {
  const { app, gateways } = await startApp(t);
  seedExistingCluster(gateways);

  const response = await app.inject({
    method: 'PUT',
    url: '/v3/clusters/demo',
    payload: { clusterConfiguration: withMaxCount(20) }
  });

  assert.equal(response.statusCode, 202);
  const body = response.json();
  assert.deepEqual(body.changeSet, [{ parameter: MAX_COUNT_PATH, currentValue: '10', requestedValue: '20' }]);
  assert.equal(body.cluster.clusterStatus, 'UPDATE_IN_PROGRESS');
  assert.equal(
    gateways.cloudFormation.updated[0].templateUrl,
    'https://test-artifacts.s3.us-east-1.amazonaws.com/hpcfleet/clusters/demo-testsuffix/hpcfleet.cfn.json'
  );
  assert.equal(gateways.cloudFormation.updated[0].tags[TAGS.clusterDir], 'hpcfleet/clusters/demo-testsuffix');
  assert.ok(gateways.artifacts.objects.has('hpcfleet/clusters/demo-existing/cluster-config-with-implied-values.yaml'));
});

test('keeps the deployed configuration as baseline when the stack update is rejected', async (t) => {
  const { app, gateways } = await startApp(t);
  seedExistingCluster(gateways);
  const deployed = gateways.artifacts.objects.get('hpcfleet/clusters/demo-existing/cluster-config-with-implied-values.yaml');
  gateways.cloudFormation.failUpdate = new AwsClientError('update_stack', 'ThrottlingException', 'Rate exceeded');

  const failed = await app.inject({
    method: 'PUT',
    url: '/v3/clusters/demo',
    payload: { clusterConfiguration: withMaxCount(20) }
  });
  assert.equal(failed.statusCode, 429);
  assert.deepEqual(failed.json(), { message: 'Rate exceeded' });
  assert.deepEqual(
    [...gateways.artifacts.objects.keys()].filter((key) => key.startsWith('hpcfleet/clusters/demo-testsuffix/')),
    []
  );
  assert.equal(
    gateways.artifacts.objects.get('hpcfleet/clusters/demo-existing/cluster-config-with-implied-values.yaml'),
    deployed
  );

  gateways.cloudFormation.failUpdate = null;
  const retried = await app.inject({
    method: 'PUT',
    url: '/v3/clusters/demo?dryrun=true',
    payload: { clusterConfiguration: withMaxCount(20) }
  });
  assert.equal(retried.statusCode, 412);
  assert.deepEqual(retried.json().changeSet, [{ parameter: MAX_COUNT_PATH, currentValue: '10', requestedValue: '20' }]);
});

test('removes uploaded artifacts when the stack cannot be created', async (t) => {
  const gateways = createFakeGateways();
  addOfficialImage(gateways);
  gateways.cloudFormation.failCreate = new AwsClientError('create_stack', 'InsufficientCapabilitiesException', 'Requires capabilities');
  const { app } = await startApp(t, { gateways });

  const response = await app.inject({
    method: 'POST',
    url: '/v3/clusters',
    payload: { clusterName: 'demo', clusterConfiguration: toYaml(clusterDocument()) }
  });

  assert.equal(response.statusCode, 500);
  assert.deepEqual(response.json(), {
    message: 'Failed when calling AWS service in create_stack: Requires capabilities'
  });
  assert.equal(gateways.artifacts.objects.size, 0);
  assert.equal(gateways.cloudFormation.stacks.size, 0);
});

test('requires a stopped fleet to shrink a queue', async (t) => {
  const { app, gateways } = await startApp(t);
  seedExistingCluster(gateways);
  gateways.fleetStatus.setStatus('hpcfleet-demo', 'RUNNING');
  const change = { parameter: MAX_COUNT_PATH, currentValue: '10', requestedValue: '5' };

  const rejected = await app.inject({
    method: 'PUT',
    url: '/v3/clusters/demo',
    payload: { clusterConfiguration: withMaxCount(5) }
  });
  assert.equal(rejected.statusCode, 400);
  assert.deepEqual(rejected.json(), {
    message: 'Bad Request: Update failure',
    updateValidationErrors: [
      {
        ...change,
        message:
          'Shrinking a queue requires the compute fleet to be stopped first. Stop the compute fleet with the update-compute-fleet operation.'
      }
    ],
    changeSet: [change]
  });

  const forced = await app.inject({
    method: 'PUT',
    url: '/v3/clusters/demo?forceUpdate=true&dryrun=true',
    payload: { clusterConfiguration: withMaxCount(5) }
  });
  assert.equal(forced.statusCode, 412);
  assert.deepEqual(forced.json().changeSet, [change]);

  gateways.fleetStatus.setStatus('hpcfleet-demo', 'STOPPED');
  const stopped = await app.inject({
    method: 'PUT',
    url: '/v3/clusters/demo',
    payload: { clusterConfiguration: withMaxCount(5) }
  });
  assert.equal(stopped.statusCode, 202);
});

test('rejects updates without changes or across versions', async (t) => {
  const { app, gateways } = await startApp(t);
  seedExistingCluster(gateways);

  const unchanged = await app.inject({
    method: 'PUT',
    url: '/v3/clusters/demo',
    payload: { clusterConfiguration: toYaml(clusterDocument()) }
  });
  assert.equal(unchanged.statusCode, 400);
  assert.deepEqual(unchanged.json(), { message: 'Bad Request: No changes found in your cluster configuration.' });

  gateways.cloudFormation.addStack({
    stackName: 'demo',
    status: 'CREATE_COMPLETE',
    tags: clusterStackTags('demo', { version: '3.1.0' })
  });
  const otherVersion = await app.inject({
    method: 'PUT',
    url: '/v3/clusters/demo',
    payload: { clusterConfiguration: withMaxCount(20) }
  });
  assert.deepEqual(otherVersion.json(), {
    message: "Bad Request: cluster 'demo' can be updated only with the same hpcfleet version used to create it."
  });
});

test('deletes a cluster and terminates its compute nodes', async (t) => {
  const { app, gateways } = await startApp(t);
  gateways.cloudFormation.addStack({ stackName: 'demo', status: 'CREATE_COMPLETE', tags: clusterStackTags('demo') });
  gateways.ec2.addInstance({ instanceId: 'i-head', tags: { [TAGS.clusterName]: 'demo', [TAGS.nodeType]: 'HeadNode' } });
  gateways.ec2.addInstance({ instanceId: 'i-compute', tags: { [TAGS.clusterName]: 'demo', [TAGS.nodeType]: 'Compute' } });

  const response = await app.inject({ method: 'DELETE', url: '/v3/clusters/demo' });

  assert.equal(response.statusCode, 202);
  assert.equal(response.json().cluster.clusterStatus, 'DELETE_IN_PROGRESS');
  assert.deepEqual(gateways.cloudFormation.deleted, ['demo']);
  assert.deepEqual(gateways.ec2.terminated, ['i-compute']);
});
