import assert from 'node:assert/strict';
import { test } from 'node:test';

import { AwsClientError } from '../src/aws';
import { loadConfig } from '../src/config';
import { UNEXPECTED_ERROR_MESSAGE, mapErrorToResponse } from '../src/errors';
import { clusterStackTags, createFakeGateways } from './fakes';
import { clusterDocument, startApp, toYaml } from './testApp';

test('reports health and readiness', async (t) => {
  const { app } = await startApp(t);

  const health = await app.inject({ method: 'GET', url: '/healthz' });
  assert.deepEqual(health.json(), { status: 'ok' });

  const ready = await app.inject({ method: 'GET', url: '/readyz' });
  assert.equal(ready.statusCode, 200);
  assert.deepEqual(ready.json(), { status: 'ready', components: { artifacts: true } });

  const metrics = await app.inject({ method: 'GET', url: '/metrics' });
  assert.equal(metrics.statusCode, 200);
  assert.ok(metrics.body.includes('hpcfleet_component_ready{component="artifacts"} 1'));
});

test('is not ready and refuses writes without an artifacts bucket', async (t) => {
  const { app } = await startApp(t, {
    config: { artifactsBucket: undefined, enableMetrics: false },
    gateways: createFakeGateways({ bucket: '' })
  });

  const ready = await app.inject({ method: 'GET', url: '/readyz' });
  assert.equal(ready.statusCode, 503);
  assert.deepEqual(ready.json(), { status: 'not_ready', components: { artifacts: false } });

  const create = await app.inject({
    method: 'POST',
    url: '/v3/clusters',
    payload: { clusterName: 'demo', clusterConfiguration: toYaml(clusterDocument()) }
  });
  assert.equal(create.statusCode, 500);
  assert.deepEqual(create.json(), { message: 'artifacts bucket is not configured. Set HPCFLEET_ARTIFACTS_BUCKET.' });

  const metrics = await app.inject({ method: 'GET', url: '/metrics' });
  assert.equal(metrics.statusCode, 404);
});

test('requires a bearer token on api routes when tokens are configured', async (t) => {
  const { app } = await startApp(t, { config: { apiTokens: ['test-secret'] } });

  const anonymous = await app.inject({ method: 'GET', url: '/v3/clusters' });
  assert.equal(anonymous.statusCode, 401);
  assert.deepEqual(anonymous.json(), { message: 'Unauthorized' });

  const wrong = await app.inject({ method: 'GET', url: '/v3/clusters', headers: { authorization: 'Bearer other' } });
  assert.equal(wrong.statusCode, 401);

  const allowed = await app.inject({
    method: 'GET',
    url: '/v3/clusters',
    headers: { authorization: 'Bearer test-secret' }
  });
  assert.equal(allowed.statusCode, 200);
  assert.deepEqual(allowed.json(), { clusters: [] });

  const health = await app.inject({ method: 'GET', url: '/healthz' });
  assert.equal(health.statusCode, 200);
});

test('maps cloud errors and unexpected failures to responses', async (t) => {
  const { app, gateways } = await startApp(t);
  gateways.cloudFormation.addStack({ stackName: 'demo', status: 'CREATE_COMPLETE', tags: clusterStackTags('demo') });

  const validation = await app.inject({ method: 'GET', url: '/v3/clusters/demo/stackevents' });
  assert.equal(validation.statusCode, 400);
  assert.deepEqual(validation.json(), { message: 'Bad Request: Stack with id demo does not exist' });

  gateways.cloudFormation.describeStack = async () => {
    throw new Error('socket hang up');
  };
  const unexpected = await app.inject({ method: 'GET', url: '/v3/clusters/demo' });
  assert.equal(unexpected.statusCode, 500);
  assert.deepEqual(unexpected.json(), { message: UNEXPECTED_ERROR_MESSAGE });
});

test('maps aws client errors by code', () => {
  assert.deepEqual(mapErrorToResponse(new AwsClientError('describe_stacks', 'Throttling', 'Rate exceeded')), {
    statusCode: 429,
    body: { message: 'Rate exceeded' }
  });
  assert.deepEqual(mapErrorToResponse(new AwsClientError('create_stack', 'AccessDenied', 'not authorized')), {
    statusCode: 500,
    body: { message: 'Failed when calling AWS service in create_stack: not authorized' }
  });
  assert.deepEqual(mapErrorToResponse(new AwsClientError('create_stack', 'LimitExceededException', 'Stack limit reached')), {
    statusCode: 500,
    body: { message: 'Failed when calling AWS service in create_stack: Stack limit reached' }
  });
});

test('loads configuration from the environment', () => {
  const config = loadConfig({
    HPCFLEET_PORT: '8080',
    AWS_REGION: 'eu-west-1',
    HPCFLEET_API_TOKENS: 'test-secret, second-secret',
    HPCFLEET_ENABLE_METRICS: 'off'
  });

  assert.deepEqual(config, {
    host: '0.0.0.0',
    port: 8080,
    logLevel: 'info',
    defaultRegion: 'eu-west-1',
    artifactsBucket: undefined,
    officialImageOwners: ['amazon'],
    apiTokens: ['test-secret', 'second-secret'],
    enableMetrics: false
  });
  assert.throws(() => loadConfig({ HPCFLEET_PORT: 'abc' }), /HPCFLEET_PORT must be a positive integer/);
});
