import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, test } from 'node:test';

import { HpcFleetClientError } from '@hpcfleet/cluster-client';

import type { CliClient, GlobalOptions } from '../src/lib/client';
import { formatError } from '../src/lib/output';
import { createInterface } from '../src/program';

type Call = { method: string; args: unknown[] };

class StubClient {
  calls: Call[] = [];
  response: unknown = { ok: true };

  private record(method: string) {
    return async (...args: unknown[]): Promise<unknown> => {
      this.calls.push({ method, args });
      return this.response;
    };
  }

  asClient(): CliClient {
    return {
      createCluster: this.record('createCluster'),
      listClusters: this.record('listClusters'),
      describeCluster: this.record('describeCluster'),
      updateCluster: this.record('updateCluster'),
      deleteCluster: this.record('deleteCluster'),
      describeComputeFleet: this.record('describeComputeFleet'),
      updateComputeFleet: this.record('updateComputeFleet'),
      describeClusterInstances: this.record('describeClusterInstances'),
      deleteClusterInstances: this.record('deleteClusterInstances'),
      listClusterLogStreams: this.record('listClusterLogStreams'),
      getClusterLogEvents: this.record('getClusterLogEvents'),
      getClusterStackEvents: this.record('getClusterStackEvents'),
      buildImage: this.record('buildImage'),
      listImages: this.record('listImages'),
      describeImage: this.record('describeImage'),
      deleteImage: this.record('deleteImage'),
      listOfficialImages: this.record('listOfficialImages'),
      listImageLogStreams: this.record('listImageLogStreams'),
      getImageLogEvents: this.record('getImageLogEvents'),
      getImageStackEvents: this.record('getImageStackEvents')
    };
  }
}

const originalLog = console.log;
let printed: string[] = [];
const tempDirs: string[] = [];

afterEach(async () => {
  console.log = originalLog;
  printed = [];
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

const run = async (args: string[], stub = new StubClient()) => {
  const globals: GlobalOptions[] = [];
  console.log = (...values: unknown[]) => {
    printed.push(values.map(String).join(' '));
  };
  const program = createInterface({
    clientFactory: (options) => {
      globals.push(options);
      return stub.asClient();
    }
  });
  await program.parseAsync(args, { from: 'user' });
  return { stub, globals };
};

const writeConfig = async (contents: string): Promise<string> => {
  const dir = await mkdtemp(path.join(tmpdir(), 'hpcfleet-cli-test-'));
  tempDirs.push(dir);
  const file = path.join(dir, 'cluster.yaml');
  await writeFile(file, contents, 'utf8');
  return file;
};

test('create-cluster reads the configuration file and forwards validation flags', async () => {
  const file = await writeConfig('Image:\n  Os: alinux2\n');
  const { stub, globals } = await run([
    '--api-url',
    'http://127.0.0.1:9999',
    '--token',
    'test-secret',
    'create-cluster',
    '--cluster-name',
    'demo',
    '--cluster-configuration',
    file,
    '--region',
    'eu-west-1',
    '--suppress-validators',
    'type:KeyPairValidator,type:SubnetsValidator',
    '--validation-failure-level',
    'WARNING',
    '--dryrun',
    '--rollback-on-failure',
    'false'
  ]);

  assert.deepEqual(globals, [{ apiUrl: 'http://127.0.0.1:9999', token: 'test-secret' }]);
  assert.deepEqual(stub.calls, [
    {
      method: 'createCluster',
      args: [
        {
          clusterName: 'demo',
          region: 'eu-west-1',
          suppressValidators: ['type:KeyPairValidator', 'type:SubnetsValidator'],
          validationFailureLevel: 'WARNING',
          dryrun: true,
          rollbackOnFailure: false,
          clusterConfiguration: 'Image:\n  Os: alinux2\n'
        }
      ]
    }
  ]);
  assert.deepEqual(printed, [JSON.stringify({ ok: true }, null, 2)]);
});

test('update-compute-fleet validates the requested status', async () => {
  const { stub } = await run(['update-compute-fleet', '--cluster-name', 'demo', '--status', 'STOP_REQUESTED']);
  assert.deepEqual(stub.calls, [{ method: 'updateComputeFleet', args: [{ clusterName: 'demo', status: 'STOP_REQUESTED' }] }]);

  const program = createInterface({ clientFactory: () => new StubClient().asClient() });
  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
    command.configureOutput({ writeErr: () => undefined });
  }
  await assert.rejects(
    program.parseAsync(['update-compute-fleet', '--cluster-name', 'demo', '--status', 'PAUSED'], { from: 'user' }),
    /Unsupported value 'PAUSED'/
  );
});

test('list-clusters collects repeated statuses', async () => {
  const { stub } = await run(['list-clusters', '--cluster-status', 'CREATE_COMPLETE', '--cluster-status', 'UPDATE_COMPLETE']);
  assert.deepEqual(stub.calls, [
    { method: 'listClusters', args: [{ clusterStatus: ['CREATE_COMPLETE', 'UPDATE_COMPLETE'] }] }
  ]);
});

test('log commands address clusters and images', async () => {
  const stub = new StubClient();
  await run(
    ['list-cluster-log-streams', '--cluster-name', 'demo', '--filters', 'Name=node-type,Values=HeadNode'],
    stub
  );
  await run(
    ['get-image-log-events', '--image-id', 'my-image', '--log-stream-name', '3.0.0-build', '--limit', '10', '--start-from-head', 'true'],
    stub
  );
  await run(['get-cluster-stack-events', '--cluster-name', 'demo', '--next-token', 'page-2'], stub);

  assert.deepEqual(stub.calls, [
    {
      method: 'listClusterLogStreams',
      args: ['demo', { region: undefined, nextToken: undefined, filters: ['Name=node-type,Values=HeadNode'] }]
    },
    {
      method: 'getImageLogEvents',
      args: ['my-image', { logStreamName: '3.0.0-build', limit: 10, startFromHead: true }]
    },
    { method: 'getClusterStackEvents', args: ['demo', { region: undefined, nextToken: 'page-2' }] }
  ]);
});

test('image commands forward their options', async () => {
  const file = await writeConfig('Build:\n  InstanceType: c5.xlarge\n');
  const stub = new StubClient();
  await run(['build-image', '--image-id', 'my-image', '--image-configuration', file], stub);
  await run(['list-images', '--image-status', 'AVAILABLE'], stub);
  await run(['delete-image', '--image-id', 'my-image', '--force'], stub);
  await run(['list-official-images', '--os', 'alinux2', '--architecture', 'x86_64'], stub);

  assert.deepEqual(stub.calls, [
    { method: 'buildImage', args: [{ imageId: 'my-image', imageConfiguration: 'Build:\n  InstanceType: c5.xlarge\n' }] },
    { method: 'listImages', args: [{ imageStatus: 'AVAILABLE' }] },
    { method: 'deleteImage', args: [{ imageId: 'my-image', force: true }] },
    { method: 'listOfficialImages', args: [{ os: 'alinux2', architecture: 'x86_64' }] }
  ]);
});

test('API errors are printed as their JSON body', () => {
  const error = new HpcFleetClientError("Bad Request: cluster 'demo' does not exist", {
    statusCode: 404,
    body: { message: "cluster 'demo' does not exist" }
  });
  assert.equal(formatError(error), JSON.stringify({ message: "cluster 'demo' does not exist" }, null, 2));
  assert.equal(formatError(new Error('Unable to read configuration file')), 'Unable to read configuration file');
});
