import assert from 'node:assert/strict';
import { test } from 'node:test';

import { checkChangeSet, computeChangeSet, parseClusterConfig, toChangeSet, type ClusterConfig } from '../src';
import { baseClusterDocument, toYaml } from './helpers';

type Document = ReturnType<typeof baseClusterDocument>;

const load = (document: unknown): ClusterConfig => {
  const result = parseClusterConfig(toYaml(document));
  if (!result.success) {
    assert.fail(JSON.stringify(result.messages));
  }
  return result.config;
};

const withResource = (mutate: (resource: Document['Scheduling']['SlurmQueues'][number]['ComputeResources'][number]) => void) => {
  const document = baseClusterDocument();
  mutate(document.Scheduling.SlurmQueues[0].ComputeResources[0]);
  return load(document);
};

const MAX_COUNT_PATH = 'Scheduling.SlurmQueues[queue1].ComputeResources[compute1].MaxCount';
const MIN_COUNT_PATH = 'Scheduling.SlurmQueues[queue1].ComputeResources[compute1].MinCount';

test('reports no changes for identical configurations', () => {
  const current = load(baseClusterDocument());
  assert.deepEqual(computeChangeSet(current, load(baseClusterDocument())), []);
});

test('allows growing a queue while the fleet runs', () => {
  const changes = computeChangeSet(load(baseClusterDocument()), withResource((resource) => (resource.MaxCount = 20)));

  assert.deepEqual(toChangeSet(changes), [{ parameter: MAX_COUNT_PATH, currentValue: '10', requestedValue: '20' }]);
  assert.deepEqual(checkChangeSet(changes, { fleetStopped: false, forceUpdate: false }), []);
});

test('requires a stopped fleet to shrink a queue', () => {
  const changes = computeChangeSet(load(baseClusterDocument()), withResource((resource) => (resource.MaxCount = 5)));

  assert.deepEqual(checkChangeSet(changes, { fleetStopped: false, forceUpdate: false }), [
    {
      parameter: MAX_COUNT_PATH,
      currentValue: '10',
      requestedValue: '5',
      message:
        'Shrinking a queue requires the compute fleet to be stopped first. Stop the compute fleet with the update-compute-fleet operation.'
    }
  ]);
  assert.deepEqual(checkChangeSet(changes, { fleetStopped: true, forceUpdate: false }), []);
  assert.deepEqual(checkChangeSet(changes, { fleetStopped: false, forceUpdate: true }), []);
});

test('accepts a min count increase only when the dynamic range is preserved', () => {
  const current = load(baseClusterDocument());

  const narrowed = computeChangeSet(current, withResource((resource) => (resource.MinCount = 2)));
  assert.deepEqual(
    checkChangeSet(narrowed, { fleetStopped: false, forceUpdate: false }).map((error) => error.parameter),
    [MIN_COUNT_PATH]
  );

  const shifted = computeChangeSet(
    current,
    withResource((resource) => {
      resource.MinCount = 2;
      resource.MaxCount = 12;
    })
  );
  assert.deepEqual(checkChangeSet(shifted, { fleetStopped: false, forceUpdate: false }), []);
});

test('addresses added queues by name', () => {
  const document = baseClusterDocument();
  document.Scheduling.SlurmQueues.push({
    Name: 'queue2',
    Networking: { SubnetIds: ['subnet-compute'] },
    ComputeResources: [{ Name: 'compute2', InstanceType: 'c5.xlarge', MinCount: 0, MaxCount: 4 }]
  });
  const changes = computeChangeSet(load(baseClusterDocument()), load(document));

  assert.equal(changes.length, 1);
  assert.equal(changes[0].parameter, 'Scheduling.SlurmQueues[queue2]');
  assert.equal(changes[0].policy, 'COMPUTE_FLEET_STOP');
  assert.equal(toChangeSet(changes)[0].currentValue, null);
  assert.equal(
    checkChangeSet(changes, { fleetStopped: false, forceUpdate: false })[0].message,
    'All compute nodes must be stopped. Stop the compute fleet with the update-compute-fleet operation.'
  );
  assert.deepEqual(checkChangeSet(changes, { fleetStopped: true, forceUpdate: false }), []);
});

test('never allows unsupported changes, even when forced', () => {
  const document = baseClusterDocument();
  const changes = computeChangeSet(load(document), load({ ...document, Image: { Os: 'ubuntu2004' } }));

  const expected = [
    {
      parameter: 'Image.Os',
      currentValue: 'alinux2',
      requestedValue: 'ubuntu2004',
      message:
        "Update actions are not currently supported for the 'Image.Os' parameter. Restore 'Image.Os' value to 'alinux2'."
    }
  ];
  assert.deepEqual(checkChangeSet(changes, { fleetStopped: true, forceUpdate: false }), expected);
  assert.deepEqual(checkChangeSet(changes, { fleetStopped: true, forceUpdate: true }), expected);
});

test('lets ssh allowed ips change freely', () => {
  const document = baseClusterDocument();
  const requested = load({
    ...document,
    HeadNode: { ...document.HeadNode, Ssh: { ...document.HeadNode.Ssh, AllowedIps: '192.168.0.0/24' } }
  });

  const changes = computeChangeSet(load(document), requested);

  assert.deepEqual(toChangeSet(changes), [
    { parameter: 'HeadNode.Ssh.AllowedIps', currentValue: '10.0.0.0/16', requestedValue: '192.168.0.0/24' }
  ]);
  assert.deepEqual(checkChangeSet(changes, { fleetStopped: false, forceUpdate: false }), []);
});
