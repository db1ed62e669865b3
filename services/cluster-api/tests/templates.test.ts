import assert from 'node:assert/strict';
import { test } from 'node:test';

import { TAGS, parseClusterConfig, parseImageConfig } from '@hpcfleet/cluster-model';

import { buildClusterTemplate } from '../src/clusters/clusterTemplate';
import { logicalIdSuffix } from '../src/common/template';
import { buildImageTemplate } from '../src/images/imageTemplate';
import { clusterDocument, toYaml } from './testApp';

const clusterTemplate = (document: unknown) => {
  const parsed = parseClusterConfig(toYaml(document));
  if (!parsed.success) {
    assert.fail(JSON.stringify(parsed.messages));
  }
  return buildClusterTemplate({
    clusterName: 'demo',
    region: 'us-east-1',
    version: '3.0.0',
    config: parsed.config,
    vpcId: 'vpc-1',
    imageId: 'ami-official',
    artifactsBucket: 'test-artifacts',
    artifactDirectory: 'hpcfleet/clusters/demo-abc'
  });
};

const decodeUserData = (value: unknown): string => {
  assert.ok(value && typeof value === 'object' && 'Fn::Base64' in value);
  const script = value['Fn::Base64'];
  assert.equal(typeof script, 'string');
  return String(script);
};

test('builds the resources of a slurm cluster', () => {
  const template = clusterTemplate(clusterDocument());
  const launchTemplate = `LaunchTemplate${logicalIdSuffix('queue1', 'compute1')}`;

  assert.deepEqual(
    Object.keys(template.Resources).sort(),
    [
      'ClusterLogGroup',
      'CloudwatchDashboard',
      'ComputeFleetStatusTable',
      'ComputeFromHeadNodeIngress',
      'ComputeSecurityGroup',
      'ComputeSecurityGroupIngress',
      'HeadNode',
      'HeadNodeFromComputeIngress',
      'HeadNodeSecurityGroup',
      'InstanceProfile',
      'InstanceRole',
      launchTemplate
    ].sort()
  );
  assert.deepEqual(Object.keys(template.Outputs), [
    'LogGroupName',
    'ComputeFleetStatusTableName',
    'HeadNodeInstanceId',
    'Scheduler'
  ]);
  assert.deepEqual(template.Resources.ClusterLogGroup, {
    Type: 'AWS::Logs::LogGroup',
    DeletionPolicy: 'Retain',
    Properties: { LogGroupName: '/aws/hpcfleet/demo', RetentionInDays: 14 }
  });

  const userData = decodeUserData(template.Resources.HeadNode.Properties.UserData);
  assert.ok(userData.includes('"computeFleetStatusTable": "hpcfleet-demo"'));
  assert.ok(userData.includes('"clusterConfig": "hpcfleet/clusters/demo-abc/cluster-config.yaml"'));
  assert.deepEqual(template.Resources.HeadNode.Properties.Tags, [
    { Key: 'Name', Value: 'HeadNode' },
    { Key: TAGS.clusterName, Value: 'demo' },
    { Key: TAGS.nodeType, Value: 'HeadNode' },
    { Key: TAGS.version, Value: '3.0.0' }
  ]);
});

test('skips the log group when cloudwatch logging is disabled', () => {
  const template = clusterTemplate({
    ...clusterDocument(),
    Monitoring: { Logs: { CloudWatch: { Enabled: false } }, Dashboards: { CloudWatch: { Enabled: false } } }
  });

  assert.equal(template.Resources.ClusterLogGroup, undefined);
  assert.equal(template.Resources.CloudwatchDashboard, undefined);
  assert.equal(template.Outputs.LogGroupName, undefined);
});

test('builds compute environments and job queues for aws batch', () => {
  const document = clusterDocument();
  const template = clusterTemplate({
    ...document,
    Scheduling: {
      Scheduler: 'awsbatch',
      AwsBatchQueues: [
        {
          Name: 'jobs',
          Networking: { SubnetIds: ['subnet-compute'] },
          ComputeResources: [{ Name: 'optimal', InstanceTypes: ['optimal'], MaxvCpus: 64 }]
        }
      ]
    }
  });
  const environment = `ComputeEnvironment${logicalIdSuffix('jobs', 'optimal')}`;

  assert.equal(template.Resources.ComputeFleetStatusTable, undefined);
  assert.deepEqual(template.Outputs.BatchComputeEnvironmentArn, { Value: { Ref: environment } });
  assert.equal(template.Resources[environment].Type, 'AWS::Batch::ComputeEnvironment');
  assert.deepEqual(template.Resources[`JobQueue${logicalIdSuffix('jobs')}`].Properties.ComputeEnvironmentOrder, [
    { Order: 1, ComputeEnvironment: { Ref: environment } }
  ]);
  assert.equal(template.Resources[`JobQueue${logicalIdSuffix('jobs')}`].Properties.JobQueueName, 'demo-jobs');
});

test('builds an image pipeline with script and arn components', () => {
  const parsed = parseImageConfig(
    toYaml({
      Image: { Name: 'My Image' },
      Build: {
        InstanceType: 'c5.xlarge',
        ParentImage: 'ami-parent',
        Components: [
          { Type: 'arn', Value: 'arn:aws:imagebuilder:us-east-1:123456789012:component/extra/1.0.0' },
          { Type: 'script', Value: 's3://test-artifacts/scripts/setup.sh' }
        ]
      }
    })
  );
  if (!parsed.success) {
    assert.fail(JSON.stringify(parsed.messages));
  }

  const template = buildImageTemplate({
    imageId: 'my-image',
    version: '3.0.0',
    config: parsed.config,
    artifactsBucket: 'test-artifacts',
    artifactDirectory: 'hpcfleet/images/my-image-abc'
  });

  assert.deepEqual(template.Resources.ImageRecipe.Properties.Components, [
    { ComponentArn: { Ref: 'HpcFleetComponent' } },
    { ComponentArn: 'arn:aws:imagebuilder:us-east-1:123456789012:component/extra/1.0.0' },
    { ComponentArn: { Ref: 'ScriptComponent1' } }
  ]);
  assert.equal(template.Resources.ScriptComponent1.Properties.Uri, 's3://test-artifacts/scripts/setup.sh');
  assert.equal(template.Resources.ScriptComponent0, undefined);
  assert.equal(template.Resources.BuildLogGroup.Properties.LogGroupName, '/aws/imagebuilder/HpcFleetImage-my-image');
  assert.deepEqual(Object.keys(template.Outputs), ['ImageArn', 'AmiId', 'BuildLogGroupName']);
});
