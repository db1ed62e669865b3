import { clusterStatusSchema, validationLevelSchema, type ClusterStatus, type ValidationLevel } from '@hpcfleet/cluster-model';

import { collectList, enumValue, parseBoolean, readConfigurationFile } from '../lib/parse';
import { runWithClient, type CommandContext } from './context';

type ValidationFlags = {
  region?: string;
  suppressValidators?: string[];
  validationFailureLevel?: ValidationLevel;
  dryrun?: boolean;
  clientToken?: string;
};

const toClusterStatus = enumValue(clusterStatusSchema);
const collectStatuses = (value: string, previous: ClusterStatus[] = []): ClusterStatus[] => [
  ...previous,
  ...collectList(value).map(toClusterStatus)
];

export function registerClusterCommands(context: CommandContext): void {
  const { program } = context;

  program
    .command('list-clusters')
    .description('List the clusters of a region')
    .option('--region <region>', 'AWS region')
    .option('--next-token <token>', 'Token of the next page')
    .option('--cluster-status <status>', 'Only clusters in these statuses (repeatable or comma-separated)', collectStatuses)
    .action(async (options: { region?: string; nextToken?: string; clusterStatus?: ClusterStatus[] }) => {
      await runWithClient(context, (client) => client.listClusters(options));
    });

  program
    .command('create-cluster')
    .description('Create a cluster from a configuration file')
    .requiredOption('--cluster-name <name>', 'Name of the cluster')
    .requiredOption('--cluster-configuration <file>', 'Path of the cluster configuration YAML')
    .option('--region <region>', 'AWS region')
    .option('--suppress-validators <validators>', 'Validators to skip, ALL or type:<name> (repeatable)', collectList)
    .option('--validation-failure-level <level>', 'Minimum level that fails validation', enumValue(validationLevelSchema))
    .option('--dryrun', 'Validate the request without creating the cluster')
    .option('--rollback-on-failure <boolean>', 'Roll the stack back when creation fails', parseBoolean)
    .option('--client-token <token>', 'Idempotency token for the stack request')
    .action(
      async (
        options: ValidationFlags & { clusterName: string; clusterConfiguration: string; rollbackOnFailure?: boolean }
      ) => {
        const { clusterConfiguration, ...rest } = options;
        const configuration = await readConfigurationFile(clusterConfiguration);
        await runWithClient(context, (client) =>
          client.createCluster({ ...rest, clusterConfiguration: configuration })
        );
      }
    );

  program
    .command('describe-cluster')
    .description('Describe a cluster')
    .requiredOption('--cluster-name <name>', 'Name of the cluster')
    .option('--region <region>', 'AWS region')
    .action(async (options: { clusterName: string; region?: string }) => {
      await runWithClient(context, (client) => client.describeCluster(options.clusterName, { region: options.region }));
    });

  program
    .command('update-cluster')
    .description('Update a cluster with a new configuration file')
    .requiredOption('--cluster-name <name>', 'Name of the cluster')
    .requiredOption('--cluster-configuration <file>', 'Path of the cluster configuration YAML')
    .option('--region <region>', 'AWS region')
    .option('--suppress-validators <validators>', 'Validators to skip, ALL or type:<name> (repeatable)', collectList)
    .option('--validation-failure-level <level>', 'Minimum level that fails validation', enumValue(validationLevelSchema))
    .option('--dryrun', 'Validate the request and report the change set without updating')
    .option('--force-update', 'Apply the update despite update-policy errors that allow it')
    .option('--client-token <token>', 'Idempotency token for the stack request')
    .action(
      async (options: ValidationFlags & { clusterName: string; clusterConfiguration: string; forceUpdate?: boolean }) => {
        const { clusterConfiguration, ...rest } = options;
        const configuration = await readConfigurationFile(clusterConfiguration);
        await runWithClient(context, (client) =>
          client.updateCluster({ ...rest, clusterConfiguration: configuration })
        );
      }
    );

  program
    .command('delete-cluster')
    .description('Delete a cluster and its compute instances')
    .requiredOption('--cluster-name <name>', 'Name of the cluster')
    .option('--region <region>', 'AWS region')
    .option('--client-token <token>', 'Idempotency token for the stack request')
    .action(async (options: { clusterName: string; region?: string; clientToken?: string }) => {
      await runWithClient(context, (client) => client.deleteCluster(options));
    });
}
