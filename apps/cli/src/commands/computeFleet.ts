import {
  nodeTypeSchema,
  requestedComputeFleetStatusSchema,
  type NodeType,
  type RequestedComputeFleetStatus
} from '@hpcfleet/cluster-model';

import { enumValue } from '../lib/parse';
import { runWithClient, type CommandContext } from './context';

export function registerComputeFleetCommands(context: CommandContext): void {
  const { program } = context;

  program
    .command('describe-compute-fleet')
    .description('Show the status of the compute fleet')
    .requiredOption('--cluster-name <name>', 'Name of the cluster')
    .option('--region <region>', 'AWS region')
    .action(async (options: { clusterName: string; region?: string }) => {
      await runWithClient(context, (client) => client.describeComputeFleet(options.clusterName, { region: options.region }));
    });

  program
    .command('update-compute-fleet')
    .description('Start or stop the compute fleet')
    .requiredOption('--cluster-name <name>', 'Name of the cluster')
    .requiredOption(
      '--status <status>',
      'START_REQUESTED or STOP_REQUESTED for Slurm, ENABLED or DISABLED for Batch',
      enumValue(requestedComputeFleetStatusSchema)
    )
    .option('--region <region>', 'AWS region')
    .action(async (options: { clusterName: string; status: RequestedComputeFleetStatus; region?: string }) => {
      await runWithClient(context, (client) => client.updateComputeFleet(options));
    });

  program
    .command('describe-cluster-instances')
    .description('List the instances of a cluster')
    .requiredOption('--cluster-name <name>', 'Name of the cluster')
    .option('--region <region>', 'AWS region')
    .option('--next-token <token>', 'Token of the next page')
    .option('--node-type <type>', 'HEAD or COMPUTE', enumValue(nodeTypeSchema))
    .option('--queue-name <queue>', 'Only instances of this queue')
    .action(
      async (options: { clusterName: string; region?: string; nextToken?: string; nodeType?: NodeType; queueName?: string }) => {
        await runWithClient(context, (client) => client.describeClusterInstances(options));
      }
    );

  program
    .command('delete-cluster-instances')
    .description('Terminate the compute instances of a cluster')
    .requiredOption('--cluster-name <name>', 'Name of the cluster')
    .option('--region <region>', 'AWS region')
    .option('--force', 'Terminate even when the cluster stack is gone')
    .action(async (options: { clusterName: string; region?: string; force?: boolean }) => {
      await runWithClient(context, (client) => client.deleteClusterInstances(options));
    });
}
