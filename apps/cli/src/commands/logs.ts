import type { Command } from 'commander';

import type { CliClient } from '../lib/client';
import { parseBoolean, parsePositiveInteger } from '../lib/parse';
import { runWithClient, type CommandContext } from './context';

type LogEventsOptions = {
  logStreamName: string;
  region?: string;
  nextToken?: string;
  startFromHead?: boolean;
  limit?: number;
  startTime?: string;
  endTime?: string;
};

type LogTarget = {
  /** Command name fragment: `cluster` or `image`. */
  noun: string;
  label: string;
  idFlag: string;
  idDescription: string;
  listStreams: (client: CliClient, id: string, options: { region?: string; nextToken?: string; filters?: string[] }) => Promise<unknown>;
  getEvents: (client: CliClient, id: string, options: LogEventsOptions) => Promise<unknown>;
  getStackEvents: (client: CliClient, id: string, options: { region?: string; nextToken?: string }) => Promise<unknown>;
};

const TARGETS: LogTarget[] = [
  {
    noun: 'cluster',
    label: 'a cluster',
    idFlag: '--cluster-name <name>',
    idDescription: 'Name of the cluster',
    listStreams: (client, id, options) => client.listClusterLogStreams(id, options),
    getEvents: (client, id, options) => client.getClusterLogEvents(id, options),
    getStackEvents: (client, id, options) => client.getClusterStackEvents(id, options)
  },
  {
    noun: 'image',
    label: 'an image build',
    idFlag: '--image-id <id>',
    idDescription: 'Identifier of the image',
    listStreams: (client, id, options) => client.listImageLogStreams(id, options),
    getEvents: (client, id, options) => client.getImageLogEvents(id, options),
    getStackEvents: (client, id, options) => client.getImageStackEvents(id, options)
  }
];

const resourceId = (options: { clusterName?: string; imageId?: string }): string => options.clusterName ?? options.imageId ?? '';

function registerTarget(context: CommandContext, program: Command, target: LogTarget): void {
  const listStreams = program
    .command(`list-${target.noun}-log-streams`)
    .description(`List the CloudWatch log streams of ${target.label}`)
    .requiredOption(target.idFlag, target.idDescription)
    .option('--region <region>', 'AWS region')
    .option('--next-token <token>', 'Token of the next page');
  if (target.noun === 'cluster') {
    listStreams.option(
      '--filters <filter>',
      'Name=private-dns-name,Values=<ip-..> or Name=node-type,Values=HeadNode (repeatable)',
      (value: string, previous: string[] = []) => [...previous, value]
    );
  }
  listStreams.action(async (options: { clusterName?: string; imageId?: string; region?: string; nextToken?: string; filters?: string[] }) => {
    await runWithClient(context, (client) =>
      target.listStreams(client, resourceId(options), {
        region: options.region,
        nextToken: options.nextToken,
        filters: options.filters
      })
    );
  });

  program
    .command(`get-${target.noun}-log-events`)
    .description(`Read the events of a ${target.noun} log stream`)
    .requiredOption(target.idFlag, target.idDescription)
    .requiredOption('--log-stream-name <name>', 'Name of the log stream')
    .option('--region <region>', 'AWS region')
    .option('--next-token <token>', 'Token of the next page')
    .option('--start-from-head <boolean>', 'Read from the oldest event first', parseBoolean)
    .option('--limit <count>', 'Maximum number of events', parsePositiveInteger)
    .option('--start-time <time>', 'ISO 8601 start of the window')
    .option('--end-time <time>', 'ISO 8601 end of the window')
    .action(async (options: LogEventsOptions & { clusterName?: string; imageId?: string }) => {
      const { clusterName, imageId, ...rest } = options;
      await runWithClient(context, (client) => target.getEvents(client, resourceId({ clusterName, imageId }), rest));
    });

  program
    .command(`get-${target.noun}-stack-events`)
    .description(`List the CloudFormation events of the ${target.noun} stack`)
    .requiredOption(target.idFlag, target.idDescription)
    .option('--region <region>', 'AWS region')
    .option('--next-token <token>', 'Token of the next page')
    .action(async (options: { clusterName?: string; imageId?: string; region?: string; nextToken?: string }) => {
      await runWithClient(context, (client) =>
        target.getStackEvents(client, resourceId(options), { region: options.region, nextToken: options.nextToken })
      );
    });
}

export function registerLogCommands(context: CommandContext): void {
  for (const target of TARGETS) {
    registerTarget(context, context.program, target);
  }
}
