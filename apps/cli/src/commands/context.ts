import type { Command } from 'commander';

import type { CliClient, ClientFactory, GlobalOptions } from '../lib/client';
import { printResult } from '../lib/output';

export interface CommandContext {
  program: Command;
  clientFactory: ClientFactory;
}

/** Builds a client from the global options, runs the call and prints its result. */
export async function runWithClient(
  context: CommandContext,
  call: (client: CliClient) => Promise<unknown>
): Promise<void> {
  const client = context.clientFactory(context.program.opts<GlobalOptions>());
  printResult(await call(client));
}
