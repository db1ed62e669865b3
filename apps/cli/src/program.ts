import { Command } from 'commander';

import { registerClusterCommands } from './commands/clusters';
import { registerComputeFleetCommands } from './commands/computeFleet';
import { registerImageCommands } from './commands/images';
import { registerLogCommands } from './commands/logs';
import { createClient, type ClientFactory } from './lib/client';

type CliDependencies = {
  clientFactory?: ClientFactory;
};

export function createInterface(deps: CliDependencies = {}): Command {
  const program = new Command();
  program
    .name('hpcfleet')
    .description('Manage HPC clusters and images through the hpcfleet API')
    .version('3.0.0')
    .option('--api-url <url>', 'hpcfleet API base URL (defaults to HPCFLEET_API_URL)')
    .option('--token <token>', 'Bearer token (defaults to HPCFLEET_TOKEN)');

  const context = { program, clientFactory: deps.clientFactory ?? createClient };
  registerClusterCommands(context);
  registerComputeFleetCommands(context);
  registerLogCommands(context);
  registerImageCommands(context);

  return program;
}
