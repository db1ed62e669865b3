#!/usr/bin/env -S node --import tsx
import { formatError } from './lib/output';
import { createInterface } from './program';

export { createInterface } from './program';
export type { CliClient, ClientFactory, GlobalOptions } from './lib/client';

async function main(): Promise<void> {
  const program = createInterface();
  await program.parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((err) => {
    console.error(formatError(err));
    process.exitCode = 1;
  });
}
