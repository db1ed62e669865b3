import { HpcFleetClientError } from '@hpcfleet/cluster-client';

export function printResult(payload: unknown): void {
  console.log(JSON.stringify(payload ?? {}, null, 2));
}

/** API errors print their body; anything else prints its message. */
export function formatError(err: unknown): string {
  if (err instanceof HpcFleetClientError) {
    return JSON.stringify(err.body ?? { message: err.message }, null, 2);
  }
  return err instanceof Error ? err.message : String(err);
}
