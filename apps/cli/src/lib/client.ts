import { HpcFleetClient } from '@hpcfleet/cluster-client';

export type GlobalOptions = {
  apiUrl?: string;
  token?: string;
};

/** The client surface the commands use; results are printed, never inspected. */
export type CliClient = {
  [K in keyof HpcFleetClient]: HpcFleetClient[K] extends (...args: infer A) => Promise<unknown>
    ? (...args: A) => Promise<unknown>
    : never;
};

export type ClientFactory = (options: GlobalOptions) => CliClient;

const DEFAULT_API_URL = 'http://127.0.0.1:4300';
const DEFAULT_TIMEOUT_MS = Number.parseInt(process.env.HPCFLEET_HTTP_TIMEOUT_MS ?? '', 10) || 30_000;

export function createClient(options: GlobalOptions): CliClient {
  return new HpcFleetClient({
    baseUrl: options.apiUrl ?? process.env.HPCFLEET_API_URL ?? DEFAULT_API_URL,
    token: options.token ?? process.env.HPCFLEET_TOKEN,
    userAgent: 'hpcfleet-cli/3.0.0',
    fetchTimeoutMs: DEFAULT_TIMEOUT_MS
  });
}
