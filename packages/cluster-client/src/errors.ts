import type { ApiErrorBody } from '@hpcfleet/cluster-model';

export class HpcFleetClientError extends Error {
  readonly statusCode: number;
  readonly body: ApiErrorBody | null;

  constructor(message: string, options: { statusCode: number; body?: ApiErrorBody | null }) {
    super(message);
    this.name = 'HpcFleetClientError';
    this.statusCode = options.statusCode;
    this.body = options.body ?? null;
  }
}
