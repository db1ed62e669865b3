import { InvokeCommand, type LambdaClient } from '@aws-sdk/client-lambda';

import { callAws } from './errors';

/** Fire-and-forget invocation of a function with a JSON payload. */
export const createFunctionInvoker =
  (client: LambdaClient) =>
  async (functionArn: string, payload: unknown): Promise<void> => {
    await callAws('invoke', () =>
      client.send(
        new InvokeCommand({
          FunctionName: functionArn,
          InvocationType: 'Event',
          Payload: Buffer.from(JSON.stringify(payload))
        })
      )
    );
  };
