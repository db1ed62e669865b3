import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, UpdateCommand, type UpdateCommandInput } from '@aws-sdk/lib-dynamodb';
import { COMPUTE_FLEET_ITEM_ID } from '@hpcfleet/cluster-model';

import { AwsClientError, ConditionalUpdateFailedError, errorCode, errorMessage } from './errors';
import type { ComputeFleetStatusTable, FleetStatusUpdate } from './types';

const readData = (item: Record<string, unknown> | undefined) => {
  const data = item?.Data;
  if (typeof data !== 'object' || data === null) {
    return null;
  }
  const status = 'status' in data ? data.status : undefined;
  const updated = 'lastStatusUpdatedTime' in data ? data.lastStatusUpdatedTime : undefined;
  if (typeof status !== 'string') {
    return null;
  }
  return {
    status,
    lastStatusUpdatedTime: typeof updated === 'string' ? updated : undefined
  };
};

/** Sets only the status fields; the rest of `Data` belongs to the head node daemons. */
export const statusUpdateInput = (tableName: string, update: FleetStatusUpdate): UpdateCommandInput => ({
  TableName: tableName,
  Key: { Id: COMPUTE_FLEET_ITEM_ID },
  UpdateExpression: 'SET #data.#status = :next, #data.#updated = :updated',
  ConditionExpression: '#data.#status = :expected',
  ExpressionAttributeNames: { '#data': 'Data', '#status': 'status', '#updated': 'lastStatusUpdatedTime' },
  ExpressionAttributeValues: { ':next': update.next, ':updated': update.updatedAt, ':expected': update.expected }
});

/** Compute fleet status stored as `{ Id: 'COMPUTE_FLEET', Data: { status, lastStatusUpdatedTime } }`. */
export const createComputeFleetStatusTable = (client: DynamoDBClient): ComputeFleetStatusTable => {
  const documents = DynamoDBDocumentClient.from(client);

  return {
    async getStatus(tableName) {
      try {
        const response = await documents.send(
          new GetCommand({ TableName: tableName, Key: { Id: COMPUTE_FLEET_ITEM_ID }, ConsistentRead: true })
        );
        return readData(response.Item);
      } catch (error) {
        throw new AwsClientError('get_item', errorCode(error), errorMessage(error));
      }
    },

    async updateStatusIfCurrent(tableName, update) {
      try {
        await documents.send(new UpdateCommand(statusUpdateInput(tableName, update)));
      } catch (error) {
        if (error instanceof ConditionalCheckFailedException) {
          throw new ConditionalUpdateFailedError(
            `compute fleet status was not ${update.expected} when the update to ${update.next} was applied`
          );
        }
        throw new AwsClientError('update_item', errorCode(error), errorMessage(error));
      }
    }
  };
};
