import {
  CloudFormationClient,
  CreateStackCommand,
  DeleteStackCommand,
  DescribeStackEventsCommand,
  DescribeStacksCommand,
  UpdateStackCommand,
  type Stack
} from '@aws-sdk/client-cloudformation';
import { cloudFormationStackStatusSchema } from '@hpcfleet/cluster-model';

import { AwsClientError, callAws, errorCode, errorMessage } from './errors';
import type { CloudFormationGateway, Page, StackEventRecord, StackRecord } from './types';

const CAPABILITIES = ['CAPABILITY_IAM', 'CAPABILITY_NAMED_IAM'] as const;

const toTagList = (tags: Record<string, string>) => Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));

const toStackRecord = (stack: Stack): StackRecord => {
  const tags: Record<string, string> = {};
  for (const tag of stack.Tags ?? []) {
    if (tag.Key) {
      tags[tag.Key] = tag.Value ?? '';
    }
  }
  const outputs: Record<string, string> = {};
  for (const output of stack.Outputs ?? []) {
    if (output.OutputKey) {
      outputs[output.OutputKey] = output.OutputValue ?? '';
    }
  }
  const status = cloudFormationStackStatusSchema.safeParse(stack.StackStatus);
  return {
    stackName: stack.StackName ?? '',
    stackId: stack.StackId ?? '',
    status: status.success ? status.data : 'REVIEW_IN_PROGRESS',
    statusReason: stack.StackStatusReason,
    creationTime: stack.CreationTime ?? new Date(0),
    lastUpdatedTime: stack.LastUpdatedTime,
    tags,
    outputs,
    parentId: stack.ParentId
  };
};

const isMissingStack = (error: unknown): boolean =>
  errorCode(error) === 'ValidationError' && /does not exist/.test(errorMessage(error));

export const createCloudFormationGateway = (client: CloudFormationClient): CloudFormationGateway => ({
  async describeStack(stackName) {
    try {
      const response = await client.send(new DescribeStacksCommand({ StackName: stackName }));
      const stack = response.Stacks?.[0];
      return stack ? toStackRecord(stack) : null;
    } catch (error) {
      if (isMissingStack(error)) {
        return null;
      }
      throw new AwsClientError('describe_stack', errorCode(error), errorMessage(error));
    }
  },

  async listStacks(nextToken) {
    const response = await callAws('describe_stacks', () =>
      client.send(new DescribeStacksCommand({ NextToken: nextToken }))
    );
    return {
      items: (response.Stacks ?? []).map(toStackRecord),
      nextToken: response.NextToken
    };
  },

  async createStack(input) {
    const response = await callAws('create_stack', () =>
      client.send(
        new CreateStackCommand({
          StackName: input.stackName,
          TemplateURL: input.templateUrl,
          Tags: toTagList(input.tags),
          DisableRollback: input.disableRollback,
          ClientRequestToken: input.clientRequestToken,
          Capabilities: [...CAPABILITIES]
        })
      )
    );
    return response.StackId ?? input.stackName;
  },

  async updateStack(input) {
    await callAws('update_stack', () =>
      client.send(
        new UpdateStackCommand({
          StackName: input.stackName,
          TemplateURL: input.templateUrl,
          Tags: toTagList(input.tags),
          ClientRequestToken: input.clientRequestToken,
          Capabilities: [...CAPABILITIES]
        })
      )
    );
  },

  async deleteStack(stackName, clientRequestToken) {
    await callAws('delete_stack', () =>
      client.send(new DeleteStackCommand({ StackName: stackName, ClientRequestToken: clientRequestToken }))
    );
  },

  async describeStackEvents(stackName, nextToken): Promise<Page<StackEventRecord>> {
    const response = await callAws('describe_stack_events', () =>
      client.send(new DescribeStackEventsCommand({ StackName: stackName, NextToken: nextToken }))
    );
    return {
      items: (response.StackEvents ?? []).map((event) => ({
        stackId: event.StackId ?? '',
        eventId: event.EventId ?? '',
        stackName: event.StackName ?? stackName,
        logicalResourceId: event.LogicalResourceId ?? '',
        physicalResourceId: event.PhysicalResourceId ?? '',
        resourceType: event.ResourceType ?? '',
        timestamp: event.Timestamp ?? new Date(0),
        resourceStatus: event.ResourceStatus ?? '',
        resourceStatusReason: event.ResourceStatusReason,
        resourceProperties: event.ResourceProperties,
        clientRequestToken: event.ClientRequestToken
      })),
      nextToken: response.NextToken
    };
  }
});
