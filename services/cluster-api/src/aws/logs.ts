import {
  CloudWatchLogsClient,
  DescribeLogGroupsCommand,
  DescribeLogStreamsCommand,
  GetLogEventsCommand
} from '@aws-sdk/client-cloudwatch-logs';

import { callAws } from './errors';
import type { CloudWatchLogsGateway } from './types';

export const createCloudWatchLogsGateway = (client: CloudWatchLogsClient): CloudWatchLogsGateway => ({
  async logGroupExists(logGroupName) {
    const response = await callAws('describe_log_groups', () =>
      client.send(new DescribeLogGroupsCommand({ logGroupNamePrefix: logGroupName }))
    );
    return (response.logGroups ?? []).some((group) => group.logGroupName === logGroupName);
  },

  async describeLogStreams(input) {
    const response = await callAws('describe_log_streams', () =>
      client.send(
        new DescribeLogStreamsCommand({
          logGroupName: input.logGroupName,
          logStreamNamePrefix: input.prefix,
          nextToken: input.nextToken
        })
      )
    );
    return {
      items: (response.logStreams ?? []).map((stream) => ({
        logStreamName: stream.logStreamName ?? '',
        creationTime: stream.creationTime ?? 0,
        firstEventTimestamp: stream.firstEventTimestamp,
        lastEventTimestamp: stream.lastEventTimestamp,
        lastIngestionTime: stream.lastIngestionTime,
        uploadSequenceToken: stream.uploadSequenceToken,
        arn: stream.arn ?? ''
      })),
      nextToken: response.nextToken
    };
  },

  async getLogEvents(query) {
    const response = await callAws('get_log_events', () =>
      client.send(
        new GetLogEventsCommand({
          logGroupName: query.logGroupName,
          logStreamName: query.logStreamName,
          startTime: query.startTime?.getTime(),
          endTime: query.endTime?.getTime(),
          startFromHead: query.startFromHead,
          limit: query.limit,
          nextToken: query.nextToken
        })
      )
    );
    return {
      events: (response.events ?? []).map((event) => ({
        timestamp: event.timestamp ?? 0,
        message: event.message ?? ''
      })),
      nextForwardToken: response.nextForwardToken,
      nextBackwardToken: response.nextBackwardToken
    };
  }
});
