import {
  BadRequestException,
  parseIsoTimestamp,
  toIsoTimestamp,
  type GetLogEventsResponse,
  type ListLogStreamsResponse,
  type LogStream
} from '@hpcfleet/cluster-model';

import type { CloudWatchLogsGateway, LogStreamRecord } from '../aws';

export interface LogEventsRequest {
  nextToken?: string;
  startFromHead?: boolean;
  limit?: string;
  startTime?: string;
  endTime?: string;
}

export interface LogEventsQueryOptions {
  nextToken?: string;
  startFromHead?: boolean;
  limit?: number;
  startTime?: Date;
  endTime?: Date;
}

/** Checks the time window and limit before anything is looked up. */
export const parseLogEventsRequest = (request: LogEventsRequest): LogEventsQueryOptions => {
  const startTime = request.startTime ? parseIsoTimestamp(request.startTime, 'startTime') : undefined;
  const endTime = request.endTime ? parseIsoTimestamp(request.endTime, 'endTime') : undefined;
  if (startTime && endTime && startTime.getTime() >= endTime.getTime()) {
    throw new BadRequestException('startTime filter must be earlier than endTime filter.');
  }

  let limit: number | undefined;
  if (request.limit !== undefined) {
    limit = /^\d+$/.test(request.limit) ? Number(request.limit) : Number.NaN;
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new BadRequestException('limit must be a positive integer.');
    }
  }

  return {
    nextToken: request.nextToken,
    startFromHead: request.startFromHead,
    limit,
    startTime,
    endTime
  };
};

const optionalIso = (value: number | undefined): string | undefined =>
  value === undefined ? undefined : toIsoTimestamp(value);

export const toLogStream = (record: LogStreamRecord): LogStream => ({
  logStreamName: record.logStreamName,
  creationTime: toIsoTimestamp(record.creationTime),
  firstEventTimestamp: optionalIso(record.firstEventTimestamp),
  lastEventTimestamp: optionalIso(record.lastEventTimestamp),
  lastIngestionTime: optionalIso(record.lastIngestionTime),
  uploadSequenceToken: record.uploadSequenceToken,
  logStreamArn: record.arn
});

export const listLogStreams = async (
  logs: CloudWatchLogsGateway,
  logGroupName: string,
  options: { prefix?: string; nextToken?: string }
): Promise<ListLogStreamsResponse> => {
  const page = await logs.describeLogStreams({
    logGroupName,
    prefix: options.prefix,
    nextToken: options.nextToken
  });
  return { logStreams: page.items.map(toLogStream), nextToken: page.nextToken };
};

export const getLogEvents = async (
  logs: CloudWatchLogsGateway,
  logGroupName: string,
  logStreamName: string,
  options: LogEventsQueryOptions
): Promise<GetLogEventsResponse> => {
  const page = await logs.getLogEvents({
    logGroupName,
    logStreamName,
    startTime: options.startTime,
    endTime: options.endTime,
    startFromHead: options.startFromHead,
    limit: options.limit,
    nextToken: options.nextToken
  });
  return {
    events: page.events.map((event) => ({ timestamp: toIsoTimestamp(event.timestamp), message: event.message })),
    nextToken: page.nextForwardToken,
    prevToken: page.nextBackwardToken
  };
};
