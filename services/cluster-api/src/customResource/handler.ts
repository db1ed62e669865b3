import { LambdaClient } from '@aws-sdk/client-lambda';
import type { CloudFormationCustomResourceEvent, Context } from 'aws-lambda';
import {
  ApiException,
  CLUSTER_NAME_PATTERN,
  NotFoundException,
  sortByLevel,
  validationLevelSchema,
  type ApiErrorBody,
  type DescribeClusterResponse
} from '@hpcfleet/cluster-model';
import pino from 'pino';
import { fetch } from 'undici';
import { stringify } from 'yaml';
import { z } from 'zod';

import { createSdkGatewayFactory, type AwsGatewayFactory } from '../aws';
import { createFunctionInvoker } from '../aws/lambda';
import { ClusterService } from '../clusters/clusterService';
import { ComputeFleetService } from '../clusters/computeFleet';
import { loadConfig } from '../config';
import { createLogger, type Logger } from '../logger';

const flag = z.union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')]);

const propertiesSchema = z.object({
  ClusterName: z.string().min(1),
  ClusterConfiguration: z.union([z.string(), z.record(z.unknown())]),
  SuppressValidators: z.union([z.string(), z.array(z.string())]).optional(),
  ValidationFailureLevel: validationLevelSchema.optional(),
  RollbackOnFailure: flag.optional()
});

type ResourceProperties = z.infer<typeof propertiesSchema>;

const deletePropertiesSchema = z.object({
  DeletionPolicy: z.enum(['Retain', 'Delete']).catch('Delete')
});

const waitTargetSchema = z.enum(['CREATE_COMPLETE', 'UPDATE_COMPLETE', 'DELETED']);

/** Carried between invocations while a cluster operation is still in progress. */
const pollStateSchema = z.object({
  clusterName: z.string(),
  target: waitTargetSchema,
  physicalResourceId: z.string(),
  data: z.record(z.string()).default({})
});

export type PollState = z.infer<typeof pollStateSchema>;

export type CustomResourceEvent = CloudFormationCustomResourceEvent & { hpcfleetPoll?: PollState };

export interface CustomResourceResponse {
  Status: 'SUCCESS' | 'FAILED';
  Reason: string;
  PhysicalResourceId: string;
  StackId: string;
  RequestId: string;
  LogicalResourceId: string;
  NoEcho: boolean;
  Data: Record<string, string>;
}

export interface CustomResourceDependencies {
  clusters: ClusterService;
  gateways: AwsGatewayFactory;
  region: string;
  logger: Logger;
  sendResponse?: (url: string, response: CustomResourceResponse) => Promise<void>;
  /** Starts a new asynchronous invocation of this function with the given event. */
  reinvoke: (functionArn: string, event: CustomResourceEvent) => Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  pollIntervalMs?: number;
  /** Below this much remaining time the wait continues in a new invocation. */
  safetyMarginMs?: number;
}

type InvocationContext = Pick<Context, 'getRemainingTimeInMillis' | 'invokedFunctionArn'>;

type Outcome =
  | { kind: 'done'; physicalResourceId: string; data: Record<string, string> }
  | { kind: 'waiting'; poll: PollState };

class CustomResourceFailure extends Error {}

/** Ids given to resources whose cluster was never created; they cannot be cluster names. */
const notCreatedId = (logicalResourceId: string) => `${logicalResourceId}:not-created`;

const NO_CHANGES = 'No changes found in your cluster configuration.';

const putResponse = async (url: string, response: CustomResourceResponse): Promise<void> => {
  const body = JSON.stringify(response);
  const result = await fetch(url, {
    method: 'PUT',
    headers: { 'content-type': '', 'content-length': String(Buffer.byteLength(body)) },
    body
  });
  if (!result.ok) {
    throw new Error(`custom resource response rejected with status ${result.status}`);
  }
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Nested values become dotted keys; arrays are kept as JSON strings. */
export const flattenData = (value: unknown, prefix = '', out: Record<string, string> = {}): Record<string, string> => {
  if (value === undefined || value === null) {
    return out;
  }
  if (typeof value === 'object' && !Array.isArray(value)) {
    for (const [key, entry] of Object.entries(value)) {
      flattenData(entry, prefix ? `${prefix}.${key}` : key, out);
    }
    return out;
  }
  out[prefix] = typeof value === 'string' ? value : JSON.stringify(value);
  return out;
};

/** API errors are reported as their JSON body with validation messages ordered INFO, WARNING, ERROR. */
export const failureReason = (error: unknown): string => {
  if (error instanceof ApiException) {
    const body: ApiErrorBody = error.toResponse();
    if (body.configurationValidationErrors) {
      body.configurationValidationErrors = sortByLevel(body.configurationValidationErrors);
    }
    if (body.validationMessages) {
      body.validationMessages = sortByLevel(body.validationMessages);
    }
    return JSON.stringify(body);
  }
  return error instanceof Error ? error.message : String(error);
};

const toSuppressors = (value: ResourceProperties['SuppressValidators']): string[] | undefined => {
  if (value === undefined) {
    return undefined;
  }
  return Array.isArray(value) ? value : [value];
};

const toYamlConfiguration = (value: ResourceProperties['ClusterConfiguration']): string =>
  typeof value === 'string' ? value : stringify(value);

export const createCustomResourceHandler = (deps: CustomResourceDependencies) => {
  const send = deps.sendResponse ?? putResponse;
  const sleep = deps.sleep ?? defaultSleep;
  const pollIntervalMs = deps.pollIntervalMs ?? 30_000;
  const safetyMarginMs = deps.safetyMarginMs ?? 60_000;
  const gateways = deps.gateways(deps.region);

  const describe = async (clusterName: string): Promise<DescribeClusterResponse | null> => {
    try {
      return await deps.clusters.describeCluster(gateways, clusterName);
    } catch (error) {
      if (error instanceof NotFoundException) {
        return null;
      }
      throw error;
    }
  };

  /** Polls until the target is reached; `null` when the invocation is running out of time. */
  const waitFor = async (
    poll: PollState,
    context: InvocationContext
  ): Promise<{ cluster: DescribeClusterResponse | null } | null> => {
    const { clusterName, target } = poll;
    while (context.getRemainingTimeInMillis() > safetyMarginMs) {
      const cluster = await describe(clusterName);
      if (!cluster) {
        if (target === 'DELETED') {
          return { cluster: null };
        }
        throw new CustomResourceFailure(`cluster ${clusterName} disappeared while waiting for ${target}.`);
      }
      if (cluster.clusterStatus === target) {
        return { cluster };
      }
      if (cluster.clusterStatus.endsWith('_FAILED')) {
        throw new CustomResourceFailure(
          `cluster ${clusterName} reached ${cluster.clusterStatus}: ${cluster.failures?.[0]?.failureReason ?? 'no reason reported'}`
        );
      }
      deps.logger.debug({ clusterName, status: cluster.clusterStatus }, 'Waiting for cluster');
      await sleep(pollIntervalMs);
    }
    return null;
  };

  const poll = async (state: PollState, context: InvocationContext): Promise<Outcome> => {
    const reached = await waitFor(state, context);
    if (!reached) {
      return { kind: 'waiting', poll: state };
    }
    const data = state.target === 'DELETED' ? {} : { ...flattenData(reached.cluster), ...state.data };
    return { kind: 'done', physicalResourceId: state.physicalResourceId, data };
  };

  /** Starts the operation; a `waiting` outcome names what to poll for. */
  const submit = async (event: CloudFormationCustomResourceEvent): Promise<Outcome> => {
    if (event.RequestType === 'Delete') {
      const clusterName = event.PhysicalResourceId;
      const done: Outcome = { kind: 'done', physicalResourceId: clusterName, data: {} };
      if (!CLUSTER_NAME_PATTERN.test(clusterName)) {
        return done;
      }
      if (deletePropertiesSchema.parse(event.ResourceProperties).DeletionPolicy === 'Retain') {
        return done;
      }
      try {
        await deps.clusters.deleteCluster(gateways, clusterName);
      } catch (error) {
        if (error instanceof NotFoundException) {
          return done;
        }
        throw error;
      }
      return { kind: 'waiting', poll: { clusterName, target: 'DELETED', physicalResourceId: clusterName, data: {} } };
    }

    const properties = propertiesSchema.parse(event.ResourceProperties);
    const clusterName = properties.ClusterName;
    const validation = {
      suppressValidators: toSuppressors(properties.SuppressValidators),
      validationFailureLevel: properties.ValidationFailureLevel
    };

    if (event.RequestType === 'Create') {
      const created = await deps.clusters.createCluster(
        gateways,
        { clusterName, clusterConfiguration: toYamlConfiguration(properties.ClusterConfiguration) },
        { ...validation, rollbackOnFailure: properties.RollbackOnFailure }
      );
      const data = flattenData({ validationMessages: created.validationMessages });
      return { kind: 'waiting', poll: { clusterName, target: 'CREATE_COMPLETE', physicalResourceId: clusterName, data } };
    }

    const previousName = propertiesSchema.shape.ClusterName.safeParse(event.OldResourceProperties.ClusterName);
    if (previousName.success && previousName.data !== clusterName) {
      throw new CustomResourceFailure('Cannot update the ClusterName property.');
    }
    const physicalResourceId = event.PhysicalResourceId;
    try {
      await deps.clusters.updateCluster(
        gateways,
        clusterName,
        { clusterConfiguration: toYamlConfiguration(properties.ClusterConfiguration) },
        validation
      );
    } catch (error) {
      if (error instanceof ApiException && error.message.endsWith(NO_CHANGES)) {
        return { kind: 'done', physicalResourceId, data: flattenData(await describe(clusterName)) };
      }
      throw error;
    }
    return { kind: 'waiting', poll: { clusterName, target: 'UPDATE_COMPLETE', physicalResourceId, data: {} } };
  };

  /**
   * Returns the response sent to CloudFormation, or `null` when the wait was handed to a new invocation.
   */
  return async (event: CustomResourceEvent, context: InvocationContext): Promise<CustomResourceResponse | null> => {
    let physicalResourceId =
      event.RequestType === 'Create' ? notCreatedId(event.LogicalResourceId) : event.PhysicalResourceId;

    let response: CustomResourceResponse;
    try {
      let outcome: Outcome =
        event.hpcfleetPoll === undefined
          ? await submit(event)
          : { kind: 'waiting', poll: pollStateSchema.parse(event.hpcfleetPoll) };
      if (outcome.kind === 'waiting') {
        physicalResourceId = outcome.poll.physicalResourceId;
        outcome = await poll(outcome.poll, context);
      }
      if (outcome.kind === 'waiting') {
        await deps.reinvoke(context.invokedFunctionArn, { ...event, hpcfleetPoll: outcome.poll });
        deps.logger.info(
          { clusterName: outcome.poll.clusterName, target: outcome.poll.target },
          'Continuing the wait in a new invocation'
        );
        return null;
      }
      response = {
        Status: 'SUCCESS',
        Reason: 'OK',
        PhysicalResourceId: outcome.physicalResourceId,
        StackId: event.StackId,
        RequestId: event.RequestId,
        LogicalResourceId: event.LogicalResourceId,
        NoEcho: false,
        Data: outcome.data
      };
    } catch (error) {
      deps.logger.error({ err: error, requestType: event.RequestType }, 'Custom resource request failed');
      response = {
        Status: 'FAILED',
        Reason: failureReason(error),
        PhysicalResourceId: physicalResourceId,
        StackId: event.StackId,
        RequestId: event.RequestId,
        LogicalResourceId: event.LogicalResourceId,
        NoEcho: false,
        Data: {}
      };
    }

    await send(event.ResponseURL, response);
    return response;
  };
};

let defaultHandler: ReturnType<typeof createCustomResourceHandler> | undefined;

export const handler = async (event: CustomResourceEvent, context: Context) => {
  if (!defaultHandler) {
    const config = loadConfig();
    const logger = pino(createLogger(config.logLevel));
    const region = config.defaultRegion ?? 'us-east-1';
    defaultHandler = createCustomResourceHandler({
      clusters: new ClusterService({
        logger,
        computeFleet: new ComputeFleetService(logger),
        officialImageOwners: config.officialImageOwners
      }),
      gateways: createSdkGatewayFactory({ artifactsBucket: config.artifactsBucket ?? '' }),
      region,
      logger,
      reinvoke: createFunctionInvoker(new LambdaClient({ region }))
    });
  }
  return defaultHandler(event, context);
};
