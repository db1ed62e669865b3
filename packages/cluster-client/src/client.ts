import {
  changeSchema,
  configValidationMessageSchema,
  updateErrorSchema,
  type ApiErrorBody,
  type BuildImageResponse,
  type ComputeFleetStatusResponse,
  type CreateClusterResponse,
  type DeleteClusterResponse,
  type DeleteImageResponse,
  type DescribeClusterInstancesResponse,
  type DescribeClusterResponse,
  type DescribeImageResponse,
  type DescribeOfficialImagesResponse,
  type GetLogEventsResponse,
  type GetStackEventsResponse,
  type ListClustersResponse,
  type ListImagesResponse,
  type ListLogStreamsResponse,
  type UpdateClusterResponse
} from '@hpcfleet/cluster-model';
import { fetch, Headers } from 'undici';
import type { Response } from 'undici';
import { z } from 'zod';

import { HpcFleetClientError } from './errors';
import type {
  BuildImageInput,
  CreateClusterInput,
  DeleteClusterInput,
  DeleteClusterInstancesInput,
  DeleteImageInput,
  DescribeClusterInstancesInput,
  GetLogEventsInput,
  HpcFleetClientOptions,
  ListClustersInput,
  ListImagesInput,
  ListLogStreamsInput,
  ListOfficialImagesInput,
  PageOptions,
  QueryValue,
  RegionOptions,
  TokenProvider,
  UpdateClusterInput,
  UpdateComputeFleetInput
} from './types';

interface RequestOptions {
  query?: Record<string, QueryValue>;
  body?: unknown;
}

const errorBodySchema = z.object({
  message: z.string(),
  validationMessages: z.array(configValidationMessageSchema).optional(),
  configurationValidationErrors: z.array(configValidationMessageSchema).optional(),
  updateValidationErrors: z.array(updateErrorSchema).optional(),
  changeSet: z.array(changeSchema).optional()
});

async function resolveToken(token?: TokenProvider): Promise<string | null> {
  if (!token) {
    return null;
  }
  if (typeof token === 'function') {
    const resolved = await token();
    return resolved ? String(resolved) : null;
  }
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : null;
}

const segment = (value: string) => encodeURIComponent(value);

export class HpcFleetClient {
  private readonly baseUrl: URL;
  private readonly token?: TokenProvider;
  private readonly userAgent?: string;
  private readonly fetchTimeoutMs?: number;

  constructor(options: HpcFleetClientOptions) {
    if (!options.baseUrl) {
      throw new Error('HpcFleetClient requires a baseUrl');
    }
    this.baseUrl = new URL(options.baseUrl);
    this.token = options.token;
    this.userAgent = options.userAgent;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
  }

  async createCluster(input: CreateClusterInput): Promise<CreateClusterResponse> {
    const { clusterName, clusterConfiguration, region, ...query } = input;
    return this.request<CreateClusterResponse>('POST', '/v3/clusters', {
      query: { region, ...query },
      body: { clusterName, clusterConfiguration }
    });
  }

  async listClusters(input: ListClustersInput = {}): Promise<ListClustersResponse> {
    return this.request<ListClustersResponse>('GET', '/v3/clusters', { query: { ...input } });
  }

  async describeCluster(clusterName: string, options: RegionOptions = {}): Promise<DescribeClusterResponse> {
    return this.request<DescribeClusterResponse>('GET', `/v3/clusters/${segment(clusterName)}`, {
      query: { ...options }
    });
  }

  async updateCluster(input: UpdateClusterInput): Promise<UpdateClusterResponse> {
    const { clusterName, clusterConfiguration, ...query } = input;
    return this.request<UpdateClusterResponse>('PUT', `/v3/clusters/${segment(clusterName)}`, {
      query,
      body: { clusterConfiguration }
    });
  }

  async deleteCluster(input: DeleteClusterInput): Promise<DeleteClusterResponse> {
    const { clusterName, ...query } = input;
    return this.request<DeleteClusterResponse>('DELETE', `/v3/clusters/${segment(clusterName)}`, { query });
  }

  async describeComputeFleet(clusterName: string, options: RegionOptions = {}): Promise<ComputeFleetStatusResponse> {
    return this.request<ComputeFleetStatusResponse>('GET', `/v3/clusters/${segment(clusterName)}/computefleet`, {
      query: { ...options }
    });
  }

  async updateComputeFleet(input: UpdateComputeFleetInput): Promise<void> {
    const { clusterName, status, region } = input;
    await this.requestEmpty('PATCH', `/v3/clusters/${segment(clusterName)}/computefleet`, {
      query: { region },
      body: { status }
    });
  }

  async describeClusterInstances(input: DescribeClusterInstancesInput): Promise<DescribeClusterInstancesResponse> {
    const { clusterName, ...query } = input;
    return this.request<DescribeClusterInstancesResponse>('GET', `/v3/clusters/${segment(clusterName)}/instances`, {
      query
    });
  }

  async deleteClusterInstances(input: DeleteClusterInstancesInput): Promise<void> {
    const { clusterName, ...query } = input;
    await this.requestEmpty('DELETE', `/v3/clusters/${segment(clusterName)}/instances`, { query });
  }

  async listClusterLogStreams(clusterName: string, input: ListLogStreamsInput = {}): Promise<ListLogStreamsResponse> {
    return this.request<ListLogStreamsResponse>('GET', `/v3/clusters/${segment(clusterName)}/logstreams`, {
      query: { ...input }
    });
  }

  async getClusterLogEvents(clusterName: string, input: GetLogEventsInput): Promise<GetLogEventsResponse> {
    const { logStreamName, ...query } = input;
    return this.request<GetLogEventsResponse>(
      'GET',
      `/v3/clusters/${segment(clusterName)}/logstreams/${segment(logStreamName)}`,
      { query }
    );
  }

  async getClusterStackEvents(clusterName: string, options: PageOptions = {}): Promise<GetStackEventsResponse> {
    return this.request<GetStackEventsResponse>('GET', `/v3/clusters/${segment(clusterName)}/stackevents`, {
      query: { ...options }
    });
  }

  async buildImage(input: BuildImageInput): Promise<BuildImageResponse> {
    const { imageId, imageConfiguration, region, ...query } = input;
    return this.request<BuildImageResponse>('POST', '/v3/images/custom', {
      query: { region, ...query },
      body: { imageId, imageConfiguration }
    });
  }

  async listImages(input: ListImagesInput): Promise<ListImagesResponse> {
    return this.request<ListImagesResponse>('GET', '/v3/images/custom', { query: { ...input } });
  }

  async describeImage(imageId: string, options: RegionOptions = {}): Promise<DescribeImageResponse> {
    return this.request<DescribeImageResponse>('GET', `/v3/images/custom/${segment(imageId)}`, {
      query: { ...options }
    });
  }

  async deleteImage(input: DeleteImageInput): Promise<DeleteImageResponse> {
    const { imageId, ...query } = input;
    return this.request<DeleteImageResponse>('DELETE', `/v3/images/custom/${segment(imageId)}`, { query });
  }

  async listOfficialImages(input: ListOfficialImagesInput = {}): Promise<DescribeOfficialImagesResponse> {
    return this.request<DescribeOfficialImagesResponse>('GET', '/v3/images/official', { query: { ...input } });
  }

  async listImageLogStreams(imageId: string, options: PageOptions = {}): Promise<ListLogStreamsResponse> {
    return this.request<ListLogStreamsResponse>('GET', `/v3/images/custom/${segment(imageId)}/logstreams`, {
      query: { ...options }
    });
  }

  async getImageLogEvents(imageId: string, input: GetLogEventsInput): Promise<GetLogEventsResponse> {
    const { logStreamName, ...query } = input;
    return this.request<GetLogEventsResponse>(
      'GET',
      `/v3/images/custom/${segment(imageId)}/logstreams/${segment(logStreamName)}`,
      { query }
    );
  }

  async getImageStackEvents(imageId: string, options: PageOptions = {}): Promise<GetStackEventsResponse> {
    return this.request<GetStackEventsResponse>('GET', `/v3/images/custom/${segment(imageId)}/stackevents`, {
      query: { ...options }
    });
  }

  private async request<T>(method: string, path: string, options: RequestOptions = {}): Promise<T> {
    const response = await this.send(method, path, options);
    return (await response.json()) as T;
  }

  private async requestEmpty(method: string, path: string, options: RequestOptions = {}): Promise<void> {
    const response = await this.send(method, path, options);
    await response.body?.cancel();
  }

  private async send(method: string, path: string, options: RequestOptions): Promise<Response> {
    const headers = await this.buildHeaders();
    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers.set('Content-Type', 'application/json');
    }

    const controller = new AbortController();
    let timeout: NodeJS.Timeout | undefined;
    if (this.fetchTimeoutMs && this.fetchTimeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, this.fetchTimeoutMs);
    }

    try {
      const response = await fetch(this.buildUrl(path, options.query), {
        method,
        headers,
        body,
        signal: controller.signal
      });
      if (!response.ok) {
        await this.handleErrorResponse(response);
      }
      return response;
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new HpcFleetClientError('Request aborted', { statusCode: 0 });
      }
      throw err;
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }

  private async buildHeaders(): Promise<Headers> {
    const headers = new Headers({ Accept: 'application/json' });
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    const token = await resolveToken(this.token);
    if (token) {
      headers.set('Authorization', `Bearer ${token}`);
    }
    return headers;
  }

  private buildUrl(path: string, query?: Record<string, QueryValue>): URL {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value === undefined) {
        continue;
      }
      if (Array.isArray(value)) {
        // Repeated keys: log stream filters carry commas of their own.
        for (const entry of value) {
          url.searchParams.append(key, entry);
        }
        continue;
      }
      url.searchParams.set(key, String(value));
    }
    return url;
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const text = await response.text();
    let payload: unknown = null;
    try {
      payload = JSON.parse(text);
    } catch {
      payload = null;
    }

    const parsed = errorBodySchema.safeParse(payload);
    if (parsed.success) {
      const body: ApiErrorBody = parsed.data;
      throw new HpcFleetClientError(body.message, { statusCode: response.status, body });
    }
    throw new HpcFleetClientError(text || response.statusText || 'hpcfleet request failed', {
      statusCode: response.status
    });
  }
}
