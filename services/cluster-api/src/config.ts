export interface ClusterApiConfig {
  host: string;
  port: number;
  logLevel: string;
  defaultRegion?: string;
  artifactsBucket?: string;
  officialImageOwners: string[];
  apiTokens: string[];
  enableMetrics: boolean;
}

const toBool = (value: string | undefined, fallback: boolean) => {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const toList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ClusterApiConfig => {
  const port = Number.parseInt(env.HPCFLEET_PORT ?? '4300', 10);

  if (Number.isNaN(port) || port <= 0) {
    throw new Error('HPCFLEET_PORT must be a positive integer');
  }

  const host = env.HPCFLEET_HOST?.trim() || '0.0.0.0';
  const logLevel = env.HPCFLEET_LOG_LEVEL?.trim() || 'info';
  const defaultRegion =
    env.HPCFLEET_DEFAULT_REGION?.trim() || env.AWS_DEFAULT_REGION?.trim() || env.AWS_REGION?.trim() || undefined;
  const artifactsBucket = env.HPCFLEET_ARTIFACTS_BUCKET?.trim() || undefined;
  const owners = toList(env.HPCFLEET_OFFICIAL_IMAGE_OWNERS);

  return {
    host,
    port,
    logLevel,
    defaultRegion,
    artifactsBucket,
    officialImageOwners: owners.length > 0 ? owners : ['amazon'],
    apiTokens: toList(env.HPCFLEET_API_TOKENS),
    enableMetrics: toBool(env.HPCFLEET_ENABLE_METRICS, true)
  };
};
