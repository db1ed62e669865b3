import { parse as parseYaml, stringify as stringifyYaml, YAMLParseError } from 'yaml';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

import { BadRequestException } from '../errors';
import type { ConfigValidationMessage } from '../schema';
import { clusterConfigSchema, type ClusterConfig } from './clusterConfig';
import { imageConfigSchema, type ImageConfig } from './imageConfig';

export const SCHEMA_VALIDATOR_TYPE = 'ConfigSchemaValidator';

export type ConfigParseResult<T> =
  | { success: true; config: T }
  | { success: false; messages: ConfigValidationMessage[] };

const formatPath = (path: Array<string | number>): string =>
  path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`;
    }
    return acc ? `${acc}.${segment}` : segment;
  }, '');

export const schemaErrorMessages = (error: ZodError): ConfigValidationMessage[] =>
  error.issues.map((issue) => {
    const location = formatPath(issue.path);
    return {
      type: SCHEMA_VALIDATOR_TYPE,
      level: 'ERROR',
      message: location ? `${location}: ${issue.message}` : issue.message
    };
  });

/** Parses a YAML document; syntax errors become bad requests. */
export const loadYamlDocument = (source: string, label: string): unknown => {
  try {
    return parseYaml(source);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new BadRequestException(`${label} must be a valid YAML document: ${error.message}`);
    }
    throw error;
  }
};

const parseWith = <T>(schema: ZodType<T, ZodTypeDef, unknown>, source: string, label: string): ConfigParseResult<T> => {
  if (!source.trim()) {
    throw new BadRequestException('configuration is required and cannot be empty');
  }
  const document = loadYamlDocument(source, label);
  if (document === null || typeof document !== 'object' || Array.isArray(document)) {
    return {
      success: false,
      messages: [{ type: SCHEMA_VALIDATOR_TYPE, level: 'ERROR', message: `${label} must be a YAML mapping` }]
    };
  }
  const result = schema.safeParse(document);
  if (!result.success) {
    return { success: false, messages: schemaErrorMessages(result.error) };
  }
  return { success: true, config: result.data };
};

export const parseClusterConfig = (source: string): ConfigParseResult<ClusterConfig> =>
  parseWith(clusterConfigSchema, source, 'cluster configuration');

export const parseImageConfig = (source: string): ConfigParseResult<ImageConfig> =>
  parseWith(imageConfigSchema, source, 'image configuration');

export const dumpConfig = (config: ClusterConfig | ImageConfig): string => stringifyYaml(config);
