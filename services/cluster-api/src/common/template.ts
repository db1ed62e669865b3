import { createHash } from 'node:crypto';

import type { ConfigTag } from '@hpcfleet/cluster-model';

export interface TemplateResource {
  Type: string;
  Properties: Record<string, unknown>;
  DependsOn?: string[];
  DeletionPolicy?: 'Retain' | 'Delete' | 'Snapshot';
}

export interface TemplateOutput {
  Description?: string;
  Value: unknown;
}

export interface CloudFormationTemplate {
  AWSTemplateFormatVersion: '2010-09-09';
  Description: string;
  Resources: Record<string, TemplateResource>;
  Outputs: Record<string, TemplateOutput>;
}

export const ref = (logicalId: string) => ({ Ref: logicalId });

export const getAtt = (logicalId: string, attribute: string) => ({ 'Fn::GetAtt': [logicalId, attribute] });

/** Stable alphanumeric suffix for resources derived from user-chosen names. */
export const logicalIdSuffix = (...parts: string[]): string =>
  createHash('sha1').update(parts.join('-')).digest('hex').slice(0, 16);

export const toCfnTags = (tags: Record<string, string>, extra: ConfigTag[] = []) => [
  ...extra.map((tag) => ({ Key: tag.Key, Value: tag.Value })),
  ...Object.entries(tags).map(([Key, Value]) => ({ Key, Value }))
];

export const ec2AssumeRolePolicy = (service = 'ec2.amazonaws.com') => ({
  Version: '2012-10-17',
  Statement: [{ Effect: 'Allow', Principal: { Service: [service] }, Action: ['sts:AssumeRole'] }]
});
