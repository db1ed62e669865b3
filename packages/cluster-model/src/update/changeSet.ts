import { isDeepStrictEqual } from 'node:util';

import type { ClusterConfig } from '../config/clusterConfig';
import type { Change, UpdateError } from '../schema';

export type UpdatePolicy = 'SUPPORTED' | 'UNSUPPORTED' | 'COMPUTE_FLEET_STOP' | 'MAX_COUNT' | 'MIN_COUNT';

type Json = Record<string, unknown>;

export interface ConfigChange {
  /** Dotted location with list items addressed by name, e.g. `Scheduling.SlurmQueues[q1].ComputeResources[cr1].MaxCount`. */
  parameter: string;
  /** Same location with names erased, used to look up the update policy. */
  pattern: string;
  current: unknown;
  requested: unknown;
  /** Objects holding the changed value on each side, when both exist. */
  parents?: { current: Json; requested: Json };
  policy: UpdatePolicy;
}

const NAMED_LISTS: Record<string, string> = {
  SlurmQueues: 'Name',
  AwsBatchQueues: 'Name',
  ComputeResources: 'Name',
  SharedStorage: 'Name',
  Tags: 'Key'
};

const POLICY_RULES: Array<[RegExp, UpdatePolicy]> = [
  [/^Region$/, 'UNSUPPORTED'],
  [/^Image(\.|$)/, 'UNSUPPORTED'],
  [/^HeadNode\.Ssh\.AllowedIps$/, 'SUPPORTED'],
  [/^HeadNode(\.|$)/, 'UNSUPPORTED'],
  [/^Scheduling\.Scheduler$/, 'UNSUPPORTED'],
  [/^Scheduling\.SlurmQueues\[\]\.ComputeResources\[\]\.MaxCount$/, 'MAX_COUNT'],
  [/^Scheduling\.SlurmQueues\[\]\.ComputeResources\[\]\.MinCount$/, 'MIN_COUNT'],
  [/^Scheduling\.(SlurmQueues|SlurmSettings)/, 'COMPUTE_FLEET_STOP'],
  [/^Scheduling\.AwsBatchQueues\[\]\.ComputeResources\[\]\.(MaxvCpus|DesiredvCpus)$/, 'SUPPORTED'],
  [/^Scheduling\.AwsBatchQueues/, 'UNSUPPORTED'],
  [/^SharedStorage/, 'UNSUPPORTED'],
  [/^Monitoring\.Logs\.CloudWatch\.RetentionInDays$/, 'SUPPORTED'],
  [/^Monitoring\.Dashboards/, 'SUPPORTED'],
  [/^Monitoring\.DetailedMonitoring$/, 'COMPUTE_FLEET_STOP'],
  [/^Monitoring/, 'UNSUPPORTED'],
  [/^Tags/, 'UNSUPPORTED']
];

export const policyFor = (pattern: string): UpdatePolicy => {
  for (const [expression, policy] of POLICY_RULES) {
    if (expression.test(pattern)) {
      return policy;
    }
  }
  return 'UNSUPPORTED';
};

const isObject = (value: unknown): value is Json =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const join = (base: string, key: string): string => (base ? `${base}.${key}` : key);

const itemKey = (item: unknown, keyField: string): string | null => {
  if (!isObject(item)) {
    return null;
  }
  const key = item[keyField];
  return typeof key === 'string' ? key : null;
};

const toItemMap = (value: unknown, keyField: string): Map<string, unknown> => {
  const items = new Map<string, unknown>();
  if (!Array.isArray(value)) {
    return items;
  }
  for (const item of value) {
    const key = itemKey(item, keyField);
    if (key !== null) {
      items.set(key, item);
    }
  }
  return items;
};

const pushChange = (
  out: ConfigChange[],
  parameter: string,
  pattern: string,
  current: unknown,
  requested: unknown,
  parents?: { current: Json; requested: Json }
) => {
  out.push({ parameter, pattern, current, requested, parents, policy: policyFor(pattern) });
};

const diffNamedList = (
  current: unknown,
  requested: unknown,
  parameter: string,
  pattern: string,
  keyField: string,
  out: ConfigChange[]
) => {
  const before = toItemMap(current, keyField);
  const after = toItemMap(requested, keyField);
  for (const [name, item] of before) {
    const next = after.get(name);
    const location = `${parameter}[${name}]`;
    if (next === undefined) {
      pushChange(out, location, `${pattern}[]`, item, null);
    } else {
      diffValues(item, next, location, `${pattern}[]`, out);
    }
  }
  for (const [name, item] of after) {
    if (!before.has(name)) {
      pushChange(out, `${parameter}[${name}]`, `${pattern}[]`, null, item);
    }
  }
};

function diffValues(current: unknown, requested: unknown, parameter: string, pattern: string, out: ConfigChange[]) {
  if (!isObject(current) || !isObject(requested)) {
    if (!isDeepStrictEqual(current ?? null, requested ?? null)) {
      pushChange(out, parameter, pattern, current ?? null, requested ?? null);
    }
    return;
  }
  const keys = [...Object.keys(current), ...Object.keys(requested).filter((key) => !(key in current))];
  for (const key of keys) {
    const before = current[key];
    const after = requested[key];
    const childParameter = join(parameter, key);
    const childPattern = join(pattern, key);
    const keyField = NAMED_LISTS[key];
    if (keyField && (Array.isArray(before) || Array.isArray(after))) {
      diffNamedList(before, after, childParameter, childPattern, keyField, out);
      continue;
    }
    if (isObject(before) && isObject(after)) {
      diffValues(before, after, childParameter, childPattern, out);
      continue;
    }
    if (!isDeepStrictEqual(before ?? null, after ?? null)) {
      pushChange(out, childParameter, childPattern, before ?? null, after ?? null, { current, requested });
    }
  }
}

export const computeChangeSet = (current: ClusterConfig, requested: ClusterConfig): ConfigChange[] => {
  const out: ConfigChange[] = [];
  diffValues(current, requested, '', '', out);
  return out;
};

const serialize = (value: unknown): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
};

export const toChangeSet = (changes: ConfigChange[]): Change[] =>
  changes.map((change) => ({
    parameter: change.parameter,
    currentValue: serialize(change.current),
    requestedValue: serialize(change.requested)
  }));

const STOP_FLEET_HINT = 'Stop the compute fleet with the update-compute-fleet operation.';

const asNumber = (value: unknown): number | null => (typeof value === 'number' ? value : null);

const minCountAllowed = (change: ConfigChange): boolean => {
  const oldMin = asNumber(change.current);
  const newMin = asNumber(change.requested);
  const oldMax = asNumber(change.parents?.current.MaxCount);
  const newMax = asNumber(change.parents?.requested.MaxCount);
  if (oldMin === null || newMin === null || oldMax === null || newMax === null) {
    return false;
  }
  return newMin >= oldMin && newMax - newMin >= oldMax - oldMin;
};

const failureReason = (change: ConfigChange, fleetStopped: boolean): string | null => {
  switch (change.policy) {
    case 'SUPPORTED':
      return null;
    case 'COMPUTE_FLEET_STOP':
      return fleetStopped ? null : `All compute nodes must be stopped. ${STOP_FLEET_HINT}`;
    case 'MAX_COUNT': {
      const before = asNumber(change.current);
      const after = asNumber(change.requested);
      if (fleetStopped || (before !== null && after !== null && after >= before)) {
        return null;
      }
      return `Shrinking a queue requires the compute fleet to be stopped first. ${STOP_FLEET_HINT}`;
    }
    case 'MIN_COUNT':
      if (fleetStopped || minCountAllowed(change)) {
        return null;
      }
      return `The applied change may cause existing nodes to be terminated and requires the compute fleet to be stopped first. ${STOP_FLEET_HINT}`;
    case 'UNSUPPORTED': {
      const restore =
        change.current === null
          ? `Remove the parameter '${change.parameter}'.`
          : `Restore '${change.parameter}' value to '${serialize(change.current) ?? ''}'.`;
      return `Update actions are not currently supported for the '${change.parameter}' parameter. ${restore}`;
    }
  }
};

/**
 * Evaluates every change against its update policy. With `forceUpdate`, only
 * unsupported changes are reported.
 */
export const checkChangeSet = (
  changes: ConfigChange[],
  options: { fleetStopped: boolean; forceUpdate: boolean }
): UpdateError[] => {
  const errors: UpdateError[] = [];
  for (const change of changes) {
    if (options.forceUpdate && change.policy !== 'UNSUPPORTED') {
      continue;
    }
    const reason = failureReason(change, options.fleetStopped);
    if (reason) {
      errors.push({
        parameter: change.parameter,
        currentValue: serialize(change.current),
        requestedValue: serialize(change.requested),
        message: reason
      });
    }
  }
  return errors;
};
