import { BadRequestException } from './errors';

export const LOG_STREAM_FILTER_NAMES = ['private-dns-name', 'node-type'] as const;

export const LOG_STREAM_FILTER_PATTERN = new RegExp(
  `^(Name=(${LOG_STREAM_FILTER_NAMES.join('|')}),Values=[\\w\\-_.,]+)$`
);

export type LogStreamFilter =
  | { kind: 'none' }
  | { kind: 'prefix'; prefix: string }
  | { kind: 'head-node' };

const parseFilter = (filter: string): { name: string; values: string[] } => {
  const [namePart, valuesPart] = filter.split(',Values=');
  return {
    name: namePart.slice('Name='.length),
    values: valuesPart.split(',').filter((value) => value.length > 0)
  };
};

/**
 * Turns `Name=<filter>,Values=<value>` expressions into a log-stream selection.
 * Log streams are named after the private DNS name of the node that produced them.
 */
export const parseLogStreamFilters = (filters: readonly string[] | undefined): LogStreamFilter => {
  if (!filters || filters.length === 0) {
    return { kind: 'none' };
  }
  for (const filter of filters) {
    if (!LOG_STREAM_FILTER_PATTERN.test(filter)) {
      throw new BadRequestException(
        `provided filters parameter '${filter}' must be in the form ${LOG_STREAM_FILTER_PATTERN.source}.`
      );
    }
  }

  const parsed = filters.map(parseFilter);
  const names = new Set(parsed.map((entry) => entry.name));
  if (names.size !== parsed.length) {
    throw new BadRequestException('filters parameter must not contain the same filter name more than once.');
  }
  if (names.size > 1) {
    throw new BadRequestException('private-dns-name and node-type filters cannot be combined.');
  }

  const [filter] = parsed;
  if (filter.values.length !== 1) {
    throw new BadRequestException(`filter ${filter.name} supports exactly one value.`);
  }
  const [value] = filter.values;
  if (filter.name === 'node-type') {
    if (value !== 'HeadNode') {
      throw new BadRequestException('the only accepted value for node-type filter is HeadNode.');
    }
    return { kind: 'head-node' };
  }
  return { kind: 'prefix', prefix: value };
};
