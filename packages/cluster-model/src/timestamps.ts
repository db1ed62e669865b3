import { BadRequestException } from './errors';

const ISO_8601_PATTERN = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d{1,6})?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

const FORMAT_MESSAGE = 'filter must be in the ISO 8601 format: YYYY-MM-DDThh:mm:ssZ. (e.g. 1984-09-15T19:20:30Z or 1984-09-15).';

/** Date.parse rolls days past the end of a month into the next one. */
const isCalendarDate = (value: string): boolean => {
  const [year, month, day] = value.slice(0, 10).split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

/** Parses an ISO 8601 date or date-time; values without an offset are read as UTC. */
export const parseIsoTimestamp = (value: string, parameter: string): Date => {
  const trimmed = value.trim();
  if (!ISO_8601_PATTERN.test(trimmed) || !isCalendarDate(trimmed)) {
    throw new BadRequestException(`${parameter} ${FORMAT_MESSAGE}`);
  }
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/.test(trimmed) && trimmed.includes('T');
  const normalized = trimmed.includes('T') && !hasZone ? `${trimmed}Z` : trimmed;
  const parsed = new Date(normalized);
  if (Number.isNaN(parsed.getTime())) {
    throw new BadRequestException(`${parameter} ${FORMAT_MESSAGE}`);
  }
  return parsed;
};

export const toIsoTimestamp = (value: Date | number): string => new Date(value).toISOString();
