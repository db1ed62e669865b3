import { BadRequestException, SUPPORTED_REGIONS, validationLevelSchema } from '@hpcfleet/cluster-model';
import { z } from 'zod';

const single = z.union([z.string(), z.array(z.string())]).transform((value) => (Array.isArray(value) ? value.at(-1) ?? '' : value));

/** `true`/`false` query flag. */
export const booleanParam = single.pipe(z.enum(['true', 'false'])).transform((value) => value === 'true');

/** Repeated keys or comma-separated values. */
export const listParam = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (Array.isArray(value) ? value : [value])
      .flatMap((entry) => entry.split(','))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

export const stringParam = single;

export const validationQuerySchema = z.object({
  region: stringParam.optional(),
  suppressValidators: listParam.optional(),
  validationFailureLevel: single.pipe(validationLevelSchema).optional(),
  dryrun: booleanParam.optional(),
  rollbackOnFailure: booleanParam.optional(),
  clientToken: stringParam.optional()
});

export const regionQuerySchema = z.object({
  region: stringParam.optional()
});

export const pageQuerySchema = regionQuerySchema.extend({
  nextToken: stringParam.optional()
});

export const logEventsQuerySchema = pageQuerySchema.extend({
  startFromHead: booleanParam.optional(),
  limit: stringParam.optional(),
  startTime: stringParam.optional(),
  endTime: stringParam.optional()
});

const isSupportedRegion = (region: string): boolean => SUPPORTED_REGIONS.some((supported) => supported === region);

/** Query region first, then the request body, then the service default. */
export const resolveRegion = (
  candidates: Array<string | undefined>,
  defaultRegion: string | undefined
): string => {
  const region = [...candidates, defaultRegion].find((value) => value !== undefined && value.trim().length > 0);
  if (!region) {
    throw new BadRequestException('region needs to be set');
  }
  const normalized = region.trim().toLowerCase();
  if (!isSupportedRegion(normalized)) {
    throw new BadRequestException(`invalid or unsupported region '${region}'`);
  }
  return normalized;
};
