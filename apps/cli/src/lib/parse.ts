import { readFile } from 'node:fs/promises';

import { InvalidArgumentError } from 'commander';
import type { z } from 'zod';

export async function readConfigurationFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Unable to read configuration file ${filePath}: ${message}`);
  }
}

export function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true') {
    return true;
  }
  if (normalized === 'false') {
    return false;
  }
  throw new InvalidArgumentError(`Expected true or false, received '${value}'.`);
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError(`Expected a positive integer, received '${value}'.`);
  }
  return parsed;
}

/** Commander argument parser backed by a model enum. */
export function enumValue<T extends string>(schema: z.ZodType<T>) {
  return (value: string): T => {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new InvalidArgumentError(`Unsupported value '${value}'.`);
    }
    return result.data;
  };
}

/** Collects repeated or comma-separated option values. */
export function collectList(value: string, previous: string[] = []): string[] {
  return [
    ...previous,
    ...value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  ];
}
