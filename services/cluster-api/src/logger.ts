import type { BaseLogger, LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

export const createLogger = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

/** The slice of a pino logger the domain services write to. */
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
