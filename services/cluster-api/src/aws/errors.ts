export class AwsClientError extends Error {
  readonly operation: string;
  readonly code: string;

  constructor(operation: string, code: string, message: string) {
    super(message);
    this.name = 'AwsClientError';
    this.operation = operation;
    this.code = code;
  }
}

export class ConditionalUpdateFailedError extends Error {
  readonly code = 'CONDITIONAL_UPDATE_FAILED';

  constructor(message: string) {
    super(message);
    this.name = 'ConditionalUpdateFailedError';
  }
}

export const THROTTLING_CODES = new Set([
  'Throttling',
  'ThrottlingException',
  'RequestLimitExceeded',
  'TooManyRequestsException'
]);

export const errorCode = (error: unknown): string => {
  if (error instanceof Error) {
    const code = 'Code' in error && typeof error.Code === 'string' ? error.Code : error.name;
    return code || 'UnknownError';
  }
  return 'UnknownError';
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** Runs an SDK call and rethrows failures as {@link AwsClientError}. */
export const callAws = async <T>(operation: string, call: () => Promise<T>): Promise<T> => {
  try {
    return await call();
  } catch (error) {
    if (error instanceof AwsClientError || error instanceof ConditionalUpdateFailedError) {
      throw error;
    }
    throw new AwsClientError(operation, errorCode(error), errorMessage(error));
  }
};
