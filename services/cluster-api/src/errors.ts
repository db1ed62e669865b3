import { ApiException, type ApiErrorBody } from '@hpcfleet/cluster-model';
import { ZodError } from 'zod';

import { AwsClientError, ConditionalUpdateFailedError, THROTTLING_CODES } from './aws';

export interface ErrorResponse {
  statusCode: number;
  body: ApiErrorBody;
}

export const UNEXPECTED_ERROR_MESSAGE =
  'Unexpected fatal exception. Please look at the application logs for details on the encountered failure.';

const formatZodError = (error: ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

const clientStatusCode = (error: unknown): number | null => {
  if (!(error instanceof Error) || !('statusCode' in error) || typeof error.statusCode !== 'number') {
    return null;
  }
  return error.statusCode >= 400 && error.statusCode < 500 ? error.statusCode : null;
};

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof ApiException) {
    return { statusCode: error.statusCode, body: error.toResponse() };
  }

  if (error instanceof ZodError) {
    return { statusCode: 400, body: { message: `Bad Request: ${formatZodError(error)}` } };
  }

  if (error instanceof ConditionalUpdateFailedError) {
    return { statusCode: 409, body: { message: error.message } };
  }

  if (error instanceof AwsClientError) {
    if (error.code === 'ValidationError') {
      return { statusCode: 400, body: { message: `Bad Request: ${error.message}` } };
    }
    if (THROTTLING_CODES.has(error.code)) {
      return { statusCode: 429, body: { message: error.message } };
    }
    return {
      statusCode: 500,
      body: { message: `Failed when calling AWS service in ${error.operation}: ${error.message}` }
    };
  }

  if (clientStatusCode(error) !== null && error instanceof Error) {
    return { statusCode: 400, body: { message: `Bad Request: ${error.message}` } };
  }

  return { statusCode: 500, body: { message: UNEXPECTED_ERROR_MESSAGE } };
};
