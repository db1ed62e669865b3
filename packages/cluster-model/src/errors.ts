import type { Change, ConfigValidationMessage, UpdateError } from './schema';

export type ApiErrorBody = {
  message: string;
  validationMessages?: ConfigValidationMessage[];
  configurationValidationErrors?: ConfigValidationMessage[];
  updateValidationErrors?: UpdateError[];
  changeSet?: Change[];
};

export abstract class ApiException extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = 'ApiException';
  }

  toResponse(): ApiErrorBody {
    return { message: this.message };
  }
}

export class BadRequestException extends ApiException {
  readonly statusCode = 400;
  readonly code = 'BAD_REQUEST';

  constructor(message: string) {
    super(message.startsWith('Bad Request: ') ? message : `Bad Request: ${message}`);
    this.name = 'BadRequestException';
  }
}

export class UnauthorizedClientError extends ApiException {
  readonly statusCode = 401;
  readonly code = 'UNAUTHORIZED';

  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedClientError';
  }
}

export class NotFoundException extends ApiException {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundException';
  }
}

export class ConflictException extends ApiException {
  readonly statusCode = 409;
  readonly code = 'CONFLICT';

  constructor(message: string) {
    super(message);
    this.name = 'ConflictException';
  }
}

export class DryrunOperationException extends ApiException {
  readonly statusCode = 412;
  readonly code = 'DRYRUN';
  readonly validationMessages?: ConfigValidationMessage[];
  readonly changeSet?: Change[];

  constructor(
    options: { validationMessages?: ConfigValidationMessage[]; changeSet?: Change[] } = {},
    message = 'Request would have succeeded, but DryRun flag is set.'
  ) {
    super(message);
    this.name = 'DryrunOperationException';
    this.validationMessages = options.validationMessages;
    this.changeSet = options.changeSet;
  }

  toResponse(): ApiErrorBody {
    return compact({
      message: this.message,
      validationMessages: this.validationMessages,
      changeSet: this.changeSet
    });
  }
}

export class LimitExceededException extends ApiException {
  readonly statusCode = 429;
  readonly code = 'LIMIT_EXCEEDED';

  constructor(message: string) {
    super(message);
    this.name = 'LimitExceededException';
  }
}

export class InternalServiceException extends ApiException {
  readonly statusCode = 500;
  readonly code = 'INTERNAL';

  constructor(message: string) {
    super(message);
    this.name = 'InternalServiceException';
  }
}

export class CreateClusterBadRequestException extends BadRequestException {
  readonly configurationValidationErrors: ConfigValidationMessage[];

  constructor(message: string, configurationValidationErrors: ConfigValidationMessage[]) {
    super(message);
    this.name = 'CreateClusterBadRequestException';
    this.configurationValidationErrors = configurationValidationErrors;
  }

  toResponse(): ApiErrorBody {
    return { message: this.message, configurationValidationErrors: this.configurationValidationErrors };
  }
}

export class BuildImageBadRequestException extends BadRequestException {
  readonly configurationValidationErrors: ConfigValidationMessage[];

  constructor(message: string, configurationValidationErrors: ConfigValidationMessage[]) {
    super(message);
    this.name = 'BuildImageBadRequestException';
    this.configurationValidationErrors = configurationValidationErrors;
  }

  toResponse(): ApiErrorBody {
    return { message: this.message, configurationValidationErrors: this.configurationValidationErrors };
  }
}

export class UpdateClusterBadRequestException extends BadRequestException {
  readonly configurationValidationErrors?: ConfigValidationMessage[];
  readonly updateValidationErrors?: UpdateError[];
  readonly changeSet?: Change[];

  constructor(
    message: string,
    details: {
      configurationValidationErrors?: ConfigValidationMessage[];
      updateValidationErrors?: UpdateError[];
      changeSet?: Change[];
    }
  ) {
    super(message);
    this.name = 'UpdateClusterBadRequestException';
    this.configurationValidationErrors = details.configurationValidationErrors;
    this.updateValidationErrors = details.updateValidationErrors;
    this.changeSet = details.changeSet;
  }

  toResponse(): ApiErrorBody {
    return compact({
      message: this.message,
      configurationValidationErrors: this.configurationValidationErrors,
      updateValidationErrors: this.updateValidationErrors,
      changeSet: this.changeSet
    });
  }
}

function compact(body: ApiErrorBody): ApiErrorBody {
  const result: ApiErrorBody = { message: body.message };
  if (body.validationMessages !== undefined) {
    result.validationMessages = body.validationMessages;
  }
  if (body.configurationValidationErrors !== undefined) {
    result.configurationValidationErrors = body.configurationValidationErrors;
  }
  if (body.updateValidationErrors !== undefined) {
    result.updateValidationErrors = body.updateValidationErrors;
  }
  if (body.changeSet !== undefined) {
    result.changeSet = body.changeSet;
  }
  return result;
}
