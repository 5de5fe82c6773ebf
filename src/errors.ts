/**
 * API error types.
 *
 * Each error carries the HTTP status and a stable code; the error middleware
 * turns them into `{ error, code, fields? }` bodies.
 */

export type ApiErrorCode =
  | 'AUTHENTICATION_REQUIRED'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'BAD_REQUEST'
  | 'INTERNAL_ERROR';

/** Field name -> messages, `non_field_errors` for payload-level problems */
export type FieldErrors = Record<string, string[]>;

export interface ApiErrorBody {
  error: string;
  code: ApiErrorCode;
  fields?: FieldErrors;
}

export class ApiError extends Error {
  public readonly status: number;
  public readonly code: ApiErrorCode;

  constructor(status: number, code: ApiErrorCode, message: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
  }

  toJSON(): ApiErrorBody {
    return { error: this.message, code: this.code };
  }
}

export class AuthenticationRequiredError extends ApiError {
  constructor(message = 'Authentication credentials were not provided.') {
    super(401, 'AUTHENTICATION_REQUIRED', message);
    this.name = 'AuthenticationRequiredError';
  }
}

// Also used for records owned by someone else, so ownership never leaks.
export class NotFoundError extends ApiError {
  constructor() {
    super(404, 'NOT_FOUND', 'Not found.');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends ApiError {
  public readonly fields: FieldErrors;

  constructor(fields: FieldErrors) {
    super(400, 'VALIDATION_ERROR', 'Validation failed.');
    this.name = 'ValidationError';
    this.fields = fields;
  }

  toJSON(): ApiErrorBody {
    return { error: this.message, code: this.code, fields: this.fields };
  }
}

export class InvalidImageError extends ValidationError {
  constructor(
    message = 'Upload a valid image. The file you uploaded was either not an image or a corrupted image.',
  ) {
    super({ image: [message] });
    this.name = 'InvalidImageError';
  }
}

/**
 * Merge field errors into `target`, keeping message order per field.
 */
export function mergeFieldErrors(target: FieldErrors, source: FieldErrors): FieldErrors {
  for (const [field, messages] of Object.entries(source)) {
    target[field] = [...(target[field] ?? []), ...messages];
  }
  return target;
}
