import { HttpStatus } from '../config/constants';

/**
 * Base application error. `statusCode` is what the HTTP layer answers with
 * when the error reaches it.
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Request body could not be decoded into an export. */
export class DecodeError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, HttpStatus.BAD_REQUEST, options);
  }
}

/** Background write queue has no room for another export. */
export class QueueFullError extends AppError {
  constructor(message = 'write queue is full, retry later') {
    super(message, HttpStatus.SERVICE_UNAVAILABLE);
  }
}

/** A statement against the column store failed. */
export class StorageError extends AppError {
  readonly table: string;

  constructor(table: string, cause: unknown) {
    super(`failed to write to ${table}: ${errorMessage(cause)}`, HttpStatus.INTERNAL_SERVER_ERROR, {
      cause,
    });
    this.table = table;
  }
}

/** A background write ran past its deadline or was cancelled by shutdown. */
export class WriteTimeoutError extends AppError {
  constructor(message: string) {
    super(message);
  }
}

/** Environment is missing required variables or holds invalid values. */
export class ConfigError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}
