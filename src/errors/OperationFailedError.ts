import { AppError } from './AppError';

/**
 * Operation Failed Error (500 by default)
 * Wraps an unexpected failure behind the message shown to the operator
 * ("Failed to process refund"). The original error stays on `cause` for logs.
 */
export class OperationFailedError extends AppError {
  public readonly cause: unknown;

  constructor(message: string, cause?: unknown, statusCode: number = 500) {
    super(message, statusCode);
    this.cause = cause;
    Object.setPrototypeOf(this, OperationFailedError.prototype);
  }
}
