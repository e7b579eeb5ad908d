import { AppError } from './AppError';

/**
 * Validation Error (400 Bad Request)
 * Thrown when request payload is invalid
 * `errors` carries field-level details (zod flatten() output or a field → messages map)
 */
export class ValidationError extends AppError {
  public readonly errors?: unknown;

  constructor(message: string, errors?: unknown) {
    super(message, 400);
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
