import { AppError } from './AppError';

/**
 * Unauthorized Error (401)
 * Thrown when the acting user cannot be resolved
 */
export class UnauthorizedError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(message, 401);
    Object.setPrototypeOf(this, UnauthorizedError.prototype);
  }
}
