import { AppError } from './AppError';

/**
 * Forbidden Error (403)
 * Thrown when the acting user lacks the permission an endpoint requires
 */
export class ForbiddenError extends AppError {
  constructor(message: string = 'You are not authorized to perform this action') {
    super(message, 403);
    Object.setPrototypeOf(this, ForbiddenError.prototype);
  }
}
