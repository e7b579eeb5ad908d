import { AppError } from './AppError';

/**
 * Not Found Error (404)
 * Also answers for records the acting user may not see, such as another
 * member's expense report, so their existence is not revealed
 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}
