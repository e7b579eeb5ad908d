/**
 * Base application error
 * Every error the API answers with a specific status extends this class.
 * Anything else reaching the error handler is answered as a 500.
 */
export class AppError extends Error {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, AppError.prototype);
  }
}
