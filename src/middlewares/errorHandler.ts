import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { AppError, OperationFailedError, ValidationError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';

/**
 * Sanitize request body for logging
 * Creates a copy with sensitive fields redacted
 *
 * Redacted:
 * - routingNumber, accountNumber: bank details, only ever decrypted for the treasurer
 * - amount: member payment and reimbursement amounts
 *
 * Kept for debugging: ids, states, reasons, titles.
 */
const SENSITIVE_FIELDS = ['routingNumber', 'accountNumber', 'amount'];

export function sanitizeRequestBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map((item) => sanitizeRequestBody(item));
  }

  if (!body || typeof body !== 'object') {
    return body;
  }

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(body)) {
    if (SENSITIVE_FIELDS.includes(key)) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null) {
      sanitized[key] = sanitizeRequestBody(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

/**
 * Sanitize error messages for production
 *
 * In development: Show full error messages for debugging
 * In production: Replace failure messages that mention storage internals.
 * Validation, not-found and rule messages are written for the operator and pass through.
 */
function sanitizeErrorMessage(message: string): string {
  if (env.NODE_ENV !== 'production') {
    return message;
  }

  const sensitivePatterns = [
    /database|postgres|sql|query/i, // Database errors
    /file|path|directory|bucket/i, // File system and storage errors
    /internal|implementation/i, // Internal details
    /column|table|constraint/i, // Schema details
  ];

  const hasSensitiveInfo = sensitivePatterns.some((pattern) => pattern.test(message));

  if (hasSensitiveInfo) {
    return 'An error occurred while processing your request';
  }

  return message;
}

interface ErrorResponse {
  success: false;
  error: {
    message: string;
    details?: unknown;
  };
}

/**
 * Global error handler middleware
 * Handles all errors thrown in the application
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  logger.error(
    {
      error: {
        name: err.name,
        message: err.message,
        stack: err.stack,
        cause: err instanceof OperationFailedError ? err.cause : undefined,
      },
      request: {
        method: req.method,
        url: req.url,
        body: sanitizeRequestBody(req.body),
      },
    },
    'Error occurred'
  );

  // Upload limits enforced by multer (file size, unexpected field)
  if (err instanceof MulterError) {
    const message = err.code === 'LIMIT_FILE_SIZE' ? 'Too large' : err.message;
    res.status(400).json({ success: false, error: { message } } satisfies ErrorResponse);
    return;
  }

  if (err instanceof AppError) {
    const errorResponse: ErrorResponse = {
      success: false,
      error: {
        message:
          err instanceof OperationFailedError ? sanitizeErrorMessage(err.message) : err.message,
      },
    };

    if (err instanceof ValidationError && err.errors) {
      errorResponse.error.details = err.errors;
    }

    res.status(err.statusCode).json(errorResponse);
    return;
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({
      success: false,
      error: { message: 'Malformed JSON body' },
    } satisfies ErrorResponse);
    return;
  }

  res.status(500).json({
    success: false,
    error: {
      message: 'Internal server error',
    },
  } satisfies ErrorResponse);
}
