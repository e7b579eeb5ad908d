/**
 * Rate Limiting Middleware
 *
 * express-rate-limit with different limits per endpoint type:
 * - Global: All endpoints (except /health)
 * - Money mutations: refunds, credits, payments, payouts
 * - Uploads: presigned media uploads and receipt uploads
 *
 * Default in-memory store; a multi-instance deployment needs a shared
 * store (rate-limit-redis) passed as `store`.
 */

import rateLimit, { Options } from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import { RATE_LIMITS } from '@/config/businessRules';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Client IP for rate limiting
 *
 * 1. X-Forwarded-For (first entry is the original client)
 * 2. req.ip (honours trust proxy)
 * 3. socket remote address
 * 4. 'unknown'
 */
export function getClientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (forwarded) {
    const ips = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    if (ips) {
      const clientIp = ips.split(',')[0]?.trim();
      if (clientIp) return clientIp;
    }
  }

  if (req.ip) return req.ip;

  if (req.socket?.remoteAddress) return req.socket.remoteAddress;

  return 'unknown';
}

/**
 * Handler that logs before answering, for limits worth monitoring
 */
function loggingHandler(endpoint: string) {
  return (req: Request, res: Response, _next: NextFunction, options: Options): void => {
    logger.warn(
      {
        type: 'RATE_LIMIT_EXCEEDED',
        endpoint,
        ip: getClientIp(req),
        limit: options.limit,
      },
      'Rate limit exceeded'
    );
    res.status(options.statusCode).json(options.message);
  };
}

/**
 * Global rate limiter for all endpoints
 * Skips the health check
 */
export const globalRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.GLOBAL.WINDOW_MS,
  limit: RATE_LIMITS.GLOBAL.MAX_REQUESTS,
  message: {
    success: false,
    error: {
      message: `Too many requests. Please try again later. Limit: ${RATE_LIMITS.GLOBAL.MAX_REQUESTS} requests per minute.`,
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  skip: (req) => req.path === '/api/health',
});

/**
 * Stricter limiter for refunds, credits, payments and payouts
 */
export const moneyMutationRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.MONEY_MUTATIONS.WINDOW_MS,
  limit: RATE_LIMITS.MONEY_MUTATIONS.MAX_REQUESTS,
  message: {
    success: false,
    error: {
      message: `Too many ledger operations. Please slow down. Limit: ${RATE_LIMITS.MONEY_MUTATIONS.MAX_REQUESTS} per minute.`,
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  handler: loggingHandler('money'),
});

/**
 * Limiter for upload endpoints
 */
export const uploadRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.UPLOADS.WINDOW_MS,
  limit: RATE_LIMITS.UPLOADS.MAX_REQUESTS,
  message: {
    success: false,
    error: {
      message: `Too many upload requests. Please slow down. Limit: ${RATE_LIMITS.UPLOADS.MAX_REQUESTS} per minute.`,
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  handler: loggingHandler('uploads'),
});
