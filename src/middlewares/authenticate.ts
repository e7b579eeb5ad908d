import { Request, Response, NextFunction, RequestHandler } from 'express';
import { User } from '@/models';
import { USER_STATES } from '@/constants/users';
import { Permission, hasPermission } from '@/config/permissions';
import { userRepository } from '@/config/dependencies';
import { ForbiddenError, UnauthorizedError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';

declare global {
  namespace Express {
    interface Request {
      /** Set by `authenticate` */
      actingUser?: User;
    }
  }
}

export const ACTING_USER_HEADER = 'x-user-id';

/**
 * Resolve the acting user from the X-User-Id header
 *
 * Stands in for a session layer: an upstream gateway is expected to set the
 * header after authenticating the caller.
 */
export async function authenticate(
  req: Request,
  _res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = req.header(ACTING_USER_HEADER)?.trim();
    if (!userId) {
      throw new UnauthorizedError('Authentication required');
    }

    const user = await userRepository.findUserById(userId);
    if (!user || user.state !== USER_STATES.ACTIVE) {
      throw new UnauthorizedError('Invalid user');
    }

    req.actingUser = user;
    next();
  } catch (error) {
    next(error);
  }
}

/**
 * Require a permission of the acting user (run after `authenticate`)
 */
export function authorize(permission: Permission): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const user = req.actingUser;
    if (!user) {
      next(new UnauthorizedError('Authentication required'));
      return;
    }

    if (!hasPermission(user, permission)) {
      logger.warn(
        { userId: user.id, permission, path: req.originalUrl },
        'Permission denied'
      );
      next(new ForbiddenError());
      return;
    }

    next();
  };
}

/**
 * Acting user of an authenticated request
 */
export function actingUser(req: Request): User {
  if (!req.actingUser) {
    throw new UnauthorizedError('Authentication required');
  }
  return req.actingUser;
}
