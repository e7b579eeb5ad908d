import { Request, Response, NextFunction } from 'express';
import { userService, membershipService } from '@/config/dependencies';
import {
  listUsersQuerySchema,
  updateUserSchema,
  applicationReviewSchema,
  membershipTypeSchema,
  membershipPeriodSchema,
  userPaymentsQuerySchema,
} from '@/validators/user.validator';
import { ValidationError } from '@/errors';
import { actingUser } from '@/middlewares/authenticate';
import { routeParam } from '@/api/helpers/params';

/**
 * Users Controller
 * Member management for admins
 */

/**
 * GET /api/v1/admin/users
 * Paginated, filterable member listing
 */
export async function listUsers(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = listUsersQuerySchema.safeParse(req.query);
    if (!validationResult.success) {
      throw new ValidationError('Invalid query parameters', validationResult.error.flatten());
    }

    const query = validationResult.data;
    const result = await userService.listUsers({
      search: query.search,
      states: query.state,
      roles: query.role,
      boardPositions: query.boardPosition,
      membershipTypes: query.membershipType,
      page: query.page,
      pageSize: query.pageSize,
      orderBy: query.orderBy,
      orderDirection: query.orderDirection,
    });

    res.json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/admin/users/:id
 */
export async function getUser(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const detail = await userService.getUser(routeParam(req, 'id'));
    res.json(detail);
  } catch (error) {
    next(error);
  }
}

/**
 * PATCH /api/v1/admin/users/:id
 */
export async function updateUser(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = updateUserSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid user data', validationResult.error.flatten());
    }

    const result = await userService.updateUser(
      routeParam(req, 'id'),
      validationResult.data,
      actingUser(req).id
    );

    res.json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/users/:id/application-review
 * Approve or reject a signup application
 */
export async function reviewApplication(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = applicationReviewSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid review outcome', validationResult.error.flatten());
    }

    const result = await userService.reviewApplication(
      routeParam(req, 'id'),
      validationResult.data.outcome,
      actingUser(req).id
    );

    res.json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * PATCH /api/v1/admin/users/:id/membership-type
 */
export async function updateMembershipType(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = membershipTypeSchema.safeParse(req.body ?? {});
    if (!validationResult.success) {
      throw new ValidationError('Please select a membership type');
    }

    const result = await membershipService.changeMembershipType(
      routeParam(req, 'id'),
      validationResult.data.membershipType
    );

    res.json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * PATCH /api/v1/admin/users/:id/membership-period
 */
export async function updateMembershipPeriod(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = membershipPeriodSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid date format', validationResult.error.flatten());
    }

    const result = await membershipService.updateMembershipPeriod(
      routeParam(req, 'id'),
      validationResult.data
    );

    res.json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/admin/users/:id/payments
 */
export async function listUserPayments(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = userPaymentsQuerySchema.safeParse(req.query);
    if (!validationResult.success) {
      throw new ValidationError('Invalid page', validationResult.error.flatten());
    }

    const result = await userService.listUserPayments(
      routeParam(req, 'id'),
      validationResult.data.page
    );

    res.json(result);
  } catch (error) {
    next(error);
  }
}
