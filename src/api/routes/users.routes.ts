import { Router } from 'express';
import * as usersController from '@/controllers/users.controller';

const router = Router();

/**
 * GET /api/v1/admin/users
 * Filters: search, state, role, boardPosition, membershipType (comma-separated)
 */
router.get('/', usersController.listUsers);

router.get('/:id', usersController.getUser);

router.patch('/:id', usersController.updateUser);

/**
 * POST /api/v1/admin/users/:id/application-review
 * { outcome: "approved" | "rejected" }
 */
router.post('/:id/application-review', usersController.reviewApplication);

router.patch('/:id/membership-type', usersController.updateMembershipType);

router.patch('/:id/membership-period', usersController.updateMembershipPeriod);

router.get('/:id/payments', usersController.listUserPayments);

export default router;
