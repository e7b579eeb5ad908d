import { transaction } from '@/config/database';
import { PAGINATION_LIMITS } from '@/config/businessRules';
import {
  User,
  UserListItem,
  UserDetail,
  UpdateUserInput,
  UserPaymentItem,
  PaymentKind,
  PageMeta,
  buildPageMeta,
} from '@/models';
import {
  USER_STATES,
  USER_EVENT_TYPES,
  APPLICATION_OUTCOMES,
  ApplicationOutcome,
  UserState,
  UserRole,
  BoardPosition,
  MembershipType,
} from '@/constants/users';
import { ENTITY_TYPES } from '@/constants/ledger';
import {
  AppError,
  NotFoundError,
  BusinessRuleError,
  ValidationError,
  OperationFailedError,
} from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { isUniqueViolation } from '@/utils/pgErrors';
import {
  IUserRepository,
  ISignupApplicationRepository,
  ISubscriptionRepository,
  ILedgerRepository,
  UserOrderBy,
  OrderDirection,
} from '@/repositories/interfaces';
import { NotificationService } from './notification.service';

const logger = createLogger('UserService');

export interface ListUsersParams {
  search?: string;
  states?: UserState[];
  roles?: UserRole[];
  boardPositions?: BoardPosition[];
  membershipTypes?: MembershipType[];
  page: number;
  pageSize: number;
  orderBy: UserOrderBy;
  orderDirection: OrderDirection;
}

const PAYMENT_KINDS: Record<string, { type: PaymentKind; description: string }> = {
  [ENTITY_TYPES.MEMBERSHIP]: { type: 'membership', description: 'Membership Payment' },
  [ENTITY_TYPES.EVENT]: { type: 'ticket', description: 'Event Ticket' },
  [ENTITY_TYPES.BOOKING]: { type: 'booking', description: 'Cabin Booking' },
  [ENTITY_TYPES.DONATION]: { type: 'donation', description: 'Donation' },
};

/**
 * What a payment in a member's history was for
 */
export function classifyPayment(entityType: string | null): {
  type: PaymentKind;
  description: string;
} {
  return (
    (entityType ? PAYMENT_KINDS[entityType] : undefined) ?? {
      type: 'unknown',
      description: 'Payment',
    }
  );
}

/**
 * User Service
 * Member administration: listing, editing and application review
 */
export class UserService {
  constructor(
    private userRepo: IUserRepository,
    private applicationRepo: ISignupApplicationRepository,
    private subscriptionRepo: ISubscriptionRepository,
    private ledgerRepo: ILedgerRepository,
    private notifications: NotificationService
  ) {}

  async listUsers(params: ListUsersParams): Promise<{ users: UserListItem[]; meta: PageMeta }> {
    const { users, totalCount } = await this.userRepo.listUsers({
      search: params.search,
      states: params.states,
      roles: params.roles,
      boardPositions: params.boardPositions,
      membershipTypes: params.membershipTypes,
      orderBy: params.orderBy,
      orderDirection: params.orderDirection,
      limit: params.pageSize,
      offset: (params.page - 1) * params.pageSize,
    });

    return { users, meta: buildPageMeta(params.page, params.pageSize, totalCount) };
  }

  async getUser(userId: string): Promise<UserDetail> {
    const user = await this.userRepo.findUserById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const [membershipType, activeSubscription, pendingApplication] = await Promise.all([
      this.userRepo.findMembershipType(userId),
      this.subscriptionRepo.findActiveByUserId(userId),
      user.state === USER_STATES.PENDING_APPROVAL
        ? this.applicationRepo.findPendingByUserId(userId)
        : Promise.resolve(null),
    ]);

    return { user, membershipType, activeSubscription, pendingApplication };
  }

  /**
   * Update user attributes
   * State and role changes are recorded as user events in the same transaction.
   */
  async updateUser(
    userId: string,
    attrs: UpdateUserInput,
    actorId: string
  ): Promise<{ user: User; message: string }> {
    try {
      const user = await transaction(async (client) => {
        const before = await this.userRepo.findUserById(userId, client);
        if (!before) {
          throw new NotFoundError('User not found');
        }

        const updated = await this.userRepo.updateUser(userId, attrs, client);

        if (attrs.state !== undefined && attrs.state !== before.state) {
          await this.userRepo.insertUserEvent(
            {
              userId,
              updatedByUserId: actorId,
              type: USER_EVENT_TYPES.STATE_UPDATE,
              field: 'state',
              fromValue: before.state,
              toValue: attrs.state,
            },
            client
          );
        }

        if (attrs.role !== undefined && attrs.role !== before.role) {
          await this.userRepo.insertUserEvent(
            {
              userId,
              updatedByUserId: actorId,
              type: USER_EVENT_TYPES.ROLE_UPDATE,
              field: 'role',
              fromValue: before.role,
              toValue: attrs.role,
            },
            client
          );
        }

        return updated;
      });

      logger.info({ userId, actorId, fields: Object.keys(attrs) }, 'User updated');
      return { user, message: 'User updated' };
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ValidationError('Invalid user data', {
          fieldErrors: { email: ['has already been taken'] },
        });
      }
      throw error;
    }
  }

  /**
   * Approve or reject a pending signup application
   */
  async reviewApplication(
    userId: string,
    outcome: ApplicationOutcome,
    reviewerId: string
  ): Promise<{ user: User; message: string }> {
    const approved = outcome === APPLICATION_OUTCOMES.APPROVED;
    const newState = approved ? USER_STATES.ACTIVE : USER_STATES.REJECTED;

    let user: User;
    try {
      user = await transaction(async (client) => {
        // Concurrent reviewers queue here; the second one sees the decided state
        const current = await this.userRepo.lockUserById(userId, client);
        if (!current) {
          throw new NotFoundError('User not found');
        }

        const application =
          current.state === USER_STATES.PENDING_APPROVAL
            ? await this.applicationRepo.findPendingByUserId(userId, client)
            : null;
        if (!application) {
          throw new BusinessRuleError('User has no pending application');
        }

        const updated = await this.userRepo.updateUserState(
          userId,
          newState,
          approved ? application.birthDate : null,
          client
        );

        await this.applicationRepo.recordReview(
          { applicationId: application.id, userId, outcome, reviewerUserId: reviewerId },
          client
        );

        await this.userRepo.insertUserEvent(
          {
            userId,
            updatedByUserId: reviewerId,
            type: USER_EVENT_TYPES.STATE_UPDATE,
            field: 'state',
            fromValue: current.state,
            toValue: newState,
          },
          client
        );

        return updated;
      });
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      logger.error({ error, userId, outcome }, 'Application review failed');
      throw new OperationFailedError('Something went wrong', error);
    }

    logger.info({ userId, reviewerId, outcome }, 'Signup application reviewed');
    await this.notifications.applicationReviewed(user, approved);

    return {
      user,
      message: approved
        ? 'User was approved and is now a member!'
        : 'User application was rejected!',
    };
  }

  async listUserPayments(
    userId: string,
    page: number
  ): Promise<{ payments: UserPaymentItem[]; meta: PageMeta }> {
    const user = await this.userRepo.findUserById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const pageSize = PAGINATION_LIMITS.USER_PAYMENTS_PAGE_SIZE;
    const { payments, totalCount } = await this.ledgerRepo.listPaymentsForUser(
      userId,
      pageSize,
      (page - 1) * pageSize
    );

    return {
      payments: payments.map((payment) => ({ payment, ...classifyPayment(payment.entityType) })),
      meta: buildPageMeta(page, pageSize, totalCount),
    };
  }
}
