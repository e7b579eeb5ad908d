import { MembershipService } from '@/services/membership.service';
import { NotificationService } from '@/services/notification.service';
import {
  createMockUserRepository,
  createMockSubscriptionRepository,
  createMockPaymentProcessor,
  createMockNotifier,
} from '@/tests/utils/mockRepositories';
import { buildUser, buildSubscription } from '@/tests/utils/fixtures';
import { IUserRepository, ISubscriptionRepository } from '@/repositories/interfaces';
import { IPaymentProcessor } from '@/interfaces/IPaymentProcessor';
import { INotifier } from '@/interfaces/INotifier';
import { BusinessRuleError, ValidationError, OperationFailedError } from '@/errors';

const USER_ID = '01HUSER0000000000000000001';

describe('MembershipService', () => {
  let membershipService: MembershipService;
  let mockUserRepo: jest.Mocked<IUserRepository>;
  let mockSubscriptionRepo: jest.Mocked<ISubscriptionRepository>;
  let mockProcessor: jest.Mocked<IPaymentProcessor>;
  let mockNotifier: jest.Mocked<INotifier>;

  beforeEach(() => {
    mockUserRepo = createMockUserRepository();
    mockSubscriptionRepo = createMockSubscriptionRepository();
    mockProcessor = createMockPaymentProcessor();
    mockNotifier = createMockNotifier();

    membershipService = new MembershipService(
      mockUserRepo,
      mockSubscriptionRepo,
      mockProcessor,
      new NotificationService(mockNotifier)
    );

    mockUserRepo.findUserById.mockResolvedValue(buildUser());
  });

  describe('changeMembershipType', () => {
    it('should require a membership type', async () => {
      await expect(membershipService.changeMembershipType(USER_ID, '  ')).rejects.toThrow(
        new ValidationError('Please select a membership type')
      );
    });

    it('should not switch to lifetime', async () => {
      await expect(membershipService.changeMembershipType(USER_ID, 'lifetime')).rejects.toThrow(
        new ValidationError('Invalid membership type selected')
      );
    });

    it('should require an active subscription', async () => {
      mockSubscriptionRepo.findActiveByUserId.mockResolvedValue(null);

      await expect(membershipService.changeMembershipType(USER_ID, 'family')).rejects.toThrow(
        new BusinessRuleError('User does not have an active subscription to change')
      );
    });

    it('should do nothing when the member is already on the plan', async () => {
      mockSubscriptionRepo.findActiveByUserId.mockResolvedValue(buildSubscription());

      const result = await membershipService.changeMembershipType(USER_ID, 'single');

      expect(result).toEqual({ changed: false, message: 'User is already on that membership plan' });
      expect(mockProcessor.changeSubscriptionPrice).not.toHaveBeenCalled();
    });

    it('should invoice upgrades immediately', async () => {
      const subscription = buildSubscription();
      const saved = buildSubscription({ stripePriceId: 'price_family', planId: 'family' });
      mockSubscriptionRepo.findActiveByUserId.mockResolvedValue(subscription);
      mockProcessor.changeSubscriptionPrice.mockResolvedValue({
        id: 'sub_test',
        status: 'active',
        priceId: 'price_family',
        currentPeriodStart: new Date('2024-01-01T00:00:00.000Z'),
        currentPeriodEnd: new Date('2025-01-01T00:00:00.000Z'),
      });
      mockSubscriptionRepo.updatePlan.mockResolvedValue(saved);

      const result = await membershipService.changeMembershipType(USER_ID, 'family');

      expect(mockProcessor.changeSubscriptionPrice).toHaveBeenCalledWith({
        subscriptionId: 'sub_test',
        newPriceId: 'price_family',
        prorationBehavior: 'always_invoice',
      });
      expect(mockSubscriptionRepo.updatePlan).toHaveBeenCalledWith(subscription.id, {
        stripePriceId: 'price_family',
        planId: 'family',
        stripeStatus: 'active',
        currentPeriodStart: new Date('2024-01-01T00:00:00.000Z'),
        currentPeriodEnd: new Date('2025-01-01T00:00:00.000Z'),
      });
      expect(result).toEqual({
        changed: true,
        direction: 'upgrade',
        subscription: saved,
        message: 'Membership type changed from Single to Family',
      });
      expect(mockNotifier.send).toHaveBeenCalledWith(
        expect.objectContaining({ subject: 'Your membership plan was changed' })
      );
    });

    it('should downgrade without proration', async () => {
      mockSubscriptionRepo.findActiveByUserId.mockResolvedValue(
        buildSubscription({ stripePriceId: 'price_family', planId: 'family' })
      );
      mockProcessor.changeSubscriptionPrice.mockResolvedValue({
        id: 'sub_test',
        status: 'active',
        priceId: 'price_single',
        currentPeriodStart: new Date('2024-01-01T00:00:00.000Z'),
        currentPeriodEnd: new Date('2025-01-01T00:00:00.000Z'),
      });
      mockSubscriptionRepo.updatePlan.mockResolvedValue(buildSubscription());

      const result = await membershipService.changeMembershipType(USER_ID, 'single');

      expect(mockProcessor.changeSubscriptionPrice).toHaveBeenCalledWith(
        expect.objectContaining({ prorationBehavior: 'none' })
      );
      expect(result.changed && result.direction).toBe('downgrade');
    });

    it('should surface processor failures as a 502', async () => {
      mockSubscriptionRepo.findActiveByUserId.mockResolvedValue(buildSubscription());
      mockProcessor.changeSubscriptionPrice.mockRejectedValue(new Error('card declined'));

      const error = await membershipService
        .changeMembershipType(USER_ID, 'family')
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(OperationFailedError);
      expect(error).toHaveProperty('statusCode', 502);
      expect(error).toHaveProperty('message', 'Failed to change membership type: card declined');
      expect(mockSubscriptionRepo.updatePlan).not.toHaveBeenCalled();
    });
  });

  describe('updateMembershipPeriod', () => {
    it('should reject malformed dates', async () => {
      await expect(
        membershipService.updateMembershipPeriod(USER_ID, { periodStart: '2024-02-30', periodEnd: '2025-01-01' })
      ).rejects.toThrow(new ValidationError('Invalid date format'));
    });

    it('should reject an end before the start', async () => {
      await expect(
        membershipService.updateMembershipPeriod(USER_ID, { periodStart: '2024-06-01', periodEnd: '2024-06-01' })
      ).rejects.toThrow(new ValidationError('Membership period end must be after its start'));
    });

    it('should store the period as UTC dates', async () => {
      const subscription = buildSubscription();
      mockSubscriptionRepo.findActiveByUserId.mockResolvedValue(subscription);
      mockSubscriptionRepo.updatePeriod.mockResolvedValue(subscription);

      const result = await membershipService.updateMembershipPeriod(USER_ID, {
        periodStart: '2024-06-01',
        periodEnd: '2025-06-01',
      });

      expect(mockSubscriptionRepo.updatePeriod).toHaveBeenCalledWith(
        subscription.id,
        new Date('2024-06-01T00:00:00.000Z'),
        new Date('2025-06-01T00:00:00.000Z')
      );
      expect(result.message).toBe('Membership period updated successfully');
    });

    it('should require an active subscription', async () => {
      mockSubscriptionRepo.findActiveByUserId.mockResolvedValue(null);

      await expect(
        membershipService.updateMembershipPeriod(USER_ID, { periodStart: '2024-06-01', periodEnd: '2025-06-01' })
      ).rejects.toThrow(new BusinessRuleError('No active subscription found'));
    });
  });
});
