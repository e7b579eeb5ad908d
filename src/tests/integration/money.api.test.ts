import request from 'supertest';
import app from '@/app';
import { TestContainer } from '@/tests/utils/testContainer';
import { ADMIN, MEMBER, registerActingUsers } from '@/tests/utils/actingUsers';

const mockClient = {
  query: jest.fn(),
};

jest.mock('@/config/database', () => ({
  transaction: jest.fn((callback: (client: typeof mockClient) => unknown) => callback(mockClient)),
}));

jest.mock('@/config/dependencies', () =>
  jest
    .requireActual<typeof import('@/tests/utils/testContainer')>('@/tests/utils/testContainer')
    .createTestContainer()
);

const container = jest.requireMock<TestContainer>('@/config/dependencies');

describe('Money API', () => {
  beforeEach(() => {
    registerActingUsers(container.userRepository);
  });

  it('should be limited to admins', async () => {
    await request(app).get('/api/v1/admin/money/accounts').set('X-User-Id', MEMBER.id).expect(403);
  });

  describe('POST /api/v1/admin/money/refunds', () => {
    it('should list every missing field', async () => {
      const response = await request(app)
        .post('/api/v1/admin/money/refunds')
        .set('X-User-Id', ADMIN.id)
        .send({})
        .expect(400);

      expect(response.body).toEqual({
        success: false,
        error: {
          message: 'Invalid refund',
          details: {
            formErrors: [],
            fieldErrors: {
              paymentId: ["can't be blank"],
              amount: ["can't be blank"],
              reason: ["can't be blank"],
            },
          },
        },
      });
      expect(container.ledgerRepository.findPaymentById).not.toHaveBeenCalled();
    });

    it('should refuse a zero amount', async () => {
      const response = await request(app)
        .post('/api/v1/admin/money/refunds')
        .set('X-User-Id', ADMIN.id)
        .send({ paymentId: '01HPAY00000000000000000001', amount: '0', reason: 'Duplicate charge' })
        .expect(400);

      expect(response.body.error.details.fieldErrors).toEqual({ amount: ['must be positive'] });
    });
  });

  describe('GET /api/v1/admin/money/payments/:id', () => {
    it('should return 404 for unknown payments', async () => {
      container.ledgerRepository.findPaymentById.mockResolvedValue(null);

      const response = await request(app)
        .get('/api/v1/admin/money/payments/01HNOPAY000000000000000001')
        .set('X-User-Id', ADMIN.id)
        .expect(404);

      expect(response.body.error.message).toBe('Payment not found');
      expect(container.ledgerRepository.listEntriesForPayment).not.toHaveBeenCalled();
    });
  });
});
