import express from 'express';
import request from 'supertest';
import { errorHandler } from '@/middlewares/errorHandler';
import { NotFoundError, OperationFailedError, ValidationError } from '@/errors';

jest.mock('@/config/env', () => ({ env: { NODE_ENV: 'production' } }));
jest.mock('@/adapters/logging/LoggerFactory', () => ({ logger: { error: jest.fn() } }));

function handle(error: Error) {
  const app = express();
  app.post('/api/v1/admin/media/uploads', (_req, _res, next) => next(error));
  app.use(errorHandler);

  return request(app).post('/api/v1/admin/media/uploads');
}

describe('errorHandler in production', () => {
  it('should keep validation messages about files', async () => {
    const response = await handle(new ValidationError('Too many files'));

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ success: false, error: { message: 'Too many files' } });
  });

  it('should keep the unacceptable file type message', async () => {
    const response = await handle(new ValidationError('You have selected an unacceptable file type'));

    expect(response.body).toEqual({
      success: false,
      error: { message: 'You have selected an unacceptable file type' },
    });
  });

  it('should keep not-found messages', async () => {
    const response = await handle(new NotFoundError('Export file not found'));

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ success: false, error: { message: 'Export file not found' } });
  });

  it('should hide storage details in failure messages', async () => {
    const response = await handle(new OperationFailedError('Could not read file from bucket media'));

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      success: false,
      error: { message: 'An error occurred while processing your request' },
    });
  });

  it('should pass failure messages without storage details through', async () => {
    const response = await handle(new OperationFailedError('Failed to process refund'));

    expect(response.body).toEqual({ success: false, error: { message: 'Failed to process refund' } });
  });
});
