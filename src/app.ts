import express, { Application, Router } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { env } from '@/config/env';
import { requestLogger } from '@/middlewares/requestLogger';
import { logger } from '@/adapters/logging/LoggerFactory';
import { errorHandler } from '@/middlewares/errorHandler';
import { notFoundHandler } from '@/middlewares/notFound';
import { globalRateLimiter } from '@/middlewares/rateLimiter';
import { metricsMiddleware } from '@/api/middlewares/metricsMiddleware';
import apiRoutes from '@/api/routes';

/**
 * Express Application Setup
 * Middleware order: security headers, body parsing, metrics, rate limit,
 * request log, routes, then the 404 and error handlers
 */

const OPENAPI_PATH = join(__dirname, '../docs/openapi.yaml');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Swagger UI over docs/openapi.yaml; the API still starts without it
 */
function apiDocs(): Router | null {
  try {
    const document = yaml.load(readFileSync(OPENAPI_PATH, 'utf8'));
    if (!isRecord(document)) {
      throw new Error('OpenAPI document is not an object');
    }
    return Router().use(swaggerUi.serve, swaggerUi.setup(document));
  } catch (error) {
    logger.warn({ error, path: OPENAPI_PATH }, 'Could not load OpenAPI documentation');
    return null;
  }
}

const app: Application = express();

// X-Forwarded-For is trusted: the API runs behind the gateway that also sets X-User-Id
app.set('trust proxy', true);

app.use(helmet());

// The admin console is served from the same origin in production
app.use(
  cors({
    origin: env.NODE_ENV === 'production' ? false : '*',
    credentials: false,
  })
);

// Post bodies and expense reports with many items need more than the default
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: true, limit: '100kb' }));

app.use(metricsMiddleware);
app.use(globalRateLimiter);
app.use(requestLogger);

const docs = apiDocs();
if (docs) {
  app.use('/api-docs', docs);
}

app.use('/api', apiRoutes);

app.get('/', (_req, res) => {
  res.json({
    name: 'Member Admin API',
    version: '1.0.0',
    documentation: docs ? '/api-docs' : null,
    endpoints: {
      health: '/api/health',
      metrics: '/api/metrics',
      users: '/api/v1/admin/users',
      exports: '/api/v1/admin/exports',
      money: '/api/v1/admin/money',
      posts: '/api/v1/admin/posts',
      media: '/api/v1/admin/media',
      expenseReview: '/api/v1/admin/expense-reports',
      expenseReports: '/api/v1/expense-reports',
      bankAccounts: '/api/v1/bank-accounts',
    },
  });
});

app.use(notFoundHandler);
app.use(errorHandler);

export default app;
