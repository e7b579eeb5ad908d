import { cleanEnv, str, num, bool, url } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety:
 * - Validates types (string, number, boolean)
 * - Enforces choices for enums
 * - Provides defaults for development/test
 * - Fails fast on startup if required vars are missing
 *
 * Optional integrations (Stripe, Resend) are switched off when their key is
 * empty: the container wires a log-only or unavailable adapter instead.
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Server Configuration
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects logging, error handling, CORS)',
  }),
  PORT: num({
    default: 3000,
    desc: 'HTTP server port',
  }),
  PUBLIC_URL: url({
    default: 'http://localhost:3000',
    desc: 'Public base URL, used to build export download links',
  }),

  // ==========================================
  // Database Configuration
  // ==========================================
  DB_HOST: str({
    default: 'localhost',
    desc: 'PostgreSQL host',
  }),
  DB_PORT: num({
    default: 5432,
    desc: 'PostgreSQL port',
  }),
  DB_NAME: str({
    default: 'member_admin',
    desc: 'PostgreSQL database name',
  }),
  DB_USER: str({
    default: 'postgres',
    desc: 'PostgreSQL username',
  }),
  DB_PASSWORD: str({
    default: 'postgres', // Only for dev - production MUST set this explicitly
    desc: 'PostgreSQL password (REQUIRED in production)',
  }),
  DB_MAX_CONNECTIONS: num({
    default: 20,
    desc: 'Maximum database connection pool size',
  }),
  DB_SSL: bool({
    default: false,
    desc: 'Connect to PostgreSQL over TLS (managed databases)',
  }),

  // ==========================================
  // Logging Configuration
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: true,
    desc: 'Pretty-print logs (false for production JSON logs)',
  }),
  LOGGER_TYPE: str({
    choices: ['console', 'cloudwatch'],
    default: 'console',
    desc: 'Logger adapter selected by LoggerFactory',
  }),

  // ==========================================
  // Metrics Configuration
  // ==========================================
  METRICS_TYPE: str({
    choices: ['noop', 'cloudwatch'],
    default: 'noop',
    desc: 'Business metrics adapter selected by MetricsFactory',
  }),
  CLOUDWATCH_METRICS_NAMESPACE: str({
    default: 'MemberAdmin',
    desc: 'CloudWatch Metrics namespace',
  }),

  // ==========================================
  // AWS Configuration
  // ==========================================
  AWS_REGION: str({
    default: 'us-west-1',
    desc: 'AWS region for S3 and log metadata',
  }),
  S3_MEDIA_BUCKET: str({
    default: 'media',
    desc: 'Bucket holding gallery images (raw, optimized, thumbnails)',
  }),
  S3_EXPENSE_BUCKET: str({
    default: 'expense-reports',
    desc: 'Bucket holding expense receipts and proofs of income',
  }),
  S3_ENDPOINT: str({
    default: '',
    desc: 'Custom S3 endpoint (MinIO, localstack); empty uses AWS',
  }),

  // ==========================================
  // Payments (Stripe)
  // ==========================================
  STRIPE_SECRET_KEY: str({
    default: '',
    desc: 'Stripe secret key; membership plan changes are unavailable when empty',
  }),
  STRIPE_SINGLE_PRICE_ID: str({
    default: 'price_single',
    desc: 'Stripe price ID of the single membership plan',
  }),
  STRIPE_FAMILY_PRICE_ID: str({
    default: 'price_family',
    desc: 'Stripe price ID of the family membership plan',
  }),

  // ==========================================
  // Email (Resend)
  // ==========================================
  RESEND_API_KEY: str({
    default: '',
    desc: 'Resend API key; emails are only logged when empty',
  }),
  EMAIL_FROM: str({
    default: 'Member Admin <noreply@example.org>',
    desc: 'Sender address for notification emails',
  }),

  // ==========================================
  // Secrets & Files
  // ==========================================
  ENCRYPTION_KEY: str({
    default: 'MDEyMzQ1Njc4OWFiY2RlZjAxMjM0NTY3ODlhYmNkZWY=', // Only for dev
    desc: 'Base64-encoded 32-byte key for bank account encryption (REQUIRED in production)',
  }),
  EXPORT_DIR: str({
    default: './tmp/exports',
    desc: 'Directory where member CSV exports are written',
  }),
});

export type Env = typeof env;
