/**
 * Business Rules Configuration
 *
 * Centralized configuration for all business rules and limits.
 * These values can be adjusted without touching validation schemas or service logic.
 */

/**
 * Search & Pagination Limits
 */
export const PAGINATION_LIMITS = {
  /** Default page size for admin listings (users, posts, payments) */
  DEFAULT_PAGE_SIZE: 20,

  /** Maximum page size a client may request */
  MAX_PAGE_SIZE: 100,

  /** Page size of a member's payment history */
  USER_PAYMENTS_PAGE_SIZE: 20,

  /** Recent payments shown on the money dashboard */
  RECENT_PAYMENTS_LIMIT: 50,
  MAX_RECENT_PAYMENTS_LIMIT: 200,

  /** Default window of the money dashboard when no dates are given */
  RECENT_PAYMENTS_DEFAULT_DAYS: 30,

  /** Media gallery page size (also the infinite-scroll batch) */
  MEDIA_PAGE_SIZE: 20,
  MAX_MEDIA_PAGE_SIZE: 100,
} as const;

/**
 * Ledger input limits
 */
export const LEDGER_LIMITS = {
  /** Maximum length of a refund or credit reason */
  MAX_REASON_LENGTH: 1000,

  /** Largest single refund, credit or payment accepted (USD) */
  MAX_AMOUNT: 1_000_000,
} as const;

/**
 * Post editor
 */
export const POST_RULES = {
  /** Idle time after the last edit before an autosave is persisted */
  AUTOSAVE_DEBOUNCE_MS: 2_000,

  MAX_TITLE_LENGTH: 200,
  MAX_PREVIEW_TEXT_LENGTH: 500,

  /** URL name used when a title slugs to nothing */
  UNTITLED_URL_NAME: 'new-untitled-post',

  /** Suffixes tried when a url name collides on create */
  MAX_URL_NAME_ATTEMPTS: 5,
} as const;

/**
 * Media uploads and processing
 */
export const MEDIA_RULES = {
  MAX_UPLOAD_ENTRIES: 10,
  MAX_FILE_SIZE_BYTES: 10_000_000,
  ACCEPTED_EXTENSIONS: ['.jpg', '.jpeg', '.png', '.gif', '.webp'],
  PRESIGN_EXPIRY_SECONDS: 3_600,

  OPTIMIZED_MAX_WIDTH: 2_000,
  OPTIMIZED_QUALITY: 80,
  THUMBNAIL_WIDTH: 500,

  BLURHASH_COMPONENTS_X: 4,
  BLURHASH_COMPONENTS_Y: 3,
  BLURHASH_SAMPLE_WIDTH: 32,

  PROCESSING_MAX_ATTEMPTS: 3,
} as const;

/**
 * Member CSV export
 */
export const EXPORT_RULES = {
  /** Rows fetched per query while streaming the CSV */
  BATCH_SIZE: 100,

  /** Job is failed when no progress is published for this long */
  PROGRESS_TIMEOUT_MS: 30_000,

  FILE_PREFIX: 'member-export',
} as const;

/**
 * Expense reports and receipts
 */
export const EXPENSE_RULES = {
  MAX_PURPOSE_LENGTH: 500,
  MAX_ITEMS: 100,
  MAX_RECEIPT_SIZE_BYTES: 10_000_000,
  ACCEPTED_RECEIPT_TYPES: [
    'application/pdf',
    'image/jpeg',
    'image/png',
    'image/heic',
    'image/webp',
  ],
} as const;

/**
 * Background job queue
 */
export const JOB_QUEUE_CONFIG = {
  /** Jobs running at the same time */
  CONCURRENCY: 2,

  /** Default attempts before a job is marked failed */
  DEFAULT_MAX_ATTEMPTS: 1,

  /** Base of the exponential retry backoff (2^attempts * base) */
  BACKOFF_BASE_MS: 1_000,

  /** Finished jobs kept in memory for status polling */
  MAX_FINISHED_JOBS: 500,
} as const;

/**
 * In-process pub/sub
 */
export const EVENT_BUS_CONFIG = {
  /** Topics whose latest event is kept for late subscribers */
  MAX_RETAINED_TOPICS: 1_000,
} as const;

/**
 * Rate Limiting Configuration
 *
 * Protects API from abuse and ensures fair usage:
 * - Global limits apply to all endpoints except /health
 * - Stricter limits for money mutations and uploads
 */
export const RATE_LIMITS = {
  GLOBAL: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 300,
  },

  /**
   * Refunds, credits, payouts
   * Rationale: a human operator never needs more than a handful per minute
   */
  MONEY_MUTATIONS: {
    WINDOW_MS: 60_000,
    MAX_REQUESTS: 20,
  },

  /** Presign and receipt upload requests */
  UPLOADS: {
    WINDOW_MS: 60_000,
    MAX_REQUESTS: 30,
  },
} as const;

/**
 * Database Query Configuration
 */
export const DB_QUERY_LIMITS = {
  /**
   * Global statement timeout (10 seconds)
   * Rationale: Most queries should complete in <100ms, 10s catches runaways
   */
  STATEMENT_TIMEOUT_MS: 10_000,

  /** Queries slower than this are logged at warn level */
  SLOW_QUERY_THRESHOLD_MS: 1_000,
} as const;

/**
 * Type exports for TypeScript safety
 */
export type PaginationLimits = typeof PAGINATION_LIMITS;
export type RateLimits = typeof RATE_LIMITS;
export type DBQueryLimits = typeof DB_QUERY_LIMITS;
