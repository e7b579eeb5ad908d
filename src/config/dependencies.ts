/**
 * Dependency Container
 * Instantiates and wires all repositories, adapters and services
 *
 * This is the single source of truth for dependency injection.
 * All concrete implementations are created here and injected into services.
 */

import { env } from '@/config/env';

// Repository implementations
import { UserRepository } from '@/repositories/user.repository';
import { SignupApplicationRepository } from '@/repositories/signupApplication.repository';
import { SubscriptionRepository } from '@/repositories/subscription.repository';
import { LedgerRepository } from '@/repositories/ledger.repository';
import { PostRepository } from '@/repositories/post.repository';
import { ImageRepository } from '@/repositories/image.repository';
import { ExpenseReportRepository } from '@/repositories/expenseReport.repository';
import { BankAccountRepository } from '@/repositories/bankAccount.repository';
import { AddressRepository } from '@/repositories/address.repository';

// Adapters
import { S3ObjectStorage, createS3Client } from '@/adapters/storage/S3ObjectStorage';
import { StripePaymentProcessor } from '@/adapters/payments/StripePaymentProcessor';
import { SharpImageProcessor } from '@/adapters/images/SharpImageProcessor';
import { createNotifier } from '@/adapters/notifications/NotifierFactory';
import { FieldEncryptor } from '@/utils/encryption';
import { EventBus } from '@/events/EventBus';
import { JobQueue } from '@/jobs/JobQueue';
import { AppJobs } from '@/jobs/jobs';

// Service implementations
import { NotificationService } from '@/services/notification.service';
import { UserService } from '@/services/user.service';
import { MembershipService } from '@/services/membership.service';
import { UserExportService } from '@/services/userExport.service';
import { LedgerService } from '@/services/ledger.service';
import { PostService } from '@/services/post.service';
import { MediaService } from '@/services/media.service';
import { ImageProcessingService } from '@/services/imageProcessing.service';
import { ExpenseReportService } from '@/services/expenseReport.service';
import { BankAccountService } from '@/services/bankAccount.service';

// ============================================================================
// REPOSITORIES
// ============================================================================

export const userRepository = new UserRepository();
export const signupApplicationRepository = new SignupApplicationRepository();
export const subscriptionRepository = new SubscriptionRepository();
export const ledgerRepository = new LedgerRepository();
export const postRepository = new PostRepository();
export const imageRepository = new ImageRepository();
export const expenseReportRepository = new ExpenseReportRepository();
export const bankAccountRepository = new BankAccountRepository();
export const addressRepository = new AddressRepository();

// ============================================================================
// ADAPTERS & INFRASTRUCTURE
// ============================================================================

const s3Client = createS3Client();

/** Gallery images: raw uploads and their renditions */
export const mediaStorage = new S3ObjectStorage(s3Client, env.S3_MEDIA_BUCKET);

/** Expense receipts and proofs of income */
export const expenseStorage = new S3ObjectStorage(s3Client, env.S3_EXPENSE_BUCKET);

export const paymentProcessor = new StripePaymentProcessor(env.STRIPE_SECRET_KEY);
export const imageProcessor = new SharpImageProcessor();
export const notifier = createNotifier();
export const fieldEncryptor = new FieldEncryptor(env.ENCRYPTION_KEY);

export const eventBus = new EventBus();
export const jobQueue = new JobQueue<AppJobs>();

// ============================================================================
// SERVICES
// ============================================================================

export const notificationService = new NotificationService(notifier);

/**
 * User Service
 * Member listing, edits, application review and payment history
 */
export const userService = new UserService(
  userRepository,
  signupApplicationRepository,
  subscriptionRepository,
  ledgerRepository,
  notificationService
);

/**
 * Membership Service
 * Plan switches through Stripe and manual period edits
 */
export const membershipService = new MembershipService(
  userRepository,
  subscriptionRepository,
  paymentProcessor,
  notificationService
);

export const userExportService = new UserExportService(userRepository, jobQueue, eventBus);

/**
 * Ledger Service
 * Double-entry bookkeeping for payments, payouts, refunds and credits
 */
export const ledgerService = new LedgerService(ledgerRepository, userRepository);

export const postService = new PostService(postRepository, eventBus);

export const mediaService = new MediaService(imageRepository, mediaStorage, jobQueue);

export const imageProcessingService = new ImageProcessingService(
  imageRepository,
  mediaStorage,
  imageProcessor
);

export const bankAccountService = new BankAccountService(
  bankAccountRepository,
  expenseReportRepository,
  fieldEncryptor
);

export const expenseReportService = new ExpenseReportService(
  expenseReportRepository,
  bankAccountRepository,
  addressRepository,
  userRepository,
  expenseStorage,
  notificationService
);

// ============================================================================
// BACKGROUND JOBS
// ============================================================================

jobQueue
  .register('user_export', (job) => userExportService.runExport(job))
  .register('image_processing', (job) => imageProcessingService.processImage(job));
