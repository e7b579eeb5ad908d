import { PoolClient } from 'pg';
import { SignupApplication } from '@/models';
import { ApplicationOutcome } from '@/constants/users';

export interface ApplicationReview {
  applicationId: string;
  userId: string;
  outcome: ApplicationOutcome;
  reviewerUserId: string;
}

/**
 * Signup Application Repository Interface
 */
export interface ISignupApplicationRepository {
  /**
   * Newest application of the user that has not been reviewed yet
   */
  findPendingByUserId(userId: string, client?: PoolClient): Promise<SignupApplication | null>;

  /**
   * Stamp reviewed_at/outcome/reviewer and append a review_completed event
   */
  recordReview(review: ApplicationReview, client: PoolClient): Promise<SignupApplication>;
}
