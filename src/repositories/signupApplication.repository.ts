import { PoolClient } from 'pg';
import { ulid } from 'ulid';
import { queryWith } from '@/config/database';
import { SignupApplication } from '@/models';
import {
  ISignupApplicationRepository,
  ApplicationReview,
} from './interfaces/ISignupApplicationRepository';

const APPLICATION_COLUMNS = `
  id,
  user_id AS "userId",
  birth_date::text AS "birthDate",
  membership_type AS "membershipType",
  submitted_at AS "submittedAt",
  reviewed_at AS "reviewedAt",
  review_outcome AS "reviewOutcome",
  reviewed_by_user_id AS "reviewedByUserId"
`;

/**
 * Signup Application Repository
 */
export class SignupApplicationRepository implements ISignupApplicationRepository {
  async findPendingByUserId(
    userId: string,
    client?: PoolClient
  ): Promise<SignupApplication | null> {
    const result = await queryWith<SignupApplication>(
      client,
      `
      SELECT ${APPLICATION_COLUMNS}
      FROM signup_applications
      WHERE user_id = $1 AND reviewed_at IS NULL
      ORDER BY submitted_at DESC NULLS LAST
      LIMIT 1
      `,
      [userId]
    );

    return result.rows[0] ?? null;
  }

  async recordReview(review: ApplicationReview, client: PoolClient): Promise<SignupApplication> {
    const result = await client.query<SignupApplication>(
      `
      UPDATE signup_applications
      SET reviewed_at = NOW(), review_outcome = $2, reviewed_by_user_id = $3
      WHERE id = $1
      RETURNING ${APPLICATION_COLUMNS}
      `,
      [review.applicationId, review.outcome, review.reviewerUserId]
    );

    const application = result.rows[0];
    if (!application) {
      throw new Error(`Signup application ${review.applicationId} disappeared during review`);
    }

    await client.query(
      `
      INSERT INTO signup_application_events
        (id, application_id, user_id, event, review_outcome, reviewer_user_id, inserted_at)
      VALUES ($1, $2, $3, 'review_completed', $4, $5, NOW())
      `,
      [ulid(), review.applicationId, review.userId, review.outcome, review.reviewerUserId]
    );

    return application;
  }
}
