import { PoolClient } from 'pg';
import { query, queryWith } from '@/config/database';
import { User, UserListItem, UpdateUserInput, UserEvent } from '@/models';
import {
  ACTIVE_SUBSCRIPTION_STATUSES,
  MembershipType,
  UserState,
  USER_STATES,
} from '@/constants/users';
import { NotFoundError } from '@/errors';
import {
  IUserRepository,
  UserListFilters,
  UserOrderBy,
  ExportUserRow,
  NewUserEvent,
} from './interfaces/IUserRepository';
import { ulid } from 'ulid';

const USER_COLUMNS = `
  u.id,
  u.email,
  u.first_name AS "firstName",
  u.last_name AS "lastName",
  u.phone_number AS "phoneNumber",
  u.state,
  u.role,
  u.board_position AS "boardPosition",
  u.most_connected_country AS "mostConnectedCountry",
  u.date_of_birth::text AS "dateOfBirth",
  u.lifetime_membership_awarded_at AS "lifetimeMembershipAwardedAt",
  u.inserted_at AS "insertedAt",
  u.updated_at AS "updatedAt"
`;

/**
 * Derived membership type; $1 must be the active subscription statuses
 */
const MEMBERSHIP_TYPE_SQL = `
  CASE
    WHEN u.lifetime_membership_awarded_at IS NOT NULL THEN 'lifetime'
    ELSE COALESCE(
      (
        SELECT s.plan_id
        FROM subscriptions s
        WHERE s.user_id = u.id AND s.stripe_status = ANY($1::text[])
        ORDER BY s.inserted_at DESC
        LIMIT 1
      ),
      'none'
    )
  END
`;

const ORDER_COLUMNS: Record<UserOrderBy, string> = {
  email: '"email"',
  firstName: '"firstName"',
  lastName: '"lastName"',
  state: '"state"',
  insertedAt: '"insertedAt"',
};

const UPDATABLE_COLUMNS = [
  ['email', 'email'],
  ['firstName', 'first_name'],
  ['lastName', 'last_name'],
  ['phoneNumber', 'phone_number'],
  ['mostConnectedCountry', 'most_connected_country'],
  ['state', 'state'],
  ['role', 'role'],
  ['boardPosition', 'board_position'],
] as const;

const SEARCH_SIMILARITY_THRESHOLD = 0.2;

/**
 * User Repository
 * Handles all database operations for users
 */
export class UserRepository implements IUserRepository {
  /**
   * Filtered, sorted page of users
   *
   * Filters are applied over a derived table so the computed membership type
   * can be filtered like any other column. Deleted users are hidden unless the
   * state filter names them.
   */
  async listUsers(
    filters: UserListFilters
  ): Promise<{ users: UserListItem[]; totalCount: number }> {
    const params: unknown[] = [[...ACTIVE_SUBSCRIPTION_STATUSES]];
    const conditions: string[] = [];

    const addParam = (value: unknown): string => {
      params.push(value);
      return `$${params.length}`;
    };

    if (filters.states && filters.states.length > 0) {
      conditions.push(`"state" = ANY(${addParam(filters.states)}::text[])`);
    } else {
      conditions.push(`"state" <> ${addParam(USER_STATES.DELETED)}`);
    }

    if (filters.roles && filters.roles.length > 0) {
      conditions.push(`"role" = ANY(${addParam(filters.roles)}::text[])`);
    }

    if (filters.boardPositions && filters.boardPositions.length > 0) {
      conditions.push(`"boardPosition" = ANY(${addParam(filters.boardPositions)}::text[])`);
    }

    if (filters.membershipTypes && filters.membershipTypes.length > 0) {
      conditions.push(`"membershipType" = ANY(${addParam(filters.membershipTypes)}::text[])`);
    }

    if (filters.search) {
      const term = addParam(filters.search);
      const phonePattern = addParam(`%${filters.search}%`);
      conditions.push(`(
        similarity("email", ${term}) > ${SEARCH_SIMILARITY_THRESHOLD}
        OR similarity(COALESCE("firstName", ''), ${term}) > ${SEARCH_SIMILARITY_THRESHOLD}
        OR similarity(COALESCE("lastName", ''), ${term}) > ${SEARCH_SIMILARITY_THRESHOLD}
        OR "phoneNumber" ILIKE ${phonePattern}
      )`);
    }

    const listed = `
      WITH listed AS (
        SELECT ${USER_COLUMNS}, ${MEMBERSHIP_TYPE_SQL} AS "membershipType"
        FROM users u
      )
    `;
    const where = `WHERE ${conditions.join(' AND ')}`;

    const countResult = await query<{ count: number }>(
      `${listed} SELECT COUNT(*)::int AS count FROM listed ${where}`,
      params
    );

    const direction = filters.orderDirection === 'asc' ? 'ASC' : 'DESC';
    const limitParam = addParam(filters.limit);
    const offsetParam = addParam(filters.offset);

    const result = await query<UserListItem>(
      `
      ${listed}
      SELECT * FROM listed
      ${where}
      ORDER BY ${ORDER_COLUMNS[filters.orderBy]} ${direction}, "id" ${direction}
      LIMIT ${limitParam} OFFSET ${offsetParam}
      `,
      params
    );

    return {
      users: result.rows,
      totalCount: countResult.rows[0]?.count ?? 0,
    };
  }

  /**
   * Find user by ID
   */
  async findUserById(userId: string, client?: PoolClient): Promise<User | null> {
    const result = await queryWith<User>(
      client,
      `SELECT ${USER_COLUMNS} FROM users u WHERE u.id = $1`,
      [userId]
    );

    return result.rows[0] ?? null;
  }

  /**
   * Row-locked read; the lock holds until the surrounding transaction ends
   */
  async lockUserById(userId: string, client: PoolClient): Promise<User | null> {
    const result = await queryWith<User>(
      client,
      `SELECT ${USER_COLUMNS} FROM users u WHERE u.id = $1 FOR UPDATE`,
      [userId]
    );

    return result.rows[0] ?? null;
  }

  async findMembershipType(userId: string): Promise<MembershipType> {
    const result = await query<{ membershipType: MembershipType }>(
      `SELECT ${MEMBERSHIP_TYPE_SQL} AS "membershipType" FROM users u WHERE u.id = $2`,
      [[...ACTIVE_SUBSCRIPTION_STATUSES], userId]
    );

    return result.rows[0]?.membershipType ?? 'none';
  }

  async updateUser(userId: string, attrs: UpdateUserInput, client?: PoolClient): Promise<User> {
    const params: unknown[] = [userId];
    const assignments: string[] = ['updated_at = NOW()'];

    for (const [key, column] of UPDATABLE_COLUMNS) {
      const value = attrs[key];
      if (value !== undefined) {
        params.push(value);
        assignments.push(`${column} = $${params.length}`);
      }
    }

    const result = await queryWith<User>(
      client,
      `UPDATE users u SET ${assignments.join(', ')} WHERE u.id = $1 RETURNING ${USER_COLUMNS}`,
      params
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('User not found');
    }
    return row;
  }

  async updateUserState(
    userId: string,
    state: UserState,
    dateOfBirth: string | null,
    client?: PoolClient
  ): Promise<User> {
    const result = await queryWith<User>(
      client,
      `
      UPDATE users u
      SET state = $2,
          date_of_birth = COALESCE($3::date, u.date_of_birth),
          updated_at = NOW()
      WHERE u.id = $1
      RETURNING ${USER_COLUMNS}
      `,
      [userId, state, dateOfBirth]
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('User not found');
    }
    return row;
  }

  async insertUserEvent(event: NewUserEvent, client?: PoolClient): Promise<UserEvent> {
    const result = await queryWith<UserEvent>(
      client,
      `
      INSERT INTO user_events (id, user_id, updated_by_user_id, type, field, from_value, to_value, inserted_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7, NOW())
      RETURNING
        id,
        user_id AS "userId",
        updated_by_user_id AS "updatedByUserId",
        type,
        field,
        from_value AS "fromValue",
        to_value AS "toValue",
        inserted_at AS "insertedAt"
      `,
      [
        ulid(),
        event.userId,
        event.updatedByUserId,
        event.type,
        event.field,
        event.fromValue,
        event.toValue,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Failed to insert user event');
    }
    return row;
  }

  async countExportableUsers(onlySubscribers: boolean): Promise<number> {
    const result = await query<{ count: number }>(
      `
      SELECT COUNT(*)::int AS count
      FROM users u
      WHERE u.state <> 'deleted'
        AND (
          $1::boolean = false
          OR EXISTS (
            SELECT 1 FROM subscriptions s
            WHERE s.user_id = u.id AND s.stripe_status = ANY($2::text[])
          )
        )
      `,
      [onlySubscribers, [...ACTIVE_SUBSCRIPTION_STATUSES]]
    );

    return result.rows[0]?.count ?? 0;
  }

  async listExportableUsers(
    onlySubscribers: boolean,
    afterId: string | null,
    limit: number
  ): Promise<ExportUserRow[]> {
    const result = await query<ExportUserRow>(
      `
      SELECT
        u.id,
        u.email,
        u.first_name AS "firstName",
        u.last_name AS "lastName",
        u.phone_number AS "phoneNumber",
        u.state
      FROM users u
      WHERE u.state <> 'deleted'
        AND (
          $1::boolean = false
          OR EXISTS (
            SELECT 1 FROM subscriptions s
            WHERE s.user_id = u.id AND s.stripe_status = ANY($2::text[])
          )
        )
        AND ($3::text IS NULL OR u.id > $3)
      ORDER BY u.id
      LIMIT $4
      `,
      [onlySubscribers, [...ACTIVE_SUBSCRIPTION_STATUSES], afterId, limit]
    );

    return result.rows;
  }
}
