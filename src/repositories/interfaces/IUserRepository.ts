import { PoolClient } from 'pg';
import { User, UserListItem, UpdateUserInput, UserEvent } from '@/models';
import {
  UserState,
  UserRole,
  BoardPosition,
  MembershipType,
  UserEventType,
} from '@/constants/users';

export type UserOrderBy = 'email' | 'firstName' | 'lastName' | 'state' | 'insertedAt';
export type OrderDirection = 'asc' | 'desc';

export interface UserListFilters {
  search?: string;
  states?: UserState[];
  roles?: UserRole[];
  boardPositions?: BoardPosition[];
  membershipTypes?: MembershipType[];
  orderBy: UserOrderBy;
  orderDirection: OrderDirection;
  limit: number;
  offset: number;
}

/**
 * Columns a member export may contain
 */
export interface ExportUserRow {
  id: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  phoneNumber: string | null;
  state: UserState;
}

export interface NewUserEvent {
  userId: string;
  updatedByUserId: string;
  type: UserEventType;
  field: string;
  fromValue: string | null;
  toValue: string | null;
}

/**
 * User Repository Interface
 * Defines the contract for user data access operations
 */
export interface IUserRepository {
  /**
   * Page of users matching the filters, plus the total match count
   */
  listUsers(filters: UserListFilters): Promise<{ users: UserListItem[]; totalCount: number }>;

  findUserById(userId: string, client?: PoolClient): Promise<User | null>;

  /**
   * SELECT ... FOR UPDATE inside a transaction; serialises state changes
   */
  lockUserById(userId: string, client: PoolClient): Promise<User | null>;

  /**
   * lifetime, the plan of the newest active subscription, or none
   */
  findMembershipType(userId: string): Promise<MembershipType>;

  updateUser(userId: string, attrs: UpdateUserInput, client?: PoolClient): Promise<User>;

  /**
   * Set state (and optionally date of birth) during an application review
   */
  updateUserState(
    userId: string,
    state: UserState,
    dateOfBirth: string | null,
    client?: PoolClient
  ): Promise<User>;

  insertUserEvent(event: NewUserEvent, client?: PoolClient): Promise<UserEvent>;

  /**
   * Non-deleted users, optionally only those with an active subscription
   */
  countExportableUsers(onlySubscribers: boolean): Promise<number>;

  /**
   * Next batch of exportable users ordered by id, after the given id
   */
  listExportableUsers(
    onlySubscribers: boolean,
    afterId: string | null,
    limit: number
  ): Promise<ExportUserRow[]>;
}
