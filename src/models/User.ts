import {
  UserState,
  UserRole,
  BoardPosition,
  MembershipType,
  Country,
  ApplicationOutcome,
  UserEventType,
} from '@/constants/users';

/**
 * User model
 * Matches the 'users' table (snake_case columns aliased to camelCase)
 */
export interface User {
  id: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  phoneNumber: string | null;
  state: UserState;
  role: UserRole;
  boardPosition: BoardPosition | null;
  mostConnectedCountry: Country | null;
  dateOfBirth: string | null; // DATE as YYYY-MM-DD
  lifetimeMembershipAwardedAt: Date | null;
  insertedAt: Date;
  updatedAt: Date;
}

/**
 * Row of the admin user listing
 */
export interface UserListItem extends User {
  membershipType: MembershipType;
}

/**
 * Editable user attributes
 */
export interface UpdateUserInput {
  email?: string;
  firstName?: string;
  lastName?: string;
  phoneNumber?: string | null;
  mostConnectedCountry?: Country | null;
  state?: UserState;
  role?: UserRole;
  boardPosition?: BoardPosition | null;
}

/**
 * Signup application submitted with a pending account
 */
export interface SignupApplication {
  id: string;
  userId: string;
  birthDate: string | null;
  membershipType: string | null;
  submittedAt: Date | null;
  reviewedAt: Date | null;
  reviewOutcome: ApplicationOutcome | null;
  reviewedByUserId: string | null;
}

/**
 * Audit event recorded when an admin changes a user's state or role
 */
export interface UserEvent {
  id: string;
  userId: string;
  updatedByUserId: string;
  type: UserEventType;
  field: string;
  fromValue: string | null;
  toValue: string | null;
  insertedAt: Date;
}

/**
 * Stripe-backed membership subscription
 */
export interface Subscription {
  id: string;
  userId: string;
  stripeId: string;
  stripeStatus: string;
  stripePriceId: string | null;
  planId: string | null;
  currentPeriodStart: Date | null;
  currentPeriodEnd: Date | null;
  endsAt: Date | null;
}

/**
 * User detail for the admin page
 */
export interface UserDetail {
  user: User;
  membershipType: MembershipType;
  activeSubscription: Subscription | null;
  pendingApplication: SignupApplication | null;
}
