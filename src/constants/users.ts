/**
 * User account states
 */
export const USER_STATES = {
  ACTIVE: 'active',
  PENDING_APPROVAL: 'pending_approval',
  REJECTED: 'rejected',
  SUSPENDED: 'suspended',
  DELETED: 'deleted',
} as const;

/**
 * User roles
 */
export const USER_ROLES = {
  MEMBER: 'member',
  ADMIN: 'admin',
} as const;

/**
 * Board positions an active member can hold
 */
export const BOARD_POSITIONS = {
  PRESIDENT: 'president',
  VICE_PRESIDENT: 'vice_president',
  SECRETARY: 'secretary',
  TREASURER: 'treasurer',
  CLEAR_LAKE_CABIN_MASTER: 'clear_lake_cabin_master',
  TAHOE_CABIN_MASTER: 'tahoe_cabin_master',
  EVENT_DIRECTOR: 'event_director',
  MEMBER_OUTREACH: 'member_outreach',
  MEMBERSHIP_DIRECTOR: 'membership_director',
} as const;

/**
 * Membership type as shown in listings (derived, not stored)
 */
export const MEMBERSHIP_TYPES = {
  SINGLE: 'single',
  FAMILY: 'family',
  LIFETIME: 'lifetime',
  NONE: 'none',
} as const;

export const COUNTRIES = ['Sweden', 'Norway', 'Finland', 'Denmark', 'Iceland'] as const;

/**
 * Subscription statuses that count as an active membership
 */
export const ACTIVE_SUBSCRIPTION_STATUSES = ['active', 'trialing', 'past_due'] as const;

export const APPLICATION_OUTCOMES = {
  APPROVED: 'approved',
  REJECTED: 'rejected',
} as const;

export const USER_EVENT_TYPES = {
  STATE_UPDATE: 'state_update',
  ROLE_UPDATE: 'role_update',
} as const;

// Type exports
export type UserState = (typeof USER_STATES)[keyof typeof USER_STATES];
export type UserRole = (typeof USER_ROLES)[keyof typeof USER_ROLES];
export type BoardPosition = (typeof BOARD_POSITIONS)[keyof typeof BOARD_POSITIONS];
export type MembershipType = (typeof MEMBERSHIP_TYPES)[keyof typeof MEMBERSHIP_TYPES];
export type Country = (typeof COUNTRIES)[number];
export type ApplicationOutcome = (typeof APPLICATION_OUTCOMES)[keyof typeof APPLICATION_OUTCOMES];
export type UserEventType = (typeof USER_EVENT_TYPES)[keyof typeof USER_EVENT_TYPES];

export const USER_STATE_VALUES = Object.values(USER_STATES);
export const USER_ROLE_VALUES = Object.values(USER_ROLES);
export const BOARD_POSITION_VALUES = Object.values(BOARD_POSITIONS);
export const MEMBERSHIP_TYPE_VALUES = Object.values(MEMBERSHIP_TYPES);
