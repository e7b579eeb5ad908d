import { z } from 'zod';
import {
  USER_STATES,
  USER_ROLES,
  BOARD_POSITIONS,
  MEMBERSHIP_TYPES,
  COUNTRIES,
  APPLICATION_OUTCOMES,
} from '@/constants/users';
import { commaSeparated, isoDateSchema, pageSchema, pageSizeSchema } from './common';

/**
 * Admin user listing query
 *
 * Every filter is a comma-separated list; deleted users only show up when
 * the state filter asks for them.
 */
export const listUsersQuerySchema = z.object({
  search: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  state: commaSeparated([
    USER_STATES.ACTIVE,
    USER_STATES.PENDING_APPROVAL,
    USER_STATES.REJECTED,
    USER_STATES.SUSPENDED,
    USER_STATES.DELETED,
  ]),
  role: commaSeparated([USER_ROLES.MEMBER, USER_ROLES.ADMIN]),
  boardPosition: commaSeparated([
    BOARD_POSITIONS.PRESIDENT,
    BOARD_POSITIONS.VICE_PRESIDENT,
    BOARD_POSITIONS.SECRETARY,
    BOARD_POSITIONS.TREASURER,
    BOARD_POSITIONS.CLEAR_LAKE_CABIN_MASTER,
    BOARD_POSITIONS.TAHOE_CABIN_MASTER,
    BOARD_POSITIONS.EVENT_DIRECTOR,
    BOARD_POSITIONS.MEMBER_OUTREACH,
    BOARD_POSITIONS.MEMBERSHIP_DIRECTOR,
  ]),
  membershipType: commaSeparated([
    MEMBERSHIP_TYPES.SINGLE,
    MEMBERSHIP_TYPES.FAMILY,
    MEMBERSHIP_TYPES.LIFETIME,
    MEMBERSHIP_TYPES.NONE,
  ]),
  page: pageSchema,
  pageSize: pageSizeSchema,
  orderBy: z.enum(['email', 'firstName', 'lastName', 'state', 'insertedAt']).default('insertedAt'),
  orderDirection: z.enum(['asc', 'desc']).default('desc'),
});

export const updateUserSchema = z
  .object({
    email: z.string().trim().email({ message: 'must have the @ sign and no spaces' }),
    firstName: z.string().trim().min(1, { message: "can't be blank" }).max(100),
    lastName: z.string().trim().min(1, { message: "can't be blank" }).max(100),
    phoneNumber: z.string().trim().max(30).nullable(),
    mostConnectedCountry: z.enum(COUNTRIES).nullable(),
    state: z.enum([
      USER_STATES.ACTIVE,
      USER_STATES.PENDING_APPROVAL,
      USER_STATES.REJECTED,
      USER_STATES.SUSPENDED,
      USER_STATES.DELETED,
    ]),
    role: z.enum([USER_ROLES.MEMBER, USER_ROLES.ADMIN]),
    boardPosition: z
      .enum([
        BOARD_POSITIONS.PRESIDENT,
        BOARD_POSITIONS.VICE_PRESIDENT,
        BOARD_POSITIONS.SECRETARY,
        BOARD_POSITIONS.TREASURER,
        BOARD_POSITIONS.CLEAR_LAKE_CABIN_MASTER,
        BOARD_POSITIONS.TAHOE_CABIN_MASTER,
        BOARD_POSITIONS.EVENT_DIRECTOR,
        BOARD_POSITIONS.MEMBER_OUTREACH,
        BOARD_POSITIONS.MEMBERSHIP_DIRECTOR,
      ])
      .nullable(),
  })
  .partial()
  .strict()
  .refine((attrs) => Object.keys(attrs).length > 0, {
    message: 'Nothing to update',
  });

export const applicationReviewSchema = z.object({
  outcome: z.enum([APPLICATION_OUTCOMES.APPROVED, APPLICATION_OUTCOMES.REJECTED]),
});

/**
 * The membership type itself is checked by the service, which owns the
 * "Please select" / "Invalid membership type selected" messages
 */
export const membershipTypeSchema = z.object({
  membershipType: z.string().default(''),
});

export const membershipPeriodSchema = z.object({
  periodStart: isoDateSchema,
  periodEnd: isoDateSchema,
});

export const userPaymentsQuerySchema = z.object({
  page: pageSchema,
});

export type ListUsersQuery = z.infer<typeof listUsersQuerySchema>;
export type UpdateUserDTO = z.infer<typeof updateUserSchema>;
