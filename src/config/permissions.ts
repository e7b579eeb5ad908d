import { User } from '@/models';
import { USER_ROLES, USER_STATES, BOARD_POSITIONS } from '@/constants/users';

/**
 * Permissions checked by the `authorize` middleware
 */
export const PERMISSIONS = {
  ADMIN_USERS: 'admin:users',
  ADMIN_MONEY: 'admin:money',
  ADMIN_POSTS: 'admin:posts',
  ADMIN_MEDIA: 'admin:media',
  ADMIN_EXPENSES: 'admin:expenses',
  EXPENSE_REPORT_OWN: 'expense_report:own',
  BANK_ACCOUNT_OWN: 'bank_account:own',
  BANK_ACCOUNT_UNSEAL: 'bank_account:unseal',
} as const;

export type Permission = (typeof PERMISSIONS)[keyof typeof PERMISSIONS];

const MEMBER_PERMISSIONS: readonly Permission[] = [
  PERMISSIONS.EXPENSE_REPORT_OWN,
  PERMISSIONS.BANK_ACCOUNT_OWN,
];

const ADMIN_PERMISSIONS: readonly Permission[] = [
  PERMISSIONS.ADMIN_USERS,
  PERMISSIONS.ADMIN_MONEY,
  PERMISSIONS.ADMIN_POSTS,
  PERMISSIONS.ADMIN_MEDIA,
  PERMISSIONS.ADMIN_EXPENSES,
];

const BOARD_POSITION_PERMISSIONS: Partial<Record<string, readonly Permission[]>> = {
  [BOARD_POSITIONS.TREASURER]: [PERMISSIONS.BANK_ACCOUNT_UNSEAL],
};

/**
 * Everything a user may do: member permissions for active users, plus their
 * role's and board position's grants
 */
export function permissionsFor(user: Pick<User, 'state' | 'role' | 'boardPosition'>): Set<Permission> {
  const permissions = new Set<Permission>();
  if (user.state !== USER_STATES.ACTIVE) {
    return permissions;
  }

  MEMBER_PERMISSIONS.forEach((permission) => permissions.add(permission));

  if (user.role === USER_ROLES.ADMIN) {
    ADMIN_PERMISSIONS.forEach((permission) => permissions.add(permission));
  }

  if (user.boardPosition) {
    BOARD_POSITION_PERMISSIONS[user.boardPosition]?.forEach((permission) =>
      permissions.add(permission)
    );
  }

  return permissions;
}

export function hasPermission(
  user: Pick<User, 'state' | 'role' | 'boardPosition'>,
  permission: Permission
): boolean {
  return permissionsFor(user).has(permission);
}
