import { permissionsFor, hasPermission, PERMISSIONS } from '@/config/permissions';
import { buildUser, buildAdmin } from '@/tests/utils/fixtures';

describe('permissions', () => {
  it('should give active members their own expense reports and bank account', () => {
    expect([...permissionsFor(buildUser())]).toEqual([
      PERMISSIONS.EXPENSE_REPORT_OWN,
      PERMISSIONS.BANK_ACCOUNT_OWN,
    ]);
  });

  it('should add the admin area for admins', () => {
    const admin = buildAdmin();

    expect(hasPermission(admin, PERMISSIONS.ADMIN_USERS)).toBe(true);
    expect(hasPermission(admin, PERMISSIONS.ADMIN_MONEY)).toBe(true);
    expect(hasPermission(admin, PERMISSIONS.ADMIN_EXPENSES)).toBe(true);
    expect(hasPermission(admin, PERMISSIONS.BANK_ACCOUNT_UNSEAL)).toBe(false);
  });

  it('should let only the treasurer unseal bank accounts', () => {
    expect(hasPermission(buildUser({ boardPosition: 'treasurer' }), PERMISSIONS.BANK_ACCOUNT_UNSEAL)).toBe(true);
    expect(hasPermission(buildUser({ boardPosition: 'president' }), PERMISSIONS.BANK_ACCOUNT_UNSEAL)).toBe(false);
  });

  it('should grant nothing to users who are not active', () => {
    expect(permissionsFor(buildAdmin({ state: 'suspended' })).size).toBe(0);
    expect(permissionsFor(buildUser({ state: 'pending_approval', boardPosition: 'treasurer' })).size).toBe(0);
  });
});
