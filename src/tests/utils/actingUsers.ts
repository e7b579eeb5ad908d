import { User } from '@/models';
import { IUserRepository } from '@/repositories/interfaces';
import { buildAdmin, buildUser } from './fixtures';

export const MEMBER = buildUser();
export const ADMIN = buildAdmin();
export const TREASURER = buildUser({
  id: '01HTREAS000000000000000001',
  email: 'treasurer@example.org',
  firstName: 'Tove',
  boardPosition: 'treasurer',
});
export const SUSPENDED = buildUser({
  id: '01HSUSP0000000000000000001',
  email: 'suspended@example.org',
  state: 'suspended',
});

/**
 * Let `authenticate` resolve these users from the X-User-Id header
 */
export function registerActingUsers(
  userRepository: jest.Mocked<IUserRepository>,
  users: User[] = [MEMBER, ADMIN, TREASURER, SUSPENDED]
): void {
  userRepository.findUserById.mockImplementation(
    async (userId: string) => users.find((user) => user.id === userId) ?? null
  );
}
