/**
 * PostgreSQL error helpers
 * https://www.postgresql.org/docs/current/errcodes-appendix.html
 */

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (!(error instanceof Error) || !('code' in error) || error.code !== UNIQUE_VIOLATION) {
    return false;
  }
  if (!constraint) {
    return true;
  }
  return 'constraint' in error && error.constraint === constraint;
}
