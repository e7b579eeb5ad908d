import { ulid } from 'ulid';
import { query } from '@/config/database';
import { BankAccount } from '@/models';
import { IBankAccountRepository, SealedBankNumbers } from './interfaces/IBankAccountRepository';

const BANK_ACCOUNT_COLUMNS = `
  id,
  user_id AS "userId",
  routing_number_ciphertext AS "routingNumberCiphertext",
  account_number_ciphertext AS "accountNumberCiphertext",
  account_number_last_4 AS "accountNumberLast4",
  inserted_at AS "insertedAt",
  updated_at AS "updatedAt"
`;

/**
 * Bank Account Repository
 */
export class BankAccountRepository implements IBankAccountRepository {
  async findByUserId(userId: string): Promise<BankAccount | null> {
    const result = await query<BankAccount>(
      `SELECT ${BANK_ACCOUNT_COLUMNS} FROM bank_accounts WHERE user_id = $1`,
      [userId]
    );

    return result.rows[0] ?? null;
  }

  async findById(bankAccountId: string): Promise<BankAccount | null> {
    const result = await query<BankAccount>(
      `SELECT ${BANK_ACCOUNT_COLUMNS} FROM bank_accounts WHERE id = $1`,
      [bankAccountId]
    );

    return result.rows[0] ?? null;
  }

  /**
   * user_id is unique, so saving again replaces the numbers in place
   */
  async upsertForUser(userId: string, numbers: SealedBankNumbers): Promise<BankAccount> {
    const result = await query<BankAccount>(
      `
      INSERT INTO bank_accounts (
        id, user_id, routing_number_ciphertext, account_number_ciphertext,
        account_number_last_4, inserted_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, NOW(), NOW())
      ON CONFLICT (user_id) DO UPDATE
      SET routing_number_ciphertext = EXCLUDED.routing_number_ciphertext,
          account_number_ciphertext = EXCLUDED.account_number_ciphertext,
          account_number_last_4 = EXCLUDED.account_number_last_4,
          updated_at = NOW()
      RETURNING ${BANK_ACCOUNT_COLUMNS}
      `,
      [
        ulid(),
        userId,
        numbers.routingNumberCiphertext,
        numbers.accountNumberCiphertext,
        numbers.accountNumberLast4,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Failed to save bank account');
    }
    return row;
  }

  async deleteById(bankAccountId: string): Promise<void> {
    await query('DELETE FROM bank_accounts WHERE id = $1', [bankAccountId]);
  }
}
