import { PoolClient } from 'pg';
import { ulid } from 'ulid';
import { query, queryWith } from '@/config/database';
import {
  AccountBalance,
  Payment,
  PaymentWithUser,
  LedgerTransaction,
  LedgerEntryWithAccount,
  NewLedgerEntry,
} from '@/models';
import { PaymentStatus, TRANSACTION_TYPES } from '@/constants/ledger';
import {
  ILedgerRepository,
  LedgerAccountSeed,
  DateRange,
  NewPayment,
  NewLedgerTransaction,
} from './interfaces/ILedgerRepository';

const PAYMENT_COLUMNS = `
  p.id,
  p.external_provider AS "externalProvider",
  p.external_payment_id AS "externalPaymentId",
  p.user_id AS "userId",
  p.amount,
  p.status,
  p.payment_date AS "paymentDate",
  p.entity_type AS "entityType",
  p.entity_id AS "entityId",
  p.property
`;

/**
 * Ledger Repository
 * Handles all database operations for the double-entry ledger
 */
export class LedgerRepository implements ILedgerRepository {
  async ensureAccounts(accounts: readonly LedgerAccountSeed[]): Promise<number> {
    let created = 0;

    for (const account of accounts) {
      const result = await query(
        `
        INSERT INTO ledger_accounts (id, name, account_type, description, normal_balance)
        VALUES ($1, $2, $3, $4, $5)
        ON CONFLICT (name) DO NOTHING
        `,
        [
          ulid(),
          account.name,
          account.accountType,
          account.description,
          // assets and expenses grow with debits, the rest with credits
          account.accountType === 'asset' || account.accountType === 'expense' ? 'debit' : 'credit',
        ]
      );
      created += result.rowCount ?? 0;
    }

    return created;
  }

  /**
   * Balance = plain sum of the account's signed entries
   */
  async getAccountBalances(range?: DateRange): Promise<AccountBalance[]> {
    const filter = range ? 'FILTER (WHERE p.payment_date >= $1 AND p.payment_date < $2)' : '';

    const result = await query<AccountBalance>(
      `
      SELECT
        a.id,
        a.name,
        a.account_type AS "accountType",
        a.description,
        COALESCE(SUM(e.amount) ${filter}, 0)::numeric(14, 2)::text AS balance
      FROM ledger_accounts a
      LEFT JOIN ledger_entries e ON e.account_id = a.id
      LEFT JOIN payments p ON p.id = e.payment_id
      GROUP BY a.id
      ORDER BY a.account_type, a.name
      `,
      range ? [range.start, range.end] : []
    );

    return result.rows;
  }

  async listPayments(range: DateRange, limit: number): Promise<PaymentWithUser[]> {
    const result = await query<PaymentWithUser>(
      `
      SELECT
        ${PAYMENT_COLUMNS},
        u.email AS "userEmail",
        u.first_name AS "userFirstName",
        u.last_name AS "userLastName"
      FROM payments p
      LEFT JOIN users u ON u.id = p.user_id
      WHERE p.payment_date >= $1 AND p.payment_date < $2
      ORDER BY p.payment_date DESC, p.id DESC
      LIMIT $3
      `,
      [range.start, range.end, limit]
    );

    return result.rows;
  }

  async listPaymentsForUser(
    userId: string,
    limit: number,
    offset: number
  ): Promise<{ payments: Payment[]; totalCount: number }> {
    const countResult = await query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM payments WHERE user_id = $1',
      [userId]
    );

    const result = await query<Payment>(
      `
      SELECT ${PAYMENT_COLUMNS}
      FROM payments p
      WHERE p.user_id = $1
      ORDER BY p.payment_date DESC, p.id DESC
      LIMIT $2 OFFSET $3
      `,
      [userId, limit, offset]
    );

    return {
      payments: result.rows,
      totalCount: countResult.rows[0]?.count ?? 0,
    };
  }

  async findPaymentById(paymentId: string, client?: PoolClient): Promise<Payment | null> {
    const result = await queryWith<Payment>(
      client,
      `SELECT ${PAYMENT_COLUMNS} FROM payments p WHERE p.id = $1`,
      [paymentId]
    );

    return result.rows[0] ?? null;
  }

  async lockPayment(paymentId: string, client: PoolClient): Promise<Payment | null> {
    const result = await client.query<Payment>(
      `SELECT ${PAYMENT_COLUMNS} FROM payments p WHERE p.id = $1 FOR UPDATE`,
      [paymentId]
    );

    return result.rows[0] ?? null;
  }

  async findPaymentByExternalId(
    externalPaymentId: string,
    client?: PoolClient
  ): Promise<Payment | null> {
    const result = await queryWith<Payment>(
      client,
      `SELECT ${PAYMENT_COLUMNS} FROM payments p WHERE p.external_payment_id = $1`,
      [externalPaymentId]
    );

    return result.rows[0] ?? null;
  }

  async createPayment(payment: NewPayment, client: PoolClient): Promise<Payment> {
    const result = await client.query<Payment>(
      `
      INSERT INTO payments AS p (
        id, external_provider, external_payment_id, user_id, amount,
        status, payment_date, entity_type, entity_id, property
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      RETURNING ${PAYMENT_COLUMNS}
      `,
      [
        ulid(),
        payment.externalProvider,
        payment.externalPaymentId,
        payment.userId,
        payment.amount,
        payment.status,
        payment.paymentDate,
        payment.entityType,
        payment.entityId,
        payment.property,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Failed to insert payment');
    }
    return row;
  }

  async updatePaymentStatus(
    paymentId: string,
    status: PaymentStatus,
    client: PoolClient
  ): Promise<void> {
    await client.query('UPDATE payments SET status = $2 WHERE id = $1', [paymentId, status]);
  }

  async createTransaction(
    tx: NewLedgerTransaction,
    client: PoolClient
  ): Promise<LedgerTransaction> {
    const result = await client.query<LedgerTransaction>(
      `
      INSERT INTO ledger_transactions (id, type, payment_id, total_amount, status, reason, inserted_at)
      VALUES ($1, $2, $3, $4, $5, $6, NOW())
      RETURNING
        id,
        type,
        payment_id AS "paymentId",
        total_amount AS "totalAmount",
        status,
        reason,
        inserted_at AS "insertedAt"
      `,
      [ulid(), tx.type, tx.paymentId, tx.totalAmount, tx.status, tx.reason]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Failed to insert ledger transaction');
    }
    return row;
  }

  async insertEntries(
    transactionId: string,
    paymentId: string,
    entries: readonly NewLedgerEntry[],
    client: PoolClient
  ): Promise<void> {
    for (const entry of entries) {
      const result = await client.query(
        `
        INSERT INTO ledger_entries (
          id, account_id, payment_id, transaction_id, amount,
          description, related_entity_type, related_entity_id, inserted_at
        )
        SELECT $1, a.id, $2, $3, $4, $5, $6, $7, NOW()
        FROM ledger_accounts a
        WHERE a.name = $8
        `,
        [
          ulid(),
          paymentId,
          transactionId,
          entry.amount,
          entry.description,
          entry.relatedEntityType,
          entry.relatedEntityId,
          entry.accountName,
        ]
      );

      if (result.rowCount !== 1) {
        throw new Error(`Ledger account ${entry.accountName} does not exist`);
      }
    }
  }

  async listEntriesForPayment(
    paymentId: string,
    client?: PoolClient
  ): Promise<LedgerEntryWithAccount[]> {
    const result = await queryWith<LedgerEntryWithAccount>(
      client,
      `
      SELECT
        e.id,
        e.account_id AS "accountId",
        e.payment_id AS "paymentId",
        e.transaction_id AS "transactionId",
        e.amount,
        e.description,
        e.related_entity_type AS "relatedEntityType",
        e.related_entity_id AS "relatedEntityId",
        e.inserted_at AS "insertedAt",
        a.name AS "accountName",
        a.account_type AS "accountType"
      FROM ledger_entries e
      JOIN ledger_accounts a ON a.id = e.account_id
      WHERE e.payment_id = $1
      ORDER BY e.inserted_at ASC, e.id ASC
      `,
      [paymentId]
    );

    return result.rows;
  }

  async sumRefunds(paymentId: string, client: PoolClient): Promise<string> {
    const result = await client.query<{ total: string }>(
      `
      SELECT COALESCE(SUM(total_amount), 0)::numeric(14, 2)::text AS total
      FROM ledger_transactions
      WHERE payment_id = $1 AND type = $2 AND status = 'completed'
      `,
      [paymentId, TRANSACTION_TYPES.REFUND]
    );

    return result.rows[0]?.total ?? '0.00';
  }
}
