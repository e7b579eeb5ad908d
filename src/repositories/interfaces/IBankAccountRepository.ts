import { BankAccount } from '@/models';

export interface SealedBankNumbers {
  routingNumberCiphertext: string;
  accountNumberCiphertext: string;
  accountNumberLast4: string;
}

/**
 * Bank Account Repository Interface
 * Stores ciphertexts only; encryption happens in the service
 */
export interface IBankAccountRepository {
  findByUserId(userId: string): Promise<BankAccount | null>;

  findById(bankAccountId: string): Promise<BankAccount | null>;

  /**
   * One account per user: insert, or replace the numbers of the existing one
   */
  upsertForUser(userId: string, numbers: SealedBankNumbers): Promise<BankAccount>;

  deleteById(bankAccountId: string): Promise<void>;
}
