/**
 * Repository Interfaces
 * Barrel export for all repository interface contracts
 */

export * from './IUserRepository';
export * from './ISignupApplicationRepository';
export * from './ISubscriptionRepository';
export * from './ILedgerRepository';
export * from './IPostRepository';
export * from './IImageRepository';
export * from './IExpenseReportRepository';
export * from './IBankAccountRepository';
export * from './IAddressRepository';
