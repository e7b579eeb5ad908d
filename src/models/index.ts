/**
 * Central export point for all models
 * Allows clean imports: import { Post, User } from '@/models'
 */

export * from './User';
export * from './Pagination';
export * from './Ledger';
export * from './Post';
export * from './Image';
export * from './ExpenseReport';
