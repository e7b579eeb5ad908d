/**
 * Central export point for all custom errors
 */
export * from './AppError';
export * from './ValidationError';
export * from './UnauthorizedError';
export * from './ForbiddenError';
export * from './NotFoundError';
export * from './BusinessRuleError';
export * from './OperationFailedError';
