/**
 * Logger Interface
 *
 * Abstraction for logging across different environments and platforms.
 * Application code depends on this interface; LoggerFactory selects the
 * adapter (Console, CloudWatch) from LOGGER_TYPE.
 */

/**
 * Log metadata - structured data attached to log entries
 */
export type LogMetadata = Record<string, unknown>;

/**
 * Logger interface following common logging patterns (pino, winston, etc.)
 */
export interface ILogger {
  /**
   * Debug level - Detailed diagnostic information
   * Example: "Executed SQL query", "Autosave scheduled"
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Info level - Normal operations, business events, audit trails
   * Example: "Refund processed", "User application approved"
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Warn level - Degraded operations, recoverable errors, validation failures
   * Example: "Email delivery failed", "Rate limit exceeded"
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /**
   * Error level - Failed operations requiring attention
   * Example: "Image processing failed", "Transaction rolled back"
   */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /**
   * Fatal level - Critical errors causing application shutdown
   */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

/**
 * Logger Factory Interface
 */
export interface ILoggerFactory {
  /**
   * Create a logger instance
   * @param context - Optional context name (e.g., "LedgerService", "JobQueue")
   */
  createLogger(context?: string): ILogger;
}
