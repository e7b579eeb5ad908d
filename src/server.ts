import { Server } from 'http';
import app from './app';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { testConnection, closePool } from '@/config/database';
import { jobQueue, ledgerService, postService } from '@/config/dependencies';

/**
 * Server Entry Point
 * Starts the Express server and handles graceful shutdown
 */

let server: Server;

/**
 * Start the server
 */
async function startServer(): Promise<void> {
  try {
    // Test database connection
    logger.info('Testing database connection...');
    const dbConnected = await testConnection();

    if (!dbConnected) {
      logger.error('Failed to connect to database. Exiting...');
      process.exit(1);
    }

    // Chart of accounts must exist before any payment is recorded
    await ledgerService.ensureBasicAccounts();

    // Start HTTP server
    server = app.listen(env.PORT, () => {
      logger.info(
        {
          port: env.PORT,
          env: env.NODE_ENV,
        },
        `Server running on http://localhost:${env.PORT}`
      );
      logger.info(`API endpoints available at http://localhost:${env.PORT}/api`);
      logger.info(`Health check: http://localhost:${env.PORT}/api/health`);
    });

    // Handle server errors
    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.error(`Port ${env.PORT} is already in use`);
      } else {
        logger.error({ error }, 'Server error');
      }
      process.exit(1);
    });
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

/**
 * Finish in-flight work: pending autosaves, running jobs, buffered metrics
 */
async function drainBackgroundWork(): Promise<void> {
  try {
    await postService.flushPendingAutosaves();
    logger.info('Pending autosaves flushed');
  } catch (error) {
    logger.error({ error }, 'Error flushing pending autosaves');
  }

  await jobQueue.shutdown();
  logger.info('Job queue stopped');

  try {
    await metrics.flush();
  } catch (error) {
    logger.error({ error }, 'Error flushing metrics');
  }
}

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  // Stop accepting new connections
  if (server) {
    server.close(async () => {
      logger.info('HTTP server closed');

      await drainBackgroundWork();

      // Close database connections
      try {
        await closePool();
        logger.info('Database connections closed');
      } catch (error) {
        logger.error({ error }, 'Error closing database connections');
      }

      logger.info('Graceful shutdown complete');
      process.exit(0);
    });

    // Open event streams keep connections alive; end them
    server.closeAllConnections();

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  } else {
    process.exit(0);
  }
}

/**
 * Process event handlers
 */
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason, promise) => {
  logger.error(
    {
      reason,
      promise,
    },
    'Unhandled Promise Rejection'
  );
});

process.on('uncaughtException', (error) => {
  logger.error(
    {
      error,
    },
    'Uncaught Exception'
  );
  process.exit(1);
});

// Start the server
void startServer();
