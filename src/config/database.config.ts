/**
 * Database Connection Pool Configuration
 *
 * PostgreSQL connection pool settings. An admin console has few concurrent
 * operators but long-running background jobs (CSV export, image processing)
 * that each hold a connection while they work, so the pool keeps a small warm
 * floor and a moderate ceiling.
 *
 * See: https://node-postgres.com/apis/pool
 */

import { env } from './env';

export const DATABASE_POOL_CONFIG = {
  /**
   * Minimum number of connections to keep in pool
   *
   * Value: 2 connections
   * Admin traffic is bursty and light; two warm connections cover a page load
   * plus one background job without a cold start.
   */
  min: 2,

  /**
   * Maximum number of connections in pool
   *
   * Value: From env.DB_MAX_CONNECTIONS (default: 20)
   * PostgreSQL default max_connections = 100; leave headroom for the
   * migration tool, psql sessions and monitoring.
   */
  max: env.DB_MAX_CONNECTIONS || 20,

  /**
   * Idle connection timeout (5 minutes)
   *
   * Long enough to ride out the pauses between an operator's clicks,
   * short enough to release connections overnight.
   */
  idleTimeoutMillis: 300_000,

  /**
   * Connection acquisition timeout (10 seconds)
   *
   * - Request arrives → All connections busy → Wait up to 10s for one to free
   * - If no connection available after 10s → Throw error
   */
  connectionTimeoutMillis: 10_000,

  /**
   * Maximum connection lifetime uses (7,500 queries)
   *
   * Recycles connections so prepared statements and session state
   * do not accumulate on long-lived clients.
   */
  maxUses: 7_500,
} as const;

export type DatabasePoolConfig = typeof DATABASE_POOL_CONFIG;
