/**
 * Package Entry Point
 * Token Sentiment Analytics Engine
 */

import { Pool } from 'pg';

import { SentimentAnalyticsEngine } from './analytics/engine';
import defaultConfig, { Config, DatabaseConfig, validateConfig } from './config/default';
import { PostgresEntityStore } from './store/postgresEntityStore';

export * from './analytics/engine';
export * from './analytics/errors';
export * from './analytics/types';
export * from './analytics/validation';
export { TokenKey, displayNameOf } from './analytics/tokenResolver';
export { SentimentCounts, SentimentDistribution, DetailedSentimentDistribution } from './analytics/sentimentMath';
export * from './store/entityStore';
export { MemoryEntityStore, EntityDataset } from './store/memoryEntityStore';
export { PostgresEntityStore, SqlClient } from './store/postgresEntityStore';
export { Config, loadConfig, validateConfig } from './config/default';
export { metricsRegistry } from './metrics';
export { createSandboxEngine, generateSandboxDataset, SandboxOptions } from './sandbox/sandboxEnvironment';
export { DatabaseMigrator } from './database/migrator';

export function createPool(database: DatabaseConfig): Pool {
  const pool = new Pool({
    host: database.host,
    port: database.port,
    database: database.database,
    user: database.user,
    password: database.password,
    ssl: database.ssl ? { rejectUnauthorized: false } : undefined,
    max: database.poolSize,
    idleTimeoutMillis: database.idleTimeout,
    statement_timeout: database.statementTimeout,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (error) => {
    console.error('[Database] Idle client error:', error.message);
  });

  return pool;
}

/**
 * Engine backed by PostgreSQL. The caller owns the returned pool and must
 * end it on shutdown.
 */
export function createEngine(config: Config = defaultConfig): { engine: SentimentAnalyticsEngine; pool: Pool } {
  validateConfig(config);

  const pool = createPool(config.database);
  const engine = new SentimentAnalyticsEngine(new PostgresEntityStore(pool), {
    logLevel: config.monitoring.logLevel,
    slowQueryThresholdMs: config.analytics.slowQueryThresholdMs,
    metricsEnabled: config.monitoring.metricsEnabled,
  });

  console.log(`[Engine] Created connection pool for ${config.database.host}:${config.database.port}/${config.database.database}`);
  return { engine, pool };
}
