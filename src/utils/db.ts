/**
 * Database connection pool utility.
 *
 * Builds the PostgreSQL pool used by the database handler, configured via
 * `METRICS_DB_*` environment variables.
 *
 * @module utils/db
 */

import pg from 'pg';

const { Pool } = pg;

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  ssl?: boolean;
}

/**
 * Build database configuration from environment variables with sensible defaults.
 */
export function getDbConfig(): DbConfig {
  return {
    host: process.env['METRICS_DB_HOST'] ?? 'localhost',
    port: parseInt(process.env['METRICS_DB_PORT'] ?? '5432', 10),
    database: process.env['METRICS_DB_NAME'] ?? 'metrics',
    user: process.env['METRICS_DB_USER'] ?? 'postgres',
    password: process.env['METRICS_DB_PASSWORD'] ?? '',
    max: parseInt(process.env['METRICS_DB_POOL_MAX'] ?? '5', 10),
    idleTimeoutMillis: parseInt(process.env['METRICS_DB_IDLE_TIMEOUT'] ?? '30000', 10),
    connectionTimeoutMillis: parseInt(process.env['METRICS_DB_CONNECT_TIMEOUT'] ?? '5000', 10),
    ssl: process.env['METRICS_DB_SSL'] === 'true',
  };
}

/**
 * Create a new PostgreSQL connection pool with the given configuration.
 */
export function createPool(config?: Partial<DbConfig>): pg.Pool {
  const dbConfig = { ...getDbConfig(), ...config };
  return new Pool({
    host: dbConfig.host,
    port: dbConfig.port,
    database: dbConfig.database,
    user: dbConfig.user,
    password: dbConfig.password,
    max: dbConfig.max,
    idleTimeoutMillis: dbConfig.idleTimeoutMillis,
    connectionTimeoutMillis: dbConfig.connectionTimeoutMillis,
    ssl: dbConfig.ssl ? { rejectUnauthorized: false } : undefined,
  });
}
