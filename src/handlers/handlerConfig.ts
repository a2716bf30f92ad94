/**
 * Handler Configuration
 *
 * Environment-driven settings for the bundled sinks.
 *
 * @module handlers/handlerConfig
 */

import { isLogLevel, type LogLevel } from '../logging/logger.js';
import { getDbConfig, type DbConfig } from '../utils/db.js';
import { DEFAULT_METRICS_TABLE } from './databaseHandler.js';

export interface MetricsConfig {
  /** Send metrics to the database. Off unless METRICS_ENABLED is 'true'. */
  enabled: boolean;
  table: string;
  propagateErrors: boolean;
  logLevel: LogLevel;
  db: DbConfig;
}

export function loadMetricsConfig(): MetricsConfig {
  const logLevel = process.env['METRICS_LOG_LEVEL'] ?? 'info';

  return {
    enabled: process.env['METRICS_ENABLED'] === 'true',
    table: process.env['METRICS_TABLE'] ?? DEFAULT_METRICS_TABLE,
    propagateErrors: process.env['METRICS_PROPAGATE_ERRORS'] === 'true',
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    db: getDbConfig(),
  };
}
