/**
 * Handlers Module
 *
 * Sinks that consume metric records: structured logs, PostgreSQL, or nothing.
 */

export { type BaseHandlerOptions, BaseHandler } from './handler.js';
export { NullHandler } from './nullHandler.js';
export { type LoggingHandlerOptions, LoggingHandler } from './loggingHandler.js';
export {
  type MetricsPool,
  type DatabaseHandlerOptions,
  DEFAULT_METRICS_TABLE,
  DatabaseHandler,
  isValidTableName,
  buildInsertSql,
} from './databaseHandler.js';
export { type MetricsConfig, loadMetricsConfig } from './handlerConfig.js';
export {
  type ConnectablePool,
  type DatabaseHandlerFactoryOptions,
  createDatabaseHandler,
} from './databaseHandlerFactory.js';
