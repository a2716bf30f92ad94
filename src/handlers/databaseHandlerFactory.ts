/**
 * Builds the database sink from configuration, falling back to a
 * {@link NullHandler} when metrics are disabled or the database cannot be
 * reached, so recording code never has to care.
 *
 * @module handlers/databaseHandlerFactory
 */

import type pg from 'pg';
import { toError } from '../core/errors.js';
import type { Handler } from '../core/types.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { createPool, type DbConfig } from '../utils/db.js';
import { DatabaseHandler } from './databaseHandler.js';
import { loadMetricsConfig, type MetricsConfig } from './handlerConfig.js';
import { NullHandler } from './nullHandler.js';

export type ConnectablePool = Pick<pg.Pool, 'connect' | 'query' | 'end'>;

export interface DatabaseHandlerFactoryOptions {
  logger?: Logger;
  /** Pool constructor. Defaults to {@link createPool}. */
  poolFactory?: (config: DbConfig) => ConnectablePool;
}

/**
 * @throws the connection error when `config.propagateErrors` is set
 */
export async function createDatabaseHandler(
  config: MetricsConfig = loadMetricsConfig(),
  options: DatabaseHandlerFactoryOptions = {},
): Promise<Handler> {
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const handlerOptions = { propagateErrors: config.propagateErrors, logger };

  if (!config.enabled) {
    logger.debug('Metrics disabled; database handler replaced by NullHandler');
    return new NullHandler(handlerOptions);
  }

  const pool: ConnectablePool = (options.poolFactory ?? createPool)(config.db);
  try {
    const client = await pool.connect();
    client.release();
  } catch (err) {
    const error = toError(err);
    await pool.end();
    if (config.propagateErrors) throw error;
    logger.error('Error while connecting to the metrics database', error, {
      host: config.db.host,
      port: config.db.port,
      database: config.db.database,
    });
    return new NullHandler(handlerOptions);
  }

  return new DatabaseHandler({ ...handlerOptions, pool, table: config.table });
}
