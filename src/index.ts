/**
 * metr – hierarchical integer metrics
 *
 * Create metrs by dotted tag, attach handlers anywhere in the tree, and
 * record values that flow from the originating node up to the root.
 *
 * @example
 * ```typescript
 * import { getMetr, LoggingHandler } from 'metr';
 *
 * getMetr('api').addHandler(new LoggingHandler());
 * const created = getMetr('api.users.created');
 * created.rec(1);
 * await created.withCounter(async (counter) => {
 *   for (const batch of batches) counter.add(await importBatch(batch));
 * });
 * ```
 *
 * @module metr
 */

// ─── Core ───
export * from './core/index.js';

// ─── Formatters ───
export * from './formatters/index.js';

// ─── Handlers ───
export * from './handlers/index.js';

// ─── Logging ───
export * from './logging/index.js';

// ─── Database ───
export { type DbConfig, getDbConfig, createPool } from './utils/db.js';
