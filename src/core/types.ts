/**
 * Contracts shared between the metric tree and the sinks it feeds.
 *
 * @module core/types
 */

import type { MetricRecord } from './record.js';

/**
 * A sink for records. `handle` is called synchronously on the thread
 * that recorded the value; a throw aborts the rest of that dispatch.
 */
export interface Handler {
  handle(record: MetricRecord): void;
  /** Waits for any work the handler started but has not finished. */
  flush?(): Promise<void>;
  /** Releases the handler's resources. Called once at shutdown. */
  close?(): Promise<void>;
}

/** Pure conversion of a record into a sink-specific string. */
export interface Formatter {
  format(record: MetricRecord): string;
}

/** An error class an {@link ExceptionRecorder} should count. */
export type ErrorKind = abstract new (...args: never[]) => Error;
