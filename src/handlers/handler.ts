/**
 * Base Handler
 *
 * Shared plumbing for the bundled sinks: a formatter, a diagnostics
 * logger, and an error policy. Subclasses implement `emit`; a failure in
 * `emit` goes to `handleError`, which logs it unless `propagateErrors` is
 * set, in which case it is rethrown to the recording call.
 *
 * @module handlers/handler
 */

import { toError } from '../core/errors.js';
import type { MetricRecord } from '../core/record.js';
import type { Formatter, Handler } from '../core/types.js';
import { TextFormatter } from '../formatters/recordFormatters.js';
import { createLogger, type Logger } from '../logging/logger.js';

export interface BaseHandlerOptions {
  /** Defaults to {@link TextFormatter}. */
  formatter?: Formatter;
  /** Rethrow sink failures instead of logging them. Defaults to false. */
  propagateErrors?: boolean;
  /** Logger for the handler's own failures. */
  logger?: Logger;
}

export abstract class BaseHandler implements Handler {
  readonly propagateErrors: boolean;
  protected readonly formatter: Formatter;
  protected readonly logger: Logger;

  constructor(options: BaseHandlerOptions = {}) {
    this.formatter = options.formatter ?? new TextFormatter();
    this.propagateErrors = options.propagateErrors ?? false;
    this.logger = (options.logger ?? createLogger()).child({ operation: this.constructor.name });
  }

  handle(record: MetricRecord): void {
    try {
      this.emit(record);
    } catch (error) {
      this.handleError(record, error);
    }
  }

  format(record: MetricRecord): string {
    return this.formatter.format(record);
  }

  async flush(): Promise<void> {
    // Nothing buffered by default.
  }

  async close(): Promise<void> {
    // Nothing to release by default.
  }

  protected abstract emit(record: MetricRecord): void;

  protected handleError(record: MetricRecord, error: unknown): void {
    if (this.propagateErrors) throw error;
    this.logger.error(`Error in handler ${this.constructor.name}`, toError(error), {
      tag: record.tag,
      record: this.describe(record),
    });
  }

  private describe(record: MetricRecord): string {
    try {
      return this.format(record);
    } catch {
      // The formatter itself may be what failed.
      return record.toString();
    }
  }
}
