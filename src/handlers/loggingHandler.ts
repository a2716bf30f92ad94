/**
 * Logging Handler
 *
 * Writes each record as one structured log entry: the text-formatted
 * record as the message, and its fields as metadata.
 *
 * @module handlers/loggingHandler
 */

import type { MetricRecord } from '../core/record.js';
import { createLogger, type Logger, type LogLevel } from '../logging/logger.js';
import { BaseHandler, type BaseHandlerOptions } from './handler.js';

export interface LoggingHandlerOptions extends BaseHandlerOptions {
  /** Level records are logged at. Defaults to 'info'. */
  level?: LogLevel;
  /** Recorded as the entry's `operation`. Defaults to 'metr'. */
  name?: string;
}

export class LoggingHandler extends BaseHandler {
  readonly level: LogLevel;
  readonly name: string;
  private readonly target: Logger;

  constructor(options: LoggingHandlerOptions = {}) {
    super(options);
    this.level = options.level ?? 'info';
    this.name = options.name ?? 'metr';
    const base = options.logger ?? createLogger({ level: this.level });
    this.target = base.child({ operation: this.name });
  }

  protected override emit(record: MetricRecord): void {
    this.target.log(this.level, this.format(record), {
      threadId: record.threadId,
      threadName: record.threadName,
      sessionId: record.sessionId,
      created: record.created.toISOString(),
      tag: record.tag,
      value: record.value,
    });
  }
}
