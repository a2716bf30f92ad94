/**
 * Record Formatters
 *
 * Pure conversions of a {@link MetricRecord} into the string a sink writes.
 *
 * @module formatters/recordFormatters
 */

import type { MetricRecord } from '../core/record.js';
import type { Formatter } from '../core/types.js';

/** `[thread:…][thread_name:…][session:…][created:…][tag:…][value:…]` */
export class TextFormatter implements Formatter {
  format(record: MetricRecord): string {
    return record.toString();
  }
}

/** Quotes a string as a SQL literal, doubling embedded single quotes. */
export function quoteSqlLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Renders the ordered value list `created, tag, value, sessionId`, e.g.
 * `'2024-01-15T10:00:00.000Z', 'api.users', 3, '9b2f…'`.
 */
export class SqlRecordFormatter implements Formatter {
  format(record: MetricRecord): string {
    return [
      quoteSqlLiteral(record.created.toISOString()),
      quoteSqlLiteral(record.tag),
      String(Math.trunc(record.value)),
      quoteSqlLiteral(record.sessionId),
    ].join(', ');
  }
}
