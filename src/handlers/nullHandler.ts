import type { MetricRecord } from '../core/record.js';
import { BaseHandler } from './handler.js';

/** Discards every record. Stands in when a real sink is disabled or unavailable. */
export class NullHandler extends BaseHandler {
  protected override emit(_record: MetricRecord): void {
    // Intentionally empty.
  }
}
