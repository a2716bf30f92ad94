/**
 * Metr
 *
 * A named point in the metric tree. Records created here are handed to
 * this node's handlers in registration order, then to each ancestor's
 * handlers up to the root, as the same unmodified instance.
 *
 * Metrs are only created by a {@link MetrRegistry}; use `registry.get(tag)`
 * or `getMetr(tag)`.
 *
 * @module core/metr
 */

import { assertMetricValue, type MetricRecord } from './record.js';
import { CounterRecorder, ExceptionRecorder, IntRecorder } from './recorders.js';
import { childTag } from './tag.js';
import type { ErrorKind, Handler } from './types.js';

/** The registry services a Metr depends on. */
export interface MetrContext {
  get(tag: string): Metr;
  createRecord(tag: string, value: number): MetricRecord;
  trackHandler(handler: Handler): void;
}

export class Metr {
  // Replaced, never mutated, so a dispatch in progress keeps its snapshot.
  private handlers: readonly Handler[] = [];

  /** @internal Nodes are created by {@link MetrRegistry.get}. */
  constructor(
    readonly tag: string,
    readonly parent: Metr | null,
    private readonly context: MetrContext,
  ) {}

  getHandlers(): readonly Handler[] {
    return this.handlers;
  }

  /** Appends a handler. Adding the same instance twice has no effect. */
  addHandler(handler: Handler): void {
    if (this.handlers.includes(handler)) return;
    this.handlers = [...this.handlers, handler];
    this.context.trackHandler(handler);
  }

  handleValue(value: number): void {
    assertMetricValue(value);
    this.dispatch(this.context.createRecord(this.tag, value));
  }

  /**
   * Passes the record to this node's handlers, then up the parent chain.
   * A handler that throws stops the sweep; the error reaches the caller.
   */
  private dispatch(record: MetricRecord): void {
    for (let node: Metr | null = this; node !== null; node = node.parent) {
      for (const handler of node.handlers) {
        handler.handle(record);
      }
    }
  }

  getChild(suffix: string): Metr {
    return this.context.get(childTag(this.tag, suffix));
  }

  // ─── Recorders ─────────────────────────────────────────────────────────

  rec(value: number): void {
    new IntRecorder(this).rec(value);
  }

  /** Opens a counter; the caller must `close()` it to commit the sum. */
  counter(): CounterRecorder {
    return new CounterRecorder(this);
  }

  /** Runs `fn` with a fresh counter and commits its sum when `fn` finishes. */
  withCounter<T>(fn: (counter: CounterRecorder) => Promise<T>): Promise<T>;
  withCounter<T>(fn: (counter: CounterRecorder) => T): T;
  withCounter(fn: (counter: CounterRecorder) => unknown): unknown {
    return CounterRecorder.scope(this, fn);
  }

  recException(...kinds: ErrorKind[]): ExceptionRecorder {
    return new ExceptionRecorder(this, kinds);
  }

  toString(): string {
    return `Metr(${this.tag})`;
  }
}
