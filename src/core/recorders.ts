/**
 * Recorders
 *
 * Shape application events into observations on a {@link Metr}:
 *
 * - {@link IntRecorder} records one value immediately.
 * - {@link CounterRecorder} accumulates deltas and commits the sum once.
 * - {@link ExceptionRecorder} counts matching errors thrown by a wrapped
 *   function and always rethrows them.
 *
 * @module core/recorders
 */

import { RecorderClosedError } from './errors.js';
import { assertMetricValue } from './record.js';
import type { Metr } from './metr.js';
import type { ErrorKind } from './types.js';

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

abstract class Recorder {
  constructor(protected readonly metr: Metr) {}

  protected finalize(value: number): void {
    this.metr.handleValue(value);
  }
}

// ─── IntRecorder ─────────────────────────────────────────────────────────────

export class IntRecorder extends Recorder {
  rec(value: number): void {
    this.finalize(value);
  }
}

// ─── CounterRecorder ─────────────────────────────────────────────────────────

export class CounterRecorder extends Recorder {
  private sum = 0;
  private committed = false;

  /**
   * Opens a counter, runs `fn`, and commits exactly once when `fn` returns,
   * throws, or (for a promise) settles. `fn`'s result or error passes through.
   */
  static scope<T>(metr: Metr, fn: (counter: CounterRecorder) => Promise<T>): Promise<T>;
  static scope<T>(metr: Metr, fn: (counter: CounterRecorder) => T): T;
  static scope(metr: Metr, fn: (counter: CounterRecorder) => unknown): unknown {
    const counter = new CounterRecorder(metr);
    let deferred = false;
    try {
      const result = fn(counter);
      if (isPromiseLike(result)) {
        deferred = true;
        return Promise.resolve(result).finally(() => counter.commitOnce());
      }
      return result;
    } finally {
      if (!deferred) counter.commitOnce();
    }
  }

  get value(): number {
    return this.sum;
  }

  get closed(): boolean {
    return this.committed;
  }

  add(delta = 1): this {
    if (this.committed) throw new RecorderClosedError(this.metr.tag);
    assertMetricValue(delta);
    const next = this.sum + delta;
    assertMetricValue(next);
    this.sum = next;
    return this;
  }

  /** Commits the accumulated sum as a single observation. */
  close(): void {
    if (this.committed) throw new RecorderClosedError(this.metr.tag);
    this.committed = true;
    this.finalize(this.sum);
  }

  private commitOnce(): void {
    if (!this.committed) this.close();
  }
}

// ─── ExceptionRecorder ───────────────────────────────────────────────────────

export class ExceptionRecorder extends Recorder {
  readonly kinds: readonly ErrorKind[];

  constructor(metr: Metr, kinds: readonly ErrorKind[]) {
    super(metr);
    if (kinds.length === 0) {
      throw new TypeError('ExceptionRecorder needs at least one error kind');
    }
    this.kinds = [...kinds];
  }

  matches(error: unknown): boolean {
    return this.kinds.some((kind) => error instanceof kind);
  }

  /**
   * Returns a function that calls `fn` and records `1` each time it throws
   * (or its promise rejects with) one of the configured kinds. The error
   * is rethrown unchanged; other outcomes are not recorded.
   */
  wrap<A extends unknown[], R>(fn: (...args: A) => Promise<R>): (...args: A) => Promise<R>;
  wrap<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R;
  wrap(fn: (...args: unknown[]) => unknown): (...args: unknown[]) => unknown {
    const observe = (error: unknown): void => {
      if (this.matches(error)) this.finalize(1);
    };

    return function wrapped(this: unknown, ...args: unknown[]): unknown {
      let result: unknown;
      try {
        result = fn.apply(this, args);
      } catch (error) {
        observe(error);
        throw error;
      }
      if (isPromiseLike(result)) {
        return Promise.resolve(result).catch((error: unknown) => {
          observe(error);
          throw error;
        });
      }
      return result;
    };
  }

  /** Calls `fn` once through {@link wrap}. */
  run<R>(fn: () => Promise<R>): Promise<R>;
  run<R>(fn: () => R): R;
  run(fn: () => unknown): unknown {
    return this.wrap(fn)();
  }
}
