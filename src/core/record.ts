/**
 * Metric Record
 *
 * One immutable observation: when it was taken, which metr produced it,
 * the integer value, and the session it belongs to. The same instance is
 * handed to every handler along the propagation path.
 *
 * @module core/record
 */

import { randomUUID } from 'node:crypto';
import { isMainThread, threadId as currentThreadId } from 'node:worker_threads';
import { InvalidValueError } from './errors.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface MetricRecordInit {
  tag: string;
  value: number;
  created: Date;
  sessionId: string;
  threadId?: number;
  threadName?: string;
}

/** Returns the timestamp for a new record. */
export type Clock = () => Date;

// ─── Values ──────────────────────────────────────────────────────────────────

export function assertMetricValue(value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidValueError(value);
  }
}

// ─── Session & Clock ─────────────────────────────────────────────────────────

export function createSessionId(): string {
  return randomUUID();
}

const processSessionId = createSessionId();

/** Generated once when the module loads; shared by every registry in the process. */
export function getProcessSessionId(): string {
  return processSessionId;
}

/**
 * Creates a clock that never goes backwards: if the wall clock steps back,
 * the last issued instant is repeated until it catches up.
 */
export function createMonotonicClock(now: () => number = Date.now): Clock {
  let last = Number.NEGATIVE_INFINITY;
  return () => {
    last = Math.max(last, now());
    return new Date(last);
  };
}

export function currentThreadName(): string {
  return isMainThread ? 'main' : `worker-${currentThreadId}`;
}

// ─── Record ──────────────────────────────────────────────────────────────────

export class MetricRecord {
  readonly tag: string;
  readonly value: number;
  readonly sessionId: string;
  readonly threadId: number;
  readonly threadName: string;
  private readonly createdMs: number;

  constructor(init: MetricRecordInit) {
    this.tag = init.tag;
    this.value = init.value;
    this.createdMs = init.created.getTime();
    this.sessionId = init.sessionId;
    this.threadId = init.threadId ?? currentThreadId;
    this.threadName = init.threadName ?? currentThreadName();
    Object.freeze(this);
  }

  /** A fresh Date on every read; the stored instant cannot be mutated. */
  get created(): Date {
    return new Date(this.createdMs);
  }

  toString(): string {
    return (
      `[thread:${this.threadId}][thread_name:${this.threadName}]` +
      `[session:${this.sessionId}]` +
      `[created:${new Date(this.createdMs).toISOString()}]` +
      `[tag:${this.tag}]` +
      `[value:${this.value}]`
    );
  }
}
