/**
 * Metr Registry
 *
 * Maps tags to {@link Metr} nodes and is the only place nodes are created.
 * Asking for `"a.b.c"` creates any missing `"a"`, `"a.b"` first so every
 * node is linked to its parent before it becomes visible.
 *
 * Lookups and creation run synchronously inside a single call, so
 * concurrent callers on the same isolate can never observe a partially
 * linked chain or create a second node for a tag.
 *
 * @module core/registry
 */

import { createLogger, type Logger } from '../logging/logger.js';
import { toError } from './errors.js';
import { Metr, type MetrContext } from './metr.js';
import { createMonotonicClock, getProcessSessionId, MetricRecord, type Clock } from './record.js';
import { assertValidTag, parentTag } from './tag.js';
import type { Handler } from './types.js';

export interface MetrRegistryOptions {
  /** Session id stamped on every record. Defaults to the process session id. */
  sessionId?: string;
  /** Timestamp source for records. Defaults to a non-decreasing wall clock. */
  clock?: Clock;
  /** Logger for shutdown diagnostics. */
  logger?: Logger;
  /** Rethrow handler close failures from {@link MetrRegistry.shutdown}. */
  propagateErrors?: boolean;
}

export class MetrRegistry implements MetrContext {
  readonly sessionId: string;
  private readonly nodes = new Map<string, Metr>();
  // Insertion order is first-registration order.
  private readonly handlers = new Set<Handler>();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly propagateErrors: boolean;

  constructor(options: MetrRegistryOptions = {}) {
    this.sessionId = options.sessionId ?? getProcessSessionId();
    this.clock = options.clock ?? createMonotonicClock();
    this.logger = (options.logger ?? createLogger()).child({ operation: 'metr-registry' });
    this.propagateErrors = options.propagateErrors ?? false;
  }

  /**
   * Returns the node for `tag`, creating it and any missing ancestors.
   * @throws {InvalidTagError} for an empty tag, whitespace, or an empty segment
   */
  get(tag: string): Metr {
    const existing = this.nodes.get(tag);
    if (existing) return existing;

    assertValidTag(tag);
    return this.create(tag);
  }

  has(tag: string): boolean {
    return this.nodes.has(tag);
  }

  /** Registered tags, sorted. */
  tags(): string[] {
    return [...this.nodes.keys()].sort();
  }

  get size(): number {
    return this.nodes.size;
  }

  /** @internal */
  createRecord(tag: string, value: number): MetricRecord {
    return new MetricRecord({ tag, value, created: this.clock(), sessionId: this.sessionId });
  }

  /** @internal Remembers a handler so {@link shutdown} can close it. */
  trackHandler(handler: Handler): void {
    this.handlers.add(handler);
  }

  /**
   * Flushes and closes every handler attached to this registry's nodes,
   * newest first, each exactly once. A handler whose flush fails is still
   * closed; every failure is logged and the rest are still closed.
   */
  async shutdown(): Promise<void> {
    const handlers = [...this.handlers].reverse();
    this.handlers.clear();

    const failures: Error[] = [];
    for (const handler of handlers) {
      try {
        await handler.flush?.();
      } catch (err) {
        failures.push(this.logCloseFailure(handler, 'flush', err));
      }
      try {
        await handler.close?.();
      } catch (err) {
        failures.push(this.logCloseFailure(handler, 'close', err));
      }
    }

    if (failures.length > 0 && this.propagateErrors) {
      throw new AggregateError(failures, `${failures.length} metric handler(s) failed to close`);
    }
  }

  private logCloseFailure(handler: Handler, step: 'flush' | 'close', err: unknown): Error {
    const error = toError(err);
    this.logger.error('Failed to close metric handler', error, {
      handler: handler.constructor.name,
      step,
    });
    return error;
  }

  private create(tag: string): Metr {
    const parentKey = parentTag(tag);
    const parent = parentKey === null ? null : this.get(parentKey);
    const node = new Metr(tag, parent, this);
    this.nodes.set(tag, node);
    return node;
  }
}

// ─── Default Registry ────────────────────────────────────────────────────────

/** Process-wide registry, lazily initialized. */
let defaultRegistry: MetrRegistry | null = null;

export function getDefaultRegistry(): MetrRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new MetrRegistry();
  }
  return defaultRegistry;
}

/** Get or create a metr in the process-wide registry. */
export function getMetr(tag: string): Metr {
  return getDefaultRegistry().get(tag);
}
