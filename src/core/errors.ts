/**
 * Typed errors raised by the metric tree and its recorders.
 *
 * Every error carries a stable `code` so callers can branch on it
 * without string-matching messages.
 *
 * @module core/errors
 */

export type MetrErrorCode =
  | 'INVALID_TAG'
  | 'INVALID_VALUE'
  | 'RECORDER_CLOSED'
  | 'INVALID_TABLE_NAME';

export class MetrError extends Error {
  constructor(
    public readonly code: MetrErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'MetrError';
  }
}

/** Thrown by the registry for an empty or malformed tag. No node is created. */
export class InvalidTagError extends MetrError {
  constructor(public readonly tag: string) {
    super('INVALID_TAG', `Invalid metr tag: ${JSON.stringify(tag)}`);
    this.name = 'InvalidTagError';
  }
}

/** Thrown when an observation is not a safe integer. */
export class InvalidValueError extends MetrError {
  constructor(public readonly value: unknown) {
    super('INVALID_VALUE', `Metric values must be safe integers, got ${String(value)}`);
    this.name = 'InvalidValueError';
  }
}

export class RecorderClosedError extends MetrError {
  constructor(public readonly tag: string) {
    super('RECORDER_CLOSED', `Counter for "${tag}" has already been committed`);
    this.name = 'RecorderClosedError';
  }
}

export class InvalidTableNameError extends MetrError {
  constructor(public readonly table: string) {
    super('INVALID_TABLE_NAME', `Invalid destination table name: ${JSON.stringify(table)}`);
    this.name = 'InvalidTableNameError';
  }
}

/** Normalizes a thrown value so it can be attached to a log entry. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
