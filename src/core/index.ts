/**
 * Core Module
 *
 * The metric tree: tags, records, nodes, recorders and the registry.
 */

export {
  type MetrErrorCode,
  MetrError,
  InvalidTagError,
  InvalidValueError,
  RecorderClosedError,
  InvalidTableNameError,
  toError,
} from './errors.js';

export { TAG_SEPARATOR, isValidTag, assertValidTag, parentTag, tagPrefixes, childTag } from './tag.js';

export {
  type MetricRecordInit,
  type Clock,
  MetricRecord,
  assertMetricValue,
  createSessionId,
  getProcessSessionId,
  createMonotonicClock,
  currentThreadName,
} from './record.js';

export type { Handler, Formatter, ErrorKind } from './types.js';

export { type MetrContext, Metr } from './metr.js';

export { IntRecorder, CounterRecorder, ExceptionRecorder } from './recorders.js';

export {
  type MetrRegistryOptions,
  MetrRegistry,
  getDefaultRegistry,
  getMetr,
} from './registry.js';
