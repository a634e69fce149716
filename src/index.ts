/**
 * cascade-log public API barrel.
 *
 * Re-exports the logger, context and value types, the drain interface and the
 * built-in combinators, configuration helpers and errors.
 * @module
 */

// Adapters
export type { JsonLinesDrainOptions } from "./adapters/json-lines-drain.js";
export { JsonLinesDrain } from "./adapters/json-lines-drain.js";
// Configuration
export {
  asyncDrainConfigSchema,
  levelSchema,
  loggerConfigSchema,
  overflowSchema,
} from "./config/config-schema.js";
export type { CreateLoggerOptions, LoggerPipeline } from "./config/create-logger.js";
export { createLogger } from "./config/create-logger.js";
// Core
export type { StackEntry } from "./core/call-site.js";
export { captureCallSite, parseStackFrame } from "./core/call-site.js";
export type { ContextNode, FieldsInput, KeyValue } from "./core/context-chain.js";
export {
  EMPTY_CONTEXT,
  extendContext,
  pair,
  toPairs,
  walkContext,
} from "./core/context-chain.js";
export type { RecordedDrainError } from "./core/drain-error-monitor.js";
export { DrainErrorMonitor } from "./core/drain-error-monitor.js";
export { FieldSet } from "./core/field-set.js";
export {
  ALL_LEVELS,
  isAtLeast,
  Level,
  levelFromNumber,
  levelLabel,
  levelName,
  levelShortLabel,
  parseLevel,
} from "./core/level.js";
export type { LoggerOptions } from "./core/logger.js";
export { Logger } from "./core/logger.js";
export type { RecordView, SourceLocation } from "./core/record.js";
export { LogRecord, UNKNOWN_LOCATION } from "./core/record.js";
export type {
  EagerValue,
  FieldValue,
  LazyFn,
  LazyValue,
  Scalar,
  Value,
} from "./core/value.js";
export { eager, evaluate, isValue, lazy, toValue } from "./core/value.js";
// Drains
export type {
  AsyncDrainEvents,
  AsyncDrainOptions,
  AsyncDrainStats,
} from "./drains/async-drain.js";
export { AsyncDrain, DROPPED_MESSAGE } from "./drains/async-drain.js";
export type { SwitchControl } from "./drains/atomic-switch.js";
export { AtomicSwitch } from "./drains/atomic-switch.js";
export { Discard, discard } from "./drains/discard.js";
export { drainEnabled, isPromiseLike } from "./drains/drain-utils.js";
export { Duplicate, duplicate } from "./drains/duplicate.js";
export type { RecordPredicate } from "./drains/filter.js";
export { Filter, FilterLevel } from "./drains/filter.js";
export { IgnoreResult, MapError } from "./drains/map-error.js";
// Errors
export type { DrainErrorKind } from "./errors.js";
export {
  CascadeLogError,
  ConfigError,
  DrainError,
  DuplicateDrainError,
  errorMessage,
  toDrainError,
} from "./errors.js";
// Interfaces
export type { Drain, DrainErrorHandler, DrainResult } from "./interfaces/drain.js";
// Types
export type {
  AsyncDrainConfig,
  LoggerConfig,
  OverflowStrategy,
  ResolvedAsyncDrainConfig,
  ResolvedLoggerConfig,
} from "./types/config.js";
export {
  DEFAULT_ASYNC_CONFIG,
  DEFAULT_CONFIG,
  resolveAsyncDrainConfig,
  resolveConfig,
} from "./types/config.js";
// Utilities
export { RingBuffer } from "./utils/ring-buffer.js";
export { TypedEventEmitter } from "./utils/typed-emitter.js";
