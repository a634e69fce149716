/**
 * The drain capability: the single seam every sink and combinator implements.
 * @module
 */

import type { FieldSet } from "../core/field-set.js";
import type { Level } from "../core/level.js";
import type { LogRecord } from "../core/record.js";
import type { DrainError } from "../errors.js";

/** `void` on synchronous success; a promise when the drain completes later. Failure throws or rejects. */
export type DrainResult = void | Promise<void>;

export interface Drain {
  /**
   * Consume one record. Drains that drop the record must not iterate
   * `fields`, so lazy values behind them never run.
   */
  log(record: LogRecord, fields: FieldSet): DrainResult;
  /**
   * Optional fast path. Returning false lets the logger skip building the
   * record at all; returning true still leaves the final decision to `log`.
   */
  isEnabled?(level: Level): boolean;
}

/** Out-of-band receiver for errors that never reach the logging call site. */
export type DrainErrorHandler = (error: DrainError, record: LogRecord) => void;
