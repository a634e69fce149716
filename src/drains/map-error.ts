import type { FieldSet } from "../core/field-set.js";
import type { Level } from "../core/level.js";
import type { LogRecord } from "../core/record.js";
import { type DrainError, toDrainError } from "../errors.js";
import type { Drain, DrainResult } from "../interfaces/drain.js";
import { drainEnabled, isPromiseLike } from "./drain-utils.js";

/** Rewrites the inner drain's errors, e.g. to reclassify or add context. */
export class MapError implements Drain {
  constructor(
    private readonly inner: Drain,
    private readonly map: (error: DrainError, record: LogRecord) => DrainError,
  ) {}

  log(record: LogRecord, fields: FieldSet): DrainResult {
    let result: DrainResult;
    try {
      result = this.inner.log(record, fields);
    } catch (error) {
      throw this.map(toDrainError(error), record);
    }
    if (isPromiseLike(result)) {
      return Promise.resolve(result).catch((error: unknown) => {
        throw this.map(toDrainError(error), record);
      });
    }
  }

  isEnabled(level: Level): boolean {
    return drainEnabled(this.inner, level);
  }
}

/** Forwards records and drops any error the inner drain reports. */
export class IgnoreResult implements Drain {
  constructor(private readonly inner: Drain) {}

  log(record: LogRecord, fields: FieldSet): DrainResult {
    let result: DrainResult;
    try {
      result = this.inner.log(record, fields);
    } catch {
      return;
    }
    if (isPromiseLike(result)) {
      return Promise.resolve(result).then(
        () => undefined,
        () => undefined,
      );
    }
  }

  isEnabled(level: Level): boolean {
    return drainEnabled(this.inner, level);
  }
}
