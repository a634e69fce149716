import type { FieldSet } from "../core/field-set.js";
import { isAtLeast, type Level } from "../core/level.js";
import type { LogRecord, RecordView } from "../core/record.js";
import type { Drain, DrainResult } from "../interfaces/drain.js";
import { drainEnabled } from "./drain-utils.js";

export type RecordPredicate = (record: RecordView) => boolean;

/** Forwards records matching `predicate`; drops the rest without reading their fields. */
export class Filter implements Drain {
  constructor(
    private readonly predicate: RecordPredicate,
    private readonly inner: Drain,
  ) {}

  log(record: LogRecord, fields: FieldSet): DrainResult {
    if (!this.predicate(record)) return;
    return this.inner.log(record, fields);
  }

  isEnabled(level: Level): boolean {
    return drainEnabled(this.inner, level);
  }
}

/** Forwards records at least as severe as `min`. */
export class FilterLevel implements Drain {
  constructor(
    readonly min: Level,
    private readonly inner: Drain,
  ) {}

  log(record: LogRecord, fields: FieldSet): DrainResult {
    if (!isAtLeast(record.level, this.min)) return;
    return this.inner.log(record, fields);
  }

  isEnabled(level: Level): boolean {
    return isAtLeast(level, this.min) && drainEnabled(this.inner, level);
  }
}
