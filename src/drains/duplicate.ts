import type { FieldSet } from "../core/field-set.js";
import type { Level } from "../core/level.js";
import type { LogRecord } from "../core/record.js";
import { type DrainError, DuplicateDrainError, toDrainError } from "../errors.js";
import type { Drain, DrainResult } from "../interfaces/drain.js";
import { discard } from "./discard.js";
import { drainEnabled, type Outcome, settle } from "./drain-utils.js";

function failure(outcome: Outcome): DrainError | undefined {
  return outcome.ok ? undefined : toDrainError(outcome.error);
}

function combine(first: Outcome, second: Outcome): void {
  if (first.ok && second.ok) return;
  throw new DuplicateDrainError(failure(first), failure(second));
}

/**
 * Sends every record to both drains. Both are always called, whatever the
 * other does; the call fails with a DuplicateDrainError if either failed.
 * Both drains see the same FieldSet, so lazy values run once between them.
 */
export class Duplicate implements Drain {
  constructor(
    readonly first: Drain,
    readonly second: Drain,
  ) {}

  log(record: LogRecord, fields: FieldSet): DrainResult {
    const a = settle(() => this.first.log(record, fields));
    const b = settle(() => this.second.log(record, fields));

    if (a instanceof Promise || b instanceof Promise) {
      return Promise.all([a, b]).then(([first, second]) => combine(first, second));
    }
    combine(a, b);
  }

  isEnabled(level: Level): boolean {
    return drainEnabled(this.first, level) || drainEnabled(this.second, level);
  }
}

/** Fan out to any number of drains by nesting Duplicates. */
export function duplicate(...drains: Drain[]): Drain {
  const [head, ...rest] = drains;
  if (head === undefined) return discard;
  if (rest.length === 0) return head;
  return new Duplicate(head, duplicate(...rest));
}
