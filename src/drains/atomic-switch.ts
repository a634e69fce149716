import type { FieldSet } from "../core/field-set.js";
import type { Level } from "../core/level.js";
import type { LogRecord } from "../core/record.js";
import type { Drain, DrainResult } from "../interfaces/drain.js";
import { drainEnabled } from "./drain-utils.js";

/** Handle for replacing the drain behind an AtomicSwitch without holding the switch itself. */
export interface SwitchControl {
  get(): Drain;
  set(drain: Drain): void;
  swap(drain: Drain): Drain;
}

/**
 * A drain whose target can be replaced at runtime.
 *
 * Each `log` call reads the current drain once, on entry, and uses that
 * snapshot until it completes, even if the call is still awaiting an async
 * drain when `set` installs a new one. The previous drain stays alive for as
 * long as an in-flight call holds it.
 */
export class AtomicSwitch implements Drain {
  private current: Drain;

  constructor(initial: Drain) {
    this.current = initial;
  }

  log(record: LogRecord, fields: FieldSet): DrainResult {
    const snapshot = this.current;
    return snapshot.log(record, fields);
  }

  isEnabled(level: Level): boolean {
    return drainEnabled(this.current, level);
  }

  get(): Drain {
    return this.current;
  }

  set(drain: Drain): void {
    this.current = drain;
  }

  /** Install `drain` and return the one it replaced. */
  swap(drain: Drain): Drain {
    const previous = this.current;
    this.current = drain;
    return previous;
  }

  control(): SwitchControl {
    return {
      get: () => this.get(),
      set: (drain) => this.set(drain),
      swap: (drain) => this.swap(drain),
    };
  }
}
