import type { FieldSet } from "../core/field-set.js";
import { levelName } from "../core/level.js";
import type { LogRecord } from "../core/record.js";
import { DrainError, errorMessage } from "../errors.js";
import type { Drain } from "../interfaces/drain.js";

const RESERVED = new Set(["time", "level", "msg", "file", "line"]);

export interface JsonLinesDrainOptions {
  writer?: (line: string) => void;
  /** Add `file` and `line` of the call site (default: false). */
  location?: boolean;
}

/**
 * Writes each record as one JSON object per line.
 * Fields are flattened into the object, most specific value first; they
 * cannot overwrite `time`, `level`, `msg` or the location keys.
 */
export class JsonLinesDrain implements Drain {
  private writer: (line: string) => void;
  private location: boolean;

  constructor(options: JsonLinesDrainOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.location = options.location ?? false;
  }

  log(record: LogRecord, fields: FieldSet): void {
    let line: string;
    try {
      line = JSON.stringify(this.encode(record, fields));
    } catch (err) {
      throw new DrainError(`cannot encode record: ${errorMessage(err)}`, "encoding", {
        cause: err,
      });
    }

    try {
      this.writer(line);
    } catch (err) {
      throw new DrainError(`cannot write record: ${errorMessage(err)}`, "io", { cause: err });
    }
  }

  private encode(record: LogRecord, fields: FieldSet): Record<string, unknown> {
    const entry = new Map<string, unknown>([
      ["time", record.timestamp.toISOString()],
      ["level", levelName(record.level)],
      ["msg", record.message],
    ]);

    if (this.location) {
      entry.set("file", record.location.file);
      entry.set("line", record.location.line);
    }

    // Resolving a field runs its lazy function, which may throw.
    for (const [key, value] of Object.entries(fields.toObject())) {
      if (RESERVED.has(key)) continue;
      if (value instanceof Error) {
        entry.set(key, value.message);
        entry.set(`${key}Stack`, value.stack);
      } else if (typeof value === "bigint") {
        entry.set(key, value.toString());
      } else {
        entry.set(key, value);
      }
    }
    return Object.fromEntries(entry);
  }
}
