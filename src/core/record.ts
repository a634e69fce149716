import type { Level } from "./level.js";

export interface SourceLocation {
  readonly file: string;
  readonly line: number;
  readonly column?: number;
  readonly function?: string;
  readonly module?: string;
}

/** Read-only view of a record, handed to lazy values and filter predicates. */
export interface RecordView {
  readonly level: Level;
  readonly message: string;
  readonly timestamp: Date;
  readonly location: SourceLocation;
}

export const UNKNOWN_LOCATION: SourceLocation = Object.freeze({ file: "<unknown>", line: 0 });

/**
 * One log event. Created per call; only the Async drain keeps it past the
 * call that produced it.
 */
export class LogRecord implements RecordView {
  private resolver: (() => SourceLocation) | null;
  private resolved: SourceLocation | null;

  constructor(
    readonly level: Level,
    readonly message: string,
    location: SourceLocation | (() => SourceLocation) = UNKNOWN_LOCATION,
    readonly timestamp: Date = new Date(),
  ) {
    if (typeof location === "function") {
      this.resolver = location;
      this.resolved = null;
    } else {
      this.resolver = null;
      this.resolved = location;
    }
  }

  /** Resolved on first access, then memoized. */
  get location(): SourceLocation {
    if (this.resolved === null) {
      this.resolved = this.resolver ? this.resolver() : UNKNOWN_LOCATION;
      this.resolver = null;
    }
    return this.resolved;
  }
}
