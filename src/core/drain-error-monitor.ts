import type { DrainError, DrainErrorKind } from "../errors.js";
import type { DrainErrorHandler } from "../interfaces/drain.js";
import { RingBuffer } from "../utils/ring-buffer.js";
import type { Level } from "./level.js";
import type { LogRecord } from "./record.js";

export interface RecordedDrainError {
  error: DrainError;
  /** Level and message of the record that failed to drain. */
  level: Level;
  message: string;
  timestamp: number;
}

/**
 * Keeps the most recent drain errors in a fixed-capacity ring buffer, with
 * per-kind counts. Pass `monitor.handler` as a logger's or async drain's
 * `onError` to make swallowed errors inspectable.
 */
export class DrainErrorMonitor {
  private buffer: RingBuffer<RecordedDrainError>;
  private counts: Record<DrainErrorKind, number> = emptyCounts();
  private latest: RecordedDrainError | undefined;
  private readonly now: () => number;

  constructor(options?: { maxErrors?: number; now?: () => number }) {
    this.buffer = new RingBuffer(options?.maxErrors ?? 100);
    this.now = options?.now ?? Date.now;
  }

  readonly handler: DrainErrorHandler = (error: DrainError, record: LogRecord) => {
    this.record(error, record);
  };

  record(error: DrainError, record: LogRecord): void {
    const entry: RecordedDrainError = {
      error,
      level: record.level,
      message: record.message,
      timestamp: this.now(),
    };
    this.buffer.push(entry);
    this.latest = entry;
    this.counts[error.kind]++;
  }

  get last(): RecordedDrainError | undefined {
    return this.latest;
  }

  /** Return recent errors, newest first. */
  getRecent(limit?: number): RecordedDrainError[] {
    const all = this.buffer.toArray().reverse(); // newest first
    return limit != null ? all.slice(0, limit) : all;
  }

  getCounts(): Record<DrainErrorKind, number> & { total: number } {
    const total = Object.values(this.counts).reduce((sum, n) => sum + n, 0);
    return { ...this.counts, total };
  }

  reset(): void {
    this.buffer.clear();
    this.counts = emptyCounts();
    this.latest = undefined;
  }
}

function emptyCounts(): Record<DrainErrorKind, number> {
  return { io: 0, encoding: 0, rejected: 0, closed: 0, unknown: 0 };
}
