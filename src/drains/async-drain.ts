/**
 * AsyncDrain — decouples producers from a slow drain.
 *
 * Producers enqueue `(record, fields)` and return at once; a single worker
 * loop delivers queued records to the wrapped drain one at a time, in arrival
 * order. The wrapped drain is therefore never called concurrently.
 *
 * Queue overflow:
 *   - "block": `log` returns a promise that resolves once the record is
 *     admitted. Waiting producers are admitted in call order and later calls
 *     queue up behind them, so nothing is lost or reordered. Producers that
 *     do not await the promise (plain `logger.info` calls) keep adding to the
 *     waiting list, which is unbounded unless `maxWaiting` is set; past that
 *     limit `log` throws a DrainError of kind "rejected".
 *   - "drop": the incoming record is discarded.
 *   - "drop-oldest": the oldest queued record is evicted.
 * Dropped records are counted and, unless `reportDropped` is off, reported to
 * the wrapped drain as one Error-level record carrying a `count` field.
 *
 * Usage:
 *   const drain = new AsyncDrain(fileDrain, { capacity: 1024 });
 *   const log = Logger.root(drain);
 *   ...
 *   await drain.close(); // delivers everything accepted so far
 */

import { setImmediate as nextTurn } from "node:timers/promises";
import { EMPTY_CONTEXT, pair } from "../core/context-chain.js";
import { FieldSet } from "../core/field-set.js";
import { Level } from "../core/level.js";
import { LogRecord, type SourceLocation } from "../core/record.js";
import { DrainError, toDrainError } from "../errors.js";
import type { Drain, DrainErrorHandler, DrainResult } from "../interfaces/drain.js";
import {
  type AsyncDrainConfig,
  type ResolvedAsyncDrainConfig,
  resolveAsyncDrainConfig,
} from "../types/config.js";
import { RingBuffer } from "../utils/ring-buffer.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import { drainEnabled, settle } from "./drain-utils.js";

export const DROPPED_MESSAGE = "async drain dropped records due to queue overflow";

const DROP_REPORT_LOCATION: SourceLocation = Object.freeze({
  file: "<async-drain>",
  line: 0,
  module: "cascade-log",
});

export interface AsyncDrainOptions extends AsyncDrainConfig {
  /** Receives errors the wrapped drain reports on the worker. */
  onError?: DrainErrorHandler;
}

export interface AsyncDrainStats {
  queued: number;
  waiting: number;
  dropped: number;
  delivered: number;
}

export interface AsyncDrainEvents {
  drainError: { error: DrainError; record: LogRecord };
  dropped: { record: LogRecord; total: number };
  idle: { delivered: number };
  closed: { delivered: number; dropped: number };
  /** An `onError` handler or event listener threw on the worker. */
  fault: { error: unknown };
}

interface QueuedRecord {
  readonly record: LogRecord;
  readonly fields: FieldSet;
}

interface WaitingProducer {
  readonly item: QueuedRecord;
  readonly admit: () => void;
}

export class AsyncDrain extends TypedEventEmitter<AsyncDrainEvents> implements Drain {
  private readonly config: ResolvedAsyncDrainConfig;
  private readonly onError: DrainErrorHandler | undefined;
  private readonly queue: RingBuffer<QueuedRecord>;
  private readonly waiting: WaitingProducer[] = [];
  private worker: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  private unreported = 0;
  private droppedTotal = 0;
  private deliveredTotal = 0;

  constructor(
    private readonly inner: Drain,
    options: AsyncDrainOptions = {},
  ) {
    super();
    const { onError, ...config } = options;
    this.config = resolveAsyncDrainConfig(config);
    this.onError = onError;
    this.queue = new RingBuffer(this.config.capacity);
  }

  log(record: LogRecord, fields: FieldSet): DrainResult {
    if (this.closing) {
      throw new DrainError("async drain is closed", "closed");
    }
    const item: QueuedRecord = {
      record,
      fields: this.config.resolveFields ? fields.materialize() : fields,
    };

    if (!this.queue.isFull && this.waiting.length === 0) {
      this.queue.push(item);
      this.start();
      return;
    }

    switch (this.config.overflow) {
      case "drop":
        this.drop(record);
        return;
      case "drop-oldest": {
        const evicted = this.queue.push(item);
        if (evicted) this.drop(evicted.record);
        this.start();
        return;
      }
      case "block": {
        const { maxWaiting } = this.config;
        if (maxWaiting !== undefined && this.waiting.length >= maxWaiting) {
          throw new DrainError(
            `async drain has ${this.waiting.length} producers waiting for room`,
            "rejected",
          );
        }
        return new Promise<void>((resolve) => {
          this.waiting.push({ item, admit: () => resolve() });
          this.start();
        });
      }
    }
  }

  isEnabled(level: Level): boolean {
    return drainEnabled(this.inner, level);
  }

  get stats(): AsyncDrainStats {
    return {
      queued: this.queue.size,
      waiting: this.waiting.length,
      dropped: this.droppedTotal,
      delivered: this.deliveredTotal,
    };
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  /** Resolves once every record accepted so far has been delivered. */
  async flush(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  /**
   * Stop accepting records and deliver everything already accepted,
   * including producers still waiting for room. Idempotent.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.flush().then(() => {
        this.emit("closed", { delivered: this.deliveredTotal, dropped: this.droppedTotal });
      });
    }
    return this.closing;
  }

  // ── Worker ──

  private start(): void {
    if (this.worker) return;
    this.worker = this.run().catch((error: unknown) => {
      this.emit("fault", { error });
    });
  }

  private async run(): Promise<void> {
    let restarted = false;
    try {
      await nextTurn();
      for (;;) {
        if (this.unreported > 0) await this.deliver(this.dropReport());
        const item = this.take();
        if (!item) break;
        await this.deliver(item);
        this.deliveredTotal++;
      }
    } finally {
      this.worker = null;
      if (this.queue.size > 0 || this.unreported > 0) {
        this.start();
        restarted = true;
      }
    }
    if (!restarted) this.emit("idle", { delivered: this.deliveredTotal });
  }

  /** Dequeue the oldest record and admit the longest-waiting producer into the freed slot. */
  private take(): QueuedRecord | undefined {
    const item = this.queue.shift();
    if (item === undefined) return undefined;
    const waiter = this.waiting.shift();
    if (waiter) {
      this.queue.push(waiter.item);
      waiter.admit();
    }
    return item;
  }

  private async deliver(item: QueuedRecord): Promise<void> {
    const outcome = await settle(() => this.inner.log(item.record, item.fields));
    if (outcome.ok) return;
    const error = toDrainError(outcome.error);
    this.onError?.(error, item.record);
    this.emit("drainError", { error, record: item.record });
  }

  private drop(record: LogRecord): void {
    this.droppedTotal++;
    if (this.config.reportDropped) this.unreported++;
    this.emit("dropped", { record, total: this.droppedTotal });
  }

  private dropReport(): QueuedRecord {
    const count = this.unreported;
    this.unreported = 0;
    const record = new LogRecord(Level.Error, DROPPED_MESSAGE, DROP_REPORT_LOCATION);
    return { record, fields: new FieldSet(record, [pair("count", count)], EMPTY_CONTEXT) };
  }
}
