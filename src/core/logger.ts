/**
 * Logger — an immutable handle pairing a context node with a shared drain.
 *
 * `child()` adds pairs without copying the ancestors'. Every log call builds
 * a record and a lazy FieldSet and hands both to the drain; drain failures
 * go to `onError` and never reach the caller.
 *
 * Usage:
 *   const root = Logger.root(drain, { service: "billing" });
 *   const reqLog = root.child({ requestId });
 *   reqLog.info("charged card", { amount, receipt: lazy(() => render(receipt)) });
 * @module
 */

import { type Outcome, drainEnabled, settle } from "../drains/drain-utils.js";
import { toDrainError } from "../errors.js";
import type { Drain, DrainErrorHandler } from "../interfaces/drain.js";
import { captureCallSite, type StackEntry } from "./call-site.js";
import { type ContextNode, extendContext, type FieldsInput, toPairs } from "./context-chain.js";
import { FieldSet } from "./field-set.js";
import { Level } from "./level.js";
import { LogRecord, type SourceLocation, UNKNOWN_LOCATION } from "./record.js";

export interface LoggerOptions {
  /** Receives drain errors swallowed by log calls. Anything it throws is discarded. */
  onError?: DrainErrorHandler;
  /** Record the application call site on each record (default: true). */
  captureLocation?: boolean;
  /** Reported as `location.module` on every record. */
  module?: string;
  clock?: () => Date;
}

interface ResolvedLoggerOptions {
  readonly onError: DrainErrorHandler | undefined;
  readonly captureLocation: boolean;
  readonly module: string | undefined;
  readonly clock: () => Date;
}

export class Logger {
  private constructor(
    readonly drain: Drain,
    readonly context: ContextNode,
    private readonly options: ResolvedLoggerOptions,
  ) {
    Object.freeze(this);
  }

  static root(drain: Drain, fields?: FieldsInput, options: LoggerOptions = {}): Logger {
    return new Logger(drain, extendContext(null, toPairs(fields)), {
      onError: options.onError,
      captureLocation: options.captureLocation ?? true,
      module: options.module,
      clock: options.clock ?? (() => new Date()),
    });
  }

  /** A logger sharing this one's drain and options, with `fields` in front of its context. */
  child(fields: FieldsInput): Logger {
    return new Logger(this.drain, extendContext(this.context, toPairs(fields)), this.options);
  }

  isEnabled(level: Level): boolean {
    return drainEnabled(this.drain, level);
  }

  log(level: Level, message: string, fields?: FieldsInput): void {
    void this.dispatch(level, message, fields, this.log);
  }

  /** Like `log`, but resolves once the drain has accepted the record. Never rejects. */
  async logAsync(level: Level, message: string, fields?: FieldsInput): Promise<void> {
    await this.dispatch(level, message, fields, this.logAsync);
  }

  critical(message: string, fields?: FieldsInput): void {
    void this.dispatch(Level.Critical, message, fields, this.critical);
  }

  error(message: string, fields?: FieldsInput): void {
    void this.dispatch(Level.Error, message, fields, this.error);
  }

  warn(message: string, fields?: FieldsInput): void {
    void this.dispatch(Level.Warning, message, fields, this.warn);
  }

  info(message: string, fields?: FieldsInput): void {
    void this.dispatch(Level.Info, message, fields, this.info);
  }

  debug(message: string, fields?: FieldsInput): void {
    void this.dispatch(Level.Debug, message, fields, this.debug);
  }

  trace(message: string, fields?: FieldsInput): void {
    void this.dispatch(Level.Trace, message, fields, this.trace);
  }

  private dispatch(
    level: Level,
    message: string,
    fields: FieldsInput | undefined,
    entry: StackEntry,
  ): Promise<void> | undefined {
    if (!drainEnabled(this.drain, level)) return undefined;

    const record = new LogRecord(level, message, this.locate(entry), this.options.clock());
    const fieldSet = new FieldSet(record, toPairs(fields), this.context);
    const outcome = settle(() => this.drain.log(record, fieldSet));

    if (outcome instanceof Promise) {
      return outcome.then((settled) => this.report(settled, record));
    }
    this.report(outcome, record);
    return undefined;
  }

  private locate(entry: StackEntry): SourceLocation | (() => SourceLocation) {
    const { captureLocation, module } = this.options;
    if (captureLocation) return captureCallSite(entry, module);
    return module === undefined ? UNKNOWN_LOCATION : { ...UNKNOWN_LOCATION, module };
  }

  /** A throwing handler is contained here; log calls never throw or reject. */
  private report(outcome: Outcome, record: LogRecord): void {
    const { onError } = this.options;
    if (outcome.ok || !onError) return;
    const error = toDrainError(outcome.error);
    void settle(() => onError(error, record));
  }
}
