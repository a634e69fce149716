import type { FieldsInput } from "../core/context-chain.js";
import { Logger } from "../core/logger.js";
import { AsyncDrain } from "../drains/async-drain.js";
import { AtomicSwitch } from "../drains/atomic-switch.js";
import { FilterLevel } from "../drains/filter.js";
import type { Drain, DrainErrorHandler } from "../interfaces/drain.js";
import { type LoggerConfig, type ResolvedLoggerConfig, resolveConfig } from "../types/config.js";

export interface CreateLoggerOptions {
  /** Root context pairs. */
  fields?: FieldsInput;
  /** Receives drain errors from log calls and from the async worker. */
  onError?: DrainErrorHandler;
}

export interface LoggerPipeline {
  logger: Logger;
  /** Outermost drain of the pipeline. */
  drain: Drain;
  config: ResolvedLoggerConfig;
  /** Present when `switchable` is set; swaps the sink at runtime. */
  switch?: AtomicSwitch;
  /** Present when `async` is configured. */
  async?: AsyncDrain;
  /** Deliver queued records and stop the async stage, if any. */
  close(): Promise<void>;
}

/**
 * Assemble `FilterLevel(level, [AsyncDrain]([AtomicSwitch](sink)))` from a
 * validated configuration and a root logger on top of it.
 * Throws ConfigError when the configuration is invalid.
 */
export function createLogger(
  sink: Drain,
  config: LoggerConfig = {},
  options: CreateLoggerOptions = {},
): LoggerPipeline {
  const resolved = resolveConfig(config);

  let drain: Drain = sink;
  let atomicSwitch: AtomicSwitch | undefined;
  let asyncDrain: AsyncDrain | undefined;

  if (resolved.switchable) {
    atomicSwitch = new AtomicSwitch(drain);
    drain = atomicSwitch;
  }
  if (resolved.async) {
    asyncDrain = new AsyncDrain(drain, { ...resolved.async, onError: options.onError });
    drain = asyncDrain;
  }
  drain = new FilterLevel(resolved.level, drain);

  const logger = Logger.root(drain, options.fields, {
    onError: options.onError,
    captureLocation: resolved.captureLocation,
    module: resolved.module,
  });

  return {
    logger,
    drain,
    config: resolved,
    ...(atomicSwitch ? { switch: atomicSwitch } : {}),
    ...(asyncDrain ? { async: asyncDrain } : {}),
    close: async () => {
      await asyncDrain?.close();
    },
  };
}
