import { asyncDrainConfigSchema, loggerConfigSchema } from "../config/config-schema.js";
import { Level } from "../core/level.js";
import { ConfigError } from "../errors.js";

export type OverflowStrategy = "block" | "drop" | "drop-oldest";

/** Async drain tuning */
export interface AsyncDrainConfig {
  capacity?: number; // default: 128
  overflow?: OverflowStrategy; // default: "block"
  reportDropped?: boolean; // default: true
  resolveFields?: boolean; // default: false (lazy values run on the worker)
  maxWaiting?: number; // default: unbounded; "block" producers allowed to wait
}

export interface ResolvedAsyncDrainConfig {
  capacity: number;
  overflow: OverflowStrategy;
  reportDropped: boolean;
  resolveFields: boolean;
  maxWaiting: number | undefined;
}

/** Pipeline configuration for `createLogger` */
export interface LoggerConfig {
  level?: Level | string; // default: Level.Info
  captureLocation?: boolean; // default: true
  module?: string;
  switchable?: boolean; // default: false
  async?: AsyncDrainConfig; // default: synchronous delivery
}

export interface ResolvedLoggerConfig {
  level: Level;
  captureLocation: boolean;
  module: string | undefined;
  switchable: boolean;
  async: ResolvedAsyncDrainConfig | undefined;
}

export const DEFAULT_ASYNC_CONFIG: ResolvedAsyncDrainConfig = {
  capacity: 128,
  overflow: "block",
  reportDropped: true,
  resolveFields: false,
  maxWaiting: undefined,
};

export const DEFAULT_CONFIG: ResolvedLoggerConfig = {
  level: Level.Info,
  captureLocation: true,
  module: undefined,
  switchable: false,
  async: undefined,
};

function withAsyncDefaults(config: AsyncDrainConfig): ResolvedAsyncDrainConfig {
  return {
    capacity: config.capacity ?? DEFAULT_ASYNC_CONFIG.capacity,
    overflow: config.overflow ?? DEFAULT_ASYNC_CONFIG.overflow,
    reportDropped: config.reportDropped ?? DEFAULT_ASYNC_CONFIG.reportDropped,
    resolveFields: config.resolveFields ?? DEFAULT_ASYNC_CONFIG.resolveFields,
    maxWaiting: config.maxWaiting ?? DEFAULT_ASYNC_CONFIG.maxWaiting,
  };
}

export function resolveAsyncDrainConfig(config: AsyncDrainConfig = {}): ResolvedAsyncDrainConfig {
  const validation = asyncDrainConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`);
  }
  return withAsyncDefaults(validation.data);
}

export function resolveConfig(config: LoggerConfig = {}): ResolvedLoggerConfig {
  const validation = loggerConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`);
  }

  const data = validation.data;
  return {
    level: data.level ?? DEFAULT_CONFIG.level,
    captureLocation: data.captureLocation ?? DEFAULT_CONFIG.captureLocation,
    module: data.module ?? DEFAULT_CONFIG.module,
    switchable: data.switchable ?? DEFAULT_CONFIG.switchable,
    async: data.async ? withAsyncDefaults(data.async) : DEFAULT_CONFIG.async,
  };
}
