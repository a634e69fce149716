export class CascadeLogError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CascadeLogError";
    this.code = code;
  }
}

// ── Drain errors ──

/** What went wrong inside a sink. */
export type DrainErrorKind = "io" | "encoding" | "rejected" | "closed" | "unknown";

export class DrainError extends CascadeLogError {
  readonly kind: DrainErrorKind;

  constructor(message: string, kind: DrainErrorKind = "unknown", options?: ErrorOptions) {
    super(message, "DRAIN", options);
    this.name = "DrainError";
    this.kind = kind;
  }
}

/**
 * Outcome of a Duplicate whose branches did not both succeed.
 * `first` and `second` hold the failure of each branch, if any.
 */
export class DuplicateDrainError extends DrainError {
  readonly first: DrainError | undefined;
  readonly second: DrainError | undefined;

  constructor(first: DrainError | undefined, second: DrainError | undefined) {
    const parts: string[] = [];
    if (first) parts.push(`first: ${first.message}`);
    if (second) parts.push(`second: ${second.message}`);
    super(`duplicate drain failed (${parts.join("; ")})`, "unknown", {
      cause: first ?? second,
    });
    this.name = "DuplicateDrainError";
    this.first = first;
    this.second = second;
  }

  /** Failures in branch order. */
  get errors(): DrainError[] {
    return [this.first, this.second].filter((e): e is DrainError => e !== undefined);
  }
}

export class ConfigError extends CascadeLogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to DrainError (preserves cause chain). */
export function toDrainError(value: unknown): DrainError {
  if (value instanceof DrainError) return value;
  if (value instanceof Error) return new DrainError(value.message, "unknown", { cause: value });
  return new DrainError(String(value ?? "Unknown error"), "unknown");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
