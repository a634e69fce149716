import type { Level } from "../core/level.js";
import type { Drain, DrainResult } from "../interfaces/drain.js";

export type Outcome = { ok: true } | { ok: false; error: unknown };

export function drainEnabled(drain: Drain, level: Level): boolean {
  return drain.isEnabled?.(level) ?? true;
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Run `fn` and capture its outcome without throwing: synchronously for a
 * synchronous drain, as a promise that never rejects for an async one.
 */
export function settle(fn: () => DrainResult): Outcome | Promise<Outcome> {
  let result: DrainResult;
  try {
    result = fn();
  } catch (error) {
    return { ok: false, error };
  }
  if (isPromiseLike(result)) {
    return Promise.resolve(result).then(
      (): Outcome => ({ ok: true }),
      (error: unknown): Outcome => ({ ok: false, error }),
    );
  }
  return { ok: true };
}
