/**
 * Field values: either held now (eager) or computed on demand (lazy).
 *
 * A lazy value's function is only called when a drain actually serializes
 * the field. It may run after the logging call has returned (for example on
 * the Async drain's worker), so it receives the record instead of relying on
 * anything from the call site's stack.
 * @module
 */

import type { RecordView } from "./record.js";

export type Scalar = string | number | boolean | bigint | null | undefined | Error;

export type LazyFn = (record: RecordView) => Scalar;

/** Marks objects created by `eager` and `lazy`. */
export const VALUE_BRAND = Symbol("cascade-log.value");

export interface EagerValue {
  readonly [VALUE_BRAND]: true;
  readonly kind: "eager";
  readonly value: Scalar;
}

export interface LazyValue {
  readonly [VALUE_BRAND]: true;
  readonly kind: "lazy";
  readonly fn: LazyFn;
}

export type Value = EagerValue | LazyValue;

/** What callers may pass as a field: a plain scalar or a wrapped value. */
export type FieldValue = Scalar | Value;

export function eager(value: Scalar): EagerValue {
  const result: EagerValue = { [VALUE_BRAND]: true, kind: "eager", value };
  return Object.freeze(result);
}

export function lazy(fn: LazyFn): LazyValue {
  const result: LazyValue = { [VALUE_BRAND]: true, kind: "lazy", fn };
  return Object.freeze(result);
}

export function isValue(input: unknown): input is Value {
  return typeof input === "object" && input !== null && VALUE_BRAND in input;
}

export function toValue(input: FieldValue): Value {
  return isValue(input) ? input : eager(input);
}

/** Read an eager value or run a lazy one. */
export function evaluate(value: Value, record: RecordView): Scalar {
  return value.kind === "eager" ? value.value : value.fn(record);
}
