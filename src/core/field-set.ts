import { type ContextNode, type KeyValue, walkContext } from "./context-chain.js";
import type { RecordView } from "./record.js";
import { evaluate, type Scalar } from "./value.js";

/**
 * The fields of one log call, in most-specific-first order:
 * call-site pairs, then the logger's own pairs, then each ancestor's pairs
 * from nearest to furthest. Keys are never deduplicated; when a consumer
 * wants one value per key, the most specific one wins (see `toObject`).
 *
 * Nothing is evaluated by iterating. Lazy values run on `resolve`, at most
 * once per FieldSet, so drains sharing a FieldSet share the result.
 */
type Resolved = { ok: true; value: Scalar } | { ok: false; error: unknown };

export class FieldSet implements Iterable<KeyValue> {
  private readonly resolved = new Map<KeyValue, Resolved>();

  constructor(
    readonly record: RecordView,
    private readonly callSite: readonly KeyValue[],
    private readonly context: ContextNode,
  ) {}

  *[Symbol.iterator](): Iterator<KeyValue> {
    yield* this.callSite;
    yield* walkContext(this.context);
  }

  /** A lazy value that throws is not run again; later calls rethrow the same error. */
  resolve(kv: KeyValue): Scalar {
    if (kv.value.kind === "eager") return kv.value.value;
    let result = this.resolved.get(kv);
    if (result === undefined) {
      try {
        result = { ok: true, value: evaluate(kv.value, this.record) };
      } catch (error) {
        result = { ok: false, error };
      }
      this.resolved.set(kv, result);
    }
    if (!result.ok) throw result.error;
    return result.value;
  }

  /** Resolved `[key, value]` pairs, evaluated one at a time as iteration reaches them. */
  *entries(): Generator<[string, Scalar], void, undefined> {
    for (const kv of this) {
      yield [kv.key, this.resolve(kv)];
    }
  }

  /** One entry per key; the first (most specific) occurrence wins. */
  toObject(): Record<string, Scalar> {
    const seen = new Map<string, Scalar>();
    for (const kv of this) {
      if (!seen.has(kv.key)) seen.set(kv.key, this.resolve(kv));
    }
    return Object.fromEntries(seen);
  }

  /** Evaluate every lazy value now. */
  materialize(): this {
    for (const kv of this) this.resolve(kv);
    return this;
  }
}
