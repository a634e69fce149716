/**
 * Context chain — the persistent key-value backbone of the logger hierarchy.
 *
 * Each node holds its own pairs and a shared reference to its parent.
 * Nodes never point at their children, so a hierarchy of loggers forms a
 * cactus stack: siblings share every ancestor without copying it.
 * @module
 */

import { type FieldValue, toValue, type Value } from "./value.js";

export interface KeyValue {
  readonly key: string;
  readonly value: Value;
}

export interface ContextNode {
  readonly own: readonly KeyValue[];
  readonly parent: ContextNode | null;
  /** Number of ancestors; the root node has depth 0. */
  readonly depth: number;
}

/** Object form keeps insertion order (integer-like keys excepted); tuple form keeps order and repeats. */
export type FieldsInput =
  | Readonly<Record<string, FieldValue>>
  | ReadonlyArray<readonly [string, FieldValue]>;

export const EMPTY_CONTEXT: ContextNode = Object.freeze({
  own: Object.freeze([]),
  parent: null,
  depth: 0,
});

export function pair(key: string, value: FieldValue): KeyValue {
  return Object.freeze({ key, value: toValue(value) });
}

function isTupleList(input: FieldsInput): input is ReadonlyArray<readonly [string, FieldValue]> {
  return Array.isArray(input);
}

export function toPairs(input: FieldsInput | undefined): readonly KeyValue[] {
  if (input === undefined) return [];
  const entries: ReadonlyArray<readonly [string, FieldValue]> = isTupleList(input)
    ? input
    : Object.entries(input);
  return Object.freeze(entries.map(([key, value]) => pair(key, value)));
}

/** O(own.length): the parent is referenced, not copied. A null parent makes a root node. */
export function extendContext(parent: ContextNode | null, own: readonly KeyValue[]): ContextNode {
  return Object.freeze({
    own: Object.isFrozen(own) ? own : Object.freeze([...own]),
    parent,
    depth: parent ? parent.depth + 1 : 0,
  });
}

/**
 * Yield the node's own pairs, then each ancestor's, nearest first.
 * Ancestors are only visited as iteration reaches them.
 */
export function* walkContext(node: ContextNode | null): Generator<KeyValue, void, undefined> {
  for (let current = node; current !== null; current = current.parent) {
    yield* current.own;
  }
}
