/**
 * Public test utilities — exported from the `"cascade-log/testing"` entry point.
 * Drains for asserting on what a pipeline delivers.
 */
export type { CapturedRecord } from "./testing/memory-drain.js";
export { MemoryDrain } from "./testing/memory-drain.js";
export { FailingDrain } from "./testing/failing-drain.js";
export { DeferredDrain } from "./testing/deferred-drain.js";
export type { RecordInput } from "./testing/record-factories.js";
export { makeRecord } from "./testing/record-factories.js";
