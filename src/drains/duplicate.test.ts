import { describe, expect, it, vi } from "vitest";
import { Level } from "../core/level.js";
import { lazy } from "../core/value.js";
import { DrainError, DuplicateDrainError } from "../errors.js";
import { DeferredDrain } from "../testing/deferred-drain.js";
import { FailingDrain } from "../testing/failing-drain.js";
import { MemoryDrain } from "../testing/memory-drain.js";
import { makeRecord } from "../testing/record-factories.js";
import { discard } from "./discard.js";
import { Duplicate, duplicate } from "./duplicate.js";

function catchSync(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("Duplicate", () => {
  it("calls both drains with the same record and fields", () => {
    const a = new MemoryDrain();
    const b = new MemoryDrain();
    const { record, fields } = makeRecord(Level.Info, "fan out", { k: 1 });

    expect(new Duplicate(a, b).log(record, fields)).toBeUndefined();

    expect(a.records[0]?.record).toBe(record);
    expect(b.records[0]?.record).toBe(record);
    expect(b.records[0]?.fields).toEqual({ k: 1 });
  });

  it("still calls the second drain when the first fails", () => {
    const failing = new FailingDrain();
    const memory = new MemoryDrain();
    const { record, fields } = makeRecord(Level.Error, "x");

    const error = catchSync(() => new Duplicate(failing, memory).log(record, fields));

    expect(failing.calls).toBe(1);
    expect(memory.messages).toEqual(["x"]);
    expect(error).toBeInstanceOf(DuplicateDrainError);
    if (error instanceof DuplicateDrainError) {
      expect(error.first).toBe(failing.error);
      expect(error.second).toBeUndefined();
      expect(error.cause).toBe(failing.error);
    }
  });

  it("reports both failures in branch order", () => {
    const a = new FailingDrain(new DrainError("disk full", "io"));
    const b = new FailingDrain(new DrainError("bad utf-8", "encoding"));
    const { record, fields } = makeRecord();

    const error = catchSync(() => new Duplicate(a, b).log(record, fields));

    expect(error).toBeInstanceOf(DuplicateDrainError);
    if (error instanceof DuplicateDrainError) {
      expect(error.errors).toEqual([a.error, b.error]);
      expect(error.message).toBe("duplicate drain failed (first: disk full; second: bad utf-8)");
    }
  });

  it("waits for an async branch and rejects if it fails", async () => {
    const memory = new MemoryDrain();
    const failing = new FailingDrain(undefined, "async");
    const { record, fields } = makeRecord();

    const result = new Duplicate(memory, failing).log(record, fields);

    expect(memory.records).toHaveLength(1);
    await expect(result).rejects.toBeInstanceOf(DuplicateDrainError);
    await expect(result).rejects.toMatchObject({ first: undefined, second: failing.error });
  });

  it("resolves only after both async branches complete", async () => {
    const a = new DeferredDrain();
    const b = new DeferredDrain();
    const { record, fields } = makeRecord();
    let done = false;

    const result = new Duplicate(a, b).log(record, fields);
    void Promise.resolve(result).then(() => {
      done = true;
    });

    expect(a.pending).toHaveLength(1);
    expect(b.pending).toHaveLength(1);
    a.releaseNext();
    await Promise.resolve();
    await Promise.resolve();
    expect(done).toBe(false);

    b.releaseNext();
    await result;
    expect(done).toBe(true);
  });

  it("evaluates a lazy field once for both branches", () => {
    const fn = vi.fn(() => "v");
    const a = new MemoryDrain();
    const b = new MemoryDrain();
    const { record, fields } = makeRecord(Level.Info, "x", { k: lazy(fn) });

    new Duplicate(a, b).log(record, fields);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(a.records[0]?.fields).toEqual({ k: "v" });
    expect(b.records[0]?.fields).toEqual({ k: "v" });
  });

  it("runs a throwing lazy field once for both branches", () => {
    let runs = 0;
    const { record, fields } = makeRecord(Level.Info, "x", {
      k: lazy(() => {
        runs++;
        throw new Error("lazy failed");
      }),
    });

    const error = catchSync(() =>
      new Duplicate(new MemoryDrain(), new MemoryDrain()).log(record, fields),
    );

    expect(runs).toBe(1);
    expect(error).toBeInstanceOf(DuplicateDrainError);
    if (error instanceof DuplicateDrainError) {
      expect(error.errors.map((e) => e.message)).toEqual(["lazy failed", "lazy failed"]);
    }
  });

  it("is enabled when either branch is", () => {
    expect(new Duplicate(discard, discard).isEnabled(Level.Info)).toBe(false);
    expect(new Duplicate(discard, new MemoryDrain()).isEnabled(Level.Info)).toBe(true);
  });
});

describe("duplicate()", () => {
  it("returns discard for no drains and the drain itself for one", () => {
    const memory = new MemoryDrain();
    expect(duplicate()).toBe(discard);
    expect(duplicate(memory)).toBe(memory);
  });

  it("delivers to every drain in order", () => {
    const drains = [new MemoryDrain(), new MemoryDrain(), new MemoryDrain()];
    const { record, fields } = makeRecord(Level.Warning, "all");

    duplicate(...drains).log(record, fields);

    expect(drains.map((d) => d.messages)).toEqual([["all"], ["all"], ["all"]]);
  });
});
