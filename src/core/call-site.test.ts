import { describe, expect, it } from "vitest";
import { captureCallSite, parseStackFrame } from "./call-site.js";
import { Level } from "./level.js";
import { LogRecord, type SourceLocation } from "./record.js";

describe("parseStackFrame", () => {
  it("parses a named frame", () => {
    expect(parseStackFrame("    at handleRequest (/srv/app/routes.ts:12:5)")).toEqual({
      file: "/srv/app/routes.ts",
      line: 12,
      column: 5,
      function: "handleRequest",
    });
  });

  it("parses an anonymous frame without parentheses", () => {
    expect(parseStackFrame("    at /srv/app/main.ts:3:1")).toEqual({
      file: "/srv/app/main.ts",
      line: 3,
      column: 1,
    });
  });

  it("strips the async marker from the function name", () => {
    expect(parseStackFrame("    at async loadUser (/srv/app/users.ts:40:11)")?.function).toBe(
      "loadUser",
    );
  });

  it("drops <anonymous> function names", () => {
    const parsed = parseStackFrame("    at Object.<anonymous> (/srv/app/index.ts:1:9)");
    expect(parsed).toEqual({ file: "/srv/app/index.ts", line: 1, column: 9 });
  });

  it("converts file URLs to paths", () => {
    expect(parseStackFrame("    at start (file:///srv/app/esm.js:7:2)")?.file).toBe(
      "/srv/app/esm.js",
    );
  });

  it("returns undefined for lines that are not frames", () => {
    expect(parseStackFrame("Error: boom")).toBeUndefined();
    expect(parseStackFrame("    at <anonymous>")).toBeUndefined();
  });
});

describe("captureCallSite", () => {
  function entryPoint(): () => SourceLocation {
    return captureCallSite(entryPoint);
  }

  it("resolves to the frame that called the entry function", () => {
    const resolve = entryPoint();
    const location = resolve();
    expect(location.file).toContain("call-site.test.ts");
    expect(location.line).toBeGreaterThan(0);
  });

  it("attaches the module name when given", () => {
    function tagged(): () => SourceLocation {
      return captureCallSite(tagged, "billing");
    }
    const location = tagged()();
    expect(location.module).toBe("billing");
    expect(location.file).toContain("call-site.test.ts");
  });
});

describe("LogRecord.location", () => {
  it("resolves a lazy location once", () => {
    let calls = 0;
    const record = new LogRecord(Level.Info, "hello", () => {
      calls++;
      return { file: "a.ts", line: 1 };
    });

    expect(calls).toBe(0);
    expect(record.location).toEqual({ file: "a.ts", line: 1 });
    expect(record.location).toEqual({ file: "a.ts", line: 1 });
    expect(calls).toBe(1);
  });

  it("defaults to an unknown location", () => {
    expect(new LogRecord(Level.Info, "x").location).toEqual({ file: "<unknown>", line: 0 });
  });
});
