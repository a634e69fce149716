import { fileURLToPath } from "node:url";
import { type SourceLocation, UNKNOWN_LOCATION } from "./record.js";

/** Any function; frames at and above it are cut from the captured stack. */
export type StackEntry = (...args: never[]) => unknown;

const FRAME = /^\s*at\s+(?:(.+?)\s+\()?(.+?):(\d+):(\d+)\)?\s*$/;

/**
 * Parse a single V8 stack frame line such as
 * `    at handler (/srv/app/routes.ts:12:5)` or `    at /srv/app/main.ts:3:1`.
 */
export function parseStackFrame(line: string): SourceLocation | undefined {
  const match = FRAME.exec(line);
  if (!match) return undefined;
  const [, fn, rawFile, lineNo, column] = match;
  if (rawFile === undefined || lineNo === undefined || column === undefined) return undefined;

  let file = rawFile;
  if (file.startsWith("file://")) file = fileURLToPath(file);

  const name = fn?.replace(/^async\s+/, "");
  return {
    file,
    line: Number(lineNo),
    column: Number(column),
    ...(name && !name.includes("<anonymous>") ? { function: name } : {}),
  };
}

/**
 * Capture the caller of `entry` now; parse it only when the returned
 * resolver is first called. V8 formats `stack` on first read, so records
 * whose location is never looked at only pay for the capture.
 */
export function captureCallSite(entry: StackEntry, module?: string): () => SourceLocation {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, entry);

  return () => {
    let location: SourceLocation = UNKNOWN_LOCATION;
    for (const line of (holder.stack ?? "").split("\n")) {
      const parsed = parseStackFrame(line);
      if (parsed) {
        location = parsed;
        break;
      }
    }
    return module === undefined ? location : { ...location, module };
  };
}
