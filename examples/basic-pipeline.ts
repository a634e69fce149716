/**
 * Example: a request-scoped logging pipeline
 *
 * JSON lines on stderr behind an async stage, a second audit drain for
 * warnings and above, and per-request child loggers with lazy fields.
 */

import {
  createLogger,
  DrainErrorMonitor,
  duplicate,
  FilterLevel,
  JsonLinesDrain,
  Level,
  lazy,
} from "../src/index.js";

const auditLines: string[] = [];
const monitor = new DrainErrorMonitor();

const sink = duplicate(
  new JsonLinesDrain({ location: true }),
  new FilterLevel(Level.Warning, new JsonLinesDrain({ writer: (line) => auditLines.push(line) })),
);

const pipeline = createLogger(
  sink,
  { level: process.env.LOG_LEVEL ?? "info", module: "example", async: { capacity: 256 } },
  { fields: { service: "checkout", pid: process.pid }, onError: monitor.handler },
);

function handleRequest(requestId: string, items: number[]): void {
  const log = pipeline.logger.child({ requestId });
  log.debug("cart contents", { items: lazy(() => items.join(",")) });

  const total = items.reduce((sum, n) => sum + n, 0);
  if (total > 100) {
    log.warn("large order", { total });
  }
  log.info("order placed", { total, count: items.length });
}

handleRequest("r-1", [10, 20]);
handleRequest("r-2", [60, 70]);

await pipeline.close();
process.stderr.write(`audit drain kept ${auditLines.length} line(s)\n`);
process.stderr.write(`drain errors: ${monitor.getCounts().total}\n`);
