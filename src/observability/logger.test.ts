import { describe, expect, it } from "vitest";
import { Logger, parseLogLevel } from "./logger";
import { MetricsRegistry } from "./metrics";

function capture(minLevel?: "debug" | "info" | "warn" | "error"): { logger: Logger; lines: unknown[] } {
  const lines: unknown[] = [];
  const logger = new Logger(
    { component: "test", runId: "run-1" },
    { minLevel, output: (line) => lines.push(JSON.parse(line)) },
  );
  return { logger, lines };
}

describe("Logger", () => {
  it("writes one JSON object per event with the run context", () => {
    const { logger, lines } = capture();

    logger.info("archive_candidate_ok", { identifier: "A", retry: 0 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: "info",
      msg: "archive_candidate_ok",
      component: "test",
      runId: "run-1",
      identifier: "A",
      retry: 0,
    });
  });

  it("drops events below the minimum level", () => {
    const { logger, lines } = capture("warn");

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(lines.map((line) => Reflect.get(Object(line), "msg"))).toEqual(["c", "d"]);
  });

  it("redacts credential-looking fields", () => {
    const { logger, lines } = capture();

    logger.info("discover_start", { token: "test-secret", apiKey: "test-secret", query: "year:1905" });

    expect(lines[0]).toMatchObject({ token: "[redacted]", apiKey: "[redacted]", query: "year:1905" });
  });

  it("keeps level and output in child loggers", () => {
    const { logger, lines } = capture("warn");

    logger.child("ledger").info("hidden");
    logger.child("ledger").warn("shown");

    expect(lines).toEqual([expect.objectContaining({ msg: "shown", component: "ledger", runId: "run-1" })]);
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels only", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

describe("MetricsRegistry", () => {
  it("reports zero for counters never touched and summarizes timers", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("archives_ok");
    metrics.incrementCounter("archives_ok", 2);

    expect(metrics.getCounters()).toMatchObject({ archives_ok: 3, archives_failed: 0 });
    expect(metrics.getTimerSummaries().request_ms).toEqual({ count: 0, min: 0, max: 0, avg: 0, p95: 0 });
  });

  it("prints the summary as one JSON document", () => {
    const metrics = new MetricsRegistry();
    const output: string[] = [];
    metrics.incrementCounter("requests_sent");

    metrics.printSummary((line) => output.push(line));

    expect(output).toHaveLength(1);
    expect(JSON.parse(output[0])).toMatchObject({ msg: "metrics_summary", counters: { requests_sent: 1 } });
  });
});
