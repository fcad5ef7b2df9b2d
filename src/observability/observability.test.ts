import { afterEach, describe, expect, it, vi } from "vitest";
import { errorFields, Logger } from "./logger";
import { MetricsRegistry } from "./metrics";
import { createRunId } from "./runId";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one JSON line with context, bindings and fields", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = new Logger({ component: "cli", runId: "run_1", minLevel: "debug" }).child("shard", { shardId: 3 });

    logger.info("shard_start", { count: 2 });

    expect(log).toHaveBeenCalledTimes(1);
    const payload = JSON.parse(String(log.mock.calls[0][0]));
    expect(payload).toMatchObject({ level: "info", msg: "shard_start", component: "shard", runId: "run_1", shardId: 3, count: 2 });
  });

  it("drops messages below the minimum level and sends errors to stderr", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new Logger({ component: "test", runId: "run_1", minLevel: "warn" });

    logger.debug("hidden");
    logger.info("hidden");
    logger.error("shown");

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("extracts message and stack from errors", () => {
    const failure = new Error("boom");
    expect(errorFields(failure)).toEqual({ error: "boom", stack: failure.stack });
    expect(errorFields("plain")).toEqual({ error: "plain" });
  });
});

describe("MetricsRegistry", () => {
  it("accumulates counters and summarizes timers", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("downloads_ok");
    metrics.incrementCounter("downloads_ok", 2);
    metrics.startTimer("fetch_ms")();

    expect(metrics.getCounters()).toEqual({
      downloads_ok: 3,
      downloads_failed: 0,
      samples_failed: 0,
      shards_ok: 0,
      shards_failed: 0,
    });
    expect(metrics.getTimerSummaries().fetch_ms.count).toBe(1);
    expect(metrics.getTimerSummaries().shard_ms).toEqual({ count: 0, min: 0, max: 0, avg: 0 });
  });
});

describe("createRunId", () => {
  it("embeds the prefix and timestamp", () => {
    expect(createRunId("run", new Date("2024-05-06T07:08:09.010Z"))).toMatch(/^run_2024-05-06T07-08-09-010Z_[a-z0-9]+$/);
  });
});
