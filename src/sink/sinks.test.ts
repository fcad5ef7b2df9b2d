import fs from "node:fs";
import path from "node:path";
import type { SendMessageBatchCommand } from "@aws-sdk/client-sqs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FileSystemRegistry } from "../storage";
import { makeTempDir, testConfig } from "../testing/fixtures";
import { createStatsSink, HttpSink, LocalJsonSink, PermanentHttpSinkError, RabbitSink, SqsSink } from "./index";
import type { ShardStatsReport } from "./types";

const report: ShardStatsReport = {
  outputFolder: "out",
  oomShardCount: 4,
  stats: {
    shardId: 12,
    totalCount: 3,
    successes: 2,
    failedToDownload: 1,
    startTime: 100,
    endTime: 102.5,
    statusCounts: { success: 2, "HTTP Error 404: Not Found": 1 },
  },
};

interface RequestLike {
  method: string;
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

const expectedPayload = {
  shardId: 12,
  shardName: "0012",
  count: 3,
  successes: 2,
  failedToDownload: 1,
  durationSeconds: 2.5,
  startTime: 100,
  endTime: 102.5,
  statusCounts: { success: 2, "HTTP Error 404: Not Found": 1 },
};

describe("LocalJsonSink", () => {
  let workDir: string;

  beforeEach(() => {
    workDir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it("writes <shard>_stats.json into the output folder", async () => {
    const sink = new LocalJsonSink(new FileSystemRegistry());
    await sink.writeStats({ ...report, outputFolder: workDir });

    const written = JSON.parse(fs.readFileSync(path.join(workDir, "0012_stats.json"), "utf-8"));
    expect(written).toEqual(expectedPayload);
  });
});

describe("HttpSink", () => {
  it("posts the stats with auth and idempotency headers", async () => {
    const fetchFn = vi.fn(async (_url: string, _init: RequestLike) => ({ ok: true, status: 200, text: async () => "" }));
    const sink = new HttpSink({ endpoint: "https://stats.example.test/shards", token: "test-token", fetchFn });

    await sink.writeStats(report);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://stats.example.test/shards");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      "Idempotency-Key": "shard_stats:out:0012",
      Authorization: "Bearer test-token",
    });
    const body = JSON.parse(init.body);
    expect(body.stage).toBe("shard_stats");
    expect(body.outputFolder).toBe("out");
    expect(body.stats).toEqual(expectedPayload);
  });

  it("retries retriable statuses", async () => {
    const statuses = [503, 200];
    const fetchFn = vi.fn(async () => {
      const status = statuses.shift() ?? 200;
      return { ok: status < 300, status, text: async () => "busy" };
    });
    const sink = new HttpSink({ endpoint: "https://stats.example.test", fetchFn, retryDelayMs: 1 });

    await sink.writeStats(report);

    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("does not retry permanent errors", async () => {
    const fetchFn = vi.fn(async () => ({ ok: false, status: 400, text: async () => "bad request" }));
    const sink = new HttpSink({ endpoint: "https://stats.example.test", fetchFn, retryDelayMs: 1 });

    await expect(sink.writeStats(report)).rejects.toBeInstanceOf(PermanentHttpSinkError);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("refuses to send without an endpoint", async () => {
    await expect(new HttpSink().writeStats(report)).rejects.toThrow("HTTP sink is not configured");
  });
});

describe("SqsSink", () => {
  it("sends one fifo message per shard", async () => {
    const commands: SendMessageBatchCommand[] = [];
    const client = {
      send: async (command: SendMessageBatchCommand) => {
        commands.push(command);
        return {};
      },
    };
    const sink = new SqsSink({ queueUrl: "https://sqs.example.test/stats.fifo", client });

    await sink.writeStats(report);

    expect(commands).toHaveLength(1);
    const entries = commands[0].input.Entries ?? [];
    expect(entries).toHaveLength(1);
    expect(entries[0].Id).toBe("0012");
    expect(entries[0].MessageGroupId).toBe("shardfetch");
    expect(entries[0].MessageDeduplicationId).toBe("shard_stats:0012");
    expect(JSON.parse(entries[0].MessageBody ?? "{}").stats).toEqual(expectedPayload);
  });

  it("resends failed entries until the retry budget runs out", async () => {
    const send = vi.fn(async () => ({ Failed: [{ Id: "0012", SenderFault: false }] }));
    const sink = new SqsSink({ queueUrl: "https://sqs.example.test/stats", client: { send }, maxRetries: 2, retryDelayMs: 1 });

    await expect(sink.writeStats(report)).rejects.toThrow("SQS publish failed after retries (1 entries still failed)");
    expect(send).toHaveBeenCalledTimes(3);
  });
});

describe("RabbitSink", () => {
  it("publishes persistent messages on a confirm channel", async () => {
    const published: Array<{ exchange: string; routingKey: string; content: Buffer }> = [];
    const channel = {
      assertExchange: vi.fn(async () => ({})),
      publish: (exchange: string, routingKey: string, content: Buffer) => {
        published.push({ exchange, routingKey, content });
        return true;
      },
      waitForConfirms: vi.fn(async () => undefined),
      close: vi.fn(async () => undefined),
    };
    const connection = {
      createConfirmChannel: async () => channel,
      close: vi.fn(async () => undefined),
    };
    const sink = new RabbitSink({ connectionUrl: "amqp://localhost", connectFn: async () => connection });

    await sink.writeStats(report);

    expect(channel.assertExchange).toHaveBeenCalledWith("shardfetch", "topic", { durable: true });
    expect(published).toHaveLength(1);
    expect(published[0].routingKey).toBe("shard.stats");
    expect(JSON.parse(published[0].content.toString("utf-8")).stats).toEqual(expectedPayload);
    expect(channel.waitForConfirms).toHaveBeenCalledTimes(1);
    expect(connection.close).toHaveBeenCalledTimes(1);
  });

  it("gives up after the retry budget", async () => {
    const connectFn = vi.fn(async (): Promise<never> => {
      throw new Error("ECONNREFUSED");
    });
    const sink = new RabbitSink({ connectionUrl: "amqp://localhost", connectFn, maxRetries: 1, retryDelayMs: 1 });

    await expect(sink.writeStats(report)).rejects.toThrow("ECONNREFUSED");
    expect(connectFn).toHaveBeenCalledTimes(2);
  });
});

describe("createStatsSink", () => {
  it("builds the configured sink", () => {
    const fileSystems = new FileSystemRegistry();
    expect(createStatsSink(testConfig({ statsSink: "local_json" }), fileSystems)).toBeInstanceOf(LocalJsonSink);
    expect(createStatsSink(testConfig({ statsSink: "http" }), fileSystems)).toBeInstanceOf(HttpSink);
    expect(createStatsSink(testConfig({ statsSink: "rabbit" }), fileSystems)).toBeInstanceOf(RabbitSink);
  });
});
