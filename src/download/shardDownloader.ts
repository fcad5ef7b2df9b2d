import crypto from "node:crypto";
import type { AppConfig } from "../config";
import { errorFields, type Logger, type MetricsRegistry } from "../observability";
import { readShard } from "../shard/arrowShard";
import type { StatsSink } from "../sink";
import type { FileSystemRegistry } from "../storage";
import type { ColumnValue, FetchResult, RecordMetadata, ShardDescriptor, ShardResult, ShardStats } from "../types";
import type { SampleWriterFactory } from "../writer";
import { BackpressureGate } from "./backpressure";
import { CappedCounter } from "./cappedCounter";
import { fetchWithRetry, type FetchLike } from "./fetchEngine";
import { assertKeyRange, computeKey, computeOomSamplePerShard } from "./keys";
import { mapUnordered } from "./workerPool";

export interface ShardDownloaderDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fileSystems: FileSystemRegistry;
  writerFactory: SampleWriterFactory;
  statsSink: StatsSink;
  fetchFn?: FetchLike;
}

/**
 * Downloads every record of one shard, hands each to the writer and reports the
 * shard's statistics. Throws on shard-level failures; per-record failures are
 * logged and skipped.
 */
export async function downloadShard(deps: ShardDownloaderDeps, shard: ShardDescriptor): Promise<ShardStats> {
  const { config, metrics } = deps;
  const logger = deps.logger.child("shard", { shardId: shard.shardId });
  const startTime = Date.now() / 1000;
  const stopTimer = metrics.startTimer("shard_ms");

  if (!config.columnList.includes("url")) {
    throw new Error(`columnList must include "url" (got ${config.columnList.join(", ")})`);
  }

  const fileSystem = deps.fileSystems.resolve(shard.shardPath);
  const { columns, records, schema } = readShard(
    await fileSystem.read(shard.shardPath),
    config.columnList,
    config.computeMd5,
  );

  const oomSamplePerShard = computeOomSamplePerShard(config.numberSamplePerShard);
  assertKeyRange(records.length, shard.shardId, oomSamplePerShard, config.oomShardCount);

  const urlIndex = columns.indexOf("url");
  const captionIndex = columns.indexOf("caption");
  const statusCounts = new CappedCounter(config.maxStatusLabels);
  let successes = 0;
  let failedToDownload = 0;

  logger.info("shard_start", { shardPath: shard.shardPath, count: records.length });

  const gate = new BackpressureGate(config.threadCount * 2);
  const work = gate.admit(
    records.map((record) => {
      const url = record.values[urlIndex];
      return { index: record.index, url: typeof url === "string" ? url : String(url) };
    }),
  );

  const writer = await deps.writerFactory({
    shardId: shard.shardId,
    outputFolder: config.outputFolder,
    saveCaption: config.saveCaption,
    oomShardCount: config.oomShardCount,
    schema,
  });

  const results = mapUnordered(work, config.threadCount, async ({ index, url }): Promise<FetchResult> => {
    const stopFetchTimer = metrics.startTimer("fetch_ms");
    const outcome = await fetchWithRetry(
      url,
      {
        timeoutMs: config.timeoutMs,
        userAgent: config.userAgent,
        ignoreHttpsErrors: config.ignoreHttpsErrors,
        fetchFn: deps.fetchFn,
      },
      config.retries,
    );
    stopFetchTimer();
    return outcome.ok ? { index, ok: true, content: outcome.content } : { index, ok: false, error: outcome.error };
  });

  try {
    for await (const result of results) {
      try {
        const record = records[result.index];
        const key = computeKey(result.index, shard.shardId, oomSamplePerShard, config.oomShardCount);
        const caption = captionIndex >= 0 ? record.values[captionIndex] : null;
        const metadata: RecordMetadata = {
          ...Object.fromEntries(
            columns.map((column, position): [string, ColumnValue] => [column, record.values[position]]),
          ),
          key,
          status: "success",
          error_message: null,
        };
        if (config.computeMd5) {
          metadata.md5 = null;
        }

        if (!result.ok) {
          failedToDownload += 1;
          metrics.incrementCounter("downloads_failed");
          statusCounts.increment(result.error);
          metadata.status = "failed_to_download";
          metadata.error_message = result.error;
          logger.debug("sample_download_failed", { key, url: String(record.values[urlIndex]), error: result.error });
          await writer.write(null, key, caption === null ? null : String(caption), metadata);
        } else {
          successes += 1;
          metrics.incrementCounter("downloads_ok");
          statusCounts.increment("success");
          if (config.computeMd5) {
            metadata.md5 = crypto.createHash("md5").update(result.content).digest("hex");
          }
          await writer.write(result.content, key, caption === null ? null : String(caption), metadata);
        }
      } catch (error) {
        metrics.incrementCounter("samples_failed");
        logger.error("sample_failed", { index: result.index, ...errorFields(error) });
      }
      gate.release();
    }
  } finally {
    await writer.close();
  }

  const endTime = Date.now() / 1000;
  const stats: ShardStats = {
    shardId: shard.shardId,
    totalCount: records.length,
    successes,
    failedToDownload,
    startTime,
    endTime,
    statusCounts: statusCounts.snapshot(),
  };

  await deps.statsSink.writeStats({
    outputFolder: config.outputFolder,
    oomShardCount: config.oomShardCount,
    stats,
  });
  await fileSystem.remove(shard.shardPath);

  logger.info("shard_complete", {
    count: stats.totalCount,
    successes,
    failedToDownload,
    durationMs: stopTimer(),
  });
  return stats;
}

/** Never rejects: a failed shard comes back as `{ ok: false }` with the error message. */
export async function runShard(deps: ShardDownloaderDeps, shard: ShardDescriptor): Promise<ShardResult> {
  try {
    const stats = await downloadShard(deps, shard);
    deps.metrics.incrementCounter("shards_ok");
    return { ok: true, shardId: shard.shardId, stats };
  } catch (error) {
    deps.metrics.incrementCounter("shards_failed");
    deps.logger.error("shard_failed", { shardId: shard.shardId, shardPath: shard.shardPath, ...errorFields(error) });
    return { ok: false, shardId: shard.shardId, error: error instanceof Error ? error.message : String(error) };
  }
}
