import type { AppConfig } from "../config";
import { runShard } from "../download";
import type { Logger, MetricsRegistry } from "../observability";
import type { StatsSink } from "../sink";
import type { FileSystemRegistry } from "../storage";
import type { ShardDescriptor, ShardResult } from "../types";
import type { SampleWriterFactory } from "../writer";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fileSystems: FileSystemRegistry;
  writerFactory: SampleWriterFactory;
  statsSink: StatsSink;
}

export async function runDownloadShard(ctx: CommandContext, shard: ShardDescriptor): Promise<ShardResult> {
  ctx.logger.info("download_start", { shardId: shard.shardId, shardPath: shard.shardPath });
  const result = await runShard(
    {
      config: ctx.config,
      logger: ctx.logger,
      metrics: ctx.metrics,
      fileSystems: ctx.fileSystems,
      writerFactory: ctx.writerFactory,
      statsSink: ctx.statsSink,
    },
    shard,
  );

  if (result.ok) {
    ctx.logger.info("download_complete", {
      shardId: result.shardId,
      count: result.stats.totalCount,
      successes: result.stats.successes,
      failedToDownload: result.stats.failedToDownload,
    });
  } else {
    ctx.logger.warn("download_failed", { shardId: result.shardId, error: result.error });
  }
  return result;
}
