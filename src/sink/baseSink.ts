import { formatShardName } from "../writer/types";
import type { ShardStatsPayload, ShardStatsReport, StatsSink } from "./types";

export abstract class BaseSink implements StatsSink {
  abstract writeStats(report: ShardStatsReport): Promise<void>;

  protected ensureConfigured(name: string, ready: boolean): void {
    if (!ready) {
      throw new Error(`${name} sink is not configured`);
    }
  }

  protected buildPayload(report: ShardStatsReport): ShardStatsPayload {
    const { stats } = report;
    return {
      shardId: stats.shardId,
      shardName: formatShardName(stats.shardId, report.oomShardCount),
      count: stats.totalCount,
      successes: stats.successes,
      failedToDownload: stats.failedToDownload,
      durationSeconds: stats.endTime - stats.startTime,
      startTime: stats.startTime,
      endTime: stats.endTime,
      statusCounts: stats.statusCounts,
    };
  }
}
