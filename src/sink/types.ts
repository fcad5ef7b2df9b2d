import type { ShardStats, StatusCounts } from "../types";

export interface ShardStatsReport {
  outputFolder: string;
  oomShardCount: number;
  stats: ShardStats;
}

export interface ShardStatsPayload {
  shardId: number;
  shardName: string;
  count: number;
  successes: number;
  failedToDownload: number;
  durationSeconds: number;
  startTime: number;
  endTime: number;
  statusCounts: StatusCounts;
}

export interface StatsSink {
  writeStats(report: ShardStatsReport): Promise<void>;
}
