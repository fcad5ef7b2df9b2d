export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  shardId?: number;
  key?: string;
  url?: string;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "downloads_ok"
  | "downloads_failed"
  | "samples_failed"
  | "shards_ok"
  | "shards_failed";

export type MetricTimerName = "fetch_ms" | "shard_ms";
