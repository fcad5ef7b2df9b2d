export type ColumnValue = string | number | boolean | null;

export interface ShardDescriptor {
  shardId: number;
  shardPath: string;
}

export interface ShardRecord {
  index: number;
  values: ColumnValue[];
}

export type FetchResult =
  | { index: number; ok: true; content: Buffer }
  | { index: number; ok: false; error: string };

export type SampleStatus = "success" | "failed_to_download";

export interface RecordMetadata {
  key: string;
  status: SampleStatus;
  error_message: string | null;
  md5?: string | null;
  [column: string]: ColumnValue | undefined;
}

export type StatusCounts = Record<string, number>;

export interface ShardStats {
  shardId: number;
  totalCount: number;
  successes: number;
  failedToDownload: number;
  startTime: number;
  endTime: number;
  statusCounts: StatusCounts;
}

export type ShardResult =
  | { ok: true; shardId: number; stats: ShardStats }
  | { ok: false; shardId: number; error: string };
