import type { Schema } from "apache-arrow";
import type { RecordMetadata } from "../types";

export interface SampleWriterOptions {
  shardId: number;
  outputFolder: string;
  saveCaption: boolean;
  oomShardCount: number;
  schema: Schema;
}

/** Receives exactly one `write` per record, failed ones included, then `close`. */
export interface SampleWriter {
  write(content: Buffer | null, key: string, caption: string | null, metadata: RecordMetadata): Promise<void>;
  close(): Promise<void>;
}

export type SampleWriterFactory = (options: SampleWriterOptions) => Promise<SampleWriter>;

export function formatShardName(shardId: number, oomShardCount: number): string {
  return String(shardId).padStart(oomShardCount, "0");
}
