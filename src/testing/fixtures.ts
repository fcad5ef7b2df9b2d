import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { tableFromArrays, tableToIPC } from "apache-arrow";
import { DEFAULT_CONFIG, type AppConfig } from "../config";
import type { HttpResponseLike } from "../download/fetchEngine";
import { Logger } from "../observability";
import type { RecordMetadata } from "../types";
import type { SampleWriter, SampleWriterOptions } from "../writer";

export function makeTempDir(prefix = "shardfetch-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

export function quietLogger(): Logger {
  return new Logger({ component: "test", runId: "run_test", minLevel: "error" });
}

export function writeShardFile(dir: string, name: string, columns: Record<string, string[]>): string {
  const bytes = tableToIPC(tableFromArrays(columns), "file");
  const shardPath = path.join(dir, name);
  fs.writeFileSync(shardPath, bytes);
  return shardPath;
}

function toArrayBuffer(bytes: Buffer): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.length);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

export function okResponse(body: string): HttpResponseLike {
  const bytes = Buffer.from(body);
  return {
    ok: true,
    status: 200,
    statusText: "OK",
    body: null,
    arrayBuffer: async () => toArrayBuffer(bytes),
  };
}

export function statusResponse(status: number, statusText: string, onCancel?: () => void): HttpResponseLike {
  return {
    ok: false,
    status,
    statusText,
    body: {
      cancel: async () => {
        onCancel?.();
      },
    },
    arrayBuffer: async () => new ArrayBuffer(0),
  };
}

export interface RecordedWrite {
  content: Buffer | null;
  key: string;
  caption: string | null;
  metadata: RecordMetadata;
}

export class RecordingWriter implements SampleWriter {
  readonly writes: RecordedWrite[] = [];
  closed = false;

  constructor(
    readonly options: SampleWriterOptions,
    private readonly beforeWrite?: (key: string) => Promise<void>,
  ) {}

  async write(content: Buffer | null, key: string, caption: string | null, metadata: RecordMetadata): Promise<void> {
    await this.beforeWrite?.(key);
    this.writes.push({ content, key, caption, metadata: { ...metadata } });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
