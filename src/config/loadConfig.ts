import fs from "node:fs";
import path from "node:path";
import type { AppConfig, ConfigOverrides, OutputFormat, StatsSinkType } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  userAgent: "Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:72.0) Gecko/20100101 Firefox/72.0",
  ignoreHttpsErrors: false,
  threadCount: 32,
  timeoutMs: 10_000,
  retries: 0,
  numberSamplePerShard: 1000,
  oomShardCount: 5,
  computeMd5: true,
  columnList: ["url"],
  saveCaption: false,
  outputFolder: "data/output",
  outputFormat: "files",
  fileExtension: "pdf",
  maxStatusLabels: 1000,
  statsSink: "local_json",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function toOutputFormat(value: string | undefined, fallback: OutputFormat): OutputFormat {
  return value === "files" || value === "sqlite" || value === "dummy" ? value : fallback;
}

function toStatsSink(value: string | undefined, fallback: StatsSinkType): StatsSinkType {
  return value === "local_json" || value === "http" || value === "sqs" || value === "rabbit" ? value : fallback;
}

export function validateConfig(config: AppConfig): AppConfig {
  if (!config.columnList.includes("url")) {
    throw new Error(`columnList must include "url" (got ${config.columnList.join(", ")})`);
  }
  if (!Number.isInteger(config.threadCount) || config.threadCount < 1) {
    throw new Error(`threadCount must be a positive integer (got ${config.threadCount})`);
  }
  if (!Number.isInteger(config.timeoutMs) || config.timeoutMs < 1) {
    throw new Error(`timeoutMs must be a positive integer (got ${config.timeoutMs})`);
  }
  if (!Number.isInteger(config.retries) || config.retries < 0) {
    throw new Error(`retries must be a non-negative integer (got ${config.retries})`);
  }
  if (!Number.isInteger(config.numberSamplePerShard) || config.numberSamplePerShard < 1) {
    throw new Error(`numberSamplePerShard must be a positive integer (got ${config.numberSamplePerShard})`);
  }
  if (!Number.isInteger(config.oomShardCount) || config.oomShardCount < 0) {
    throw new Error(`oomShardCount must be a non-negative integer (got ${config.oomShardCount})`);
  }
  return config;
}

export function loadConfig(configPath?: string): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
  };

  return validateConfig({
    ...merged,
    userAgent: process.env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(process.env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    threadCount: toInt(process.env.THREAD_COUNT, merged.threadCount),
    timeoutMs: toInt(process.env.TIMEOUT_MS, merged.timeoutMs),
    retries: toInt(process.env.RETRIES, merged.retries),
    numberSamplePerShard: toInt(process.env.NUMBER_SAMPLE_PER_SHARD, merged.numberSamplePerShard),
    oomShardCount: toInt(process.env.OOM_SHARD_COUNT, merged.oomShardCount),
    computeMd5: toBool(process.env.COMPUTE_MD5, merged.computeMd5),
    columnList: toList(process.env.COLUMN_LIST, merged.columnList),
    saveCaption: toBool(process.env.SAVE_CAPTION, merged.saveCaption),
    outputFolder: process.env.OUTPUT_FOLDER ?? merged.outputFolder,
    outputFormat: toOutputFormat(process.env.OUTPUT_FORMAT, merged.outputFormat),
    fileExtension: process.env.FILE_EXTENSION ?? merged.fileExtension,
    maxStatusLabels: toInt(process.env.MAX_STATUS_LABELS, merged.maxStatusLabels),
    statsSink: toStatsSink(process.env.STATS_SINK, merged.statsSink),
  });
}

export { DEFAULT_CONFIG };
