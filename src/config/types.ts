export type OutputFormat = "files" | "sqlite" | "dummy";

export type StatsSinkType = "local_json" | "http" | "sqs" | "rabbit";

export interface AppConfig {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  threadCount: number;
  timeoutMs: number;
  retries: number;
  numberSamplePerShard: number;
  oomShardCount: number;
  computeMd5: boolean;
  columnList: string[];
  saveCaption: boolean;
  outputFolder: string;
  outputFormat: OutputFormat;
  fileExtension: string;
  maxStatusLabels: number;
  statsSink: StatsSinkType;
}

export type ConfigOverrides = Partial<AppConfig>;
