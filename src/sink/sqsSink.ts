import { SendMessageBatchCommand, SQSClient } from "@aws-sdk/client-sqs";
import { BaseSink } from "./baseSink";
import type { ShardStatsReport } from "./types";

interface SqsClientLike {
  send(command: SendMessageBatchCommand): Promise<{ Failed?: Array<{ Id?: string; SenderFault?: boolean }> }>;
}

export interface SqsSinkOptions {
  queueUrl?: string;
  client?: SqsClientLike;
  fifo?: boolean;
  groupId?: string;
  maxRetries?: number;
  retryDelayMs?: number;
}

interface BatchEntry {
  Id: string;
  MessageBody: string;
  MessageDeduplicationId?: string;
  MessageGroupId?: string;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class SqsSink extends BaseSink {
  private readonly queueUrl?: string;
  private readonly client: SqsClientLike;
  private readonly fifo: boolean;
  private readonly groupId: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(optionsOrQueueUrl?: SqsSinkOptions | string) {
    super();
    const options: SqsSinkOptions =
      typeof optionsOrQueueUrl === "string" ? { queueUrl: optionsOrQueueUrl } : (optionsOrQueueUrl ?? {});

    this.queueUrl = options.queueUrl;
    this.client = options.client ?? new SQSClient({});
    this.fifo = options.fifo ?? Boolean(this.queueUrl?.endsWith(".fifo"));
    this.groupId = options.groupId ?? "shardfetch";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 200;
  }

  async writeStats(report: ShardStatsReport): Promise<void> {
    this.ensureConfigured("SQS", Boolean(this.queueUrl));
    const queueUrl = this.queueUrl ?? "";
    const payload = this.buildPayload(report);

    const entry: BatchEntry = {
      Id: payload.shardName,
      MessageBody: JSON.stringify({
        stage: "shard_stats",
        sentAt: new Date().toISOString(),
        outputFolder: report.outputFolder,
        stats: payload,
      }),
    };

    if (this.fifo) {
      entry.MessageGroupId = this.groupId;
      entry.MessageDeduplicationId = `shard_stats:${payload.shardName}`;
    }

    await this.sendBatchWithRetries(queueUrl, [entry]);
  }

  private async sendBatchWithRetries(queueUrl: string, originalEntries: BatchEntry[]): Promise<void> {
    let pendingEntries = [...originalEntries];
    let attempt = 0;

    while (pendingEntries.length > 0) {
      attempt += 1;
      const command = new SendMessageBatchCommand({
        QueueUrl: queueUrl,
        Entries: pendingEntries,
      });
      const response = await this.client.send(command);

      const failedIds = new Set((response.Failed ?? []).map((f) => f.Id).filter((id): id is string => Boolean(id)));
      if (failedIds.size === 0) {
        return;
      }

      if (attempt > this.maxRetries) {
        throw new Error(`SQS publish failed after retries (${failedIds.size} entries still failed)`);
      }

      pendingEntries = pendingEntries.filter((entry) => failedIds.has(entry.Id));
      await sleep(this.retryDelayMs * attempt);
    }
  }
}
