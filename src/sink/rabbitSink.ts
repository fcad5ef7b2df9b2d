import type { Options } from "amqplib";
import { connect as amqpConnect } from "amqplib";
import { BaseSink } from "./baseSink";
import type { ShardStatsReport } from "./types";

type ConnectFn = (url: string) => Promise<ConnectionLike>;

interface ConnectionLike {
  createConfirmChannel(): Promise<ChannelLike>;
  close(): Promise<void>;
}

interface ChannelLike {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms?(): Promise<void>;
  close(): Promise<void>;
}

export interface RabbitSinkOptions {
  connectionUrl?: string;
  exchange?: string;
  routingKey?: string;
  exchangeType?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  connectFn?: ConnectFn;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RabbitSink extends BaseSink {
  private readonly connectionUrl?: string;
  private readonly exchange: string;
  private readonly routingKey: string;
  private readonly exchangeType: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly connectFn: ConnectFn;

  constructor(optionsOrConnectionUrl?: RabbitSinkOptions | string) {
    super();
    const options: RabbitSinkOptions =
      typeof optionsOrConnectionUrl === "string" ? { connectionUrl: optionsOrConnectionUrl } : (optionsOrConnectionUrl ?? {});

    this.connectionUrl = options.connectionUrl;
    this.exchange = options.exchange ?? "shardfetch";
    this.routingKey = options.routingKey ?? "shard.stats";
    this.exchangeType = options.exchangeType ?? "topic";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.connectFn = options.connectFn ?? (async (url: string): Promise<ConnectionLike> => amqpConnect(url));
  }

  async writeStats(report: ShardStatsReport): Promise<void> {
    this.ensureConfigured("RabbitMQ", Boolean(this.connectionUrl));
    const url = this.connectionUrl ?? "";
    const payload = this.buildPayload(report);
    const body = Buffer.from(
      JSON.stringify({
        stage: "shard_stats",
        sentAt: new Date().toISOString(),
        outputFolder: report.outputFolder,
        stats: payload,
      }),
    );

    let attempt = 0;
    while (true) {
      attempt += 1;
      let connection: ConnectionLike | undefined;
      let channel: ChannelLike | undefined;

      try {
        connection = await this.connectFn(url);
        channel = await connection.createConfirmChannel();
        await channel.assertExchange(this.exchange, this.exchangeType, { durable: true });

        channel.publish(this.exchange, this.routingKey, body, {
          persistent: true,
          contentType: "application/json",
          headers: {
            "x-stage": "shard_stats",
            "x-shard-id": payload.shardId,
            "x-idempotency-key": `shard_stats:${payload.shardName}`,
          },
        });

        if (typeof channel.waitForConfirms === "function") {
          await channel.waitForConfirms();
        }

        await channel.close();
        await connection.close();
        return;
      } catch (error) {
        if (channel) {
          await channel.close().catch(() => undefined);
        }
        if (connection) {
          await connection.close().catch(() => undefined);
        }

        if (attempt > this.maxRetries) {
          throw error;
        }
      }

      await sleep(this.retryDelayMs * attempt);
    }
  }
}
