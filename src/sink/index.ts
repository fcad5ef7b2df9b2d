import type { AppConfig } from "../config";
import type { FileSystemRegistry } from "../storage";
import { HttpSink } from "./httpSink";
import { LocalJsonSink } from "./localJsonSink";
import { RabbitSink } from "./rabbitSink";
import { SqsSink } from "./sqsSink";
import type { StatsSink } from "./types";

export function createStatsSink(config: AppConfig, fileSystems: FileSystemRegistry): StatsSink {
  switch (config.statsSink) {
    case "local_json":
      return new LocalJsonSink(fileSystems);
    case "sqs":
      return new SqsSink(process.env.SQS_QUEUE_URL);
    case "rabbit":
      return new RabbitSink(process.env.RABBIT_URL);
    case "http":
      return new HttpSink(process.env.HTTP_SINK_ENDPOINT, process.env.HTTP_SINK_TOKEN);
    default:
      throw new Error(`Unsupported stats sink: ${String(config.statsSink)}`);
  }
}

export * from "./baseSink";
export * from "./httpSink";
export * from "./localJsonSink";
export * from "./rabbitSink";
export * from "./sqsSink";
export * from "./types";
