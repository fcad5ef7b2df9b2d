import { joinLocator, type FileSystemRegistry } from "../storage";
import { BaseSink } from "./baseSink";
import type { ShardStatsReport } from "./types";

/** Writes `<output>/<shard>_stats.json` through the storage layer. */
export class LocalJsonSink extends BaseSink {
  private readonly fileSystems: FileSystemRegistry;

  constructor(fileSystems: FileSystemRegistry) {
    super();
    this.fileSystems = fileSystems;
  }

  async writeStats(report: ShardStatsReport): Promise<void> {
    const payload = this.buildPayload(report);
    const locator = joinLocator(report.outputFolder, `${payload.shardName}_stats.json`);
    await this.fileSystems.resolve(locator).write(locator, JSON.stringify(payload, null, 4));
  }
}
