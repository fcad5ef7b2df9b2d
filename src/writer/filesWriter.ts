import { joinLocator, type ShardFileSystem } from "../storage";
import type { RecordMetadata } from "../types";
import { formatShardName, type SampleWriter, type SampleWriterOptions } from "./types";

/**
 * One file per successful sample under `<output>/<shard>/`, with its caption and
 * metadata beside it, plus a `<shard>.jsonl` index of every record.
 */
export class FilesSampleWriter implements SampleWriter {
  private readonly fileSystem: ShardFileSystem;
  private readonly shardFolder: string;
  private readonly indexLocator: string;
  private readonly saveCaption: boolean;
  private readonly fieldNames: string[];
  private readonly extension: string;
  private readonly indexLines: string[] = [];

  constructor(options: SampleWriterOptions, fileSystem: ShardFileSystem, extension: string) {
    const shardName = formatShardName(options.shardId, options.oomShardCount);
    this.fileSystem = fileSystem;
    this.shardFolder = joinLocator(options.outputFolder, shardName);
    this.indexLocator = joinLocator(options.outputFolder, `${shardName}.jsonl`);
    this.saveCaption = options.saveCaption;
    this.fieldNames = options.schema.fields.map((field) => field.name);
    this.extension = extension.replace(/^\./, "");
  }

  async write(content: Buffer | null, key: string, caption: string | null, metadata: RecordMetadata): Promise<void> {
    if (content !== null) {
      await this.fileSystem.write(joinLocator(this.shardFolder, `${key}.${this.extension}`), content);
      if (this.saveCaption && caption !== null) {
        await this.fileSystem.write(joinLocator(this.shardFolder, `${key}.txt`), caption);
      }
      await this.fileSystem.write(joinLocator(this.shardFolder, `${key}.json`), JSON.stringify(metadata, null, 2));
    }

    const row = Object.fromEntries(this.fieldNames.map((name) => [name, metadata[name] ?? null]));
    this.indexLines.push(JSON.stringify(row));
  }

  async close(): Promise<void> {
    const content = this.indexLines.length > 0 ? this.indexLines.join("\n") + "\n" : "";
    await this.fileSystem.write(this.indexLocator, content);
  }
}
