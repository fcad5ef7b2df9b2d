import type { AppConfig } from "../config";
import type { FileSystemRegistry } from "../storage";
import { DummySampleWriter } from "./dummyWriter";
import { FilesSampleWriter } from "./filesWriter";
import { SqliteSampleWriter } from "./sqliteWriter";
import type { SampleWriterFactory } from "./types";

export function createWriterFactory(config: AppConfig, fileSystems: FileSystemRegistry): SampleWriterFactory {
  switch (config.outputFormat) {
    case "files":
      return async (options) =>
        new FilesSampleWriter(options, fileSystems.resolve(options.outputFolder), config.fileExtension);
    case "sqlite":
      return async (options) => new SqliteSampleWriter(options);
    case "dummy":
      return async () => new DummySampleWriter();
    default:
      throw new Error(`Unsupported output format: ${String(config.outputFormat)}`);
  }
}

export * from "./dummyWriter";
export * from "./filesWriter";
export * from "./sqliteWriter";
export * from "./types";
