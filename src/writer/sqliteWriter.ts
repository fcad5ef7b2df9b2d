import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { DataType, type Field } from "apache-arrow";
import { locatorScheme, toLocalPath } from "../storage";
import type { ColumnValue, RecordMetadata } from "../types";
import { formatShardName, type SampleWriter, type SampleWriterOptions } from "./types";

type SqlValue = string | number | Buffer | null;

const CAPTION_COLUMN = "caption";

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function columnAffinity(field: Field): string {
  if (DataType.isInt(field.type) || DataType.isBool(field.type)) {
    return "INTEGER";
  }
  if (DataType.isFloat(field.type) || DataType.isDecimal(field.type)) {
    return "REAL";
  }
  return "TEXT";
}

function toSqlValue(value: ColumnValue | undefined): SqlValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return value;
}

/**
 * One database per shard, `<output>/<shard>.sqlite`, holding a `samples` row per
 * record: the schema fields, the caption when saved, and the content blob.
 *
 * `caption` is always the saved caption column, so a shard that already carries
 * a `caption` field shares it instead of defining it twice.
 */
export class SqliteSampleWriter implements SampleWriter {
  private readonly db: Database.Database;
  private readonly fieldNames: string[];
  private readonly saveCaption: boolean;
  private readonly insert: Database.Statement<SqlValue[]>;

  constructor(options: SampleWriterOptions) {
    if (locatorScheme(options.outputFolder) !== "file") {
      throw new Error(`sqlite output requires a local output folder (got ${options.outputFolder})`);
    }

    const shardName = formatShardName(options.shardId, options.oomShardCount);
    const outputDir = path.resolve(toLocalPath(options.outputFolder));
    fs.mkdirSync(outputDir, { recursive: true });

    this.db = new Database(path.join(outputDir, `${shardName}.sqlite`));
    this.db.pragma("journal_mode = WAL");
    const fields = options.schema.fields.filter((field) => field.name !== CAPTION_COLUMN);
    this.fieldNames = fields.map((field) => field.name);
    this.saveCaption = options.saveCaption;
    this.initializeSchema(fields);

    const columns = [...this.fieldNames, CAPTION_COLUMN, "content"];
    this.insert = this.db.prepare<SqlValue[]>(
      `INSERT OR REPLACE INTO samples (${columns.map(quoteIdentifier).join(", ")})
       VALUES (${columns.map(() => "?").join(", ")})`,
    );
  }

  async write(content: Buffer | null, _key: string, caption: string | null, metadata: RecordMetadata): Promise<void> {
    const values = this.fieldNames.map((name) => toSqlValue(metadata[name]));
    this.insert.run(...values, this.saveCaption ? caption : null, content);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(fields: Field[]): void {
    const definitions = fields.map((field) =>
      field.name === "key"
        ? `${quoteIdentifier(field.name)} TEXT PRIMARY KEY`
        : `${quoteIdentifier(field.name)} ${columnAffinity(field)} NULL`,
    );
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS samples (
        ${[...definitions, `${quoteIdentifier(CAPTION_COLUMN)} TEXT NULL`, "content BLOB NULL"].join(",\n        ")}
      );
    `);
  }
}
