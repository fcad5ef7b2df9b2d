import { Field, Schema, Utf8, tableFromIPC } from "apache-arrow";
import type { ColumnValue, ShardRecord } from "../types";

export interface ShardTable {
  columns: string[];
  records: ShardRecord[];
  /** Source schema extended with the fields every written sample carries. */
  schema: Schema;
}

export function toColumnValue(value: unknown): ColumnValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : String(value);
  }
  if (typeof value === "bigint") {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function buildOutputSchema(source: Schema, computeMd5: boolean): Schema {
  const fields = [
    ...source.fields,
    new Field("key", new Utf8(), true),
    new Field("status", new Utf8(), true),
    new Field("error_message", new Utf8(), true),
  ];
  if (computeMd5) {
    fields.push(new Field("md5", new Utf8(), true));
  }
  return new Schema(fields, source.metadata);
}

/**
 * Parses an Arrow IPC file and projects `columnList`, in that order, into one
 * record per row. The parsed table is not retained.
 */
export function readShard(data: Uint8Array, columnList: string[], computeMd5: boolean): ShardTable {
  const table = tableFromIPC(data);
  const vectors = columnList.map((column) => {
    const vector = table.getChild(column);
    if (!vector) {
      throw new Error(`Shard is missing column "${column}"`);
    }
    return vector;
  });

  const records: ShardRecord[] = [];
  for (let index = 0; index < table.numRows; index += 1) {
    records.push({
      index,
      values: vectors.map((vector) => toColumnValue(vector.get(index))),
    });
  }

  return {
    columns: [...columnList],
    records,
    schema: buildOutputSchema(table.schema, computeMd5),
  };
}
