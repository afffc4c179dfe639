/**
 * Append-only JSONL log. Each append adds a generated id and a UTC timestamp and writes one
 * complete line; load scans the whole file. No compaction, no index, one writer per file.
 */

import fs from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import type { CorruptRecord, LogRecord } from "@evalloop/shared";

export type FilterValue = string | number | boolean | null;

export type LoadOptions = {
  /** Equality on top-level fields, applied after parsing. Undefined values are ignored. */
  filters?: Record<string, FilterValue | undefined>;
  /** Keep only the last N matching records. */
  limit?: number;
};

function isRecord(value: unknown): value is LogRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseLine(line: string): LogRecord {
  try {
    const parsed: unknown = JSON.parse(line);
    if (isRecord(parsed)) return parsed;
  } catch {
    // falls through to the corrupt marker
  }
  const corrupt: CorruptRecord = { _raw_line: line, error: "failed_to_parse_json" };
  return corrupt;
}

function matches(record: LogRecord, filters: LoadOptions["filters"]): boolean {
  if (!filters) return true;
  for (const [key, expected] of Object.entries(filters)) {
    if (expected === undefined) continue;
    if (record[key] !== expected) return false;
  }
  return true;
}

export class JsonlRecordStore {
  constructor(
    readonly filePath: string,
    protected readonly idField: string
  ) {}

  /**
   * Write a copy of `entry` with the id field and timestamp set. Returns the new id.
   * Throws if the entry cannot be serialized or the file cannot be written.
   */
  append(entry: Record<string, unknown>): string {
    const id = randomUUID();
    const timestamp = new Date().toISOString();
    const record: LogRecord = { [this.idField]: id, timestamp, ...this.prepare(entry) };
    record[this.idField] = id;
    record.timestamp = timestamp;

    const line = JSON.stringify(record) + "\n";
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, line, "utf8");
    return id;
  }

  load(options: LoadOptions = {}): LogRecord[] {
    if (!fs.existsSync(this.filePath)) return [];

    const records: LogRecord[] = [];
    for (const rawLine of fs.readFileSync(this.filePath, "utf8").split("\n")) {
      const line = rawLine.trim();
      if (!line) continue;
      const record = parseLine(line);
      if (matches(record, options.filters)) records.push(record);
    }

    const { limit } = options;
    if (limit === undefined) return records;
    if (limit <= 0) return [];
    return records.length > limit ? records.slice(-limit) : records;
  }

  /** Hook for subclasses to normalize fields before the record is written. */
  protected prepare(entry: Record<string, unknown>): Record<string, unknown> {
    return entry;
  }
}
