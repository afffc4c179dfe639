/**
 * Golden set CSV: header row, then one testcase per row.
 * Known columns are id, input, judge_question, expected_behavior; any other column is kept as-is.
 */

import fs from "node:fs";
import Papa from "papaparse";
import type { Testcase } from "@evalloop/shared";

export const GOLDEN_COLUMNS = ["id", "input", "judge_question", "expected_behavior"] as const;

export type GoldenRow = Record<string, string>;

export type GoldenTable = {
  columns: string[];
  rows: GoldenRow[];
};

function cell(value: unknown): string {
  if (value == null) return "";
  return typeof value === "string" ? value : String(value);
}

/**
 * Read every row (including rows with an empty id) so a rewrite can keep them.
 * Null when the file does not exist.
 */
export function readGoldenTable(filePath: string): GoldenTable | null {
  if (!fs.existsSync(filePath)) return null;

  const parsed = Papa.parse<Record<string, unknown>>(fs.readFileSync(filePath, "utf8"), {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.replace(/^\uFEFF/, "").trim()
  });
  const columns = (parsed.meta.fields ?? []).filter((c) => c !== "");
  const rows = parsed.data.map((raw) => {
    const row: GoldenRow = {};
    for (const column of columns) row[column] = cell(raw[column]);
    return row;
  });
  return { columns, rows };
}

/** CSV text for the rows in `columns` order, newline-terminated. Empty string when there is nothing to write. */
export function serializeGoldenRows(columns: string[], rows: GoldenRow[], withHeader: boolean): string {
  const text = Papa.unparse(
    { fields: columns, data: rows.map((row) => columns.map((column) => row[column] ?? "")) },
    { header: withHeader, newline: "\n" }
  );
  return text ? text + "\n" : "";
}

/** Testcases from the golden file, skipping rows without an id. Null when the file does not exist. */
export function loadTestcases(filePath: string): Testcase[] | null {
  const table = readGoldenTable(filePath);
  if (!table) return null;

  const known = new Set<string>(GOLDEN_COLUMNS);
  const testcases: Testcase[] = [];
  for (const row of table.rows) {
    const id = (row.id ?? "").trim();
    if (!id) continue;
    const extra: Record<string, string> = {};
    for (const column of table.columns) {
      if (!known.has(column)) extra[column] = row[column] ?? "";
    }
    testcases.push({
      id,
      input: row.input ?? "",
      judge_question: row.judge_question ?? "",
      expected_behavior: row.expected_behavior ?? "",
      extra
    });
  }
  return testcases;
}
