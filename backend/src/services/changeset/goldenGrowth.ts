/**
 * Golden set growth. Planning validates and lays out the new rows without touching disk;
 * committing appends when the column set is unchanged and rewrites the file when it grows.
 */

import fs from "node:fs";
import type { NewTestcaseRow } from "@evalloop/shared";
import {
  GOLDEN_COLUMNS,
  readGoldenTable,
  serializeGoldenRows,
  type GoldenRow,
  type GoldenTable
} from "../golden/goldenSet";
import { writeFileAtomic } from "../../utils/atomicWrite";
import { RequiredFieldMissingError } from "./errors";

export const REQUIRED_TESTCASE_FIELDS = ["input", "judge_question", "expected_behavior"] as const;

export type GoldenWriteMode = "none" | "create" | "append" | "rewrite";

export type GoldenPlan = {
  goldenPath: string;
  mode: GoldenWriteMode;
  columns: string[];
  existing: GoldenTable | null;
  newRows: GoldenRow[];
  appendedIds: string[];
};

/** max(integer ids, 0) + 1, exact for ids of any length. Non-integer ids are ignored. */
export function nextTestcaseId(ids: string[]): bigint {
  let max = 0n;
  for (const id of ids) {
    const trimmed = id.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) continue;
    const value = BigInt(trimmed);
    if (value > max) max = value;
  }
  return max + 1n;
}

/** Strings as-is, null/undefined as an empty cell, everything else as JSON. */
function toCell(value: unknown): string {
  if (value == null) return "";
  if (typeof value === "string") return value;
  return JSON.stringify(value) ?? String(value);
}

function hasId(value: unknown): boolean {
  return value != null && toCell(value) !== "";
}

export function planGoldenAppend(goldenPath: string, newTestcases: NewTestcaseRow[]): GoldenPlan {
  newTestcases.forEach((row, index) => {
    for (const field of REQUIRED_TESTCASE_FIELDS) {
      if (row[field] == null) throw new RequiredFieldMissingError(field, index);
    }
  });

  const table = readGoldenTable(goldenPath);
  const existing = table && table.columns.length > 0 ? table : null;
  const baseColumns = existing ? existing.columns : [...GOLDEN_COLUMNS];

  if (newTestcases.length === 0) {
    return { goldenPath, mode: "none", columns: existing ? existing.columns : [], existing, newRows: [], appendedIds: [] };
  }

  let nextId = nextTestcaseId((existing?.rows ?? []).map((row) => row.id ?? ""));
  const columns = [...baseColumns];
  const newRows: GoldenRow[] = [];
  const appendedIds: string[] = [];

  for (const testcase of newTestcases) {
    const id = hasId(testcase.id) ? toCell(testcase.id) : String(nextId++);
    const row: GoldenRow = { id };
    for (const [key, value] of Object.entries(testcase)) {
      if (key === "id") continue;
      row[key] = toCell(value);
    }
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) columns.push(key);
    }
    newRows.push(row);
    appendedIds.push(id);
  }

  let mode: GoldenWriteMode = "append";
  if (!existing) mode = "create";
  else if (columns.length > existing.columns.length) mode = "rewrite";

  return { goldenPath, mode, columns, existing, newRows, appendedIds };
}

export function commitGoldenPlan(plan: GoldenPlan): void {
  const { goldenPath, columns, newRows } = plan;
  switch (plan.mode) {
    case "none":
      return;
    case "create":
      writeFileAtomic(goldenPath, serializeGoldenRows(columns, newRows, true));
      return;
    case "rewrite": {
      const priorRows = plan.existing ? plan.existing.rows : [];
      writeFileAtomic(goldenPath, serializeGoldenRows(columns, [...priorRows, ...newRows], true));
      return;
    }
    case "append": {
      const current = fs.readFileSync(goldenPath, "utf8");
      const separator = current.length > 0 && !current.endsWith("\n") ? "\n" : "";
      fs.appendFileSync(goldenPath, separator + serializeGoldenRows(columns, newRows, false), "utf8");
      return;
    }
  }
}
