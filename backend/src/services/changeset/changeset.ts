/**
 * Canonical Changeset validation, plus conversion from the older planner proposal shape
 * (golden_csv_path, new_tests, nested config_patch object).
 */

import path from "node:path";
import { z } from "zod";
import type { Changeset, JsonValue } from "@evalloop/shared";
import { readBaseConfig } from "./baseConfig";
import { isJsonObject } from "./configPatches";
import { PatchSchemaError } from "./errors";

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const ConfigPatchSchema = z.object({
  path: z.string().min(1),
  op: z.literal("set"),
  value: JsonValueSchema
});

export const ChangesetSchema = z.object({
  base_config_path: z.string().min(1),
  new_config_path: z.string().min(1),
  golden_set_path: z.string().min(1),
  config_patches: z.array(ConfigPatchSchema).default([]),
  new_testcases: z.array(z.record(z.unknown())).default([])
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseChangeset(raw: unknown): Changeset {
  const result = ChangesetSchema.safeParse(raw);
  if (!result.success) {
    const issueText = result.error.issues
      .map((issue) => `${issue.path.join(".") || "changeset"}: ${issue.message}`)
      .join("; ");
    throw new PatchSchemaError(`Invalid changeset: ${issueText}`);
  }
  return result.data;
}

type RawPatch = { path: string; op: "set"; value: unknown };

/**
 * Leaf paths of a nested patch object. An empty nested object means "make sure an object is
 * here": it becomes a set to {} only when `base` holds no object at that path, so an existing
 * subtree is left alone.
 */
export function flattenConfigPatch(patch: Record<string, unknown>, base?: JsonValue, prefix = ""): RawPatch[] {
  const patches: RawPatch[] = [];
  for (const [key, value] of Object.entries(patch)) {
    const patchPath = prefix ? `${prefix}.${key}` : key;
    const baseChild = isJsonObject(base) ? base[key] : undefined;
    if (isPlainObject(value) && Object.keys(value).length > 0) {
      patches.push(...flattenConfigPatch(value, baseChild, patchPath));
    } else if (isPlainObject(value) && isJsonObject(baseChild)) {
      continue;
    } else {
      patches.push({ path: patchPath, op: "set", value });
    }
  }
  return patches;
}

/**
 * Accept either the canonical shape or a legacy proposal and return a validated Changeset.
 * Canonical keys win when both spellings are present; a nested config_patch is applied after
 * any explicit config_patches and is flattened against the base config, which must exist.
 */
export function changesetFromProposal(raw: unknown): Changeset {
  if (!isPlainObject(raw)) {
    throw new PatchSchemaError("Changeset must be a JSON object");
  }

  const { golden_csv_path, new_tests, config_patch, ...rest } = raw;

  let configPatches: unknown = rest.config_patches ?? [];
  if (config_patch !== undefined && config_patch !== null) {
    if (!isPlainObject(config_patch)) {
      throw new PatchSchemaError("config_patch must be an object");
    }
    if (!Array.isArray(configPatches)) {
      throw new PatchSchemaError("config_patches must be a list");
    }
    const basePath = rest.base_config_path;
    const base = typeof basePath === "string" && basePath ? readBaseConfig(path.resolve(process.cwd(), basePath)) : undefined;
    configPatches = [...configPatches, ...flattenConfigPatch(config_patch, base)];
  }

  return parseChangeset({
    ...rest,
    golden_set_path: rest.golden_set_path ?? golden_csv_path,
    config_patches: configPatches,
    new_testcases: rest.new_testcases ?? new_tests ?? []
  });
}
