import { isDeepStrictEqual } from "node:util";
import type { JsonObject, JsonValue } from "@evalloop/shared";
import { isJsonObject } from "../changeset/configPatches";

export type ConfigDiff = {
  changed_top_level_keys: string[];
  changed_paths: string[];
};

function collectChangedPaths(base: JsonValue | undefined, candidate: JsonValue | undefined, prefix: string, out: string[]): void {
  if (isJsonObject(base) && isJsonObject(candidate)) {
    const keys = new Set([...Object.keys(base), ...Object.keys(candidate)]);
    for (const key of keys) {
      collectChangedPaths(base[key], candidate[key], prefix ? `${prefix}.${key}` : key, out);
    }
    return;
  }
  if (!isDeepStrictEqual(base, candidate)) out.push(prefix);
}

/** Which keys a changeset touched: top-level keys and leaf dot paths, both sorted. */
export function compareConfigs(base: JsonObject, candidate: JsonObject): ConfigDiff {
  const changed_paths: string[] = [];
  collectChangedPaths(base, candidate, "", changed_paths);
  changed_paths.sort();
  const changed_top_level_keys = [...new Set(changed_paths.map((p) => p.split(".")[0]))].sort();
  return { changed_top_level_keys, changed_paths };
}
