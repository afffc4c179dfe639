import fs from "node:fs";
import type { JsonObject, JsonValue } from "@evalloop/shared";
import { isJsonObject } from "./configPatches";
import { ChangesetError } from "./errors";

/** The config a changeset patches: one JSON object, read whole. */
export function readBaseConfig(configPath: string): JsonObject {
  if (!fs.existsSync(configPath)) {
    throw new ChangesetError(`Base config not found: ${configPath}`);
  }
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new ChangesetError(`Base config is not valid JSON: ${configPath} (${err instanceof Error ? err.message : String(err)})`);
  }
  if (!isJsonObject(parsed)) {
    throw new ChangesetError(`Base config JSON must be an object: ${configPath}`);
  }
  return parsed;
}
