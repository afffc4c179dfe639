/**
 * Usage: npm run compare-configs -- <base.json> <candidate.json>
 */

import fs from "node:fs";
import type { JsonObject, JsonValue } from "@evalloop/shared";
import { isJsonObject } from "../services/changeset/configPatches";
import { compareConfigs } from "../services/reports/compareConfigs";

function readConfig(configPath: string): JsonObject {
  const parsed: JsonValue = JSON.parse(fs.readFileSync(configPath, "utf8"));
  if (!isJsonObject(parsed)) throw new Error(`Config JSON must be an object: ${configPath}`);
  return parsed;
}

try {
  const [basePath, candidatePath] = process.argv.slice(2);
  if (!basePath || !candidatePath) {
    throw new Error("Usage: compare-configs <base.json> <candidate.json>");
  }
  console.log(JSON.stringify(compareConfigs(readConfig(basePath), readConfig(candidatePath)), null, 2));
} catch (error) {
  console.error("Compare configs failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
