/**
 * Usage: npm run apply-changeset -- <changeset.json>
 */

import fs from "node:fs";
import { buildContext } from "../context";
import { changesetFromProposal } from "../services/changeset";

function main(): void {
  const changesetPath = process.argv[2];
  if (!changesetPath) {
    throw new Error("Usage: apply-changeset <changeset.json>");
  }
  const raw: unknown = JSON.parse(fs.readFileSync(changesetPath, "utf8"));
  const result = buildContext().changesetEngine.apply(changesetFromProposal(raw));
  console.log(JSON.stringify(result, null, 2));
}

try {
  main();
} catch (error) {
  console.error("Apply changeset failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
