/**
 * Usage: npm run eval -- [version_id]
 * Runs the golden set against the subject, prints the summary and distills memories.
 */

import { buildContext } from "../context";
import { isEvalRunError } from "../services/evaluation";
import { distillMemories } from "../services/records/distill";

async function main(): Promise<void> {
  const versionId = process.argv[2];
  const context = buildContext();
  const result = await context.getEvalEngine().runFullEval(versionId);

  if (isEvalRunError(result)) {
    console.error(JSON.stringify(result, null, 2));
    process.exitCode = 1;
    return;
  }

  const distilled = distillMemories(result, context.memoryStore);
  const { records: _records, ...summary } = result;
  console.log(JSON.stringify({ summary, distilled }, null, 2));
}

main().catch((error) => {
  console.error("Eval run failed:", error);
  process.exitCode = 1;
});
