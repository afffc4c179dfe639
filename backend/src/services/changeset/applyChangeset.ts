/**
 * Apply a changeset: merged config → new config file, new testcases → golden set.
 * Everything is planned in memory first; a validation error leaves both files untouched.
 */

import path from "node:path";
import type { ApplyChangesetResult, Changeset } from "@evalloop/shared";
import type { MemoryStore } from "../records/memoryStore";
import { writeFileAtomic } from "../../utils/atomicWrite";
import { readBaseConfig } from "./baseConfig";
import { applyConfigPatches } from "./configPatches";
import { commitGoldenPlan, planGoldenAppend } from "./goldenGrowth";

export type ChangesetEngineOptions = {
  /** When set, a config_change memory is written after each successful apply. */
  memoryStore?: MemoryStore;
  /** Subject the change belongs to; resolved when the memory is written. */
  getSubjectId?: () => string | undefined;
};

export class ChangesetEngine {
  constructor(private readonly options: ChangesetEngineOptions = {}) {}

  apply(changeset: Changeset): ApplyChangesetResult {
    const baseConfigPath = path.resolve(process.cwd(), changeset.base_config_path);
    const newConfigPath = path.resolve(process.cwd(), changeset.new_config_path);
    const goldenPath = path.resolve(process.cwd(), changeset.golden_set_path);

    const merged = applyConfigPatches(readBaseConfig(baseConfigPath), changeset.config_patches);
    const plan = planGoldenAppend(goldenPath, changeset.new_testcases);

    writeFileAtomic(newConfigPath, JSON.stringify(merged, null, 2) + "\n");
    console.log(`[changeset] Wrote new config: ${newConfigPath} (${changeset.config_patches.length} patches)`);

    commitGoldenPlan(plan);
    if (plan.mode !== "none") {
      console.log(`[changeset] ${plan.mode} golden set ${goldenPath}: +${plan.appendedIds.length} testcases`);
    }

    const result: ApplyChangesetResult = {
      new_config_path: newConfigPath,
      golden_set_path: goldenPath,
      patches_applied: changeset.config_patches.length,
      appended_ids: plan.appendedIds,
      columns: plan.columns
    };
    this.recordChange(changeset, result);
    return result;
  }

  private recordChange(changeset: Changeset, result: ApplyChangesetResult): void {
    const { memoryStore, getSubjectId } = this.options;
    if (!memoryStore) return;
    try {
      memoryStore.recordConfigChange({
        subject_id: getSubjectId ? getSubjectId() : undefined,
        base_config_path: changeset.base_config_path,
        new_config_path: changeset.new_config_path,
        golden_set_path: changeset.golden_set_path,
        patches: changeset.config_patches,
        appended_testcase_ids: result.appended_ids
      });
    } catch (err) {
      console.error("[changeset] Failed to record config change:", err instanceof Error ? err.message : String(err));
    }
  }
}
