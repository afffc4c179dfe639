export { ChangesetEngine } from "./applyChangeset";
export type { ChangesetEngineOptions } from "./applyChangeset";
export { applyConfigPatches, splitPatchPath } from "./configPatches";
export { parseChangeset, changesetFromProposal, flattenConfigPatch } from "./changeset";
export { nextTestcaseId, planGoldenAppend, commitGoldenPlan, REQUIRED_TESTCASE_FIELDS } from "./goldenGrowth";
export type { GoldenPlan, GoldenWriteMode } from "./goldenGrowth";
export { ChangesetError, PatchSchemaError, RequiredFieldMissingError } from "./errors";
