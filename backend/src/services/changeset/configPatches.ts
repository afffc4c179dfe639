import type { ConfigPatch, JsonObject, JsonValue } from "@evalloop/shared";
import { PatchSchemaError } from "./errors";

const RESERVED_SEGMENTS = new Set(["__proto__", "prototype", "constructor"]);

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function splitPatchPath(patchPath: string): string[] {
  const segments = patchPath.split(".");
  for (const segment of segments) {
    if (segment === "") {
      throw new PatchSchemaError(`Patch path "${patchPath}" has an empty segment`);
    }
    if (RESERVED_SEGMENTS.has(segment)) {
      throw new PatchSchemaError(`Patch path "${patchPath}" uses reserved segment "${segment}"`);
    }
  }
  return segments;
}

function setAtPath(target: JsonObject, segments: string[], value: JsonValue): void {
  let node = target;
  for (const segment of segments.slice(0, -1)) {
    const child = node[segment];
    if (isJsonObject(child)) {
      node = child;
    } else {
      // Missing or scalar intermediates are replaced by an object.
      const created: JsonObject = {};
      node[segment] = created;
      node = created;
    }
  }
  node[segments[segments.length - 1]] = structuredClone(value);
}

/**
 * Fold patches, in order, over a deep copy of `base`. Keys off each patch path are left alone;
 * the leaf is overwritten whatever it held. `base` is not modified.
 */
export function applyConfigPatches(base: JsonObject, patches: ConfigPatch[]): JsonObject {
  const result = structuredClone(base);
  for (const patch of patches) {
    switch (patch.op) {
      case "set":
        setAtPath(result, splitPatchPath(patch.path), patch.value);
        break;
      default:
        throw new PatchSchemaError(`Unsupported patch op "${String(patch.op)}" at ${patch.path}`);
    }
  }
  return result;
}
