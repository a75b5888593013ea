import type { RawDefinition, RawDefinitionTree } from "../types/model.js";

/**
 * Field-level merge of two definition trees. For a key present on both
 * sides, each field set in `remote` overrides the same field in `local`;
 * fields absent from `remote` keep their local values, and a `null` in
 * `remote` clears the field. Inputs are not mutated.
 */
export function mergeDefinitionTrees(
  local: RawDefinitionTree,
  remote: RawDefinitionTree,
): RawDefinitionTree {
  const merged = new Map<string, RawDefinition>();
  for (const [key, definition] of Object.entries(local)) {
    merged.set(key, { ...definition });
  }
  for (const [key, definition] of Object.entries(remote)) {
    merged.set(key, { ...merged.get(key), ...definition });
  }
  return Object.fromEntries(merged);
}
