import { ConfigValidationError } from "../errors.js";
import type { ValidationIssue } from "../errors.js";
import type { Catalog, ModelDefinition, RawDefinitionTree } from "../types/model.js";
import { modelDefinitionSchema } from "./schema.js";

/**
 * Validates every entry of a merged tree. Either all entries are valid and a
 * frozen catalog is returned, or a ConfigValidationError listing every
 * field-level issue across all entries is thrown. Definitions are frozen;
 * the map itself is only exposed through the ReadonlyMap type.
 */
export function validateCatalog(tree: RawDefinitionTree): Catalog {
  const issues: ValidationIssue[] = [];
  const definitions = new Map<string, ModelDefinition>();

  for (const [key, raw] of Object.entries(tree)) {
    const result = modelDefinitionSchema.safeParse(raw);
    if (!result.success) {
      for (const issue of result.error.issues) {
        issues.push({
          model: key,
          field: issue.path.join("."),
          message: issue.message,
        });
      }
      continue;
    }
    definitions.set(key, Object.freeze(result.data));
  }

  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }
  return definitions;
}
