import * as path from "node:path";
import yaml from "js-yaml";
import { ConfigLoadError, toError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { DefinitionStorage } from "../storage/storage.js";
import type { RawDefinition, RawDefinitionTree } from "../types/model.js";

const log = createLogger("CATALOG");

export const DEFINITION_EXTENSIONS = [".yaml", ".yml"] as const;

export function isDefinitionFile(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return DEFINITION_EXTENSIONS.some((candidate) => candidate === ext);
}

/**
 * Reads every definition file in `storage` into a raw tree keyed by the
 * file's base name. Later files win when two share a base name
 * (e.g. `a.yaml` and `a.yml`).
 */
export async function readDefinitionTree(
  storage: DefinitionStorage,
): Promise<RawDefinitionTree> {
  let isDir: boolean;
  try {
    isDir = await storage.isDirectory();
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to access definition directory '${storage.location}': ${toError(err).message}`,
      { location: storage.location, cause: toError(err) },
    );
  }
  if (!isDir) {
    throw new ConfigLoadError(`'${storage.location}' is not a directory.`, {
      location: storage.location,
    });
  }

  let files: string[];
  try {
    files = (await storage.listFiles()).filter(isDefinitionFile);
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to list definition directory '${storage.location}': ${toError(err).message}`,
      { location: storage.location, cause: toError(err) },
    );
  }

  const entries: [string, RawDefinition][] = [];
  for (const fileName of files) {
    const key = path.basename(fileName, path.extname(fileName));
    entries.push([key, await readDefinitionFile(storage, fileName)]);
  }
  // fromEntries defines own keys, so a file named like `__proto__` stays a key.
  const tree: RawDefinitionTree = Object.fromEntries(entries);

  log.debug("Read definition directory", {
    location: storage.location,
    definitions: Object.keys(tree).length,
  });
  return tree;
}

async function readDefinitionFile(
  storage: DefinitionStorage,
  fileName: string,
): Promise<RawDefinition> {
  const filePath = storage.pathOf(fileName);

  let text: string;
  try {
    text = await storage.readText(fileName);
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to read definition file '${filePath}': ${toError(err).message}`,
      { location: filePath, cause: toError(err) },
    );
  }

  let doc: unknown;
  try {
    doc = yaml.load(text, { filename: filePath });
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      throw new ConfigLoadError(
        `Failed to parse definition file '${filePath}': ${err.reason}`,
        {
          location: filePath,
          line: err.mark.line + 1,
          column: err.mark.column + 1,
          cause: err,
        },
      );
    }
    throw new ConfigLoadError(
      `Failed to parse definition file '${filePath}': ${toError(err).message}`,
      { location: filePath, cause: toError(err) },
    );
  }

  if (doc === undefined || doc === null) return {};
  if (!isRecord(doc)) {
    throw new ConfigLoadError(
      `Definition file '${filePath}' must contain a mapping.`,
      { location: filePath },
    );
  }
  return doc;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
