import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { isDefinitionFile } from "./catalog/reader.js";

/** Directory of the definitions shipped with the package. */
export function getDefaultConfigDir(): string {
  return path.resolve(fileURLToPath(new URL("../models/", import.meta.url)));
}

export function getDefaultConfigs(): string[] {
  const dir = getDefaultConfigDir();
  return fs
    .readdirSync(dir)
    .filter(isDefinitionFile)
    .sort()
    .map((file) => path.join(dir, file));
}
