import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { DefinitionStorage } from "./storage.js";

export class FileSystemStorage implements DefinitionStorage {
  readonly location: string;

  constructor(baseDir: string) {
    this.location = path.resolve(baseDir);
  }

  pathOf(fileName: string): string {
    return path.join(this.location, fileName);
  }

  async isDirectory(): Promise<boolean> {
    try {
      const s = await fs.stat(this.location);
      return s.isDirectory();
    } catch (err: unknown) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async listFiles(): Promise<string[]> {
    const entries = await fs.readdir(this.location, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  }

  async readText(fileName: string): Promise<string> {
    return fs.readFile(this.pathOf(fileName), "utf-8");
  }
}

function isMissing(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return err.code === "ENOENT" || err.code === "ENOTDIR";
}
