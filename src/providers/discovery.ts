import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { resolveParameter } from "../aws/parameter-store.js";
import type { ParameterStore } from "../aws/parameter-store.js";
import { isRecord } from "../catalog/reader.js";
import { toError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { DefinitionStorage } from "../storage/storage.js";
import type { ProviderConstructor } from "../types/provider.js";
import { BaseLlmModel } from "./base.js";
import type { ProviderRegistry } from "./registry.js";

const log = createLogger("PLUGINS");

export const PLUGIN_EXTENSIONS = [".js", ".mjs"] as const;

/** Loads a module from a local file and returns its exports. */
export type ModuleLoader = (filePath: string) => Promise<Record<string, unknown>>;

export const importModule: ModuleLoader = async (filePath) => {
  const mod: unknown = await import(pathToFileURL(filePath).href);
  return isRecord(mod) ? mod : {};
};

export interface PluginDiscoveryOptions {
  registry: ProviderRegistry;
  parameterStore: ParameterStore;
  /** Name of the optional parameter holding the plugin location */
  parameterName: string;
  openStorage: (location: string) => DefinitionStorage;
  loadModule?: ModuleLoader;
}

/**
 * A class other than BaseLlmModel whose prototype implements the LlmModel
 * methods. Subclassing BaseLlmModel is not required, since plugins loaded
 * from a scratch directory cannot always resolve this package.
 */
export function isProviderConstructor(value: unknown): value is ProviderConstructor {
  if (typeof value !== "function" || value === BaseLlmModel) return false;
  const proto: unknown = value.prototype;
  if (typeof proto !== "object" || proto === null) return false;
  if (proto instanceof BaseLlmModel) return true;
  return (
    "initialize" in proto &&
    typeof proto.initialize === "function" &&
    "invoke" in proto &&
    typeof proto.invoke === "function"
  );
}

/**
 * First qualifying export wins. Module namespaces list exports by name, so
 * "first" means first in export-name order; a CommonJS `module.exports`
 * object under `default` is searched after the named exports.
 */
export function findProviderExport(
  exports: Record<string, unknown>,
): ProviderConstructor | undefined {
  for (const value of Object.values(exports)) {
    if (isProviderConstructor(value)) return value;
  }
  const fallback = exports.default;
  if (isRecord(fallback)) {
    for (const value of Object.values(fallback)) {
      if (isProviderConstructor(value)) return value;
    }
  }
  return undefined;
}

function isPluginArtifact(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return PLUGIN_EXTENSIONS.some((candidate) => candidate === ext);
}

/**
 * Registers provider classes found in the plugin location named by the
 * parameter store. Every failure here is logged and skipped. Returns the
 * provider keys that were registered.
 */
export async function discoverPlugins(options: PluginDiscoveryOptions): Promise<string[]> {
  const { registry, parameterStore, parameterName } = options;
  const loadModule = options.loadModule ?? importModule;

  const location = await resolveParameter(parameterStore, parameterName, { required: false });
  if (!location) {
    log.info("No plugin location configured, skipping custom provider loading", {
      parameter: parameterName,
    });
    return [];
  }

  let artifacts: string[];
  let storage: DefinitionStorage;
  try {
    storage = options.openStorage(location);
    if (!(await storage.isDirectory())) {
      log.warn(`Plugin location '${location}' is not a directory.`);
      return [];
    }
    artifacts = (await storage.listFiles()).filter(isPluginArtifact);
  } catch (err) {
    log.warn(`Plugin location '${location}' could not be listed.`, {
      error: toError(err).message,
    });
    return [];
  }

  let scratchDir: string;
  try {
    scratchDir = await fs.mkdtemp(path.join(os.tmpdir(), "llm-plugins-"));
  } catch (err) {
    log.warn("Could not create a scratch directory for plugins", {
      error: toError(err).message,
    });
    return [];
  }

  const registered: string[] = [];
  try {
    for (const artifact of artifacts) {
      const key = path.basename(artifact, path.extname(artifact)).toLowerCase();
      try {
        const localPath = path.join(scratchDir, artifact);
        await fs.writeFile(localPath, await storage.readText(artifact), "utf-8");
        const ctor = findProviderExport(await loadModule(localPath));
        if (!ctor) {
          log.warn("No valid provider class found in plugin", { artifact });
          continue;
        }
        registry.register(key, ctor);
        registered.push(key);
        log.info("Registered custom provider", { provider: key, artifact });
      } catch (err) {
        log.warn("Failed to load plugin", {
          artifact: storage.pathOf(artifact),
          error: toError(err).message,
        });
      }
    }
  } finally {
    await fs.rm(scratchDir, { recursive: true, force: true }).catch((err: unknown) => {
      log.warn("Could not remove plugin scratch directory", {
        path: scratchDir,
        error: toError(err).message,
      });
    });
  }
  return registered;
}
