import { loadSettings } from "../config/settings.js";
import type { LlmModel } from "../types/provider.js";
import { ModelInstanceCache } from "./instance-cache.js";
import { ModelFactory } from "./model-factory.js";

let defaultCache: ModelInstanceCache | null = null;

export function getDefaultInstanceCache(): ModelInstanceCache {
  if (!defaultCache) {
    const cache = new ModelInstanceCache({ capacity: loadSettings().cacheSize });
    ModelFactory.onReset(() => cache.clear());
    defaultCache = cache;
  }
  return defaultCache;
}

/**
 * Returns the cached provider instance for `name` from the process-wide
 * cache, building the factory on first use. `forceReload` empties the cache
 * first; the factory and its catalog are kept. `ModelFactory.reset()` also
 * empties this cache.
 */
export function getLlm(
  name: string,
  sourcePath: string,
  forceReload = false,
): Promise<LlmModel> {
  return getDefaultInstanceCache().get(name, sourcePath, forceReload);
}
