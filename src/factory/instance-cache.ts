import { LRUCache } from "lru-cache";
import { createLogger } from "../logger.js";
import type { LlmModel } from "../types/provider.js";
import { ModelFactory } from "./model-factory.js";
import type { ModelSource } from "./model-factory.js";

const log = createLogger("CACHE");

export const DEFAULT_CACHE_SIZE = 128;

export type FactoryResolver = (sourcePath: string) => Promise<ModelSource>;

export interface ModelInstanceCacheOptions {
  /** Maximum number of cached instances; least recently used go first */
  capacity?: number;
  resolveFactory?: FactoryResolver;
}

const defaultResolver: FactoryResolver = (sourcePath) => ModelFactory.init({ sourcePath });

/**
 * Memoizes provider instances by (model name, source path). Invalidation is
 * whole-cache only, via `forceReload` or `clear()`.
 */
export class ModelInstanceCache {
  readonly capacity: number;

  private readonly cache: LRUCache<string, LlmModel>;
  private readonly inflight = new Map<string, Promise<LlmModel>>();
  private readonly resolveFactory: FactoryResolver;
  private generation = 0;

  constructor(options: ModelInstanceCacheOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_CACHE_SIZE;
    this.cache = new LRUCache<string, LlmModel>({ max: this.capacity });
    this.resolveFactory = options.resolveFactory ?? defaultResolver;
  }

  private key(name: string, sourcePath: string): string {
    return JSON.stringify([name, sourcePath]);
  }

  async get(name: string, sourcePath: string, forceReload = false): Promise<LlmModel> {
    if (forceReload) {
      this.clear();
    }

    const key = this.key(name, sourcePath);
    const cached = this.cache.get(key);
    if (cached) return cached;

    // Concurrent misses for one key share a single construction.
    const pending = this.inflight.get(key);
    if (pending) return pending;

    const generation = this.generation;
    const attempt: Promise<LlmModel> = this.create(name, sourcePath)
      .then((model) => {
        if (generation === this.generation) {
          this.cache.set(key, model);
        }
        return model;
      })
      .finally(() => {
        if (this.inflight.get(key) === attempt) {
          this.inflight.delete(key);
        }
      });
    this.inflight.set(key, attempt);
    return attempt;
  }

  has(name: string, sourcePath: string): boolean {
    return this.cache.has(this.key(name, sourcePath));
  }

  clear(): void {
    this.cache.clear();
    this.inflight.clear();
    this.generation++;
    log.debug("Cleared model instance cache");
  }

  get size(): number {
    return this.cache.size;
  }

  private async create(name: string, sourcePath: string): Promise<LlmModel> {
    const factory = await this.resolveFactory(sourcePath);
    return factory.getModelInstance(name);
  }
}
