export { ModelFactory } from "./model-factory.js";
export type { ModelFactoryOptions, ModelSource } from "./model-factory.js";
export { ModelInstanceCache, DEFAULT_CACHE_SIZE } from "./instance-cache.js";
export type { FactoryResolver, ModelInstanceCacheOptions } from "./instance-cache.js";
export { getLlm, getDefaultInstanceCache } from "./get-llm.js";
