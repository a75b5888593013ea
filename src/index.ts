// Types
export type {
  BuiltInProvider,
  ModelDefinition,
  Catalog,
  RawDefinition,
  RawDefinitionTree,
  LlmUsage,
  LlmResponse,
  ProviderContext,
  LlmModel,
  ProviderConstructor,
} from "./types/index.js";

// Errors
export {
  LlmFactoryError,
  ConfigLoadError,
  ConfigValidationError,
  ModelNotFoundError,
  ModelConfigurationError,
  LLMApiError,
} from "./errors.js";
export type { ValidationIssue } from "./errors.js";

// Logging
export { createLogger, setLogLevel, getLogLevel, LogLevel } from "./logger.js";
export type { Logger, LogContext } from "./logger.js";

// Settings
export { loadSettings } from "./config/settings.js";
export type { FactorySettings } from "./config/settings.js";

// Storage
export { FileSystemStorage, S3Storage, openStorage, isS3Location, parseS3Location } from "./storage/index.js";
export type { DefinitionStorage, S3StorageOptions } from "./storage/index.js";

// Parameter and secret stores
export { SsmParameterStore, SecretsManagerStore, resolveParameter } from "./aws/index.js";
export type {
  ParameterStore,
  SecretStore,
  SsmParameterStoreOptions,
  SecretsManagerStoreOptions,
} from "./aws/index.js";

// Catalog
export { readDefinitionTree } from "./catalog/reader.js";
export { mergeDefinitionTrees } from "./catalog/merge.js";
export { validateCatalog } from "./catalog/validate.js";
export { modelDefinitionSchema, BUILT_IN_PROVIDERS } from "./catalog/schema.js";
export type { ModelDefinitionInput } from "./catalog/schema.js";

// Providers
export { BaseLlmModel } from "./providers/base.js";
export { OpenAIModel } from "./providers/openai.js";
export { BedrockModel } from "./providers/bedrock.js";
export { resolveApiKey } from "./providers/credentials.js";
export { ProviderRegistry, builtInProviders } from "./providers/registry.js";
export {
  discoverPlugins,
  findProviderExport,
  isProviderConstructor,
  importModule,
} from "./providers/discovery.js";
export type { ModuleLoader, PluginDiscoveryOptions } from "./providers/discovery.js";

// Factory
export {
  ModelFactory,
  ModelInstanceCache,
  DEFAULT_CACHE_SIZE,
  getLlm,
  getDefaultInstanceCache,
} from "./factory/index.js";
export type {
  ModelFactoryOptions,
  ModelSource,
  FactoryResolver,
  ModelInstanceCacheOptions,
} from "./factory/index.js";

// Default definitions
export { getDefaultConfigDir, getDefaultConfigs } from "./model-config.js";
