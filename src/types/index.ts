export type {
  BuiltInProvider,
  ModelDefinition,
  Catalog,
  RawDefinition,
  RawDefinitionTree,
} from "./model.js";

export type {
  LlmUsage,
  LlmResponse,
  ProviderContext,
  LlmModel,
  ProviderConstructor,
} from "./provider.js";
