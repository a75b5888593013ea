export type BuiltInProvider = "bedrock" | "openai";

/**
 * Validated configuration for one model. Plugin providers use arbitrary
 * provider keys, hence the open string.
 */
export interface ModelDefinition {
  readonly name: string;
  readonly provider: BuiltInProvider | (string & {});
  readonly modelId: string;
  readonly regionName?: string;
  readonly apiKeySecretName?: string;
  readonly apiKeyEnvVar: string;
  /** USD per million input tokens */
  readonly inputTokenCost: number;
  /** USD per million output tokens */
  readonly outputTokenCost: number;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly description?: string;
}

export type Catalog = ReadonlyMap<string, ModelDefinition>;

/** One parsed definition file, before validation. */
export type RawDefinition = Record<string, unknown>;

/** Raw definitions keyed by catalog key (file base name). */
export type RawDefinitionTree = Record<string, RawDefinition>;
