import type { SecretStore } from "../aws/secret-store.js";
import type { ModelDefinition } from "./model.js";

export interface LlmUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LlmResponse {
  content: string;
  usage: LlmUsage;
}

/** Collaborators handed to every provider constructor. */
export interface ProviderContext {
  secrets: SecretStore;
  env: Record<string, string | undefined>;
  awsRegion?: string;
  timeoutMs?: number;
}

/** Capability contract every built-in and plugin provider satisfies. */
export interface LlmModel {
  readonly name: string;
  readonly provider: string;
  readonly definition: ModelDefinition;
  initialize(): Promise<void>;
  invoke(prompt: string): Promise<LlmResponse>;
}

export type ProviderConstructor = new (
  name: string,
  definition: ModelDefinition,
  context: ProviderContext,
) => LlmModel;
