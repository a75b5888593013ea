import { z } from "zod";
import type { ModelDefinition } from "../types/model.js";

export const BUILT_IN_PROVIDERS = ["bedrock", "openai"] as const;

/**
 * Wire format of a definition file. Optional text fields may be left blank
 * (`null`), which clears them.
 */
export const modelDefinitionSchema = z
  .object({
    name: z.string().min(1),
    provider: z.string().min(1),
    model_id: z.string().min(1),
    region_name: z.string().min(1).nullish(),
    api_key_secret_name: z.string().min(1).nullish(),
    api_key_env_var: z.string().min(1).default("OPENAI_API_KEY"),
    input_token_cost_usd_per_million: z.number().min(0).default(0),
    output_token_cost_usd_per_million: z.number().min(0).default(0),
    max_tokens: z.number().int().min(1).default(1024),
    temperature: z.number().min(0).max(2).default(0.7),
    description: z.string().nullish(),
  })
  .transform(
    (raw): ModelDefinition => ({
      name: raw.name,
      provider: raw.provider,
      modelId: raw.model_id,
      regionName: raw.region_name ?? undefined,
      apiKeySecretName: raw.api_key_secret_name ?? undefined,
      apiKeyEnvVar: raw.api_key_env_var,
      inputTokenCost: raw.input_token_cost_usd_per_million,
      outputTokenCost: raw.output_token_cost_usd_per_million,
      maxTokens: raw.max_tokens,
      temperature: raw.temperature,
      description: raw.description ?? undefined,
    }),
  );

export type ModelDefinitionInput = z.input<typeof modelDefinitionSchema>;
