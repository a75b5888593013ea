import { z } from "zod";
import { ModelConfigurationError } from "../errors.js";

const settingsSchema = z.object({
  LLM_FACTORY_PROVIDER_PATH_PARAMETER: z
    .string()
    .min(1)
    .default("/LLM_CONFIG/PROVIDER_MODULES_S3_PATH"),
  LLM_FACTORY_MODELS_PATH_PARAMETER: z
    .string()
    .min(1)
    .default("/LLM_CONFIG/MODELS_CONFIG_S3_PATH"),
  LLM_FACTORY_CACHE_SIZE: z.coerce.number().int().min(1).default(128),
  LLM_FACTORY_REMOTE_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  AWS_REGION: z.string().min(1).optional(),
});

export interface FactorySettings {
  /** Parameter holding the optional plugin artifact location */
  providerPathParameter: string;
  /** Parameter holding the required remote definition location */
  modelsPathParameter: string;
  cacheSize: number;
  remoteTimeoutMs: number;
  awsRegion?: string;
}

export function loadSettings(
  env: Record<string, string | undefined> = process.env,
): FactorySettings {
  // Blank variables count as unset so defaults still apply.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = settingsSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ModelConfigurationError(`Invalid factory settings: ${details}`);
  }

  const data = parsed.data;
  return {
    providerPathParameter: data.LLM_FACTORY_PROVIDER_PATH_PARAMETER,
    modelsPathParameter: data.LLM_FACTORY_MODELS_PATH_PARAMETER,
    cacheSize: data.LLM_FACTORY_CACHE_SIZE,
    remoteTimeoutMs: data.LLM_FACTORY_REMOTE_TIMEOUT_MS,
    awsRegion: data.AWS_REGION,
  };
}
