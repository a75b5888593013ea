import { ModelConfigurationError, toError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { ModelDefinition } from "../types/model.js";
import type { ProviderContext } from "../types/provider.js";

const log = createLogger("CREDENTIALS");

/**
 * Secret reference first, then the definition's environment variable.
 * A failed secret lookup only falls through to the environment.
 */
export async function resolveApiKey(
  modelName: string,
  definition: ModelDefinition,
  context: ProviderContext,
): Promise<string> {
  if (definition.apiKeySecretName) {
    try {
      const secret = await context.secrets.getSecret(definition.apiKeySecretName);
      if (secret) {
        log.debug("Fetched API key from secret store", { model: modelName });
        return secret;
      }
      log.warn("Secret has no string value, falling back to environment", {
        model: modelName,
        secret: definition.apiKeySecretName,
      });
    } catch (err) {
      log.warn("Could not fetch API key from secret store, falling back to environment", {
        model: modelName,
        secret: definition.apiKeySecretName,
        error: toError(err).message,
      });
    }
  }

  const fromEnv = context.env[definition.apiKeyEnvVar];
  if (fromEnv) return fromEnv;

  throw new ModelConfigurationError(
    `API key for ${modelName} not found. Set '${definition.apiKeyEnvVar}' or configure 'api_key_secret_name'.`,
  );
}
