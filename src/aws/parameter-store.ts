import { GetParameterCommand, SSMClient } from "@aws-sdk/client-ssm";
import { ModelConfigurationError, toError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("PARAMETERS");

/** Named-parameter lookup used to locate remote definition and plugin directories. */
export interface ParameterStore {
  getParameter(name: string): Promise<string | undefined>;
}

export interface SsmParameterStoreOptions {
  client?: SSMClient;
  region?: string;
  timeoutMs?: number;
}

export class SsmParameterStore implements ParameterStore {
  private readonly client: SSMClient;
  private readonly timeoutMs?: number;

  constructor(options: SsmParameterStoreOptions = {}) {
    this.client = options.client ?? new SSMClient({ region: options.region });
    this.timeoutMs = options.timeoutMs;
  }

  async getParameter(name: string): Promise<string | undefined> {
    const response = await this.client.send(
      new GetParameterCommand({ Name: name, WithDecryption: true }),
      this.timeoutMs ? { abortSignal: AbortSignal.timeout(this.timeoutMs) } : {},
    );
    return response.Parameter?.Value;
  }
}

/**
 * Looks up `name`. With `required`, a failed lookup or an empty value throws
 * ModelConfigurationError; otherwise failures are logged and yield undefined.
 */
export function resolveParameter(
  store: ParameterStore,
  name: string,
  options: { required: true },
): Promise<string>;
export function resolveParameter(
  store: ParameterStore,
  name: string,
  options: { required: boolean },
): Promise<string | undefined>;
export async function resolveParameter(
  store: ParameterStore,
  name: string,
  options: { required: boolean },
): Promise<string | undefined> {
  let value: string | undefined;
  try {
    value = await store.getParameter(name);
  } catch (err) {
    const error = toError(err);
    const message = `Failed to load parameter '${name}': ${error.message}`;
    if (options.required) {
      throw new ModelConfigurationError(message, { cause: error });
    }
    log.warn(message);
    return undefined;
  }

  if (!value) {
    if (options.required) {
      throw new ModelConfigurationError(`Parameter '${name}' has no value.`);
    }
    return undefined;
  }
  return value;
}
