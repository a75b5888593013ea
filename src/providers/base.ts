import { ModelConfigurationError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { ModelDefinition } from "../types/model.js";
import type { LlmModel, LlmResponse, ProviderContext } from "../types/provider.js";

const log = createLogger("MODELS");

/**
 * Base class for providers. Subclasses build their SDK client in
 * `createClient()` and perform one non-streaming call in `send()`.
 * The client is created once, on `initialize()`.
 */
export abstract class BaseLlmModel<TClient = unknown> implements LlmModel {
  abstract readonly provider: string;
  readonly name: string;
  readonly definition: ModelDefinition;
  protected readonly context: ProviderContext;

  private sdk: TClient | null = null;

  constructor(name: string, definition: ModelDefinition, context: ProviderContext) {
    this.name = name;
    this.definition = definition;
    this.context = context;
  }

  protected abstract createClient(): Promise<TClient>;

  protected abstract send(client: TClient, prompt: string): Promise<LlmResponse>;

  get initialized(): boolean {
    return this.sdk !== null;
  }

  /** The provider SDK client, for calls beyond a single prompt. */
  get client(): TClient {
    if (this.sdk === null) {
      throw new ModelConfigurationError(`Model '${this.name}' has not been initialized.`);
    }
    return this.sdk;
  }

  async initialize(): Promise<void> {
    if (this.sdk === null) {
      this.sdk = await this.createClient();
    }
  }

  async invoke(prompt: string): Promise<LlmResponse> {
    const client = this.client;
    log.debug("Invoking model", { name: this.name, provider: this.provider });
    return this.send(client, prompt);
  }

  toString(): string {
    return `${this.constructor.name}(name='${this.name}', provider='${this.provider}', modelId='${this.definition.modelId}')`;
  }
}
