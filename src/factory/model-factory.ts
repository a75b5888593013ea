import { resolveParameter, SsmParameterStore } from "../aws/parameter-store.js";
import type { ParameterStore } from "../aws/parameter-store.js";
import { SecretsManagerStore } from "../aws/secret-store.js";
import type { SecretStore } from "../aws/secret-store.js";
import { mergeDefinitionTrees } from "../catalog/merge.js";
import { readDefinitionTree } from "../catalog/reader.js";
import { validateCatalog } from "../catalog/validate.js";
import { loadSettings } from "../config/settings.js";
import type { FactorySettings } from "../config/settings.js";
import {
  ModelConfigurationError,
  ModelNotFoundError,
  toError,
} from "../errors.js";
import { createLogger } from "../logger.js";
import { discoverPlugins } from "../providers/discovery.js";
import type { ModuleLoader } from "../providers/discovery.js";
import { ProviderRegistry } from "../providers/registry.js";
import { openStorage } from "../storage/index.js";
import type { DefinitionStorage } from "../storage/storage.js";
import type { Catalog, ModelDefinition } from "../types/model.js";
import type { LlmModel, ProviderContext } from "../types/provider.js";

const log = createLogger("FACTORY");

export interface ModelFactoryOptions {
  /** Directory of local definition files */
  sourcePath: string;
  settings?: FactorySettings;
  parameterStore?: ParameterStore;
  secretStore?: SecretStore;
  /** Opens local and remote locations; defaults to filesystem or S3 by prefix */
  openStorage?: (location: string) => DefinitionStorage;
  loadModule?: ModuleLoader;
  env?: Record<string, string | undefined>;
}

/** Anything that can hand out model instances by name. */
export interface ModelSource {
  getModelInstance(name: string): Promise<LlmModel>;
}

/**
 * Process-wide factory. The first successful `init()` wins; later calls
 * return the same instance whatever source path they pass. Use `reset()`
 * to start over; it also empties the default instance cache behind `getLlm`.
 */
export class ModelFactory implements ModelSource {
  private static instance: ModelFactory | null = null;
  private static pending: Promise<ModelFactory> | null = null;
  private static readonly resetListeners = new Set<() => void>();

  readonly sourcePath: string;
  readonly registry: ProviderRegistry;

  private readonly settings: FactorySettings;
  private readonly parameterStore: ParameterStore;
  private readonly context: ProviderContext;
  private readonly open: (location: string) => DefinitionStorage;
  private catalog: Catalog | null = null;

  private constructor(options: ModelFactoryOptions) {
    const env = options.env ?? process.env;
    const settings = options.settings ?? loadSettings(env);
    const remote = { region: settings.awsRegion, timeoutMs: settings.remoteTimeoutMs };

    this.sourcePath = options.sourcePath;
    this.settings = settings;
    this.registry = new ProviderRegistry();
    this.parameterStore = options.parameterStore ?? new SsmParameterStore(remote);
    this.open = options.openStorage ?? ((location) => openStorage(location, remote));
    this.context = {
      secrets: options.secretStore ?? new SecretsManagerStore(remote),
      env,
      awsRegion: settings.awsRegion,
      timeoutMs: settings.remoteTimeoutMs,
    };
  }

  static async init(options: ModelFactoryOptions): Promise<ModelFactory> {
    const factory = await ModelFactory.acquire(options);
    if (factory.sourcePath !== options.sourcePath) {
      log.warn("Factory already initialized from another source path; reusing its catalog", {
        initializedFrom: factory.sourcePath,
        requested: options.sourcePath,
      });
    }
    return factory;
  }

  /** The ready factory, if any. */
  static current(): ModelFactory | undefined {
    return ModelFactory.instance ?? undefined;
  }

  /** Drops the factory and runs every `onReset` listener. */
  static reset(): void {
    ModelFactory.instance = null;
    ModelFactory.pending = null;
    for (const listener of ModelFactory.resetListeners) {
      listener();
    }
  }

  /** Registers a callback for `reset()`, used to drop instances built by the old factory. */
  static onReset(listener: () => void): void {
    ModelFactory.resetListeners.add(listener);
  }

  private static acquire(options: ModelFactoryOptions): Promise<ModelFactory> {
    if (ModelFactory.instance) return Promise.resolve(ModelFactory.instance);
    if (ModelFactory.pending) return ModelFactory.pending;

    const attempt: Promise<ModelFactory> = ModelFactory.build(options).then(
      (factory) => {
        if (ModelFactory.pending === attempt) {
          ModelFactory.instance = factory;
        }
        return factory;
      },
      (err: unknown) => {
        if (ModelFactory.pending === attempt) {
          ModelFactory.pending = null;
        }
        throw err;
      },
    );
    ModelFactory.pending = attempt;
    return attempt;
  }

  private static async build(options: ModelFactoryOptions): Promise<ModelFactory> {
    const factory = new ModelFactory(options);
    factory.registry.registerBuiltins();
    await discoverPlugins({
      registry: factory.registry,
      parameterStore: factory.parameterStore,
      parameterName: factory.settings.providerPathParameter,
      openStorage: factory.open,
      loadModule: options.loadModule,
    });
    await factory.loadConfigurations();
    return factory;
  }

  /**
   * Reads local and remote definitions, merges and validates them, then
   * swaps the catalog in. On failure the previous catalog stays in place.
   */
  async loadConfigurations(): Promise<void> {
    log.info("Loading configurations", { source: this.sourcePath });
    const local = await readDefinitionTree(this.open(this.sourcePath));

    const remoteLocation = await resolveParameter(
      this.parameterStore,
      this.settings.modelsPathParameter,
      { required: true },
    );
    let remoteStorage: DefinitionStorage;
    try {
      remoteStorage = this.open(remoteLocation);
    } catch (err) {
      throw new ModelConfigurationError(
        `Remote definition location '${remoteLocation}' is invalid: ${toError(err).message}`,
        { cause: toError(err) },
      );
    }
    const remote = await readDefinitionTree(remoteStorage);

    const catalog = validateCatalog(mergeDefinitionTrees(local, remote));
    this.catalog = catalog;
    log.info(`Successfully loaded ${catalog.size} model configurations.`, {
      remote: remoteLocation,
    });
  }

  get ready(): boolean {
    return this.catalog !== null;
  }

  listModels(): string[] {
    return this.catalog ? [...this.catalog.keys()].sort() : [];
  }

  getDefinition(name: string): ModelDefinition | undefined {
    return this.catalog?.get(name);
  }

  /** Builds and initializes a new provider object on every call. */
  async getModelInstance(name: string): Promise<LlmModel> {
    if (!this.catalog) {
      throw new ModelConfigurationError("Model configurations not loaded into the factory.");
    }

    const definition = this.catalog.get(name);
    if (!definition) {
      throw new ModelNotFoundError(name);
    }

    const Provider = this.registry.resolve(definition.provider);
    if (!Provider) {
      throw new ModelConfigurationError(
        `No model class registered for provider '${definition.provider}'.`,
      );
    }

    const model = new Provider(name, definition, this.context);
    await model.initialize();
    return model;
  }
}
