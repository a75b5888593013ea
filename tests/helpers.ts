import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { ParameterStore } from "../src/aws/parameter-store.js";
import type { SecretStore } from "../src/aws/secret-store.js";
import type { FactorySettings } from "../src/config/settings.js";
import { BaseLlmModel } from "../src/providers/base.js";
import type { LlmResponse } from "../src/types/provider.js";

export const PLUGIN_PARAM = "/test/plugins";
export const MODELS_PARAM = "/test/models";

export const testSettings: FactorySettings = {
  providerPathParameter: PLUGIN_PARAM,
  modelsPathParameter: MODELS_PARAM,
  cacheSize: 8,
  remoteTimeoutMs: 1000,
  awsRegion: "us-east-1",
};

export class InMemoryParameterStore implements ParameterStore {
  readonly requested: string[] = [];
  private readonly values: Map<string, string>;
  private readonly failing = new Set<string>();

  constructor(values: Record<string, string> = {}) {
    this.values = new Map(Object.entries(values));
  }

  set(name: string, value: string): void {
    this.values.set(name, value);
  }

  fail(name: string): void {
    this.failing.add(name);
  }

  async getParameter(name: string): Promise<string | undefined> {
    this.requested.push(name);
    if (this.failing.has(name)) {
      throw new Error(`ParameterNotFound: ${name}`);
    }
    return this.values.get(name);
  }
}

export class InMemorySecretStore implements SecretStore {
  private readonly secrets: Map<string, string>;

  constructor(secrets: Record<string, string> = {}) {
    this.secrets = new Map(Object.entries(secrets));
  }

  async getSecret(secretId: string): Promise<string | undefined> {
    const value = this.secrets.get(secretId);
    if (value === undefined) {
      throw new Error(`ResourceNotFoundException: ${secretId}`);
    }
    return value;
  }
}

/** Provider that echoes prompts back without any SDK. */
export class EchoModel extends BaseLlmModel<{ prefix: string }> {
  readonly provider = "echo";

  protected async createClient(): Promise<{ prefix: string }> {
    return { prefix: `${this.name}:` };
  }

  protected async send(client: { prefix: string }, prompt: string): Promise<LlmResponse> {
    return { content: `${client.prefix}${prompt}`, usage: { inputTokens: 1, outputTokens: 1 } };
  }
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content, "utf-8");
  }
}
