import type { ProviderConstructor } from "../types/provider.js";
import { BedrockModel } from "./bedrock.js";
import { OpenAIModel } from "./openai.js";

export const builtInProviders: ReadonlyArray<readonly [string, ProviderConstructor]> = [
  ["bedrock", BedrockModel],
  ["openai", OpenAIModel],
];

/**
 * Provider key to constructor mapping. Keys are case-insensitive.
 * Entries can be added or overwritten but never removed.
 */
export class ProviderRegistry {
  private readonly providers = new Map<string, ProviderConstructor>();

  private normalize(key: string): string {
    return key.trim().toLowerCase();
  }

  registerBuiltins(): void {
    for (const [key, ctor] of builtInProviders) {
      this.register(key, ctor);
    }
  }

  register(key: string, ctor: ProviderConstructor): void {
    this.providers.set(this.normalize(key), ctor);
  }

  resolve(key: string): ProviderConstructor | undefined {
    return this.providers.get(this.normalize(key));
  }

  has(key: string): boolean {
    return this.providers.has(this.normalize(key));
  }

  keys(): string[] {
    return [...this.providers.keys()].sort();
  }
}
