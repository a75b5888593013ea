import {
  GetSecretValueCommand,
  SecretsManagerClient,
} from "@aws-sdk/client-secrets-manager";

/** Resolves a secret reference to its string value. */
export interface SecretStore {
  getSecret(secretId: string): Promise<string | undefined>;
}

export interface SecretsManagerStoreOptions {
  client?: SecretsManagerClient;
  region?: string;
  timeoutMs?: number;
}

export class SecretsManagerStore implements SecretStore {
  private readonly client: SecretsManagerClient;
  private readonly timeoutMs?: number;

  constructor(options: SecretsManagerStoreOptions = {}) {
    this.client = options.client ?? new SecretsManagerClient({ region: options.region });
    this.timeoutMs = options.timeoutMs;
  }

  async getSecret(secretId: string): Promise<string | undefined> {
    const response = await this.client.send(
      new GetSecretValueCommand({ SecretId: secretId }),
      this.timeoutMs ? { abortSignal: AbortSignal.timeout(this.timeoutMs) } : {},
    );
    return response.SecretString;
  }
}
