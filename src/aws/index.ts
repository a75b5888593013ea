export { SsmParameterStore, resolveParameter } from "./parameter-store.js";
export type { ParameterStore, SsmParameterStoreOptions } from "./parameter-store.js";
export { SecretsManagerStore } from "./secret-store.js";
export type { SecretStore, SecretsManagerStoreOptions } from "./secret-store.js";
