/**
 * @coffer/node - HTTP node serving a single vault.
 */

export { VaultService } from "./services/vault-service.js";
export type { VaultServiceConfig } from "./services/vault-service.js";
export {
  loadConfig,
  parseApiKeys,
  parseSeedBalances,
  ConfigSchema,
} from "./config.js";
export type { AppConfig, ParsedApiKey, SeedBalance } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
