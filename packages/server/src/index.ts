/**
 * @oapi-guard/server: Public API.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export {
  loadConfig,
  parseApiKeys,
  errorContentType,
  ConfigSchema,
  DEFAULT_SPEC_PATH,
} from "./config.js";
export type { AppConfig } from "./config.js";
export { PetStore, PetStoreError } from "./services/pet-store.js";
export type { Pet, NewPet, PetStoreErrorCode } from "./services/pet-store.js";
export { createApiKeyAuthenticator } from "./security/api-key.js";
export type { RequestLogEntry } from "./middleware/logger.js";
export * from "./types/index.js";
