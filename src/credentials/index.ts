/**
 * credentials/index.ts - Public API for the encrypted credential store
 */

export type { ApiKeyPayload, JsonValue, UserSecretRecord } from "./types";
export type { CredentialStoreOptions } from "./store";
export type { UserSecretRepository } from "./repository";

export { CredentialStore } from "./store";
export { SqliteUserSecretRepository } from "./repository";
export { canonicalJson, generateEncryptionKey, parseEncryptionKey } from "./cipher";
