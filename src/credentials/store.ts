/**
 * store.ts - Per-user LLM API keys, encrypted at rest
 *
 * What this file does:
 * Lets a user bring their own provider keys. The keys are encrypted with
 * the process-wide ENCRYPTION_KEY before they reach the repository and only
 * exist in plaintext inside encryptKey()/decryptKey().
 *
 * Disabled mode:
 * Without a usable ENCRYPTION_KEY the store still constructs, so the rest
 * of the application can start. Every write then returns false and every
 * read null; isEnabled() tells callers which mode they're in.
 *
 * Reads never distinguish "nothing stored" from "stored but unreadable"
 * (wrong key, tampered row, older format): both come back as null, with
 * the cause in the log.
 */

import { z } from "zod";
import {
  CredentialPayloadError,
  DecryptionError,
  EncryptionUnavailableError,
  describeError,
} from "../errors";
import { createNoopLogger, type Logger } from "../logging/logger";
import { decryptPayload, encryptPayload, parseEncryptionKey } from "./cipher";
import type { UserSecretRepository } from "./repository";
import type { ApiKeyPayload, JsonValue, UserSecretRecord } from "./types";

// Finite numbers only: JSON.stringify turns NaN and Infinity into null
const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

/** Read and write paths share one schema, so anything stored reads back. */
const payloadSchema = z.record(z.string(), jsonValueSchema);

export interface CredentialStoreOptions {
  repository: UserSecretRepository;
  /** Base64 32-byte key; usually config.encryptionKey */
  encryptionKey?: string;
  logger?: Logger;
  /** Clock for created/updated timestamps (default: Date.now) */
  now?: () => number;
}

export class CredentialStore {
  private readonly repository: UserSecretRepository;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly key: Buffer | null;
  private readonly disabledReason: string | null;

  constructor(options: CredentialStoreOptions) {
    this.repository = options.repository;
    this.logger = (options.logger ?? createNoopLogger()).child({ component: "credentials" });
    this.now = options.now ?? Date.now;

    if (options.encryptionKey === undefined || options.encryptionKey.trim() === "") {
      this.key = null;
      this.disabledReason = "ENCRYPTION_KEY is not set";
      this.logger.warn("ENCRYPTION_KEY is not set; storing user API keys is disabled");
      return;
    }

    let key: Buffer | null = null;
    let reason: string | null = null;
    try {
      key = parseEncryptionKey(options.encryptionKey);
    } catch (error) {
      reason = describeError(error).message;
      this.logger.error({ error: describeError(error) }, "Invalid ENCRYPTION_KEY; storing user API keys is disabled");
    }
    this.key = key;
    this.disabledReason = reason;
  }

  isEnabled(): boolean {
    return this.key !== null;
  }

  /**
   * Encrypts a provider → key mapping. Each call uses a fresh IV, so two
   * calls with the same payload give different blobs.
   *
   * @throws EncryptionUnavailableError when no usable key is configured
   * @throws CredentialPayloadError when the payload would not read back
   *   unchanged (non-finite numbers, undefined, functions...)
   */
  encryptKey(payload: ApiKeyPayload): Buffer {
    if (!this.key) {
      throw new EncryptionUnavailableError(this.disabledReason ?? "no key configured");
    }
    const checked = payloadSchema.safeParse(payload);
    if (!checked.success) {
      throw new CredentialPayloadError(
        checked.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      );
    }
    return encryptPayload(checked.data, this.key);
  }

  /**
   * Opens a blob from encryptKey().
   *
   * @returns the mapping, or null (logged) when it can't be opened or isn't
   *   a JSON mapping
   */
  decryptKey(blob: Buffer): ApiKeyPayload | null {
    try {
      if (!this.key) {
        throw new EncryptionUnavailableError(this.disabledReason ?? "no key configured");
      }
      const plaintext = decryptPayload(blob, this.key);

      let parsed: unknown;
      try {
        parsed = JSON.parse(plaintext);
      } catch (error) {
        throw new DecryptionError("Decrypted payload is not valid JSON", error);
      }
      const payload = payloadSchema.safeParse(parsed);
      if (!payload.success) {
        throw new DecryptionError("Decrypted payload is not a JSON mapping");
      }
      return payload.data;
    } catch (error) {
      this.logger.warn({ operation: "decryptKey", error: describeError(error) }, "Could not decrypt payload");
      return null;
    }
  }

  /**
   * Stores `apiKeys` for `userId`, replacing anything stored before.
   *
   * @returns false when encryption is disabled, the payload is not a JSON
   *   mapping, or the write fails
   */
  setApiKeys(userId: string, apiKeys: ApiKeyPayload): boolean {
    try {
      const blob = this.encryptKey(apiKeys);
      this.repository.upsert(userId, blob, this.now());
      this.logger.info({ userId, providers: Object.keys(apiKeys).sort() }, "Stored API keys");
      return true;
    } catch (error) {
      this.logger.error({ operation: "setApiKeys", userId, error: describeError(error) }, "Failed to store API keys");
      return false;
    }
  }

  /** The stored mapping, or null when absent or unreadable. */
  getApiKeys(userId: string): ApiKeyPayload | null {
    let record: UserSecretRecord | null;
    try {
      record = this.repository.find(userId);
    } catch (error) {
      this.logger.error({ operation: "getApiKeys", userId, error: describeError(error) }, "Failed to read API keys");
      return null;
    }
    if (!record) return null;

    const payload = this.decryptKey(record.encryptedPayload);
    if (!payload) {
      this.logger.warn({ operation: "getApiKeys", userId }, "Stored API keys could not be decrypted");
    }
    return payload;
  }

  /** Removes the stored mapping. False when none was stored or on failure. */
  deleteApiKeys(userId: string): boolean {
    try {
      const deleted = this.repository.delete(userId);
      if (deleted) {
        this.logger.info({ userId }, "Deleted API keys");
      }
      return deleted;
    } catch (error) {
      this.logger.error(
        { operation: "deleteApiKeys", userId, error: describeError(error) },
        "Failed to delete API keys"
      );
      return false;
    }
  }
}
