/**
 * types.ts - Credential store records
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Provider name → API key, e.g. { openai: "sk-...", voyage: "pa-..." }.
 * Values may also be nested settings such as { openai: { key, org } }, as
 * long as they survive a JSON round trip.
 */
export type ApiKeyPayload = { [key: string]: JsonValue };

/** One row of the user_secrets table. Timestamps are epoch milliseconds. */
export interface UserSecretRecord {
  userId: string;
  encryptedPayload: Buffer;
  createdAt: number;
  updatedAt: number;
}
