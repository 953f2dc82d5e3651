/**
 * cipher.ts - AES-256-GCM envelope for stored API keys
 *
 * Security considerations:
 * - AES-256-GCM: the auth tag rejects any modified or truncated blob
 * - a fresh random 12-byte IV for every encryption, so the same payload
 *   never produces the same blob twice
 * - the key comes from ENCRYPTION_KEY only, never from user input
 *
 * Wire format:
 *   MAGIC "RDCK"(4) | VERSION(1) | IV_LEN(1) | IV | TAG_LEN(1) | TAG | CIPHERTEXT
 *
 * Blobs without the magic (older formats, or anything else) are rejected
 * as unknown, never guessed at.
 */

import { createCipheriv, createDecipheriv, randomBytes, timingSafeEqual } from "crypto";
import { DecryptionError, EncryptionUnavailableError } from "../errors";
import type { ApiKeyPayload } from "./types";

const ALGORITHM = "aes-256-gcm";
export const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const FORMAT_VERSION = 1;
const MAGIC_BYTES = Buffer.from("RDCK");

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

/**
 * Decodes ENCRYPTION_KEY: standard or URL-safe base64 of exactly 32 bytes.
 *
 * @throws EncryptionUnavailableError when the value is not such a key
 */
export function parseEncryptionKey(encoded: string): Buffer {
  const trimmed = encoded.trim();
  if (!BASE64_PATTERN.test(trimmed)) {
    throw new EncryptionUnavailableError("ENCRYPTION_KEY is not base64");
  }
  const key = Buffer.from(trimmed, "base64");
  if (key.length !== KEY_LENGTH) {
    throw new EncryptionUnavailableError(
      `ENCRYPTION_KEY must decode to ${KEY_LENGTH} bytes, got ${key.length}`
    );
  }
  return key;
}

/** A new random key in the format parseEncryptionKey() accepts. */
export function generateEncryptionKey(): string {
  return randomBytes(KEY_LENGTH).toString("base64");
}

/**
 * JSON with object keys sorted at every depth, so equal payloads always
 * serialise to the same plaintext.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === "object" && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

export function encryptPayload(payload: ApiKeyPayload, key: Buffer): Buffer {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  const ciphertext = Buffer.concat([
    cipher.update(Buffer.from(canonicalJson(payload), "utf-8")),
    cipher.final(),
  ]);
  const authTag = cipher.getAuthTag();

  return Buffer.concat([
    MAGIC_BYTES,
    Buffer.from([FORMAT_VERSION, iv.length]),
    iv,
    Buffer.from([authTag.length]),
    authTag,
    ciphertext,
  ]);
}

/**
 * Opens a blob written by encryptPayload() and returns the plaintext.
 *
 * @throws DecryptionError for an unknown format or a failed auth tag
 */
export function decryptPayload(blob: Buffer, key: Buffer): string {
  let offset = 0;

  if (blob.length < MAGIC_BYTES.length + 2) {
    throw new DecryptionError("Encrypted payload is too short");
  }
  const magic = blob.subarray(0, MAGIC_BYTES.length);
  if (!timingSafeEqual(magic, MAGIC_BYTES)) {
    throw new DecryptionError("Unknown encrypted payload format");
  }
  offset += MAGIC_BYTES.length;

  const version = blob.readUInt8(offset);
  offset += 1;
  if (version !== FORMAT_VERSION) {
    throw new DecryptionError(`Unsupported encryption version: ${version}`);
  }

  const ivLen = blob.readUInt8(offset);
  offset += 1;
  const iv = blob.subarray(offset, offset + ivLen);
  offset += ivLen;

  if (ivLen !== IV_LENGTH || offset >= blob.length) {
    throw new DecryptionError("Encrypted payload is truncated");
  }
  const tagLen = blob.readUInt8(offset);
  offset += 1;
  const authTag = blob.subarray(offset, offset + tagLen);
  offset += tagLen;
  if (tagLen !== AUTH_TAG_LENGTH || offset > blob.length) {
    throw new DecryptionError("Encrypted payload is truncated");
  }

  const ciphertext = blob.subarray(offset);

  try {
    const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
    decipher.setAuthTag(authTag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf-8");
  } catch (error) {
    throw new DecryptionError("Encrypted payload failed authentication", error);
  }
}
