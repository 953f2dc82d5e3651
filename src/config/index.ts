/**
 * config/index.ts - Configuration surface for rag-datacore
 *
 * What this file does:
 * Reads the environment once and turns it into a typed AppConfig that is
 * passed explicitly to every component constructor. Nothing else in the
 * project reads process.env for embedding, storage or encryption settings,
 * so tests can build any configuration they want without touching globals.
 *
 * The schema is written with zod so that a bad value (e.g. an unknown
 * VECTOR_STORE_BACKEND) is reported together with every other bad value in
 * one ConfigurationError, instead of surfacing later as a confusing
 * runtime failure.
 *
 * The embedding provider name is deliberately kept as a free string here.
 * Whether it names a registered provider is the embedding factory's call,
 * and it reports that as UnsupportedProviderError.
 */

import { z } from "zod";
import { ConfigurationError } from "../errors";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

/** Empty strings in the environment mean "not set". */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value.trim()));

/** Case-insensitive, so Chroma's own ALLOW_RESET=TRUE spelling works too. */
const booleanFlag = z
  .preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() || undefined : value),
    z.enum(["true", "false", "1", "0", "yes", "no"]).optional()
  )
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  EMBEDDING_PROVIDER: optionalString,
  EMBEDDING_MODEL: optionalString,
  OPENAI_API_KEY: optionalString,
  HUGGINGFACE_API_TOKEN: optionalString,
  VOYAGE_API_KEY: optionalString,
  VECTOR_STORE_BACKEND: z.enum(["local", "chroma"]).default("local"),
  CHROMADB_PERSIST_PATH: optionalString,
  CHROMA_URL: z.string().url().default("http://localhost:8000"),
  CHROMADB_ALLOW_RESET: booleanFlag,
  DATABASE_PATH: optionalString,
  ENCRYPTION_KEY: optionalString,
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Settings the embedding factory needs. Provider and model are the
 * process-wide defaults; the keys are looked up per provider.
 */
export interface EmbeddingConfig {
  provider: string;
  model?: string;
  openaiApiKey?: string;
  huggingfaceApiToken?: string;
  voyageApiKey?: string;
}

export interface VectorStoreConfig {
  backend: "local" | "chroma";
  /** Directory holding the local index; created on first use. */
  persistPath: string;
  chromaUrl: string;
  allowReset: boolean;
}

export interface AppConfig {
  embedding: EmbeddingConfig;
  vectorStore: VectorStoreConfig;
  /** Path of the SQLite database holding encrypted user secrets. */
  databasePath: string;
  /** Base64 AES-256 key; undefined disables secret persistence. */
  encryptionKey?: string;
  logLevel: LogLevel;
}

export const DEFAULT_EMBEDDING_PROVIDER = "huggingface";
export const DEFAULT_PERSIST_PATH = "db/chroma";
export const DEFAULT_DATABASE_PATH = "db/app.sqlite3";

/**
 * Builds an AppConfig from environment variables.
 *
 * @param env - Defaults to process.env; tests pass a plain object
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    embedding: {
      provider: (vars.EMBEDDING_PROVIDER ?? DEFAULT_EMBEDDING_PROVIDER).toLowerCase(),
      model: vars.EMBEDDING_MODEL,
      openaiApiKey: vars.OPENAI_API_KEY,
      huggingfaceApiToken: vars.HUGGINGFACE_API_TOKEN,
      voyageApiKey: vars.VOYAGE_API_KEY,
    },
    vectorStore: {
      backend: vars.VECTOR_STORE_BACKEND,
      persistPath: vars.CHROMADB_PERSIST_PATH ?? DEFAULT_PERSIST_PATH,
      chromaUrl: vars.CHROMA_URL,
      allowReset: vars.CHROMADB_ALLOW_RESET,
    },
    databasePath: vars.DATABASE_PATH ?? DEFAULT_DATABASE_PATH,
    encryptionKey: vars.ENCRYPTION_KEY,
    logLevel: vars.LOG_LEVEL,
  };
}
