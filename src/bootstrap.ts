/**
 * bootstrap.ts - Wires the data-access core together from an AppConfig
 *
 * What this file does:
 * Builds the logger, embedding factory, vector index, collection service
 * and credential store in the right order, so callers (the CLI, an HTTP
 * layer, tests) get one object instead of repeating the wiring.
 *
 * Usage:
 *   const core = createDataCore(loadConfig());
 *   await core.collections.getOrCreateCollection("support-articles");
 *   ...
 *   await core.close();
 */

import type { AppConfig } from "./config";
import { SqliteUserSecretRepository, CredentialStore } from "./credentials";
import { EmbeddingFactory } from "./embeddings";
import { createLogger, type Logger } from "./logging/logger";
import {
  ChromaVectorIndex,
  SqliteVectorIndex,
  VectorCollectionService,
  type VectorIndex,
} from "./vectorstore";

export interface DataCore {
  config: AppConfig;
  logger: Logger;
  embeddings: EmbeddingFactory;
  collections: VectorCollectionService;
  credentials: CredentialStore;
  close(): Promise<void>;
}

export interface DataCoreOverrides {
  logger?: Logger;
  index?: VectorIndex;
  secretRepository?: SqliteUserSecretRepository;
}

export function createVectorIndex(config: AppConfig): VectorIndex {
  const { backend, persistPath, chromaUrl, allowReset } = config.vectorStore;
  return backend === "chroma"
    ? new ChromaVectorIndex({ chromaUrl, allowReset })
    : new SqliteVectorIndex({ persistPath, allowReset });
}

/**
 * Builds every component from `config`.
 *
 * @throws UnsupportedProviderError, MissingCredentialError or
 *   DependencyUnavailableError when the default embedding provider can't
 *   be created
 */
export function createDataCore(config: AppConfig, overrides: DataCoreOverrides = {}): DataCore {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  const embeddings = new EmbeddingFactory(config.embedding, logger);
  // Before the index opens, so a bad provider setting leaves no handle behind
  const defaultEmbedding = embeddings.createDefault();
  const index = overrides.index ?? createVectorIndex(config);
  const collections = new VectorCollectionService({ index, defaultEmbedding, logger });

  const secretRepository =
    overrides.secretRepository ?? SqliteUserSecretRepository.open(config.databasePath);
  const credentials = new CredentialStore({
    repository: secretRepository,
    encryptionKey: config.encryptionKey,
    logger,
  });

  return {
    config,
    logger,
    embeddings,
    collections,
    credentials,
    async close() {
      await collections.close();
      secretRepository.close();
    },
  };
}
