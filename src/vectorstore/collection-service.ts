/**
 * collection-service.ts - Named collections of embedded documents
 *
 * What this file does:
 * Stores and queries documents in named collections. Each collection is
 * bound to exactly one EmbeddingCapability when it is first created or
 * fetched in this process, and every text added to or queried against it
 * is embedded by that capability. The VectorIndex underneath only ever
 * sees vectors.
 *
 * Error contract:
 * getOrCreateCollection() is a setup-time call and throws. The data-path
 * operations never throw: they log what went wrong and return a sentinel
 * (false, null, -1 or []), so a RAG request handler can degrade instead of
 * crashing.
 *
 * Concurrency:
 * Adding documents awaits the embedding provider between the duplicate-id
 * and dimension checks and the index write. A per-collection KeyedLock is
 * held across that whole sequence, so two adds to the same collection
 * can't both pass the checks and then both write. Queries take no lock;
 * the index guarantees they see a write entirely or not at all.
 */

import { randomUUID } from "crypto";
import type { EmbeddingCapability } from "../embeddings";
import {
  CollectionNotFoundError,
  DimensionMismatchError,
  DocumentValidationError,
  describeError,
} from "../errors";
import { createNoopLogger, type Logger } from "../logging/logger";
import { withSpan } from "../tracing";
import { KeyedLock } from "../utils/keyed-lock";
import { parseWhere, parseWhereDocument } from "./filters";
import {
  DEFAULT_INCLUDE,
  EMBEDDING_MODEL_METADATA_KEY,
  EMBEDDING_PROVIDER_METADATA_KEY,
  type AddDocumentsOptions,
  type Collection,
  type IndexRecord,
  type Metadata,
  type QueryDocumentsOptions,
  type QueryResult,
  type VectorIndex,
} from "./types";

export const DEFAULT_N_RESULTS = 10;

export interface VectorCollectionServiceOptions {
  index: VectorIndex;
  /** Capability for collections created or fetched without one */
  defaultEmbedding: EmbeddingCapability;
  logger?: Logger;
  /** Id generator for documents added without ids (default: random UUID) */
  generateId?: () => string;
}

export class VectorCollectionService {
  private readonly index: VectorIndex;
  private readonly defaultEmbedding: EmbeddingCapability;
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly locks = new KeyedLock();

  /** Collections bound in this process, by name. */
  private readonly bindings = new Map<string, Collection>();

  constructor(options: VectorCollectionServiceOptions) {
    this.index = options.index;
    this.defaultEmbedding = options.defaultEmbedding;
    this.logger = (options.logger ?? createNoopLogger()).child({ component: "collections" });
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Returns the collection named `name`, creating it if needed.
   *
   * An existing binding always wins: a different `embedding` is ignored with
   * a warning. A collection that exists in the index but has not been bound
   * in this process is bound to `embedding` (or the default), with the same
   * warning when that differs from the provider and model recorded in its
   * metadata.
   *
   * @throws DocumentValidationError for an empty name or non-scalar metadata
   * @throws whatever the index throws; the error is logged first
   */
  async getOrCreateCollection(
    name: string,
    metadata: Metadata = {},
    embedding?: EmbeddingCapability
  ): Promise<Collection> {
    return this.locks.run(name, () =>
      withSpan("collection getOrCreate", { "collection.name": name }, async () => {
        try {
          if (name.trim() === "") {
            throw new DocumentValidationError("Collection name must not be empty");
          }
          assertScalarMetadata(metadata, 0);

          const bound = this.bindings.get(name);
          if (bound) {
            if (embedding && !sameCapability(bound.embedding, embedding)) {
              this.warnRebind(name, describeCapability(bound.embedding), embedding);
            }
            return bound;
          }

          const capability = embedding ?? this.defaultEmbedding;
          const existing = await this.index.getCollection(name);
          if (existing) {
            return this.bindExisting(name, existing.metadata, capability);
          }

          const created = await this.index.createCollection(name, {
            ...metadata,
            [EMBEDDING_PROVIDER_METADATA_KEY]: capability.provider,
            [EMBEDDING_MODEL_METADATA_KEY]: capability.model,
          });
          const collection: Collection = {
            name,
            metadata: created.metadata,
            embedding: capability,
          };
          this.bindings.set(name, collection);
          this.logger.info(
            { collection: name, provider: capability.provider, model: capability.model },
            "Created collection"
          );
          return collection;
        } catch (error) {
          this.logger.error(
            { operation: "getOrCreateCollection", collection: name, error: describeError(error) },
            "Failed to get or create collection"
          );
          throw error;
        }
      })
    );
  }

  /**
   * Embeds and stores `documents`. All of them are written, or none.
   *
   * @returns false (after logging why) when the collection is unknown, the
   *   inputs don't line up, an id is taken, a vector has the wrong length,
   *   or the provider or index fails
   */
  async addDocuments(
    name: string,
    documents: string[],
    options: AddDocumentsOptions = {}
  ): Promise<boolean> {
    return this.locks.run(name, async () => {
      try {
        await withSpan(
          "collection add",
          { "collection.name": name, "collection.documents": documents.length },
          () => this.writeDocuments(name, documents, options)
        );
        return true;
      } catch (error) {
        this.logger.error(
          { operation: "addDocuments", collection: name, error: describeError(error) },
          "Failed to add documents"
        );
        return false;
      }
    });
  }

  /**
   * Finds the `nResults` nearest documents for each query text.
   *
   * @returns column-oriented results with one row per query text, or null
   *   (after logging why) for an unknown collection, an invalid nResults or
   *   filter, or a provider or index failure
   */
  async queryDocuments(
    name: string,
    queryTexts: string | string[],
    options: QueryDocumentsOptions = {}
  ): Promise<QueryResult | null> {
    const texts = typeof queryTexts === "string" ? [queryTexts] : queryTexts;
    const nResults = options.nResults ?? DEFAULT_N_RESULTS;

    try {
      return await withSpan(
        "collection query",
        { "collection.name": name, "collection.queries": texts.length, "collection.n_results": nResults },
        async () => {
          if (!Number.isInteger(nResults) || nResults < 1) {
            throw new DocumentValidationError(`nResults must be a positive integer, got ${nResults}`);
          }
          // Parse now so a bad filter fails before any embedding work
          if (options.where) parseWhere(options.where);
          if (options.whereDocument) parseWhereDocument(options.whereDocument);

          const collection = await this.resolve(name);
          const queryEmbeddings = await collection.embedding.embedDocuments(texts);

          return this.index.query(name, queryEmbeddings, {
            nResults,
            include: options.include ?? DEFAULT_INCLUDE,
            ...(options.where ? { where: options.where } : {}),
            ...(options.whereDocument ? { whereDocument: options.whereDocument } : {}),
          });
        }
      );
    } catch (error) {
      this.logger.error(
        { operation: "queryDocuments", collection: name, error: describeError(error) },
        "Failed to query documents"
      );
      return null;
    }
  }

  /** Names of every collection in the index; [] on failure. */
  async listCollections(): Promise<string[]> {
    try {
      const collections = await this.index.listCollections();
      return collections.map((collection) => collection.name);
    } catch (error) {
      this.logger.error(
        { operation: "listCollections", error: describeError(error) },
        "Failed to list collections"
      );
      return [];
    }
  }

  /**
   * Deletes a collection and all of its documents.
   *
   * @returns false when it did not exist or the index failed
   */
  async deleteCollection(name: string): Promise<boolean> {
    return this.locks.run(name, async () => {
      try {
        const deleted = await this.index.deleteCollection(name);
        this.bindings.delete(name);
        if (deleted) {
          this.logger.info({ collection: name }, "Deleted collection");
        } else {
          this.logger.warn({ operation: "deleteCollection", collection: name }, "Collection does not exist");
        }
        return deleted;
      } catch (error) {
        this.logger.error(
          { operation: "deleteCollection", collection: name, error: describeError(error) },
          "Failed to delete collection"
        );
        return false;
      }
    });
  }

  /** Number of stored documents; -1 when the collection is unknown or on failure. */
  async getCollectionCount(name: string): Promise<number> {
    try {
      if (!(await this.index.getCollection(name))) {
        throw new CollectionNotFoundError(name);
      }
      return await this.index.count(name);
    } catch (error) {
      this.logger.error(
        { operation: "getCollectionCount", collection: name, error: describeError(error) },
        "Failed to count documents"
      );
      return -1;
    }
  }

  /**
   * Deletes documents by id. Ids that are not stored are ignored.
   *
   * @returns false when the collection is unknown or the index failed
   */
  async deleteDocuments(name: string, ids: string[]): Promise<boolean> {
    return this.locks.run(name, async () => {
      try {
        if (!(await this.index.getCollection(name))) {
          throw new CollectionNotFoundError(name);
        }
        const removed = await this.index.deleteDocuments(name, ids);
        this.logger.debug({ collection: name, requested: ids.length, removed }, "Deleted documents");
        return true;
      } catch (error) {
        this.logger.error(
          { operation: "deleteDocuments", collection: name, error: describeError(error) },
          "Failed to delete documents"
        );
        return false;
      }
    });
  }

  /**
   * Drops every collection. Refused by the index unless it was opened
   * with reset allowed (CHROMADB_ALLOW_RESET).
   */
  async reset(): Promise<boolean> {
    try {
      await this.index.reset();
      this.bindings.clear();
      this.logger.warn("Vector index reset: all collections dropped");
      return true;
    } catch (error) {
      this.logger.error({ operation: "reset", error: describeError(error) }, "Failed to reset vector index");
      return false;
    }
  }

  async close(): Promise<void> {
    await this.index.close();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async writeDocuments(
    name: string,
    documents: string[],
    options: AddDocumentsOptions
  ): Promise<void> {
    const { metadatas, ids, embeddings } = options;

    if (metadatas && metadatas.length !== documents.length) {
      throw new DocumentValidationError(
        `Got ${metadatas.length} metadatas for ${documents.length} documents`
      );
    }
    if (ids && ids.length !== documents.length) {
      throw new DocumentValidationError(`Got ${ids.length} ids for ${documents.length} documents`);
    }
    if (embeddings && embeddings.length > documents.length) {
      throw new DocumentValidationError(
        `Got ${embeddings.length} embeddings for ${documents.length} documents`
      );
    }
    metadatas?.forEach(assertScalarMetadata);

    const collection = await this.resolve(name);
    if (documents.length === 0) return;

    const documentIds = ids ?? documents.map(() => this.generateId());
    const duplicates = documentIds.filter((id, i) => documentIds.indexOf(id) !== i);
    if (duplicates.length > 0) {
      throw new DocumentValidationError("Duplicate ids in one call", {
        ids: [...new Set(duplicates)],
      });
    }
    const taken = await this.index.existingIds(name, documentIds);
    if (taken.length > 0) {
      throw new DocumentValidationError("Ids already stored in the collection", { ids: taken });
    }

    const vectors = await this.completeEmbeddings(collection.embedding, documents, embeddings ?? []);

    const dimension = (await this.index.getDimension(name)) ?? vectors[0]?.length ?? 0;
    for (const vector of vectors) {
      if (vector.length !== dimension) {
        throw new DimensionMismatchError(name, dimension, vector.length);
      }
      if (vector.length === 0 || !vector.every(Number.isFinite)) {
        throw new DocumentValidationError("Embeddings must be non-empty arrays of finite numbers");
      }
    }

    const records: IndexRecord[] = documents.map((document, i) => ({
      id: documentIds[i] ?? this.generateId(),
      document,
      metadata: metadatas?.[i] ?? {},
      embedding: vectors[i] ?? [],
    }));
    await this.index.add(name, records);

    this.logger.debug(
      { collection: name, added: records.length, computed: documents.length - countSupplied(embeddings) },
      "Added documents"
    );
  }

  /**
   * Uses supplied vectors verbatim and computes the rest in one batch.
   */
  private async completeEmbeddings(
    capability: EmbeddingCapability,
    documents: string[],
    supplied: Array<number[] | null | undefined>
  ): Promise<number[][]> {
    const missing = documents.map((_, i) => i).filter((i) => !supplied[i]);
    const computed = await capability.embedDocuments(missing.map((i) => documents[i] ?? ""));

    const vectors: number[][] = [];
    let next = 0;
    documents.forEach((_, i) => {
      const given = supplied[i];
      if (given) {
        vectors.push(given);
      } else {
        vectors.push(computed[next] ?? []);
        next += 1;
      }
    });
    return vectors;
  }

  /**
   * The bound collection, binding an index collection to the default
   * capability on first use in this process.
   *
   * @throws CollectionNotFoundError when the index has no such collection
   */
  private async resolve(name: string): Promise<Collection> {
    const bound = this.bindings.get(name);
    if (bound) return bound;

    const existing = await this.index.getCollection(name);
    if (!existing) {
      throw new CollectionNotFoundError(name);
    }
    return this.bindExisting(name, existing.metadata, this.defaultEmbedding);
  }

  private bindExisting(
    name: string,
    metadata: Metadata,
    capability: EmbeddingCapability
  ): Collection {
    const recordedProvider = metadata[EMBEDDING_PROVIDER_METADATA_KEY];
    const recordedModel = metadata[EMBEDDING_MODEL_METADATA_KEY];
    if (
      (recordedProvider !== undefined && recordedProvider !== capability.provider) ||
      (recordedModel !== undefined && recordedModel !== capability.model)
    ) {
      this.warnRebind(name, `${String(recordedProvider)}/${String(recordedModel)}`, capability);
    }

    const collection: Collection = { name, metadata, embedding: capability };
    this.bindings.set(name, collection);
    return collection;
  }

  private warnRebind(name: string, bound: string, requested: EmbeddingCapability): void {
    this.logger.warn(
      { collection: name, bound, requested: describeCapability(requested) },
      "Collection is bound to a different embedding model; the requested one is ignored"
    );
  }
}

function describeCapability(capability: EmbeddingCapability): string {
  return `${capability.provider}/${capability.model}`;
}

function sameCapability(a: EmbeddingCapability, b: EmbeddingCapability): boolean {
  return a === b || (a.provider === b.provider && a.model === b.model);
}

function countSupplied(embeddings: AddDocumentsOptions["embeddings"]): number {
  return (embeddings ?? []).filter((embedding) => Boolean(embedding)).length;
}

/**
 * Metadata arrives from callers typed but unchecked at run time; nested
 * objects or arrays would be silently mangled by the index, and NaN or
 * Infinity would be stored as null.
 */
function assertScalarMetadata(metadata: Metadata, position: number): void {
  for (const [key, value] of Object.entries(metadata)) {
    const type = typeof value;
    if (type !== "string" && type !== "number" && type !== "boolean") {
      throw new DocumentValidationError(
        `Metadata value for "${key}" must be a string, number or boolean`,
        { position, key, type: value === null ? "null" : type }
      );
    }
    if (typeof value === "number" && !Number.isFinite(value)) {
      throw new DocumentValidationError(`Metadata value for "${key}" must be a finite number`, {
        position,
        key,
        value: String(value),
      });
    }
  }
}
