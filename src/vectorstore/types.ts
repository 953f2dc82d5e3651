/**
 * types.ts - Vector store interfaces and types
 *
 * What this file does:
 * Defines two layers:
 *
 * - VectorIndex: the boundary to whatever actually stores vectors and does
 *   nearest-neighbour search (the local SQLite index or a Chroma server).
 *   It only ever sees pre-computed vectors; it knows nothing about
 *   embedding providers.
 * - Collection / QueryResult / AddDocumentsOptions: what callers of the
 *   VectorCollectionService work with. A Collection pairs a stored
 *   collection with the EmbeddingCapability that computes its vectors.
 *
 * Key concepts:
 * - Metadata: flat key/value pairs for exact-match filtering
 * - Where / WhereDocument: Chroma-style filter objects (see filters.ts)
 * - Distance: lower is closer; the metric is chosen per collection
 */

import type { EmbeddingCapability } from "../embeddings";

/** Metadata values must be scalars, no arrays or objects. */
export type MetadataValue = string | number | boolean;

export type Metadata = Record<string, MetadataValue>;

/**
 * Metadata filter, e.g. `{ kind: "guide" }` or
 * `{ $and: [{ year: { $gte: 2020 } }, { lang: { $in: ["en", "de"] } }] }`.
 * Validated by filters.ts before use.
 */
export type Where = Record<string, unknown>;

/** Content filter, e.g. `{ $contains: "refund policy" }`. */
export type WhereDocument = Record<string, unknown>;

/**
 * The distance metric for comparing vectors.
 *
 * - "l2": squared Euclidean distance (the default, as in Chroma)
 * - "cosine": 1 - cosine similarity; 0.0 = same direction, 2.0 = opposite
 * - "ip": 1 - inner product, for normalised vectors
 *
 * Read from the collection metadata key "hnsw:space" at creation time and
 * fixed for the lifetime of the collection.
 */
export type DistanceMetric = "l2" | "cosine" | "ip";

export const DISTANCE_METADATA_KEY = "hnsw:space";
export const EMBEDDING_PROVIDER_METADATA_KEY = "embedding:provider";
export const EMBEDDING_MODEL_METADATA_KEY = "embedding:model";

/** A stored collection as the index sees it. */
export interface CollectionInfo {
  name: string;
  metadata: Metadata;
}

/** One row to write into the index. */
export interface IndexRecord {
  id: string;
  document: string;
  metadata: Metadata;
  embedding: number[];
}

export type IncludeField = "documents" | "metadatas" | "distances" | "embeddings";

export const DEFAULT_INCLUDE: readonly IncludeField[] = ["metadatas", "documents", "distances"];

export interface IndexQueryOptions {
  nResults: number;
  where?: Where;
  whereDocument?: WhereDocument;
  include: readonly IncludeField[];
}

/**
 * Column-oriented query results, one row per query vector.
 *
 * `ids[q][k]` is the k-th closest document for query q; the optional
 * columns line up with it and are present when named in `include`.
 */
export interface QueryResult {
  ids: string[][];
  documents?: string[][];
  metadatas?: Metadata[][];
  distances?: number[][];
  embeddings?: number[][][];
}

/**
 * The capability boundary to a vector index.
 *
 * Implementations must make add() all-or-nothing, and readers running
 * concurrently with a write must see either the state before or after it.
 */
export interface VectorIndex {
  listCollections(): Promise<CollectionInfo[]>;

  /** Resolves to null when no collection has that name. */
  getCollection(name: string): Promise<CollectionInfo | null>;

  /** Creates an empty collection. Fails if the name is taken. */
  createCollection(name: string, metadata: Metadata): Promise<CollectionInfo>;

  /** Resolves to false when the collection did not exist. */
  deleteCollection(name: string): Promise<boolean>;

  /** Length of the stored vectors, or null while the collection is empty. */
  getDimension(name: string): Promise<number | null>;

  /** Subset of `ids` already stored in the collection. */
  existingIds(name: string, ids: string[]): Promise<string[]>;

  add(name: string, records: IndexRecord[]): Promise<void>;

  query(name: string, queryEmbeddings: number[][], options: IndexQueryOptions): Promise<QueryResult>;

  count(name: string): Promise<number>;

  /** Resolves to the number of documents actually removed. */
  deleteDocuments(name: string, ids: string[]): Promise<number>;

  /** Drops every collection. */
  reset(): Promise<void>;

  close(): Promise<void>;
}

/** A collection together with the capability that embeds its texts. */
export interface Collection {
  name: string;
  metadata: Metadata;
  embedding: EmbeddingCapability;
}

export interface AddDocumentsOptions {
  /** One mapping per document; defaults to {} for each */
  metadatas?: Metadata[];
  /** One id per document; defaults to generated UUIDs */
  ids?: string[];
  /**
   * Pre-computed vectors by position. A missing or null entry is computed
   * with the collection's embedding capability.
   */
  embeddings?: Array<number[] | null | undefined>;
}

export interface QueryDocumentsOptions {
  /** Matches per query (default: 10) */
  nResults?: number;
  where?: Where;
  whereDocument?: WhereDocument;
  /** Result columns (default: metadatas, documents, distances) */
  include?: IncludeField[];
}
