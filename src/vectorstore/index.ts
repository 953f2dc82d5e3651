/**
 * vectorstore/index.ts - Public API for the vector store module
 *
 * Import from here, never directly from the backend files.
 *
 * Usage:
 *   import { SqliteVectorIndex, VectorCollectionService } from "./vectorstore";
 *
 *   const service = new VectorCollectionService({
 *     index: new SqliteVectorIndex({ persistPath: "db/chroma" }),
 *     defaultEmbedding: factory.createDefault(),
 *   });
 *   await service.getOrCreateCollection("support-articles", { "hnsw:space": "cosine" });
 *   await service.addDocuments("support-articles", ["How do refunds work?"]);
 */

export type {
  AddDocumentsOptions,
  Collection,
  CollectionInfo,
  DistanceMetric,
  IncludeField,
  IndexQueryOptions,
  IndexRecord,
  Metadata,
  MetadataValue,
  QueryDocumentsOptions,
  QueryResult,
  VectorIndex,
  Where,
  WhereDocument,
} from "./types";
export {
  DEFAULT_INCLUDE,
  DISTANCE_METADATA_KEY,
  EMBEDDING_MODEL_METADATA_KEY,
  EMBEDDING_PROVIDER_METADATA_KEY,
} from "./types";

export { VectorCollectionService, DEFAULT_N_RESULTS } from "./collection-service";
export type { VectorCollectionServiceOptions } from "./collection-service";
export { SqliteVectorIndex, INDEX_FILE_NAME } from "./sqlite-backend";
export type { SqliteVectorIndexOptions } from "./sqlite-backend";
export { ChromaVectorIndex, DEFAULT_CHROMA_URL } from "./chroma-backend";
export type { ChromaVectorIndexOptions } from "./chroma-backend";
export { parseWhere, parseWhereDocument } from "./filters";
