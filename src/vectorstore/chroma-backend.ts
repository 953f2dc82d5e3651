/**
 * chroma-backend.ts - Chroma server implementation of VectorIndex
 *
 * What this file does:
 * Implements the VectorIndex boundary against a running Chroma server.
 * This is the only file in the project that imports from "chromadb";
 * everything else codes against VectorIndex in types.ts.
 *
 * Selected with VECTOR_STORE_BACKEND=chroma. The local SQLite index is the
 * default because the TypeScript SDK always needs a server: there is no
 * in-process mode. Run `chroma run --path ./db/chroma` or use Docker.
 *
 * We always pass pre-computed embeddings (embeddingFunction: null).
 * Embedding is the collection service's job, so the index never needs to
 * know which provider a collection uses.
 */

import { ChromaClient, type Collection as ChromaCollection, type Where, type WhereDocument } from "chromadb";
import type {
  CollectionInfo,
  IndexQueryOptions,
  IndexRecord,
  Metadata,
  QueryResult,
  VectorIndex,
} from "./types";

export const DEFAULT_CHROMA_URL = "http://localhost:8000";

export interface ChromaVectorIndexOptions {
  /** Chroma server URL (default: http://localhost:8000) */
  chromaUrl?: string;
  /** Permit reset() (CHROMADB_ALLOW_RESET); refused otherwise */
  allowReset?: boolean;
}

export class ChromaVectorIndex implements VectorIndex {
  private readonly client: ChromaClient;
  private readonly allowReset: boolean;

  /**
   * Collection handles already fetched from the server.
   * Saves a getCollection round-trip on every add/query.
   */
  private readonly handles = new Map<string, ChromaCollection>();

  constructor(options: ChromaVectorIndexOptions = {}) {
    this.client = createChromaClient(options.chromaUrl ?? DEFAULT_CHROMA_URL);
    this.allowReset = options.allowReset ?? false;
  }

  async listCollections(): Promise<CollectionInfo[]> {
    const collections = await this.client.listCollections();
    return collections.map((collection) => ({
      name: collection.name,
      metadata: toMetadata(collection.metadata),
    }));
  }

  async getCollection(name: string): Promise<CollectionInfo | null> {
    const handle = await this.findHandle(name);
    return handle ? { name: handle.name, metadata: toMetadata(handle.metadata) } : null;
  }

  async createCollection(name: string, metadata: Metadata): Promise<CollectionInfo> {
    const handle = await this.client.createCollection({
      name,
      ...(Object.keys(metadata).length > 0 ? { metadata } : {}),
      embeddingFunction: null,
    });
    this.handles.set(name, handle);
    return { name, metadata: { ...metadata } };
  }

  async deleteCollection(name: string): Promise<boolean> {
    const handle = await this.findHandle(name);
    if (!handle) return false;
    await this.client.deleteCollection({ name });
    this.handles.delete(name);
    return true;
  }

  async getDimension(name: string): Promise<number | null> {
    const handle = await this.requireHandle(name);
    const sample = await handle.get({ limit: 1, include: ["embeddings"] });
    const first = sample.embeddings[0];
    return first ? first.length : null;
  }

  async existingIds(name: string, ids: string[]): Promise<string[]> {
    if (ids.length === 0) return [];
    const handle = await this.requireHandle(name);
    const found = await handle.get({ ids, include: [] });
    return found.ids;
  }

  async add(name: string, records: IndexRecord[]): Promise<void> {
    if (records.length === 0) return;
    const handle = await this.requireHandle(name);
    await handle.add({
      ids: records.map((record) => record.id),
      embeddings: records.map((record) => record.embedding),
      documents: records.map((record) => record.document),
      metadatas: records.map((record) => record.metadata),
    });
  }

  async query(
    name: string,
    queryEmbeddings: number[][],
    options: IndexQueryOptions
  ): Promise<QueryResult> {
    const handle = await this.requireHandle(name);
    const results = await handle.query({
      queryEmbeddings,
      nResults: options.nResults,
      include: [...options.include],
      // Filters are validated by filters.ts before they get here and use
      // the same operator syntax Chroma does
      ...(options.where && Object.keys(options.where).length > 0
        ? { where: options.where as Where }
        : {}),
      ...(options.whereDocument && Object.keys(options.whereDocument).length > 0
        ? { whereDocument: options.whereDocument as WhereDocument }
        : {}),
    });

    const include = new Set(options.include);
    const result: QueryResult = { ids: results.ids };
    if (include.has("documents")) {
      result.documents = results.documents.map((row) => row.map((doc) => doc ?? ""));
    }
    if (include.has("metadatas")) {
      result.metadatas = results.metadatas.map((row) => row.map(toMetadata));
    }
    if (include.has("distances")) {
      result.distances = results.distances.map((row) => row.map((distance) => distance ?? 0));
    }
    if (include.has("embeddings")) {
      result.embeddings = results.embeddings.map((row) => row.map((embedding) => embedding ?? []));
    }
    return result;
  }

  async count(name: string): Promise<number> {
    const handle = await this.requireHandle(name);
    return handle.count();
  }

  async deleteDocuments(name: string, ids: string[]): Promise<number> {
    const present = await this.existingIds(name, ids);
    if (present.length === 0) return 0;
    const handle = await this.requireHandle(name);
    await handle.delete({ ids: present });
    return present.length;
  }

  async reset(): Promise<void> {
    if (!this.allowReset) {
      throw new Error("Resetting the vector index is disabled. Set CHROMADB_ALLOW_RESET=true to enable it.");
    }
    // The server also refuses unless it was started with ALLOW_RESET=TRUE
    await this.client.reset();
    this.handles.clear();
  }

  async close(): Promise<void> {
    this.handles.clear();
  }

  private async findHandle(name: string): Promise<ChromaCollection | null> {
    const cached = this.handles.get(name);
    if (cached) return cached;

    try {
      const handle = await this.client.getCollection({ name });
      this.handles.set(name, handle);
      return handle;
    } catch (error) {
      if (error instanceof Error && error.name === "ChromaNotFoundError") {
        return null;
      }
      throw error;
    }
  }

  private async requireHandle(name: string): Promise<ChromaCollection> {
    const handle = await this.findHandle(name);
    if (!handle) {
      throw new Error(`Collection "${name}" does not exist on the Chroma server.`);
    }
    return handle;
  }
}

/**
 * Builds a v3 client from a URL. The SDK deprecated the `path` argument in
 * favour of host/port/ssl.
 */
export function createChromaClient(url: string): ChromaClient {
  const parsed = new URL(url);
  return new ChromaClient({
    host: parsed.hostname,
    port: parseInt(parsed.port || (parsed.protocol === "https:" ? "443" : "8000"), 10),
    ssl: parsed.protocol === "https:",
  });
}

/** Keeps the scalar entries of a Chroma metadata record; nulls are dropped. */
function toMetadata(raw: Record<string, unknown> | null | undefined): Metadata {
  const metadata: Metadata = {};
  for (const [key, value] of Object.entries(raw ?? {})) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      metadata[key] = value;
    }
  }
  return metadata;
}
