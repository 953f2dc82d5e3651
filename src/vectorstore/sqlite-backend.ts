/**
 * sqlite-backend.ts - Local, persistent implementation of VectorIndex
 *
 * What this file does:
 * Keeps collections and their vectors in a single SQLite file under the
 * configured persist directory (CHROMADB_PERSIST_PATH). No server is
 * needed, which makes it the default backend and the one tests run on.
 *
 * How it works:
 * - collections: one row per collection (name, metadata JSON, dimension)
 * - documents: one row per document, vectors as Float64 BLOBs so supplied
 *   embeddings come back bit-for-bit
 * - query(): exact brute-force search. Every candidate that passes the
 *   filters is scored with the collection's distance metric, then sorted.
 *   Array.prototype.sort is stable and rows are read in insertion order,
 *   so equal distances keep insertion order.
 *
 * better-sqlite3 is synchronous: each method runs to completion before any
 * other JavaScript does, and add() runs inside one transaction. Concurrent
 * readers therefore see a write entirely or not at all.
 */

import { mkdirSync } from "fs";
import path from "path";
import Database from "better-sqlite3";
import { z } from "zod";
import { DimensionMismatchError } from "../errors";
import {
  matchesWhere,
  matchesWhereDocument,
  parseWhere,
  parseWhereDocument,
  type DocumentExpression,
  type WhereExpression,
} from "./filters";
import {
  DISTANCE_METADATA_KEY,
  type CollectionInfo,
  type DistanceMetric,
  type IndexQueryOptions,
  type IndexRecord,
  type Metadata,
  type QueryResult,
  type VectorIndex,
} from "./types";

export const INDEX_FILE_NAME = "index.sqlite3";

// Finite numbers only: JSON.stringify would store NaN and Infinity as null
const metadataSchema = z.record(z.union([z.string(), z.number().finite(), z.boolean()]));

interface CollectionRow {
  name: string;
  metadata: string;
  dimension: number | null;
}

interface DocumentRow {
  id: string;
  document: string;
  metadata: string;
  embedding: Buffer;
}

interface StoredDocument {
  id: string;
  document: string;
  metadata: Metadata;
  embedding: number[];
}

export interface SqliteVectorIndexOptions {
  /** Directory holding index.sqlite3 (created if absent), or ":memory:" */
  persistPath: string;
  /** Allow reset() to drop every collection */
  allowReset?: boolean;
}

export class SqliteVectorIndex implements VectorIndex {
  private readonly db: Database.Database;
  private readonly allowReset: boolean;

  constructor(options: SqliteVectorIndexOptions) {
    this.allowReset = options.allowReset ?? false;

    if (options.persistPath === ":memory:") {
      this.db = new Database(":memory:");
    } else {
      mkdirSync(options.persistPath, { recursive: true });
      this.db = new Database(path.join(options.persistPath, INDEX_FILE_NAME));
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS collections (
        name TEXT PRIMARY KEY,
        metadata TEXT NOT NULL DEFAULT '{}',
        dimension INTEGER,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS documents (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        collection TEXT NOT NULL REFERENCES collections(name) ON DELETE CASCADE,
        id TEXT NOT NULL,
        document TEXT NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}',
        embedding BLOB NOT NULL,
        UNIQUE (collection, id)
      );

      CREATE INDEX IF NOT EXISTS idx_documents_collection ON documents(collection, seq);
    `);
  }

  async listCollections(): Promise<CollectionInfo[]> {
    const rows = this.db
      .prepare<[], CollectionRow>("SELECT name, metadata, dimension FROM collections ORDER BY created_at, name")
      .all();
    return rows.map(toCollectionInfo);
  }

  async getCollection(name: string): Promise<CollectionInfo | null> {
    const row = this.findCollection(name);
    return row ? toCollectionInfo(row) : null;
  }

  async createCollection(name: string, metadata: Metadata): Promise<CollectionInfo> {
    this.db
      .prepare("INSERT INTO collections (name, metadata, dimension, created_at) VALUES (?, ?, NULL, ?)")
      .run(name, serializeMetadata(metadata), Date.now());
    return { name, metadata: { ...metadata } };
  }

  async deleteCollection(name: string): Promise<boolean> {
    return this.db.prepare("DELETE FROM collections WHERE name = ?").run(name).changes > 0;
  }

  async getDimension(name: string): Promise<number | null> {
    return this.requireCollection(name).dimension;
  }

  async existingIds(name: string, ids: string[]): Promise<string[]> {
    this.requireCollection(name);
    const lookup = this.db.prepare<[string, string], { id: string }>(
      "SELECT id FROM documents WHERE collection = ? AND id = ?"
    );
    return ids.filter((id) => lookup.get(name, id) !== undefined);
  }

  async add(name: string, records: IndexRecord[]): Promise<void> {
    if (records.length === 0) return;

    const insert = this.db.prepare(
      "INSERT INTO documents (collection, id, document, metadata, embedding) VALUES (?, ?, ?, ?, ?)"
    );
    const setDimension = this.db.prepare("UPDATE collections SET dimension = ? WHERE name = ?");

    const write = this.db.transaction((batch: IndexRecord[]) => {
      const collection = this.requireCollection(name);
      let dimension = collection.dimension;

      for (const record of batch) {
        if (dimension === null) {
          dimension = record.embedding.length;
          setDimension.run(dimension, name);
        } else if (record.embedding.length !== dimension) {
          throw new DimensionMismatchError(name, dimension, record.embedding.length);
        }
        insert.run(
          name,
          record.id,
          record.document,
          serializeMetadata(record.metadata),
          encodeEmbedding(record.embedding)
        );
      }
    });

    write(records);
  }

  async query(
    name: string,
    queryEmbeddings: number[][],
    options: IndexQueryOptions
  ): Promise<QueryResult> {
    const collection = this.requireCollection(name);
    const metric = distanceMetricOf(toCollectionInfo(collection).metadata);
    const where: WhereExpression | null = options.where ? parseWhere(options.where) : null;
    const whereDocument: DocumentExpression | null = options.whereDocument
      ? parseWhereDocument(options.whereDocument)
      : null;

    const candidates = this.loadDocuments(name).filter(
      (doc) =>
        (!where || matchesWhere(doc.metadata, where)) &&
        (!whereDocument || matchesWhereDocument(doc.document, whereDocument))
    );

    const include = new Set(options.include);
    const result: QueryResult = { ids: [] };
    if (include.has("documents")) result.documents = [];
    if (include.has("metadatas")) result.metadatas = [];
    if (include.has("distances")) result.distances = [];
    if (include.has("embeddings")) result.embeddings = [];

    for (const queryEmbedding of queryEmbeddings) {
      if (collection.dimension !== null && queryEmbedding.length !== collection.dimension) {
        throw new DimensionMismatchError(name, collection.dimension, queryEmbedding.length);
      }

      const nearest = candidates
        .map((doc) => ({ doc, distance: computeDistance(metric, queryEmbedding, doc.embedding) }))
        .sort((a, b) => a.distance - b.distance)
        .slice(0, options.nResults);

      result.ids.push(nearest.map(({ doc }) => doc.id));
      result.documents?.push(nearest.map(({ doc }) => doc.document));
      result.metadatas?.push(nearest.map(({ doc }) => ({ ...doc.metadata })));
      result.distances?.push(nearest.map(({ distance }) => distance));
      result.embeddings?.push(nearest.map(({ doc }) => [...doc.embedding]));
    }

    return result;
  }

  async count(name: string): Promise<number> {
    this.requireCollection(name);
    const row = this.db
      .prepare<[string], { total: number }>("SELECT COUNT(*) AS total FROM documents WHERE collection = ?")
      .get(name);
    return row?.total ?? 0;
  }

  async deleteDocuments(name: string, ids: string[]): Promise<number> {
    this.requireCollection(name);
    const remove = this.db.prepare("DELETE FROM documents WHERE collection = ? AND id = ?");
    const run = this.db.transaction((batch: string[]) =>
      batch.reduce((removed, id) => removed + remove.run(name, id).changes, 0)
    );
    return run(ids);
  }

  async reset(): Promise<void> {
    if (!this.allowReset) {
      throw new Error("Resetting the vector index is disabled. Set CHROMADB_ALLOW_RESET=true to enable it.");
    }
    this.db.exec("DELETE FROM documents; DELETE FROM collections;");
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private findCollection(name: string): CollectionRow | undefined {
    return this.db
      .prepare<[string], CollectionRow>("SELECT name, metadata, dimension FROM collections WHERE name = ?")
      .get(name);
  }

  private requireCollection(name: string): CollectionRow {
    const row = this.findCollection(name);
    if (!row) {
      throw new Error(`Collection "${name}" does not exist in the local index.`);
    }
    return row;
  }

  private loadDocuments(name: string): StoredDocument[] {
    return this.db
      .prepare<[string], DocumentRow>(
        "SELECT id, document, metadata, embedding FROM documents WHERE collection = ? ORDER BY seq"
      )
      .all(name)
      .map((row) => ({
        id: row.id,
        document: row.document,
        metadata: parseMetadata(row.metadata),
        embedding: decodeEmbedding(row.embedding),
      }));
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function serializeMetadata(metadata: Metadata): string {
  return JSON.stringify(metadataSchema.parse(metadata));
}

function parseMetadata(json: string): Metadata {
  return metadataSchema.parse(JSON.parse(json));
}

function toCollectionInfo(row: CollectionRow): CollectionInfo {
  return { name: row.name, metadata: parseMetadata(row.metadata) };
}

function distanceMetricOf(metadata: Metadata): DistanceMetric {
  const space = metadata[DISTANCE_METADATA_KEY];
  return space === "cosine" || space === "ip" ? space : "l2";
}

export function encodeEmbedding(embedding: number[]): Buffer {
  return Buffer.from(Float64Array.from(embedding).buffer);
}

export function decodeEmbedding(buffer: Buffer): number[] {
  // Copy out first: the Buffer may not be 8-byte aligned inside its pool
  const bytes = buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength);
  return Array.from(new Float64Array(bytes));
}

/**
 * Distance between two vectors of equal length; lower means closer.
 */
export function computeDistance(metric: DistanceMetric, a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  let squared = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
    squared += (x - y) * (x - y);
  }

  switch (metric) {
    case "l2":
      return squared;
    case "ip":
      return 1 - dot;
    case "cosine": {
      const denominator = Math.sqrt(normA) * Math.sqrt(normB);
      return denominator === 0 ? 1 : 1 - dot / denominator;
    }
  }
}
