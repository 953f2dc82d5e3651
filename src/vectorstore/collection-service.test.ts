/**
 * collection-service.test.ts - Unit tests for VectorCollectionService
 *
 * Runs on a real SqliteVectorIndex over ":memory:" with a deterministic
 * fake embedding capability, so ranking is exact and no provider is
 * called.
 *
 * The fake embeds text onto three axes: "cat-ness", "dog-ness" and a small
 * constant. Words it doesn't know contribute nothing, which is enough to
 * make "feline" land next to the cat document and far from the dog one.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { EmbeddingCapability } from "../embeddings";
import { createLogger, type Logger } from "../logging/logger";
import { VectorCollectionService } from "./collection-service";
import { SqliteVectorIndex } from "./sqlite-backend";
import type { Metadata } from "./types";

// ---------------------------------------------------------------------------
// Test fixtures
// ---------------------------------------------------------------------------

const CONCEPTS: Record<string, number[]> = {
  cat: [1, 0, 0],
  cats: [1, 0, 0],
  feline: [1, 0, 0],
  kitten: [1, 0, 0],
  dog: [0, 1, 0],
  dogs: [0, 1, 0],
  puppy: [0, 1, 0],
};

function embedText(text: string): number[] {
  const vector = [0, 0, 0.1];
  for (const word of text.toLowerCase().match(/[a-z]+/g) ?? []) {
    const concept = CONCEPTS[word];
    if (!concept) continue;
    concept.forEach((value, i) => {
      vector[i] = (vector[i] ?? 0) + value;
    });
  }
  return vector;
}

class FakeEmbedding implements EmbeddingCapability {
  readonly provider = "fake";
  readonly embedDocuments = vi.fn(async (texts: string[]) => texts.map(embedText));

  constructor(readonly model = "concepts-v1") {}

  async embedQuery(text: string): Promise<number[]> {
    return embedText(text);
  }
}

/** pino logger whose JSON lines are collected for assertions. */
function captureLogger(): { logger: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    level: "debug",
    destination: {
      write(message: string) {
        lines.push(JSON.parse(message));
      },
    },
  });
  return { logger, lines };
}

function sequentialIds(): () => string {
  let next = 0;
  return () => `doc-${++next}`;
}

const CAT_DOC = "The cat sat on the mat";
const DOG_DOC = "Dogs are loyal companions";

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

let index: SqliteVectorIndex;
let embedding: FakeEmbedding;
let log: ReturnType<typeof captureLogger>;
let service: VectorCollectionService;

beforeEach(() => {
  index = new SqliteVectorIndex({ persistPath: ":memory:" });
  embedding = new FakeEmbedding();
  log = captureLogger();
  service = new VectorCollectionService({
    index,
    defaultEmbedding: embedding,
    logger: log.logger,
    generateId: sequentialIds(),
  });
});

afterEach(async () => {
  await service.close();
});

function warnings(): string[] {
  return log.lines.filter((line) => line.level === "warn").map((line) => String(line.msg));
}

// ---------------------------------------------------------------------------
// getOrCreateCollection
// ---------------------------------------------------------------------------

describe("getOrCreateCollection", () => {
  it("creates an empty collection bound to the default capability", async () => {
    const collection = await service.getOrCreateCollection("pets", { topic: "animals" });

    expect(collection.name).toBe("pets");
    expect(collection.embedding).toBe(embedding);
    expect(collection.metadata).toEqual({
      topic: "animals",
      "embedding:provider": "fake",
      "embedding:model": "concepts-v1",
    });
    expect(await service.listCollections()).toEqual(["pets"]);
    expect(await service.getCollectionCount("pets")).toBe(0);
  });

  it("binds a supplied capability", async () => {
    const other = new FakeEmbedding("concepts-v2");

    const collection = await service.getOrCreateCollection("pets", {}, other);

    expect(collection.embedding).toBe(other);
    expect(collection.metadata["embedding:model"]).toBe("concepts-v2");
  });

  it("returns the existing binding and ignores a different capability", async () => {
    const first = await service.getOrCreateCollection("pets");

    const second = await service.getOrCreateCollection("pets", { topic: "ignored" }, new FakeEmbedding("concepts-v2"));

    expect(second).toBe(first);
    expect(second.embedding).toBe(embedding);
    expect(warnings()).toEqual([
      "Collection is bound to a different embedding model; the requested one is ignored",
    ]);
  });

  it("does not warn when the same capability is passed again", async () => {
    await service.getOrCreateCollection("pets", {}, embedding);
    await service.getOrCreateCollection("pets", {}, embedding);

    expect(warnings()).toEqual([]);
  });

  it("binds a collection created by an earlier process", async () => {
    await service.getOrCreateCollection("pets", {}, new FakeEmbedding("concepts-v2"));
    const restarted = new VectorCollectionService({
      index,
      defaultEmbedding: embedding,
      logger: log.logger,
    });

    const collection = await restarted.getOrCreateCollection("pets");

    expect(collection.embedding).toBe(embedding);
    expect(collection.metadata["embedding:model"]).toBe("concepts-v2");
    expect(warnings()).toHaveLength(1);
  });

  it("creates a collection once when called concurrently", async () => {
    const [a, b] = await Promise.all([
      service.getOrCreateCollection("pets"),
      service.getOrCreateCollection("pets"),
    ]);

    expect(a).toBe(b);
    expect(await service.listCollections()).toEqual(["pets"]);
  });

  it("throws for an empty name", async () => {
    await expect(service.getOrCreateCollection("  ")).rejects.toThrow("Collection name must not be empty");
  });

  it("throws for non-finite metadata and creates nothing", async () => {
    await expect(service.getOrCreateCollection("weights", { weight: NaN })).rejects.toThrow(
      'Metadata value for "weight" must be a finite number'
    );

    expect(await service.listCollections()).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// addDocuments / queryDocuments
// ---------------------------------------------------------------------------

describe("adding and querying", () => {
  beforeEach(async () => {
    await service.getOrCreateCollection("pets");
  });

  it("finds the cat document for 'feline'", async () => {
    expect(await service.addDocuments("pets", [CAT_DOC, DOG_DOC], { ids: ["cat", "dog"] })).toBe(true);

    const result = await service.queryDocuments("pets", "feline", { nResults: 1 });

    expect(result).toEqual({
      ids: [["cat"]],
      documents: [[CAT_DOC]],
      metadatas: [[{}]],
      distances: [[0]],
    });
  });

  it("ranks every document for each query text", async () => {
    await service.addDocuments("pets", [CAT_DOC, DOG_DOC], { ids: ["cat", "dog"] });

    const result = await service.queryDocuments("pets", ["kitten", "puppy"], { include: ["distances"] });

    expect(result?.ids).toEqual([
      ["cat", "dog"],
      ["dog", "cat"],
    ]);
    expect(result?.distances).toEqual([
      [0, 2],
      [0, 2],
    ]);
  });

  it("generates ids and empty metadata when omitted", async () => {
    await service.addDocuments("pets", [CAT_DOC, DOG_DOC]);

    const result = await service.queryDocuments("pets", "cat", { include: ["metadatas"] });

    expect(result?.ids).toEqual([["doc-1", "doc-2"]]);
    expect(result?.metadatas).toEqual([[{}, {}]]);
  });

  it("stores metadata and filters on it", async () => {
    await service.addDocuments("pets", [CAT_DOC, DOG_DOC], {
      ids: ["cat", "dog"],
      metadatas: [{ legs: 4, sound: "meow" }, { legs: 4, sound: "woof" }],
    });

    const result = await service.queryDocuments("pets", "feline", {
      where: { sound: "woof" },
      include: ["metadatas"],
    });

    expect(result?.ids).toEqual([["dog"]]);
    expect(result?.metadatas).toEqual([[{ legs: 4, sound: "woof" }]]);
  });

  it("filters on document content", async () => {
    await service.addDocuments("pets", [CAT_DOC, DOG_DOC], { ids: ["cat", "dog"] });

    const result = await service.queryDocuments("pets", "feline", {
      whereDocument: { $contains: "loyal" },
      include: [],
    });

    expect(result?.ids).toEqual([["dog"]]);
  });

  it("stores supplied embeddings verbatim and computes the rest", async () => {
    const added = await service.addDocuments("pets", [CAT_DOC, DOG_DOC], {
      ids: ["cat", "dog"],
      embeddings: [[0.25, 0.5, 0.75], null],
    });

    const result = await service.queryDocuments("pets", "anything", {
      nResults: 2,
      include: ["embeddings"],
    });

    expect(added).toBe(true);
    expect(embedding.embedDocuments).toHaveBeenCalledWith([DOG_DOC]);
    expect(result?.embeddings?.[0]).toContainEqual([0.25, 0.5, 0.75]);
    expect(result?.embeddings?.[0]).toContainEqual([0, 1, 0.1]);
  });

  it("returns null for an unknown collection", async () => {
    expect(await service.queryDocuments("missing", "feline")).toBeNull();
  });

  it("returns null for an invalid nResults", async () => {
    await service.addDocuments("pets", [CAT_DOC]);

    expect(await service.queryDocuments("pets", "feline", { nResults: 0 })).toBeNull();
    expect(await service.queryDocuments("pets", "feline", { nResults: 1.5 })).toBeNull();
  });

  it("rejects an invalid filter before embedding anything", async () => {
    embedding.embedDocuments.mockClear();

    expect(await service.queryDocuments("pets", "feline", { where: { legs: { $gtt: 2 } } })).toBeNull();
    expect(embedding.embedDocuments).not.toHaveBeenCalled();
  });

  it("returns null when the provider fails", async () => {
    await service.addDocuments("pets", [CAT_DOC]);
    embedding.embedDocuments.mockRejectedValueOnce(new Error("provider down"));

    expect(await service.queryDocuments("pets", "feline")).toBeNull();
    expect(log.lines.at(-1)).toMatchObject({
      level: "error",
      operation: "queryDocuments",
      collection: "pets",
      error: { type: "Error", message: "provider down" },
    });
  });
});

// ---------------------------------------------------------------------------
// addDocuments failures: nothing is written
// ---------------------------------------------------------------------------

describe("addDocuments failures", () => {
  beforeEach(async () => {
    await service.getOrCreateCollection("pets");
  });

  async function expectRejectedAdd(added: Promise<boolean>, countAfter = 0): Promise<void> {
    expect(await added).toBe(false);
    expect(await service.getCollectionCount("pets")).toBe(countAfter);
  }

  it("fails for an unknown collection", async () => {
    expect(await service.addDocuments("missing", [CAT_DOC])).toBe(false);
    expect(await service.listCollections()).toEqual(["pets"]);
  });

  it("fails when metadatas don't line up with documents", async () => {
    await expectRejectedAdd(service.addDocuments("pets", [CAT_DOC, DOG_DOC], { metadatas: [{}] }));
  });

  it("fails when ids don't line up with documents", async () => {
    await expectRejectedAdd(service.addDocuments("pets", [CAT_DOC], { ids: ["a", "b"] }));
  });

  it("fails with more embeddings than documents", async () => {
    await expectRejectedAdd(
      service.addDocuments("pets", [CAT_DOC], { embeddings: [[1, 0, 0], [0, 1, 0]] })
    );
  });

  it("fails for duplicate ids within one call", async () => {
    await expectRejectedAdd(service.addDocuments("pets", [CAT_DOC, DOG_DOC], { ids: ["same", "same"] }));
  });

  it("fails for ids already stored and keeps the original", async () => {
    await service.addDocuments("pets", [CAT_DOC], { ids: ["cat"] });

    await expectRejectedAdd(service.addDocuments("pets", [DOG_DOC, "A kitten"], { ids: ["new", "cat"] }), 1);

    const result = await service.queryDocuments("pets", "cat", { include: ["documents"] });
    expect(result?.documents).toEqual([[CAT_DOC]]);
  });

  it("fails for a supplied embedding of the wrong dimension", async () => {
    await service.addDocuments("pets", [CAT_DOC]);

    await expectRejectedAdd(
      service.addDocuments("pets", [DOG_DOC], { embeddings: [[1, 2]] }),
      1
    );
    expect(log.lines.at(-1)).toMatchObject({
      operation: "addDocuments",
      error: { type: "DimensionMismatchError" },
    });
  });

  it("fails for supplied embeddings of differing length in one call", async () => {
    await expectRejectedAdd(
      service.addDocuments("pets", [CAT_DOC, DOG_DOC], { embeddings: [[1, 2], [1, 2, 3]] })
    );
  });

  it("fails for non-finite embedding values", async () => {
    await expectRejectedAdd(
      service.addDocuments("pets", [CAT_DOC], { embeddings: [[1, Number.POSITIVE_INFINITY, 0]] })
    );
  });

  it("fails for non-scalar metadata values", async () => {
    const nested: Metadata = JSON.parse('{"tags":["a","b"]}');

    await expectRejectedAdd(service.addDocuments("pets", [CAT_DOC], { metadatas: [nested] }));
  });

  it("fails for non-finite metadata numbers and keeps the collection queryable", async () => {
    await expectRejectedAdd(
      service.addDocuments("pets", [CAT_DOC], { metadatas: [{ score: Number.POSITIVE_INFINITY }] })
    );
    expect(await service.addDocuments("pets", [DOG_DOC])).toBe(true);

    const result = await service.queryDocuments("pets", "dog", { nResults: 5 });

    expect(result?.ids).toEqual([["doc-1"]]);
    expect(await service.getCollectionCount("pets")).toBe(1);
  });

  it("fails when the provider fails", async () => {
    embedding.embedDocuments.mockRejectedValueOnce(new Error("rate limited"));

    await expectRejectedAdd(service.addDocuments("pets", [CAT_DOC, DOG_DOC]));
  });

  it("lets exactly one of two concurrent adds claim an id", async () => {
    const results = await Promise.all([
      service.addDocuments("pets", [CAT_DOC], { ids: ["shared"] }),
      service.addDocuments("pets", [DOG_DOC], { ids: ["shared"] }),
    ]);

    expect(results).toEqual([true, false]);
    expect(await service.getCollectionCount("pets")).toBe(1);
  });

  it("accepts an empty batch without writing", async () => {
    expect(await service.addDocuments("pets", [])).toBe(true);
    expect(await service.getCollectionCount("pets")).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

describe("collection lifecycle", () => {
  it("counts documents, and -1 for unknown collections", async () => {
    await service.getOrCreateCollection("pets");
    await service.addDocuments("pets", [CAT_DOC, DOG_DOC]);

    expect(await service.getCollectionCount("pets")).toBe(2);
    expect(await service.getCollectionCount("missing")).toBe(-1);
  });

  it("deletes a collection once", async () => {
    await service.getOrCreateCollection("pets");

    expect(await service.deleteCollection("pets")).toBe(true);
    expect(await service.deleteCollection("pets")).toBe(false);
    expect(await service.listCollections()).toEqual([]);
    expect(await service.getCollectionCount("pets")).toBe(-1);
  });

  it("forgets the binding of a deleted collection", async () => {
    await service.getOrCreateCollection("pets", {}, new FakeEmbedding("concepts-v2"));
    await service.deleteCollection("pets");

    const recreated = await service.getOrCreateCollection("pets");

    expect(recreated.embedding).toBe(embedding);
  });

  it("deletes documents by id", async () => {
    await service.getOrCreateCollection("pets");
    await service.addDocuments("pets", [CAT_DOC, DOG_DOC], { ids: ["cat", "dog"] });

    expect(await service.deleteDocuments("pets", ["cat", "unknown"])).toBe(true);
    expect(await service.getCollectionCount("pets")).toBe(1);
    expect(await service.deleteDocuments("missing", ["cat"])).toBe(false);
  });

  it("refuses reset unless the index allows it", async () => {
    await service.getOrCreateCollection("pets");

    expect(await service.reset()).toBe(false);
    expect(await service.listCollections()).toEqual(["pets"]);
  });

  it("drops everything on reset when allowed", async () => {
    const resettable = new VectorCollectionService({
      index: new SqliteVectorIndex({ persistPath: ":memory:", allowReset: true }),
      defaultEmbedding: embedding,
    });
    await resettable.getOrCreateCollection("pets");
    await resettable.getOrCreateCollection("plants");

    expect(await resettable.reset()).toBe(true);
    expect(await resettable.listCollections()).toEqual([]);
    expect(await resettable.addDocuments("pets", [CAT_DOC])).toBe(false);
    await resettable.close();
  });

  it("returns [] when listing fails", async () => {
    vi.spyOn(index, "listCollections").mockRejectedValueOnce(new Error("disk I/O error"));

    expect(await service.listCollections()).toEqual([]);
  });
});
