/**
 * providers.test.ts - Unit tests for the provider adapters and BaseEmbedding
 *
 * Each provider gets a hand-written fake client with just the method the
 * adapter calls. The fakes return tiny made-up vectors.
 */

import { describe, it, expect, vi } from "vitest";
import { EmbeddingError } from "../errors";
import { normalizeInput } from "./base";
import { HuggingFaceEmbedding, toSentenceVectors, type FeatureExtractionOutput } from "./huggingface";
import { OpenAIEmbedding, type OpenAIEmbeddingsClient } from "./openai";
import { VoyageEmbedding, type VoyageEmbedClient } from "./voyage";

// ---------------------------------------------------------------------------
// Fake clients
// ---------------------------------------------------------------------------

/** Embeds each text as [length, index-in-request]. */
function createFakeOpenAIClient() {
  const create = vi.fn(async (params: { model: string; input: string[] }) => ({
    data: params.input.map((text, index) => ({ embedding: [text.length, index], index })),
  }));
  const client: OpenAIEmbeddingsClient = { embeddings: { create } };
  return { client, create };
}

// ---------------------------------------------------------------------------
// normalizeInput
// ---------------------------------------------------------------------------

describe("normalizeInput", () => {
  it("replaces newlines with spaces", () => {
    expect(normalizeInput("line one\nline two\r\nline three")).toBe("line one line two line three");
  });

  it("turns an empty string into a single space", () => {
    expect(normalizeInput("")).toBe(" ");
  });

  it("leaves other text alone", () => {
    expect(normalizeInput("  padded  ")).toBe("  padded  ");
  });
});

// ---------------------------------------------------------------------------
// OpenAIEmbedding (exercises the shared BaseEmbedding behaviour)
// ---------------------------------------------------------------------------

describe("OpenAIEmbedding", () => {
  it("sends the model and normalised inputs", async () => {
    const { client, create } = createFakeOpenAIClient();
    const embedder = new OpenAIEmbedding({ client });

    await embedder.embedDocuments(["a\nb", ""]);

    expect(create).toHaveBeenCalledWith({ model: "text-embedding-3-small", input: ["a b", " "] });
  });

  it("returns one vector per input in input order", async () => {
    const { client } = createFakeOpenAIClient();
    const embedder = new OpenAIEmbedding({ client });

    const vectors = await embedder.embedDocuments(["cat", "horse"]);

    expect(vectors).toEqual([
      [3, 0],
      [5, 1],
    ]);
  });

  it("reorders results by their index field", async () => {
    const create = vi.fn(async () => ({
      data: [
        { embedding: [2, 2], index: 1 },
        { embedding: [1, 1], index: 0 },
      ],
    }));
    const embedder = new OpenAIEmbedding({ client: { embeddings: { create } } });

    expect(await embedder.embedDocuments(["first", "second"])).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it("splits large inputs into batches", async () => {
    const { client, create } = createFakeOpenAIClient();
    const embedder = new OpenAIEmbedding({ client, batchSize: 2 });

    const vectors = await embedder.embedDocuments(["a", "bb", "ccc", "dddd", "eeeee"]);

    expect(create).toHaveBeenCalledTimes(3);
    expect(create.mock.calls.map(([params]) => params.input)).toEqual([["a", "bb"], ["ccc", "dddd"], ["eeeee"]]);
    expect(vectors.map(([length]) => length)).toEqual([1, 2, 3, 4, 5]);
  });

  it("does not call the provider for empty input", async () => {
    const { client, create } = createFakeOpenAIClient();
    const embedder = new OpenAIEmbedding({ client });

    expect(await embedder.embedDocuments([])).toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  it("embeds a single query", async () => {
    const { client } = createFakeOpenAIClient();
    const embedder = new OpenAIEmbedding({ client });

    expect(await embedder.embedQuery("feline")).toEqual([6, 0]);
  });

  it("embeds the same text to the same vector every time", async () => {
    const { client } = createFakeOpenAIClient();
    const embedder = new OpenAIEmbedding({ client });

    expect(await embedder.embedQuery("same text")).toEqual(await embedder.embedQuery("same text"));
  });

  it("wraps SDK failures in EmbeddingError", async () => {
    const create = vi.fn(async () => {
      throw new Error("401 Incorrect API key provided");
    });
    const embedder = new OpenAIEmbedding({ client: { embeddings: { create } } });

    const failure = embedder.embedDocuments(["text"]);

    await expect(failure).rejects.toThrow(EmbeddingError);
    await expect(embedder.embedDocuments(["text"])).rejects.toThrow(
      "openai embedding request failed: 401 Incorrect API key provided"
    );
  });

  it("rejects a response with the wrong number of vectors", async () => {
    const create = vi.fn(async () => ({ data: [{ embedding: [1, 2], index: 0 }] }));
    const embedder = new OpenAIEmbedding({ client: { embeddings: { create } } });

    await expect(embedder.embedDocuments(["one", "two"])).rejects.toThrow(
      "openai returned 1 vectors for 2 inputs"
    );
  });

  it("rejects vectors of differing length", async () => {
    const create = vi.fn(async () => ({
      data: [
        { embedding: [1, 2], index: 0 },
        { embedding: [1, 2, 3], index: 1 },
      ],
    }));
    const embedder = new OpenAIEmbedding({ client: { embeddings: { create } } });

    await expect(embedder.embedDocuments(["one", "two"])).rejects.toThrow(
      "openai returned vectors of inconsistent length"
    );
  });

  it("rejects non-finite values", async () => {
    const create = vi.fn(async () => ({ data: [{ embedding: [1, Number.NaN], index: 0 }] }));
    const embedder = new OpenAIEmbedding({ client: { embeddings: { create } } });

    await expect(embedder.embedDocuments(["one"])).rejects.toThrow("non-finite values");
  });
});

// ---------------------------------------------------------------------------
// VoyageEmbedding
// ---------------------------------------------------------------------------

describe("VoyageEmbedding", () => {
  it("calls embed with input and model and reorders by index", async () => {
    const embed = vi.fn(async () => ({
      data: [
        { embedding: [0.5, 0.5], index: 1 },
        { embedding: [0.1, 0.9], index: 0 },
      ],
    }));
    const client: VoyageEmbedClient = { embed };
    const embedder = new VoyageEmbedding({ client });

    const vectors = await embedder.embedDocuments(["first", "second"]);

    expect(embed).toHaveBeenCalledWith({ input: ["first", "second"], model: "voyage-3" });
    expect(vectors).toEqual([
      [0.1, 0.9],
      [0.5, 0.5],
    ]);
  });

  it("fails when the response has no data", async () => {
    const embedder = new VoyageEmbedding({ client: { embed: vi.fn(async () => ({})) } });

    await expect(embedder.embedDocuments(["text"])).rejects.toThrow(EmbeddingError);
  });

  it("fails when an item has no embedding", async () => {
    const embedder = new VoyageEmbedding({
      client: { embed: vi.fn(async () => ({ data: [{ index: 0 }] })) },
    });

    await expect(embedder.embedDocuments(["text"])).rejects.toThrow(EmbeddingError);
  });
});

// ---------------------------------------------------------------------------
// HuggingFaceEmbedding
// ---------------------------------------------------------------------------

describe("toSentenceVectors", () => {
  it("wraps a flat vector for a single input", () => {
    expect(toSentenceVectors([0.1, 0.2, 0.3], 1, "test-model")).toEqual([[0.1, 0.2, 0.3]]);
  });

  it("keeps one sentence vector per input", () => {
    const output: FeatureExtractionOutput = [
      [1, 2],
      [3, 4],
    ];

    expect(toSentenceVectors(output, 2, "test-model")).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("mean-pools token-level output", () => {
    const output: FeatureExtractionOutput = [
      [
        [1, 2],
        [3, 6],
      ],
    ];

    expect(toSentenceVectors(output, 1, "test-model")).toEqual([[2, 4]]);
  });

  it("rejects a flat vector for several inputs", () => {
    expect(() => toSentenceVectors([0.1, 0.2], 2, "test-model")).toThrow(
      "HuggingFace returned an unexpected output shape"
    );
  });
});

describe("HuggingFaceEmbedding", () => {
  it("requests feature extraction for the model", async () => {
    const featureExtraction = vi.fn(async (args: { model: string; inputs: string[] }) =>
      args.inputs.map((text) => [text.length, 1])
    );
    const embedder = new HuggingFaceEmbedding({ client: { featureExtraction } });

    const vectors = await embedder.embedDocuments(["dog", "feline"]);

    expect(featureExtraction).toHaveBeenCalledWith({
      model: "sentence-transformers/all-MiniLM-L6-v2",
      inputs: ["dog", "feline"],
    });
    expect(vectors).toEqual([
      [3, 1],
      [6, 1],
    ]);
    expect(embedder.provider).toBe("huggingface");
  });
});
