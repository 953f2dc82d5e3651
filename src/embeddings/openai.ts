/**
 * openai.ts - OpenAI embedding provider
 *
 * Calls the embeddings endpoint of the `openai` SDK. The SDK client is
 * handed in by the factory (which loads the package lazily), so this file
 * never imports "openai" at runtime and tests can pass a fake client.
 */

import { BaseEmbedding } from "./base";

export const OPENAI_DEFAULT_MODEL = "text-embedding-3-small";

/** The OpenAI API accepts up to 2048 inputs per request; stay well below. */
const OPENAI_BATCH_SIZE = 512;

/**
 * The slice of the OpenAI client this provider uses.
 */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(params: {
      model: string;
      input: string[];
    }): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

/**
 * Usage:
 *   const embedder = new OpenAIEmbedding({ client: new OpenAI({ apiKey }) });
 *   const vectors = await embedder.embedDocuments(["managed database"]);
 *   // vectors[0] = [0.012, -0.034, ...] (1536 numbers)
 */
export class OpenAIEmbedding extends BaseEmbedding {
  readonly provider = "openai";
  private readonly client: OpenAIEmbeddingsClient;

  constructor(options: { client: OpenAIEmbeddingsClient; model?: string; batchSize?: number }) {
    super({
      model: options.model ?? OPENAI_DEFAULT_MODEL,
      batchSize: options.batchSize ?? OPENAI_BATCH_SIZE,
    });
    this.client = options.client;
  }

  protected async embedBatch(texts: string[]): Promise<number[][]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts,
    });

    // Sort by index to ensure order matches input order
    const sorted = [...response.data].sort((a, b) => a.index - b.index);
    return sorted.map((item) => item.embedding);
  }
}
