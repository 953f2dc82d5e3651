/**
 * voyage.ts - Voyage AI embedding provider
 *
 * Voyage AI's API returns one vector per input (1024 dimensions for the
 * voyage-3 family). Like the other providers, the SDK client is injected
 * by the factory so the "voyageai" package is only loaded when selected.
 */

import { EmbeddingError } from "../errors";
import { BaseEmbedding } from "./base";

export const VOYAGE_DEFAULT_MODEL = "voyage-3";

/** Voyage accepts up to 128 texts per request. */
const VOYAGE_BATCH_SIZE = 128;

/**
 * The slice of VoyageAIClient this provider uses. Every field in the
 * generated response types is optional, hence the checks below.
 */
export interface VoyageEmbedClient {
  embed(request: {
    input: string[];
    model: string;
  }): Promise<{ data?: Array<{ embedding?: number[]; index?: number }> }>;
}

export class VoyageEmbedding extends BaseEmbedding {
  readonly provider = "voyage";
  private readonly client: VoyageEmbedClient;

  constructor(options: { client: VoyageEmbedClient; model?: string; batchSize?: number }) {
    super({
      model: options.model ?? VOYAGE_DEFAULT_MODEL,
      batchSize: options.batchSize ?? VOYAGE_BATCH_SIZE,
    });
    this.client = options.client;
  }

  protected async embedBatch(texts: string[]): Promise<number[][]> {
    const response = await this.client.embed({
      input: texts,
      model: this.model,
    });

    // The API returns { data: [{ embedding: number[], index: number }, ...] }
    if (!response.data) {
      throw new EmbeddingError("Voyage AI returned no embedding data", {
        provider: this.provider,
        model: this.model,
      });
    }

    // Sort by index to ensure order matches input order
    const sorted = [...response.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));

    return sorted.map((item) => {
      if (!item.embedding) {
        throw new EmbeddingError("Voyage AI returned an embedding without vector data", {
          provider: this.provider,
          model: this.model,
        });
      }
      return item.embedding;
    });
  }
}
