/**
 * base.ts - Shared behaviour of every embedding provider
 *
 * Providers only implement embedBatch(): one request for a handful of
 * already-normalised strings. Everything around it is the same for all of
 * them and lives here:
 *
 * - normalisation: newlines become spaces, an empty string becomes a
 *   single space (OpenAI and Voyage reject empty input)
 * - batching: long inputs are split into provider-sized requests
 * - checks: one vector per input, all the same length, finite numbers
 * - tracing: one span per request
 * - errors: anything the SDK throws is wrapped in EmbeddingError with the
 *   provider and model attached
 */

import { EmbeddingError } from "../errors";
import { withSpan } from "../tracing";
import type { EmbeddingCapability } from "./types";

export interface BaseEmbeddingOptions {
  model: string;
  /** Maximum texts per provider request */
  batchSize: number;
}

export abstract class BaseEmbedding implements EmbeddingCapability {
  abstract readonly provider: string;
  readonly model: string;
  protected readonly batchSize: number;

  protected constructor(options: BaseEmbeddingOptions) {
    this.model = options.model;
    this.batchSize = Math.max(1, options.batchSize);
  }

  /**
   * Sends one request to the provider.
   *
   * @param texts - Normalised, non-empty strings; never more than batchSize
   * @returns One vector per input, in input order
   */
  protected abstract embedBatch(texts: string[]): Promise<number[][]>;

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embedDocuments([text]);
    if (!vector) {
      throw new EmbeddingError(`${this.provider} returned no vector for the query`, {
        provider: this.provider,
        model: this.model,
      });
    }
    return vector;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const inputs = texts.map(normalizeInput);
    const vectors: number[][] = [];

    for (let start = 0; start < inputs.length; start += this.batchSize) {
      const batch = inputs.slice(start, start + this.batchSize);
      vectors.push(...(await this.requestBatch(batch)));
    }

    assertUniformDimension(vectors, this.provider, this.model);
    return vectors;
  }

  private requestBatch(batch: string[]): Promise<number[][]> {
    return withSpan(
      `embed ${this.provider}`,
      {
        "embedding.provider": this.provider,
        "embedding.model": this.model,
        "embedding.batch_size": batch.length,
      },
      async () => {
        let vectors: number[][];
        try {
          vectors = await this.embedBatch(batch);
        } catch (error) {
          if (error instanceof EmbeddingError) throw error;
          throw new EmbeddingError(
            `${this.provider} embedding request failed: ${error instanceof Error ? error.message : String(error)}`,
            { provider: this.provider, model: this.model, batchSize: batch.length },
            error
          );
        }

        if (vectors.length !== batch.length) {
          throw new EmbeddingError(
            `${this.provider} returned ${vectors.length} vectors for ${batch.length} inputs`,
            { provider: this.provider, model: this.model }
          );
        }
        return vectors;
      }
    );
  }
}

/**
 * Prepares one input string for a provider request.
 */
export function normalizeInput(text: string): string {
  const flattened = text.replace(/\r?\n/g, " ");
  return flattened.length === 0 ? " " : flattened;
}

function assertUniformDimension(vectors: number[][], provider: string, model: string): void {
  const dimension = vectors[0]?.length ?? 0;
  for (const vector of vectors) {
    if (vector.length === 0 || vector.length !== dimension) {
      throw new EmbeddingError(`${provider} returned vectors of inconsistent length`, {
        provider,
        model,
        expected: dimension,
        actual: vector.length,
      });
    }
    if (!vector.every(Number.isFinite)) {
      throw new EmbeddingError(`${provider} returned a vector with non-finite values`, {
        provider,
        model,
      });
    }
  }
}
