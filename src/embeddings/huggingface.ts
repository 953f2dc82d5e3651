/**
 * huggingface.ts - HuggingFace embedding provider
 *
 * Runs sentence-transformers models through the HuggingFace Inference API
 * (`@huggingface/inference`, feature-extraction task). The access token is
 * optional: public models work anonymously at a lower rate limit.
 *
 * Output shapes:
 * Sentence-transformers models return one pooled vector per input
 * (number[][]). Plain transformer models return token-level vectors
 * (number[][][]); those are mean-pooled here so the caller always gets one
 * vector per text.
 */

import { EmbeddingError } from "../errors";
import { BaseEmbedding } from "./base";

export const HUGGINGFACE_DEFAULT_MODEL = "sentence-transformers/all-MiniLM-L6-v2";

const HUGGINGFACE_BATCH_SIZE = 64;

export type FeatureExtractionOutput = Array<number | number[] | number[][]>;

/**
 * The slice of InferenceClient this provider uses.
 */
export interface FeatureExtractionClient {
  featureExtraction(args: { model: string; inputs: string[] }): Promise<FeatureExtractionOutput>;
}

export class HuggingFaceEmbedding extends BaseEmbedding {
  readonly provider = "huggingface";
  private readonly client: FeatureExtractionClient;

  constructor(options: { client: FeatureExtractionClient; model?: string; batchSize?: number }) {
    super({
      model: options.model ?? HUGGINGFACE_DEFAULT_MODEL,
      batchSize: options.batchSize ?? HUGGINGFACE_BATCH_SIZE,
    });
    this.client = options.client;
  }

  protected async embedBatch(texts: string[]): Promise<number[][]> {
    const output = await this.client.featureExtraction({
      model: this.model,
      inputs: texts,
    });
    return toSentenceVectors(output, texts.length, this.model);
  }
}

/**
 * Turns a feature-extraction response into one vector per input.
 *
 * - [0.1, 0.2, ...] for a single input: one pooled vector
 * - [[...], [...]]: one pooled vector per input
 * - [[[...], ...], ...]: token vectors per input, mean-pooled
 */
export function toSentenceVectors(
  output: FeatureExtractionOutput,
  inputCount: number,
  model: string
): number[][] {
  if (inputCount === 1 && output.every((value) => typeof value === "number")) {
    return [output.filter((value): value is number => typeof value === "number")];
  }

  return output.map((row) => {
    if (typeof row === "number") {
      throw new EmbeddingError("HuggingFace returned an unexpected output shape", {
        provider: "huggingface",
        model,
      });
    }
    return isTokenMatrix(row) ? meanPool(row) : row;
  });
}

function isTokenMatrix(row: number[] | number[][]): row is number[][] {
  return row.length > 0 && Array.isArray(row[0]);
}

function meanPool(tokens: number[][]): number[] {
  const dimension = tokens[0]?.length ?? 0;
  const sums = new Array<number>(dimension).fill(0);
  for (const token of tokens) {
    for (let i = 0; i < dimension; i++) {
      sums[i] += token[i] ?? 0;
    }
  }
  return sums.map((sum) => sum / tokens.length);
}
