/**
 * types.ts - The embedding capability contract
 *
 * What are embeddings?
 * When you embed text, you turn it into an array of numbers (a "vector")
 * that captures the meaning of the text. Similar texts produce similar
 * vectors, which is what lets a collection answer "feline" with the
 * document about a cat.
 *
 * Why an interface?
 * HuggingFace, OpenAI and Voyage all do the same thing: text in, numbers
 * out. The collection service only ever sees EmbeddingCapability, so a
 * provider can be swapped (or faked in tests) without touching it.
 */

/**
 * Text-to-vector capability produced by the embedding factory.
 *
 * Vector length is fixed by provider + model and must not change for the
 * lifetime of a collection bound to this capability. Implementations hold
 * no per-call state, so one instance can be shared by any number of
 * collections.
 */
export interface EmbeddingCapability {
  /** Registered provider name, e.g. "openai" */
  readonly provider: string;
  /** Model the vectors come from, e.g. "text-embedding-3-small" */
  readonly model: string;

  /** Embeds one text. */
  embedQuery(text: string): Promise<number[]>;

  /**
   * Embeds a batch of texts.
   *
   * @returns One vector per input, in input order. An empty input resolves
   *   to an empty array without calling the provider.
   */
  embedDocuments(texts: string[]): Promise<number[][]>;
}

/** Options accepted by EmbeddingFactory.create(). */
export interface CreateEmbeddingOptions {
  /** Provider name; falls back to the configured EMBEDDING_PROVIDER */
  provider?: string;
  /** Model name; falls back to EMBEDDING_MODEL, then the provider default */
  modelName?: string;
  /** Credential; falls back to the provider's configured key */
  apiKey?: string;
}
