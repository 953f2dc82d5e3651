/**
 * embeddings/index.ts - Public API for the embedding module
 *
 * Import from here, never from the provider files directly.
 */

export type { EmbeddingCapability, CreateEmbeddingOptions } from "./types";
export type { EmbeddingProviderName } from "./factory";

export {
  EmbeddingFactory,
  createEmbeddingModel,
  isSupportedProvider,
  SUPPORTED_PROVIDERS,
} from "./factory";
export { HuggingFaceEmbedding, HUGGINGFACE_DEFAULT_MODEL } from "./huggingface";
export { OpenAIEmbedding, OPENAI_DEFAULT_MODEL } from "./openai";
export { VoyageEmbedding, VOYAGE_DEFAULT_MODEL } from "./voyage";
