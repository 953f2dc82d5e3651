/**
 * factory.ts - Embedding factory
 *
 * What this file does:
 * Turns a provider name (or the configured default) into a ready-to-use
 * EmbeddingCapability. The rest of the system is provider-agnostic: it
 * gets a capability from here and hands it to the collection service.
 *
 * How providers are registered:
 * PROVIDERS is a lookup table keyed by provider name. Each entry knows its
 * default model, where its credential comes from, whether a credential is
 * mandatory, and how to build the capability. Adding a provider means
 * adding one entry.
 *
 * Lazy loading:
 * The SDK for a provider is required inside its `create` function, only
 * when that provider is selected. A missing SDK package surfaces as
 * DependencyUnavailableError at selection time, never at import time.
 *
 * No network calls happen here. A wrong API key is only discovered by the
 * first real embed call.
 */

import type { EmbeddingConfig } from "../config";
import {
  DependencyUnavailableError,
  MissingCredentialError,
  UnsupportedProviderError,
} from "../errors";
import { createNoopLogger, type Logger } from "../logging/logger";
import { HUGGINGFACE_DEFAULT_MODEL, HuggingFaceEmbedding } from "./huggingface";
import { OPENAI_DEFAULT_MODEL, OpenAIEmbedding } from "./openai";
import { loadHuggingFaceInference, loadOpenAI, loadVoyageAI } from "./provider-deps";
import type { CreateEmbeddingOptions, EmbeddingCapability } from "./types";
import { VOYAGE_DEFAULT_MODEL, VoyageEmbedding } from "./voyage";

interface ProviderRegistration {
  defaultModel: string;
  /** Environment variable named in MissingCredentialError */
  credentialEnvVar: string;
  /** Remote providers that refuse anonymous calls */
  requiresCredential: boolean;
  configuredCredential(config: EmbeddingConfig): string | undefined;
  create(model: string, apiKey: string | undefined): EmbeddingCapability;
}

export const SUPPORTED_PROVIDERS = ["huggingface", "openai", "voyage"] as const;

export type EmbeddingProviderName = (typeof SUPPORTED_PROVIDERS)[number];

const PROVIDERS: Record<EmbeddingProviderName, ProviderRegistration> = {
  huggingface: {
    defaultModel: HUGGINGFACE_DEFAULT_MODEL,
    credentialEnvVar: "HUGGINGFACE_API_TOKEN",
    requiresCredential: false,
    configuredCredential: (config) => config.huggingfaceApiToken,
    create(model, apiKey) {
      const sdk = loadHuggingFaceInference();
      if (!sdk) throw new DependencyUnavailableError("huggingface", "@huggingface/inference");
      return new HuggingFaceEmbedding({ client: new sdk.HfInference(apiKey), model });
    },
  },
  openai: {
    defaultModel: OPENAI_DEFAULT_MODEL,
    credentialEnvVar: "OPENAI_API_KEY",
    requiresCredential: true,
    configuredCredential: (config) => config.openaiApiKey,
    create(model, apiKey) {
      const sdk = loadOpenAI();
      if (!sdk) throw new DependencyUnavailableError("openai", "openai");
      return new OpenAIEmbedding({ client: new sdk.OpenAI({ apiKey }), model });
    },
  },
  voyage: {
    defaultModel: VOYAGE_DEFAULT_MODEL,
    credentialEnvVar: "VOYAGE_API_KEY",
    requiresCredential: true,
    configuredCredential: (config) => config.voyageApiKey,
    create(model, apiKey) {
      const sdk = loadVoyageAI();
      if (!sdk) throw new DependencyUnavailableError("voyage", "voyageai");
      return new VoyageEmbedding({ client: new sdk.VoyageAIClient({ apiKey }), model });
    },
  },
};

export function isSupportedProvider(name: string): name is EmbeddingProviderName {
  return SUPPORTED_PROVIDERS.some((provider) => provider === name);
}

/**
 * Builds embedding capabilities from an EmbeddingConfig.
 *
 * Usage:
 *   const factory = new EmbeddingFactory(config.embedding);
 *   const embedder = factory.create({ provider: "openai" });
 *   const vector = await embedder.embedQuery("managed database");
 */
export class EmbeddingFactory {
  private readonly config: EmbeddingConfig;
  private readonly logger: Logger;

  constructor(config: EmbeddingConfig, logger: Logger = createNoopLogger()) {
    this.config = config;
    this.logger = logger.child({ component: "embedding-factory" });
  }

  /**
   * @throws UnsupportedProviderError if the provider is not registered
   * @throws MissingCredentialError if a remote provider has no API key
   * @throws DependencyUnavailableError if the provider SDK is not installed
   */
  create(options: CreateEmbeddingOptions = {}): EmbeddingCapability {
    const providerName = (options.provider ?? this.config.provider).trim().toLowerCase();
    if (!isSupportedProvider(providerName)) {
      throw new UnsupportedProviderError(providerName, SUPPORTED_PROVIDERS);
    }

    const registration = PROVIDERS[providerName];
    const model = options.modelName ?? this.configuredModel(providerName) ?? registration.defaultModel;
    const apiKey = options.apiKey ?? registration.configuredCredential(this.config);

    if (registration.requiresCredential && !apiKey) {
      throw new MissingCredentialError(providerName, registration.credentialEnvVar);
    }

    const capability = registration.create(model, apiKey);
    this.logger.info({ provider: providerName, model }, "Created embedding model");
    return capability;
  }

  /** The capability described by configuration alone. */
  createDefault(): EmbeddingCapability {
    return this.create();
  }

  /**
   * EMBEDDING_MODEL only applies to the configured provider: a model name
   * meant for HuggingFace is meaningless to OpenAI.
   */
  private configuredModel(provider: EmbeddingProviderName): string | undefined {
    return provider === this.config.provider.toLowerCase() ? this.config.model : undefined;
  }
}

/**
 * One-shot form of EmbeddingFactory.create().
 */
export function createEmbeddingModel(
  options: CreateEmbeddingOptions,
  config: EmbeddingConfig,
  logger?: Logger
): EmbeddingCapability {
  return new EmbeddingFactory(config, logger).create(options);
}
