/**
 * errors.ts - Error types shared by every rag-datacore component
 *
 * Two families live here:
 * - Setup errors (provider selection, credentials, missing SDK packages,
 *   bad configuration). These are thrown to the caller, who is expected to
 *   fail fast at startup.
 * - Data-path errors (dimension mismatch, validation, decryption). The
 *   collection service and credential store catch these, log them, and
 *   return a sentinel (false / null / -1) instead of rethrowing.
 */

/**
 * Base class for all rag-datacore errors.
 *
 * `code` is a stable machine-readable identifier; `details` carries the
 * structured context (collection name, provider, lengths...) that ends up
 * in log entries.
 */
export class DataCoreError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
  }
}

// --- Embedding provider errors ---

export class UnsupportedProviderError extends DataCoreError {
  constructor(provider: string, supported: readonly string[]) {
    super(
      `Unsupported embedding provider: "${provider}". ` +
        `Supported providers: ${supported.join(", ")}`,
      "UNSUPPORTED_PROVIDER",
      { provider, supported: [...supported] }
    );
  }
}

export class MissingCredentialError extends DataCoreError {
  constructor(provider: string, envVar: string) {
    super(
      `An API key is required for ${provider} embeddings. ` +
        `Set ${envVar} or pass apiKey explicitly.`,
      "MISSING_CREDENTIAL",
      { provider, envVar }
    );
  }
}

export class DependencyUnavailableError extends DataCoreError {
  constructor(provider: string, packageName: string) {
    super(
      `The ${provider} embedding provider needs the "${packageName}" package. ` +
        `Install it: npm install ${packageName}`,
      "DEPENDENCY_UNAVAILABLE",
      { provider, packageName }
    );
  }
}

export class EmbeddingError extends DataCoreError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, "EMBEDDING_FAILED", details, { cause });
  }
}

// --- Vector collection errors ---

export class CollectionNotFoundError extends DataCoreError {
  constructor(name: string) {
    super(`Collection "${name}" does not exist.`, "COLLECTION_NOT_FOUND", {
      collection: name,
    });
  }
}

export class DocumentValidationError extends DataCoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "DOCUMENT_VALIDATION", details);
  }
}

export class DimensionMismatchError extends DataCoreError {
  constructor(collection: string, expected: number, actual: number) {
    super(
      `Embedding dimension ${actual} does not match collection "${collection}" dimension ${expected}.`,
      "DIMENSION_MISMATCH",
      { collection, expected, actual }
    );
  }
}

// --- Credential errors ---

export class EncryptionUnavailableError extends DataCoreError {
  constructor(reason: string) {
    super(
      `Secret encryption is disabled: ${reason}`,
      "ENCRYPTION_UNAVAILABLE",
      { reason }
    );
  }
}

export class DecryptionError extends DataCoreError {
  constructor(message: string, cause?: unknown) {
    super(message, "DECRYPTION_FAILED", undefined, { cause });
  }
}

export class CredentialPayloadError extends DataCoreError {
  constructor(issues: string[]) {
    super(
      `API key payload is not a JSON mapping: ${issues.join("; ")}`,
      "INVALID_CREDENTIAL_PAYLOAD",
      { issues }
    );
  }
}

// --- Configuration ---

export class ConfigurationError extends DataCoreError {
  constructor(issues: string[]) {
    super(
      `Invalid configuration:\n  ${issues.join("\n  ")}`,
      "INVALID_CONFIGURATION",
      { issues }
    );
  }
}

/**
 * Short description of an unknown thrown value for log entries.
 */
export function describeError(error: unknown): { type: string; message: string } {
  if (error instanceof Error) {
    return { type: error.name, message: error.message };
  }
  return { type: typeof error, message: String(error) };
}
