/**
 * Base class for every error raised by schemavec.
 */
export abstract class SchemaEmbedError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A WordIndex lookup for an index that was never assigned.
 */
export class NotFoundError extends SchemaEmbedError {
  public readonly index: number;

  constructor(index: number) {
    super(`No word assigned to index ${index}`, "NOT_FOUND");
    this.index = index;
  }
}

/**
 * Vectors that should share a length do not.
 */
export class DimensionMismatchError extends SchemaEmbedError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, context?: string) {
    const where = context ? ` (${context})` : "";
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}${where}`, "DIMENSION_MISMATCH");
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Invalid or unrecognized configuration. Raised at setup, before generation.
 */
export class ConfigurationError extends SchemaEmbedError {
  constructor(message: string) {
    super(message, "CONFIGURATION");
  }
}

/**
 * An embedding provider returned NaN or an infinite component.
 */
export class EmbeddingValueError extends SchemaEmbedError {
  public readonly provider: string;
  public readonly position: number;

  constructor(provider: string, position: number) {
    super(`Provider "${provider}" returned a non-finite value at position ${position}`, "EMBEDDING_VALUE");
    this.provider = provider;
    this.position = position;
  }
}

/**
 * An embedding provider answered with something other than one vector per text.
 */
export class ProviderResponseError extends SchemaEmbedError {
  public readonly provider: string;

  constructor(provider: string, message: string) {
    super(`Provider "${provider}": ${message}`, "PROVIDER_RESPONSE");
    this.provider = provider;
  }
}
