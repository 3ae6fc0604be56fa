import type { EmbeddingProvider } from "./interface.js";
import { OpenAIEmbeddingProvider } from "./openai.js";
import { createMockProvider } from "./mock.js";
import { LearnedEmbeddingAdapter } from "./learned.js";
import { SchemaEmbedder } from "./embedder.js";
import { ConfigurationError } from "../utils/errors.js";
import { embeddingLogger } from "../utils/logger.js";
import type { LearnedConfig, SchemaEmbedConfig } from "../utils/types.js";

// Re-export types and classes
export type { EmbeddingProvider } from "./interface.js";
export { OpenAIEmbeddingProvider, type OpenAIProviderOptions } from "./openai.js";
export { MockEmbeddingProvider, createMockProvider } from "./mock.js";
export { LearnedEmbeddingAdapter, reduceDimensions } from "./learned.js";
export { SchemaEmbedder } from "./embedder.js";
export { WordIndex } from "./word-index.js";
export { tokenize, STOP_WORDS } from "./tokenizer.js";
export { slotFor, accumulate, spread, normalize, magnitude, cosineSimilarity } from "./projector.js";
export { combine, combineNamed } from "./combiner.js";
export * from "./generators/index.js";

/**
 * Creates the learned-model provider named in configuration,
 * or null when the learned path is disabled.
 */
export function createEmbeddingProvider(config: LearnedConfig): EmbeddingProvider | null {
  embeddingLogger.debug(`Creating embedding provider: ${config.provider}`);

  switch (config.provider) {
    case "none":
      return null;

    case "openai":
      return new OpenAIEmbeddingProvider({
        model: config.model,
        dimensions: config.dimensions,
        batchSize: config.batch_size,
      });

    case "mock":
      return createMockProvider(config.dimensions);

    default:
      throw new ConfigurationError(`Unknown embedding provider: ${String(config.provider)}`);
  }
}

/**
 * Builds a SchemaEmbedder wired to the configured learned provider.
 * `provider` replaces the configured one (tests, custom models).
 */
export function createSchemaEmbedder(
  config: SchemaEmbedConfig,
  provider: EmbeddingProvider | null = createEmbeddingProvider(config.learned)
): SchemaEmbedder {
  const learned = provider
    ? new LearnedEmbeddingAdapter(provider, {
        targetSize: config.embedding_size,
        reduction: config.learned.reduction,
      })
    : null;

  return new SchemaEmbedder(config, learned);
}
