import type { SchemaEmbedConfig, SignalGeneratorName } from "../../utils/types.js";
import { EnhancedEmbeddingGenerator } from "./enhanced.js";
import { ForeignKeyAwareEmbeddingGenerator } from "./foreign-key.js";
import { PrimaryKeyAwareEmbeddingGenerator } from "./primary-key.js";
import type { SignalGenerator } from "./signal.js";

export { SignalGenerator, type SignalGeneratorOptions } from "./signal.js";
export { EnhancedEmbeddingGenerator, type EnhancedGeneratorOptions } from "./enhanced.js";
export { PrimaryKeyAwareEmbeddingGenerator } from "./primary-key.js";
export { ForeignKeyAwareEmbeddingGenerator } from "./foreign-key.js";
export { DEFAULT_WEIGHT_TABLES, KEYWORD_LISTS, DEFAULT_SLIDING_WINDOW } from "./weights.js";

/**
 * Builds one generator per signal variant from configuration.
 */
export function createSignalGenerators(config: SchemaEmbedConfig): Record<SignalGeneratorName, SignalGenerator> {
  const common = {
    embeddingSize: config.embedding_size,
    removeStopWords: config.remove_stop_words,
  };

  return {
    enhanced: new EnhancedEmbeddingGenerator({
      ...common,
      weights: config.weight_tables.enhanced,
      slidingWindow: config.sliding_window,
    }),
    primary_key: new PrimaryKeyAwareEmbeddingGenerator({
      ...common,
      weights: config.weight_tables.primary_key,
    }),
    foreign_key: new ForeignKeyAwareEmbeddingGenerator({
      ...common,
      weights: config.weight_tables.foreign_key,
    }),
  };
}
