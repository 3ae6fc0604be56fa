import type { KeywordLists } from "../../utils/types.js";
import { SignalGenerator, type SignalGeneratorOptions } from "./signal.js";
import { DEFAULT_EMBEDDING_SIZE, DEFAULT_WEIGHT_TABLES, KEYWORD_LISTS } from "./weights.js";

/**
 * Emphasizes the primary key: its tokens, the key as a unit, primary key
 * vocabulary, and typical key column types when the schema uses them.
 */
export class PrimaryKeyAwareEmbeddingGenerator extends SignalGenerator {
  readonly name = "primary_key";

  constructor(options: Partial<SignalGeneratorOptions> = {}) {
    super({
      embeddingSize: options.embeddingSize ?? DEFAULT_EMBEDDING_SIZE,
      weights: options.weights ?? DEFAULT_WEIGHT_TABLES.primary_key,
      removeStopWords: options.removeStopWords,
    });
  }

  protected get keywords(): KeywordLists {
    return KEYWORD_LISTS.primary_key;
  }
}
