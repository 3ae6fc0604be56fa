import type { KeywordLists } from "../../utils/types.js";
import { SignalGenerator, type SignalGeneratorOptions } from "./signal.js";
import { DEFAULT_EMBEDDING_SIZE, DEFAULT_WEIGHT_TABLES, KEYWORD_LISTS } from "./weights.js";

/**
 * Emphasizes relationships: foreign key columns, the tables they reference,
 * referential actions present in the text, and join-style column suffixes.
 */
export class ForeignKeyAwareEmbeddingGenerator extends SignalGenerator {
  readonly name = "foreign_key";

  constructor(options: Partial<SignalGeneratorOptions> = {}) {
    super({
      embeddingSize: options.embeddingSize ?? DEFAULT_EMBEDDING_SIZE,
      weights: options.weights ?? DEFAULT_WEIGHT_TABLES.foreign_key,
      removeStopWords: options.removeStopWords,
    });
  }

  protected get keywords(): KeywordLists {
    return KEYWORD_LISTS.foreign_key;
  }
}
