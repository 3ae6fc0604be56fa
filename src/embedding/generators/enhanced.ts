import type { EmbeddingVector, KeywordLists, SlidingWindow } from "../../utils/types.js";
import { spread } from "../projector.js";
import { SignalGenerator, type SignalGeneratorOptions } from "./signal.js";
import { DEFAULT_EMBEDDING_SIZE, DEFAULT_SLIDING_WINDOW, DEFAULT_WEIGHT_TABLES, KEYWORD_LISTS } from "./weights.js";

export interface EnhancedGeneratorOptions extends Partial<SignalGeneratorOptions> {
  slidingWindow?: SlidingWindow;
}

/**
 * General-purpose generator: moderate key emphasis, strong entity emphasis,
 * and every weight smeared onto neighbouring slots by the sliding window.
 */
export class EnhancedEmbeddingGenerator extends SignalGenerator {
  readonly name = "enhanced";
  readonly slidingWindow: SlidingWindow;

  constructor(options: EnhancedGeneratorOptions = {}) {
    super({
      embeddingSize: options.embeddingSize ?? DEFAULT_EMBEDDING_SIZE,
      weights: options.weights ?? DEFAULT_WEIGHT_TABLES.enhanced,
      removeStopWords: options.removeStopWords,
    });
    this.slidingWindow = options.slidingWindow ?? DEFAULT_SLIDING_WINDOW;
  }

  protected get keywords(): KeywordLists {
    return KEYWORD_LISTS.enhanced;
  }

  protected override place(vector: EmbeddingVector, index: number, weight: number): void {
    spread(vector, index, weight, this.slidingWindow);
  }
}
