import { embeddingLogger } from "../utils/logger.js";
import type {
  EmbeddingVector,
  GeneratorName,
  SchemaEmbedConfig,
  SchemaEmbedding,
  SchemaInput,
  SignalGeneratorName,
} from "../utils/types.js";
import { combineNamed } from "./combiner.js";
import { createSignalGenerators, type SignalGenerator } from "./generators/index.js";
import type { LearnedEmbeddingAdapter } from "./learned.js";
import { WordIndex } from "./word-index.js";

/**
 * Runs every configured generator over one schema and blends the results.
 *
 * All signal generators of a call share one WordIndex, so a word lands on the
 * same slot in every component. Pass the same WordIndex to every call whose
 * vectors will be compared with each other (see SchemaVectorStore.vocabulary);
 * vectors built over different vocabularies do not line up.
 */
export class SchemaEmbedder {
  readonly config: SchemaEmbedConfig;
  private generators: Record<SignalGeneratorName, SignalGenerator>;
  private learned: LearnedEmbeddingAdapter | null;

  constructor(config: SchemaEmbedConfig, learned: LearnedEmbeddingAdapter | null = null) {
    this.config = config;
    this.generators = createSignalGenerators(config);
    this.learned = learned;

    if (config.generator_weights.learned > 0 && !learned) {
      embeddingLogger.warn("Learned generator has a weight but no provider; it will be skipped");
    }
  }

  getGenerator(name: SignalGeneratorName): SignalGenerator {
    return this.generators[name];
  }

  /**
   * Normalized output of the three signal generators over a shared WordIndex.
   */
  generateSignals(
    input: SchemaInput,
    wordIndex: WordIndex = new WordIndex()
  ): Record<SignalGeneratorName, EmbeddingVector> {
    return {
      enhanced: this.generators.enhanced.generate(input, wordIndex),
      primary_key: this.generators.primary_key.generate(input, wordIndex),
      foreign_key: this.generators.foreign_key.generate(input, wordIndex),
    };
  }

  /**
   * Signal generators only; the learned component is left out.
   */
  embedSync(input: SchemaInput, wordIndex: WordIndex = new WordIndex()): SchemaEmbedding {
    const components: Partial<Record<GeneratorName, EmbeddingVector>> = this.generateSignals(input, wordIndex);
    return this.finish(components, wordIndex);
  }

  async embed(input: SchemaInput, wordIndex: WordIndex = new WordIndex()): Promise<SchemaEmbedding> {
    const [embedding] = await this.embedMany([input], wordIndex);
    return embedding;
  }

  /**
   * Embeds several schemas over one vocabulary. The learned provider, when
   * enabled, gets all schema texts in a single batched request.
   */
  async embedMany(
    inputs: readonly SchemaInput[],
    wordIndex: WordIndex = new WordIndex()
  ): Promise<SchemaEmbedding[]> {
    const signals: Array<Partial<Record<GeneratorName, EmbeddingVector>>> = inputs.map((input) =>
      this.generateSignals(input, wordIndex)
    );

    if (this.learned && this.config.generator_weights.learned > 0) {
      const learned = await this.learned.embedMany(inputs.map((input) => input.schemaText));
      for (const [i, components] of signals.entries()) {
        components.learned = learned[i];
      }
    }

    return signals.map((components) => this.finish(components, wordIndex));
  }

  private finish(
    components: Partial<Record<GeneratorName, EmbeddingVector>>,
    wordIndex: WordIndex
  ): SchemaEmbedding {
    const weights = this.config.generator_weights;
    const vector = combineNamed(components, weights);

    embeddingLogger.info("Embedded schema", {
      components: Object.keys(components),
      vocabulary: wordIndex.count,
      dimensions: vector.length,
    });

    return {
      vector,
      components,
      weights: { ...weights },
      vocabularySize: wordIndex.count,
    };
  }
}
