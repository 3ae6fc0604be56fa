import { ConfigurationError } from "../../utils/errors.js";
import { embeddingLogger } from "../../utils/logger.js";
import type {
  EmbeddingVector,
  ForeignKeyRef,
  KeywordLists,
  SchemaInput,
  SignalGeneratorName,
  WeightTable,
} from "../../utils/types.js";
import { accumulate, normalize } from "../projector.js";
import { tokenize } from "../tokenizer.js";
import { WordIndex } from "../word-index.js";

export interface SignalGeneratorOptions {
  embeddingSize: number;
  weights: WeightTable;
  removeStopWords?: boolean;
}

function toForeignKeyRef(fk: string | ForeignKeyRef): ForeignKeyRef {
  const ref: ForeignKeyRef = typeof fk === "string" ? { column: fk } : fk;
  return {
    column: ref.column.toLowerCase(),
    referencedTable: ref.referencedTable?.toLowerCase(),
    referencedColumn: ref.referencedColumn?.toLowerCase(),
  };
}

/**
 * Shared skeleton of the hashing signal generators.
 *
 * Every token of the schema text contributes its base weight; primary key,
 * foreign keys, keywords and entities then add variant-specific extras at
 * their own slots. Subclasses only choose the weight table, the keyword lists
 * and, optionally, how a weight is laid onto the vector.
 */
export abstract class SignalGenerator {
  abstract readonly name: SignalGeneratorName;
  readonly embeddingSize: number;
  readonly weights: WeightTable;
  protected readonly removeStopWords: boolean;

  constructor(options: SignalGeneratorOptions) {
    if (!Number.isInteger(options.embeddingSize) || options.embeddingSize <= 0) {
      throw new ConfigurationError(`Embedding size must be a positive integer, got ${options.embeddingSize}`);
    }
    this.embeddingSize = options.embeddingSize;
    this.weights = options.weights;
    this.removeStopWords = options.removeStopWords ?? false;
  }

  protected abstract get keywords(): KeywordLists;

  /**
   * Lays `weight` onto the slot of `index`. Zero weights never reach here.
   */
  protected place(vector: EmbeddingVector, index: number, weight: number): void {
    accumulate(vector, index, weight);
  }

  private add(vector: EmbeddingVector, wordIndex: WordIndex, word: string, weight: number): void {
    if (weight === 0 || word.length === 0) return;
    this.place(vector, wordIndex.getOrAdd(word), weight);
  }

  /**
   * Builds the raw (un-normalized) weighted vector.
   * Empty schema text yields the zero vector with no keyword bias.
   */
  project(input: SchemaInput, wordIndex: WordIndex): EmbeddingVector {
    const vector = new Float32Array(this.embeddingSize);
    const w = this.weights;

    const tokens = tokenize(input.schemaText, { removeStopWords: this.removeStopWords });
    if (tokens.length === 0) {
      embeddingLogger.debug(`${this.name}: empty schema text, returning zero vector`);
      return vector;
    }

    const primaryKey = (input.primaryKey ?? "").toLowerCase();
    const foreignKeys = (input.foreignKeys ?? []).map(toForeignKeyRef);
    const foreignKeyColumns = new Set(foreignKeys.map((fk) => fk.column));

    for (const token of tokens) {
      let weight = w.base;
      if (primaryKey && token === primaryKey) weight += w.primaryKeyToken;
      if (foreignKeyColumns.has(token)) weight += w.foreignKeyToken;
      this.add(vector, wordIndex, token, weight);
    }

    if (primaryKey) {
      this.add(vector, wordIndex, primaryKey, w.primaryKeyExtra);
    }

    for (const fk of foreignKeys) {
      this.add(vector, wordIndex, fk.column, w.foreignKeyExtra);
      const referenced = fk.referencedTable || fk.referencedColumn;
      if (referenced) {
        this.add(vector, wordIndex, referenced, w.referencedExtra);
      }
    }

    const { domain, conditional, joinPatterns } = this.keywords;

    for (const keyword of domain) {
      this.add(vector, wordIndex, keyword, w.domainKeyword);
    }

    if (conditional.length > 0 && w.conditional !== 0) {
      const present = new Set(tokens);
      for (const keyword of conditional) {
        if (present.has(keyword)) {
          this.add(vector, wordIndex, keyword, w.conditional);
        }
      }
    }

    for (const fk of foreignKeys) {
      for (const pattern of joinPatterns) {
        if (fk.column.includes(pattern)) {
          this.add(vector, wordIndex, pattern, w.joinPattern);
        }
      }
    }

    for (const entity of input.entities) {
      this.add(vector, wordIndex, entity.toLowerCase(), w.entity);
    }

    embeddingLogger.debug(`${this.name}: projected schema`, {
      tokens: tokens.length,
      vocabulary: wordIndex.count,
    });

    return vector;
  }

  /**
   * Normalized embedding of `input`. Pass a shared WordIndex to keep slots
   * aligned with other generators' output.
   */
  generate(input: SchemaInput, wordIndex: WordIndex = new WordIndex()): EmbeddingVector {
    return normalize(this.project(input, wordIndex));
  }
}
