// =============================================================================
// schemavec Core Types
// =============================================================================

// -----------------------------------------------------------------------------
// Vectors
// -----------------------------------------------------------------------------

/**
 * Fixed-length embedding. Raw weighted sums while a generator runs,
 * unit length (or all zero for empty input) once returned.
 */
export type EmbeddingVector = Float32Array;

export type SignalGeneratorName = "enhanced" | "primary_key" | "foreign_key";

export type GeneratorName = SignalGeneratorName | "learned";

export const SIGNAL_GENERATOR_NAMES: readonly SignalGeneratorName[] = [
  "enhanced",
  "primary_key",
  "foreign_key",
];

export const GENERATOR_NAMES: readonly GeneratorName[] = [...SIGNAL_GENERATOR_NAMES, "learned"];

// -----------------------------------------------------------------------------
// Schema
// -----------------------------------------------------------------------------

/**
 * One column as reported by schema introspection.
 */
export interface ColumnRecord {
  table: string;
  column: string;
  dataType: string;
  isNullable: boolean;
  isIdentity: boolean;
  isPrimaryKey: boolean;
  isForeignKey: boolean;
  referencedTable?: string;
  referencedColumn?: string;
}

export interface ForeignKeyRef {
  column: string;
  referencedTable?: string;
  referencedColumn?: string;
}

export interface SchemaMetadata {
  /** Table and column names, in first-seen order */
  entities: string[];
  /** Empty string when the schema has no primary key */
  primaryKey: string;
  foreignKeys: ForeignKeyRef[];
}

/**
 * Everything a generator needs: rendered CREATE TABLE text plus metadata.
 * Foreign keys may be given as bare column names.
 */
export interface SchemaInput {
  schemaText: string;
  entities: readonly string[];
  primaryKey?: string;
  foreignKeys?: ReadonlyArray<string | ForeignKeyRef>;
}

// -----------------------------------------------------------------------------
// Weighting
// -----------------------------------------------------------------------------

/**
 * Per-variant weights. A weight of 0 disables the step it drives.
 */
export interface WeightTable {
  base: number;
  primaryKeyToken: number;
  foreignKeyToken: number;
  primaryKeyExtra: number;
  foreignKeyExtra: number;
  referencedExtra: number;
  domainKeyword: number;
  conditional: number;
  joinPattern: number;
  entity: number;
}

export interface KeywordLists {
  /** Weighted unconditionally */
  domain: readonly string[];
  /** Weighted once when present as a token of the schema text */
  conditional: readonly string[];
  /** Weighted once per foreign key whose column contains the pattern */
  joinPatterns: readonly string[];
}

export interface SlidingWindow {
  decay: number;
  radius: number;
}

export interface WeightedVector {
  vector: EmbeddingVector;
  weight: number;
}

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export type LearnedProviderName = "none" | "openai" | "mock";

export type ReductionMethod = "none" | "truncate" | "fold";

export interface LearnedConfig {
  provider: LearnedProviderName;
  model: string;
  /** Size the provider is asked for; reduced to embedding_size afterwards */
  dimensions: number;
  reduction: ReductionMethod;
  batch_size: number;
}

export interface StorageConfig {
  database_path: string;
}

export interface SchemaEmbedConfig {
  embedding_size: number;
  generator_weights: Record<GeneratorName, number>;
  weight_tables: Record<SignalGeneratorName, WeightTable>;
  remove_stop_words: boolean;
  sliding_window: SlidingWindow;
  learned: LearnedConfig;
  storage: StorageConfig;
}

// -----------------------------------------------------------------------------
// Results
// -----------------------------------------------------------------------------

export interface SchemaEmbedding {
  vector: EmbeddingVector;
  /** Normalized output of every generator that ran */
  components: Partial<Record<GeneratorName, EmbeddingVector>>;
  weights: Record<GeneratorName, number>;
  vocabularySize: number;
}
