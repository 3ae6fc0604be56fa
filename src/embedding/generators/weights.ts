import type { KeywordLists, SignalGeneratorName, SlidingWindow, WeightTable } from "../../utils/types.js";

/**
 * Default weight tables. Zero means the step does not run for that variant.
 */
export const DEFAULT_WEIGHT_TABLES: Record<SignalGeneratorName, WeightTable> = {
  enhanced: {
    base: 1,
    primaryKeyToken: 3,
    foreignKeyToken: 2,
    primaryKeyExtra: 5,
    foreignKeyExtra: 3,
    referencedExtra: 0,
    domainKeyword: 0,
    conditional: 0,
    joinPattern: 0,
    entity: 4,
  },
  primary_key: {
    base: 1,
    primaryKeyToken: 10,
    foreignKeyToken: 3,
    primaryKeyExtra: 15,
    foreignKeyExtra: 0,
    referencedExtra: 0,
    domainKeyword: 5,
    conditional: 3,
    joinPattern: 0,
    entity: 2,
  },
  foreign_key: {
    base: 1,
    primaryKeyToken: 3,
    foreignKeyToken: 10,
    primaryKeyExtra: 0,
    foreignKeyExtra: 15,
    referencedExtra: 5,
    domainKeyword: 5,
    conditional: 3,
    joinPattern: 4,
    entity: 2,
  },
};

export const KEYWORD_LISTS: Record<SignalGeneratorName, KeywordLists> = {
  enhanced: {
    domain: [],
    conditional: [],
    joinPatterns: [],
  },
  primary_key: {
    domain: ["primary", "key", "id", "identifier"],
    // Common primary key column types
    conditional: ["int", "bigint", "uuid", "guid"],
    joinPatterns: [],
  },
  foreign_key: {
    domain: ["foreign", "key", "references", "constraint"],
    // Referential action vocabulary
    conditional: ["on", "delete", "cascade", "set", "null", "update"],
    joinPatterns: ["_id", "_fk"],
  },
};

export const DEFAULT_SLIDING_WINDOW: SlidingWindow = {
  decay: 0.5,
  radius: 1,
};

export const DEFAULT_EMBEDDING_SIZE = 3072;
