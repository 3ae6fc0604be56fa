/**
 * schemavec - weighted multi-signal hashing embeddings for database schemas.
 *
 * Library entry point. Command-line tools live in src/cli/.
 */

export * from "./embedding/index.js";
export * from "./schema/index.js";
export { introspectSchema, listTables } from "./db/introspect.js";
export { SchemaVectorStore, type SimilarSchema } from "./db/vector-store.js";
export { embedDatabaseSchema, type DatabaseEmbedding } from "./pipeline.js";
export { loadConfig, reloadConfig, resolveConfig, type ConfigOverrides } from "./utils/config.js";
export * from "./utils/errors.js";
export { createLogger, type Logger } from "./utils/logger.js";
export * from "./utils/types.js";
