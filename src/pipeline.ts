import type Database from "better-sqlite3";
import { introspectSchema } from "./db/introspect.js";
import type { SchemaEmbedder } from "./embedding/embedder.js";
import type { WordIndex } from "./embedding/word-index.js";
import { buildSchemaInput } from "./schema/metadata.js";
import { ConfigurationError } from "./utils/errors.js";
import type { SchemaEmbedding, SchemaInput } from "./utils/types.js";

export interface DatabaseEmbedding {
  input: SchemaInput;
  tableCount: number;
  embedding: SchemaEmbedding;
}

/**
 * Introspects a SQLite database and embeds its schema. Pass a vocabulary
 * (usually SchemaVectorStore.vocabulary) when the result will be compared
 * with other embeddings.
 */
export async function embedDatabaseSchema(
  db: Database.Database,
  embedder: SchemaEmbedder,
  vocabulary?: WordIndex
): Promise<DatabaseEmbedding> {
  const columns = introspectSchema(db);
  if (columns.length === 0) {
    throw new ConfigurationError("Database has no tables to embed");
  }

  const input = buildSchemaInput(columns);
  const embedding = await embedder.embed(input, vocabulary);

  return {
    input,
    tableCount: new Set(columns.map((c) => c.table)).size,
    embedding,
  };
}
