#!/usr/bin/env tsx

/**
 * Search CLI
 *
 * Embeds a SQLite database's schema and lists the stored schemas that are
 * most similar to it.
 *
 * Usage:
 *   npx tsx src/cli/search.ts <database> [--limit n] [--min similarity]
 */

import { closeDatabase, getDatabase, openSchemaDatabase } from "../db/connection.js";
import { SchemaVectorStore } from "../db/vector-store.js";
import { createSchemaEmbedder } from "../embedding/index.js";
import { embedDatabaseSchema } from "../pipeline.js";
import { loadConfig } from "../utils/config.js";
import { ConfigurationError } from "../utils/errors.js";
import { cliLogger } from "../utils/logger.js";

function readNumberFlag(args: string[], flag: string, fallback: number): number {
  const at = args.indexOf(flag);
  if (at < 0) return fallback;

  const value = Number(args[at + 1]);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${flag} expects a number, got "${args[at + 1]}"`);
  }
  return value;
}

async function main() {
  const args = process.argv.slice(2);
  const dbPath = args[0];

  if (!dbPath || dbPath.startsWith("--")) {
    console.log("Usage: npm run search -- <database> [--limit n] [--min similarity]");
    process.exit(1);
  }

  const limit = readNumberFlag(args, "--limit", 5);
  const minSimilarity = readNumberFlag(args, "--min", 0);

  const embedder = createSchemaEmbedder(loadConfig());
  const source = openSchemaDatabase(dbPath);

  try {
    const store = new SchemaVectorStore(getDatabase());
    const { embedding } = await embedDatabaseSchema(source, embedder, store.vocabulary);
    const matches = store.searchSimilar(embedding.vector, limit, minSimilarity);

    if (matches.length === 0) {
      console.log("No similar schemas stored.");
      return;
    }

    console.log(`Schemas most similar to ${dbPath}:`);
    for (const [rank, match] of matches.entries()) {
      console.log(`  ${String(rank + 1).padStart(2)}. ${match.name.padEnd(30)} ${match.similarity.toFixed(4)}`);
    }
  } finally {
    source.close();
    closeDatabase();
  }
}

main().catch((error) => {
  cliLogger.error("Search failed", { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
