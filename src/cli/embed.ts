#!/usr/bin/env tsx

/**
 * Embed CLI
 *
 * Introspects a SQLite database, embeds its schema with every configured
 * generator, and prints a summary. Optionally saves the combined embedding
 * to the store for later similarity search.
 *
 * Usage:
 *   npx tsx src/cli/embed.ts <database>                  # Print summary
 *   npx tsx src/cli/embed.ts <database> --save <name>    # Also store it
 *   npx tsx src/cli/embed.ts <database> --json           # Print the vector as JSON
 */

import { closeDatabase, getDatabase, openSchemaDatabase } from "../db/connection.js";
import { SchemaVectorStore } from "../db/vector-store.js";
import { createSchemaEmbedder, magnitude } from "../embedding/index.js";
import { embedDatabaseSchema } from "../pipeline.js";
import { loadConfig } from "../utils/config.js";
import { cliLogger } from "../utils/logger.js";
import { GENERATOR_NAMES } from "../utils/types.js";

function readFlag(args: string[], flag: string): string | undefined {
  const at = args.indexOf(flag);
  return at >= 0 ? args[at + 1] : undefined;
}

async function main() {
  const args = process.argv.slice(2);
  const dbPath = args[0];

  if (!dbPath || dbPath.startsWith("--")) {
    console.log("Usage:");
    console.log("  npm run embed -- <database>                 # Print summary");
    console.log("  npm run embed -- <database> --save <name>   # Store the embedding");
    console.log("  npm run embed -- <database> --json          # Print the vector as JSON");
    process.exit(1);
  }

  const saveAs = readFlag(args, "--save");
  const config = loadConfig();
  const embedder = createSchemaEmbedder(config);

  // Saved embeddings must share the store's vocabulary to be searchable
  const store = saveAs ? new SchemaVectorStore(getDatabase()) : null;

  const source = openSchemaDatabase(dbPath);
  try {
    const result = await embedDatabaseSchema(source, embedder, store?.vocabulary);
    const { embedding } = result;

    if (args.includes("--json")) {
      console.log(JSON.stringify(Array.from(embedding.vector)));
    } else {
      console.log(`Schema: ${dbPath}`);
      console.log(`  Tables:       ${result.tableCount}`);
      console.log(`  Entities:     ${result.input.entities.length}`);
      console.log(`  Primary key:  ${result.input.primaryKey || "(none)"}`);
      console.log(`  Foreign keys: ${result.input.foreignKeys?.length ?? 0}`);
      console.log(`  Vocabulary:   ${embedding.vocabularySize}`);
      console.log(`  Dimensions:   ${embedding.vector.length}`);
      console.log();
      console.log("Components:");
      for (const name of GENERATOR_NAMES) {
        const vector = embedding.components[name];
        if (!vector) continue;
        const weight = embedding.weights[name];
        console.log(`  ${name.padEnd(12)} weight ${weight.toFixed(2)}  |v| ${magnitude(vector).toFixed(4)}`);
      }
      const head = Array.from(embedding.vector.subarray(0, 8), (v) => v.toFixed(4)).join(", ");
      console.log();
      console.log(`Combined: [${head}, ...]`);
    }

    if (store && saveAs) {
      store.store(saveAs, embedding.vector);
      console.log(`Saved as "${saveAs}"`);
    }
  } finally {
    source.close();
    closeDatabase();
  }
}

main().catch((error) => {
  cliLogger.error("Embedding failed", { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
