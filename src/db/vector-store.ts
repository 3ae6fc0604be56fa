/**
 * Schema embedding store.
 *
 * Keeps named schema embeddings in memory for cosine similarity search and
 * persists them to SQLite so they survive restarts.
 *
 * Hashed slots depend on word indices, so the store also owns the vocabulary
 * its embeddings were built over. Embed with `vocabulary` before calling
 * `store` or `searchSimilar`; new words are persisted with the next `store`.
 *
 * Search is a linear scan: fine for thousands of schemas.
 */

import type Database from "better-sqlite3";
import { cosineSimilarity } from "../embedding/projector.js";
import { WordIndex } from "../embedding/word-index.js";
import { dbLogger } from "../utils/logger.js";
import type { EmbeddingVector } from "../utils/types.js";

interface StoredRow {
  name: string;
  dimensions: number;
  embedding: Buffer;
}

interface VocabularyRow {
  word: string;
}

export interface SimilarSchema {
  name: string;
  similarity: number;
}

function toBlob(vector: EmbeddingVector): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

function fromBlob(blob: Buffer): EmbeddingVector {
  // Copy: the blob's memory may be pooled and unaligned
  const bytes = new Uint8Array(blob);
  return new Float32Array(bytes.buffer, bytes.byteOffset, bytes.byteLength / 4);
}

export class SchemaVectorStore {
  private db: Database.Database;
  private index = new Map<string, EmbeddingVector>();
  private words = new WordIndex();
  private persistedWords = 0;
  private initialized = false;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Creates the tables if needed and loads stored embeddings and the
   * vocabulary into memory.
   */
  initialize(): void {
    if (this.initialized) return;

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_embeddings (
        name TEXT PRIMARY KEY,
        dimensions INTEGER NOT NULL,
        embedding BLOB NOT NULL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS schema_vocabulary (
        position INTEGER PRIMARY KEY,
        word TEXT NOT NULL UNIQUE
      );
    `);

    const vocabulary = this.db
      .prepare<[], VocabularyRow>(`SELECT word FROM schema_vocabulary ORDER BY position`)
      .all();
    this.words = WordIndex.fromWords(vocabulary.map((row) => row.word));
    this.persistedWords = this.words.count;

    const rows = this.db
      .prepare<[], StoredRow>(`SELECT name, dimensions, embedding FROM schema_embeddings`)
      .all();

    for (const row of rows) {
      const embedding = fromBlob(row.embedding);
      if (embedding.length !== row.dimensions) {
        dbLogger.warn(`Skipping corrupt embedding "${row.name}"`, {
          expected: row.dimensions,
          actual: embedding.length,
        });
        continue;
      }
      this.index.set(row.name, embedding);
    }

    this.initialized = true;
    dbLogger.info(`Loaded ${this.index.size} schema embeddings into memory`, {
      vocabulary: this.words.count,
    });
  }

  /**
   * The vocabulary every stored embedding was built over. Pass it to
   * SchemaEmbedder so new vectors line up with the stored ones.
   */
  get vocabulary(): WordIndex {
    this.initialize();
    return this.words;
  }

  /**
   * Stores (or replaces) the embedding saved under `name`, together with any
   * words added to `vocabulary` since the last store.
   */
  store(name: string, embedding: EmbeddingVector): void {
    this.initialize();

    const copy = Float32Array.from(embedding);
    const newWords = this.words.wordsFrom(this.persistedWords);

    const insertWord = this.db.prepare(`INSERT INTO schema_vocabulary (position, word) VALUES (?, ?)`);
    const upsert = this.db.prepare(
      `INSERT INTO schema_embeddings (name, dimensions, embedding)
       VALUES (?, ?, ?)
       ON CONFLICT (name) DO UPDATE SET
         dimensions = excluded.dimensions,
         embedding = excluded.embedding`
    );

    this.db.transaction(() => {
      for (const [offset, word] of newWords.entries()) {
        insertWord.run(this.persistedWords + offset, word);
      }
      upsert.run(name, copy.length, toBlob(copy));
    })();

    this.persistedWords += newWords.length;
    this.index.set(name, copy);

    dbLogger.debug("Stored embedding", { name, dimensions: copy.length, newWords: newWords.length });
  }

  get(name: string): EmbeddingVector | null {
    this.initialize();
    return this.index.get(name) ?? null;
  }

  remove(name: string): boolean {
    this.initialize();
    const existed = this.index.delete(name);
    this.db.prepare(`DELETE FROM schema_embeddings WHERE name = ?`).run(name);
    return existed;
  }

  /**
   * Stored schemas ranked by cosine similarity to `query` (highest first).
   * Stored vectors of another length cannot be compared and are skipped.
   */
  searchSimilar(query: EmbeddingVector, limit: number = 10, minSimilarity: number = 0): SimilarSchema[] {
    this.initialize();

    const results: SimilarSchema[] = [];

    for (const [name, embedding] of this.index) {
      if (embedding.length !== query.length) {
        dbLogger.debug(`Skipping "${name}": dimension mismatch`, {
          expected: query.length,
          actual: embedding.length,
        });
        continue;
      }

      const similarity = cosineSimilarity(query, embedding);
      if (similarity >= minSimilarity) {
        results.push({ name, similarity });
      }
    }

    results.sort((a, b) => b.similarity - a.similarity);
    return results.slice(0, limit);
  }

  stats(): { totalVectors: number; vocabularySize: number; dimensions: Record<number, number> } {
    this.initialize();

    const dimensions: Record<number, number> = {};
    for (const embedding of this.index.values()) {
      dimensions[embedding.length] = (dimensions[embedding.length] || 0) + 1;
    }

    return { totalVectors: this.index.size, vocabularySize: this.persistedWords, dimensions };
  }
}
