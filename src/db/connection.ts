import "dotenv/config";
import Database from "better-sqlite3";
import { existsSync } from "fs";
import { getStorageConfig } from "../utils/config.js";
import { ConfigurationError } from "../utils/errors.js";
import { dbLogger } from "../utils/logger.js";

let db: Database.Database | null = null;

/**
 * Gets or creates the connection to the embedding store database.
 */
export function getDatabase(): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = getStorageConfig().database_path;

  dbLogger.info(`Opening database at: ${dbPath}`);

  db = new Database(dbPath);

  // Enable WAL mode for better concurrency
  db.pragma("journal_mode = WAL");

  return db;
}

/**
 * Opens a database to introspect. Read-only: the schema is never modified.
 */
export function openSchemaDatabase(path: string): Database.Database {
  if (!existsSync(path)) {
    throw new ConfigurationError(`Database not found: ${path}`);
  }

  dbLogger.info(`Opening schema source: ${path}`);
  return new Database(path, { readonly: true, fileMustExist: true });
}

/**
 * Closes the store connection.
 */
export function closeDatabase(): void {
  if (db) {
    dbLogger.info("Closing database connection");
    db.close();
    db = null;
  }
}
