import type Database from "better-sqlite3";
import { schemaLogger } from "../utils/logger.js";
import type { ColumnRecord } from "../utils/types.js";

interface TableInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

interface ForeignKeyListRow {
  id: number;
  seq: number;
  table: string;
  from: string;
  to: string | null;
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Lists user tables, skipping SQLite's internal ones.
 */
export function listTables(db: Database.Database): string[] {
  const rows = db
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master
       WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
       ORDER BY name`
    )
    .all();

  return rows.map((row) => row.name);
}

/**
 * Reads every column of every table into column records.
 *
 * A lone INTEGER PRIMARY KEY is an alias of the rowid and is reported as
 * an identity column.
 */
export function introspectSchema(db: Database.Database): ColumnRecord[] {
  const columns: ColumnRecord[] = [];

  for (const table of listTables(db)) {
    const info = db.prepare<[], TableInfoRow>(`PRAGMA table_info(${quoteIdentifier(table)})`).all();
    const foreignKeys = db
      .prepare<[], ForeignKeyListRow>(`PRAGMA foreign_key_list(${quoteIdentifier(table)})`)
      .all();

    const references = new Map<string, ForeignKeyListRow>();
    for (const fk of foreignKeys) {
      if (!references.has(fk.from)) references.set(fk.from, fk);
    }

    const keyCount = info.filter((col) => col.pk > 0).length;

    for (const col of [...info].sort((a, b) => a.cid - b.cid)) {
      const ref = references.get(col.name);
      const isPrimaryKey = col.pk > 0;

      columns.push({
        table,
        column: col.name,
        dataType: col.type,
        // SQLite does not report NOT NULL on a primary key unless declared
        isNullable: col.notnull === 0 && !isPrimaryKey,
        isIdentity: isPrimaryKey && keyCount === 1 && col.type.toUpperCase() === "INTEGER",
        isPrimaryKey,
        isForeignKey: ref !== undefined,
        referencedTable: ref?.table,
        referencedColumn: ref?.to ?? undefined,
      });
    }
  }

  schemaLogger.info("Introspected schema", { columns: columns.length });
  return columns;
}
