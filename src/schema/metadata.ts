import { schemaLogger } from "../utils/logger.js";
import type { ColumnRecord, ForeignKeyRef, SchemaInput, SchemaMetadata } from "../utils/types.js";
import { renderSchema } from "./render.js";

/**
 * Derives generator metadata from introspected columns.
 *
 * Entities are table and column names in first-seen order, without
 * duplicates. The primary key is the first column flagged as one; composite
 * keys keep only their first column.
 */
export function deriveMetadata(columns: readonly ColumnRecord[]): SchemaMetadata {
  const entities: string[] = [];
  const seenEntities = new Set<string>();
  const foreignKeys: ForeignKeyRef[] = [];
  const seenForeignKeys = new Set<string>();
  let primaryKey = "";

  const addEntity = (name: string) => {
    if (!seenEntities.has(name)) {
      seenEntities.add(name);
      entities.push(name);
    }
  };

  for (const col of columns) {
    addEntity(col.table);
    addEntity(col.column);

    if (col.isPrimaryKey && !primaryKey) {
      primaryKey = col.column;
    }

    if (col.isForeignKey && !seenForeignKeys.has(col.column)) {
      seenForeignKeys.add(col.column);
      foreignKeys.push({
        column: col.column,
        referencedTable: col.referencedTable,
        referencedColumn: col.referencedColumn,
      });
    }
  }

  schemaLogger.debug("Derived schema metadata", {
    entities: entities.length,
    primaryKey,
    foreignKeys: foreignKeys.length,
  });

  return { entities, primaryKey, foreignKeys };
}

/**
 * Rendered text plus metadata, ready for the generators.
 */
export function buildSchemaInput(columns: readonly ColumnRecord[]): SchemaInput {
  const metadata = deriveMetadata(columns);
  return {
    schemaText: renderSchema(columns),
    ...metadata,
  };
}
