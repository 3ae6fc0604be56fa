import type { ColumnRecord } from "../utils/types.js";

function renderColumn(col: ColumnRecord, singlePrimaryKey: boolean): string {
  let line = `  ${col.column} ${col.dataType || "TEXT"}`;

  if (col.isPrimaryKey && singlePrimaryKey) {
    line += " PRIMARY KEY";
  } else if (!col.isNullable) {
    line += " NOT NULL";
  }

  if (col.isForeignKey && col.referencedTable) {
    line += ` REFERENCES ${col.referencedTable}`;
    if (col.referencedColumn) line += `(${col.referencedColumn})`;
  }

  return line;
}

/**
 * Renders one table's columns as a CREATE TABLE statement.
 * Composite primary keys become a trailing PRIMARY KEY (...) clause.
 */
export function renderCreateTable(table: string, columns: readonly ColumnRecord[]): string {
  const keyColumns = columns.filter((c) => c.isPrimaryKey).map((c) => c.column);
  const singlePrimaryKey = keyColumns.length === 1;

  const lines = columns.map((col) => renderColumn(col, singlePrimaryKey));
  if (keyColumns.length > 1) {
    lines.push(`  PRIMARY KEY (${keyColumns.join(", ")})`);
  }

  return `CREATE TABLE ${table} (\n${lines.join(",\n")}\n);`;
}

/**
 * Renders every table, in first-seen order, separated by a blank line.
 */
export function renderSchema(columns: readonly ColumnRecord[]): string {
  const tables = new Map<string, ColumnRecord[]>();
  for (const col of columns) {
    const existing = tables.get(col.table);
    if (existing) {
      existing.push(col);
    } else {
      tables.set(col.table, [col]);
    }
  }

  return [...tables].map(([table, cols]) => renderCreateTable(table, cols)).join("\n\n");
}
