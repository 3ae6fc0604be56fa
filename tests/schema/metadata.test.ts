import { describe, it, expect } from 'vitest';
import { buildSchemaInput, deriveMetadata } from '../../src/schema/metadata.js';
import { renderCreateTable, renderSchema } from '../../src/schema/render.js';
import type { ColumnRecord } from '../../src/utils/types.js';

function column(overrides: Partial<ColumnRecord> & Pick<ColumnRecord, 'table' | 'column'>): ColumnRecord {
  return {
    dataType: 'INTEGER',
    isNullable: true,
    isIdentity: false,
    isPrimaryKey: false,
    isForeignKey: false,
    ...overrides,
  };
}

const COLUMNS: ColumnRecord[] = [
  column({ table: 'users', column: 'id', isPrimaryKey: true, isIdentity: true, isNullable: false }),
  column({ table: 'users', column: 'name', dataType: 'TEXT', isNullable: false }),
  column({ table: 'orders', column: 'id', isPrimaryKey: true, isIdentity: true, isNullable: false }),
  column({
    table: 'orders',
    column: 'user_id',
    isForeignKey: true,
    referencedTable: 'users',
    referencedColumn: 'id',
  }),
];

describe('deriveMetadata', () => {
  it('should list tables and columns once, in first-seen order', () => {
    expect(deriveMetadata(COLUMNS).entities).toEqual(['users', 'id', 'name', 'orders', 'user_id']);
  });

  it('should take the first primary key column', () => {
    expect(deriveMetadata(COLUMNS).primaryKey).toBe('id');
  });

  it('should collect foreign keys with their references', () => {
    expect(deriveMetadata(COLUMNS).foreignKeys).toEqual([
      { column: 'user_id', referencedTable: 'users', referencedColumn: 'id' },
    ]);
  });

  it('should report an empty primary key when there is none', () => {
    const metadata = deriveMetadata([column({ table: 'log', column: 'message', dataType: 'TEXT' })]);

    expect(metadata.primaryKey).toBe('');
    expect(metadata.foreignKeys).toEqual([]);
  });

  it('should list a foreign key column shared by two tables once', () => {
    const metadata = deriveMetadata([
      column({ table: 'a', column: 'owner_id', isForeignKey: true, referencedTable: 'owners' }),
      column({ table: 'b', column: 'owner_id', isForeignKey: true, referencedTable: 'owners' }),
    ]);

    expect(metadata.foreignKeys).toHaveLength(1);
  });
});

describe('renderSchema', () => {
  it('should render one CREATE TABLE per table, separated by a blank line', () => {
    expect(renderSchema(COLUMNS)).toBe(
      'CREATE TABLE users (\n' +
        '  id INTEGER PRIMARY KEY,\n' +
        '  name TEXT NOT NULL\n' +
        ');\n' +
        '\n' +
        'CREATE TABLE orders (\n' +
        '  id INTEGER PRIMARY KEY,\n' +
        '  user_id INTEGER REFERENCES users(id)\n' +
        ');'
    );
  });

  it('should render composite primary keys as a table constraint', () => {
    const sql = renderCreateTable('order_items', [
      column({ table: 'order_items', column: 'order_id', isPrimaryKey: true, isNullable: false }),
      column({ table: 'order_items', column: 'product_id', isPrimaryKey: true, isNullable: false }),
    ]);

    expect(sql).toBe(
      'CREATE TABLE order_items (\n' +
        '  order_id INTEGER NOT NULL,\n' +
        '  product_id INTEGER NOT NULL,\n' +
        '  PRIMARY KEY (order_id, product_id)\n' +
        ');'
    );
  });

  it('should omit the column list of a reference when unknown', () => {
    const sql = renderCreateTable('notes', [
      column({ table: 'notes', column: 'author', dataType: '', isForeignKey: true, referencedTable: 'people' }),
    ]);

    expect(sql).toBe('CREATE TABLE notes (\n  author TEXT REFERENCES people\n);');
  });
});

describe('buildSchemaInput', () => {
  it('should combine rendered text and metadata', () => {
    const input = buildSchemaInput(COLUMNS);

    expect(input.schemaText).toBe(renderSchema(COLUMNS));
    expect(input.primaryKey).toBe('id');
    expect(input.entities).toHaveLength(5);
    expect(input.foreignKeys).toHaveLength(1);
  });
});
