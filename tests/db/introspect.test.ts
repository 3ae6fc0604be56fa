import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { introspectSchema, listTables } from '../../src/db/introspect.js';
import { SchemaEmbedder } from '../../src/embedding/embedder.js';
import { magnitude } from '../../src/embedding/projector.js';
import { embedDatabaseSchema } from '../../src/pipeline.js';
import { resolveConfig } from '../../src/utils/config.js';
import { ConfigurationError } from '../../src/utils/errors.js';

describe('SQLite introspection', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    db.exec(`
      CREATE TABLE users (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        email TEXT
      );
      CREATE TABLE orders (
        id INTEGER PRIMARY KEY,
        user_id INTEGER REFERENCES users(id) ON DELETE CASCADE,
        total REAL
      );
      CREATE TABLE tags (
        label TEXT,
        owner TEXT REFERENCES users
      );
    `);
  });

  afterEach(() => {
    db.close();
  });

  it('should list user tables by name', () => {
    expect(listTables(db)).toEqual(['orders', 'tags', 'users']);
  });

  it('should read columns in declaration order', () => {
    const columns = introspectSchema(db);

    expect(columns.map((c) => `${c.table}.${c.column}`)).toEqual([
      'orders.id',
      'orders.user_id',
      'orders.total',
      'tags.label',
      'tags.owner',
      'users.id',
      'users.name',
      'users.email',
    ]);
  });

  it('should flag primary keys and rowid aliases', () => {
    const id = introspectSchema(db).find((c) => c.table === 'users' && c.column === 'id');

    expect(id).toEqual({
      table: 'users',
      column: 'id',
      dataType: 'INTEGER',
      isNullable: false,
      isIdentity: true,
      isPrimaryKey: true,
      isForeignKey: false,
      referencedTable: undefined,
      referencedColumn: undefined,
    });
  });

  it('should resolve foreign key references', () => {
    const columns = introspectSchema(db);
    const userId = columns.find((c) => c.column === 'user_id');
    const owner = columns.find((c) => c.column === 'owner');

    expect(userId).toMatchObject({
      isForeignKey: true,
      isNullable: true,
      referencedTable: 'users',
      referencedColumn: 'id',
    });
    expect(owner?.referencedTable).toBe('users');
    expect(owner?.referencedColumn).toBeUndefined();
  });

  it('should report NOT NULL columns as not nullable', () => {
    const name = introspectSchema(db).find((c) => c.column === 'name');

    expect(name?.isNullable).toBe(false);
    expect(name?.dataType).toBe('TEXT');
  });

  describe('embedDatabaseSchema', () => {
    it('should embed the introspected schema', async () => {
      const embedder = new SchemaEmbedder(resolveConfig({ embedding_size: 64 }));

      const result = await embedDatabaseSchema(db, embedder);

      expect(result.tableCount).toBe(3);
      expect(result.input.primaryKey).toBe('id');
      expect(result.input.foreignKeys).toEqual([
        { column: 'user_id', referencedTable: 'users', referencedColumn: 'id' },
        { column: 'owner', referencedTable: 'users', referencedColumn: undefined },
      ]);
      expect(result.input.schemaText.startsWith('CREATE TABLE orders (\n  id INTEGER PRIMARY KEY,')).toBe(true);
      expect(result.embedding.vector).toHaveLength(64);
      expect(magnitude(result.embedding.vector)).toBeCloseTo(1, 5);
    });

    it('should refuse a database without tables', async () => {
      const empty = new Database(':memory:');
      const embedder = new SchemaEmbedder(resolveConfig({ embedding_size: 16 }));

      await expect(embedDatabaseSchema(empty, embedder)).rejects.toThrow(ConfigurationError);
      empty.close();
    });
  });
});
