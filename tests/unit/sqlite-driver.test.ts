import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { SqliteDriver } from '../../src/driver/sqlite-driver.js';
import { AdapterError, type Connection, type Cursor } from '../../src/driver/types.js';
import { Session } from '../../src/session/session.js';
import { setLogLevel } from '../../src/utils/logger.js';
import { createTempDir } from '../helpers/test-fixtures.js';

beforeAll(() => {
  setLogLevel('error');
});

async function run(connection: Connection, ...statements: string[]): Promise<void> {
  const cursor = await connection.cursor();
  for (const sql of statements) await cursor.execute(sql);
  await cursor.close();
}

describe('SqliteDriver', () => {
  let connection: Connection;
  let cursor: Cursor;

  beforeEach(async () => {
    connection = await new SqliteDriver().connect(':memory:');
    await run(
      connection,
      'CREATE TABLE orders (id INTEGER PRIMARY KEY AUTOINCREMENT, item TEXT NOT NULL, price REAL, photo BLOB)',
      "INSERT INTO orders (item, price, photo) VALUES ('apple', 1.5, x'cafe'), ('pear', NULL, NULL), ('fig', 2, NULL)",
      'CREATE VIEW cheap AS SELECT item FROM orders WHERE price < 2',
      "ATTACH DATABASE ':memory:' AS archive",
      'CREATE TABLE archive.Orders (legacy_id BIGINT)',
    );
    cursor = await connection.cursor();
  });

  afterEach(async () => {
    await connection.close();
  });

  describe('execute', () => {
    it('describes the columns of a query and reports no row count', async () => {
      await cursor.execute('SELECT * FROM orders');
      expect(await cursor.description()).toEqual([
        { name: 'id', typeName: 'INTEGER' },
        { name: 'item', typeName: 'TEXT' },
        { name: 'price', typeName: 'REAL' },
        { name: 'photo', typeName: 'BLOB' },
      ]);
      expect(await cursor.rowCount()).toBe(-1);
    });

    it('leaves the type empty for expression columns', async () => {
      await cursor.execute('SELECT count(*) AS n FROM orders');
      expect(await cursor.description()).toEqual([{ name: 'n', typeName: '' }]);
      expect(await cursor.fetchOne()).toEqual([3n]);
    });

    it('fetches rows one at a time as arrays', async () => {
      await cursor.execute('SELECT * FROM orders ORDER BY id');
      expect(await cursor.fetchOne()).toEqual([1n, 'apple', 1.5, Buffer.from([0xca, 0xfe])]);
      expect(await cursor.fetchOne()).toEqual([2n, 'pear', null, null]);
      expect(await cursor.fetchOne()).toEqual([3n, 'fig', 2, null]);
      expect(await cursor.fetchOne()).toBeUndefined();
      expect(await cursor.fetchOne()).toBeUndefined();
    });

    it('returns INTEGER values as bigint', async () => {
      await cursor.execute('SELECT 9007199254740993 AS big, 0.5 AS half');
      expect(await cursor.fetchOne()).toEqual([9007199254740993n, 0.5]);
    });

    it('reports changed rows for statements without a result', async () => {
      await cursor.execute("UPDATE orders SET price = 3 WHERE item <> 'apple'");
      expect(await cursor.rowCount()).toBe(2);
      expect(await cursor.description()).toEqual([]);
      expect(await cursor.fetchOne()).toBeUndefined();
    });

    it('wraps driver failures in AdapterError', async () => {
      const failure = cursor.execute('SELEC 1');
      await expect(failure).rejects.toBeInstanceOf(AdapterError);
      await expect(failure).rejects.toThrow('near "SELEC": syntax error');
    });
  });

  describe('catalog', () => {
    it('lists tables and views per attached schema without internal tables', async () => {
      const tables = await cursor.tables();
      expect(tables.filter(t => t.schema !== 'temp')).toEqual([
        { catalog: null, schema: 'main', table: 'cheap', kind: 'VIEW' },
        { catalog: null, schema: 'main', table: 'orders', kind: 'TABLE' },
        { catalog: null, schema: 'archive', table: 'Orders', kind: 'TABLE' },
      ]);
    });

    it('matches table names case-insensitively across schemas', async () => {
      const columns = await cursor.columns({ table: 'ORDERS' });
      expect(columns.map(c => `${c.schema}.${c.table}.${c.column}:${c.datatype}`)).toEqual([
        'main.orders.id:INTEGER',
        'main.orders.item:TEXT',
        'main.orders.price:REAL',
        'main.orders.photo:BLOB',
        'archive.Orders.legacy_id:BIGINT',
      ]);
      expect(columns.every(c => c.catalog === null)).toBe(true);
    });

    it('applies the schema filter and never matches a catalog', async () => {
      expect((await cursor.columns({ schema: 'archive', table: 'orders' })).map(c => c.column)).toEqual([
        'legacy_id',
      ]);
      expect(await cursor.columns({ catalog: 'archive', table: 'orders' })).toEqual([]);
      expect(await cursor.columns({ table: 'missing' })).toEqual([]);
    });

    it('answers catalog calls while another cursor is mid-iteration', async () => {
      await cursor.execute('SELECT id FROM orders ORDER BY id');
      expect(await cursor.fetchOne()).toEqual([1n]);

      const other = await connection.cursor();
      expect((await other.tables()).length).toBeGreaterThan(0);
      await other.close();

      expect(await cursor.fetchOne()).toEqual([2n]);
    });
  });

  describe('lifecycle', () => {
    it('refuses a closed cursor', async () => {
      await cursor.close();
      await expect(cursor.description()).rejects.toThrow('Cursor is closed');
    });

    it('refuses new cursors once the connection is closed', async () => {
      const other = await new SqliteDriver().connect(':memory:');
      await other.close();
      await expect(other.cursor()).rejects.toThrow('Connection is closed');
    });

    it('reports a database that cannot be opened as AdapterError', async () => {
      await expect(new SqliteDriver().connect(join('/nonexistent-dir', 'x.db'))).rejects.toBeInstanceOf(
        AdapterError,
      );
    });
  });

  describe('through a session', () => {
    it('pages stringified values', async () => {
      const session = new Session(connection, new AbortController());
      await session.execute('SELECT id, item, price, photo FROM orders ORDER BY id');

      expect(await session.page(2)).toEqual([
        { id: '1', item: 'apple', price: '1.5', photo: 'cafe' },
        { id: '2', item: 'pear', price: 'null', photo: 'null' },
      ]);
      expect(session.metadata()).toEqual([
        { column: 'id', datatype: 'INTEGER' },
        { column: 'item', datatype: 'TEXT' },
        { column: 'price', datatype: 'REAL' },
        { column: 'photo', datatype: 'BLOB' },
      ]);
      expect(await session.page(2)).toEqual([{ id: '3', item: 'fig', price: '2', photo: 'null' }]);
      expect(await session.finish()).toBe(true);
    });

    it('keeps every digit of integers beyond 2^53', async () => {
      await run(
        connection,
        'CREATE TABLE ledger (id INTEGER, amount INTEGER)',
        'INSERT INTO ledger VALUES (9007199254740993, -9007199254740995)',
      );
      const session = new Session(connection, new AbortController());
      await session.execute('SELECT id, amount FROM ledger');

      expect(await session.page(1)).toEqual([{ id: '9007199254740993', amount: '-9007199254740995' }]);
      await session.finish();
    });
  });
});

describe('SqliteDriver read-only', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('rejects writes', async () => {
    const path = join(dir, 'data.db');
    const writable = await new SqliteDriver().connect(path);
    await run(writable, 'CREATE TABLE t (x INTEGER)');
    await writable.close();

    const readOnly = await new SqliteDriver({ readonly: true }).connect(path);
    const cursor = await readOnly.cursor();
    await expect(cursor.execute('INSERT INTO t VALUES (1)')).rejects.toThrow('attempt to write a readonly database');
    await cursor.execute('SELECT count(*) FROM t');
    expect(await cursor.fetchOne()).toEqual([0n]);
    await cursor.close();
    await readOnly.close();
  });
});
