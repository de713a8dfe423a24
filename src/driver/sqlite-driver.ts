/**
 * SQLite driver: better-sqlite3 behind the async driver contract.
 *
 * SQLite has no catalogs, so catalog is always null; schema is the attached
 * database name (main, temp, or an ATTACH alias).
 */

import BetterSqlite3 from 'better-sqlite3';
import type BetterSqlite3Type from 'better-sqlite3';
import {
  AdapterError,
  translateErrors,
  type CatalogColumn,
  type CatalogTable,
  type ColumnDescriptor,
  type ColumnFilter,
  type Connection,
  type Cursor,
  type Driver,
  type Row,
} from './types.js';
import * as log from '../utils/logger.js';

export interface SqliteDriverOptions {
  readonly?: boolean;
  busyTimeoutMs?: number;
}

export class SqliteDriver implements Driver {
  constructor(private readonly options: SqliteDriverOptions = {}) {}

  async connect(target: string): Promise<Connection> {
    const db = await translateErrors(() => new BetterSqlite3(target, {
      readonly: this.options.readonly ?? false,
      timeout: this.options.busyTimeoutMs ?? 5_000,
    }));
    db.pragma('foreign_keys = ON');
    log.info(`Database opened: ${target}${this.options.readonly ? ' (read-only)' : ''}`);
    return new SqliteConnection(db);
  }
}

export class SqliteConnection implements Connection {
  constructor(private readonly db: BetterSqlite3Type.Database) {}

  async cursor(): Promise<Cursor> {
    if (!this.db.open) throw new AdapterError('Connection is closed');
    return new SqliteCursor(this.db);
  }

  async close(): Promise<void> {
    await translateErrors(() => this.db.close());
  }
}

class SqliteCursor implements Cursor {
  private rows?: Iterator<unknown>;
  private descriptors: ColumnDescriptor[] = [];
  private changes = -1;
  private closed = false;

  constructor(private readonly db: BetterSqlite3Type.Database) {}

  async execute(sql: string): Promise<void> {
    this.ensureOpen();
    this.release();

    await translateErrors(() => {
      const stmt = this.db.prepare(sql);
      if (stmt.reader) {
        // INTEGER comes back as bigint so values past 2^53 keep every digit.
        stmt.safeIntegers(true).raw(true);
        this.descriptors = stmt.columns().map(c => ({ name: c.name, typeName: c.type ?? '' }));
        this.changes = -1;
        this.rows = stmt.iterate();
      } else {
        this.descriptors = [];
        this.changes = stmt.run().changes;
      }
    });
  }

  async description(): Promise<ColumnDescriptor[]> {
    this.ensureOpen();
    return [...this.descriptors];
  }

  async rowCount(): Promise<number> {
    this.ensureOpen();
    return this.changes;
  }

  async fetchOne(): Promise<Row | undefined> {
    this.ensureOpen();
    const rows = this.rows;
    if (!rows) return undefined;

    const next = await translateErrors(() => rows.next());
    if (next.done) {
      this.rows = undefined;
      return undefined;
    }
    return asRow(next.value);
  }

  async tables(): Promise<CatalogTable[]> {
    this.ensureOpen();
    return translateErrors(() => this.listTables());
  }

  async columns(filter: ColumnFilter): Promise<CatalogColumn[]> {
    this.ensureOpen();
    // No catalog ever matches a non-empty catalog filter.
    if (filter.catalog) return [];

    return translateErrors(() => {
      const wanted = filter.table.toLowerCase();
      const result: CatalogColumn[] = [];

      for (const entry of this.listTables()) {
        if (filter.schema !== undefined && entry.schema !== filter.schema) continue;
        if (entry.table.toLowerCase() !== wanted) continue;

        const info = this.db
          .prepare('SELECT name, type FROM pragma_table_info(?, ?) ORDER BY cid')
          .raw(true)
          .all(entry.table, entry.schema);

        for (const raw of info) {
          const [name, type] = asRow(raw);
          result.push({
            catalog: null,
            schema: entry.schema,
            table: entry.table,
            column: String(name),
            datatype: typeof type === 'string' ? type : '',
          });
        }
      }
      return result;
    });
  }

  async close(): Promise<void> {
    this.ensureOpen();
    this.release();
    this.closed = true;
  }

  private listTables(): CatalogTable[] {
    const schemas = this.db
      .prepare('SELECT name FROM pragma_database_list ORDER BY seq')
      .raw(true)
      .all()
      .map(raw => String(asRow(raw)[0]));

    const tables: CatalogTable[] = [];
    for (const schema of schemas) {
      const rows = this.db
        .prepare(
          `SELECT name, type FROM ${quoteIdentifier(schema)}.sqlite_schema
           WHERE type IN ('table', 'view') AND name NOT LIKE 'sqlite_%'
           ORDER BY name`,
        )
        .raw(true)
        .all();

      for (const raw of rows) {
        const [name, type] = asRow(raw);
        tables.push({ catalog: null, schema, table: String(name), kind: String(type).toUpperCase() });
      }
    }
    return tables;
  }

  /** Stop any pending iteration so the statement releases the connection. */
  private release(): void {
    this.rows?.return?.();
    this.rows = undefined;
  }

  private ensureOpen(): void {
    if (this.closed) throw new AdapterError('Cursor is closed');
  }
}

function asRow(value: unknown): Row {
  if (!Array.isArray(value)) {
    throw new AdapterError('Driver returned a row that is not an array');
  }
  return value;
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
