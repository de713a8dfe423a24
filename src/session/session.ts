/**
 * Session: the single database connection plus at most one open query.
 *
 * States: idle (no PagingContext), active (one PagingContext) and closed
 * (after quit). Every transition goes through the checks below; nothing else
 * touches `active`.
 */

import type { CatalogColumn, CatalogTable, Connection, Cursor } from '../driver/types.js';
import { PagingContext, type PageRow } from './paging-context.js';
import * as log from '../utils/logger.js';

export const NO_ACTIVE_QUERY = 'No active query';
export const EXECUTE_WHILE_ACTIVE = 'Cannot execute while a query is active';
export const QUIT_WHILE_ACTIVE = 'Cannot quit while a query is active';

export class SessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionStateError';
  }
}

export interface TableInfo {
  catalog: string;
  schema: string;
  table: string;
}

export interface ColumnInfo extends TableInfo {
  column: string;
  datatype: string;
}

export interface ColumnMetadata {
  column: string;
  datatype: string;
}

export type SessionState = 'idle' | 'active' | 'closed';

export class Session {
  private active: PagingContext | null = null;
  private closed = false;

  /**
   * @param shutdown aborted by `quit()` once the connection is closed; the
   *   owner of the serving loop listens on its signal.
   */
  constructor(
    private readonly connection: Connection,
    private readonly shutdown: AbortController,
  ) {}

  get state(): SessionState {
    if (this.closed) return 'closed';
    return this.active ? 'active' : 'idle';
  }

  async tables(): Promise<TableInfo[]> {
    return this.tableLike('table');
  }

  async views(): Promise<TableInfo[]> {
    return this.tableLike('view');
  }

  /** Empty or null catalog/schema are unspecified filters. */
  async columns(catalog: string | null, schema: string | null, table: string): Promise<ColumnInfo[]> {
    const entries = await this.withCursor(cursor => cursor.columns({
      catalog: catalog || undefined,
      schema: schema || undefined,
      table,
    }));
    return entries.map((entry: CatalogColumn) => ({
      catalog: entry.catalog ?? '',
      schema: entry.schema ?? '',
      table: entry.table,
      column: entry.column,
      datatype: entry.datatype,
    }));
  }

  async execute(sql: string): Promise<true> {
    this.ensureUsable();
    if (this.active) throw new SessionStateError(EXECUTE_WHILE_ACTIVE);

    const cursor = await this.connection.cursor();
    try {
      await cursor.execute(sql);
      this.active = await PagingContext.create(cursor);
    } catch (err) {
      await cursor.close().catch(closeErr => {
        log.warn(`Failed to close cursor after execute error: ${log.describeError(closeErr)}`);
      });
      throw err;
    }
    return true;
  }

  metadata(): ColumnMetadata[] {
    return this.requireActive().metadata().map(c => ({ column: c.name, datatype: c.typeName }));
  }

  async count(): Promise<number> {
    return this.requireActive().count();
  }

  async page(max: number): Promise<PageRow[]> {
    return this.requireActive().page(max);
  }

  async finish(): Promise<true> {
    const context = this.requireActive();
    // Dropped before closing: a context that failed to close is not reusable either.
    this.active = null;
    await context.finish();
    return true;
  }

  async quit(): Promise<true> {
    this.ensureUsable();
    if (this.active) throw new SessionStateError(QUIT_WHILE_ACTIVE);

    await this.connection.close();
    this.closed = true;
    this.shutdown.abort();
    return true;
  }

  private async tableLike(kind: 'table' | 'view'): Promise<TableInfo[]> {
    const entries = await this.withCursor(cursor => cursor.tables());
    return entries
      .filter((entry: CatalogTable) => entry.kind.toLowerCase() === kind)
      .map(entry => ({
        catalog: entry.catalog ?? '',
        schema: entry.schema ?? '',
        table: entry.table,
      }));
  }

  /** Short-lived cursor, independent of the active query. */
  private async withCursor<T>(use: (cursor: Cursor) => Promise<T>): Promise<T> {
    this.ensureUsable();
    const cursor = await this.connection.cursor();
    try {
      return await use(cursor);
    } finally {
      await cursor.close();
    }
  }

  private requireActive(): PagingContext {
    this.ensureUsable();
    if (!this.active) throw new SessionStateError(NO_ACTIVE_QUERY);
    return this.active;
  }

  private ensureUsable(): void {
    if (this.closed) throw new SessionStateError('Session is closed');
  }
}
