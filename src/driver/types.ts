/**
 * Driver contract: the only surface the session core uses to reach a database.
 *
 * Every call may fail with AdapterError; the core passes those failures on
 * without looking inside them.
 */

export interface ColumnDescriptor {
  readonly name: string;
  readonly typeName: string;
}

/** One result row, values in descriptor order. */
export type Row = readonly unknown[];

export interface CatalogTable {
  catalog: string | null;
  schema: string | null;
  table: string;
  /** Object kind as the driver reports it, e.g. "TABLE" or "VIEW". */
  kind: string;
}

export interface CatalogColumn {
  catalog: string | null;
  schema: string | null;
  table: string;
  column: string;
  datatype: string;
}

/** Absent catalog/schema means "any". */
export interface ColumnFilter {
  catalog?: string;
  schema?: string;
  table: string;
}

export interface Cursor {
  execute(sql: string): Promise<void>;
  description(): Promise<ColumnDescriptor[]>;
  /** Rows affected by the last statement, -1 when not applicable. */
  rowCount(): Promise<number>;
  /** Next row, or undefined once the result is exhausted. */
  fetchOne(): Promise<Row | undefined>;
  tables(): Promise<CatalogTable[]>;
  columns(filter: ColumnFilter): Promise<CatalogColumn[]>;
  close(): Promise<void>;
}

export interface Connection {
  cursor(): Promise<Cursor>;
  close(): Promise<void>;
}

export interface Driver {
  connect(target: string): Promise<Connection>;
}

export class AdapterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AdapterError';
  }
}

/** Run a driver call, rethrowing anything it raises as AdapterError. */
export async function translateErrors<T>(call: () => T | Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof AdapterError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new AdapterError(message, { cause: err });
  }
}
