/**
 * PagingContext: one open cursor turned into bounded, resumable pages.
 *
 * Column descriptors are read once, when the context is created, and never
 * refreshed: some drivers drop the result description once iteration starts.
 */

import type { ColumnDescriptor, Cursor } from '../driver/types.js';

export type PageRow = Record<string, string>;

export class InvalidPageSizeError extends Error {
  constructor(readonly requested: unknown) {
    super('Page size must be a positive integer');
    this.name = 'InvalidPageSizeError';
  }
}

export class PagingContextClosedError extends Error {
  constructor() {
    super('Paging context is already finished');
    this.name = 'PagingContextClosedError';
  }
}

export class PagingContext {
  private open = true;

  private constructor(
    private readonly cursor: Cursor,
    private readonly columns: readonly ColumnDescriptor[],
  ) {}

  /** Wrap a cursor whose statement has already been executed. */
  static async create(cursor: Cursor): Promise<PagingContext> {
    const columns = Object.freeze(
      (await cursor.description()).map(c => Object.freeze({ name: c.name, typeName: c.typeName })),
    );
    return new PagingContext(cursor, columns);
  }

  get isOpen(): boolean {
    return this.open;
  }

  metadata(): readonly ColumnDescriptor[] {
    this.ensureOpen();
    return this.columns;
  }

  async count(): Promise<number> {
    this.ensureOpen();
    return this.cursor.rowCount();
  }

  /**
   * Pull up to maxRows rows. An empty page means the result is exhausted.
   */
  async page(maxRows: number): Promise<PageRow[]> {
    this.ensureOpen();
    if (!Number.isInteger(maxRows) || maxRows < 1) {
      throw new InvalidPageSizeError(maxRows);
    }

    const rows: PageRow[] = [];
    while (rows.length < maxRows) {
      const row = await this.cursor.fetchOne();
      if (row === undefined) break;

      const named: PageRow = {};
      this.columns.forEach((column, i) => {
        named[column.name] = stringifyValue(row[i]);
      });
      rows.push(named);
    }
    return rows;
  }

  async finish(): Promise<void> {
    this.ensureOpen();
    this.open = false;
    await this.cursor.close();
  }

  private ensureOpen(): void {
    if (!this.open) throw new PagingContextClosedError();
  }
}

export function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (value instanceof Uint8Array) return Buffer.from(value).toString('hex');
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
