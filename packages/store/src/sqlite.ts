import initSqlJs from "sql.js";
import type { Database, ParamsObject, SqlJsStatic, SqlValue } from "sql.js";

let engine: Promise<SqlJsStatic> | null = null;

/** The sql.js module, compiled once per process. Its wasm ships inside the package. */
export function loadSqlite(): Promise<SqlJsStatic> {
  if (!engine) engine = initSqlJs.default();
  return engine;
}

export type RowReader<R> = (row: ParamsObject) => R;

/**
 * One SQL statement with typed parameters. sql.js frees every prepared
 * statement when the database is exported, so each call prepares its own.
 */
export class Statement<P extends SqlValue[]> {
  constructor(protected db: Database, readonly sql: string) {}

  /** Returns the number of rows changed. */
  run(...params: P): number {
    this.db.run(this.sql, params);
    return this.db.getRowsModified();
  }
}

export class Query<P extends SqlValue[], R> extends Statement<P> {
  constructor(db: Database, sql: string, private read: RowReader<R>) {
    super(db, sql);
  }

  get(...params: P): R | undefined {
    return this.collect(params, 1)[0];
  }

  all(...params: P): R[] {
    return this.collect(params, Infinity);
  }

  private collect(params: P, limit: number): R[] {
    const stmt = this.db.prepare(this.sql);
    try {
      stmt.bind(params);
      const rows: R[] = [];
      while (rows.length < limit && stmt.step()) rows.push(this.read(stmt.getAsObject()));
      return rows;
    } finally {
      stmt.free();
    }
  }
}

// ─── Column readers ───────────────────────────────────────────────

export function text(row: ParamsObject, column: string): string {
  const value = row[column];
  if (typeof value !== "string") throw new Error(`Column ${column} is not text`);
  return value;
}

export function nullableText(row: ParamsObject, column: string): string | null {
  const value = row[column];
  return value === null ? null : text(row, column);
}

export function num(row: ParamsObject, column: string): number {
  const value = row[column];
  if (typeof value !== "number") throw new Error(`Column ${column} is not numeric`);
  return value;
}
