/**
 * SQLite Adapter - narrow interface over better-sqlite3
 *
 * The capture reader and merger only need exec/prepare/close, so they depend
 * on this shape rather than on the driver.
 */

import Database from 'better-sqlite3';

export interface SqliteStatement {
  run(...params: unknown[]): { changes: number; lastInsertRowid: number | bigint };
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
}

export interface SqliteDatabase {
  exec(sql: string): void;
  prepare(sql: string): SqliteStatement;
  transaction<T>(fn: () => T): T;
  close(): void;
}

export interface OpenOptions {
  readonly?: boolean;
  /** Fail instead of creating a missing file */
  fileMustExist?: boolean;
}

/**
 * Open a SQLite database file
 */
export function createDatabase(dbPath: string, options: OpenOptions = {}): SqliteDatabase {
  const db = new Database(dbPath, {
    readonly: options.readonly ?? false,
    fileMustExist: options.fileMustExist ?? false,
  });

  return {
    exec(sql: string): void {
      db.exec(sql);
    },

    prepare(sql: string): SqliteStatement {
      const stmt = db.prepare(sql);
      return {
        run(...params: unknown[]) {
          const result = stmt.run(...params);
          return {
            changes: result.changes,
            lastInsertRowid: result.lastInsertRowid,
          };
        },
        get(...params: unknown[]) {
          return stmt.get(...params);
        },
        all(...params: unknown[]) {
          return stmt.all(...params);
        },
      };
    },

    transaction<T>(fn: () => T): T {
      return db.transaction(fn)();
    },

    close(): void {
      db.close();
    },
  };
}

/**
 * Names of the user tables in a database
 */
export function listTables(db: SqliteDatabase): string[] {
  const rows = db.prepare("SELECT name FROM sqlite_master WHERE type='table'").all();
  const names: string[] = [];
  for (const row of rows) {
    if (typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string') {
      names.push(row.name);
    }
  }
  return names;
}
