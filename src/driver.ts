import BetterSqlite3 = require('better-sqlite3');

/**
 * Minimal SQLite surface the ledger needs. Implemented by BetterSqlite3Driver;
 * every operation opens its own driver and closes it when done.
 */
export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

export interface SQLiteDriver {
  run(sql: string, params?: unknown[]): RunResult;
  get<T>(sql: string, params?: unknown[]): T | undefined;
  all<T>(sql: string, params?: unknown[]): T[];
  exec(sql: string): void;
  close(): void;
}

export type ConnectionFactory = () => SQLiteDriver;

export class BetterSqlite3Driver implements SQLiteDriver {
  private db: BetterSqlite3.Database;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;
  }

  run(sql: string, params?: unknown[]): RunResult {
    const result = this.db.prepare(sql).run(...(params ?? []));
    return {
      changes: result.changes,
      lastInsertRowid: Number(result.lastInsertRowid),
    };
  }

  get<T>(sql: string, params?: unknown[]): T | undefined {
    return this.db.prepare(sql).get(...(params ?? [])) as T | undefined;
  }

  all<T>(sql: string, params?: unknown[]): T[] {
    return this.db.prepare(sql).all(...(params ?? [])) as T[];
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  close(): void {
    this.db.close();
  }
}

export function sqliteConnectionFactory(
  dbPath: string,
  options: BetterSqlite3.Options = {}
): ConnectionFactory {
  return () => new BetterSqlite3Driver(new BetterSqlite3(dbPath, options));
}

export function withConnection<T>(connect: ConnectionFactory, fn: (driver: SQLiteDriver) => T): T {
  const driver = connect();
  try {
    return fn(driver);
  } finally {
    driver.close();
  }
}
