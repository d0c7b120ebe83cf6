import fs from "node:fs";
import path from "node:path";
import BetterSqlite3, { type Database as BetterSqliteDatabase } from "better-sqlite3";

export type SQLiteParam = string | number | bigint | Buffer | null;

export interface Storage {
  connect(): void;
  close(): void;
  exec(sql: string, params?: readonly SQLiteParam[]): { readonly changes: number };
  query<T extends Record<string, unknown>>(
    sql: string,
    params?: readonly SQLiteParam[]
  ): readonly T[];
}

export interface SQLiteStorageOptions {
  readonly dbPath?: string;
  readonly expectedSchemaVersion?: string;
}

export const DEFAULT_SQLITE_DB_REL_PATH = path.join("ops", "runtime", "sessions.db");
export const SQLITE_STORAGE_SCHEMA_VERSION = "1";

const CREATE_SCHEMA_VERSION_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version TEXT PRIMARY KEY,
  applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
`;

const CREATE_KV_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS kv_entries (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL,
  expires_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_kv_entries_expires_at
  ON kv_entries(expires_at);
`;

function resolveDbPath(explicitPath?: string): string {
  if (explicitPath && explicitPath.trim() !== "") {
    return path.resolve(explicitPath);
  }
  return path.resolve(process.cwd(), DEFAULT_SQLITE_DB_REL_PATH);
}

export class SQLiteStorage implements Storage {
  private readonly dbPath: string;
  private readonly expectedSchemaVersion: string;
  private db: BetterSqliteDatabase | null = null;
  private closed = false;

  constructor(options: SQLiteStorageOptions = {}) {
    this.dbPath = resolveDbPath(options.dbPath);
    this.expectedSchemaVersion = options.expectedSchemaVersion ?? SQLITE_STORAGE_SCHEMA_VERSION;
  }

  connect(): void {
    if (this.closed) {
      throw new Error("SQLITE_STORAGE_ERROR storage has been closed");
    }
    if (this.db !== null) {
      throw new Error("SQLITE_STORAGE_ERROR single connection already opened");
    }

    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    const db = new BetterSqlite3(this.dbPath);

    try {
      db.exec("PRAGMA journal_mode = WAL;");
      db.exec("PRAGMA synchronous = NORMAL;");
      this.db = db;
      this.initializeSchema();
    } catch (error) {
      db.close();
      this.db = null;
      throw error;
    }
  }

  close(): void {
    if (this.db === null) {
      this.closed = true;
      return;
    }
    this.db.close();
    this.db = null;
    this.closed = true;
  }

  exec(sql: string, params: readonly SQLiteParam[] = []): { readonly changes: number } {
    const db = this.requireDb();
    const info = db.prepare(sql).run(...params);
    return { changes: info.changes };
  }

  query<T extends Record<string, unknown>>(
    sql: string,
    params: readonly SQLiteParam[] = []
  ): readonly T[] {
    const db = this.requireDb();
    return db.prepare(sql).all(...params) as T[];
  }

  getResolvedDbPath(): string {
    return this.dbPath;
  }

  private initializeSchema(): void {
    const db = this.requireDb();
    db.exec(CREATE_SCHEMA_VERSION_TABLE_SQL);

    const versions = this.query<{ version: unknown }>(
      "SELECT version FROM schema_version ORDER BY version ASC"
    );

    if (versions.length === 0) {
      db.exec("BEGIN TRANSACTION;");
      try {
        db.exec(CREATE_KV_SCHEMA_SQL);
        this.exec("INSERT INTO schema_version(version) VALUES (?)", [
          this.expectedSchemaVersion,
        ]);
        db.exec("COMMIT;");
      } catch (error) {
        db.exec("ROLLBACK;");
        throw error;
      }
      return;
    }

    this.assertSchemaVersionMatch(versions);
    db.exec(CREATE_KV_SCHEMA_SQL);
  }

  private assertSchemaVersionMatch(versions: readonly { version: unknown }[]): void {
    const storedVersions = versions
      .map((row) => row.version)
      .filter((value): value is string => typeof value === "string");
    const schemaMatches =
      storedVersions.length === 1 && storedVersions[0] === this.expectedSchemaVersion;

    if (!schemaMatches) {
      throw new Error(
        `SQLITE_STORAGE_VERSION_MISMATCH expected=${this.expectedSchemaVersion} actual=${storedVersions.join(",")}`
      );
    }
  }

  private requireDb(): BetterSqliteDatabase {
    if (this.db === null) {
      if (this.closed) {
        throw new Error("SQLITE_STORAGE_ERROR connection is closed");
      }
      throw new Error("SQLITE_STORAGE_ERROR connection is not open");
    }
    return this.db;
  }
}
