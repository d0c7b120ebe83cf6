import type { KeyValueConnection } from "../kv.types";
import { SQLiteStorage, type SQLiteStorageOptions } from "./sqlite.storage";

export interface SQLiteKeyValueOptions extends SQLiteStorageOptions {
  readonly nowMs?: () => number;
}

export class SQLiteKeyValueConnection implements KeyValueConnection {
  readonly backend = "sqlite";
  private readonly storage: SQLiteStorage;
  private readonly nowMs: () => number;

  constructor(options: SQLiteKeyValueOptions = {}) {
    this.storage = new SQLiteStorage(options);
    this.nowMs = options.nowMs ?? Date.now;
  }

  /** Opens the database and applies the schema; throws when the file cannot be used. */
  static open(options: SQLiteKeyValueOptions = {}): SQLiteKeyValueConnection {
    const connection = new SQLiteKeyValueConnection(options);
    connection.storage.connect();
    return connection;
  }

  get dbPath(): string {
    return this.storage.getResolvedDbPath();
  }

  async get(key: string): Promise<string | null> {
    const now = this.nowMs();
    const rows = this.storage.query<{ value: unknown; expires_at: unknown }>(
      "SELECT value, expires_at FROM kv_entries WHERE key = ?",
      [key]
    );
    const row = rows[0];
    if (!row) {
      return null;
    }
    if (Number(row.expires_at) <= now) {
      this.storage.exec("DELETE FROM kv_entries WHERE key = ? AND expires_at <= ?", [key, now]);
      return null;
    }
    return typeof row.value === "string" ? row.value : null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const expiresAt = this.nowMs() + Math.round(ttlSeconds * 1000);
    this.storage.exec(
      `
      INSERT INTO kv_entries (key, value, expires_at) VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at
      `,
      [key, value, expiresAt]
    );
  }

  async delete(key: string): Promise<void> {
    this.storage.exec("DELETE FROM kv_entries WHERE key = ?", [key]);
  }

  async ping(): Promise<void> {
    this.storage.query("SELECT 1 AS ok");
  }

  /** Eager eviction; returns the number of rows removed. */
  purgeExpired(): number {
    return this.storage.exec("DELETE FROM kv_entries WHERE expires_at <= ?", [this.nowMs()])
      .changes;
  }

  async close(): Promise<void> {
    this.storage.close();
  }
}
