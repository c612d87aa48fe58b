// persistence/kv.ts
// Durable key/value store over a single SQLite table (key TEXT PRIMARY KEY, value TEXT).
// Values are opaque JSON text; every read hits the database.

import Database from "better-sqlite3";
import { ConfigError, StorageError } from "../errors";
import { STORAGE_TABLE, toJson, type DataKey, type Json } from "./schema";

export interface KeyValueStore {
  /** Upsert `value` under `key`. All-or-nothing: on failure the previous value is kept. */
  put(key: DataKey, value: Json): Promise<void>;
  /** Stored value, or `undefined` when the key has never been written. */
  get(key: DataKey): Promise<Json | undefined>;
  close(): void;
}

type ValueRow = { value: string };

function isValueRow(row: unknown): row is ValueRow {
  return typeof row === "object" && row !== null && "value" in row && typeof row.value === "string";
}

/**
 * Map a connection string onto a better-sqlite3 filename.
 *   sqlite:///data.db        -> data.db (relative)
 *   sqlite:////var/data.db   -> /var/data.db
 *   sqlite+aiosqlite:///x.db -> x.db
 *   sqlite://, :memory:      -> :memory:
 *   file:data.db, data.db    -> data.db
 */
export function resolveSqlitePath(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) throw new ConfigError(["DATABASE_URL: must not be empty"]);
  if (trimmed === ":memory:") return trimmed;

  const sqlite = /^sqlite(?:\+[\w-]+)?:\/\/(.*)$/i.exec(trimmed);
  if (sqlite) {
    const rest = sqlite[1];
    if (rest === "" || rest === "/" || rest === "/:memory:") return ":memory:";
    if (!rest.startsWith("/")) {
      throw new ConfigError([`DATABASE_URL: expected sqlite:///<path>, got "${trimmed}"`]);
    }
    return rest.slice(1);
  }

  if (trimmed.startsWith("file:")) return trimmed.slice("file:".length);
  if (/^[a-z][\w+.-]*:\/\//i.test(trimmed)) {
    throw new ConfigError([`DATABASE_URL: unsupported scheme in "${trimmed}" (only sqlite is supported)`]);
  }
  return trimmed;
}

export type SqliteKVOptions = {
  /** ms a writer waits on a lock held by another process before failing */
  busyTimeoutMs?: number;
};

export class SqliteKV implements KeyValueStore {
  private readonly db: Database.Database;
  private readonly upsert: Database.Statement<[string, string]>;
  private readonly selectOne: Database.Statement<[string]>;

  constructor(filename: string, opts: SqliteKVOptions = {}) {
    try {
      this.db = new Database(filename);
      this.db.pragma(`busy_timeout = ${Math.max(0, Math.floor(opts.busyTimeoutMs ?? 5_000))}`);
      if (filename !== ":memory:") this.db.pragma("journal_mode = WAL");
      this.db.exec(
        `CREATE TABLE IF NOT EXISTS ${STORAGE_TABLE} (
           key TEXT PRIMARY KEY,
           value TEXT
         )`
      );
      this.upsert = this.db.prepare<[string, string]>(
        `INSERT INTO ${STORAGE_TABLE} (key, value) VALUES (?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`
      );
      this.selectOne = this.db.prepare<[string]>(`SELECT value FROM ${STORAGE_TABLE} WHERE key = ?`);
    } catch (e) {
      throw new StorageError(`Failed to open store at ${filename}`, e);
    }
  }

  async put(key: DataKey, value: Json): Promise<void> {
    // JSON.stringify would write NaN and Infinity as null
    let payload: string | undefined;
    try {
      payload = toJson(value) === undefined ? undefined : JSON.stringify(value);
    } catch (e) {
      throw new StorageError(`Value for "${key}" is not serializable`, e);
    }
    if (payload === undefined) throw new StorageError(`Value for "${key}" is not serializable`);

    const text = payload;
    try {
      this.db.transaction(() => {
        this.upsert.run(key, text);
      })();
    } catch (e) {
      throw new StorageError(`Failed to write "${key}"`, e);
    }
  }

  async get(key: DataKey): Promise<Json | undefined> {
    let row: unknown;
    try {
      row = this.selectOne.get(key);
    } catch (e) {
      throw new StorageError(`Failed to read "${key}"`, e);
    }
    if (row === undefined) return undefined;
    if (!isValueRow(row)) throw new StorageError(`Row for "${key}" has no value`);

    let parsed: unknown;
    try {
      parsed = JSON.parse(row.value);
    } catch (e) {
      throw new StorageError(`Stored value for "${key}" is not valid JSON`, e);
    }
    const json = toJson(parsed);
    if (json === undefined) throw new StorageError(`Stored value for "${key}" is not valid JSON`);
    return json;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}

/* ===== Convenience factory ===== */
export function openStore(databaseUrl: string, opts?: SqliteKVOptions): SqliteKV {
  return new SqliteKV(resolveSqlitePath(databaseUrl), opts);
}
