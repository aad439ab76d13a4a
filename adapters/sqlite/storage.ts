import type Database from "better-sqlite3";
import type { HydratedStorage } from "@unistate/core";
import { stringify } from "../json";
import { openDb, type DB } from "./db";

type Row = { key: string; value_json: string };

/**
 * HydratedStorage over the `hydrated` table. Every row is loaded on
 * construction so reads stay synchronous; writes go straight through.
 */
export class SqliteStorage implements HydratedStorage {
  private readonly cache = new Map<string, unknown>();
  private readonly upsert: Database.Statement<[{ key: string; value_json: string; updated_at: string }]>;
  private readonly remove: Database.Statement<[string]>;
  private readonly removeAll: Database.Statement<[]>;

  constructor(
    dbOrPath: DB | string,
    private readonly clock: () => string = () => new Date().toISOString(),
  ) {
    const db = openDb(dbOrPath);
    for (const row of db.prepare<[], Row>(`SELECT key, value_json FROM hydrated`).all()) {
      this.cache.set(row.key, JSON.parse(row.value_json));
    }
    this.upsert = db.prepare(
      `INSERT INTO hydrated (key, value_json, updated_at) VALUES (@key, @value_json, @updated_at)
       ON CONFLICT(key) DO UPDATE SET value_json = excluded.value_json, updated_at = excluded.updated_at`,
    );
    this.remove = db.prepare(`DELETE FROM hydrated WHERE key = ?`);
    this.removeAll = db.prepare(`DELETE FROM hydrated`);
  }

  read(key: string): unknown {
    return this.cache.get(key);
  }

  write(key: string, value: unknown): void {
    const json = stringify(value);
    this.upsert.run({ key, value_json: json, updated_at: this.clock() });
    this.cache.set(key, JSON.parse(json));
  }

  delete(key: string): void {
    this.remove.run(key);
    this.cache.delete(key);
  }

  clear(): void {
    this.removeAll.run();
    this.cache.clear();
  }

  keys(): string[] {
    return Array.from(this.cache.keys());
  }
}
