import Database from "better-sqlite3";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";

export type DB = Database.Database;

const migrations = ["001_init.sql"];

/** Open a DB or accept an existing connection; apply migrations. */
export function openDb(dbOrPath: DB | string): DB {
  const db = typeof dbOrPath === "string" ? new Database(dbOrPath) : dbOrPath;
  applyMigrations(db);
  return db;
}

function applyMigrations(db: DB): void {
  for (const file of migrations) {
    const sql = readFileSync(fileURLToPath(new URL(`./migrations/${file}`, import.meta.url)), "utf8");
    db.exec(sql);
  }
}
