// pattern: Imperative Shell
import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { PersistenceUnavailableError } from "../pipeline/errors";
import * as schema from "./schema";

const SCHEMA_PATH = fileURLToPath(new URL("./schema.sql", import.meta.url));

/**
 * Opens the SQLite database at `dbPath` (or `:memory:`) and applies the
 * idempotent DDL in schema.sql. Any failure here is fatal to the process and
 * surfaces as a {@link PersistenceUnavailableError}.
 */
export function createDatabase(
  dbPath: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  let sqlite: Database.Database;
  try {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    sqlite = new Database(dbPath);
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("foreign_keys = ON");
    sqlite.exec(readFileSync(SCHEMA_PATH, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PersistenceUnavailableError(
      `failed to open database at ${dbPath}: ${message}`,
      { cause: err },
    );
  }

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

export type DatabaseResult = ReturnType<typeof createDatabase>;
export type AppDatabase = BetterSQLite3Database<typeof schema>;
