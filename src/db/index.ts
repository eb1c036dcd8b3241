import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { dirname, resolve } from "node:path";
import { mkdirSync, existsSync } from "node:fs";
import * as schema from "./schema.js";

const BUSY_TIMEOUT_MS = 5_000;
const IN_MEMORY = ":memory:";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database.Database;
  close(): void;
}

/**
 * Opens a better-sqlite3 connection wrapped in Drizzle. The handle is
 * owned by the application context and closed on shutdown.
 *
 * Configuration:
 * - WAL journal mode for concurrent read performance
 * - busy_timeout bounds every statement waiting on a lock
 */
export function openDatabase(dbPath: string): DatabaseHandle {
  const isMemory = dbPath === IN_MEMORY;
  const target = isMemory ? IN_MEMORY : resolve(dbPath);

  if (!isMemory) {
    const dir = dirname(target);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const sqlite = new Database(target);

  if (!isMemory) {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  sqlite.pragma("synchronous = NORMAL");

  const db = drizzle(sqlite, { schema });
  let closed = false;

  return {
    db,
    sqlite,
    close(): void {
      if (closed) return;
      closed = true;
      sqlite.close();
    },
  };
}

export { schema };
