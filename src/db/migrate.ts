/**
 * Migration runner.
 *
 * Creates all tables, indexes, and unique constraints if they do not
 * already exist. Uses raw SQL via better-sqlite3 so the migration is
 * idempotent and can run without drizzle-kit tooling at runtime.
 *
 * Usage:
 *   npx tsx src/db/migrate.ts            # standalone
 *   import { migrate } from './migrate.js'  # programmatic
 */
import type Database from "better-sqlite3";
import { getLogger } from "../shared/logger.js";

const log = getLogger("store", { component: "migrate" });

// ---------------------------------------------------------------------------
// DDL statements
// ---------------------------------------------------------------------------

const DDL_STATEMENTS: string[] = [
  // ── candidates ────────────────────────────────────────────────────────
  `CREATE TABLE IF NOT EXISTS candidates (
    id                 TEXT PRIMARY KEY,
    link               TEXT NOT NULL,
    title              TEXT NOT NULL,
    description        TEXT NOT NULL DEFAULT '',
    social_handle      TEXT,
    reward_magnitude   REAL,
    risk_score         REAL CHECK(risk_score IS NULL OR (risk_score >= 0 AND risk_score <= 100)),
    social_buzz_score  REAL,
    verdict            TEXT NOT NULL DEFAULT 'unknown' CHECK(verdict IN ('clean','suspicious','scam','unknown')),
    rank_score         REAL NOT NULL,
    source             TEXT NOT NULL,
    notified           INTEGER NOT NULL DEFAULT 0,
    discovered_at      TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,

  // ── send_log ──────────────────────────────────────────────────────────
  `CREATE TABLE IF NOT EXISTS send_log (
    id       INTEGER PRIMARY KEY AUTOINCREMENT,
    link     TEXT NOT NULL,
    sent_at  TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,

  // ── recipients ────────────────────────────────────────────────────────
  `CREATE TABLE IF NOT EXISTS recipients (
    recipient_id    TEXT PRIMARY KEY,
    username        TEXT,
    registered_at   TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    banned          INTEGER NOT NULL DEFAULT 0,
    unreachable     INTEGER NOT NULL DEFAULT 0,
    unreachable_at  TEXT
  )`,

  // ── score_cache ───────────────────────────────────────────────────────
  `CREATE TABLE IF NOT EXISTS score_cache (
    link        TEXT NOT NULL,
    contract    TEXT NOT NULL DEFAULT '',
    risk_score  REAL NOT NULL,
    verdict     TEXT NOT NULL CHECK(verdict IN ('clean','suspicious','scam','unknown')),
    factors     TEXT NOT NULL DEFAULT '[]',
    scored_at   TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,

  // ── support_tickets ───────────────────────────────────────────────────
  `CREATE TABLE IF NOT EXISTS support_tickets (
    ticket_id     TEXT PRIMARY KEY,
    year          INTEGER NOT NULL,
    sequence      INTEGER NOT NULL,
    recipient_id  TEXT NOT NULL,
    username      TEXT,
    category      TEXT NOT NULL,
    message       TEXT NOT NULL,
    status        TEXT NOT NULL DEFAULT 'open' CHECK(status IN ('open','replied','closed')),
    created_at    TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    updated_at    TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,
];

const INDEX_STATEMENTS: string[] = [
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_candidates_link ON candidates(link)`,
  `CREATE INDEX IF NOT EXISTS idx_candidates_discovered ON candidates(discovered_at)`,
  `CREATE INDEX IF NOT EXISTS idx_candidates_rank ON candidates(rank_score)`,
  `CREATE INDEX IF NOT EXISTS idx_send_log_link_sent ON send_log(link, sent_at)`,
  `CREATE INDEX IF NOT EXISTS idx_recipients_active ON recipients(banned, unreachable)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_score_cache_key ON score_cache(link, contract)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_support_tickets_year_seq ON support_tickets(year, sequence)`,
  `CREATE INDEX IF NOT EXISTS idx_support_tickets_recipient ON support_tickets(recipient_id)`,
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run all migrations (idempotent). Creates tables and indexes if they
 * do not already exist.
 */
export function migrate(sqlite: Database.Database): void {
  sqlite.exec("BEGIN TRANSACTION");
  try {
    for (const ddl of DDL_STATEMENTS) {
      sqlite.exec(ddl);
    }
    for (const idx of INDEX_STATEMENTS) {
      sqlite.exec(idx);
    }
    sqlite.exec("COMMIT");
    log.info(
      { tables: DDL_STATEMENTS.length, indexes: INDEX_STATEMENTS.length },
      "Migrations applied",
    );
  } catch (err) {
    sqlite.exec("ROLLBACK");
    log.error({ err }, "Migration failed, rolled back");
    throw err;
  }
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

const isDirectRun =
  process.argv[1]?.endsWith("migrate.ts") ||
  process.argv[1]?.endsWith("migrate.js");

if (isDirectRun) {
  const { openDatabase } = await import("./index.js");
  const handle = openDatabase(process.env["DATABASE_PATH"] ?? "./data/dropwatch.db");
  try {
    migrate(handle.sqlite);
    handle.close();
    process.exit(0);
  } catch {
    handle.close();
    process.exit(1);
  }
}
