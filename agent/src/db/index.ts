import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";

export type AuditDb = BetterSQLite3Database<typeof schema>;

export interface AuditDbHandle {
  db: AuditDb;
  close(): void;
}

/**
 * Open (or create) the audit database. `":memory:"` gives a throwaway one.
 */
export function openAuditDb(dbPath: string): AuditDbHandle {
  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");

  // Self-creating schema; drizzle.config.ts generates the same DDL for migrations
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS "tool_audit_log" (
      id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
      session_id TEXT NOT NULL,
      call_id TEXT NOT NULL,
      tool_name TEXT NOT NULL,
      outcome TEXT NOT NULL,
      message TEXT,
      duration_ms INTEGER NOT NULL,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_tool_audit_session ON tool_audit_log (session_id, id);
  `);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
