/**
 * Audit trail of executed tool calls, stored in SQLite.
 *
 * Recording is best effort: a failed write is logged and the tool result is
 * unaffected.
 */

import { desc, eq } from "drizzle-orm";
import { getLog } from "../lib/logger.js";
import type { AuditDb } from "../db/index.js";
import { toolAuditLog, type ToolAuditLogRow } from "../db/schema.js";

const log = getLog(import.meta);

const MESSAGE_EXCERPT_CHARS = 500;

export interface ToolAuditEntry {
  sessionId: string;
  callId: string;
  toolName: string;
  outcome: string;
  message?: string;
  durationMs: number;
}

export interface ToolAuditSink {
  record(entry: ToolAuditEntry): void;
}

export function excerpt(text: string, max: number = MESSAGE_EXCERPT_CHARS): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

export class SqliteToolAudit implements ToolAuditSink {
  constructor(private readonly db: AuditDb) {}

  record(entry: ToolAuditEntry): void {
    try {
      this.db
        .insert(toolAuditLog)
        .values({
          sessionId: entry.sessionId,
          callId: entry.callId,
          toolName: entry.toolName,
          outcome: entry.outcome,
          message: entry.message === undefined ? null : excerpt(entry.message),
          durationMs: Math.round(entry.durationMs),
        })
        .run();
    } catch (err) {
      log.warn({ callId: entry.callId, err: err instanceof Error ? err.message : String(err) }, "audit write failed");
    }
  }

  /** Newest entries first, optionally for one session. */
  listRecent(limit = 50, sessionId?: string): ToolAuditLogRow[] {
    return this.db
      .select()
      .from(toolAuditLog)
      .where(sessionId === undefined ? undefined : eq(toolAuditLog.sessionId, sessionId))
      .orderBy(desc(toolAuditLog.id))
      .limit(limit)
      .all();
  }
}
