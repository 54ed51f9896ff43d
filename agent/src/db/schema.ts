import { sqliteTable, text, integer, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ============================================================================
// TOOL AUDIT LOG - One row per executed tool call
// ============================================================================
export const toolAuditLog = sqliteTable(
  "tool_audit_log",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sessionId: text("session_id").notNull(),
    callId: text("call_id").notNull(),
    toolName: text("tool_name").notNull(),
    outcome: text("outcome").notNull(), // "ok" or a ToolErrorKind
    message: text("message"), // excerpt of the result or error text
    durationMs: integer("duration_ms").notNull(),
    createdAt: text("created_at").notNull().default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => [index("idx_tool_audit_session").on(table.sessionId, table.id)]
);

export type ToolAuditLogRow = typeof toolAuditLog.$inferSelect;
export type NewToolAuditLogRow = typeof toolAuditLog.$inferInsert;
