import type BetterSqlite3 from "better-sqlite3";
import type { DiagnosticLevel } from "../orchestration/diagnostics.js";

export interface RunEventInput {
  readonly traceId: string;
  readonly component: string;
  readonly eventType: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly level?: DiagnosticLevel;
}

export interface RunEventRow {
  readonly id: number;
  readonly trace_id: string;
  readonly component: string;
  readonly event_type: string;
  readonly message: string;
  readonly metadata: string | null;
  readonly level: DiagnosticLevel;
  readonly created_at: string;
}

export function emitRunEvent(db: BetterSqlite3.Database, event: RunEventInput): number {
  const metadataJson = event.metadata ? JSON.stringify(event.metadata) : null;

  const result = db.prepare(
    `INSERT INTO run_events (trace_id, component, event_type, message, metadata, level)
     VALUES (?, ?, ?, ?, ?, ?)`,
  ).run(
    event.traceId,
    event.component,
    event.eventType,
    event.message,
    metadataJson,
    event.level ?? "info",
  );

  return Number(result.lastInsertRowid);
}

export function getRunEvents(
  db: BetterSqlite3.Database,
  traceId: string,
  options?: { readonly minLevel?: DiagnosticLevel },
): readonly RunEventRow[] {
  const rows = db.prepare(
    `SELECT id, trace_id, component, event_type, message, metadata, level, created_at
     FROM run_events
     WHERE trace_id = ?
     ORDER BY id ASC`,
  ).all(traceId) as RunEventRow[];

  const minLevel = options?.minLevel;
  if (!minLevel) return rows;
  return rows.filter((row) => LEVEL_RANK[row.level] >= LEVEL_RANK[minLevel]);
}

const LEVEL_RANK: Record<DiagnosticLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function cleanupOldRunEvents(
  db: BetterSqlite3.Database,
  daysToKeep: number = 30,
): number {
  const result = db.prepare(
    `DELETE FROM run_events
     WHERE created_at < strftime('%Y-%m-%dT%H:%M:%fZ', 'now', ? || ' days')`,
  ).run(`-${String(daysToKeep)}`);

  return result.changes;
}
