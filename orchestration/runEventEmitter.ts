import type BetterSqlite3 from "better-sqlite3";
import { logger as rootLogger, type Logger } from "../config/logger.js";
import { emitRunEvent } from "../state/runEvents.js";
import { describeError } from "../shared/outcome.js";
import type { DiagnosticLevel, DiagnosticsSink } from "./diagnostics.js";

/**
 * Diagnostics sink for a single analysis run: every event is written to
 * `run_events` under the run id and mirrored to the logger.
 */
export class RunEventEmitter implements DiagnosticsSink {
  private readonly log: Logger;

  constructor(
    private readonly db: BetterSqlite3.Database,
    private readonly traceId: string,
    baseLogger: Logger = rootLogger,
  ) {
    this.log = baseLogger.child({ traceId });
  }

  emit(
    level: DiagnosticLevel,
    component: string,
    eventType: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): void {
    this.log[level]({ component, eventType, ...metadata }, message);

    try {
      emitRunEvent(this.db, {
        traceId: this.traceId,
        component,
        eventType,
        message,
        metadata,
        level,
      });
    } catch (error) {
      this.log.warn(
        { error: describeError(error), component, eventType },
        "Failed to persist run event",
      );
    }
  }

  debug(component: string, eventType: string, message: string, metadata?: Record<string, unknown>): void {
    this.emit("debug", component, eventType, message, metadata);
  }

  info(component: string, eventType: string, message: string, metadata?: Record<string, unknown>): void {
    this.emit("info", component, eventType, message, metadata);
  }

  warn(component: string, eventType: string, message: string, metadata?: Record<string, unknown>): void {
    this.emit("warn", component, eventType, message, metadata);
  }

  error(component: string, eventType: string, message: string, metadata?: Record<string, unknown>): void {
    this.emit("error", component, eventType, message, metadata);
  }

  getTraceId(): string {
    return this.traceId;
  }
}
