import type { Logger } from "../config/logger.js";

export type DiagnosticLevel = "debug" | "info" | "warn" | "error";

export interface DiagnosticEvent {
  readonly level: DiagnosticLevel;
  readonly component: string;
  readonly eventType: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
}

/**
 * Recorder handed to every engine component. Components never log through a
 * module-level logger; whoever builds them decides where events go.
 */
export interface DiagnosticsSink {
  debug(component: string, eventType: string, message: string, metadata?: Record<string, unknown>): void;
  info(component: string, eventType: string, message: string, metadata?: Record<string, unknown>): void;
  warn(component: string, eventType: string, message: string, metadata?: Record<string, unknown>): void;
  error(component: string, eventType: string, message: string, metadata?: Record<string, unknown>): void;
}

export function createLoggerDiagnostics(baseLogger: Logger): DiagnosticsSink {
  const write = (level: DiagnosticLevel) =>
    (component: string, eventType: string, message: string, metadata?: Record<string, unknown>): void => {
      baseLogger[level]({ component, eventType, ...metadata }, message);
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

export interface MemoryDiagnostics extends DiagnosticsSink {
  readonly events: readonly DiagnosticEvent[];
  eventsOfType(eventType: string): readonly DiagnosticEvent[];
}

export function createMemoryDiagnostics(): MemoryDiagnostics {
  const events: DiagnosticEvent[] = [];
  const record = (level: DiagnosticLevel) =>
    (component: string, eventType: string, message: string, metadata?: Record<string, unknown>): void => {
      events.push({ level, component, eventType, message, metadata });
    };

  return {
    events,
    eventsOfType: (eventType) => events.filter((e) => e.eventType === eventType),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

const noop = (): void => {};

export const silentDiagnostics: DiagnosticsSink = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
