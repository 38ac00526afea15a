import type { Timestamp } from "./foundational.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Structured log entry emitted by any component. */
export interface LogEntry {
  readonly timestamp: Timestamp;
  readonly level: LogLevel;
  readonly message: string;
  /** Emitting component, e.g. "persistence.session-service". */
  readonly component?: string;
  readonly data?: Record<string, unknown>;
}

export type LogMethod = (message: string, data?: Record<string, unknown>) => void;

export interface Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;
  readonly fatal: LogMethod;
  /** Derive a logger whose entries carry `component` appended to this one's. */
  child(component: string): Logger;
}
