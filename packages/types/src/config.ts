import type { LogLevel } from "./observability.js";
import type { StateScoping } from "./session.js";

/**
 * Resolved configuration for a session service instance.
 */
export interface SessionServiceConfig {
  /** Connection target: a SQLite file path, or ":memory:". */
  readonly target: string;
  /** Logical database name; namespaces sharing a target never see each other. */
  readonly database: string;
  /** Prefix applied to every physical collection name. */
  readonly collectionPrefix: string;
  readonly stateScoping: StateScoping;
  readonly logLevel: LogLevel;
}
