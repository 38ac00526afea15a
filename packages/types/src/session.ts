import type { DocumentData, EpochSeconds } from "./foundational.js";

/** Flat key/value session state, as callers see it. */
export type StateMap = DocumentData;

/**
 * How state keys are partitioned in storage.
 *
 * - `"app-user-session"`: `app:` and `user:` keys live in shared
 *   application / user documents, everything else in the session.
 * - `"session"`: every persisted key stays in the session document.
 */
export type StateScoping = "app-user-session" | "session";

/** State split into its storage partitions. Prefixes are stripped. */
export interface StatePartitions {
  readonly app: StateMap;
  readonly user: StateMap;
  readonly session: StateMap;
}

/**
 * Side effects requested by an event.
 * Only `stateDelta` is interpreted by the persistence layer; the rest is
 * tool-invocation metadata carried through storage untouched.
 */
export interface EventActions {
  /** Partial state to merge into session/user/app state. */
  readonly stateDelta?: StateMap;
  readonly artifactDelta?: Readonly<Record<string, number>>;
  readonly transferToAgent?: string;
  readonly escalate?: boolean;
  readonly skipSummarization?: boolean;
  readonly requestedAuthConfigs?: DocumentData;
}

/**
 * One conversation turn: a user message, an agent reply or a tool result.
 * Immutable once appended.
 */
export interface SessionEvent {
  readonly id: string;
  /** Groups the events produced while handling one user message. */
  readonly invocationId: string;
  /** "user", or the name of the agent/tool that produced the event. */
  readonly author: string;
  /** Opaque message payload (role + parts). */
  readonly content?: DocumentData;
  readonly actions: EventActions;
  readonly timestamp: EpochSeconds;
  /** Conversation branch label, for multi-agent trees. */
  readonly branch?: string;
  readonly longRunningToolIds?: ReadonlySet<string>;
  /** Streaming fragment. Partial events are never persisted. */
  readonly partial?: boolean;
  readonly turnComplete?: boolean;
  readonly errorCode?: string;
  readonly errorMessage?: string;
  readonly interrupted?: boolean;
}

/**
 * One conversation thread between a user and the agent, scoped to an
 * application. `state`, `events` and `lastUpdateTime` are kept in step
 * with storage by the session service.
 */
export interface Session {
  readonly id: string;
  readonly appName: string;
  readonly userId: string;
  state: StateMap;
  events: SessionEvent[];
  /** Version marker: the stored update time when this object was last synced. */
  lastUpdateTime: EpochSeconds;
}

export interface GetSessionConfig {
  /** Only return the N most recent events. 0 or absent = all. */
  readonly numRecentEvents?: number;
  /** Only return events at or after this time. 0 or absent = all. */
  readonly afterTimestamp?: EpochSeconds;
}

export interface SessionKey {
  readonly appName: string;
  readonly userId: string;
  readonly sessionId: string;
}

export interface CreateSessionRequest {
  readonly appName: string;
  readonly userId: string;
  readonly state?: StateMap;
  /** Client-supplied id. A random id is generated when absent. */
  readonly sessionId?: string;
}

export interface GetSessionRequest extends SessionKey {
  readonly config?: GetSessionConfig;
}

export interface ListSessionsRequest {
  readonly appName: string;
  /** Omit to list the sessions of every user of the application. */
  readonly userId?: string;
}

export interface ListSessionsResponse {
  /** Listed sessions carry merged state but no events. */
  readonly sessions: Session[];
}

/**
 * Persistence contract consumed by the chat transport / agent runner.
 */
export interface SessionService {
  createSession(request: CreateSessionRequest): Promise<Session>;
  /** Resolves to `undefined` when the session does not exist. */
  getSession(request: GetSessionRequest): Promise<Session | undefined>;
  listSessions(request: ListSessionsRequest): Promise<ListSessionsResponse>;
  deleteSession(key: SessionKey): Promise<void>;
  /**
   * Persist `event` and apply its state delta, then bring `session` up
   * to date in memory. Partial events are returned without being stored.
   */
  appendEvent(session: Session, event: SessionEvent): Promise<SessionEvent>;
  close(): Promise<void>;
}
