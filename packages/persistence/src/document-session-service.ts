import { v7 as uuidv7 } from "uuid";
import type {
  Clock,
  CreateSessionRequest,
  GetSessionRequest,
  ListSessionsRequest,
  ListSessionsResponse,
  Logger,
  Session,
  SessionEvent,
  SessionKey,
  SessionService,
  SessionServiceConfig,
  StateMap,
  StateScoping,
} from "@clubhouse/types";
import {
  ClubhouseError,
  createConsoleLogger,
  silentLogger,
  systemClock,
  toEpochSeconds,
} from "@clubhouse/core";
import { ClientLifecycle } from "./client-lifecycle.js";
import {
  FieldValue,
  MAX_BATCH_SIZE,
  type DocumentReference,
  type DocumentStore,
  type QueryDocumentSnapshot,
  type WriteData,
} from "./document-store.js";
import {
  SessionDocumentSchema,
  StateDocumentSchema,
  documentToEvent,
  eventToDocument,
  parseDocument,
  withoutTempDelta,
} from "./event-codec.js";
import { SQLiteDocumentStore } from "./sqlite-document-store.js";
import { applyDelta, isEmptyState, mergeState, splitState } from "./state-partition.js";

export interface StoreSettings {
  readonly target: string;
  readonly database: string;
  readonly clock: Clock;
}

export interface DocumentSessionServiceOptions {
  /** Connection target handed to the store factory. */
  readonly target: string;
  /** Logical database name. Default: "(default)". */
  readonly database?: string;
  /** Prefix for physical collection names. Default: "clubhouse". */
  readonly collectionPrefix?: string;
  /** Default: "app-user-session". */
  readonly stateScoping?: StateScoping;
  readonly clock?: Clock;
  readonly logger?: Logger;
  /** Builds the store handle on first use. Default: a SQLiteDocumentStore. */
  readonly storeFactory?: (settings: StoreSettings) => DocumentStore | Promise<DocumentStore>;
}

/**
 * Session service backed by a hierarchical document store.
 *
 * Layout, with prefix P:
 *   P_sessions/{app}/users/{user}/sessions/{session}   (+ events/{event})
 *   P_app_states/{app}
 *   P_user_states/{app}/users/{user}
 *
 * `create_time`, `update_time` and event `timestamp` are stored as epoch
 * seconds, unrounded, so a stored update time compares exactly with
 * `Session.lastUpdateTime`.
 *
 * Concurrent appends to one session are not locked. Each append compares
 * the stored update time with the caller's copy and reloads state and
 * events first when another writer got there before it.
 */
export class DocumentSessionService implements SessionService {
  private readonly client: ClientLifecycle<DocumentStore>;
  private readonly prefix: string;
  private readonly scoping: StateScoping;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: DocumentSessionServiceOptions) {
    this.prefix = options.collectionPrefix ?? "clubhouse";
    this.scoping = options.stateScoping ?? "app-user-session";
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? silentLogger).child("session-service");

    const settings: StoreSettings = {
      target: options.target,
      database: options.database ?? "(default)",
      clock: this.clock,
    };
    const factory =
      options.storeFactory ??
      ((s: StoreSettings) => new SQLiteDocumentStore({ target: s.target, database: s.database, clock: s.clock }));

    this.client = new ClientLifecycle(() => factory(settings), {
      onOpen: () => this.log.info("Document store opened", { database: settings.database }),
      onClose: () => this.log.info("Document store closed", { database: settings.database }),
    });
  }

  async createSession(request: CreateSessionRequest): Promise<Session> {
    const store = await this.client.get();
    const { appName, userId } = request;
    const sessionId = request.sessionId ?? uuidv7();

    const sessionRef = this.sessionRef(store, appName, userId, sessionId);
    if ((await sessionRef.get()).exists) {
      throw new ClubhouseError("ALREADY_EXISTS", `Session with id ${sessionId} already exists.`);
    }

    const deltas = splitState(request.state, this.scoping);
    let appState: StateMap = {};
    let userState: StateMap = {};

    if (this.scoping === "app-user-session") {
      const appRef = this.appStateRef(store, appName);
      const userRef = this.userStateRef(store, appName, userId);
      appState = await this.readOrInitState(appRef);
      userState = await this.readOrInitState(userRef);

      if (!isEmptyState(deltas.app)) {
        appState = applyDelta(appState, deltas.app);
        await appRef.update({ state: FieldValue.mapMerge(deltas.app) });
      }
      if (!isEmptyState(deltas.user)) {
        userState = applyDelta(userState, deltas.user);
        await userRef.update({ state: FieldValue.mapMerge(deltas.user) });
      }
    }

    const now = this.clock.now();
    await sessionRef.set({
      app_name: appName,
      user_id: userId,
      id: sessionId,
      state: deltas.session,
      create_time: now,
      update_time: now,
    });

    this.log.debug("Session created", { appName, userId, sessionId });
    return {
      id: sessionId,
      appName,
      userId,
      state: mergeState(appState, userState, deltas.session),
      events: [],
      lastUpdateTime: now,
    };
  }

  async getSession(request: GetSessionRequest): Promise<Session | undefined> {
    const store = await this.client.get();
    const { appName, userId, sessionId, config } = request;

    const sessionRef = this.sessionRef(store, appName, userId, sessionId);
    const snapshot = await sessionRef.get();
    if (!snapshot.exists) return undefined;
    const doc = parseDocument(SessionDocumentSchema, snapshot.data(), sessionRef.path);

    // Newest first so that limit() keeps the most recent events;
    // reversed below to chronological order.
    let query = sessionRef.collection("events").orderBy("timestamp", "desc");
    if (config?.afterTimestamp) {
      query = query.where("timestamp", ">=", config.afterTimestamp);
    }
    if (config?.numRecentEvents) {
      query = query.limit(config.numRecentEvents);
    }
    const events = (await query.get()).docs.map((d) => this.toEvent(d)).reverse();

    const shared = await this.readSharedState(store, appName, userId);
    this.log.debug("Session loaded", { appName, userId, sessionId, events: events.length });

    return {
      id: sessionId,
      appName,
      userId,
      state: mergeState(shared.app, shared.user, doc.state),
      events,
      lastUpdateTime: toEpochSeconds(doc.update_time),
    };
  }

  async listSessions(request: ListSessionsRequest): Promise<ListSessionsResponse> {
    const store = await this.client.get();
    const { appName } = request;
    const sessions: Session[] = [];

    const appState = this.partitioned
      ? await this.readState(this.appStateRef(store, appName))
      : {};

    if (request.userId !== undefined) {
      const userId = request.userId;
      const userState = this.partitioned
        ? await this.readState(this.userStateRef(store, appName, userId))
        : {};
      const docs = (await this.userSessions(store, appName, userId).get()).docs;
      for (const snapshot of docs) {
        sessions.push(this.toListedSession(snapshot, appName, userId, appState, userState));
      }
    } else {
      const userStates = this.partitioned
        ? await this.readAllUserStates(store, appName)
        : new Map<string, StateMap>();
      const userIds = await store
        .collection(this.collectionName("sessions"))
        .doc(appName)
        .collection("users")
        .listDocumentIds();

      for (const userId of userIds) {
        const docs = (await this.userSessions(store, appName, userId).get()).docs;
        const userState = userStates.get(userId) ?? {};
        for (const snapshot of docs) {
          sessions.push(this.toListedSession(snapshot, appName, userId, appState, userState));
        }
      }
    }

    this.log.debug("Sessions listed", { appName, userId: request.userId, count: sessions.length });
    return { sessions };
  }

  async deleteSession(key: SessionKey): Promise<void> {
    const store = await this.client.get();
    const sessionRef = this.sessionRef(store, key.appName, key.userId, key.sessionId);

    // Deleting a document leaves its sub-collections behind, so the
    // events go first.
    const events = (await sessionRef.collection("events").get()).docs;
    for (let i = 0; i < events.length; i += MAX_BATCH_SIZE) {
      const batch = store.batch();
      for (const event of events.slice(i, i + MAX_BATCH_SIZE)) {
        batch.delete(event.ref);
      }
      await batch.commit();
    }
    await sessionRef.delete();

    this.log.debug("Session deleted", { ...key, events: events.length });
  }

  async appendEvent(session: Session, event: SessionEvent): Promise<SessionEvent> {
    // Streaming fragments are never persisted.
    if (event.partial) return event;

    const trimmed = withoutTempDelta(event);
    const store = await this.client.get();

    const sessionRef = this.sessionRef(store, session.appName, session.userId, session.id);
    const eventRef = sessionRef.collection("events").doc(trimmed.id);

    const snapshot = await sessionRef.get();
    if (!snapshot.exists) {
      throw new ClubhouseError("SESSION_NOT_FOUND", `Session ${session.id} not found`);
    }
    const doc = parseDocument(SessionDocumentSchema, snapshot.data(), sessionRef.path);

    const storedUpdateTime = toEpochSeconds(doc.update_time);
    if (storedUpdateTime > session.lastUpdateTime) {
      this.log.warn("Session changed since it was loaded; reloading", {
        sessionId: session.id,
        loadedAt: session.lastUpdateTime,
        storedAt: storedUpdateTime,
      });
      const shared = await this.readSharedState(store, session.appName, session.userId);
      session.state = mergeState(shared.app, shared.user, doc.state);
      const all = await sessionRef.collection("events").orderBy("timestamp", "asc").get();
      session.events = all.docs.map((d) => this.toEvent(d));
    }

    const batch = store.batch();
    const sessionFields: WriteData = { update_time: trimmed.timestamp };

    // Partitions merge against their stored value at commit, so deltas
    // of concurrent appends to disjoint keys all survive.
    const delta = trimmed.actions.stateDelta;
    if (delta && !isEmptyState(delta)) {
      const parts = splitState(delta, this.scoping);
      if (!isEmptyState(parts.app)) {
        batch.set(
          this.appStateRef(store, session.appName),
          { state: FieldValue.mapMerge(parts.app) },
          { merge: true }
        );
      }
      if (!isEmptyState(parts.user)) {
        batch.set(
          this.userStateRef(store, session.appName, session.userId),
          { state: FieldValue.mapMerge(parts.user) },
          { merge: true }
        );
      }
      if (!isEmptyState(parts.session)) {
        sessionFields.state = FieldValue.mapMerge(parts.session);
      }
    }

    batch.update(sessionRef, sessionFields);
    batch.set(
      eventRef,
      eventToDocument({ appName: session.appName, userId: session.userId, sessionId: session.id }, trimmed)
    );
    await batch.commit();

    session.lastUpdateTime = trimmed.timestamp;
    if (delta) {
      for (const [key, value] of Object.entries(delta)) {
        session.state[key] = structuredClone(value);
      }
    }
    session.events.push(trimmed);

    this.log.debug("Event appended", {
      sessionId: session.id,
      eventId: trimmed.id,
      author: trimmed.author,
    });
    return trimmed;
  }

  /** Release the store handle. Safe to call repeatedly. */
  async close(): Promise<void> {
    await this.client.close();
  }

  // ─── Paths ────────────────────────────────────────────────────────

  private get partitioned(): boolean {
    return this.scoping === "app-user-session";
  }

  private collectionName(name: string): string {
    return `${this.prefix}_${name}`;
  }

  private userSessions(store: DocumentStore, appName: string, userId: string) {
    return store
      .collection(this.collectionName("sessions"))
      .doc(appName)
      .collection("users")
      .doc(userId)
      .collection("sessions");
  }

  private sessionRef(
    store: DocumentStore,
    appName: string,
    userId: string,
    sessionId: string
  ): DocumentReference {
    return this.userSessions(store, appName, userId).doc(sessionId);
  }

  private appStateRef(store: DocumentStore, appName: string): DocumentReference {
    return store.collection(this.collectionName("app_states")).doc(appName);
  }

  private userStateRef(store: DocumentStore, appName: string, userId: string): DocumentReference {
    return store
      .collection(this.collectionName("user_states"))
      .doc(appName)
      .collection("users")
      .doc(userId);
  }

  // ─── State documents ──────────────────────────────────────────────

  private async readState(ref: DocumentReference): Promise<StateMap> {
    const snapshot = await ref.get();
    if (!snapshot.exists) return {};
    return parseDocument(StateDocumentSchema, snapshot.data(), ref.path).state;
  }

  private async readOrInitState(ref: DocumentReference): Promise<StateMap> {
    const snapshot = await ref.get();
    if (snapshot.exists) {
      return parseDocument(StateDocumentSchema, snapshot.data(), ref.path).state;
    }
    await ref.set({ state: {} });
    return {};
  }

  private async readSharedState(
    store: DocumentStore,
    appName: string,
    userId: string
  ): Promise<{ app: StateMap; user: StateMap }> {
    if (!this.partitioned) return { app: {}, user: {} };
    return {
      app: await this.readState(this.appStateRef(store, appName)),
      user: await this.readState(this.userStateRef(store, appName, userId)),
    };
  }

  private async readAllUserStates(store: DocumentStore, appName: string): Promise<Map<string, StateMap>> {
    const states = new Map<string, StateMap>();
    const docs = (
      await store.collection(this.collectionName("user_states")).doc(appName).collection("users").get()
    ).docs;
    for (const snapshot of docs) {
      states.set(snapshot.id, parseDocument(StateDocumentSchema, snapshot.data(), snapshot.ref.path).state);
    }
    return states;
  }

  // ─── Conversions ──────────────────────────────────────────────────

  private toEvent(snapshot: QueryDocumentSnapshot): SessionEvent {
    return documentToEvent(snapshot.data(), snapshot.ref.path, this.clock);
  }

  private toListedSession(
    snapshot: QueryDocumentSnapshot,
    appName: string,
    userId: string,
    appState: StateMap,
    userState: StateMap
  ): Session {
    const doc = parseDocument(SessionDocumentSchema, snapshot.data(), snapshot.ref.path);
    return {
      id: doc.id ?? snapshot.id,
      appName,
      userId,
      state: mergeState(appState, userState, doc.state),
      events: [],
      lastUpdateTime: toEpochSeconds(doc.update_time),
    };
  }
}

/**
 * Build a service from loaded configuration, logging JSON to the console
 * at the configured level.
 */
export function createSessionServiceFromConfig(
  config: SessionServiceConfig,
  overrides: Pick<DocumentSessionServiceOptions, "clock" | "logger" | "storeFactory"> = {}
): DocumentSessionService {
  return new DocumentSessionService({
    target: config.target,
    database: config.database,
    collectionPrefix: config.collectionPrefix,
    stateScoping: config.stateScoping,
    logger: overrides.logger ?? createConsoleLogger({ component: "clubhouse", level: config.logLevel }),
    clock: overrides.clock,
    storeFactory: overrides.storeFactory,
  });
}

/**
 * Run `fn` with a fresh service and close it afterwards, even when `fn`
 * throws.
 */
export async function withSessionService<T>(
  options: DocumentSessionServiceOptions,
  fn: (service: DocumentSessionService) => Promise<T>
): Promise<T> {
  const service = new DocumentSessionService(options);
  try {
    return await fn(service);
  } finally {
    await service.close();
  }
}
