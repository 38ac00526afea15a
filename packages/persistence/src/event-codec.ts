import { z } from "zod";
import { v7 as uuidv7 } from "uuid";
import type {
  Clock,
  DocumentData,
  DocumentValue,
  EventActions,
  SessionEvent,
} from "@clubhouse/types";
import { ClubhouseError, systemClock, toEpochSeconds } from "@clubhouse/core";
import { stripTempKeys } from "./state-partition.js";

// ─── Schemas ────────────────────────────────────────────────────────

export const DocumentValueSchema: z.ZodType<DocumentValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(DocumentValueSchema),
    z.record(DocumentValueSchema),
  ])
);

export const DocumentDataSchema = z.record(DocumentValueSchema);

/** Stored session document. `id` falls back to the document id. */
export const SessionDocumentSchema = z.object({
  app_name: z.string(),
  user_id: z.string(),
  id: z.string().optional(),
  state: DocumentDataSchema.default({}),
  // Read leniently: a malformed time degrades to 0 instead of failing.
  create_time: z.unknown().optional(),
  update_time: z.unknown().optional(),
});

/** Stored app-state or user-state document. */
export const StateDocumentSchema = z.object({
  state: DocumentDataSchema.default({}),
});

const ActionsDocumentSchema = z.object({
  state_delta: DocumentDataSchema.nullish(),
  artifact_delta: z.record(z.number()).nullish(),
  transfer_to_agent: z.string().nullish(),
  escalate: z.boolean().nullish(),
  skip_summarization: z.boolean().nullish(),
  requested_auth_configs: DocumentDataSchema.nullish(),
});

export const EventDocumentSchema = z.object({
  id: z.string().default(""),
  invocation_id: z.string().default(""),
  author: z.string().default(""),
  // Epoch seconds; ISO strings are still read.
  timestamp: z.union([z.number(), z.string()]).nullish(),
  content: DocumentDataSchema.nullish(),
  actions: ActionsDocumentSchema.nullish(),
  branch: z.string().nullish(),
  long_running_tool_ids: z.array(z.string()).nullish(),
  partial: z.boolean().nullish(),
  turn_complete: z.boolean().nullish(),
  error_code: z.string().nullish(),
  error_message: z.string().nullish(),
  interrupted: z.boolean().nullish(),
});

export type SessionDocument = z.infer<typeof SessionDocumentSchema>;

/**
 * Validate a stored document against `schema`.
 * Failure means the stored data is not something this layer wrote.
 */
export function parseDocument<S extends z.ZodTypeAny>(
  schema: S,
  data: DocumentData | undefined,
  path: string
): z.output<S> {
  const result = schema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ClubhouseError("DATA_CORRUPTION", `Malformed document ${path}: ${issues}`, {
      cause: result.error,
    });
  }
  return result.data;
}

// ─── Event <-> document ─────────────────────────────────────────────

export interface EventOwner {
  readonly appName: string;
  readonly userId: string;
  readonly sessionId: string;
}

function actionsToDocument(actions: EventActions): DocumentData {
  return {
    state_delta: actions.stateDelta ?? null,
    artifact_delta: actions.artifactDelta ? { ...actions.artifactDelta } : null,
    transfer_to_agent: actions.transferToAgent ?? null,
    escalate: actions.escalate ?? null,
    skip_summarization: actions.skipSummarization ?? null,
    requested_auth_configs: actions.requestedAuthConfigs ?? null,
  };
}

export function eventToDocument(owner: EventOwner, event: SessionEvent): DocumentData {
  return {
    id: event.id,
    app_name: owner.appName,
    user_id: owner.userId,
    session_id: owner.sessionId,
    invocation_id: event.invocationId,
    author: event.author,
    timestamp: event.timestamp,
    content: event.content ?? null,
    actions: actionsToDocument(event.actions),
    branch: event.branch ?? null,
    long_running_tool_ids: event.longRunningToolIds ? [...event.longRunningToolIds] : null,
    partial: event.partial ?? false,
    turn_complete: event.turnComplete ?? null,
    error_code: event.errorCode ?? null,
    error_message: event.errorMessage ?? null,
    interrupted: event.interrupted ?? null,
  };
}

/**
 * Rebuild an event from its stored document.
 * A missing timestamp reads as `clock.now()`; missing actions as `{}`.
 */
export function documentToEvent(
  data: DocumentData,
  path: string,
  clock: Clock = systemClock
): SessionEvent {
  const doc = parseDocument(EventDocumentSchema, data, path);
  const actions = doc.actions;

  return {
    id: doc.id,
    invocationId: doc.invocation_id,
    author: doc.author,
    content: doc.content ?? undefined,
    actions: actions
      ? {
          stateDelta: actions.state_delta ?? undefined,
          artifactDelta: actions.artifact_delta ?? undefined,
          transferToAgent: actions.transfer_to_agent ?? undefined,
          escalate: actions.escalate ?? undefined,
          skipSummarization: actions.skip_summarization ?? undefined,
          requestedAuthConfigs: actions.requested_auth_configs ?? undefined,
        }
      : {},
    timestamp: doc.timestamp == null ? clock.now() : toEpochSeconds(doc.timestamp),
    branch: doc.branch ?? undefined,
    longRunningToolIds: doc.long_running_tool_ids?.length
      ? new Set(doc.long_running_tool_ids)
      : undefined,
    partial: doc.partial ?? false,
    turnComplete: doc.turn_complete ?? undefined,
    errorCode: doc.error_code ?? undefined,
    errorMessage: doc.error_message ?? undefined,
    interrupted: doc.interrupted ?? undefined,
  };
}

// ─── Construction helpers ───────────────────────────────────────────

export type SessionEventInit = Omit<SessionEvent, "id" | "invocationId" | "timestamp" | "actions"> &
  Partial<Pick<SessionEvent, "id" | "invocationId" | "timestamp" | "actions">>;

/**
 * Build an event with a fresh id and the current time.
 */
export function createSessionEvent(init: SessionEventInit, clock: Clock = systemClock): SessionEvent {
  return {
    ...init,
    id: init.id ?? uuidv7(),
    invocationId: init.invocationId ?? "",
    timestamp: init.timestamp ?? clock.now(),
    actions: init.actions ?? {},
  };
}

/**
 * Copy of `event` whose state delta has no `temp:` keys.
 * Returns `event` itself when there is nothing to strip.
 */
export function withoutTempDelta(event: SessionEvent): SessionEvent {
  const delta = event.actions.stateDelta;
  if (!delta) return event;
  const kept = stripTempKeys(delta);
  if (Object.keys(kept).length === Object.keys(delta).length) return event;
  return { ...event, actions: { ...event.actions, stateDelta: kept } };
}
