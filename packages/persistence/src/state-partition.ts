import type { StateMap, StatePartitions, StateScoping } from "@clubhouse/types";

export const APP_PREFIX = "app:";
export const USER_PREFIX = "user:";
export const TEMP_PREFIX = "temp:";

/**
 * Split a flat state map into its storage partitions.
 *
 * `temp:` keys are dropped. Under "app-user-session" scoping, `app:` and
 * `user:` keys move (prefix stripped) to their shared partitions; under
 * "session" scoping every other key stays verbatim in the session
 * partition.
 */
export function splitState(
  state?: StateMap,
  scoping: StateScoping = "app-user-session"
): StatePartitions {
  const partitions: { app: StateMap; user: StateMap; session: StateMap } = {
    app: {},
    user: {},
    session: {},
  };
  if (!state) return partitions;

  for (const [key, value] of Object.entries(state)) {
    if (key.startsWith(TEMP_PREFIX)) continue;
    if (scoping === "app-user-session" && key.startsWith(APP_PREFIX)) {
      partitions.app[key.slice(APP_PREFIX.length)] = value;
    } else if (scoping === "app-user-session" && key.startsWith(USER_PREFIX)) {
      partitions.user[key.slice(USER_PREFIX.length)] = value;
    } else {
      partitions.session[key] = value;
    }
  }
  return partitions;
}

/**
 * Flatten partitions into the view callers see.
 *
 * Starts from a deep copy of the session partition, then overlays the
 * app and user partitions with their prefixes restored. On a name clash
 * the user value wins over app, and app over session.
 */
export function mergeState(app: StateMap, user: StateMap, session: StateMap): StateMap {
  const merged = structuredClone(session);
  for (const [key, value] of Object.entries(app)) {
    merged[APP_PREFIX + key] = structuredClone(value);
  }
  for (const [key, value] of Object.entries(user)) {
    merged[USER_PREFIX + key] = structuredClone(value);
  }
  return merged;
}

/** Copy of `state` without its `temp:` keys. */
export function stripTempKeys(state: StateMap): StateMap {
  const kept: StateMap = {};
  for (const [key, value] of Object.entries(state)) {
    if (!key.startsWith(TEMP_PREFIX)) kept[key] = value;
  }
  return kept;
}

/** Additive merge: delta keys overwrite, every other key is kept. */
export function applyDelta(current: StateMap, delta: StateMap): StateMap {
  return { ...current, ...delta };
}

export function isEmptyState(state: StateMap): boolean {
  return Object.keys(state).length === 0;
}
