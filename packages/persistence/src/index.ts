export {
  DocumentSessionService,
  createSessionServiceFromConfig,
  withSessionService,
} from "./document-session-service.js";
export type { DocumentSessionServiceOptions, StoreSettings } from "./document-session-service.js";
export { SQLiteDocumentStore } from "./sqlite-document-store.js";
export type { SQLiteDocumentStoreOptions } from "./sqlite-document-store.js";
export { FieldValue, MAX_BATCH_SIZE, splitPath } from "./document-store.js";
export type {
  CollectionReference,
  DocumentReference,
  DocumentSnapshot,
  DocumentStore,
  OrderDirection,
  Query,
  QueryDocumentSnapshot,
  QuerySnapshot,
  SetOptions,
  WhereOp,
  WriteBatch,
  WriteData,
  WriteValue,
} from "./document-store.js";
export { ClientLifecycle } from "./client-lifecycle.js";
export type { Closeable } from "./client-lifecycle.js";
export {
  APP_PREFIX,
  USER_PREFIX,
  TEMP_PREFIX,
  splitState,
  mergeState,
  stripTempKeys,
  applyDelta,
} from "./state-partition.js";
export {
  createSessionEvent,
  documentToEvent,
  eventToDocument,
  withoutTempDelta,
} from "./event-codec.js";
export type { SessionEventInit, EventOwner } from "./event-codec.js";
