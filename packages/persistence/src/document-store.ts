import type { DocumentData, DocumentValue, Timestamp } from "@clubhouse/types";
import { ClubhouseError } from "@clubhouse/core";

/**
 * Hierarchical document store contract consumed by the session service.
 *
 * Paths alternate collection and document segments:
 * `sessions/{app}/users/{user}` names a document,
 * `sessions/{app}/users` names a collection.
 */
export interface DocumentStore {
  collection(path: string): CollectionReference;
  doc(path: string): DocumentReference;
  /** Start an atomic batch of at most `MAX_BATCH_SIZE` writes. */
  batch(): WriteBatch;
  close(): Promise<void>;
}

/** Upper bound on operations in one `WriteBatch`. */
export const MAX_BATCH_SIZE = 500;

export type WhereOp = "==" | "!=" | "<" | "<=" | ">" | ">=";
export type OrderDirection = "asc" | "desc";

export type WriteValue = DocumentValue | FieldValue;

/** Top-level fields of a write. Field transforms are allowed at the top level only. */
export interface WriteData {
  [field: string]: WriteValue;
}

export interface SetOptions {
  /** Merge top-level fields into an existing document instead of replacing it. */
  readonly merge?: boolean;
}

export interface DocumentSnapshot {
  readonly id: string;
  readonly ref: DocumentReference;
  readonly exists: boolean;
  /** `undefined` when the document does not exist. Always a fresh copy. */
  data(): DocumentData | undefined;
  readonly createTime?: Timestamp;
  readonly updateTime?: Timestamp;
}

export interface QueryDocumentSnapshot extends DocumentSnapshot {
  readonly exists: true;
  data(): DocumentData;
}

export interface QuerySnapshot {
  readonly docs: QueryDocumentSnapshot[];
  readonly size: number;
  readonly empty: boolean;
}

/** Immutable query builder; every refinement returns a new query. */
export interface Query {
  where(field: string, op: WhereOp, value: DocumentValue): Query;
  orderBy(field: string, direction?: OrderDirection): Query;
  limit(count: number): Query;
  get(): Promise<QuerySnapshot>;
  /** Number of matching documents, without fetching them. */
  count(): Promise<number>;
}

export interface CollectionReference extends Query {
  readonly id: string;
  readonly path: string;
  /** Auto-generates an id when none is given. */
  doc(id?: string): DocumentReference;
  /**
   * Ids of every document in the collection, including ids that only
   * exist as parents of sub-collections.
   */
  listDocumentIds(): Promise<string[]>;
}

export interface DocumentReference {
  readonly id: string;
  readonly path: string;
  readonly parent: CollectionReference;
  collection(name: string): CollectionReference;
  get(): Promise<DocumentSnapshot>;
  set(data: WriteData, options?: SetOptions): Promise<void>;
  /** Replace the given top-level fields. Fails with NOT_FOUND on a missing document. */
  update(data: WriteData): Promise<void>;
  /** Deleting a missing document is a no-op. Sub-collections are not touched. */
  delete(): Promise<void>;
}

export interface WriteBatch {
  readonly size: number;
  set(ref: DocumentReference, data: WriteData, options?: SetOptions): WriteBatch;
  update(ref: DocumentReference, data: WriteData): WriteBatch;
  delete(ref: DocumentReference): WriteBatch;
  /** Apply every queued write, or none of them. */
  commit(): Promise<void>;
}

// ─── Field transforms ───────────────────────────────────────────────

type FieldTransformKind = "serverTimestamp" | "arrayUnion" | "arrayRemove" | "mapMerge";

/**
 * Sentinel values resolved by the store at write time.
 */
export class FieldValue {
  private constructor(
    readonly kind: FieldTransformKind,
    readonly elements: readonly DocumentValue[],
    readonly entries: Readonly<DocumentData> = {}
  ) {}

  /** The store's current time, as an ISO timestamp. */
  static serverTimestamp(): FieldValue {
    return new FieldValue("serverTimestamp", []);
  }

  /** Append elements not already present in the stored array. */
  static arrayUnion(...elements: DocumentValue[]): FieldValue {
    return new FieldValue("arrayUnion", elements);
  }

  /** Remove every occurrence of the elements from the stored array. */
  static arrayRemove(...elements: DocumentValue[]): FieldValue {
    return new FieldValue("arrayRemove", elements);
  }

  /**
   * Overwrite the given keys of the stored map and keep the others.
   * A missing or non-map field starts out empty. Resolved against the
   * stored value when the write is applied, so merges of disjoint keys
   * committed one after another all survive.
   */
  static mapMerge(entries: DocumentData): FieldValue {
    return new FieldValue("mapMerge", [], { ...entries });
  }
}

// ─── Paths ──────────────────────────────────────────────────────────

export function assertValidSegment(segment: string): void {
  if (segment.length === 0 || segment.includes("/")) {
    throw new ClubhouseError(
      "INVALID_ARGUMENT",
      `Invalid path segment ${JSON.stringify(segment)}: must be non-empty and contain no "/"`
    );
  }
}

/** Split and validate a slash-separated path. */
export function splitPath(path: string): string[] {
  const segments = path.split("/");
  segments.forEach(assertValidSegment);
  return segments;
}
