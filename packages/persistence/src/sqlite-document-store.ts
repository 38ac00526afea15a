import Database from "better-sqlite3";
import { isDeepStrictEqual } from "node:util";
import { v7 as uuidv7 } from "uuid";
import type { Clock, DocumentData, DocumentValue, Timestamp } from "@clubhouse/types";
import { ClubhouseError, systemClock, toTimestamp } from "@clubhouse/core";
import {
  FieldValue,
  MAX_BATCH_SIZE,
  assertValidSegment,
  splitPath,
  type CollectionReference,
  type DocumentReference,
  type DocumentSnapshot,
  type DocumentStore,
  type OrderDirection,
  type Query,
  type QueryDocumentSnapshot,
  type QuerySnapshot,
  type SetOptions,
  type WhereOp,
  type WriteBatch,
  type WriteData,
} from "./document-store.js";

export interface SQLiteDocumentStoreOptions {
  /** Database file path, or ":memory:". */
  readonly target: string;
  /** Logical namespace inside the file. Default: "(default)". */
  readonly database?: string;
  /** Resolves `FieldValue.serverTimestamp()` and document times. */
  readonly clock?: Clock;
}

/**
 * SQLite-backed implementation of DocumentStore.
 *
 * Every document is one row of the `documents` table, its fields stored
 * as JSON. Queries compile to `json_extract` SQL over the rows of one
 * collection; batches run inside a single SQLite transaction.
 */
export class SQLiteDocumentStore implements DocumentStore {
  private readonly engine: SQLiteEngine;

  constructor(options: SQLiteDocumentStoreOptions) {
    const db = new Database(options.target);
    db.pragma("journal_mode = WAL");
    this.engine = new SQLiteEngine(db, options.database ?? "(default)", options.clock ?? systemClock);
    this.engine.migrate();
  }

  collection(path: string): CollectionReference {
    const segments = splitPath(path);
    if (segments.length % 2 !== 1) {
      throw new ClubhouseError("INVALID_ARGUMENT", `Not a collection path: ${path}`);
    }
    return new SQLiteCollectionReference(this.engine, path);
  }

  doc(path: string): DocumentReference {
    const segments = splitPath(path);
    if (segments.length % 2 !== 0) {
      throw new ClubhouseError("INVALID_ARGUMENT", `Not a document path: ${path}`);
    }
    return new SQLiteDocumentReference(this.engine, path);
  }

  batch(): WriteBatch {
    return new SQLiteWriteBatch(this.engine);
  }

  /** Close the database connection. */
  async close(): Promise<void> {
    this.engine.db.close();
  }
}

// ─── Engine ─────────────────────────────────────────────────────────

interface QueryFilter {
  readonly field: string;
  readonly op: WhereOp;
  readonly value: DocumentValue;
}

interface QueryOrder {
  readonly field: string;
  readonly direction: OrderDirection;
}

interface QueryPlan {
  readonly collectionPath: string;
  readonly filters: readonly QueryFilter[];
  readonly orders: readonly QueryOrder[];
  readonly limit?: number;
}

type WriteOp =
  | { readonly kind: "set"; readonly path: string; readonly data: WriteData; readonly merge: boolean }
  | { readonly kind: "update"; readonly path: string; readonly data: WriteData }
  | { readonly kind: "delete"; readonly path: string };

const FIELD_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

const SQL_OPS: Record<WhereOp, string> = {
  "==": "=",
  "!=": "!=",
  "<": "<",
  "<=": "<=",
  ">": ">",
  ">=": ">=",
};

class SQLiteEngine {
  constructor(
    readonly db: Database.Database,
    readonly database: string,
    private readonly clock: Clock
  ) {}

  /** Run schema migrations. Idempotent. */
  migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        database    TEXT NOT NULL,
        path        TEXT NOT NULL,
        parent      TEXT NOT NULL,
        id          TEXT NOT NULL,
        data        TEXT NOT NULL,
        create_time TEXT NOT NULL,
        update_time TEXT NOT NULL,
        PRIMARY KEY (database, path)
      );

      CREATE INDEX IF NOT EXISTS idx_documents_parent
        ON documents(database, parent);
    `);
  }

  now(): Timestamp {
    return toTimestamp(this.clock.now());
  }

  readDocument(path: string): DocumentRow | undefined {
    return this.db
      .prepare<[string, string], DocumentRow>(
        "SELECT path, id, data, create_time, update_time FROM documents WHERE database = ? AND path = ?"
      )
      .get(this.database, path);
  }

  runQuery(plan: QueryPlan): DocumentRow[] {
    const { sql, params } = this.compile(plan, "path, id, data, create_time, update_time");
    return this.db.prepare<unknown[], DocumentRow>(sql).all(...params);
  }

  countQuery(plan: QueryPlan): number {
    const { sql, params } = this.compile(plan, "id");
    const row = this.db
      .prepare<unknown[], { cnt: number }>(`SELECT COUNT(*) AS cnt FROM (${sql})`)
      .get(...params);
    return row?.cnt ?? 0;
  }

  /** Ids of direct children plus ids implied by deeper descendants. */
  listChildIds(collectionPath: string): string[] {
    const prefix = `${collectionPath}/`;
    // "0" is the character after "/", so this bounds the prefix range.
    const rows = this.db
      .prepare<[string, string, string], { path: string }>(
        "SELECT path FROM documents WHERE database = ? AND path >= ? AND path < ?"
      )
      .all(this.database, prefix, `${collectionPath}0`);

    const ids = new Set<string>();
    for (const { path } of rows) {
      ids.add(path.slice(prefix.length).split("/")[0]);
    }
    return [...ids].sort();
  }

  /** Apply writes atomically. */
  applyWrites(ops: readonly WriteOp[]): void {
    const now = this.now();
    const run = this.db.transaction((batch: readonly WriteOp[]) => {
      for (const op of batch) {
        this.apply(op, now);
      }
    });
    run(ops);
  }

  private apply(op: WriteOp, now: Timestamp): void {
    if (op.kind === "delete") {
      this.db
        .prepare("DELETE FROM documents WHERE database = ? AND path = ?")
        .run(this.database, op.path);
      return;
    }

    const existing = this.readDocument(op.path);
    let next: DocumentData;

    if (op.kind === "update") {
      if (!existing) {
        throw new ClubhouseError("NOT_FOUND", `No document to update: ${op.path}`);
      }
      const current = parseDocumentData(existing.data, op.path);
      next = { ...current, ...resolveWrite(op.data, current, now) };
    } else if (op.merge && existing) {
      const current = parseDocumentData(existing.data, op.path);
      next = { ...current, ...resolveWrite(op.data, current, now) };
    } else {
      next = resolveWrite(op.data, {}, now);
    }

    const segments = op.path.split("/");
    this.db
      .prepare(`
        INSERT INTO documents (database, path, parent, id, data, create_time, update_time)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT (database, path)
        DO UPDATE SET data = excluded.data, update_time = excluded.update_time
      `)
      .run(
        this.database,
        op.path,
        segments.slice(0, -1).join("/"),
        segments[segments.length - 1],
        JSON.stringify(next),
        now,
        now
      );
  }

  private compile(plan: QueryPlan, columns: string): { sql: string; params: unknown[] } {
    const where = ["database = ?", "parent = ?"];
    const params: unknown[] = [this.database, plan.collectionPath];

    for (const filter of plan.filters) {
      if (filter.value === null) {
        if (filter.op !== "==" && filter.op !== "!=") {
          throw new ClubhouseError("INVALID_ARGUMENT", `Cannot compare null with ${filter.op}`);
        }
        where.push(`json_extract(data, ?) IS ${filter.op === "==" ? "NULL" : "NOT NULL"}`);
        params.push(jsonPath(filter.field));
        continue;
      }
      where.push(`json_extract(data, ?) ${SQL_OPS[filter.op]} ?`);
      params.push(jsonPath(filter.field), toSqlValue(filter.value));
    }

    // Documents missing an ordered-by field are not part of the result.
    for (const order of plan.orders) {
      where.push("json_extract(data, ?) IS NOT NULL");
      params.push(jsonPath(order.field));
    }

    const orderBy = plan.orders.map(
      (order) => `json_extract(data, ?) ${order.direction === "desc" ? "DESC" : "ASC"}`
    );
    for (const order of plan.orders) {
      params.push(jsonPath(order.field));
    }
    orderBy.push("id ASC");

    let sql = `SELECT ${columns} FROM documents WHERE ${where.join(" AND ")} ORDER BY ${orderBy.join(", ")}`;
    if (plan.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(plan.limit);
    }
    return { sql, params };
  }
}

// ─── References ─────────────────────────────────────────────────────

class SQLiteQuery implements Query {
  constructor(
    protected readonly engine: SQLiteEngine,
    protected readonly plan: QueryPlan
  ) {}

  where(field: string, op: WhereOp, value: DocumentValue): Query {
    assertValidField(field);
    return new SQLiteQuery(this.engine, {
      ...this.plan,
      filters: [...this.plan.filters, { field, op, value }],
    });
  }

  orderBy(field: string, direction: OrderDirection = "asc"): Query {
    assertValidField(field);
    return new SQLiteQuery(this.engine, {
      ...this.plan,
      orders: [...this.plan.orders, { field, direction }],
    });
  }

  limit(count: number): Query {
    if (!Number.isInteger(count) || count <= 0) {
      throw new ClubhouseError("INVALID_ARGUMENT", `Query limit must be a positive integer, got ${count}`);
    }
    return new SQLiteQuery(this.engine, { ...this.plan, limit: count });
  }

  async get(): Promise<QuerySnapshot> {
    const docs = this.engine.runQuery(this.plan).map((row) => {
      const ref = new SQLiteDocumentReference(this.engine, row.path);
      return new ExistingSnapshot(ref, row);
    });
    return { docs, size: docs.length, empty: docs.length === 0 };
  }

  async count(): Promise<number> {
    return this.engine.countQuery(this.plan);
  }
}

class SQLiteCollectionReference extends SQLiteQuery implements CollectionReference {
  readonly id: string;

  constructor(engine: SQLiteEngine, readonly path: string) {
    super(engine, { collectionPath: path, filters: [], orders: [] });
    this.id = path.split("/").pop() ?? path;
  }

  doc(id?: string): DocumentReference {
    const docId = id ?? uuidv7();
    assertValidSegment(docId);
    return new SQLiteDocumentReference(this.engine, `${this.path}/${docId}`);
  }

  async listDocumentIds(): Promise<string[]> {
    return this.engine.listChildIds(this.path);
  }
}

class SQLiteDocumentReference implements DocumentReference {
  readonly id: string;

  constructor(
    private readonly engine: SQLiteEngine,
    readonly path: string
  ) {
    this.id = path.split("/").pop() ?? path;
  }

  get parent(): CollectionReference {
    return new SQLiteCollectionReference(this.engine, this.path.split("/").slice(0, -1).join("/"));
  }

  collection(name: string): CollectionReference {
    assertValidSegment(name);
    return new SQLiteCollectionReference(this.engine, `${this.path}/${name}`);
  }

  async get(): Promise<DocumentSnapshot> {
    const row = this.engine.readDocument(this.path);
    return row ? new ExistingSnapshot(this, row) : new MissingSnapshot(this);
  }

  async set(data: WriteData, options?: SetOptions): Promise<void> {
    this.engine.applyWrites([{ kind: "set", path: this.path, data, merge: options?.merge ?? false }]);
  }

  async update(data: WriteData): Promise<void> {
    this.engine.applyWrites([{ kind: "update", path: this.path, data }]);
  }

  async delete(): Promise<void> {
    this.engine.applyWrites([{ kind: "delete", path: this.path }]);
  }
}

class SQLiteWriteBatch implements WriteBatch {
  private readonly ops: WriteOp[] = [];
  private committed = false;

  constructor(private readonly engine: SQLiteEngine) {}

  get size(): number {
    return this.ops.length;
  }

  set(ref: DocumentReference, data: WriteData, options?: SetOptions): WriteBatch {
    return this.push({ kind: "set", path: ref.path, data, merge: options?.merge ?? false });
  }

  update(ref: DocumentReference, data: WriteData): WriteBatch {
    return this.push({ kind: "update", path: ref.path, data });
  }

  delete(ref: DocumentReference): WriteBatch {
    return this.push({ kind: "delete", path: ref.path });
  }

  async commit(): Promise<void> {
    this.assertOpen();
    this.committed = true;
    this.engine.applyWrites(this.ops);
  }

  private push(op: WriteOp): WriteBatch {
    this.assertOpen();
    if (this.ops.length >= MAX_BATCH_SIZE) {
      throw new ClubhouseError(
        "INVALID_ARGUMENT",
        `A batch holds at most ${MAX_BATCH_SIZE} writes`
      );
    }
    this.ops.push(op);
    return this;
  }

  private assertOpen(): void {
    if (this.committed) {
      throw new ClubhouseError("INVALID_ARGUMENT", "Batch has already been committed");
    }
  }
}

// ─── Snapshots ──────────────────────────────────────────────────────

class ExistingSnapshot implements QueryDocumentSnapshot {
  readonly exists = true as const;
  readonly id: string;
  readonly createTime: Timestamp;
  readonly updateTime: Timestamp;

  constructor(
    readonly ref: DocumentReference,
    private readonly row: DocumentRow
  ) {
    this.id = row.id;
    this.createTime = row.create_time;
    this.updateTime = row.update_time;
  }

  data(): DocumentData {
    return parseDocumentData(this.row.data, this.row.path);
  }
}

class MissingSnapshot implements DocumentSnapshot {
  readonly exists = false;
  readonly id: string;

  constructor(readonly ref: DocumentReference) {
    this.id = ref.id;
  }

  data(): undefined {
    return undefined;
  }
}

// ─── Helpers ────────────────────────────────────────────────────────

function resolveWrite(data: WriteData, current: DocumentData, now: Timestamp): DocumentData {
  const out: DocumentData = {};
  for (const [field, value] of Object.entries(data)) {
    out[field] =
      value instanceof FieldValue
        ? applyTransform(value, field in current ? current[field] : undefined, now)
        : value;
  }
  return out;
}

function applyTransform(
  transform: FieldValue,
  existing: DocumentValue | undefined,
  now: Timestamp
): DocumentValue {
  const stored = Array.isArray(existing) ? existing : [];
  switch (transform.kind) {
    case "serverTimestamp":
      return now;
    case "arrayUnion": {
      const merged = [...stored];
      for (const element of transform.elements) {
        if (!merged.some((item) => isDeepStrictEqual(item, element))) {
          merged.push(element);
        }
      }
      return merged;
    }
    case "arrayRemove":
      return stored.filter(
        (item) => !transform.elements.some((element) => isDeepStrictEqual(item, element))
      );
    case "mapMerge":
      return { ...(isDocumentData(existing) ? existing : {}), ...transform.entries };
  }
}

function parseDocumentData(json: string, path: string): DocumentData {
  const value: unknown = JSON.parse(json);
  if (!isDocumentData(value)) {
    throw new ClubhouseError("DATA_CORRUPTION", `Document ${path} is not a JSON object`);
  }
  return value;
}

function isDocumentData(value: unknown): value is DocumentData {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertValidField(field: string): void {
  if (!FIELD_PATTERN.test(field)) {
    throw new ClubhouseError("INVALID_ARGUMENT", `Invalid field path: ${field}`);
  }
}

function jsonPath(field: string): string {
  return `$.${field}`;
}

function toSqlValue(value: DocumentValue): number | string {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number" || typeof value === "string") return value;
  throw new ClubhouseError("INVALID_ARGUMENT", "Only scalar values can be used in filters");
}

// ─── Internal row types ─────────────────────────────────────────────

interface DocumentRow {
  path: string;
  id: string;
  data: string;
  create_time: string;
  update_time: string;
}
