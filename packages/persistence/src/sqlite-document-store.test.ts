import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ManualClock, isClubhouseError } from "@clubhouse/core";
import { FieldValue, MAX_BATCH_SIZE } from "./document-store.js";
import { SQLiteDocumentStore } from "./sqlite-document-store.js";

describe("SQLiteDocumentStore", () => {
  let clock: ManualClock;
  let store: SQLiteDocumentStore;

  beforeEach(() => {
    clock = new ManualClock(100);
    store = new SQLiteDocumentStore({ target: ":memory:", clock });
  });

  afterEach(async () => {
    await store.close();
  });

  describe("documents", () => {
    it("writes and reads a document", async () => {
      const ref = store.doc("clubs/harimau");
      await ref.set({ name: "Harimau FC", members: 42, tags: ["futsal"] });

      const snapshot = await ref.get();
      expect(snapshot.exists).toBe(true);
      expect(snapshot.id).toBe("harimau");
      expect(snapshot.data()).toEqual({ name: "Harimau FC", members: 42, tags: ["futsal"] });
      expect(snapshot.createTime).toBe("1970-01-01T00:01:40.000Z");
    });

    it("reports missing documents", async () => {
      const snapshot = await store.doc("clubs/none").get();
      expect(snapshot.exists).toBe(false);
      expect(snapshot.data()).toBeUndefined();
    });

    it("returns a fresh copy on every read", async () => {
      const ref = store.doc("clubs/harimau");
      await ref.set({ tags: ["futsal"] });
      const snapshot = await ref.get();

      const first = snapshot.data();
      if (first) first.tags = [];
      expect(snapshot.data()).toEqual({ tags: ["futsal"] });
    });

    it("replaces on set and merges on set with merge", async () => {
      const ref = store.doc("clubs/harimau");
      await ref.set({ name: "Harimau FC", city: "Ipoh" });
      await ref.set({ name: "Harimau United" });
      expect((await ref.get()).data()).toEqual({ name: "Harimau United" });

      await ref.set({ city: "Ipoh" }, { merge: true });
      expect((await ref.get()).data()).toEqual({ name: "Harimau United", city: "Ipoh" });
    });

    it("updates top-level fields and keeps the creation time", async () => {
      const ref = store.doc("clubs/harimau");
      await ref.set({ name: "Harimau FC", fees: { monthly: 30 } });
      clock.set(200);
      await ref.update({ fees: { monthly: 40 } });

      const snapshot = await ref.get();
      expect(snapshot.data()).toEqual({ name: "Harimau FC", fees: { monthly: 40 } });
      expect(snapshot.createTime).toBe("1970-01-01T00:01:40.000Z");
      expect(snapshot.updateTime).toBe("1970-01-01T00:03:20.000Z");
    });

    it("refuses to update a missing document", async () => {
      const err = await store.doc("clubs/none").update({ a: 1 }).catch((e: unknown) => e);
      expect(isClubhouseError(err, "NOT_FOUND")).toBe(true);
    });

    it("treats deleting a missing document as a no-op", async () => {
      await expect(store.doc("clubs/none").delete()).resolves.toBeUndefined();
    });

    it("navigates parents and sub-collections", () => {
      const ref = store.collection("clubs").doc("harimau").collection("members").doc("aiman");
      expect(ref.path).toBe("clubs/harimau/members/aiman");
      expect(ref.parent.path).toBe("clubs/harimau/members");
      expect(ref.parent.id).toBe("members");
    });

    it("generates ids for unnamed documents", () => {
      const a = store.collection("clubs").doc();
      const b = store.collection("clubs").doc();
      expect(a.id).not.toBe(b.id);
      expect(a.path).toBe(`clubs/${a.id}`);
    });

    it("rejects malformed paths", () => {
      for (const attempt of [
        () => store.doc("clubs"),
        () => store.collection("clubs/harimau"),
        () => store.doc("clubs//x"),
        () => store.collection("clubs").doc(""),
        () => store.collection("clubs").doc("a/b"),
      ]) {
        expect(attempt).toThrow(/Invalid path segment|Not a (collection|document) path/);
      }
    });
  });

  describe("field transforms", () => {
    it("resolves server timestamps from the store clock", async () => {
      clock.set(1_700_000_000);
      const ref = store.doc("clubs/harimau");
      await ref.set({ seen_at: FieldValue.serverTimestamp() });
      expect((await ref.get()).data()).toEqual({ seen_at: "2023-11-14T22:13:20.000Z" });
    });

    it("adds and removes array elements", async () => {
      const ref = store.doc("clubs/harimau");
      await ref.set({ admins: ["u1"] });

      await ref.update({ admins: FieldValue.arrayUnion("u1", "u2", { id: "u3" }) });
      expect((await ref.get()).data()).toEqual({ admins: ["u1", "u2", { id: "u3" }] });

      await ref.update({ admins: FieldValue.arrayUnion({ id: "u3" }) });
      await ref.update({ admins: FieldValue.arrayRemove("u1", { id: "u3" }) });
      expect((await ref.get()).data()).toEqual({ admins: ["u2"] });
    });

    it("merges map entries into the stored map", async () => {
      const ref = store.doc("clubs/harimau");
      await ref.set({ name: "Harimau FC", fees: { monthly: 30, joining: 10 } });

      await ref.update({ fees: FieldValue.mapMerge({ monthly: 40, late: 5 }) });
      await ref.set({ perks: FieldValue.mapMerge({ jersey: true }) }, { merge: true });

      expect((await ref.get()).data()).toEqual({
        name: "Harimau FC",
        fees: { monthly: 40, joining: 10, late: 5 },
        perks: { jersey: true },
      });
    });

    it("resolves each map merge in a batch against the previous write", async () => {
      const ref = store.doc("clubs/harimau");
      await ref.set({ fees: { monthly: 30 } });

      await store
        .batch()
        .update(ref, { fees: FieldValue.mapMerge({ joining: 10 }) })
        .update(ref, { fees: FieldValue.mapMerge({ late: 5 }) })
        .commit();

      expect((await ref.get()).data()).toEqual({ fees: { monthly: 30, joining: 10, late: 5 } });
    });

    it("treats a missing field as an empty array", async () => {
      const ref = store.doc("clubs/harimau");
      await ref.set({ name: "Harimau FC" });
      await ref.update({ admins: FieldValue.arrayUnion("u1") });
      await ref.set({ banned: FieldValue.arrayRemove("u9") }, { merge: true });
      expect((await ref.get()).data()).toEqual({ name: "Harimau FC", admins: ["u1"], banned: [] });
    });
  });

  describe("queries", () => {
    beforeEach(async () => {
      const members = store.collection("clubs/harimau/members");
      await members.doc("aiman").set({ name: "Aiman", joined: "2024-01-05", paid: true, age: 31 });
      await members.doc("farid").set({ name: "Farid", joined: "2023-06-12", paid: false, age: 27 });
      await members.doc("hakim").set({ name: "Hakim", joined: "2025-02-20", paid: true, age: 19 });
      await members.doc("zul").set({ name: "Zul", paid: true, age: 45 });
      // A document in another collection must never leak into results.
      await store.doc("clubs/rusa/members/ali").set({ name: "Ali", joined: "2024-03-01", paid: true, age: 22 });
    });

    it("orders and limits", async () => {
      const members = store.collection("clubs/harimau/members");
      const snapshot = await members.orderBy("joined", "desc").limit(2).get();
      expect(snapshot.docs.map((d) => d.id)).toEqual(["hakim", "aiman"]);
      expect(snapshot.size).toBe(2);
    });

    it("leaves out documents without the ordered field", async () => {
      const snapshot = await store.collection("clubs/harimau/members").orderBy("joined").get();
      expect(snapshot.docs.map((d) => d.id)).toEqual(["farid", "aiman", "hakim"]);
    });

    it("filters by comparison", async () => {
      const members = store.collection("clubs/harimau/members");
      const adults = await members.where("age", ">=", 27).orderBy("age").get();
      expect(adults.docs.map((d) => d.id)).toEqual(["farid", "aiman", "zul"]);

      const recent = await members.where("joined", ">=", "2024-01-01").get();
      expect(recent.docs.map((d) => d.id)).toEqual(["aiman", "hakim"]);
    });

    it("filters by boolean and null", async () => {
      const members = store.collection("clubs/harimau/members");
      const unpaid = await members.where("paid", "==", false).get();
      expect(unpaid.docs.map((d) => d.data().name)).toEqual(["Farid"]);

      const neverJoined = await members.where("joined", "==", null).get();
      expect(neverJoined.docs.map((d) => d.id)).toEqual(["zul"]);
    });

    it("counts without fetching", async () => {
      const members = store.collection("clubs/harimau/members");
      expect(await members.count()).toBe(4);
      expect(await members.where("paid", "==", true).count()).toBe(3);
      expect(await members.orderBy("age").limit(2).count()).toBe(2);
    });

    it("returns an empty snapshot for an empty collection", async () => {
      const snapshot = await store.collection("clubs/none/members").get();
      expect(snapshot.empty).toBe(true);
      expect(snapshot.docs).toEqual([]);
    });

    it("rejects bad limits and field names", () => {
      const members = store.collection("clubs/harimau/members");
      expect(() => members.limit(0)).toThrow(/positive integer/);
      expect(() => members.orderBy("name'); DROP TABLE documents; --")).toThrow(/Invalid field path/);
    });
  });

  describe("listDocumentIds", () => {
    it("includes ids that only exist as parents of sub-collections", async () => {
      await store.doc("sessions/app/users/u1/sessions/s1").set({ id: "s1" });
      await store.doc("sessions/app/users/u2/sessions/s2").set({ id: "s2" });
      await store.doc("sessions/app/users/u3").set({ note: "real document" });
      await store.doc("sessions/other/users/u9/sessions/s9").set({ id: "s9" });

      const ids = await store.collection("sessions/app/users").listDocumentIds();
      expect(ids).toEqual(["u1", "u2", "u3"]);
    });
  });

  describe("batches", () => {
    it("commits every write together", async () => {
      await store.doc("clubs/harimau").set({ members: 1 });
      const batch = store.batch();
      batch
        .set(store.doc("clubs/rusa"), { members: 2 })
        .update(store.doc("clubs/harimau"), { members: 3 })
        .delete(store.doc("clubs/none"));
      expect(batch.size).toBe(3);

      await batch.commit();

      expect((await store.doc("clubs/rusa").get()).data()).toEqual({ members: 2 });
      expect((await store.doc("clubs/harimau").get()).data()).toEqual({ members: 3 });
    });

    it("applies nothing when one write fails", async () => {
      const batch = store.batch();
      batch.set(store.doc("clubs/rusa"), { members: 2 });
      batch.update(store.doc("clubs/none"), { members: 3 });

      await expect(batch.commit()).rejects.toThrow(/No document to update/);
      expect((await store.doc("clubs/rusa").get()).exists).toBe(false);
    });

    it(`holds at most ${MAX_BATCH_SIZE} writes`, () => {
      const batch = store.batch();
      for (let i = 0; i < MAX_BATCH_SIZE; i++) {
        batch.delete(store.doc(`clubs/c${i}`));
      }
      expect(() => batch.delete(store.doc("clubs/one-too-many"))).toThrow(/at most 500/);
    });

    it("cannot be committed twice", async () => {
      const batch = store.batch();
      batch.set(store.doc("clubs/rusa"), { members: 2 });
      await batch.commit();
      await expect(batch.commit()).rejects.toThrow(/already been committed/);
    });
  });

  describe("namespaces", () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "clubhouse-store-"));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it("keeps databases in one file apart, and persists across reopen", async () => {
      const file = path.join(tmpDir, "store.db");
      const prod = new SQLiteDocumentStore({ target: file, database: "prod", clock });
      const staging = new SQLiteDocumentStore({ target: file, database: "staging", clock });

      await prod.doc("clubs/harimau").set({ env: "prod" });
      expect((await staging.doc("clubs/harimau").get()).exists).toBe(false);
      await prod.close();
      await staging.close();

      const reopened = new SQLiteDocumentStore({ target: file, database: "prod", clock });
      expect((await reopened.doc("clubs/harimau").get()).data()).toEqual({ env: "prod" });
      await reopened.close();
    });
  });
});
