import test from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { enrichRecord } from "../src/etl/transform.js";
import { InvalidDocumentError, SqliteDocumentStore } from "../src/storage/documentStore.js";
import { FIXED_NOW, makeRecord, margarita } from "./helpers.js";

function createStore(collection = "cocktails"): SqliteDocumentStore {
  return new SqliteDocumentStore({ dbPath: ":memory:", collection });
}

test("upsert then get returns the stored document", async () => {
  const store = createStore();
  const doc = enrichRecord(margarita(), FIXED_NOW);

  await store.upsert(doc);

  assert.deepEqual(await store.get("11007"), doc);
  assert.equal(await store.get("missing"), null);
});

test("upsert replaces a document with the same id", async () => {
  const store = createStore();
  await store.upsert(enrichRecord(makeRecord("1", { name: "First" }), FIXED_NOW));
  await store.upsert(enrichRecord(makeRecord("1", { name: "Second" }), FIXED_NOW));

  assert.equal(await store.count(), 1);
  assert.equal((await store.get("1"))?.name, "Second");
});

test("list pages documents ordered by id", async () => {
  const store = createStore();
  for (const id of ["c", "a", "b", "d"]) {
    await store.upsert(enrichRecord(makeRecord(id), FIXED_NOW));
  }

  const page = await store.list({ limit: 2, offset: 1 });
  assert.deepEqual(page.map((d) => d.id), ["b", "c"]);
  assert.deepEqual((await store.all()).map((d) => d.id), ["a", "b", "c", "d"]);
});

test("collections are kept apart", async () => {
  const store = createStore("cocktails");
  await store.upsert(enrichRecord(makeRecord("1"), FIXED_NOW));

  assert.equal(store.collection, "cocktails");
  assert.equal(await store.count(), 1);
  assert.equal(await createStore("mocktails").count(), 0);
});

test("upsert rejects a document without an id", async () => {
  const store = createStore();
  const doc = enrichRecord(makeRecord("1"), FIXED_NOW);

  await assert.rejects(store.upsert({ ...doc, id: "" }), InvalidDocumentError);
  assert.equal(await store.count(), 0);
});

test("a file-backed store keeps documents across reopening", async () => {
  const root = mkdtempSync(path.join(tmpdir(), "drink-store-"));
  const dbPath = path.join(root, "nested", "store.sqlite");
  try {
    const first = new SqliteDocumentStore({ dbPath, collection: "cocktails" });
    await first.upsert(enrichRecord(margarita(), FIXED_NOW));
    await first.upsert(enrichRecord(makeRecord("2"), FIXED_NOW));
    await first.close();
    assert.equal(existsSync(dbPath), true);

    const reopened = new SqliteDocumentStore({ dbPath, collection: "cocktails" });
    assert.equal(await reopened.count(), 2);
    assert.equal((await reopened.get("11007"))?.name, "Margarita");
    await reopened.close();
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});
