/**
 * Record store tests on in-memory SQLite.
 *
 * Run: node --import tsx src/storage/record-store.test.ts
 */

import { strict as assert } from "node:assert";

import { RecordStoreError } from "../errors.js";
import { makeRecord, silentLogger, tickingDates } from "../testing/fixtures.js";
import { section, test, finish } from "../testing/harness.js";
import { openDatabase } from "./database.js";
import { RecordStore } from "./record-store.js";

const T0 = Date.UTC(2024, 0, 1);

function freshStore() {
  const handle = openDatabase(":memory:");
  return { handle, store: new RecordStore(handle.db, silentLogger(), tickingDates(T0)) };
}

// ═══════════════════════════════════════════════════════════════════════════
// UPSERT
// ═══════════════════════════════════════════════════════════════════════════

section("upsertRecords");

await test("new records are inserted and readable", () => {
  const { handle, store } = freshStore();
  const result = store.upsertRecords([makeRecord("1"), makeRecord("2")]);
  assert.deepEqual(result, { inserted: ["1", "2"], updated: [], unchanged: [] });
  assert.deepEqual(store.getRecord("1"), makeRecord("1"));
  handle.close();
});

await test("re-writing identical content is a no-op", () => {
  const { handle, store } = freshStore();
  const dump = () => handle.sqlite.prepare("SELECT * FROM records ORDER BY pmid").all();
  store.upsertRecords([makeRecord("1"), makeRecord("2")]);
  const afterOne = dump();
  const again = store.upsertRecords([makeRecord("1"), makeRecord("2")]);
  assert.deepEqual(again, { inserted: [], updated: [], unchanged: ["1", "2"] });
  assert.equal(afterOne.length, 2);
  assert.deepEqual(dump(), afterOne);
  assert.deepEqual(store.getRecord("2"), makeRecord("2"));
  handle.close();
});

await test("changed content overwrites every field", () => {
  const { handle, store } = freshStore();
  store.upsertRecords([makeRecord("1"), makeRecord("2")]);
  const changed = makeRecord("1", {
    title: "Revised",
    authors: ["Someone Else"],
    doi: "10.1/xyz",
    publicationTypes: ["Clinical Trial"],
  });
  const result = store.upsertRecords([changed, makeRecord("2")]);
  assert.deepEqual(result, { inserted: [], updated: ["1"], unchanged: ["2"] });
  assert.deepEqual(store.getRecord("1"), changed);
  handle.close();
});

await test("last occurrence of a PMID in a batch wins", () => {
  const { handle, store } = freshStore();
  store.upsertRecords([makeRecord("1", { title: "First" }), makeRecord("1", { title: "Second" })]);
  assert.equal(store.getRecord("1")?.title, "Second");
  handle.close();
});

await test("empty batch writes nothing", () => {
  const { handle, store } = freshStore();
  assert.deepEqual(store.upsertRecords([]), { inserted: [], updated: [], unchanged: [] });
  handle.close();
});

await test("an ineligible record rejects the whole batch", () => {
  const { handle, store } = freshStore();
  let caught: unknown;
  try {
    store.upsertRecords([makeRecord("1"), makeRecord("2", { abstract: "  " })]);
  } catch (err) {
    caught = err;
  }
  if (!(caught instanceof RecordStoreError)) {
    throw new Error("expected RecordStoreError");
  }
  assert.deepEqual(caught.failedIds, ["1", "2"]);
  assert.equal(store.getRecord("1"), undefined);
  assert.equal(store.getRecord("2"), undefined);
  handle.close();
});

await test("getRecords returns only cached PMIDs", () => {
  const { handle, store } = freshStore();
  store.upsertRecords([makeRecord("1"), makeRecord("2")]);
  const found = store.getRecords(["2", "9", "2"]);
  assert.deepEqual([...found.keys()], ["2"]);
  assert.equal(store.getRecords([]).size, 0);
  handle.close();
});

// ═══════════════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════════════

section("recordQuery / latestQueryFor");

await test("queries store the normalized term and ordered results", () => {
  const { handle, store } = freshStore();
  const query = store.recordQuery("  cats   on mats ", ["3", "1", "3"]);
  assert.deepEqual(query, {
    id: 1,
    term: "cats on mats",
    retmax: 3,
    createdAt: new Date(T0),
    resultIds: ["3", "1"],
  });
  assert.equal(store.recordQuery("dogs", [], 20).id, 2);
  handle.close();
});

await test("latest query containing a PMID is found", () => {
  const { handle, store } = freshStore();
  store.recordQuery("cats", ["1", "2"]);
  store.recordQuery("dogs", ["2"]);

  assert.equal(store.latestQueryFor("1")?.term, "cats");
  assert.deepEqual(store.latestQueryFor("2"), {
    term: "dogs",
    retmax: 1,
    createdAt: new Date(T0 + 1000),
  });
  assert.equal(store.latestQueryFor("99"), undefined);
  handle.close();
});

await test("a cutoff limits the search, falling back to the latest", () => {
  const { handle, store } = freshStore();
  store.recordQuery("cats", ["1", "2"]);
  store.recordQuery("dogs", ["2"]);

  assert.equal(store.latestQueryFor("2", new Date(T0 + 500))?.term, "cats");
  assert.equal(store.latestQueryFor("2", new Date(T0 - 1000))?.term, "dogs");
  handle.close();
});

finish();
