/**
 * PubMed client tests: request shape, batching, pacing and retry.
 *
 * Run: node --import tsx src/pubmed/client.test.ts
 *
 * Every request goes to an in-process FakeTransport; time is virtual.
 */

import { strict as assert } from "node:assert";

import { FetchError } from "../errors.js";
import type { RecordOrSkipped } from "../records/schema.js";
import {
  completeArticle,
  eutilsRoute,
  FakeClock,
  FakeTransport,
  partialArticles,
  silentLogger,
} from "../testing/fixtures.js";
import { section, test, finish } from "../testing/harness.js";
import {
  buildPrimaryResearchQuery,
  MIN_INTERVAL_WITH_KEY_MS,
  MIN_INTERVAL_WITHOUT_KEY_MS,
  PubMedClient,
  type PubMedClientOptions,
} from "./client.js";

function makeClient(transport: FakeTransport, clock: FakeClock, options: Partial<PubMedClientOptions> = {}) {
  return new PubMedClient({
    email: "curator@example.com",
    retry: { baseDelayMs: 100, maxDelayMs: 1000 },
    transport,
    clock,
    logger: silentLogger(),
    ...options,
  });
}

async function collect(items: AsyncIterable<RecordOrSkipped>): Promise<RecordOrSkipped[]> {
  const out: RecordOrSkipped[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}

async function catchFetchError(promise: Promise<unknown>): Promise<FetchError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof FetchError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected FetchError");
}

function idOf(item: RecordOrSkipped): string {
  return item.kind === "record" ? item.record.pmid : item.id;
}

// ═══════════════════════════════════════════════════════════════════════════
// REQUEST SHAPE
// ═══════════════════════════════════════════════════════════════════════════

section("esearch");

await test("query is restricted to primary research", () => {
  const query = buildPrimaryResearchQuery("cats");
  assert.ok(query.startsWith('(cats) AND "journal article"[pt] AND ("Clinical Trial"[pt] OR '));
  assert.ok(query.endsWith('NOT ("Review"[pt] OR "Systematic Review"[pt] OR "Meta-Analysis"[pt] OR "Editorial"[pt] OR "Letter"[pt] OR "Comment"[pt] OR "Guideline"[pt] OR "Practice Guideline"[pt] OR "Clinical Trial Protocol"[pt] OR "Preprint"[pt])'));
});

await test("sends identification and normalized term", async () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(eutilsRoute(["1", "2", "1"], []), clock);
  const ids = await makeClient(transport, clock).searchIds("  cats   and dogs ", 5);

  assert.deepEqual(ids, ["1", "2"]);
  assert.equal(transport.calls.length, 1);
  const call = transport.calls[0];
  assert.equal(call?.url, "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esearch.fcgi");
  assert.deepEqual(call?.params, {
    tool: "abstract_newsroom",
    email: "curator@example.com",
    db: "pubmed",
    term: buildPrimaryResearchQuery("cats and dogs"),
    retmax: "5",
    retmode: "json",
  });
});

await test("API key is sent only when configured", async () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(eutilsRoute([], []), clock);
  await makeClient(transport, clock, { apiKey: "test-secret" }).searchIds("cats");
  assert.equal(transport.calls[0]?.params["api_key"], "test-secret");
});

await test("blank term makes no request", async () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(undefined, clock);
  assert.deepEqual(await makeClient(transport, clock).searchIds("   "), []);
  assert.equal(transport.calls.length, 0);
});

await test("invalid JSON fails without retry", async () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(undefined, clock).enqueue({ status: 200, body: "<html>" });
  const err = await catchFetchError(makeClient(transport, clock).searchIds("cats"));
  assert.equal(err.transient, false);
  assert.equal(err.message, "esearch returned invalid JSON");
  assert.equal(transport.calls.length, 1);
});

// ═══════════════════════════════════════════════════════════════════════════
// SEARCH STREAM
// ═══════════════════════════════════════════════════════════════════════════

section("search");

await test("results follow esearch order; absent PMIDs are skipped", async () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(
    eutilsRoute(["1", "2", "3"], [completeArticle("3"), completeArticle("1")]),
    clock
  );
  const items = await collect(makeClient(transport, clock).search("cats"));

  assert.deepEqual(items.map(idOf), ["1", "2", "3"]);
  assert.deepEqual(items[1], { kind: "skipped", id: "2", reason: "missing", missingFields: [] });
  assert.equal(transport.calls[1]?.params["id"], "1,2,3");
});

await test("batches are fetched lazily", async () => {
  const clock = new FakeClock();
  const ids = ["1", "2", "3", "4", "5"];
  const transport = new FakeTransport(eutilsRoute(ids, ids.map((id) => completeArticle(id))), clock);
  const iterator = makeClient(transport, clock, { batchSize: 2 }).search("cats")[Symbol.asyncIterator]();

  const first = await iterator.next();
  assert.equal(first.done, false);
  assert.equal(transport.calls.length, 2);

  let count = 1;
  while (!(await iterator.next()).done) {
    count++;
  }
  assert.equal(count, 5);
  assert.deepEqual(
    transport.calls.slice(1).map((call) => call.params["id"]),
    ["1,2", "3,4", "5"]
  );
});

await test("records() yields only eligible records", async () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(
    eutilsRoute(["1", "2"], [completeArticle("1"), { pmid: "2", title: "No abstract" }]),
    clock
  );
  const pmids: string[] = [];
  for await (const record of makeClient(transport, clock).records("cats")) {
    pmids.push(record.pmid);
  }
  assert.deepEqual(pmids, ["1"]);
});

await test("records() yields none of the articles missing a required field", async () => {
  const articles = [...partialArticles().map((item) => item.article), completeArticle("999")];
  const clock = new FakeClock();
  const transport = new FakeTransport(
    eutilsRoute(
      articles.map((article) => article.pmid),
      articles
    ),
    clock
  );
  const pmids: string[] = [];
  for await (const record of makeClient(transport, clock).records("cats", { retmax: 50 })) {
    pmids.push(record.pmid);
  }
  assert.deepEqual(pmids, ["999"]);
});

await test("fetchRecords de-duplicates and keeps requested order", async () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(
    eutilsRoute([], [completeArticle("1"), completeArticle("2")]),
    clock
  );
  const items = await makeClient(transport, clock).fetchRecords(["2", "1", "2"]);
  assert.deepEqual(items.map(idOf), ["2", "1"]);
  assert.equal(transport.calls[0]?.params["id"], "2,1");
});

await test("malformed efetch XML is a non-transient failure", async () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(undefined, clock).enqueue({
    status: 200,
    body: "<PubmedArticleSet><PubmedArticle></PubmedArticleSet>",
  });
  const err = await catchFetchError(makeClient(transport, clock).fetchRecords(["1"]));
  assert.equal(err.transient, false);
  assert.equal(transport.calls.length, 1);
});

// ═══════════════════════════════════════════════════════════════════════════
// RETRY
// ═══════════════════════════════════════════════════════════════════════════

section("Retry");

await test("transient statuses are retried with backoff", async () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(eutilsRoute(["7"], []), clock).enqueue(
    { status: 503, body: "" },
    { status: 429, body: "" }
  );
  const ids = await makeClient(transport, clock, { apiKey: "test-secret" }).searchIds("cats");

  assert.deepEqual(ids, ["7"]);
  assert.equal(transport.calls.length, 3);
  assert.deepEqual(
    clock.sleeps.filter((ms) => ms >= 100),
    [100, 200]
  );
});

await test("client errors fail immediately", async () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(undefined, clock).enqueue({ status: 400, body: "bad" });
  const err = await catchFetchError(makeClient(transport, clock).searchIds("cats"));

  assert.equal(err.transient, false);
  assert.equal(err.status, 400);
  assert.equal(err.message, "esearch.fcgi returned HTTP 400");
  assert.equal(transport.calls.length, 1);
});

await test("network errors exhaust the retry budget", async () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(undefined, clock).enqueue(
    new Error("socket hang up"),
    new Error("socket hang up"),
    new Error("socket hang up")
  );
  const client = makeClient(transport, clock, {
    retry: { maxRetries: 2, baseDelayMs: 100, maxDelayMs: 1000 },
  });
  const err = await catchFetchError(client.searchIds("cats"));

  assert.equal(err.transient, true);
  assert.equal(err.status, undefined);
  assert.equal(err.message, "esearch.fcgi request failed: socket hang up");
  assert.equal(transport.calls.length, 3);
});

// ═══════════════════════════════════════════════════════════════════════════
// PACING
// ═══════════════════════════════════════════════════════════════════════════

section("Pacing");

await test("interval depends on API key", () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(undefined, clock);
  assert.equal(makeClient(transport, clock).minIntervalMs, MIN_INTERVAL_WITHOUT_KEY_MS);
  assert.equal(
    makeClient(transport, clock, { apiKey: "test-secret" }).minIntervalMs,
    MIN_INTERVAL_WITH_KEY_MS
  );
});

await test("concurrent requests start at least one interval apart", async () => {
  const clock = new FakeClock();
  const transport = new FakeTransport(eutilsRoute(["1"], []), clock);
  const client = makeClient(transport, clock);

  await Promise.all([client.searchIds("a"), client.searchIds("b"), client.searchIds("c")]);

  const starts = transport.calls.map((call) => call.at);
  assert.equal(starts.length, 3);
  for (let i = 1; i < starts.length; i++) {
    const gap = (starts[i] ?? 0) - (starts[i - 1] ?? 0);
    assert.ok(gap >= MIN_INTERVAL_WITHOUT_KEY_MS - 1e-9, `gap ${gap} too small`);
  }
});

finish();
