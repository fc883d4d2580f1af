/**
 * Readability ranking tests.
 *
 * Run: node --import tsx src/ranking/readability.test.ts
 */

import { strict as assert } from "node:assert";

import { makeRecord } from "../testing/fixtures.js";
import { section, test, finish } from "../testing/harness.js";
import {
  countSentences,
  daleChallScore,
  isEasyWord,
  rankByReadability,
  score,
  tokenizeWords,
} from "./readability.js";

// ═══════════════════════════════════════════════════════════════════════════
// TOKENIZING
// ═══════════════════════════════════════════════════════════════════════════

section("Tokenizing");

await test("words are lowercased and keep apostrophes", () => {
  assert.deepEqual(tokenizeWords("It's a Dog's life, 42 times."), ["it's", "a", "dog's", "life", "times"]);
});

await test("sentences split on terminal punctuation", () => {
  assert.equal(countSentences("One. Two! Three?"), 3);
  assert.equal(countSentences("no punctuation at all"), 1);
  assert.equal(countSentences(""), 0);
  assert.equal(countSentences("..."), 0);
});

await test("suffixed forms of easy words are easy", () => {
  assert.equal(isEasyWord("cats"), true);
  assert.equal(isEasyWord("dog's"), true);
  assert.equal(isEasyWord("pharmacokinetics"), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// SCORING
// ═══════════════════════════════════════════════════════════════════════════

section("Scoring");

await test("all-easy text scores on sentence length only", () => {
  assert.equal(daleChallScore("The cat sat on the mat. The dog ran to the tree."), 0.298);
  assert.equal(daleChallScore("Cat"), 0.05);
});

await test("difficult words above 5% add the adjustment", () => {
  assert.equal(daleChallScore("The big cat sat on pharmacokinetics."), 6.566);
  assert.equal(daleChallScore("Pharmacokinetics."), 19.476);
});

await test("text without words is unscorable", () => {
  assert.equal(daleChallScore(""), null);
  assert.equal(daleChallScore("123 456 --"), null);
  assert.equal(score(makeRecord("1", { abstract: "..." })), null);
});

await test("score reads the abstract", () => {
  assert.equal(score(makeRecord("1", { abstract: "Cat" })), 0.05);
});

// ═══════════════════════════════════════════════════════════════════════════
// RANKING
// ═══════════════════════════════════════════════════════════════════════════

section("rankByReadability");

await test("hardest first", () => {
  const ranked = rankByReadability([
    makeRecord("1", { abstract: "Pharmacokinetics." }),
    makeRecord("2", { abstract: "Cat" }),
    makeRecord("3", { abstract: "The big cat sat on pharmacokinetics." }),
  ]);
  assert.deepEqual(
    ranked.map((entry) => [entry.record.pmid, entry.score]),
    [
      ["1", 19.476],
      ["3", 6.566],
      ["2", 0.05],
    ]
  );
});

await test("unscorable abstracts sort after every scorable one, however hard", () => {
  const ranked = rankByReadability([
    makeRecord("1", { abstract: "..." }),
    makeRecord("2", { abstract: "Cat" }),
    makeRecord("3", { abstract: "Pharmacokinetics." }),
    makeRecord("4", { abstract: "42 --" }),
    makeRecord("5", { abstract: "Pharmacokinetics pharmacodynamics immunohistochemistry." }),
  ]);
  assert.deepEqual(
    ranked.map((entry) => [entry.record.pmid, entry.score]),
    [
      ["5", 19.575],
      ["3", 19.476],
      ["2", 0.05],
      ["1", null],
      ["4", null],
    ]
  );
});

await test("equal scores keep input order", () => {
  const ranked = rankByReadability(["5", "3", "9", "1"].map((pmid) => makeRecord(pmid)));
  assert.deepEqual(
    ranked.map((entry) => entry.record.pmid),
    ["5", "3", "9", "1"]
  );
});

await test("empty input gives empty ranking", () => {
  assert.deepEqual(rankByReadability([]), []);
});

finish();
