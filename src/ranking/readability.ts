/**
 * Readability scoring for search results.
 *
 * Dale–Chall style difficulty: higher scores are harder to read. Scores
 * only order result lists for display; they are never persisted. Text with
 * no words has no score (`null`).
 */

import { readFileSync } from "node:fs";
import type { CanonicalRecord } from "../records/schema.js";

const WORD_RE = /[A-Za-z]+(?:'[A-Za-z]+)?/g;
const SENTENCE_SPLIT_RE = /[.!?]+/;
const SUFFIXES = ["'s", "s", "es", "ed", "ing", "ly"] as const;

const EASY_WORDS_URL = new URL("../../data/easy-words.txt", import.meta.url);

export function loadEasyWords(source: URL | string = EASY_WORDS_URL): ReadonlySet<string> {
  const text = readFileSync(source, "utf-8");
  return new Set(
    text
      .split(/\r?\n/)
      .map((line) => line.trim().toLowerCase())
      .filter(Boolean)
  );
}

const EASY_WORDS = loadEasyWords();

export function tokenizeWords(text: string): string[] {
  return Array.from(text.matchAll(WORD_RE), (match) => match[0].toLowerCase());
}

export function countSentences(text: string): number {
  const parts = text.split(SENTENCE_SPLIT_RE).filter((part) => part.trim() !== "");
  if (parts.length > 0) {
    return parts.length;
  }
  return tokenizeWords(text).length > 0 ? 1 : 0;
}

export function isEasyWord(word: string, easyWords: ReadonlySet<string> = EASY_WORDS): boolean {
  if (easyWords.has(word)) {
    return true;
  }
  return SUFFIXES.some(
    (suffix) =>
      word.endsWith(suffix) &&
      word.length > suffix.length + 1 &&
      easyWords.has(word.slice(0, -suffix.length))
  );
}

/**
 * Dale–Chall difficulty of free text, rounded to three decimals, or `null`
 * when the text has no words.
 */
export function daleChallScore(
  text: string,
  easyWords: ReadonlySet<string> = EASY_WORDS
): number | null {
  const words = tokenizeWords(text);
  if (words.length === 0) {
    return null;
  }
  const sentences = Math.max(countSentences(text), 1);
  const difficult = words.filter((word) => !isEasyWord(word, easyWords)).length;
  const difficultPct = (difficult / words.length) * 100;

  let score = 0.1579 * difficultPct + 0.0496 * (words.length / sentences);
  if (difficultPct > 5) {
    score += 3.6365;
  }
  return Math.round(score * 1000) / 1000;
}

/**
 * Readability score of a record's abstract.
 */
export function score(record: Pick<CanonicalRecord, "abstract">): number | null {
  return daleChallScore(record.abstract);
}

export interface RankedRecord<T extends Pick<CanonicalRecord, "abstract"> = CanonicalRecord> {
  readonly record: T;
  readonly score: number | null;
}

function compareScores(a: number | null, b: number | null): number {
  if (a === null || b === null) {
    return (a === null ? 1 : 0) - (b === null ? 1 : 0);
  }
  return b - a;
}

/**
 * Order records by descending score, unscorable records last. Equal scores
 * keep their input order.
 */
export function rankByReadability<T extends Pick<CanonicalRecord, "abstract">>(
  records: readonly T[]
): RankedRecord<T>[] {
  return records
    .map((record) => ({ record, score: score(record) }))
    .sort((a, b) => compareScores(a.score, b.score));
}
