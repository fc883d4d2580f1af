/**
 * Shared fixtures and in-process fakes for the test files.
 */

import type { Story } from "../artifacts/schema.js";
import type { GeneratedStory, StoryGenerator, StoryRequest } from "../generation/index.js";
import { createLogger, type Logger, type LogLevel } from "../logging/index.js";
import type { Clock, HttpResponse, HttpTransport } from "../pubmed/index.js";
import {
  REQUIRED_RECORD_FIELDS,
  type CanonicalRecord,
  type RequiredRecordField,
} from "../records/schema.js";

// ═══════════════════════════════════════════════════════════════════════════
// LOGGING
// ═══════════════════════════════════════════════════════════════════════════

export interface CapturedLine {
  level: LogLevel;
  line: string;
}

/**
 * Logger that writes nowhere except `lines`.
 */
export function silentLogger(lines: CapturedLine[] = []): Logger {
  return createLogger({
    level: "debug",
    console: false,
    file: false,
    sink: (level, line) => lines.push({ level, line }),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════════════════

export function makeRecord(pmid: string, overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    pmid,
    title: `Study ${pmid}`,
    abstract: "The cat sat on the mat.",
    journal: "Journal of Tests",
    year: "2024",
    authors: ["Ada Lovelace", "Grace Hopper"],
    doi: null,
    pmcid: null,
    publicationTypes: ["Journal Article"],
    publicationDate: "2024-01-15",
    publicationDateRaw: "2024 Jan 15",
    publicationDateSource: "journal_issue_pub_date",
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// E-UTILITIES PAYLOADS
// ═══════════════════════════════════════════════════════════════════════════

export interface ArticleFixture {
  pmid: string;
  title?: string;
  abstract?: string;
  journal?: string;
  year?: string;
  authors?: string[];
}

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function element(name: string, value: string | undefined): string {
  return value === undefined ? "" : `<${name}>${escapeXml(value)}</${name}>`;
}

export function articleXml(article: ArticleFixture): string {
  const authors = (article.authors ?? [])
    .map((name) => {
      const [fore = "", ...rest] = name.split(" ");
      return `<Author>${element("LastName", rest.join(" "))}${element("ForeName", fore)}</Author>`;
    })
    .join("");
  const abstract =
    article.abstract === undefined
      ? ""
      : `<Abstract>${element("AbstractText", article.abstract)}</Abstract>`;

  return [
    "<PubmedArticle>",
    "<MedlineCitation>",
    element("PMID", article.pmid),
    "<Article>",
    "<Journal><JournalIssue><PubDate>",
    element("Year", article.year),
    "</PubDate></JournalIssue>",
    element("Title", article.journal),
    "</Journal>",
    element("ArticleTitle", article.title),
    abstract,
    authors ? `<AuthorList>${authors}</AuthorList>` : "",
    "<PublicationTypeList><PublicationType>Journal Article</PublicationType></PublicationTypeList>",
    "</Article>",
    "</MedlineCitation>",
    "</PubmedArticle>",
  ].join("");
}

export interface PartialArticle {
  readonly article: ArticleFixture;
  readonly missing: readonly RequiredRecordField[];
}

/**
 * Every non-empty subset of the required fields, dropped once as absent
 * elements and once as whitespace-only ones. PMIDs run from 102 to 131.
 */
export function partialArticles(): PartialArticle[] {
  const cases: PartialArticle[] = [];
  for (let mask = 1; mask < 1 << REQUIRED_RECORD_FIELDS.length; mask++) {
    const missing = REQUIRED_RECORD_FIELDS.filter((_, bit) => (mask & (1 << bit)) !== 0);
    for (const blank of [undefined, " \n\t "]) {
      const article = completeArticle(String(100 + mask * 2 + (blank === undefined ? 0 : 1)));
      for (const field of missing) {
        article[field] = blank;
      }
      cases.push({ article, missing });
    }
  }
  return cases;
}

export function articleSetXml(articles: readonly ArticleFixture[]): string {
  return `<?xml version="1.0"?><PubmedArticleSet>${articles.map(articleXml).join("")}</PubmedArticleSet>`;
}

export function esearchJson(ids: readonly string[]): string {
  return JSON.stringify({ esearchresult: { count: String(ids.length), idlist: ids } });
}

/** Article with every required field present. */
export function completeArticle(pmid: string, abstract = "The cat sat on the mat."): ArticleFixture {
  return {
    pmid,
    title: `Study ${pmid}`,
    abstract,
    journal: "Journal of Tests",
    year: "2024",
    authors: ["Ada Lovelace"],
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// FAKES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Virtual clock: sleeping advances time immediately.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private time = 0) {}

  now(): number {
    return this.time;
  }

  sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
    return Promise.resolve();
  }
}

export interface TransportCall {
  url: string;
  params: Record<string, string>;
  at: number;
}

type Route = (url: string, params: Readonly<Record<string, string>>) => HttpResponse;

/**
 * Transport that replays queued responses (or errors) and otherwise routes
 * requests to a handler.
 */
export class FakeTransport implements HttpTransport {
  readonly calls: TransportCall[] = [];
  private readonly queue: (HttpResponse | Error)[] = [];

  constructor(
    private readonly route?: Route,
    private readonly clock?: Clock
  ) {}

  enqueue(...responses: (HttpResponse | Error)[]): this {
    this.queue.push(...responses);
    return this;
  }

  get(url: string, params: Readonly<Record<string, string>>): Promise<HttpResponse> {
    this.calls.push({ url, params: { ...params }, at: this.clock?.now() ?? 0 });
    const next = this.queue.shift();
    if (next instanceof Error) {
      return Promise.reject(next);
    }
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.route) {
      return Promise.resolve(this.route(url, params));
    }
    return Promise.reject(new Error(`Unexpected request to ${url}`));
  }
}

/**
 * Routes esearch to `ids` and efetch to the matching fixtures.
 */
export function eutilsRoute(ids: readonly string[], articles: readonly ArticleFixture[]): Route {
  return (url, params) => {
    if (url.endsWith("esearch.fcgi")) {
      return { status: 200, body: esearchJson(ids) };
    }
    const wanted = new Set((params["id"] ?? "").split(","));
    return {
      status: 200,
      body: articleSetXml(articles.filter((article) => wanted.has(article.pmid))),
    };
  };
}

export const SAMPLE_STORY: Story = {
  paragraphs: ["Researchers looked at cats.", "They sat on mats."],
  whatHappensNext: "More mats.",
};

/**
 * Generator returning a fixed story, or failing when `failWith` is set.
 */
export class FakeGenerator implements StoryGenerator {
  readonly requests: StoryRequest[] = [];
  failWith: Error | null = null;

  constructor(private readonly story: Story = SAMPLE_STORY) {}

  generate(request: StoryRequest): Promise<GeneratedStory> {
    this.requests.push(request);
    if (this.failWith) {
      return Promise.reject(this.failWith);
    }
    return Promise.resolve({
      headline: `Headline for ${request.metadata.title}`,
      standfirst: "A short standfirst.",
      story: this.story,
    });
  }
}

/**
 * Deterministic PRNG (mulberry32) for randomized sequences.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Sequential timestamps one second apart.
 */
export function tickingDates(start = Date.UTC(2024, 0, 1)): () => Date {
  let next = start;
  return () => {
    const date = new Date(next);
    next += 1000;
    return date;
  };
}
