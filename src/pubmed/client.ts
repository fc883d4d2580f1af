/**
 * PubMed E-utilities client.
 *
 * A search is two calls: esearch returns the ordered PMIDs for a term, then
 * efetch returns article XML for those PMIDs in batches. Results stream out
 * lazily as RecordOrSkipped values; nothing is cached here.
 *
 * All requests from one client share a single throttle, so the NCBI ceiling
 * (3 req/s, or ~9 req/s with an API key) is respected locally instead of
 * waiting for the service to push back.
 */

import { z } from "zod";
import { FetchError } from "../errors.js";
import { createQuietLogger, type Logger } from "../logging/index.js";
import {
  isRecord,
  normalizeSearchTerm,
  type CanonicalRecord,
  type RecordOrSkipped,
} from "../records/schema.js";
import { parseArticleSet } from "./parser.js";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "./retry.js";
import { RequestThrottle, systemClock, type Clock } from "./throttle.js";
import { createAxiosTransport, type HttpResponse, type HttpTransport } from "./transport.js";
import { XmlPayloadError } from "./xml.js";

export const EUTILS_BASE_URL = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/";

export const MIN_INTERVAL_WITHOUT_KEY_MS = 1000 / 3;
export const MIN_INTERVAL_WITH_KEY_MS = 110;

/** Publication types that mark primary research. */
const INCLUDED_PUBLICATION_TYPES = [
  "Clinical Trial",
  "Randomized Controlled Trial",
  "Controlled Clinical Trial",
  "Clinical Trial, Phase I",
  "Clinical Trial, Phase II",
  "Clinical Trial, Phase III",
  "Clinical Trial, Phase IV",
  "Observational Study",
  "Comparative Study",
  "Multicenter Study",
  "Evaluation Study",
  "Validation Study",
];

const EXCLUDED_PUBLICATION_TYPES = [
  "Review",
  "Systematic Review",
  "Meta-Analysis",
  "Editorial",
  "Letter",
  "Comment",
  "Guideline",
  "Practice Guideline",
  "Clinical Trial Protocol",
  "Preprint",
];

const ESearchResponseSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()),
  }),
});

export interface PubMedClientOptions {
  /** Contact email; NCBI requires one per tool */
  email: string;
  tool?: string;
  apiKey?: string;
  /** Per-request timeout */
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  /** PMIDs per efetch call */
  batchSize?: number;
  baseUrl?: string;
  transport?: HttpTransport;
  clock?: Clock;
  logger?: Logger;
}

export interface SearchOptions {
  /** Maximum PMIDs requested from esearch */
  retmax?: number;
}

/**
 * Build the esearch term restricting a free-text query to primary research.
 */
export function buildPrimaryResearchQuery(term: string): string {
  const include = INCLUDED_PUBLICATION_TYPES.map((pt) => `"${pt}"[pt]`).join(" OR ");
  const exclude = EXCLUDED_PUBLICATION_TYPES.map((pt) => `"${pt}"[pt]`).join(" OR ");
  return `(${term}) AND "journal article"[pt] AND (${include}) NOT (${exclude})`;
}

function unique(ids: readonly string[]): string[] {
  return [...new Set(ids.map((id) => id.trim()).filter(Boolean))];
}

export class PubMedClient {
  private readonly tool: string;
  private readonly timeoutMs: number;
  private readonly batchSize: number;
  private readonly baseUrl: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly transport: HttpTransport;
  private readonly clock: Clock;
  private readonly throttle: RequestThrottle;
  private readonly logger: Logger;

  constructor(private readonly options: PubMedClientOptions) {
    this.tool = options.tool ?? "abstract_newsroom";
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.batchSize = options.batchSize ?? 100;
    this.baseUrl = options.baseUrl ?? EUTILS_BASE_URL;
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.transport = options.transport ?? createAxiosTransport();
    this.clock = options.clock ?? systemClock;
    this.throttle = new RequestThrottle(
      options.apiKey ? MIN_INTERVAL_WITH_KEY_MS : MIN_INTERVAL_WITHOUT_KEY_MS,
      this.clock
    );
    this.logger = options.logger ?? createQuietLogger("pubmed");
  }

  /** Minimum spacing between outbound requests. */
  get minIntervalMs(): number {
    return this.throttle.minIntervalMs;
  }

  /**
   * Stream normalized results for a search term, in esearch order.
   * Each call starts a fresh search; PMIDs are fetched one batch at a time
   * as the consumer pulls.
   */
  async *search(term: string, options: SearchOptions = {}): AsyncGenerator<RecordOrSkipped> {
    const ids = await this.searchIds(term, options.retmax);
    for (let i = 0; i < ids.length; i += this.batchSize) {
      yield* await this.fetchBatch(ids.slice(i, i + this.batchSize));
    }
  }

  /**
   * Stream only the eligible records for a search term.
   */
  async *records(term: string, options: SearchOptions = {}): AsyncGenerator<CanonicalRecord> {
    for await (const item of this.search(term, options)) {
      if (isRecord(item)) {
        yield item.record;
      }
    }
  }

  /**
   * Ordered, de-duplicated PMIDs matching a term. Blank terms match nothing.
   */
  async searchIds(term: string, retmax = 20): Promise<string[]> {
    const normalized = normalizeSearchTerm(term);
    if (!normalized) {
      return [];
    }
    const body = await this.get("esearch.fcgi", {
      db: "pubmed",
      term: buildPrimaryResearchQuery(normalized),
      retmax: String(retmax),
      retmode: "json",
    });

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (err) {
      throw new FetchError("esearch returned invalid JSON", false, 200, { cause: err });
    }
    const parsed = ESearchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new FetchError("esearch response has no idlist", false, 200);
    }
    const ids = unique(parsed.data.esearchresult.idlist);
    this.logger.debug("esearch complete", { term: normalized, count: ids.length });
    return ids;
  }

  /**
   * Fetch and normalize explicit PMIDs, batching as configured.
   */
  async fetchRecords(ids: readonly string[]): Promise<RecordOrSkipped[]> {
    const wanted = unique(ids);
    const results: RecordOrSkipped[] = [];
    for (let i = 0; i < wanted.length; i += this.batchSize) {
      results.push(...(await this.fetchBatch(wanted.slice(i, i + this.batchSize))));
    }
    return results;
  }

  /**
   * One efetch call. Output follows the requested order; PMIDs absent from
   * the response come back as skipped with reason "missing".
   */
  private async fetchBatch(ids: readonly string[]): Promise<RecordOrSkipped[]> {
    if (ids.length === 0) {
      return [];
    }
    const body = await this.get("efetch.fcgi", {
      db: "pubmed",
      id: ids.join(","),
      retmode: "xml",
    });

    let parsed: RecordOrSkipped[];
    try {
      parsed = parseArticleSet(body);
    } catch (err) {
      if (err instanceof XmlPayloadError) {
        throw new FetchError(`efetch returned malformed XML: ${err.message}`, false, 200, {
          cause: err,
        });
      }
      throw err;
    }

    const byId = new Map<string, RecordOrSkipped>();
    for (const item of parsed) {
      const id = isRecord(item) ? item.record.pmid : item.id;
      byId.set(id, item);
    }

    return ids.map((id): RecordOrSkipped => {
      const item = byId.get(id);
      if (item === undefined) {
        return { kind: "skipped", id, reason: "missing", missingFields: [] };
      }
      if (!isRecord(item)) {
        this.logger.debug("Skipping ineligible record", {
          pmid: id,
          reason: item.reason,
          missingFields: item.missingFields,
        });
      }
      return item;
    });
  }

  private buildParams(extra: Record<string, string>): Record<string, string> {
    const params: Record<string, string> = { tool: this.tool, email: this.options.email };
    if (this.options.apiKey) {
      params["api_key"] = this.options.apiKey;
    }
    return { ...params, ...extra };
  }

  /**
   * Throttled GET with bounded retry. Resolves with the response body.
   */
  private get(endpoint: string, extra: Record<string, string>): Promise<string> {
    const url = this.baseUrl + endpoint;
    const params = this.buildParams(extra);

    return withRetry(
      () => this.throttle.schedule(() => this.attempt(endpoint, url, params)),
      this.retryPolicy,
      this.clock,
      (error, retry, delayMs) => {
        this.logger.warn("PubMed request failed, retrying", {
          endpoint,
          retry,
          delayMs,
          status: error.status,
          error: error.message,
        });
      }
    );
  }

  private async attempt(
    endpoint: string,
    url: string,
    params: Record<string, string>
  ): Promise<string> {
    let response: HttpResponse;
    try {
      response = await this.transport.get(url, params, this.timeoutMs);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new FetchError(`${endpoint} request failed: ${reason}`, true, undefined, {
        cause: err,
      });
    }

    const { status, body } = response;
    if (status >= 200 && status < 300) {
      return body;
    }
    const transient = status === 429 || status >= 500;
    throw new FetchError(`${endpoint} returned HTTP ${status}`, transient, status);
  }
}
