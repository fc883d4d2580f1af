/**
 * PubMed literature index: client, parsing and request pacing.
 */

export {
  PubMedClient,
  buildPrimaryResearchQuery,
  EUTILS_BASE_URL,
  MIN_INTERVAL_WITH_KEY_MS,
  MIN_INTERVAL_WITHOUT_KEY_MS,
  type PubMedClientOptions,
  type SearchOptions,
} from "./client.js";
export { parseArticleSet, extractRecord, normalizeDate, normalizeMedlineDate } from "./parser.js";
export { createAxiosTransport, type HttpResponse, type HttpTransport } from "./transport.js";
export { RequestThrottle, systemClock, type Clock } from "./throttle.js";
export { DEFAULT_RETRY_POLICY, backoffDelay, withRetry, type RetryPolicy } from "./retry.js";
