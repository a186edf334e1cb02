/**
 * Claims Fetch Orchestrator
 *
 * Walks the routed backends for one record until a page yields claims:
 * - each backend gets at most `maxAttemptsPerBackend` tries, rotating over
 *   its URL candidates
 * - transient failures (blocks, rate limits, 5xx, timeouts, network) back off
 *   before the next try; other failures settle that URL and move on at once
 * - every try is appended to the attempts log, cache hits included
 *
 * Per-try failures are recorded, never thrown.
 *
 * @module claims-fetcher
 */

import { buildClaimsUrlCandidates } from "./claims-backends";
import { fetchClaimsPage, type FetchPage } from "./claims-http";
import { parseClaimsHtml, type ParsedClaims } from "./claims-parser";
import type { CircuitBreakerConfig, FetchConfig } from "./config-schemas";
import { debugLog } from "./debug";
import { classifyFetchError, isRetriableResult } from "./error-classification";
import type { ClaimsContentCache } from "./evidence-cache";
import {
  isBackendAvailable,
  recordBackendFailure,
  recordBackendSuccess,
  releaseBackendTrial,
} from "./backend-circuit-breaker";
import { sleep } from "./request-pacer";
import { normalizePatentNumber, routeBackends } from "./source-router";
import type {
  ClaimItem,
  ClaimsBackend,
  ClaimsFetchAttempt,
  ClaimsFetchResult,
  ClaimsStatus,
  PriorArtRecord,
} from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface Pacer {
  acquire(backend: ClaimsBackend): Promise<number>;
}

export interface ClaimsFetcherDeps {
  fetchPage: FetchPage;
  parsePage: (html: string) => ParsedClaims;
  cache: ClaimsContentCache | null;
  pacer: Pacer | null;
  sleep: (ms: number) => Promise<void>;
  random: () => number;
  now: () => Date;
}

export interface ClaimsFetcherOptions {
  fetch: FetchConfig;
  circuitBreaker: CircuitBreakerConfig;
}

/** Claims fields produced for one record by the fetch walk. */
export interface RecordClaimsOutcome {
  claims_status: ClaimsStatus;
  claims_error: string;
  claims_source: ClaimsBackend | "";
  claims_page_url: string;
  claims_text: string;
  claims: ClaimItem[];
  claims_fetch_attempts: readonly ClaimsFetchAttempt[];
  claims_skipped_backends: ClaimsBackend[];
  fetched_at: string | null;
}

export const DEFAULT_FETCHER_DEPS: ClaimsFetcherDeps = {
  fetchPage: fetchClaimsPage,
  parsePage: (html) => parseClaimsHtml(html),
  cache: null,
  pacer: null,
  sleep,
  random: Math.random,
  now: () => new Date(),
};

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Delay after the n-th try (1-based) failed transiently.
 */
export function computeBackoffDelay(tryNumber: number, cfg: FetchConfig, random: () => number): number {
  const base = cfg.backoffBaseMs * Math.pow(cfg.backoffMultiplier, tryNumber - 1);
  const factor = 1 + (random() * 2 - 1) * cfg.jitterFraction;
  return Math.max(0, Math.round(base * factor));
}

/**
 * Next URL at or after `cursor` (wrapping) that is not settled; -1 when none.
 */
function nextUrlIndex(urls: string[], settled: Set<string>, cursor: number): number {
  for (let step = 0; step < urls.length; step++) {
    const idx = (cursor + step) % urls.length;
    if (!settled.has(urls[idx])) return idx;
  }
  return -1;
}

function isOkResult(result: ClaimsFetchResult): boolean {
  return result === "ok" || result === "ok_fallback";
}

// ============================================================================
// ORCHESTRATION
// ============================================================================

export async function fetchClaimsForRecord(
  record: Pick<PriorArtRecord, "patent_number" | "url">,
  options: ClaimsFetcherOptions,
  deps: ClaimsFetcherDeps = DEFAULT_FETCHER_DEPS,
): Promise<RecordClaimsOutcome> {
  const cfg = options.fetch;
  const pn = normalizePatentNumber(record.patent_number);
  const documentId = pn || (record.url ?? "").trim();

  let attempts: readonly ClaimsFetchAttempt[] = [];
  const skipped: ClaimsBackend[] = [];
  let lastResult: ClaimsFetchResult | null = null;
  let lastError = "";

  for (const backend of routeBackends(record, cfg.backendSelection)) {
    const urls = buildClaimsUrlCandidates(record, backend);
    if (urls.length === 0) continue;

    if (!isBackendAvailable(backend, options.circuitBreaker)) {
      skipped.push(backend);
      continue;
    }

    const settled = new Set<string>();
    let cursor = 0;
    let lastWasTransient = false;

    for (let tryNumber = 1; tryNumber <= cfg.maxAttemptsPerBackend; tryNumber++) {
      const idx = nextUrlIndex(urls, settled, cursor);
      if (idx < 0) break;
      const url = urls[idx];
      cursor = idx + 1;

      if (lastWasTransient) {
        await deps.sleep(computeBackoffDelay(tryNumber - 1, cfg, deps.random));
      }

      const attemptedAt = deps.now().toISOString();
      let html: string | null = null;
      let fromCache = false;

      if (deps.cache && !cfg.force) {
        html = await deps.cache.get(documentId, backend, url);
        fromCache = html !== null;
      }

      if (html === null) {
        try {
          if (deps.pacer) await deps.pacer.acquire(backend);
          html = await deps.fetchPage(url, { timeoutMs: cfg.timeoutMs, userAgent: cfg.userAgent });
        } catch (err) {
          const classified = classifyFetchError(err);
          attempts = [
            ...attempts,
            {
              source: backend,
              url,
              attempt: tryNumber,
              result: classified.result,
              claims_count: null,
              http_status: classified.httpStatus,
              from_cache: false,
              error: classified.message,
              attempted_at: attemptedAt,
            },
          ];
          lastResult = classified.result;
          lastError = classified.message;
          lastWasTransient = isRetriableResult(classified.result, classified.httpStatus);
          if (!lastWasTransient) settled.add(url);
          continue;
        }
        if (deps.cache) {
          await deps.cache.put(documentId, backend, url, html);
        }
      }

      let parsed: ParsedClaims;
      try {
        parsed = deps.parsePage(html);
      } catch (err) {
        const message = `parse failed: ${err instanceof Error ? err.message : String(err)}`;
        attempts = [
          ...attempts,
          {
            source: backend,
            url,
            attempt: tryNumber,
            result: "error",
            claims_count: null,
            http_status: null,
            from_cache: fromCache,
            error: message,
            attempted_at: attemptedAt,
          },
        ];
        lastResult = "error";
        lastError = message;
        lastWasTransient = false;
        settled.add(url);
        continue;
      }
      attempts = [
        ...attempts,
        {
          source: backend,
          url,
          attempt: tryNumber,
          result: parsed.result,
          claims_count: parsed.claims.length,
          http_status: null,
          from_cache: fromCache,
          error: isOkResult(parsed.result) ? null : "claims section not found",
          attempted_at: attemptedAt,
        },
      ];
      lastResult = parsed.result;

      if (parsed.result === "ok" || parsed.result === "ok_fallback") {
        recordBackendSuccess(backend, options.circuitBreaker);
        debugLog(`[Claims-Fetch] ${documentId}: ${parsed.result} via ${backend}`, {
          url,
          claims: parsed.claims.length,
          attempts: attempts.length,
        });
        return {
          claims_status: parsed.result,
          claims_error: "",
          claims_source: backend,
          claims_page_url: url,
          claims_text: parsed.text,
          claims: parsed.claims,
          claims_fetch_attempts: attempts,
          claims_skipped_backends: skipped,
          fetched_at: deps.now().toISOString(),
        };
      }

      lastError = "claims section not found";
      lastWasTransient = false;
      settled.add(url);
    }

    if (lastWasTransient) {
      recordBackendFailure(backend, options.circuitBreaker, lastError);
    } else {
      releaseBackendTrial(backend);
    }
    console.warn(`[Claims-Fetch] ${documentId}: ${backend} exhausted (last: ${lastResult ?? "none"})`);
  }

  if (lastResult === null) {
    const allSkipped = skipped.length > 0;
    return {
      claims_status: allSkipped ? "backends_unavailable" : "missing_patent_number_or_url",
      claims_error: allSkipped
        ? `all backends skipped by circuit breaker: ${skipped.join(", ")}`
        : "no patent number or usable URL",
      claims_source: "",
      claims_page_url: "",
      claims_text: "",
      claims: [],
      claims_fetch_attempts: attempts,
      claims_skipped_backends: skipped,
      fetched_at: null,
    };
  }

  debugLog(`[Claims-Fetch] ${documentId}: failed (${lastResult})`, { attempts: attempts.length, skipped });
  return {
    claims_status: lastResult,
    claims_error: lastError,
    claims_source: "",
    claims_page_url: "",
    claims_text: "",
    claims: [],
    claims_fetch_attempts: attempts,
    claims_skipped_backends: skipped,
    fetched_at: deps.now().toISOString(),
  };
}
