/**
 * Source Router
 *
 * Maps a document's jurisdiction to the ordered list of claims backends to
 * try. Ordering reflects per-jurisdiction availability: the backend most
 * likely to serve the full claims text for that office comes first.
 *
 * @module source-router
 */

import { CLAIMS_BACKENDS, type ClaimsBackend, type PriorArtRecord } from "./types";

export type BackendSelection = "auto" | readonly string[];

const DEFAULT_BACKEND_ORDER: readonly ClaimsBackend[] = ["google", "espacenet", "cnipa", "lens"];

const EPO_ORDER: readonly ClaimsBackend[] = ["espacenet", "google", "lens", "cnipa"];
const AGGREGATOR_FIRST_ORDER: readonly ClaimsBackend[] = ["google", "espacenet", "lens", "cnipa"];

/**
 * Jurisdiction → backend preference. Anything not listed uses DEFAULT_BACKEND_ORDER.
 */
export const BACKEND_ORDER_BY_JURISDICTION: Readonly<Record<string, readonly ClaimsBackend[]>> = {
  CN: ["cnipa", "google", "espacenet", "lens"],
  EP: EPO_ORDER,
  WO: EPO_ORDER,
  US: AGGREGATOR_FIRST_ORDER,
  JP: AGGREGATOR_FIRST_ORDER,
  KR: AGGREGATOR_FIRST_ORDER,
  DE: AGGREGATOR_FIRST_ORDER,
  FR: AGGREGATOR_FIRST_ORDER,
  GB: AGGREGATOR_FIRST_ORDER,
};

export function normalizePatentNumber(pn: unknown): string {
  if (pn === null || pn === undefined) return "";
  return String(pn).trim().toUpperCase();
}

/**
 * Two-letter office code prefix of a patent number ("" when absent).
 */
export function patentJurisdiction(pn: string): string {
  const match = /^([A-Z]{2})/.exec(normalizePatentNumber(pn));
  return match ? match[1] : "";
}

export function isClaimsBackend(name: string): name is ClaimsBackend {
  return CLAIMS_BACKENDS.some((b) => b === name);
}

/**
 * Ordered backends for a record.
 *
 * An explicit selection keeps its order, drops unknown names and falls back
 * to Google Patents when nothing usable remains.
 */
export function routeBackends(
  record: Pick<PriorArtRecord, "patent_number">,
  selection: BackendSelection = "auto",
): ClaimsBackend[] {
  if (selection !== "auto") {
    const selected: ClaimsBackend[] = [];
    for (const raw of selection) {
      const name = raw.trim().toLowerCase();
      if (isClaimsBackend(name) && !selected.includes(name)) {
        selected.push(name);
      }
    }
    return selected.length > 0 ? selected : ["google"];
  }

  const jurisdiction = patentJurisdiction(record.patent_number);
  return [...(BACKEND_ORDER_BY_JURISDICTION[jurisdiction] ?? DEFAULT_BACKEND_ORDER)];
}

// ============================================================================
// TOP-K SELECTION
// ============================================================================

/**
 * Sort key: records with a patent number, then a direct Google Patents page,
 * then a Google Patents source come first.
 */
function claimabilityScore(record: Pick<PriorArtRecord, "patent_number" | "url" | "source">): number {
  const hasPn = normalizePatentNumber(record.patent_number) ? 4 : 0;
  const googleUrl = (record.url ?? "").toLowerCase().includes("patents.google.com/patent/") ? 2 : 0;
  const googleSource = (record.source ?? "").trim().toLowerCase() === "google patents" ? 1 : 0;
  return hasPn + googleUrl + googleSource;
}

/**
 * De-duplicate on patent number (URL when absent), drop records with
 * neither, order by claimability (stable) and keep the first `topK`.
 */
export function selectClaimableTopK<R extends Pick<PriorArtRecord, "patent_number" | "url" | "source">>(
  records: readonly R[],
  topK: number,
): R[] {
  const seen = new Set<string>();
  const unique: R[] = [];
  for (const record of records) {
    const key = normalizePatentNumber(record.patent_number) || (record.url ?? "").trim();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    unique.push(record);
  }
  return unique
    .map((record, index) => ({ record, index, score: claimabilityScore(record) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, Math.max(1, topK))
    .map((entry) => entry.record);
}
