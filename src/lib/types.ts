/**
 * Prior-Art Claims Matrix - Shared Types
 *
 * Record shapes flowing through claims enrichment (fetch → manual merge)
 * and the feature-by-document comparison matrix.
 *
 * Field names are snake_case because they are the on-disk JSON contract
 * shared with the upstream recall step and the downstream drafting step.
 *
 * @module types
 */

// ============================================================================
// BACKENDS & STATUSES
// ============================================================================

export const CLAIMS_BACKENDS = ["google", "espacenet", "cnipa", "lens"] as const;
export type ClaimsBackend = (typeof CLAIMS_BACKENDS)[number];

/**
 * Outcome tag of a single fetch try against one backend URL.
 */
export const CLAIMS_FETCH_RESULTS = [
  "ok",
  "ok_fallback",
  "claims_section_not_found",
  "fetch_blocked_403",
  "fetch_blocked_412",
  "fetch_blocked_503",
  "fetch_failed_429",
  "fetch_failed_http",
  "fetch_timeout",
  "fetch_failed_network",
  "error",
] as const;
export type ClaimsFetchResult = (typeof CLAIMS_FETCH_RESULTS)[number];

/**
 * Record-level claims status. Every fetch result is also a valid status
 * (a record that exhausts all backends keeps its last result).
 */
export const CLAIMS_STATUSES = [
  ...CLAIMS_FETCH_RESULTS,
  "manual_ok",
  "missing_patent_number_or_url",
  "backends_unavailable",
  "rejected_source",
] as const;
export type ClaimsStatus = (typeof CLAIMS_STATUSES)[number];

/** Statuses that count as usable claims and are never re-fetched on resume. */
export const CLAIMS_OK_STATUSES: ReadonlySet<string> = new Set<ClaimsStatus>([
  "ok",
  "ok_fallback",
  "manual_ok",
]);

export function isClaimsOkStatus(status: string): boolean {
  return CLAIMS_OK_STATUSES.has(status);
}

export const MANUAL_CLAIMS_SOURCE_TYPES = [
  "google_patents",
  "office_portal",
  "pdf_copy",
  "freepatentsonline",
] as const;
export type ManualClaimsSourceType = (typeof MANUAL_CLAIMS_SOURCE_TYPES)[number];

// ============================================================================
// RECORDS
// ============================================================================

export interface PriorArtRecord {
  source: string;
  patent_number: string;
  title: string;
  abstract: string;
  url: string;
  query: string;
  query_index: number | null;
  similarity_score: number | null;
}

export interface ClaimItem {
  num: string | null;
  text: string;
}

export interface ClaimsFetchAttempt {
  source: ClaimsBackend;
  url: string;
  /** 1-based try number within this backend */
  attempt: number;
  result: ClaimsFetchResult;
  claims_count: number | null;
  http_status: number | null;
  from_cache: boolean;
  error: string | null;
  attempted_at: string;
}

export interface EnrichedPriorArtRecord extends PriorArtRecord {
  claims_status: ClaimsStatus;
  claims_error: string;
  claims_source: ClaimsBackend | "manual" | "";
  claims_source_type?: ManualClaimsSourceType;
  claims_page_url: string;
  claims_text: string;
  claims: ClaimItem[];
  claims_fetch_attempts: readonly ClaimsFetchAttempt[];
  claims_skipped_backends: ClaimsBackend[];
  fetched_at: string | null;
}

export interface ManualClaimsEntry {
  patent_number: string;
  claims_text?: string;
  claims?: Array<ClaimItem | string>;
  claims_source_url?: string;
  claims_source_type?: string;
}

// ============================================================================
// MATRIX
// ============================================================================

export interface InventionFeature {
  id: string;
  text: string;
  evidence_ids: string[];
}

export type MatrixLabel = "YES" | "PARTIAL" | "NO";

export interface MatrixCell {
  feature_id: string;
  patent_number: string;
  feature: string;
  tokens: string[];
  score_claims: number;
  score_abstract: number;
  score_best: number;
  label: MatrixLabel;
  matched_in: "claims" | "abstract" | null;
  evidence_snippets: string[];
}

export interface MatrixDocument {
  source: string;
  patent_number: string;
  title: string;
  url: string;
  abstract: string;
  claims_status: ClaimsStatus;
}

export interface TopPriorArt extends MatrixDocument {
  overall_match: number;
}

export interface NoveltyCandidate {
  feature_id: string;
  feature: string;
  no_ratio: number;
  partial_ratio: number;
  yes_count: number;
  partial_count: number;
  no_count: number;
}

export interface PairCandidate {
  pair: [string, string];
  features: [string, string];
  union_ratio: number;
  co_ratio: number;
  note: string;
}

export interface QualityGateReport {
  claims_ok: number;
  claims_total: number;
  claims_ok_ratio: number;
  claims_status_counts: Record<string, number>;
  min_claims_ok_ratio: number;
  pass: boolean;
}

export interface NoveltyMatrixReport {
  feature_ids: string[];
  features: string[];
  documents: MatrixDocument[];
  quality_gate: QualityGateReport;
  top_prior_art: TopPriorArt[];
  /** Rows per document, cells per feature (same order as feature_ids) */
  matrix: MatrixCell[][];
  novelty_candidates: NoveltyCandidate[];
  pair_candidates: PairCandidate[];
  note: string;
}
