/**
 * Matrix Builder
 *
 * Feature × document comparison, claims first:
 * - each cell scores the feature against the claims text and the abstract
 * - `score_best` is the stronger of the two and drives the label
 * - non-NO cells carry snippets from the text they matched in
 *
 * @module analyzer/matrix-builder
 */

import type { MatrixConfig } from "../config-schemas";
import { normalizePatentNumber } from "../source-router";
import type {
  ClaimsStatus,
  InventionFeature,
  MatrixCell,
  MatrixDocument,
  TopPriorArt,
} from "../types";
import {
  extractSnippets,
  labelForScore,
  roundTo,
  scoreTokensInText,
  tokenizeFeature,
} from "./feature-matching";
import type { MatrixLexicon } from "./lexicon";

/** Tokens kept on each cell for display */
const CELL_TOKEN_LIMIT = 12;

export class FeatureProfileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FeatureProfileError";
  }
}

export interface MatrixInputRecord {
  source: string;
  patent_number: string;
  title: string;
  url: string;
  abstract: string;
  claims_status: ClaimsStatus;
  claims_text: string;
}

export type RawFeature = string | { id?: string; text: string; evidence_ids?: string[] };

export interface TokenizedFeature extends InventionFeature {
  tokens: string[];
}

// ============================================================================
// INPUT NORMALIZATION
// ============================================================================

/**
 * Normalize profile features: empty texts dropped, missing ids become F{n},
 * at most `maxFeatures` kept. Fewer than `minFeatures` or a duplicate id is
 * an error.
 */
export function normalizeFeatures(
  raw: readonly RawFeature[],
  cfg: Pick<MatrixConfig, "minFeatures" | "maxFeatures">,
): InventionFeature[] {
  const features: InventionFeature[] = [];
  for (const item of raw) {
    const text = (typeof item === "string" ? item : item.text).trim();
    if (!text) continue;
    const givenId = typeof item === "string" ? "" : (item.id ?? "").trim();
    features.push({
      id: givenId || `F${features.length + 1}`,
      text,
      evidence_ids: typeof item === "string" ? [] : [...(item.evidence_ids ?? [])],
    });
  }

  if (features.length < cfg.minFeatures) {
    throw new FeatureProfileError(
      `profile.key_features must have at least ${cfg.minFeatures} non-empty features (got ${features.length})`,
    );
  }

  if (features.length > cfg.maxFeatures) {
    console.warn(`[Matrix-Builder] Using first ${cfg.maxFeatures} of ${features.length} features`);
  }
  const kept = features.slice(0, cfg.maxFeatures);

  const seen = new Set<string>();
  for (const f of kept) {
    if (seen.has(f.id)) {
      throw new FeatureProfileError(`duplicate feature id: ${f.id}`);
    }
    seen.add(f.id);
  }
  return kept;
}

/**
 * First `maxDocs` records, one per patent number (URL when there is none).
 * Records with neither cannot be told apart and are skipped.
 */
export function selectMatrixDocuments<R extends Pick<MatrixInputRecord, "patent_number" | "url">>(
  records: readonly R[],
  maxDocs: number,
): R[] {
  const seen = new Set<string>();
  const out: R[] = [];
  let unkeyed = 0;
  for (const record of records) {
    const key = normalizePatentNumber(record.patent_number) || record.url.trim();
    if (!key) {
      unkeyed++;
      continue;
    }
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(record);
    if (out.length >= Math.max(1, maxDocs)) break;
  }
  if (unkeyed > 0) {
    console.warn(`[Novelty-Matrix] Skipped ${unkeyed} record(s) with neither patent number nor URL`);
  }
  return out;
}

export function tokenizeFeatures(features: readonly InventionFeature[], lexicon: MatrixLexicon): TokenizedFeature[] {
  return features.map((f) => ({ ...f, tokens: tokenizeFeature(f.text, lexicon) }));
}

export function toMatrixDocument(record: MatrixInputRecord): MatrixDocument {
  return {
    source: record.source,
    patent_number: record.patent_number,
    title: record.title,
    url: record.url,
    abstract: record.abstract,
    claims_status: record.claims_status,
  };
}

// ============================================================================
// CELLS
// ============================================================================

export interface ScoredCell {
  cell: MatrixCell;
  /** Unrounded best score, used for document ranking */
  best: number;
}

export function buildMatrixCell(
  record: Pick<MatrixInputRecord, "patent_number" | "abstract" | "claims_text">,
  feature: TokenizedFeature,
  cfg: MatrixConfig,
): ScoredCell {
  const claimsText = record.claims_text ?? "";
  const abstract = record.abstract ?? "";

  const scoreClaims = scoreTokensInText(feature.tokens, claimsText.toLowerCase());
  const scoreAbstract = scoreTokensInText(feature.tokens, abstract.toLowerCase());
  const best = Math.max(scoreClaims, scoreAbstract);
  const label = labelForScore(best, cfg);

  let matchedIn: MatrixCell["matched_in"] = null;
  if (best > 0) {
    matchedIn = claimsText && scoreClaims >= scoreAbstract ? "claims" : "abstract";
  }

  const snippetSource = matchedIn === "abstract" ? abstract : claimsText || abstract;
  const snippets =
    label === "NO" ? [] : extractSnippets(snippetSource, feature.tokens, cfg.maxSnippets, cfg.snippetWindow);

  return {
    best,
    cell: {
      feature_id: feature.id,
      patent_number: record.patent_number,
      feature: feature.text,
      tokens: feature.tokens.slice(0, CELL_TOKEN_LIMIT),
      score_claims: roundTo(scoreClaims),
      score_abstract: roundTo(scoreAbstract),
      score_best: roundTo(best),
      label,
      matched_in: matchedIn,
      evidence_snippets: snippets,
    },
  };
}

export function buildMatrixRow(
  record: MatrixInputRecord,
  features: readonly TokenizedFeature[],
  cfg: MatrixConfig,
): { cells: MatrixCell[]; overall: number } {
  const cells: MatrixCell[] = [];
  let overall = 0;
  for (const feature of features) {
    const scored = buildMatrixCell(record, feature, cfg);
    cells.push(scored.cell);
    overall += scored.best;
  }
  return { cells, overall };
}

/**
 * Documents ranked by summed best score (ties keep input order).
 */
export function rankTopPriorArt(
  documents: readonly MatrixDocument[],
  overallScores: readonly number[],
  count: number,
): TopPriorArt[] {
  return documents
    .map((doc, index) => ({ doc, index, score: overallScores[index] ?? 0 }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, count)
    .map(({ doc, score }) => ({ ...doc, overall_match: roundTo(score) }));
}
