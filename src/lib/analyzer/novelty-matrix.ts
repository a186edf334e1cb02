/**
 * Novelty Matrix
 *
 * Builds the full comparison report from an invention profile and the
 * enriched prior art: quality gate, matrix, top prior art, single-feature
 * and pair candidates. Heuristic signals only, not a legal conclusion.
 *
 * @module analyzer/novelty-matrix
 */

import type { MatrixConfig } from "../config-schemas";
import { debugLog } from "../debug";
import type { MatrixCell, NoveltyMatrixReport } from "../types";
import { getMatrixLexicon, type MatrixLexicon } from "./lexicon";
import {
  buildMatrixRow,
  normalizeFeatures,
  rankTopPriorArt,
  selectMatrixDocuments,
  toMatrixDocument,
  tokenizeFeatures,
  type MatrixInputRecord,
  type RawFeature,
} from "./matrix-builder";
import { buildNoveltyCandidates, buildPairCandidates } from "./novelty-candidates";
import { enforceClaimsQualityGate, evaluateClaimsQualityGate } from "./quality-gate";

export const MATRIX_REPORT_NOTE =
  "Heuristic token-overlap comparison (claims first, abstract as fallback). " +
  "Signals for drafting and review only; not a legal novelty or inventiveness conclusion.";

export interface BuildNoveltyMatrixInput {
  keyFeatures: readonly RawFeature[];
  records: readonly MatrixInputRecord[];
  config: MatrixConfig;
  lexicon?: MatrixLexicon;
}

/**
 * Throws FeatureProfileError for an unusable profile and QualityGateError
 * when the gate fails under `failOnLowClaims`.
 */
export function buildNoveltyMatrix(input: BuildNoveltyMatrixInput): NoveltyMatrixReport {
  const { config } = input;
  const lexicon = input.lexicon ?? getMatrixLexicon();

  const features = tokenizeFeatures(normalizeFeatures(input.keyFeatures, config), lexicon);
  const records = selectMatrixDocuments(input.records, config.maxDocs);

  const qualityGate = evaluateClaimsQualityGate(records, config.minClaimsOkRatio);
  enforceClaimsQualityGate(qualityGate, config.failOnLowClaims);

  const documents = records.map(toMatrixDocument);
  const matrix: MatrixCell[][] = [];
  const overall: number[] = [];
  for (const record of records) {
    const row = buildMatrixRow(record, features, config);
    matrix.push(row.cells);
    overall.push(row.overall);
  }

  const report: NoveltyMatrixReport = {
    feature_ids: features.map((f) => f.id),
    features: features.map((f) => f.text),
    documents,
    quality_gate: qualityGate,
    top_prior_art: rankTopPriorArt(documents, overall, config.topPriorArtCount),
    matrix,
    novelty_candidates: buildNoveltyCandidates(features, matrix, config),
    pair_candidates: buildPairCandidates(features, matrix, config),
    note: MATRIX_REPORT_NOTE,
  };

  debugLog("[Novelty-Matrix] Built", {
    features: report.feature_ids.length,
    documents: documents.length,
    noveltyCandidates: report.novelty_candidates.length,
    pairCandidates: report.pair_candidates.length,
  });

  return report;
}
