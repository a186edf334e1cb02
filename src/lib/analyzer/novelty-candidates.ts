/**
 * Novelty Candidate Analyzer
 *
 * Aggregates matrix labels per feature and per feature pair. Every ratio
 * uses the same denominator: the number of evaluated documents (min 1).
 *
 * @module analyzer/novelty-candidates
 */

import type { MatrixConfig } from "../config-schemas";
import type { InventionFeature, MatrixCell, NoveltyCandidate, PairCandidate } from "../types";
import { roundTo } from "./feature-matching";

const PAIR_NOTE =
  "Each feature appears across the compared documents, but rarely together (candidate novelty combination).";

type LabelMatrix = ReadonlyArray<ReadonlyArray<Pick<MatrixCell, "label">>>;

function documentCount(matrix: LabelMatrix): number {
  return Math.max(1, matrix.length);
}

export interface FeatureLabelCounts {
  yes: number;
  partial: number;
  no: number;
}

export function countFeatureLabels(matrix: LabelMatrix, featureIndex: number): FeatureLabelCounts {
  const counts: FeatureLabelCounts = { yes: 0, partial: 0, no: 0 };
  for (const row of matrix) {
    const cell = row[featureIndex];
    if (!cell) continue;
    if (cell.label === "YES") counts.yes++;
    else if (cell.label === "PARTIAL") counts.partial++;
    else counts.no++;
  }
  return counts;
}

export function buildNoveltyCandidates(
  features: readonly InventionFeature[],
  matrix: LabelMatrix,
  cfg: Pick<MatrixConfig, "minNoRatio" | "maxNoveltyCandidates">,
): NoveltyCandidate[] {
  const nDocs = documentCount(matrix);

  return features
    .map((feature, fi) => {
      const counts = countFeatureLabels(matrix, fi);
      return {
        noRatio: counts.no / nDocs,
        partialRatio: counts.partial / nDocs,
        candidate: {
          feature_id: feature.id,
          feature: feature.text,
          no_ratio: roundTo(counts.no / nDocs),
          partial_ratio: roundTo(counts.partial / nDocs),
          yes_count: counts.yes,
          partial_count: counts.partial,
          no_count: counts.no,
        },
      };
    })
    .filter((entry) => entry.noRatio >= cfg.minNoRatio)
    .sort((a, b) => b.noRatio - a.noRatio || b.partialRatio - a.partialRatio)
    .slice(0, cfg.maxNoveltyCandidates)
    .map((entry) => entry.candidate);
}

export interface PairStats {
  union: number;
  co: number;
  unionRatio: number;
  coRatio: number;
}

/**
 * Union: documents where at least one of the two features is YES.
 * Co-occurrence: documents where both are YES. Symmetric in (i, j).
 */
export function computePairStats(matrix: LabelMatrix, i: number, j: number): PairStats {
  let union = 0;
  let co = 0;
  for (const row of matrix) {
    const a = row[i]?.label === "YES";
    const b = row[j]?.label === "YES";
    if (a || b) union++;
    if (a && b) co++;
  }
  const nDocs = documentCount(matrix);
  return { union, co, unionRatio: union / nDocs, coRatio: co / nDocs };
}

export function buildPairCandidates(
  features: readonly InventionFeature[],
  matrix: LabelMatrix,
  cfg: Pick<MatrixConfig, "minUnionRatio" | "maxCoRatio" | "maxPairCandidates">,
): PairCandidate[] {
  const scored: Array<{ stats: PairStats; candidate: PairCandidate }> = [];

  for (let i = 0; i < features.length; i++) {
    for (let j = i + 1; j < features.length; j++) {
      const stats = computePairStats(matrix, i, j);
      if (stats.unionRatio < cfg.minUnionRatio || stats.coRatio > cfg.maxCoRatio) continue;
      scored.push({
        stats,
        candidate: {
          pair: [features[i].id, features[j].id],
          features: [features[i].text, features[j].text],
          union_ratio: roundTo(stats.unionRatio),
          co_ratio: roundTo(stats.coRatio),
          note: PAIR_NOTE,
        },
      });
    }
  }

  return scored
    .sort((a, b) => b.stats.unionRatio - a.stats.unionRatio || a.stats.coRatio - b.stats.coRatio)
    .slice(0, cfg.maxPairCandidates)
    .map((entry) => entry.candidate);
}
