/**
 * Claims Quality Gate
 *
 * Share of requested records whose claims are usable (ok, ok_fallback or
 * manual_ok). Checked after enrichment and again before the matrix is built.
 *
 * @module analyzer/quality-gate
 */

import { isClaimsOkStatus, type ClaimsStatus, type QualityGateReport } from "../types";

export class QualityGateError extends Error {
  constructor(public readonly report: QualityGateReport) {
    super(
      `claims quality gate failed: ${report.claims_ok}/${report.claims_total}=${report.claims_ok_ratio.toFixed(3)} ` +
        `< min ${report.min_claims_ok_ratio.toFixed(3)}`,
    );
    this.name = "QualityGateError";
  }
}

/**
 * Evaluate the gate over `records` (the requested top-K, nothing else).
 * The ratio is exact; an empty list has ratio 0.
 */
export function evaluateClaimsQualityGate(
  records: ReadonlyArray<{ claims_status: ClaimsStatus | string }>,
  minClaimsOkRatio: number,
): QualityGateReport {
  const counts: Record<string, number> = {};
  let ok = 0;
  for (const record of records) {
    const status = record.claims_status || "unknown";
    counts[status] = (counts[status] ?? 0) + 1;
    if (isClaimsOkStatus(status)) ok++;
  }

  const total = records.length;
  const ratio = total > 0 ? ok / total : 0;

  return {
    claims_ok: ok,
    claims_total: total,
    claims_ok_ratio: ratio,
    claims_status_counts: counts,
    min_claims_ok_ratio: minClaimsOkRatio,
    pass: ratio >= Math.max(0, minClaimsOkRatio),
  };
}

/**
 * Throw QualityGateError when the gate failed and `failOnLow` is set;
 * otherwise warn and let the caller proceed.
 */
export function enforceClaimsQualityGate(report: QualityGateReport, failOnLow: boolean): void {
  if (report.pass) {
    console.log(
      `[Quality-Gate] PASS ${report.claims_ok}/${report.claims_total} (ratio=${report.claims_ok_ratio.toFixed(3)})`,
    );
    return;
  }
  if (failOnLow) {
    throw new QualityGateError(report);
  }
  console.warn(
    `[Quality-Gate] Below minimum: ${report.claims_ok}/${report.claims_total} ` +
      `(ratio=${report.claims_ok_ratio.toFixed(3)} < ${report.min_claims_ok_ratio.toFixed(3)}), continuing`,
  );
}
