/**
 * Source Integrity
 *
 * Strict-mode gate on input records: only records recalled from a real
 * patent search source, and identifiable by patent number or URL, are
 * fetched. Rejected records carry `rejected_source` and may still be
 * resolved through the manual merge.
 *
 * @module source-integrity
 */

import type { IntegrityConfig } from "./config-schemas";
import { normalizePatentNumber } from "./source-router";
import type { PriorArtRecord } from "./types";

export interface SourceIntegrityResult {
  isValid: boolean;
  failureReasons: string[];
}

export function validateRecordSource(
  record: Pick<PriorArtRecord, "source" | "patent_number" | "url">,
  cfg: IntegrityConfig,
): SourceIntegrityResult {
  if (!cfg.strictSources) {
    return { isValid: true, failureReasons: [] };
  }

  const failureReasons: string[] = [];
  const source = (record.source ?? "").trim();
  const sourceLower = source.toLowerCase();

  const markers = cfg.forbiddenSourceMarkers.filter((m) => sourceLower.includes(m.toLowerCase()));
  if (markers.length > 0) {
    failureReasons.push(`forbidden source marker(s) in "${source}": ${markers.join(", ")}`);
  }

  if (source && !cfg.allowedSources.some((a) => a.toLowerCase() === sourceLower)) {
    failureReasons.push(`source "${source}" is not an allowed patent source`);
  }

  if (!normalizePatentNumber(record.patent_number) && !(record.url ?? "").trim()) {
    failureReasons.push("record has neither patent number nor URL");
  }

  return { isValid: failureReasons.length === 0, failureReasons };
}
