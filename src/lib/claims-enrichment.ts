/**
 * Claims Enrichment
 *
 * Turns recalled prior-art records into claims-bearing records:
 * top-K selection → resume from checkpoint → source integrity → fetch walk
 * → manual merge → quality summary.
 *
 * @module claims-enrichment
 */

import { evaluateClaimsQualityGate } from "./analyzer/quality-gate";
import { DEFAULT_FETCHER_DEPS, fetchClaimsForRecord, type ClaimsFetcherDeps } from "./claims-fetcher";
import type { PipelineConfig } from "./config-schemas";
import { debugLog } from "./debug";
import { mergeManualClaims, type RejectedManualEntry } from "./manual-claims";
import { validateRecordSource } from "./source-integrity";
import { normalizePatentNumber, selectClaimableTopK } from "./source-router";
import {
  isClaimsOkStatus,
  type EnrichedPriorArtRecord,
  type PriorArtRecord,
  type QualityGateReport,
} from "./types";

export class EmptyRecallError extends Error {
  constructor(public readonly inputCount: number) {
    super(`no claimable prior-art records to enrich (input records: ${inputCount})`);
    this.name = "EmptyRecallError";
  }
}

export interface EnrichmentOptions {
  config: PipelineConfig;
  /** Previous output keyed by normalized patent number */
  checkpoint?: ReadonlyMap<string, EnrichedPriorArtRecord>;
  /** Raw manual claims entries (validated during the merge) */
  manualEntries?: readonly unknown[];
  deps?: Partial<ClaimsFetcherDeps>;
}

export interface EnrichmentSummary {
  requested: number;
  reused: number;
  fetched: number;
  rejectedSource: number;
  manualAccepted: string[];
  manualRejected: RejectedManualEntry[];
  quality: QualityGateReport;
}

export interface EnrichmentResult {
  records: EnrichedPriorArtRecord[];
  summary: EnrichmentSummary;
}

function rejectedRecord(record: PriorArtRecord, reasons: string[]): EnrichedPriorArtRecord {
  return {
    ...record,
    claims_status: "rejected_source",
    claims_error: reasons.join("; "),
    claims_source: "",
    claims_page_url: "",
    claims_text: "",
    claims: [],
    claims_fetch_attempts: [],
    claims_skipped_backends: [],
    fetched_at: null,
  };
}

export async function enrichPriorArtClaims(
  records: readonly PriorArtRecord[],
  options: EnrichmentOptions,
): Promise<EnrichmentResult> {
  const { config } = options;
  const deps: ClaimsFetcherDeps = { ...DEFAULT_FETCHER_DEPS, ...options.deps };

  const selected = records.length > 0 ? selectClaimableTopK(records, config.fetch.topK) : [];
  if (selected.length === 0) {
    if (config.fetch.failOnEmptyRecall) {
      throw new EmptyRecallError(records.length);
    }
    console.warn("[Claims-Enrichment] No claimable records in input, writing empty output");
  }

  const useCheckpoint = config.fetch.resume && !config.fetch.force;
  const checkpoint = useCheckpoint ? options.checkpoint : undefined;

  let reused = 0;
  let fetched = 0;
  let rejectedSource = 0;
  const enriched: EnrichedPriorArtRecord[] = [];

  for (const [i, record] of selected.entries()) {
    const pn = normalizePatentNumber(record.patent_number);
    const label = pn || record.url;

    const previous = pn ? checkpoint?.get(pn) : undefined;
    if (previous && isClaimsOkStatus(previous.claims_status)) {
      console.log(`[Claims-Enrichment] ${i + 1}/${selected.length} ${label}: reusing ${previous.claims_status}`);
      enriched.push(previous);
      reused++;
      continue;
    }

    const integrity = validateRecordSource(record, config.integrity);
    if (!integrity.isValid) {
      console.warn(`[Claims-Enrichment] ${label}: rejected source (${integrity.failureReasons.join("; ")})`);
      enriched.push(rejectedRecord(record, integrity.failureReasons));
      rejectedSource++;
      continue;
    }

    const outcome = await fetchClaimsForRecord(
      record,
      { fetch: config.fetch, circuitBreaker: config.circuitBreaker },
      deps,
    );
    fetched++;
    console.log(
      `[Claims-Enrichment] ${i + 1}/${selected.length} ${label}: ${outcome.claims_status} ` +
        `(${outcome.claims_fetch_attempts.length} attempt(s))`,
    );
    enriched.push({ ...record, ...outcome });
  }

  let finalRecords = enriched;
  let manualAccepted: string[] = [];
  let manualRejected: RejectedManualEntry[] = [];
  if (options.manualEntries && options.manualEntries.length > 0) {
    const merged = mergeManualClaims(enriched, options.manualEntries, {
      strict: config.manual.strictValidation,
    });
    finalRecords = merged.records;
    manualAccepted = merged.accepted;
    manualRejected = merged.rejected;
  }

  const quality = evaluateClaimsQualityGate(finalRecords, config.fetch.requireMinOkRatio);
  debugLog("[Claims-Enrichment] Completed", {
    requested: selected.length,
    reused,
    fetched,
    rejectedSource,
    statusCounts: quality.claims_status_counts,
  });

  return {
    records: finalRecords,
    summary: {
      requested: selected.length,
      reused,
      fetched,
      rejectedSource,
      manualAccepted,
      manualRejected,
      quality,
    },
  };
}
