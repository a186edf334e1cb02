/**
 * Manual Claims
 *
 * Operator-supplied claims for records the backends could not resolve:
 * - per-entry validation (strict mode demands a verifiable source URL and type)
 * - merge into the enriched records as `manual_ok`
 * - template + Markdown checklist generation for the operator
 *
 * A bad entry is rejected on its own and never aborts the merge. The merge
 * writes no timestamps, so re-merging the same file is idempotent.
 *
 * @module manual-claims
 */

import { z } from "zod";
import { MAX_CLAIMS_TEXT_CHARS, splitClaims } from "./claims-parser";
import { formatIssues } from "./config-schemas";
import { normalizePatentNumber, selectClaimableTopK } from "./source-router";
import {
  MANUAL_CLAIMS_SOURCE_TYPES,
  type ClaimItem,
  type EnrichedPriorArtRecord,
  type ManualClaimsSourceType,
  type PriorArtRecord,
} from "./types";

// ============================================================================
// VALIDATION
// ============================================================================

const ManualClaimsEntrySchema = z
  .object({
    patent_number: z
      .union([z.string(), z.number()])
      .nullish()
      .transform((v) => normalizePatentNumber(v)),
    claims_text: z.string().nullish(),
    claims: z
      .array(
        z.union([
          z.string(),
          z.object({
            num: z.union([z.string(), z.number()]).nullish(),
            text: z.string(),
          }),
        ]),
      )
      .nullish(),
    claims_source_url: z.string().nullish(),
    claims_source_type: z.string().nullish(),
  })
  .passthrough();

export interface ValidManualClaims {
  patent_number: string;
  claims_text: string;
  claims: ClaimItem[];
  claims_source_url: string;
  claims_source_type: ManualClaimsSourceType | undefined;
}

export type ManualEntryValidation =
  | { valid: true; entry: ValidManualClaims }
  | { valid: false; patent_number: string; reasons: string[] };

export interface RejectedManualEntry {
  index: number;
  patent_number: string;
  reasons: string[];
}

function isManualSourceType(value: string): value is ManualClaimsSourceType {
  return MANUAL_CLAIMS_SOURCE_TYPES.some((t) => t === value);
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Claims text and list from an entry: `claims_text` wins (split on
 * numbering); otherwise `claims[]` is normalized and joined as "num. text".
 */
function normalizeClaimsContent(
  claimsText: string,
  claimsList: ReadonlyArray<string | { num?: string | number | null; text: string }>,
): { text: string; claims: ClaimItem[] } {
  if (claimsText) {
    return { text: claimsText.slice(0, MAX_CLAIMS_TEXT_CHARS), claims: splitClaims(claimsText) };
  }

  const claims: ClaimItem[] = [];
  claimsList.forEach((item, i) => {
    const text = (typeof item === "string" ? item : item.text).trim();
    if (!text) return;
    const rawNum = typeof item === "string" ? i + 1 : item.num;
    claims.push({ num: rawNum === null || rawNum === undefined ? null : String(rawNum), text });
  });
  const text = claims.map((c) => (c.num !== null ? `${c.num}. ${c.text}` : c.text)).join("\n");
  return { text: text.slice(0, MAX_CLAIMS_TEXT_CHARS), claims };
}

export function validateManualClaimsEntry(raw: unknown, strict: boolean): ManualEntryValidation {
  const parsed = ManualClaimsEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return { valid: false, patent_number: "", reasons: formatIssues(parsed.error.issues) };
  }

  const data = parsed.data;
  const reasons: string[] = [];

  if (!data.patent_number) {
    reasons.push("patent_number is required");
  }

  const content = normalizeClaimsContent((data.claims_text ?? "").trim(), data.claims ?? []);
  if (!content.text) {
    reasons.push("claims_text or a non-empty claims[] is required");
  }

  const sourceUrl = (data.claims_source_url ?? "").trim();
  const sourceType = (data.claims_source_type ?? "").trim();
  const validType = isManualSourceType(sourceType) ? sourceType : undefined;

  if (strict) {
    if (!isHttpUrl(sourceUrl)) {
      reasons.push("claims_source_url must be an http(s) URL");
    }
    if (!validType) {
      reasons.push(`claims_source_type must be one of: ${MANUAL_CLAIMS_SOURCE_TYPES.join(", ")}`);
    }
  }

  if (reasons.length > 0) {
    return { valid: false, patent_number: data.patent_number, reasons };
  }

  return {
    valid: true,
    entry: {
      patent_number: data.patent_number,
      claims_text: content.text,
      claims: content.claims,
      claims_source_url: sourceUrl,
      claims_source_type: validType,
    },
  };
}

// ============================================================================
// MERGE
// ============================================================================

export interface ManualMergeResult<R extends EnrichedPriorArtRecord> {
  records: R[];
  accepted: string[];
  rejected: RejectedManualEntry[];
}

export function mergeManualClaims<R extends EnrichedPriorArtRecord>(
  records: readonly R[],
  entries: readonly unknown[],
  options: { strict: boolean },
): ManualMergeResult<R> {
  const requested = new Set(records.map((r) => normalizePatentNumber(r.patent_number)).filter(Boolean));
  // Fetched claims are authoritative; manual text only fills unresolved records
  const resolvedBy = new Map<string, string>();
  for (const record of records) {
    if (record.claims_status === "ok" || record.claims_status === "ok_fallback") {
      resolvedBy.set(normalizePatentNumber(record.patent_number), record.claims_source || "fetcher");
    }
  }
  const byPatent = new Map<string, ValidManualClaims>();
  const rejected: RejectedManualEntry[] = [];

  entries.forEach((raw, index) => {
    const result = validateManualClaimsEntry(raw, options.strict);
    if (!result.valid) {
      rejected.push({ index, patent_number: result.patent_number, reasons: result.reasons });
      return;
    }
    if (!requested.has(result.entry.patent_number)) {
      rejected.push({
        index,
        patent_number: result.entry.patent_number,
        reasons: ["patent number is not among the requested records"],
      });
      return;
    }
    const backend = resolvedBy.get(result.entry.patent_number);
    if (backend !== undefined) {
      rejected.push({
        index,
        patent_number: result.entry.patent_number,
        reasons: [`already resolved by ${backend}`],
      });
      return;
    }
    // Later duplicates replace earlier ones
    byPatent.set(result.entry.patent_number, result.entry);
  });

  const accepted: string[] = [];
  const merged = records.map((record) => {
    const entry = byPatent.get(normalizePatentNumber(record.patent_number));
    if (!entry) return record;
    accepted.push(entry.patent_number);
    const updated: R = {
      ...record,
      claims_status: "manual_ok",
      claims_error: "",
      claims_source: "manual",
      claims_page_url: entry.claims_source_url || record.claims_page_url,
      claims_text: entry.claims_text,
      claims: entry.claims,
      ...(entry.claims_source_type ? { claims_source_type: entry.claims_source_type } : {}),
    };
    return updated;
  });

  for (const r of rejected) {
    console.warn(`[Manual-Claims] Rejected entry #${r.index} (${r.patent_number || "no patent number"}): ${r.reasons.join("; ")}`);
  }
  if (accepted.length > 0) {
    console.log(`[Manual-Claims] Merged ${accepted.length} manual entr${accepted.length === 1 ? "y" : "ies"}`);
  }

  return { records: merged, accepted, rejected };
}

// ============================================================================
// TEMPLATE
// ============================================================================

export interface ManualClaimsTemplateItem {
  rank: number;
  patent_number: string;
  title: string;
  url: string;
  source: string;
  query: string;
  claims_text: string;
  claims: ClaimItem[];
  claims_source_url: string;
  claims_source_type: string;
  notes: string;
}

export interface ManualClaimsTemplate {
  generated_at: string;
  input: string;
  topk: number;
  items: ManualClaimsTemplateItem[];
}

export function buildManualClaimsTemplate(
  records: readonly PriorArtRecord[],
  options: { topK: number; input: string; now?: Date },
): ManualClaimsTemplate {
  const selected = selectClaimableTopK(records, options.topK);
  return {
    generated_at: (options.now ?? new Date()).toISOString(),
    input: options.input,
    topk: options.topK,
    items: selected.map((record, i) => ({
      rank: i + 1,
      patent_number: normalizePatentNumber(record.patent_number),
      title: (record.title ?? "").trim(),
      url: (record.url ?? "").trim(),
      source: (record.source ?? "").trim(),
      query: (record.query ?? "").trim(),
      claims_text: "",
      claims: [],
      claims_source_url: "",
      claims_source_type: "",
      notes: `Fill at least the independent claim(s) as plain text. claims_source_type: ${MANUAL_CLAIMS_SOURCE_TYPES.join(" | ")}`,
    })),
  };
}

export function renderManualClaimsChecklist(template: ManualClaimsTemplate): string {
  const lines = [
    "# Manual Claims Extraction Checklist",
    "",
    `- generated_at: ${template.generated_at}`,
    `- input: ${template.input}`,
    `- topk: ${template.topk}`,
    "",
  ];
  for (const item of template.items) {
    lines.push(`## ${item.rank}. ${item.patent_number || "(no patent number)"}`);
    lines.push(`- source: ${item.source}`);
    lines.push(`- title: ${item.title}`);
    lines.push(`- url: ${item.url}`);
    lines.push(`- query: ${item.query}`);
    lines.push("- [ ] fill claims_text or claims[], claims_source_url and claims_source_type");
    lines.push("");
  }
  return lines.join("\n");
}
