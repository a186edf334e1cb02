/**
 * Prior-art file I/O
 *
 * Zod schemas for the JSON files the pipeline reads (recall output, enriched
 * checkpoint, manual claims, invention profile) and helpers to load/save them.
 *
 * A malformed file raises InputValidationError. Inside a list, only entries
 * that are not JSON objects are dropped. A record field of the wrong type
 * falls back to its empty value, and an unknown claims_status reads as
 * "error", so every requested document stays counted.
 *
 * @module prior-art-io
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { formatIssues } from "./config-schemas";
import { normalizePatentNumber } from "./source-router";
import {
  CLAIMS_BACKENDS,
  CLAIMS_FETCH_RESULTS,
  CLAIMS_STATUSES,
  MANUAL_CLAIMS_SOURCE_TYPES,
} from "./types";

export class InputValidationError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly issues: string[],
  ) {
    super(`Invalid input file ${filePath}: ${issues.join("; ")}`);
    this.name = "InputValidationError";
  }
}

// ============================================================================
// SCHEMAS
// ============================================================================

const looseText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? "" : String(v).trim()))
  .catch("");

/** Numbers, numeric strings ("0.81") or null; anything else reads as null. */
const nullableNumber = z
  .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
  .nullish()
  .transform((v) => v ?? null)
  .catch(null);

const text = z.string().default("").catch("");

/** Array whose invalid items are skipped instead of failing the record. */
function lenientArray<Item extends z.ZodTypeAny>(item: Item) {
  return z
    .array(z.unknown())
    .default([])
    .transform((items) =>
      items.flatMap((raw): Array<z.output<Item>> => {
        const parsed = item.safeParse(raw);
        return parsed.success ? [parsed.data] : [];
      }),
    )
    .catch([]);
}

export const PriorArtRecordSchema = z
  .object({
    source: looseText,
    patent_number: looseText.transform(normalizePatentNumber),
    title: looseText,
    abstract: looseText,
    url: looseText,
    query: looseText,
    query_index: nullableNumber,
    similarity_score: nullableNumber,
  })
  .passthrough();

export type InputPriorArtRecord = z.infer<typeof PriorArtRecordSchema>;

export const ClaimItemSchema = z.object({
  num: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (v === null || v === undefined ? null : String(v))),
  text: z.string(),
});

export const ClaimsFetchAttemptSchema = z.object({
  source: z.enum(CLAIMS_BACKENDS),
  url: z.string(),
  attempt: z.number().int().min(1),
  result: z.enum(CLAIMS_FETCH_RESULTS),
  claims_count: nullableNumber,
  http_status: nullableNumber,
  from_cache: z.boolean().default(false),
  error: z.string().nullish().transform((v) => v ?? null),
  attempted_at: z.string().default(""),
});

export const EnrichedRecordSchema = PriorArtRecordSchema.extend({
  claims_status: z.enum(CLAIMS_STATUSES).catch("error"),
  claims_error: text,
  claims_source: z.union([z.enum(CLAIMS_BACKENDS), z.literal("manual"), z.literal("")]).default("").catch(""),
  claims_source_type: z.enum(MANUAL_CLAIMS_SOURCE_TYPES).optional().catch(undefined),
  claims_page_url: text,
  claims_text: text,
  claims: lenientArray(ClaimItemSchema),
  claims_fetch_attempts: lenientArray(ClaimsFetchAttemptSchema),
  claims_skipped_backends: lenientArray(z.enum(CLAIMS_BACKENDS)),
  fetched_at: z
    .string()
    .nullish()
    .transform((v) => v ?? null)
    .catch(null),
}).passthrough();

export type LoadedEnrichedRecord = z.infer<typeof EnrichedRecordSchema>;

/** Manual claims file: a bare array or `{items: [...]}`; entries validated one by one. */
export const ManualClaimsFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ items: z.array(z.unknown()) }).passthrough(),
]);

export const InventionProfileSchema = z
  .object({
    key_features: z.array(
      z.union([
        z.string(),
        z.object({
          id: looseText.optional(),
          text: looseText,
          evidence_ids: z.array(z.string()).default([]),
        }),
      ]),
    ),
  })
  .passthrough();

export type InventionProfile = z.infer<typeof InventionProfileSchema>;

// ============================================================================
// FILES
// ============================================================================

/**
 * Parse a JSON file (a UTF-8 BOM is tolerated).
 */
export function readJsonFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new InputValidationError(filePath, [
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
  try {
    return JSON.parse(raw.replace(/^\uFEFF/, ""));
  } catch (err) {
    throw new InputValidationError(filePath, [
      `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
}

export function writeJsonFile(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2) + "\n", "utf-8");
}

function parseRecordList<Out>(
  schema: z.ZodType<Out, z.ZodTypeDef, unknown>,
  content: unknown,
  label: string,
): Out[] {
  if (!Array.isArray(content)) {
    throw new InputValidationError(label, ["expected a JSON array of records"]);
  }
  const out: Out[] = [];
  let dropped = 0;
  for (const item of content) {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      out.push(parsed.data);
    } else {
      dropped++;
    }
  }
  if (dropped > 0) {
    console.warn(`[Prior-Art-IO] ${label}: dropped ${dropped} non-object entr${dropped === 1 ? "y" : "ies"}`);
  }
  return out;
}

export function parsePriorArtRecords(content: unknown, label = "prior art"): InputPriorArtRecord[] {
  return parseRecordList(PriorArtRecordSchema, content, label);
}

export function parseEnrichedRecords(content: unknown, label = "enriched prior art"): LoadedEnrichedRecord[] {
  return parseRecordList(EnrichedRecordSchema, content, label);
}

export function loadPriorArtRecords(filePath: string): InputPriorArtRecord[] {
  return parsePriorArtRecords(readJsonFile(filePath), filePath);
}

export function loadEnrichedRecords(filePath: string): LoadedEnrichedRecord[] {
  return parseEnrichedRecords(readJsonFile(filePath), filePath);
}

/**
 * Previous enrichment output, keyed by patent number. Missing or unreadable
 * file → empty map (nothing to resume).
 */
export function loadCheckpoint(filePath: string): Map<string, LoadedEnrichedRecord> {
  const checkpoint = new Map<string, LoadedEnrichedRecord>();
  if (!fs.existsSync(filePath)) return checkpoint;

  let records: LoadedEnrichedRecord[];
  try {
    records = loadEnrichedRecords(filePath);
  } catch (err) {
    console.warn(
      `[Prior-Art-IO] Ignoring unreadable checkpoint ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    );
    return checkpoint;
  }
  for (const record of records) {
    if (record.patent_number) checkpoint.set(record.patent_number, record);
  }
  return checkpoint;
}

export function extractManualEntries(content: unknown, label = "manual claims"): unknown[] {
  const parsed = ManualClaimsFileSchema.safeParse(content);
  if (!parsed.success) {
    throw new InputValidationError(label, formatIssues(parsed.error.issues));
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.items;
}

export function loadInventionProfile(filePath: string): InventionProfile {
  const parsed = InventionProfileSchema.safeParse(readJsonFile(filePath));
  if (!parsed.success) {
    throw new InputValidationError(filePath, formatIssues(parsed.error.issues));
  }
  return parsed.data;
}
