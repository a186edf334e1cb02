/**
 * Configuration Schemas
 *
 * Zod schemas for the claims enrichment and novelty matrix pipeline.
 * configs/pipeline.default.json is the shipped base layer; the code
 * defaults below stand in when that file is missing or invalid.
 *
 * @module config-schemas
 */

import { z } from "zod";
import { CLAIMS_BACKENDS } from "./types";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  /** Parsed config when valid */
  config?: PipelineConfig;
}

// ============================================================================
// FETCH CONFIG
// ============================================================================

export const ClaimsBackendSchema = z.enum(CLAIMS_BACKENDS);

export const FetchConfigSchema = z.object({
  topK: z.number().int().min(1).max(500),
  timeoutMs: z.number().int().min(1000).max(300000),
  // Tries per backend (first try included)
  maxAttemptsPerBackend: z.number().int().min(1).max(10),
  backoffBaseMs: z.number().int().min(0).max(60000),
  backoffMultiplier: z.number().min(1).max(10),
  jitterFraction: z.number().min(0).max(1),
  // "auto" routes per jurisdiction; an explicit list is tried in order
  backendSelection: z.union([z.literal("auto"), z.array(z.string()).min(1)]),
  resume: z.boolean(),
  force: z.boolean(),
  failOnEmptyRecall: z.boolean(),
  requireMinOkRatio: z.number().min(0).max(1),
  userAgent: z.string().min(1),
});

export type FetchConfig = z.infer<typeof FetchConfigSchema>;

// ============================================================================
// PACING / CACHE / CIRCUIT BREAKER
// ============================================================================

export const PacingConfigSchema = z.object({
  minIntervalMs: z.number().int().min(0).max(120000),
  perBackendMinIntervalMs: z.number().int().min(0).max(120000),
  jitterFraction: z.number().min(0).max(1),
});

export type PacingConfig = z.infer<typeof PacingConfigSchema>;

export const CacheConfigSchema = z.object({
  enabled: z.boolean(),
  dbPath: z.string().min(1),
  ttlDays: z.number().int().min(1).max(3650),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

export const CircuitBreakerConfigSchema = z.object({
  enabled: z.boolean(),
  failureThreshold: z.number().int().min(1).max(50),
  resetTimeoutSec: z.number().int().min(1).max(86400),
});

export type CircuitBreakerConfig = z.infer<typeof CircuitBreakerConfigSchema>;

// ============================================================================
// INTEGRITY / MANUAL MERGE
// ============================================================================

export const IntegrityConfigSchema = z.object({
  strictSources: z.boolean(),
  allowedSources: z.array(z.string().min(1)),
  forbiddenSourceMarkers: z.array(z.string().min(1)),
});

export type IntegrityConfig = z.infer<typeof IntegrityConfigSchema>;

export const ManualConfigSchema = z.object({
  strictValidation: z.boolean(),
});

export type ManualConfig = z.infer<typeof ManualConfigSchema>;

// ============================================================================
// MATRIX CONFIG
// ============================================================================

export const MatrixConfigSchema = z
  .object({
    maxDocs: z.number().int().min(1).max(500),
    minFeatures: z.number().int().min(1).max(50),
    maxFeatures: z.number().int().min(1).max(50),
    minClaimsOkRatio: z.number().min(0).max(1),
    failOnLowClaims: z.boolean(),
    yesThreshold: z.number().min(0).max(1),
    partialThreshold: z.number().min(0).max(1),
    maxSnippets: z.number().int().min(0).max(20),
    snippetWindow: z.number().int().min(10).max(1000),
    topPriorArtCount: z.number().int().min(1).max(100),
    minNoRatio: z.number().min(0).max(1),
    maxNoveltyCandidates: z.number().int().min(1).max(100),
    minUnionRatio: z.number().min(0).max(1),
    maxCoRatio: z.number().min(0).max(1),
    maxPairCandidates: z.number().int().min(1).max(200),
  })
  .refine((m) => m.partialThreshold <= m.yesThreshold, {
    message: "partialThreshold must not exceed yesThreshold",
    path: ["partialThreshold"],
  })
  .refine((m) => m.minFeatures <= m.maxFeatures, {
    message: "minFeatures must not exceed maxFeatures",
    path: ["minFeatures"],
  });

export type MatrixConfig = z.infer<typeof MatrixConfigSchema>;

// ============================================================================
// PIPELINE CONFIG
// ============================================================================

export const PipelineConfigSchema = z.object({
  fetch: FetchConfigSchema,
  pacing: PacingConfigSchema,
  cache: CacheConfigSchema,
  circuitBreaker: CircuitBreakerConfigSchema,
  integrity: IntegrityConfigSchema,
  manual: ManualConfigSchema,
  matrix: MatrixConfigSchema,
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  fetch: {
    topK: 10,
    timeoutMs: 40000,
    maxAttemptsPerBackend: 3,
    backoffBaseMs: 1000,
    backoffMultiplier: 1.8,
    jitterFraction: 0.25,
    backendSelection: "auto",
    resume: true,
    force: false,
    failOnEmptyRecall: true,
    requireMinOkRatio: 0,
    userAgent: "Mozilla/5.0 (compatible; PriorArtClaimsMatrix/1.0)",
  },
  pacing: {
    minIntervalMs: 1000,
    perBackendMinIntervalMs: 2000,
    jitterFraction: 0.35,
  },
  cache: {
    enabled: true,
    dbPath: "./.cache/claims-cache.db",
    ttlDays: 30,
  },
  circuitBreaker: {
    enabled: false,
    failureThreshold: 3,
    resetTimeoutSec: 300,
  },
  integrity: {
    strictSources: true,
    allowedSources: ["Google Patents", "Lens.org", "Espacenet", "CNIPA"],
    forbiddenSourceMarkers: ["manual", "fallback", "synthetic", "mock", "test", "fabricated"],
  },
  manual: {
    strictValidation: true,
  },
  matrix: {
    maxDocs: 10,
    minFeatures: 3,
    maxFeatures: 12,
    minClaimsOkRatio: 0.3,
    failOnLowClaims: false,
    yesThreshold: 0.6,
    partialThreshold: 0.25,
    maxSnippets: 3,
    snippetWindow: 90,
    topPriorArtCount: 5,
    minNoRatio: 0.5,
    maxNoveltyCandidates: 10,
    minUnionRatio: 0.3,
    maxCoRatio: 0.2,
    maxPairCandidates: 12,
  },
};

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Format zod issues as "path: message" lines.
 */
export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

/**
 * Settings that are valid on their own but interact badly.
 */
export function collectConfigWarnings(config: PipelineConfig): string[] {
  const warnings: string[] = [];
  const { fetch, circuitBreaker } = config;
  if (fetch.force && fetch.resume) {
    warnings.push("fetch.force overrides fetch.resume: previously resolved records will be re-fetched");
  }
  if (circuitBreaker.enabled && fetch.backendSelection !== "auto" && fetch.backendSelection.length === 1) {
    warnings.push("circuitBreaker has no alternative backend to route to with a single explicit backend");
  }
  return warnings;
}

/**
 * Validate raw pipeline config content (JSON text) holding a full config.
 */
export function validatePipelineConfig(content: string): ValidationResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.replace(/^\uFEFF/, ""));
  } catch (err) {
    return {
      valid: false,
      errors: [`Failed to parse content: ${err instanceof Error ? err.message : String(err)}`],
      warnings: [],
    };
  }

  const result = PipelineConfigSchema.safeParse(parsed);
  if (!result.success) {
    return { valid: false, errors: formatIssues(result.error.issues), warnings: [] };
  }
  return { valid: true, errors: [], warnings: collectConfigWarnings(result.data), config: result.data };
}
