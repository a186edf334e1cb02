/**
 * Configuration Loader
 *
 * Resolves the pipeline config: shipped defaults file ← optional JSON file ←
 * PA_* environment overrides ← caller (CLI) overrides, then validates the
 * result against PipelineConfigSchema. A missing or invalid defaults file
 * falls back to the code defaults.
 *
 * @module config-loader
 */

import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import {
  DEFAULT_PIPELINE_CONFIG,
  PipelineConfigSchema,
  collectConfigWarnings,
  formatIssues,
  validatePipelineConfig,
  type PipelineConfig,
} from "./config-schemas";

export type { PipelineConfig } from "./config-schemas";
export { DEFAULT_PIPELINE_CONFIG } from "./config-schemas";

export class ConfigValidationError extends Error {
  constructor(
    public readonly source: string,
    public readonly issues: string[],
  ) {
    super(`Invalid pipeline config (${source}): ${issues.join("; ")}`);
    this.name = "ConfigValidationError";
  }
}

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  value: unknown;
}

export interface ResolvedConfig {
  config: PipelineConfig;
  overrides: OverrideRecord[];
  skippedOverrides: string[];
  warnings: string[];
  filePath: string | null;
}

export const SHIPPED_DEFAULTS_PATH = fileURLToPath(new URL("../../configs/pipeline.default.json", import.meta.url));

type JsonObject = { [key: string]: unknown };

// ============================================================================
// ENVIRONMENT VARIABLE OVERRIDE MAPPING
// ============================================================================

type EnvOverride = { fieldPath: string; parser: (v: string) => unknown };

const parseBool = (v: string) => v.trim().toLowerCase() === "true";
const parseIntStrict = (v: string) => {
  const n = Number.parseInt(v, 10);
  return Number.isNaN(n) ? v : n;
};
const parseFloatStrict = (v: string) => {
  const n = Number.parseFloat(v);
  return Number.isNaN(n) ? v : n;
};
const parseList = (v: string) => v.split(",").map((s) => s.trim()).filter(Boolean);

const ENV_MAP: Record<string, EnvOverride> = {
  PA_FETCH_TOPK: { fieldPath: "fetch.topK", parser: parseIntStrict },
  PA_FETCH_TIMEOUT_MS: { fieldPath: "fetch.timeoutMs", parser: parseIntStrict },
  PA_FETCH_MAX_ATTEMPTS: { fieldPath: "fetch.maxAttemptsPerBackend", parser: parseIntStrict },
  PA_FETCH_BACKOFF_MS: { fieldPath: "fetch.backoffBaseMs", parser: parseIntStrict },
  PA_FETCH_BACKOFF_MULTIPLIER: { fieldPath: "fetch.backoffMultiplier", parser: parseFloatStrict },
  PA_FETCH_JITTER: { fieldPath: "fetch.jitterFraction", parser: parseFloatStrict },
  PA_FETCH_BACKENDS: {
    fieldPath: "fetch.backendSelection",
    parser: (v) => (v.trim().toLowerCase() === "auto" ? "auto" : parseList(v.toLowerCase())),
  },
  PA_FETCH_RESUME: { fieldPath: "fetch.resume", parser: parseBool },
  PA_FETCH_FORCE: { fieldPath: "fetch.force", parser: parseBool },
  PA_PACING_MIN_INTERVAL_MS: { fieldPath: "pacing.minIntervalMs", parser: parseIntStrict },
  PA_PACING_BACKEND_INTERVAL_MS: { fieldPath: "pacing.perBackendMinIntervalMs", parser: parseIntStrict },
  PA_CACHE_ENABLED: { fieldPath: "cache.enabled", parser: parseBool },
  PA_CACHE_PATH: { fieldPath: "cache.dbPath", parser: (v) => v },
  PA_CACHE_TTL_DAYS: { fieldPath: "cache.ttlDays", parser: parseIntStrict },
  PA_CIRCUIT_BREAKER_ENABLED: { fieldPath: "circuitBreaker.enabled", parser: parseBool },
  PA_STRICT_SOURCES: { fieldPath: "integrity.strictSources", parser: parseBool },
  PA_MANUAL_STRICT: { fieldPath: "manual.strictValidation", parser: parseBool },
  PA_MATRIX_MAX_DOCS: { fieldPath: "matrix.maxDocs", parser: parseIntStrict },
  PA_MATRIX_MIN_CLAIMS_OK_RATIO: { fieldPath: "matrix.minClaimsOkRatio", parser: parseFloatStrict },
  PA_MATRIX_FAIL_ON_LOW_CLAIMS: { fieldPath: "matrix.failOnLowClaims", parser: parseBool },
};

// ============================================================================
// HELPERS
// ============================================================================

function isPlainObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge `patch` over `base`. Arrays and scalars in `patch` replace.
 */
export function deepMerge(base: JsonObject, patch: JsonObject): JsonObject {
  const out: JsonObject = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return out;
}

function setAtPath(target: JsonObject, fieldPath: string, value: unknown): JsonObject {
  const [head, ...rest] = fieldPath.split(".");
  if (rest.length === 0) {
    return { ...target, [head]: value };
  }
  const child = target[head];
  return { ...target, [head]: setAtPath(isPlainObject(child) ? child : {}, rest.join("."), value) };
}

function toJsonObject(config: PipelineConfig): JsonObject {
  // Round-trip through JSON so the merge never aliases the source object
  const copy: unknown = JSON.parse(JSON.stringify(config));
  return isPlainObject(copy) ? copy : {};
}

function loadBaseLayer(defaultsPath: string | null): JsonObject {
  if (!defaultsPath) return toJsonObject(DEFAULT_PIPELINE_CONFIG);

  let content: string;
  try {
    content = fs.readFileSync(defaultsPath, "utf-8");
  } catch (err) {
    console.warn(
      `[Config-Loader] Defaults file unreadable, using code defaults: ${err instanceof Error ? err.message : String(err)}`,
    );
    return toJsonObject(DEFAULT_PIPELINE_CONFIG);
  }

  const validation = validatePipelineConfig(content);
  if (!validation.config) {
    console.warn(`[Config-Loader] Defaults file ${defaultsPath} invalid, using code defaults: ${validation.errors.join("; ")}`);
    return toJsonObject(DEFAULT_PIPELINE_CONFIG);
  }
  return toJsonObject(validation.config);
}

// ============================================================================
// LOADING
// ============================================================================

export interface LoadConfigOptions {
  /** Base layer file; null skips it and starts from the code defaults */
  defaultsPath?: string | null;
  /** JSON file with a partial or full PipelineConfig */
  filePath?: string | null;
  env?: NodeJS.ProcessEnv;
  /** Applied last (e.g. parsed CLI flags) */
  overrides?: JsonObject;
}

/**
 * Resolve and validate the pipeline configuration.
 * Invalid env overrides are skipped (and reported); an invalid file or
 * final result throws ConfigValidationError.
 */
export function loadPipelineConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  const env = options.env ?? process.env;
  const filePath = options.filePath ?? null;

  let merged = loadBaseLayer(options.defaultsPath === undefined ? SHIPPED_DEFAULTS_PATH : options.defaultsPath);

  if (filePath) {
    let fileContent: unknown;
    try {
      fileContent = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (err) {
      throw new ConfigValidationError(filePath, [
        `Failed to read config file: ${err instanceof Error ? err.message : String(err)}`,
      ]);
    }
    if (!isPlainObject(fileContent)) {
      throw new ConfigValidationError(filePath, ["Config file must contain a JSON object"]);
    }
    merged = deepMerge(merged, fileContent);
  }

  const overrides: OverrideRecord[] = [];
  const skippedOverrides: string[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_MAP)) {
    const raw = env[envVar];
    if (raw === undefined || raw === "") continue;

    const value = mapping.parser(raw);
    const candidate = setAtPath(merged, mapping.fieldPath, value);
    const validation = PipelineConfigSchema.safeParse(candidate);
    if (!validation.success) {
      const issue = validation.error.issues.find((i) => i.path.join(".") === mapping.fieldPath);
      if (issue) {
        console.warn(`[Config-Loader] Skipping ${envVar}=${raw}: ${issue.message}`);
        skippedOverrides.push(`${envVar} (invalid: ${issue.message})`);
        continue;
      }
    }
    merged = candidate;
    overrides.push({ envVar, fieldPath: mapping.fieldPath, value });
  }

  if (options.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  const result = PipelineConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigValidationError(filePath ?? "defaults", formatIssues(result.error.issues));
  }

  if (overrides.length > 0) {
    console.log(
      `[Config-Loader] Applied ${overrides.length} env override(s): ${overrides.map((o) => o.envVar).join(", ")}`,
    );
  }

  const warnings = collectConfigWarnings(result.data);
  for (const warning of warnings) {
    console.warn(`[Config-Loader] ${warning}`);
  }

  return { config: result.data, overrides, skippedOverrides, warnings, filePath };
}
