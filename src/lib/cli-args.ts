/**
 * Command-line arguments for the pipeline scripts.
 *
 * Flags are turned into a partial PipelineConfig that config-loader applies
 * last, after the config file and PA_* environment overrides.
 *
 * @module cli-args
 */

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export interface ParsedArgs {
  values: Map<string, string>;
  flags: Set<string>;
}

/**
 * Parse `--name value`, `--name=value` and bare `--flag` tokens.
 * Unknown names and missing values raise CliUsageError.
 */
export function parseCliArgs(
  argv: readonly string[],
  valueNames: readonly string[],
  flagNames: readonly string[],
): ParsedArgs {
  const values = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      throw new CliUsageError(`unexpected argument: ${token}`);
    }
    const eq = token.indexOf("=");
    const name = token.slice(2, eq >= 0 ? eq : undefined);

    if (flagNames.includes(name)) {
      if (eq >= 0) throw new CliUsageError(`--${name} takes no value`);
      flags.add(name);
      continue;
    }
    if (!valueNames.includes(name)) {
      throw new CliUsageError(`unknown option: --${name}`);
    }

    if (eq >= 0) {
      values.set(name, token.slice(eq + 1));
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new CliUsageError(`--${name} requires a value`);
    }
    values.set(name, next);
    i++;
  }

  return { values, flags };
}

export function requireValue(args: ParsedArgs, name: string): string {
  const value = args.values.get(name);
  if (value === undefined || value.trim() === "") {
    throw new CliUsageError(`--${name} is required`);
  }
  return value;
}

export function numberValue(args: ParsedArgs, name: string): number | undefined {
  const raw = args.values.get(name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (raw.trim() === "" || Number.isNaN(n)) {
    throw new CliUsageError(`--${name} must be a number (got "${raw}")`);
  }
  return n;
}

type Overrides = { [section: string]: { [field: string]: unknown } };

function put(target: Overrides, section: string, field: string, value: unknown): void {
  if (value === undefined) return;
  target[section] = { ...(target[section] ?? {}), [field]: value };
}

// ============================================================================
// fetch-claims
// ============================================================================

export const FETCH_CLAIMS_VALUES = [
  "in",
  "out",
  "config",
  "topk",
  "cache-path",
  "timeout-ms",
  "max-attempts",
  "backoff-ms",
  "backoff-multiplier",
  "jitter",
  "sleep-ms",
  "claim-sources",
  "manual-claims",
  "require-min-ok-ratio",
] as const;

export const FETCH_CLAIMS_FLAGS = [
  "force",
  "no-resume",
  "no-strict",
  "no-cache",
  "clear-cache",
  "fail-on-empty",
  "allow-empty",
] as const;

export function buildFetchClaimsOverrides(args: ParsedArgs): Overrides {
  const o: Overrides = {};
  put(o, "fetch", "topK", numberValue(args, "topk"));
  put(o, "fetch", "timeoutMs", numberValue(args, "timeout-ms"));
  put(o, "fetch", "maxAttemptsPerBackend", numberValue(args, "max-attempts"));
  put(o, "fetch", "backoffBaseMs", numberValue(args, "backoff-ms"));
  put(o, "fetch", "backoffMultiplier", numberValue(args, "backoff-multiplier"));
  put(o, "fetch", "jitterFraction", numberValue(args, "jitter"));
  put(o, "fetch", "requireMinOkRatio", numberValue(args, "require-min-ok-ratio"));
  put(o, "pacing", "minIntervalMs", numberValue(args, "sleep-ms"));
  put(o, "cache", "dbPath", args.values.get("cache-path"));

  const sources = args.values.get("claim-sources");
  if (sources !== undefined) {
    const list = sources
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter(Boolean);
    put(o, "fetch", "backendSelection", list.length === 0 || list.includes("auto") ? "auto" : list);
  }

  if (args.flags.has("force")) put(o, "fetch", "force", true);
  if (args.flags.has("no-resume")) put(o, "fetch", "resume", false);
  if (args.flags.has("fail-on-empty")) put(o, "fetch", "failOnEmptyRecall", true);
  if (args.flags.has("allow-empty")) put(o, "fetch", "failOnEmptyRecall", false);
  if (args.flags.has("no-cache")) put(o, "cache", "enabled", false);
  if (args.flags.has("no-strict")) {
    put(o, "integrity", "strictSources", false);
    put(o, "manual", "strictValidation", false);
  }
  return o;
}

// ============================================================================
// build-matrix
// ============================================================================

export const BUILD_MATRIX_VALUES = ["profile", "prior-art-full", "out", "config", "max-docs", "min-claims-ok-ratio"] as const;

export const BUILD_MATRIX_FLAGS = ["fail-on-low-claims", "no-fail-on-low-claims"] as const;

export function buildMatrixOverrides(args: ParsedArgs): Overrides {
  const o: Overrides = {};
  put(o, "matrix", "maxDocs", numberValue(args, "max-docs"));
  put(o, "matrix", "minClaimsOkRatio", numberValue(args, "min-claims-ok-ratio"));
  if (args.flags.has("fail-on-low-claims")) put(o, "matrix", "failOnLowClaims", true);
  if (args.flags.has("no-fail-on-low-claims")) put(o, "matrix", "failOnLowClaims", false);
  return o;
}
