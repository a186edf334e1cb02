import { describe, it, expect, vi, afterEach } from "vitest";
import {
  BUILD_MATRIX_FLAGS,
  BUILD_MATRIX_VALUES,
  buildFetchClaimsOverrides,
  buildMatrixOverrides,
  CliUsageError,
  FETCH_CLAIMS_FLAGS,
  FETCH_CLAIMS_VALUES,
  numberValue,
  parseCliArgs,
  requireValue,
} from "@/lib/cli-args";
import { loadPipelineConfig } from "@/lib/config-loader";

const parseFetch = (argv: string[]) => parseCliArgs(argv, FETCH_CLAIMS_VALUES, FETCH_CLAIMS_FLAGS);

describe("parseCliArgs", () => {
  it("reads spaced values, inline values and flags", () => {
    const args = parseFetch(["--in", "a.json", "--topk=5", "--force"]);

    expect(Object.fromEntries(args.values)).toEqual({ in: "a.json", topk: "5" });
    expect([...args.flags]).toEqual(["force"]);
  });

  it.each([
    [["--bogus", "1"], "unknown option: --bogus"],
    [["--in"], "--in requires a value"],
    [["--in", "--force"], "--in requires a value"],
    [["--force=yes"], "--force takes no value"],
    [["prior_art.json"], "unexpected argument: prior_art.json"],
  ])("rejects %j", (argv, message) => {
    expect(() => parseFetch(argv)).toThrow(new CliUsageError(message));
  });

  it("requires values and numbers where asked", () => {
    const args = parseFetch(["--topk", "abc", "--out", " "]);

    expect(() => requireValue(args, "out")).toThrow("--out is required");
    expect(() => numberValue(args, "topk")).toThrow('--topk must be a number (got "abc")');
    expect(numberValue(args, "timeout-ms")).toBeUndefined();
  });
});

describe("buildFetchClaimsOverrides", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps options onto config sections", () => {
    const overrides = buildFetchClaimsOverrides(
      parseFetch(["--topk", "5", "--sleep-ms", "250", "--claim-sources", "Lens, google", "--no-strict", "--no-resume"]),
    );

    expect(overrides).toEqual({
      fetch: { topK: 5, backendSelection: ["lens", "google"], resume: false },
      pacing: { minIntervalMs: 250 },
      integrity: { strictSources: false },
      manual: { strictValidation: false },
    });
  });

  it("treats auto anywhere in the source list as routed selection", () => {
    expect(buildFetchClaimsOverrides(parseFetch(["--claim-sources", "google,auto"]))).toEqual({
      fetch: { backendSelection: "auto" },
    });
  });

  it("produces overrides the config loader accepts", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const overrides = buildFetchClaimsOverrides(
      parseFetch(["--max-attempts", "2", "--no-cache", "--allow-empty", "--cache-path", "/tmp/c.db"]),
    );

    const { config } = loadPipelineConfig({ env: {}, overrides });

    expect(config.fetch.maxAttemptsPerBackend).toBe(2);
    expect(config.fetch.failOnEmptyRecall).toBe(false);
    expect(config.cache).toEqual({ enabled: false, dbPath: "/tmp/c.db", ttlDays: 30 });
  });
});

describe("buildMatrixOverrides", () => {
  it("maps matrix options", () => {
    const args = parseCliArgs(
      ["--profile", "p.json", "--max-docs", "4", "--no-fail-on-low-claims"],
      BUILD_MATRIX_VALUES,
      BUILD_MATRIX_FLAGS,
    );

    expect(buildMatrixOverrides(args)).toEqual({ matrix: { maxDocs: 4, failOnLowClaims: false } });
  });
});
