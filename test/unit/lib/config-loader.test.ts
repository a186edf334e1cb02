/**
 * Pipeline config resolution: defaults, file, PA_* env, CLI overrides.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { ConfigValidationError, deepMerge, loadPipelineConfig, SHIPPED_DEFAULTS_PATH } from "@/lib/config-loader";
import { DEFAULT_PIPELINE_CONFIG, validatePipelineConfig } from "@/lib/config-schemas";

describe("loadPipelineConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pa-config-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function writeConfig(content: string): string {
    const file = path.join(tempDir, "pipeline.json");
    fs.writeFileSync(file, content, "utf8");
    return file;
  }

  it("returns the defaults with no file, env or overrides", () => {
    const resolved = loadPipelineConfig({ env: {} });

    expect(resolved.config).toEqual(DEFAULT_PIPELINE_CONFIG);
    expect(resolved.overrides).toEqual([]);
    expect(resolved.filePath).toBeNull();
  });

  it("does not alias the exported defaults", () => {
    const resolved = loadPipelineConfig({ env: {} });
    resolved.config.integrity.allowedSources.push("Elsewhere");

    expect(DEFAULT_PIPELINE_CONFIG.integrity.allowedSources).not.toContain("Elsewhere");
  });

  it("applies PA_* environment overrides", () => {
    const resolved = loadPipelineConfig({
      env: { PA_FETCH_TOPK: "25", PA_FETCH_BACKENDS: "Lens, google", PA_CACHE_ENABLED: "false" },
    });

    expect(resolved.config.fetch.topK).toBe(25);
    expect(resolved.config.fetch.backendSelection).toEqual(["lens", "google"]);
    expect(resolved.config.cache.enabled).toBe(false);
    expect(resolved.overrides.map((o) => o.envVar)).toEqual(["PA_FETCH_TOPK", "PA_FETCH_BACKENDS", "PA_CACHE_ENABLED"]);
  });

  it("maps PA_FETCH_BACKENDS=auto to routed selection", () => {
    const resolved = loadPipelineConfig({ env: { PA_FETCH_BACKENDS: "AUTO" } });

    expect(resolved.config.fetch.backendSelection).toBe("auto");
  });

  it("skips an invalid env override and keeps the previous value", () => {
    const resolved = loadPipelineConfig({ env: { PA_FETCH_TOPK: "many", PA_FETCH_MAX_ATTEMPTS: "4" } });

    expect(resolved.config.fetch.topK).toBe(10);
    expect(resolved.config.fetch.maxAttemptsPerBackend).toBe(4);
    expect(resolved.skippedOverrides).toHaveLength(1);
    expect(resolved.skippedOverrides[0]).toMatch(/^PA_FETCH_TOPK \(invalid: /);
  });

  it("merges a partial config file over the defaults", () => {
    const file = writeConfig(JSON.stringify({ matrix: { maxDocs: 4 }, fetch: { backendSelection: ["espacenet"] } }));

    const resolved = loadPipelineConfig({ filePath: file, env: {} });

    expect(resolved.config.matrix.maxDocs).toBe(4);
    expect(resolved.config.matrix.yesThreshold).toBe(0.6);
    expect(resolved.config.fetch.backendSelection).toEqual(["espacenet"]);
    expect(resolved.filePath).toBe(file);
  });

  it("lets env overrides win over the file and caller overrides win over env", () => {
    const file = writeConfig(JSON.stringify({ fetch: { topK: 5 } }));

    const envOnly = loadPipelineConfig({ filePath: file, env: { PA_FETCH_TOPK: "7" } });
    const withCli = loadPipelineConfig({
      filePath: file,
      env: { PA_FETCH_TOPK: "7" },
      overrides: { fetch: { topK: 9 } },
    });

    expect(envOnly.config.fetch.topK).toBe(7);
    expect(withCli.config.fetch.topK).toBe(9);
  });

  it("rejects an unreadable or non-object file", () => {
    expect(() => loadPipelineConfig({ filePath: writeConfig("{ not json"), env: {} })).toThrow(ConfigValidationError);
    expect(() => loadPipelineConfig({ filePath: writeConfig("[1, 2]"), env: {} })).toThrow(
      "Config file must contain a JSON object",
    );
  });

  it("rejects thresholds in the wrong order", () => {
    const file = writeConfig(JSON.stringify({ matrix: { partialThreshold: 0.8, yesThreshold: 0.5 } }));

    expect(() => loadPipelineConfig({ filePath: file, env: {} })).toThrow(
      "matrix.partialThreshold: partialThreshold must not exceed yesThreshold",
    );
  });

  it("uses the defaults file as the base layer", () => {
    const defaultsPath = path.join(tempDir, "defaults.json");
    fs.writeFileSync(
      defaultsPath,
      JSON.stringify({ ...DEFAULT_PIPELINE_CONFIG, fetch: { ...DEFAULT_PIPELINE_CONFIG.fetch, topK: 6 } }),
      "utf8",
    );
    const file = writeConfig(JSON.stringify({ matrix: { maxDocs: 4 } }));

    const resolved = loadPipelineConfig({ defaultsPath, filePath: file, env: {} });

    expect(resolved.config.fetch.topK).toBe(6);
    expect(resolved.config.matrix.maxDocs).toBe(4);
  });

  it("falls back to the code defaults when the defaults file is invalid", () => {
    const defaultsPath = path.join(tempDir, "defaults.json");
    fs.writeFileSync(defaultsPath, JSON.stringify({ fetch: { topK: 6 } }), "utf8");

    const resolved = loadPipelineConfig({ defaultsPath, env: {} });

    expect(resolved.config).toEqual(DEFAULT_PIPELINE_CONFIG);
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(loadPipelineConfig({ defaultsPath: path.join(tempDir, "absent.json"), env: {} }).config).toEqual(
      DEFAULT_PIPELINE_CONFIG,
    );
  });

  it("reports conflicting settings as warnings", () => {
    const resolved = loadPipelineConfig({ env: { PA_FETCH_FORCE: "true" } });

    expect(resolved.config.fetch.force).toBe(true);
    expect(resolved.warnings).toEqual([
      "fetch.force overrides fetch.resume: previously resolved records will be re-fetched",
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      "[Config-Loader] fetch.force overrides fetch.resume: previously resolved records will be re-fetched",
    );
  });

  it("rejects an invalid caller override", () => {
    expect(() => loadPipelineConfig({ env: {}, overrides: { fetch: { topK: 0 } } })).toThrow(ConfigValidationError);
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] } })).toEqual({ a: { b: 1, c: [3] }, d: 1 });
  });
});

describe("validatePipelineConfig", () => {
  it("accepts the shipped default config file", () => {
    const content = fs.readFileSync(SHIPPED_DEFAULTS_PATH, "utf8");

    const result = validatePipelineConfig(content);

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.config).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it("warns when force and resume are both set", () => {
    const content = JSON.stringify({
      ...DEFAULT_PIPELINE_CONFIG,
      fetch: { ...DEFAULT_PIPELINE_CONFIG.fetch, force: true },
    });

    const result = validatePipelineConfig(content);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      "fetch.force overrides fetch.resume: previously resolved records will be re-fetched",
    ]);
  });

  it("reports parse and schema errors", () => {
    expect(validatePipelineConfig("nope").valid).toBe(false);
    const result = validatePipelineConfig(JSON.stringify({ ...DEFAULT_PIPELINE_CONFIG, cache: { enabled: "yes" } }));
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("cache.enabled: Expected boolean, received string");
  });
});
