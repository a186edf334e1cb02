/**
 * Claims quality gate: exact ratio, pass/fail and enforcement.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  enforceClaimsQualityGate,
  evaluateClaimsQualityGate,
  QualityGateError,
} from "@/lib/analyzer/quality-gate";

const statuses = (...list: string[]) => list.map((claims_status) => ({ claims_status }));

describe("evaluateClaimsQualityGate", () => {
  it("counts usable statuses", () => {
    const report = evaluateClaimsQualityGate(
      statuses("ok", "manual_ok", "ok_fallback", "claims_section_not_found", ""),
      0.5,
    );

    expect(report).toEqual({
      claims_ok: 3,
      claims_total: 5,
      claims_ok_ratio: 0.6,
      claims_status_counts: { ok: 1, manual_ok: 1, ok_fallback: 1, claims_section_not_found: 1, unknown: 1 },
      min_claims_ok_ratio: 0.5,
      pass: true,
    });
  });

  it("passes when the ratio equals the minimum", () => {
    const records = statuses("ok", "ok", "ok", ...Array<string>(7).fill("fetch_blocked_403"));

    const report = evaluateClaimsQualityGate(records, 0.3);

    expect(report.claims_ok_ratio).toBe(0.3);
    expect(report.pass).toBe(true);
  });

  it("passes seven usable documents out of ten at minimum 0.3", () => {
    const records = statuses(...Array<string>(7).fill("ok"), ...Array<string>(3).fill("fetch_blocked_403"));

    const report = evaluateClaimsQualityGate(records, 0.3);

    expect(report).toMatchObject({ claims_ok: 7, claims_total: 10, claims_ok_ratio: 0.7, pass: true });
  });

  it("fails below the minimum", () => {
    const report = evaluateClaimsQualityGate(statuses("ok", "fetch_timeout", "fetch_timeout"), 0.5);

    expect(report.claims_ok_ratio).toBeCloseTo(1 / 3, 10);
    expect(report.pass).toBe(false);
  });

  it("treats an empty list as ratio 0 and clamps a negative minimum", () => {
    expect(evaluateClaimsQualityGate([], 0)).toMatchObject({ claims_total: 0, claims_ok_ratio: 0, pass: true });
    expect(evaluateClaimsQualityGate(statuses("error"), -1).pass).toBe(true);
  });
});

describe("enforceClaimsQualityGate", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const failing = () => evaluateClaimsQualityGate(statuses("ok", "error", "error"), 0.9);

  it("throws when the gate fails and failing is requested", () => {
    expect(() => enforceClaimsQualityGate(failing(), true)).toThrow(
      new QualityGateError(failing()),
    );
    expect(() => enforceClaimsQualityGate(failing(), true)).toThrow(
      "claims quality gate failed: 1/3=0.333 < min 0.900",
    );
  });

  it("warns and continues otherwise", () => {
    expect(() => enforceClaimsQualityGate(failing(), false)).not.toThrow();
    expect(console.warn).toHaveBeenCalledWith(
      "[Quality-Gate] Below minimum: 1/3 (ratio=0.333 < 0.900), continuing",
    );
  });

  it("logs a pass", () => {
    enforceClaimsQualityGate(evaluateClaimsQualityGate(statuses("ok"), 0.3), true);

    expect(console.log).toHaveBeenCalledWith("[Quality-Gate] PASS 1/1 (ratio=1.000)");
  });
});
