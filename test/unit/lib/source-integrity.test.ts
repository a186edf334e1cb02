import { describe, it, expect } from "vitest";
import { DEFAULT_PIPELINE_CONFIG } from "@/lib/config-schemas";
import { validateRecordSource } from "@/lib/source-integrity";
import { makeRecord } from "@test/helpers/claims-fixtures";

const strict = DEFAULT_PIPELINE_CONFIG.integrity;

describe("validateRecordSource", () => {
  it("accepts an allowed source regardless of case", () => {
    expect(validateRecordSource(makeRecord({ source: "lens.ORG" }), strict)).toEqual({
      isValid: true,
      failureReasons: [],
    });
  });

  it("accepts a record with an empty source", () => {
    expect(validateRecordSource(makeRecord({ source: "" }), strict).isValid).toBe(true);
  });

  it("rejects forbidden markers and unlisted sources", () => {
    const result = validateRecordSource(makeRecord({ source: "Manual fallback" }), strict);

    expect(result.isValid).toBe(false);
    expect(result.failureReasons).toEqual([
      'forbidden source marker(s) in "Manual fallback": manual, fallback',
      'source "Manual fallback" is not an allowed patent source',
    ]);
  });

  it("rejects an unlisted source without markers", () => {
    expect(validateRecordSource(makeRecord({ source: "Blog" }), strict).failureReasons).toEqual([
      'source "Blog" is not an allowed patent source',
    ]);
  });

  it("rejects a record that cannot be identified", () => {
    const result = validateRecordSource(makeRecord({ patent_number: " ", url: "" }), strict);

    expect(result.failureReasons).toEqual(["record has neither patent number nor URL"]);
  });

  it("accepts everything when strict sources are off", () => {
    const result = validateRecordSource(makeRecord({ source: "synthetic mock" }), { ...strict, strictSources: false });

    expect(result).toEqual({ isValid: true, failureReasons: [] });
  });
});
