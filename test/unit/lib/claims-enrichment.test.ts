/**
 * End-to-end enrichment over in-process fakes: top-K, resume, integrity,
 * fetch and manual merge.
 */
import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { resetAllCircuits } from "@/lib/backend-circuit-breaker";
import { EmptyRecallError, enrichPriorArtClaims } from "@/lib/claims-enrichment";
import type { FetchPage } from "@/lib/claims-http";
import type { EnrichedPriorArtRecord } from "@/lib/types";
import {
  CLAIMS_PAGE_HTML,
  FIXED_NOW,
  makeEnriched,
  makeRecord,
  recordingSleep,
  testConfig,
} from "@test/helpers/claims-fixtures";

const INPUT = [
  makeRecord({ patent_number: "US1" }),
  makeRecord({ patent_number: "US2", source: "synthetic" }),
  makeRecord({ patent_number: "US3" }),
];

function fakeDeps(fetchPage: FetchPage) {
  return { fetchPage, cache: null, pacer: null, sleep: recordingSleep().sleep, random: () => 0.5, now: () => FIXED_NOW };
}

function checkpointOf(records: readonly EnrichedPriorArtRecord[]): Map<string, EnrichedPriorArtRecord> {
  return new Map(records.map((r) => [r.patent_number, r]));
}

describe("enrichPriorArtClaims", () => {
  let fetchPage: Mock<FetchPage>;

  beforeEach(() => {
    resetAllCircuits();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    fetchPage = vi.fn<FetchPage>(async () => CLAIMS_PAGE_HTML);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fetches, rejects and reuses records in claimability order", async () => {
    const cached = makeEnriched({ patent_number: "US3", claims_status: "ok", claims_text: "1. Cached claim." });

    const { records, summary } = await enrichPriorArtClaims(INPUT, {
      config: testConfig(),
      checkpoint: checkpointOf([cached]),
      deps: fakeDeps(fetchPage),
    });

    expect(records.map((r) => [r.patent_number, r.claims_status])).toEqual([
      ["US1", "ok"],
      ["US3", "ok"],
      ["US2", "rejected_source"],
    ]);
    expect(records[1]).toBe(cached);
    expect(records[2].claims_error).toBe('source "synthetic" is not an allowed patent source');
    expect(records[2].fetched_at).toBeNull();
    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(fetchPage.mock.calls[0][0]).toBe("https://patents.google.com/patent/US1");
    expect(summary).toMatchObject({ requested: 3, reused: 1, fetched: 1, rejectedSource: 1 });
    expect(summary.quality).toMatchObject({ claims_ok: 2, claims_total: 3, pass: true });
  });

  it("does not re-fetch resolved records on a second run", async () => {
    const first = await enrichPriorArtClaims(INPUT, { config: testConfig(), deps: fakeDeps(fetchPage) });
    fetchPage.mockClear();

    const second = await enrichPriorArtClaims(INPUT, {
      config: testConfig(),
      checkpoint: checkpointOf(first.records),
      deps: fakeDeps(fetchPage),
    });

    expect(fetchPage).not.toHaveBeenCalled();
    expect(second.records).toEqual(first.records);
    expect(second.summary.reused).toBe(2);
  });

  it("ignores the checkpoint under force", async () => {
    const cached = makeEnriched({ patent_number: "US3", claims_status: "ok", claims_text: "1. Cached claim." });

    const { summary } = await enrichPriorArtClaims(INPUT, {
      config: testConfig({ fetch: { force: true } }),
      checkpoint: checkpointOf([cached]),
      deps: fakeDeps(fetchPage),
    });

    expect(summary.reused).toBe(0);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("re-fetches checkpoint records that were not resolved", async () => {
    const failed = makeEnriched({ patent_number: "US3", claims_status: "fetch_blocked_403" });

    const { records } = await enrichPriorArtClaims([makeRecord({ patent_number: "US3" })], {
      config: testConfig(),
      checkpoint: checkpointOf([failed]),
      deps: fakeDeps(fetchPage),
    });

    expect(records[0].claims_status).toBe("ok");
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it("keeps only the top-K claimable records", async () => {
    const { records } = await enrichPriorArtClaims(INPUT, {
      config: testConfig({ fetch: { topK: 1 } }),
      deps: fakeDeps(fetchPage),
    });

    expect(records.map((r) => r.patent_number)).toEqual(["US1"]);
  });

  it("merges manual claims over rejected records", async () => {
    const { records, summary } = await enrichPriorArtClaims(INPUT, {
      config: testConfig(),
      manualEntries: [
        {
          patent_number: "US2",
          claims_text: "1. A manually copied claim.",
          claims_source_url: "https://example.org/US2.pdf",
          claims_source_type: "pdf_copy",
        },
      ],
      deps: fakeDeps(fetchPage),
    });

    expect(records[2].claims_status).toBe("manual_ok");
    expect(summary.manualAccepted).toEqual(["US2"]);
    expect(summary.manualRejected).toEqual([]);
    expect(summary.quality.claims_ok).toBe(3);
  });

  it("applies the minimum ok ratio from the fetch config", async () => {
    const { summary } = await enrichPriorArtClaims(INPUT, {
      config: testConfig({ fetch: { requireMinOkRatio: 0.9 } }),
      deps: fakeDeps(fetchPage),
    });

    expect(summary.quality.min_claims_ok_ratio).toBe(0.9);
    expect(summary.quality.pass).toBe(false);
  });

  it("fails on an empty recall unless allowed", async () => {
    const unusable = [makeRecord({ patent_number: "", url: "" })];

    await expect(
      enrichPriorArtClaims(unusable, { config: testConfig(), deps: fakeDeps(fetchPage) }),
    ).rejects.toBeInstanceOf(EmptyRecallError);

    const allowed = await enrichPriorArtClaims(unusable, {
      config: testConfig({ fetch: { failOnEmptyRecall: false } }),
      deps: fakeDeps(fetchPage),
    });
    expect(allowed.records).toEqual([]);
    expect(allowed.summary.quality).toMatchObject({ claims_total: 0, claims_ok_ratio: 0, pass: true });
  });
});
