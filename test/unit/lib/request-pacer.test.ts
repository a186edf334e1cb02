/**
 * Tests for request pacing (virtual clock).
 */
import { describe, it, expect } from "vitest";
import { RequestPacer } from "@/lib/request-pacer";

function virtualClock(random: () => number) {
  let t = 0;
  const delays: number[] = [];
  return {
    delays,
    deps: {
      now: () => t,
      sleep: async (ms: number) => {
        delays.push(ms);
        t += ms;
      },
      random,
    },
  };
}

const CONFIG = { minIntervalMs: 1000, perBackendMinIntervalMs: 2000, jitterFraction: 0.35 };

describe("RequestPacer", () => {
  it("enforces the per-backend and global gaps", async () => {
    const clock = virtualClock(() => 0.5);
    const pacer = new RequestPacer(CONFIG, clock.deps);

    expect(await pacer.acquire("google")).toBe(0);
    expect(await pacer.acquire("google")).toBe(2000);
    expect(await pacer.acquire("espacenet")).toBe(1000);
    expect(clock.delays).toEqual([2000, 1000]);
  });

  it("applies jitter to the interval", async () => {
    const high = virtualClock(() => 1);
    const pacerHigh = new RequestPacer(CONFIG, high.deps);
    await pacerHigh.acquire("google");
    expect(await pacerHigh.acquire("lens")).toBe(1350);

    const low = virtualClock(() => 0);
    const pacerLow = new RequestPacer(CONFIG, low.deps);
    await pacerLow.acquire("google");
    expect(await pacerLow.acquire("lens")).toBe(650);
  });

  it("does not wait when pacing is off", async () => {
    const clock = virtualClock(() => 0.5);
    const pacer = new RequestPacer({ minIntervalMs: 0, perBackendMinIntervalMs: 0, jitterFraction: 0 }, clock.deps);

    await pacer.acquire("google");
    await pacer.acquire("google");
    expect(clock.delays).toEqual([]);
  });
});
