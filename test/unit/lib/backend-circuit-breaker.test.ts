/**
 * Tests for the claims backend circuit breaker.
 *
 * Validates CLOSED → OPEN → HALF_OPEN → CLOSED transitions and the
 * disabled default.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  getCircuitState,
  isBackendAvailable,
  recordBackendFailure,
  recordBackendSuccess,
  releaseBackendTrial,
  resetAllCircuits,
} from "@/lib/backend-circuit-breaker";
import type { CircuitBreakerConfig } from "@/lib/config-schemas";

const TEST_CONFIG: CircuitBreakerConfig = {
  enabled: true,
  failureThreshold: 3,
  resetTimeoutSec: 5,
};

const START = new Date("2026-01-01T00:00:00.000Z");

function openCircuit(): void {
  recordBackendFailure("google", TEST_CONFIG, "HTTP 503");
  recordBackendFailure("google", TEST_CONFIG, "HTTP 503");
  recordBackendFailure("google", TEST_CONFIG, "HTTP 503");
}

describe("Backend Circuit Breaker", () => {
  beforeEach(() => {
    resetAllCircuits();
    vi.useFakeTimers();
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts CLOSED", () => {
    expect(isBackendAvailable("google", TEST_CONFIG)).toBe(true);
  });

  it("opens after the failure threshold", () => {
    recordBackendFailure("google", TEST_CONFIG);
    recordBackendFailure("google", TEST_CONFIG);
    expect(isBackendAvailable("google", TEST_CONFIG)).toBe(true);

    recordBackendFailure("google", TEST_CONFIG);
    expect(isBackendAvailable("google", TEST_CONFIG)).toBe(false);
    expect(isBackendAvailable("espacenet", TEST_CONFIG)).toBe(true);
  });

  it("resets the consecutive count on success", () => {
    recordBackendFailure("google", TEST_CONFIG);
    recordBackendFailure("google", TEST_CONFIG);
    recordBackendSuccess("google", TEST_CONFIG);
    recordBackendFailure("google", TEST_CONFIG);

    expect(isBackendAvailable("google", TEST_CONFIG)).toBe(true);
    recordBackendFailure("google", TEST_CONFIG);
    expect(getCircuitState("google")).toBe("closed");
    recordBackendFailure("google", TEST_CONFIG);
    expect(getCircuitState("google")).toBe("open");
  });

  it("lets exactly one trial record through after the reset timeout", () => {
    openCircuit();
    vi.setSystemTime(new Date(START.getTime() + 4000));
    expect(isBackendAvailable("google", TEST_CONFIG)).toBe(false);

    vi.setSystemTime(new Date(START.getTime() + 5000));
    expect(isBackendAvailable("google", TEST_CONFIG)).toBe(true);
    expect(isBackendAvailable("google", TEST_CONFIG)).toBe(false);

    recordBackendSuccess("google", TEST_CONFIG);
    expect(getCircuitState("google")).toBe("closed");
    expect(isBackendAvailable("google", TEST_CONFIG)).toBe(true);
  });

  it("reopens when the trial record fails", () => {
    openCircuit();
    vi.setSystemTime(new Date(START.getTime() + 5000));
    expect(isBackendAvailable("google", TEST_CONFIG)).toBe(true);

    recordBackendFailure("google", TEST_CONFIG, "HTTP 503");
    expect(getCircuitState("google")).toBe("open");
    expect(isBackendAvailable("google", TEST_CONFIG)).toBe(false);
  });

  it("frees the trial slot when released without an outcome", () => {
    openCircuit();
    vi.setSystemTime(new Date(START.getTime() + 5000));
    expect(isBackendAvailable("google", TEST_CONFIG)).toBe(true);

    releaseBackendTrial("google");
    expect(isBackendAvailable("google", TEST_CONFIG)).toBe(true);
  });

  it("does nothing when disabled", () => {
    const disabled = { ...TEST_CONFIG, enabled: false };
    recordBackendFailure("lens", disabled);
    recordBackendFailure("lens", disabled);
    recordBackendFailure("lens", disabled);

    expect(isBackendAvailable("lens", disabled)).toBe(true);
    expect(getCircuitState("lens")).toBe("closed");
  });
});
