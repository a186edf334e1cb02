/**
 * Claims Backend Circuit Breaker
 *
 * Run-wide health per claims backend. A backend whose records keep ending in
 * transient failures is parked (circuit open) and later records route around
 * it, listing it in claims_skipped_backends. After `resetTimeoutSec` a single
 * record is allowed to try it again; that record's outcome closes or reopens
 * the circuit.
 *
 * Disabled unless circuitBreaker.enabled is set.
 *
 * @module backend-circuit-breaker
 */

import type { CircuitBreakerConfig } from "./config-schemas";
import type { ClaimsBackend } from "./types";

export type CircuitState = "closed" | "open" | "half_open";

interface BackendHealth {
  state: CircuitState;
  /** Records in a row that exhausted this backend on transient failures */
  failedRecords: number;
  openedAt: number;
  trialInFlight: boolean;
}

const health = new Map<ClaimsBackend, BackendHealth>();

function healthOf(backend: ClaimsBackend): BackendHealth {
  let entry = health.get(backend);
  if (!entry) {
    entry = { state: "closed", failedRecords: 0, openedAt: 0, trialInFlight: false };
    health.set(backend, entry);
  }
  return entry;
}

export function getCircuitState(backend: ClaimsBackend): CircuitState {
  return health.get(backend)?.state ?? "closed";
}

/**
 * Whether the next record may try `backend`. While half open, only the
 * record holding the trial slot gets through.
 */
export function isBackendAvailable(backend: ClaimsBackend, cfg: CircuitBreakerConfig): boolean {
  if (!cfg.enabled) return true;
  const entry = healthOf(backend);

  if (entry.state === "open") {
    const waitedMs = Date.now() - entry.openedAt;
    if (waitedMs < cfg.resetTimeoutSec * 1000) {
      console.log(`[Circuit-Breaker] ${backend} parked, ${Math.ceil((cfg.resetTimeoutSec * 1000 - waitedMs) / 1000)}s left`);
      return false;
    }
    entry.state = "half_open";
    console.log(`[Circuit-Breaker] ${backend} reset timeout elapsed, letting one record through`);
  }

  if (entry.state === "half_open") {
    if (entry.trialInFlight) return false;
    entry.trialInFlight = true;
  }
  return true;
}

export function recordBackendSuccess(backend: ClaimsBackend, cfg: CircuitBreakerConfig): void {
  if (!cfg.enabled) return;
  const entry = healthOf(backend);
  if (entry.state !== "closed") {
    console.log(`[Circuit-Breaker] ${backend} recovered`);
  }
  health.set(backend, { state: "closed", failedRecords: 0, openedAt: 0, trialInFlight: false });
}

export function recordBackendFailure(backend: ClaimsBackend, cfg: CircuitBreakerConfig, error?: string): void {
  if (!cfg.enabled) return;
  const entry = healthOf(backend);
  entry.failedRecords++;

  if (entry.state === "half_open" || entry.failedRecords >= cfg.failureThreshold) {
    entry.state = "open";
    entry.openedAt = Date.now();
    entry.trialInFlight = false;
    console.warn(
      `[Circuit-Breaker] ${backend} parked after ${entry.failedRecords} failed record(s) (last error: ${error || "unknown"})`,
    );
  }
}

/**
 * Hand the trial slot back when the trial record ended without a
 * health signal (page reachable, no claims on it).
 */
export function releaseBackendTrial(backend: ClaimsBackend): void {
  const entry = health.get(backend);
  if (entry) entry.trialInFlight = false;
}

export function resetAllCircuits(): void {
  health.clear();
}
