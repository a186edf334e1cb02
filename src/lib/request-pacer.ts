/**
 * Request Pacer
 *
 * Spaces outgoing claims requests: a global minimum gap between any two
 * network requests plus a per-backend gap, each widened or narrowed by a
 * random jitter. Slots are reserved before sleeping so concurrent callers
 * queue behind each other instead of firing together.
 *
 * @module request-pacer
 */

import type { PacingConfig } from "./config-schemas";
import type { ClaimsBackend } from "./types";

export interface PacerDeps {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
  random: () => number;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

const DEFAULT_DEPS: PacerDeps = {
  now: () => Date.now(),
  sleep,
  random: Math.random,
};

export class RequestPacer {
  private nextGlobalAt = 0;
  private readonly nextBackendAt = new Map<ClaimsBackend, number>();
  private readonly deps: PacerDeps;

  constructor(
    private readonly config: PacingConfig,
    deps: Partial<PacerDeps> = {},
  ) {
    this.deps = { ...DEFAULT_DEPS, ...deps };
  }

  private jittered(intervalMs: number): number {
    if (intervalMs <= 0) return 0;
    const factor = 1 + (this.deps.random() * 2 - 1) * this.config.jitterFraction;
    return Math.max(0, Math.round(intervalMs * factor));
  }

  /**
   * Wait until a request to `backend` is allowed, then reserve the next slots.
   * Returns the time waited in ms.
   */
  async acquire(backend: ClaimsBackend): Promise<number> {
    const now = this.deps.now();
    const startAt = Math.max(now, this.nextGlobalAt, this.nextBackendAt.get(backend) ?? 0);

    this.nextGlobalAt = startAt + this.jittered(this.config.minIntervalMs);
    this.nextBackendAt.set(backend, startAt + this.jittered(this.config.perBackendMinIntervalMs));

    const waitMs = startAt - now;
    if (waitMs > 0) {
      await this.deps.sleep(waitMs);
    }
    return waitMs;
  }
}
