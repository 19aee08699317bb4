// ─── Trust Aggregator ───────────────────────────────────────────────────────────
// Smooths per-cycle trust labels into a single verdict.
//
// Precondition: observation timestamps (and `refresh` readings) are
// non-decreasing. The sensing loop is the single producer and reads a
// monotonic clock, so this is not re-checked here.

import type { AggregationStrategy, Observation } from "./types.js";

export interface TrustAggregatorConfig {
  /** Window duration W in seconds. */
  windowSeconds: number;
  /** Trusted fraction at or above which the window verifies. Ties verify. */
  threshold: number;
  /** Verdict for an empty window (false = fail-closed). */
  emptyWindowVerdict: boolean;
  aggregation: AggregationStrategy;
  untrustedTimeoutSeconds: number;
}

/**
 * Windowed-majority aggregator, with the untrusted-timeout strategy available
 * behind `aggregation: "untrusted-timeout"`.
 *
 * Windowed majority: every observation within the last `windowSeconds` votes;
 * `no_signal` votes as non-trusted, so a camera outage pulls the verdict down
 * as trusted votes age out. The bound is time-based, never an item count.
 *
 * Untrusted timeout: a trusted label verifies immediately. Non-trusted labels
 * only unverify once they have persisted for longer than
 * `untrustedTimeoutSeconds`, or once no observation has arrived for that long.
 */
export class TrustAggregator {
  private readonly config: TrustAggregatorConfig;
  private window: Observation[];
  private verdict: boolean;
  private lastFraction: number | null;

  // untrusted-timeout state
  private untrustedSince: number | null;
  private lastObservationAt: number | null;

  constructor(config: TrustAggregatorConfig) {
    this.config = config;
    this.window = [];
    this.verdict = config.emptyWindowVerdict;
    this.lastFraction = null;
    this.untrustedSince = null;
    this.lastObservationAt = null;
  }

  /**
   * Add an observation, evict everything older than W relative to its
   * timestamp, and recompute. Returns the new verdict.
   */
  ingest(observation: Observation): boolean {
    if (this.config.aggregation === "untrusted-timeout") {
      return this.ingestWithTimeout(observation);
    }

    this.window.push(observation);
    return this.recompute(observation.timestamp);
  }

  /**
   * Re-evaluate at `now` without a new observation. Used for skipped cycles
   * and for letting the window age when nothing arrives.
   */
  refresh(now: number): boolean {
    if (this.config.aggregation === "untrusted-timeout") {
      return this.applyTimeout(now);
    }
    return this.recompute(now);
  }

  /** Latest computed verdict. No side effects. */
  currentVerdict(): boolean {
    return this.verdict;
  }

  /** Trusted fraction behind the last windowed verdict, or null for an empty window. */
  trustedFraction(): number | null {
    return this.lastFraction;
  }

  /**
   * Earliest clock reading at which `refresh` could change the verdict, or
   * null if only a new observation can.
   */
  nextExpiry(): number | null {
    if (this.config.aggregation === "untrusted-timeout") {
      if (!this.verdict) return null;
      const timeout = this.config.untrustedTimeoutSeconds;
      const deadlines: number[] = [];
      if (this.untrustedSince !== null) deadlines.push(this.untrustedSince + timeout);
      if (this.lastObservationAt !== null) deadlines.push(this.lastObservationAt + timeout);
      return deadlines.length > 0 ? Math.min(...deadlines) : null;
    }
    return this.window.length > 0 ? this.window[0].timestamp + this.config.windowSeconds : null;
  }

  get size(): number {
    return this.window.length;
  }

  observations(): readonly Observation[] {
    return [...this.window];
  }

  /** Drop all history and return to the empty-window verdict. */
  reset(): void {
    this.window = [];
    this.verdict = this.config.emptyWindowVerdict;
    this.lastFraction = null;
    this.untrustedSince = null;
    this.lastObservationAt = null;
  }

  // ── Windowed majority ──────────────────────────────────────────────────────

  private recompute(now: number): boolean {
    this.evict(now);

    if (this.window.length === 0) {
      this.lastFraction = null;
      this.verdict = this.config.emptyWindowVerdict;
      return this.verdict;
    }

    let trusted = 0;
    for (const o of this.window) {
      if (o.label === "trusted") trusted++;
    }
    this.lastFraction = trusted / this.window.length;
    this.verdict = this.lastFraction >= this.config.threshold;
    return this.verdict;
  }

  private evict(now: number): void {
    let staleCount = 0;
    while (
      staleCount < this.window.length &&
      now - this.window[staleCount].timestamp > this.config.windowSeconds
    ) {
      staleCount++;
    }
    if (staleCount > 0) {
      this.window.splice(0, staleCount);
    }
  }

  // ── Untrusted timeout ──────────────────────────────────────────────────────

  private ingestWithTimeout(observation: Observation): boolean {
    this.lastObservationAt = observation.timestamp;

    if (observation.label === "trusted") {
      this.untrustedSince = null;
      this.verdict = true;
      return this.verdict;
    }

    if (this.untrustedSince === null) {
      this.untrustedSince = observation.timestamp;
    }
    return this.applyTimeout(observation.timestamp);
  }

  private applyTimeout(now: number): boolean {
    const timeout = this.config.untrustedTimeoutSeconds;

    if (this.untrustedSince !== null && now - this.untrustedSince > timeout) {
      this.verdict = false;
    } else if (this.lastObservationAt !== null && now - this.lastObservationAt > timeout) {
      this.verdict = false;
    }
    return this.verdict;
  }
}
