// Unit tests for TrustAggregator

import { describe, it, expect } from "vitest";
import { TrustAggregator, type TrustAggregatorConfig } from "./trust-aggregator.js";
import type { Observation, TrustLabel } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeConfig(overrides: Partial<TrustAggregatorConfig> = {}): TrustAggregatorConfig {
  return {
    windowSeconds: 3,
    threshold: 0.5,
    emptyWindowVerdict: false,
    aggregation: "windowed-majority",
    untrustedTimeoutSeconds: 10,
    ...overrides,
  };
}

function obs(timestamp: number, label: TrustLabel): Observation {
  return { timestamp, label };
}

// ─── Windowed majority ──────────────────────────────────────────────────────────

describe("TrustAggregator (windowed-majority)", () => {
  it("starts fail-closed with an empty window", () => {
    const aggregator = new TrustAggregator(makeConfig());
    expect(aggregator.currentVerdict()).toBe(false);
    expect(aggregator.size).toBe(0);
    expect(aggregator.trustedFraction()).toBeNull();
  });

  it("first observation alone decides the verdict", () => {
    const trusted = new TrustAggregator(makeConfig());
    expect(trusted.ingest(obs(0, "trusted"))).toBe(true);

    const untrusted = new TrustAggregator(makeConfig());
    expect(untrusted.ingest(obs(0, "untrusted"))).toBe(false);
  });

  it("one trusted out of three is not verified (1/3 < 0.5)", () => {
    const aggregator = new TrustAggregator(makeConfig());
    aggregator.ingest(obs(0, "trusted"));
    aggregator.ingest(obs(1, "untrusted"));
    const verdict = aggregator.ingest(obs(2, "untrusted"));

    expect(verdict).toBe(false);
    expect(aggregator.trustedFraction()).toBeCloseTo(1 / 3, 10);
    expect(aggregator.size).toBe(3);
  });

  it("an exact tie verifies", () => {
    const aggregator = new TrustAggregator(makeConfig());
    aggregator.ingest(obs(0, "trusted"));
    expect(aggregator.ingest(obs(1, "untrusted"))).toBe(true);
    expect(aggregator.trustedFraction()).toBe(0.5);
  });

  it("counts no_signal as a non-trusted vote", () => {
    const aggregator = new TrustAggregator(makeConfig());
    aggregator.ingest(obs(0, "trusted"));
    expect(aggregator.ingest(obs(0.5, "no_signal"))).toBe(true);
    expect(aggregator.ingest(obs(1, "no_signal"))).toBe(false);
  });

  it("four trusted within a second verify, then four seconds of silence unverify", () => {
    const aggregator = new TrustAggregator(makeConfig());
    for (const t of [0, 0.25, 0.5, 1.0]) {
      aggregator.ingest(obs(t, "trusted"));
    }
    expect(aggregator.currentVerdict()).toBe(true);

    expect(aggregator.refresh(5.0)).toBe(false);
    expect(aggregator.size).toBe(0);
    expect(aggregator.trustedFraction()).toBeNull();
  });

  it("keeps an observation exactly W seconds old and evicts one just older", () => {
    const aggregator = new TrustAggregator(makeConfig());
    for (const t of [0, 0.25, 0.5, 0.75, 1.0]) {
      aggregator.ingest(obs(t, "trusted"));
    }

    aggregator.refresh(4.0);
    expect(aggregator.observations().map((o) => o.timestamp)).toEqual([1.0]);
    expect(aggregator.currentVerdict()).toBe(true);
  });

  it("evicts stale entries from the front on ingest", () => {
    const aggregator = new TrustAggregator(makeConfig());
    aggregator.ingest(obs(0, "trusted"));
    aggregator.ingest(obs(1, "trusted"));
    const verdict = aggregator.ingest(obs(3.5, "untrusted"));

    // t=0 is 3.5s old and goes; t=1 stays (2.5s old).
    expect(aggregator.observations().map((o) => o.timestamp)).toEqual([1, 3.5]);
    expect(verdict).toBe(true);
  });

  it("handles a flush where every entry is stale", () => {
    const aggregator = new TrustAggregator(makeConfig());
    aggregator.ingest(obs(0, "trusted"));
    aggregator.ingest(obs(1, "trusted"));
    aggregator.ingest(obs(2, "trusted"));

    expect(aggregator.ingest(obs(1000, "untrusted"))).toBe(false);
    expect(aggregator.size).toBe(1);

    expect(aggregator.refresh(5000)).toBe(false);
    expect(aggregator.size).toBe(0);
  });

  it("applies a configured threshold", () => {
    const aggregator = new TrustAggregator(makeConfig({ threshold: 0.75 }));
    aggregator.ingest(obs(0, "trusted"));
    aggregator.ingest(obs(0.1, "trusted"));
    expect(aggregator.ingest(obs(0.2, "untrusted"))).toBe(false);
    expect(aggregator.ingest(obs(0.3, "trusted"))).toBe(true);
  });

  it("uses the fail-open verdict for an empty window when configured", () => {
    const aggregator = new TrustAggregator(makeConfig({ emptyWindowVerdict: true }));
    expect(aggregator.currentVerdict()).toBe(true);

    aggregator.ingest(obs(0, "untrusted"));
    expect(aggregator.currentVerdict()).toBe(false);
    expect(aggregator.refresh(10)).toBe(true);
  });

  it("currentVerdict has no side effects", () => {
    const aggregator = new TrustAggregator(makeConfig());
    aggregator.ingest(obs(0, "trusted"));
    expect(aggregator.currentVerdict()).toBe(true);
    expect(aggregator.currentVerdict()).toBe(true);
    expect(aggregator.size).toBe(1);
  });

  it("observations() returns a copy", () => {
    const aggregator = new TrustAggregator(makeConfig());
    aggregator.ingest(obs(0, "trusted"));
    const copy = aggregator.observations();
    expect(copy).toEqual([{ timestamp: 0, label: "trusted" }]);
    expect(copy).not.toBe(aggregator.observations());
  });

  it("reset() clears the window back to the empty verdict", () => {
    const aggregator = new TrustAggregator(makeConfig());
    aggregator.ingest(obs(0, "trusted"));
    aggregator.reset();
    expect(aggregator.size).toBe(0);
    expect(aggregator.currentVerdict()).toBe(false);
  });
});

// ─── Untrusted timeout ──────────────────────────────────────────────────────────

describe("TrustAggregator (untrusted-timeout)", () => {
  const config = makeConfig({ aggregation: "untrusted-timeout", untrustedTimeoutSeconds: 10 });

  it("verifies on the first trusted observation", () => {
    const aggregator = new TrustAggregator(config);
    expect(aggregator.currentVerdict()).toBe(false);
    expect(aggregator.ingest(obs(0, "trusted"))).toBe(true);
  });

  it("stays verified until non-trusted labels persist past the timeout", () => {
    const aggregator = new TrustAggregator(config);
    aggregator.ingest(obs(0, "trusted"));

    expect(aggregator.ingest(obs(5, "untrusted"))).toBe(true);
    expect(aggregator.ingest(obs(15, "no_signal"))).toBe(true);
    expect(aggregator.ingest(obs(15.5, "untrusted"))).toBe(false);
  });

  it("a trusted label clears the untrusted timer", () => {
    const aggregator = new TrustAggregator(config);
    aggregator.ingest(obs(0, "trusted"));
    aggregator.ingest(obs(5, "untrusted"));
    aggregator.ingest(obs(12, "trusted"));

    expect(aggregator.ingest(obs(16, "untrusted"))).toBe(true);
    expect(aggregator.ingest(obs(26, "untrusted"))).toBe(true);
    expect(aggregator.ingest(obs(26.1, "untrusted"))).toBe(false);
  });

  it("fails closed when no observation arrives for longer than the timeout", () => {
    const aggregator = new TrustAggregator(config);
    aggregator.ingest(obs(0, "trusted"));

    expect(aggregator.refresh(10)).toBe(true);
    expect(aggregator.refresh(10.5)).toBe(false);
  });

  it("never keeps a window", () => {
    const aggregator = new TrustAggregator(config);
    aggregator.ingest(obs(0, "trusted"));
    aggregator.ingest(obs(1, "untrusted"));
    expect(aggregator.size).toBe(0);
  });
});

// ─── Expiry ─────────────────────────────────────────────────────────────────────

describe("TrustAggregator.nextExpiry", () => {
  it("points at the moment the oldest windowed observation ages out", () => {
    const aggregator = new TrustAggregator(makeConfig());
    expect(aggregator.nextExpiry()).toBeNull();

    aggregator.ingest(obs(1, "trusted"));
    expect(aggregator.nextExpiry()).toBe(4);
    aggregator.ingest(obs(2, "untrusted"));
    expect(aggregator.nextExpiry()).toBe(4);

    aggregator.refresh(4.5);
    expect(aggregator.nextExpiry()).toBe(5);
    aggregator.refresh(5.5);
    expect(aggregator.nextExpiry()).toBeNull();
  });

  it("tracks the earliest timeout while verified and nothing once unverified", () => {
    const aggregator = new TrustAggregator(makeConfig({ aggregation: "untrusted-timeout" }));
    expect(aggregator.nextExpiry()).toBeNull();

    aggregator.ingest(obs(0, "trusted"));
    expect(aggregator.nextExpiry()).toBe(10);
    aggregator.ingest(obs(2, "untrusted"));
    expect(aggregator.nextExpiry()).toBe(12);

    expect(aggregator.ingest(obs(13, "untrusted"))).toBe(false);
    expect(aggregator.nextExpiry()).toBeNull();
  });
});
