// Property-Based Tests for TrustAggregator
// Windowed verdict equals the trusted-majority rule; aging past W empties the window.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { TrustAggregator } from "./trust-aggregator.js";
import type { TrustLabel } from "./types.js";

const WINDOW_SECONDS = 3;

// ─── Generators ─────────────────────────────────────────────────────────────────

/**
 * Observation sequences whose total span stays under W: at most 50 steps of
 * at most 0.05s each, so nothing is ever evicted.
 */
const arbitraryShortSequence = fc.array(
  fc.record({
    label: fc.constantFrom<TrustLabel>("trusted", "untrusted", "no_signal"),
    step: fc.double({ min: 0, max: 0.05, noNaN: true }),
  }),
  { minLength: 1, maxLength: 50 },
);

function makeAggregator(): TrustAggregator {
  return new TrustAggregator({
    windowSeconds: WINDOW_SECONDS,
    threshold: 0.5,
    emptyWindowVerdict: false,
    aggregation: "windowed-majority",
    untrustedTimeoutSeconds: 10,
  });
}

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("TrustAggregator properties", () => {
  it("verdict equals count(trusted)/count(all) >= 0.5 for sequences shorter than W", () => {
    fc.assert(
      fc.property(arbitraryShortSequence, (sequence) => {
        const aggregator = makeAggregator();
        let t = 0;
        let trusted = 0;
        let verdict = false;

        for (const { label, step } of sequence) {
          t += step;
          verdict = aggregator.ingest({ timestamp: t, label });
          if (label === "trusted") trusted++;
        }

        expect(aggregator.size).toBe(sequence.length);
        expect(verdict).toBe(trusted / sequence.length >= 0.5);
      }),
      { numRuns: 200 },
    );
  });

  it("advancing more than W past the last observation always empties the window and unverifies", () => {
    fc.assert(
      fc.property(
        arbitraryShortSequence,
        fc.double({ min: 0.001, max: 1000, noNaN: true }),
        (sequence, extra) => {
          const aggregator = makeAggregator();
          let t = 0;
          for (const { label, step } of sequence) {
            t += step;
            aggregator.ingest({ timestamp: t, label });
          }

          expect(aggregator.refresh(t + WINDOW_SECONDS + extra)).toBe(false);
          expect(aggregator.size).toBe(0);
        },
      ),
      { numRuns: 200 },
    );
  });
});
