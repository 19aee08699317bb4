// Presence Guard - Shared TypeScript interfaces and types

// ─── Observations ───────────────────────────────────────────────────────────────

/** Per-cycle classification produced by a ClassifierAdapter. */
export type TrustLabel = "trusted" | "untrusted" | "no_signal";

export const TRUST_LABELS: readonly TrustLabel[] = ["trusted", "untrusted", "no_signal"];

export function isTrustLabel(value: unknown): value is TrustLabel {
  return typeof value === "string" && (TRUST_LABELS as readonly string[]).includes(value);
}

export interface Observation {
  /** Monotonic clock reading in seconds. Non-decreasing across a single producer. */
  readonly timestamp: number;
  readonly label: TrustLabel;
}

// ─── Verification ───────────────────────────────────────────────────────────────

export interface VerificationSnapshot {
  readonly verified: boolean;
  /** Monotonic seconds at which `verified` last changed (construction time initially). */
  readonly lastChanged: number;
}

export type VerificationListener = (snapshot: VerificationSnapshot) => void;

// ─── Aggregation ────────────────────────────────────────────────────────────────

/**
 * "windowed-majority": trusted fraction over the last W seconds, compared to the threshold.
 * "untrusted-timeout": trusted verifies at once; unverifies only after a continuous
 * non-trusted stretch longer than the timeout.
 */
export type AggregationStrategy = "windowed-majority" | "untrusted-timeout";

export const AGGREGATION_STRATEGIES: readonly AggregationStrategy[] = [
  "windowed-majority",
  "untrusted-timeout",
];

// ─── Escalation Policies ────────────────────────────────────────────────────────

export type PolicyTone = "cooperative" | "neutral" | "firm" | "severe";

export interface PolicyTier {
  readonly intent: string;
  readonly tone: PolicyTone;
  /** Prompt template; `{utterance}` is replaced by the user's words. */
  readonly template: string;
}

export interface EscalationPolicies {
  readonly verified: PolicyTier;
  /** tiers[0] is level 1. Levels above tiers.length reuse the last tier. */
  readonly tiers: readonly PolicyTier[];
}

export type PolicyKind = "verified" | "unverified";

export interface PolicyDescriptor {
  kind: PolicyKind;
  level: number;
  intent: string;
  tone: PolicyTone;
  prompt: string;
}

export interface GuardReply {
  id: string;
  text: string;
  level: number;
  policy: PolicyDescriptor | null;
  /** True when the fallback reply was used because generation failed. */
  degraded: boolean;
}

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface GuardConfig {
  /** Aggregation window duration W, in seconds. */
  windowSeconds: number;
  /** Sensing loop period, in seconds. */
  cadenceSeconds: number;
  /** Trusted fraction at or above which the window verifies. */
  threshold: number;
  /** Verdict for an empty window. false = fail-closed. */
  emptyWindowVerdict: boolean;
  aggregation: AggregationStrategy;
  /** Only used by the "untrusted-timeout" strategy. */
  untrustedTimeoutSeconds: number;
  maxConsecutiveSensingFailures: number;
  maxGenerationAttempts: number;
  fallbackReply: string;
  policies: EscalationPolicies;
}

// ─── Shell Messages ─────────────────────────────────────────────────────────────

export type ServerMessage =
  | { type: "verification"; verified: boolean; lastChanged: number }
  | { type: "reply"; reply: GuardReply };

/** Monotonic clock in seconds. */
export type Clock = () => number;
