// Guard configuration: defaults, validation and environment loading.
//
// Validation runs once at engine construction. Anything invalid is a
// ConfigurationError and the engine never starts.

import { ConfigurationError } from "./errors.js";
import { DEFAULT_POLICIES } from "./prompts.js";
import { AGGREGATION_STRATEGIES } from "./types.js";
import type { AggregationStrategy, EscalationPolicies, GuardConfig, PolicyTier } from "./types.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_GUARD_CONFIG: GuardConfig = {
  windowSeconds: 3,
  cadenceSeconds: 10,
  threshold: 0.5,
  emptyWindowVerdict: false,
  aggregation: "windowed-majority",
  untrustedTimeoutSeconds: 10,
  maxConsecutiveSensingFailures: 5,
  maxGenerationAttempts: 2,
  fallbackReply: "I'm sorry, I can't respond right now. Please stay where you are.",
  policies: DEFAULT_POLICIES,
};

// ─── Validation ─────────────────────────────────────────────────────────────────

function requirePositive(option: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(option, `must be a positive number, got ${value}`);
  }
}

function requirePositiveInteger(option: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(option, `must be a positive integer, got ${value}`);
  }
}

function validateTier(option: string, tier: PolicyTier): void {
  if (tier.template.trim().length === 0) {
    throw new ConfigurationError(option, "template must not be empty");
  }
}

/** Frozen copy, so callers holding the original can't change a running engine's tiers. */
function freezePolicies(policies: EscalationPolicies): EscalationPolicies {
  return Object.freeze({
    verified: Object.freeze({ ...policies.verified }),
    tiers: Object.freeze(policies.tiers.map((tier) => Object.freeze({ ...tier }))),
  });
}

/**
 * Merge overrides onto the defaults and validate the result. The returned
 * policies are a frozen copy.
 * @throws ConfigurationError on the first invalid option.
 */
export function resolveGuardConfig(overrides: Partial<GuardConfig> = {}): GuardConfig {
  const config: GuardConfig = { ...DEFAULT_GUARD_CONFIG, ...overrides };

  requirePositive("windowSeconds", config.windowSeconds);
  requirePositive("cadenceSeconds", config.cadenceSeconds);
  if (!Number.isFinite(config.threshold) || config.threshold <= 0 || config.threshold > 1) {
    throw new ConfigurationError("threshold", `must be in (0, 1], got ${config.threshold}`);
  }
  if (!AGGREGATION_STRATEGIES.includes(config.aggregation)) {
    throw new ConfigurationError(
      "aggregation",
      `must be one of ${AGGREGATION_STRATEGIES.join(", ")}, got "${config.aggregation}"`,
    );
  }
  requirePositive("untrustedTimeoutSeconds", config.untrustedTimeoutSeconds);
  requirePositiveInteger("maxConsecutiveSensingFailures", config.maxConsecutiveSensingFailures);
  requirePositiveInteger("maxGenerationAttempts", config.maxGenerationAttempts);
  if (config.fallbackReply.trim().length === 0) {
    throw new ConfigurationError("fallbackReply", "must not be empty");
  }
  if (config.policies.tiers.length === 0) {
    throw new ConfigurationError("policies.tiers", "at least one escalation tier is required");
  }
  validateTier("policies.verified", config.policies.verified);
  config.policies.tiers.forEach((tier, i) => validateTier(`policies.tiers[${i}]`, tier));

  return Object.freeze({ ...config, policies: freezePolicies(config.policies) });
}

// ─── Environment ────────────────────────────────────────────────────────────────

function readNumber(env: NodeJS.ProcessEnv, name: string, option: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(option, `${name}="${raw}" is not a number`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, option: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  throw new ConfigurationError(option, `${name}="${raw}" is not a boolean`);
}

function readStrategy(env: NodeJS.ProcessEnv): AggregationStrategy | undefined {
  const raw = env.GUARD_AGGREGATION;
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = raw.trim();
  const match = AGGREGATION_STRATEGIES.find((s) => s === value);
  if (!match) {
    throw new ConfigurationError(
      "aggregation",
      `GUARD_AGGREGATION="${raw}" must be one of ${AGGREGATION_STRATEGIES.join(", ")}`,
    );
  }
  return match;
}

/**
 * Read GUARD_* variables into a validated config. Unset variables keep
 * their defaults.
 */
export function loadGuardConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GuardConfig {
  const overrides: Partial<GuardConfig> = {};

  const windowSeconds = readNumber(env, "GUARD_WINDOW_SECONDS", "windowSeconds");
  if (windowSeconds !== undefined) overrides.windowSeconds = windowSeconds;

  const cadenceSeconds = readNumber(env, "GUARD_CADENCE_SECONDS", "cadenceSeconds");
  if (cadenceSeconds !== undefined) overrides.cadenceSeconds = cadenceSeconds;

  const threshold = readNumber(env, "GUARD_MATCH_THRESHOLD", "threshold");
  if (threshold !== undefined) overrides.threshold = threshold;

  const failOpen = readBoolean(env, "GUARD_FAIL_OPEN", "emptyWindowVerdict");
  if (failOpen !== undefined) overrides.emptyWindowVerdict = failOpen;

  const aggregation = readStrategy(env);
  if (aggregation !== undefined) overrides.aggregation = aggregation;

  const timeout = readNumber(env, "GUARD_UNTRUSTED_TIMEOUT_SECONDS", "untrustedTimeoutSeconds");
  if (timeout !== undefined) overrides.untrustedTimeoutSeconds = timeout;

  const maxFailures = readNumber(env, "GUARD_MAX_SENSING_FAILURES", "maxConsecutiveSensingFailures");
  if (maxFailures !== undefined) overrides.maxConsecutiveSensingFailures = maxFailures;

  const maxAttempts = readNumber(env, "GUARD_MAX_GENERATION_ATTEMPTS", "maxGenerationAttempts");
  if (maxAttempts !== undefined) overrides.maxGenerationAttempts = maxAttempts;

  return resolveGuardConfig(overrides);
}

/**
 * Age limit for labels pushed by the shell. Defaults to two cadences so a
 * shell pushing once per cadence is never sampled just past the limit.
 */
export function loadObservationMaxAgeFromEnv(
  cadenceSeconds: number,
  env: NodeJS.ProcessEnv = process.env,
): number {
  const maxAge = readNumber(env, "GUARD_OBSERVATION_MAX_AGE_SECONDS", "observationMaxAgeSeconds");
  if (maxAge === undefined) return 2 * cadenceSeconds;
  requirePositive("observationMaxAgeSeconds", maxAge);
  return maxAge;
}
