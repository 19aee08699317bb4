// Escalation Controller - dialogue state machine keyed off verification.
//
// Verified            → level 0, concierge policy.
// Unverified(1..N)    → each chat turn raises the level by one, capped at the
//                       tier count; the tier for the new level picks the prompt.
// flip to verified    → level 0, whatever it was before.
//
// The level transition is synchronous and completes before the response
// generator is awaited, so a slow or failing generator cannot disturb it.

import { v4 as uuidv4 } from "uuid";
import { GenerationFailure } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { ResponseGenerator } from "./response-generator.js";
import type { EscalationPolicies, GuardReply, PolicyDescriptor } from "./types.js";
import { errorMessage, fillTemplate } from "./utils.js";

export const EMPTY_UTTERANCE_REPLY = "Please provide a valid input.";

/**
 * Pure policy selection. Level 0 is the verified policy; level L ≥ 1 uses
 * tier min(L, tiers.length), so levels past the top reuse its wording.
 */
export function buildPolicyDescriptor(
  level: number,
  utterance: string,
  policies: EscalationPolicies,
): PolicyDescriptor {
  if (level <= 0) {
    const tier = policies.verified;
    return {
      kind: "verified",
      level: 0,
      intent: tier.intent,
      tone: tier.tone,
      prompt: fillTemplate(tier.template, { utterance }),
    };
  }

  const tier = policies.tiers[Math.min(level, policies.tiers.length) - 1];
  return {
    kind: "unverified",
    level,
    intent: tier.intent,
    tone: tier.tone,
    prompt: fillTemplate(tier.template, { utterance }),
  };
}

export interface EscalationControllerOptions {
  policies: EscalationPolicies;
  /** Reads the current verdict at the start of each turn. */
  isVerified: () => boolean;
  responseGenerator: ResponseGenerator;
  maxGenerationAttempts: number;
  fallbackReply: string;
  logger?: Logger;
}

export class EscalationController {
  private readonly options: EscalationControllerOptions;
  private readonly logger: Logger;
  private level: number;

  constructor(options: EscalationControllerOptions) {
    this.options = options;
    this.logger = options.logger ?? createConsoleLogger("EscalationController");
    this.level = 0;
  }

  get escalationLevel(): number {
    return this.level;
  }

  get tierCount(): number {
    return this.options.policies.tiers.length;
  }

  /** Verification edge handler. A flip to verified always resets the level. */
  handleVerificationChange(verified: boolean): void {
    if (!verified) return;
    if (this.level !== 0) {
      this.logger.info(`Verified, escalation reset from level ${this.level} to 0`);
    }
    this.level = 0;
  }

  /**
   * State transition for one chat turn. Reads the verdict once, updates the
   * level and returns the policy for the new level.
   */
  selectPolicy(utterance: string): PolicyDescriptor {
    if (this.options.isVerified()) {
      this.level = 0;
    } else {
      const next = Math.min(this.level + 1, this.tierCount);
      if (next !== this.level) {
        this.logger.info(`Escalation level: ${next}`);
      }
      this.level = next;
    }
    return buildPolicyDescriptor(this.level, utterance, this.options.policies);
  }

  /**
   * Run one chat turn. Blank input gets a fixed prompt to retry and leaves
   * the level alone. Generation errors and empty replies fall back to the
   * configured apology.
   */
  async chat(utterance: string): Promise<GuardReply> {
    const text = utterance.trim();
    if (text.length === 0) {
      return { id: uuidv4(), text: EMPTY_UTTERANCE_REPLY, level: this.level, policy: null, degraded: false };
    }

    const policy = this.selectPolicy(text);

    try {
      const reply = await this.generate(policy, text);
      return { id: uuidv4(), text: reply, level: policy.level, policy, degraded: false };
    } catch (err) {
      this.logger.error(`Response generation failed at level ${policy.level}: ${errorMessage(err)}`);
      return {
        id: uuidv4(),
        text: this.options.fallbackReply,
        level: policy.level,
        policy,
        degraded: true,
      };
    }
  }

  private async generate(policy: PolicyDescriptor, utterance: string): Promise<string> {
    const attempts = this.options.maxGenerationAttempts;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const reply = (await this.options.responseGenerator.generate(policy, utterance)).trim();
        if (reply.length > 0) return reply;
        lastError = new GenerationFailure("Response generator returned an empty reply");
      } catch (err) {
        lastError = err;
      }
      if (attempt < attempts) {
        this.logger.warn(`Generation attempt ${attempt}/${attempts} failed: ${errorMessage(lastError)}`);
      }
    }

    throw lastError instanceof GenerationFailure
      ? lastError
      : new GenerationFailure(errorMessage(lastError), { cause: lastError });
  }
}
