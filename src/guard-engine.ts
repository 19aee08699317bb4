// Presence Guard - Engine
// Explicitly constructed owner of all guard state: the aggregator window,
// the verification snapshot and the escalation level. Collaborators get a
// reference to the engine; there are no module-level singletons.
//
// Writers:
//   verification snapshot ← sensing path only (ingest / skipped cycle /
//                           window expiry / fatal)
//   escalation level      ← chat path and verification flips only

import type { ClassifierAdapter } from "./classifier-adapter.js";
import { resolveGuardConfig } from "./config.js";
import type { SensingFailure } from "./errors.js";
import { EscalationController } from "./escalation-controller.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { ResponseGenerator } from "./response-generator.js";
import { SensingLoop, type StopResult } from "./sensing-loop.js";
import { TrustAggregator } from "./trust-aggregator.js";
import type {
  Clock,
  GuardConfig,
  GuardReply,
  Observation,
  VerificationListener,
  VerificationSnapshot,
} from "./types.js";
import { VerificationState } from "./verification-state.js";
import { monotonicSeconds } from "./utils.js";

export interface GuardEngineDeps {
  adapter: ClassifierAdapter;
  responseGenerator: ResponseGenerator;
  clock?: Clock;
  logger?: Logger;
}

export class GuardEngine {
  readonly config: GuardConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly aggregator: TrustAggregator;
  private readonly verification: VerificationState;
  private readonly escalation: EscalationController;
  private readonly sensingLoop: SensingLoop;

  /**
   * @throws ConfigurationError if the merged config is invalid; the engine
   *   is never constructed in that case.
   */
  constructor(config: Partial<GuardConfig>, deps: GuardEngineDeps) {
    this.config = resolveGuardConfig(config);
    this.clock = deps.clock ?? monotonicSeconds;
    this.logger = deps.logger ?? createConsoleLogger("GuardEngine");

    this.aggregator = new TrustAggregator({
      windowSeconds: this.config.windowSeconds,
      threshold: this.config.threshold,
      emptyWindowVerdict: this.config.emptyWindowVerdict,
      aggregation: this.config.aggregation,
      untrustedTimeoutSeconds: this.config.untrustedTimeoutSeconds,
    });

    this.verification = new VerificationState(this.clock(), this.logger);

    this.escalation = new EscalationController({
      policies: this.config.policies,
      isVerified: () => this.verification.get(),
      responseGenerator: deps.responseGenerator,
      maxGenerationAttempts: this.config.maxGenerationAttempts,
      fallbackReply: this.config.fallbackReply,
      logger: this.logger,
    });

    this.verification.onChange((snapshot) => {
      this.logger.info(`State changed to: ${snapshot.verified ? "Verified" : "Unverified"}`);
      this.escalation.handleVerificationChange(snapshot.verified);
    });

    this.sensingLoop = new SensingLoop(
      {
        cadenceSeconds: this.config.cadenceSeconds,
        maxConsecutiveFailures: this.config.maxConsecutiveSensingFailures,
      },
      {
        adapter: deps.adapter,
        onObservation: (observation) => this.ingest(observation),
        onSkippedCycle: (now) => this.refresh(now),
        onFatal: (failure) => this.handleFatalSensing(failure),
        windowExpiry: {
          nextAt: () => this.aggregator.nextExpiry(),
          refresh: (now) => this.refresh(now),
        },
        clock: this.clock,
        logger: this.logger,
      },
    );

    // An emptyWindowVerdict of true starts the engine verified.
    this.verification.set(this.aggregator.currentVerdict(), this.clock());
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────────

  start(): boolean {
    return this.sensingLoop.start();
  }

  stop(): Promise<StopResult> {
    return this.sensingLoop.stop();
  }

  get running(): boolean {
    return this.sensingLoop.running;
  }

  get fatalError(): SensingFailure | null {
    return this.sensingLoop.fatalError;
  }

  // ── Sensing path ───────────────────────────────────────────────────────────

  /** Feed one observation through the aggregator and publish the verdict. */
  ingest(observation: Observation): boolean {
    const verdict = this.aggregator.ingest(observation);
    this.verification.set(verdict, observation.timestamp);
    return verdict;
  }

  /** Let the window age to `now` without a new observation. */
  refresh(now: number = this.clock()): boolean {
    const verdict = this.aggregator.refresh(now);
    this.verification.set(verdict, now);
    return verdict;
  }

  private handleFatalSensing(failure: SensingFailure): void {
    this.logger.error(`Sensing disabled, failing closed: ${failure.message}`);
    this.aggregator.reset();
    this.verification.set(false, this.clock());
  }

  // ── Read side ──────────────────────────────────────────────────────────────

  isVerified(): boolean {
    return this.verification.get();
  }

  getVerification(): VerificationSnapshot {
    return this.verification.snapshot();
  }

  getEscalationLevel(): number {
    return this.escalation.escalationLevel;
  }

  /** Trusted fraction of the current window, or null when it is empty. */
  getTrustedFraction(): number | null {
    return this.aggregator.trustedFraction();
  }

  onVerificationChange(listener: VerificationListener): () => void {
    return this.verification.onChange(listener);
  }

  // ── Chat path ──────────────────────────────────────────────────────────────

  /** Single entry point for the voice shell: utterance in, reply text out. */
  async onUserUtterance(text: string): Promise<string> {
    const reply = await this.handleUtterance(text);
    return reply.text;
  }

  handleUtterance(text: string): Promise<GuardReply> {
    return this.escalation.chat(text);
  }
}
