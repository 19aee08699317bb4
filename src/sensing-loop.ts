// Sensing Loop - runs the classifier at a fixed cadence as an independent
// async task until stopped.
//
// Lifecycle:
//   start() → open resource → [classify → publish → idle(cadence)]* → release
//   stop()  → abort signal (interrupts the sleep and any in-flight classify)
//             → await the task → resource released exactly once
//
// While idle the loop wakes early at each window expiry and refreshes the
// verdict, so a verdict never outlives its window by a whole cadence.
//
// A failing cycle is logged and skipped. Only a run of
// `maxConsecutiveFailures` failures (or a failed open) ends the loop early.

import type { ClassifierAdapter } from "./classifier-adapter.js";
import { SensingFailure } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { Clock, Observation, TrustLabel } from "./types.js";
import { errorMessage, monotonicSeconds, sleep } from "./utils.js";

export type StopResult = "stopped" | "already-stopped" | "not-started";

/** Lets the loop re-evaluate the verdict between cycles. */
export interface WindowExpiry {
  /** Clock reading at which the verdict may next change on its own, or null. */
  nextAt: () => number | null;
  refresh: (now: number) => void;
}

// Lower bound on an early wake-up, so an expiry already in the past
// can't spin the loop.
const MIN_REFRESH_DELAY_MS = 1;

export interface SensingLoopConfig {
  cadenceSeconds: number;
  maxConsecutiveFailures: number;
}

export interface SensingLoopDeps {
  adapter: ClassifierAdapter;
  /** Called with each successful observation, in timestamp order. */
  onObservation: (observation: Observation) => void;
  /** Called with the clock reading of a cycle whose classification failed. */
  onSkippedCycle: (now: number) => void;
  /** Called once if the loop gives up. */
  onFatal: (failure: SensingFailure) => void;
  windowExpiry?: WindowExpiry;
  clock?: Clock;
  logger?: Logger;
}

type LoopState = "idle" | "running" | "stopped";

export class SensingLoop {
  private readonly config: SensingLoopConfig;
  private readonly deps: SensingLoopDeps;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private state: LoopState = "idle";
  private controller: AbortController | null = null;
  private task: Promise<void> | null = null;
  private settled = true;
  private consecutiveFailures = 0;
  private cycles = 0;
  private fatal: SensingFailure | null = null;

  constructor(config: SensingLoopConfig, deps: SensingLoopDeps) {
    this.config = config;
    this.deps = deps;
    this.clock = deps.clock ?? monotonicSeconds;
    this.logger = deps.logger ?? createConsoleLogger("SensingLoop");
  }

  get running(): boolean {
    return this.state === "running";
  }

  /** Number of cycles that produced an observation. */
  get cyclesCompleted(): number {
    return this.cycles;
  }

  get fatalError(): SensingFailure | null {
    return this.fatal;
  }

  /**
   * Start the background task. Returns false if it is already running or a
   * previous run has not finished releasing its resource.
   */
  start(): boolean {
    if (this.state === "running") {
      this.logger.warn("Sensing loop is already running");
      return false;
    }
    if (!this.settled) {
      this.logger.warn("Sensing loop is still stopping");
      return false;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.state = "running";
    this.settled = false;
    this.consecutiveFailures = 0;
    this.fatal = null;
    this.task = this.run(controller.signal)
      .catch((err: unknown) => this.handleFatal(err))
      .finally(() => {
        this.settled = true;
      });
    return true;
  }

  /**
   * Signal the loop to exit and wait for it. Safe before start and safe to
   * repeat; only the first call after start reports "stopped".
   */
  async stop(): Promise<StopResult> {
    if (this.state === "idle") {
      this.logger.info("Sensing loop was never started");
      return "not-started";
    }
    if (this.state === "stopped") {
      await this.task;
      this.logger.info("Sensing loop is already stopped");
      return "already-stopped";
    }

    this.logger.info("Stopping sensing loop...");
    this.state = "stopped";
    this.controller?.abort();
    await this.task;
    this.logger.info("Sensing loop stopped");
    return "stopped";
  }

  // ── Task body ──────────────────────────────────────────────────────────────

  private async run(signal: AbortSignal): Promise<void> {
    const { adapter } = this.deps;

    try {
      await adapter.open?.();
    } catch (err) {
      throw new SensingFailure(`Could not open sensing resource: ${errorMessage(err)}`, {
        fatal: true,
        cause: err,
      });
    }
    this.logger.info(`Sensing loop started (cadence ${this.config.cadenceSeconds}s)`);

    try {
      while (!signal.aborted) {
        await this.runCycle(signal);
        if (signal.aborted) break;
        await this.idle(signal);
      }
    } finally {
      await this.releaseResource();
    }
  }

  /** Sleep one cadence, waking early to refresh at each window expiry. */
  private async idle(signal: AbortSignal): Promise<void> {
    let remainingMs = this.config.cadenceSeconds * 1000;
    const expiry = this.deps.windowExpiry;

    while (remainingMs > 0 && !signal.aborted) {
      const nextAt = expiry?.nextAt() ?? null;
      const untilExpiryMs =
        nextAt === null ? null : Math.max((nextAt - this.clock()) * 1000, MIN_REFRESH_DELAY_MS);

      if (expiry === undefined || untilExpiryMs === null || untilExpiryMs >= remainingMs) {
        await sleep(remainingMs, signal);
        return;
      }

      await sleep(untilExpiryMs, signal);
      if (signal.aborted) return;
      remainingMs -= untilExpiryMs;
      expiry.refresh(this.clock());
    }
  }

  private async runCycle(signal: AbortSignal): Promise<void> {
    let label: TrustLabel;
    try {
      label = await this.deps.adapter.classify(signal);
    } catch (err) {
      if (signal.aborted) return;

      this.consecutiveFailures++;
      const max = this.config.maxConsecutiveFailures;
      this.logger.warn(
        `Sensing cycle skipped (${this.consecutiveFailures}/${max} consecutive failures): ${errorMessage(err)}`,
      );
      this.deps.onSkippedCycle(this.clock());

      if (this.consecutiveFailures >= max) {
        throw new SensingFailure(`Sensing failed ${this.consecutiveFailures} consecutive times`, {
          fatal: true,
          consecutiveFailures: this.consecutiveFailures,
          cause: err,
        });
      }
      return;
    }

    if (signal.aborted) return;

    this.consecutiveFailures = 0;
    this.deps.onObservation(Object.freeze({ timestamp: this.clock(), label }));
    this.cycles++;
  }

  private async releaseResource(): Promise<void> {
    try {
      await this.deps.adapter.release?.();
      this.logger.info("Sensing resource released");
    } catch (err) {
      this.logger.error(`Failed to release sensing resource: ${errorMessage(err)}`);
    }
  }

  private handleFatal(err: unknown): void {
    const failure =
      err instanceof SensingFailure
        ? err
        : new SensingFailure(`Sensing loop crashed: ${errorMessage(err)}`, { fatal: true, cause: err });

    this.state = "stopped";
    this.fatal = failure;
    this.logger.error(`Sensing loop terminated: ${failure.message}`);
    try {
      this.deps.onFatal(failure);
    } catch (handlerErr) {
      this.logger.error(`Fatal sensing handler threw: ${errorMessage(handlerErr)}`);
    }
  }
}
