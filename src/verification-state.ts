// Verification state holder.
//
// The current value is one frozen snapshot object replaced wholesale on
// every flip, so a reader always sees a `verified`/`lastChanged` pair that
// was written together.

import type { VerificationListener, VerificationSnapshot } from "./types.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { errorMessage } from "./utils.js";

export class VerificationState {
  private current: VerificationSnapshot;
  private readonly listeners: Set<VerificationListener> = new Set();
  private readonly logger: Logger;

  constructor(createdAt: number, logger: Logger = createConsoleLogger("VerificationState")) {
    this.current = Object.freeze({ verified: false, lastChanged: createdAt });
    this.logger = logger;
  }

  get(): boolean {
    return this.current.verified;
  }

  snapshot(): VerificationSnapshot {
    return this.current;
  }

  /**
   * Publish a verdict. Listeners fire once per actual flip; re-confirming the
   * current value is a no-op. Returns true if the value flipped.
   */
  set(verified: boolean, at: number): boolean {
    if (verified === this.current.verified) return false;

    const next: VerificationSnapshot = Object.freeze({ verified, lastChanged: at });
    this.current = next;

    for (const listener of [...this.listeners]) {
      try {
        listener(next);
      } catch (err) {
        this.logger.error(`Verification listener threw: ${errorMessage(err)}`);
      }
    }
    return true;
  }

  /** Register an edge-triggered observer. Returns an unsubscribe function. */
  onChange(listener: VerificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
