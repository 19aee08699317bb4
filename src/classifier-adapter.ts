// Classifier adapters - the leaf of the sensing path.
//
// An adapter yields one TrustLabel per sensing cycle. Face encoding and
// matching stay behind the FaceMatcher interface; frame capture stays
// behind FrameSource.

import type { Clock, TrustLabel } from "./types.js";
import { monotonicSeconds } from "./utils.js";

export interface ClassifierAdapter {
  /** Acquire the exclusively held sensing resource (camera handle, stream). */
  open?(): Promise<void>;
  /**
   * Classify the current sensor frame. Throwing counts as a sensing failure
   * for this cycle; returning "no_signal" does not.
   */
  classify(signal: AbortSignal): Promise<TrustLabel>;
  /** Release the sensing resource. Called once per successful open. */
  release?(): Promise<void>;
}

// ─── Face match adapter ─────────────────────────────────────────────────────────

export interface Frame {
  data: Buffer;
  width: number;
  height: number;
}

export interface FrameSource {
  open(): Promise<void>;
  /** Returns null when no frame could be grabbed this time. */
  read(): Promise<Frame | null>;
  release(): Promise<void>;
}

export interface FaceMatchResult {
  facesDetected: number;
  /** True if at least one detected face matches a trusted identity. */
  trustedMatch: boolean;
}

export interface FaceMatcher {
  match(frame: Frame): Promise<FaceMatchResult>;
}

/**
 * Maps one camera frame to a label:
 *   no frame            → "no_signal"
 *   trusted face seen   → "trusted"
 *   no face / strangers → "untrusted"
 */
export class FaceMatchClassifier implements ClassifierAdapter {
  private readonly frameSource: FrameSource;
  private readonly faceMatcher: FaceMatcher;
  private opened: boolean;

  constructor(frameSource: FrameSource, faceMatcher: FaceMatcher) {
    this.frameSource = frameSource;
    this.faceMatcher = faceMatcher;
    this.opened = false;
  }

  async open(): Promise<void> {
    if (this.opened) return;
    await this.frameSource.open();
    this.opened = true;
  }

  async classify(signal: AbortSignal): Promise<TrustLabel> {
    const frame = await this.frameSource.read();
    if (frame === null || signal.aborted) return "no_signal";

    const result = await this.faceMatcher.match(frame);
    if (result.facesDetected > 0 && result.trustedMatch) return "trusted";
    return "untrusted";
  }

  async release(): Promise<void> {
    if (!this.opened) return;
    this.opened = false;
    await this.frameSource.release();
  }
}

// ─── Push adapter ───────────────────────────────────────────────────────────────

/**
 * Adapter for a classifier running in another process that pushes labels
 * (see POST /api/observations). Each cycle samples the latest pushed label;
 * a label older than `maxAgeSeconds` reads as "no_signal".
 */
export class PushClassifierAdapter implements ClassifierAdapter {
  private readonly maxAgeSeconds: number;
  private readonly clock: Clock;
  private latest: { label: TrustLabel; at: number } | null;

  constructor(maxAgeSeconds: number, clock: Clock = monotonicSeconds) {
    this.maxAgeSeconds = maxAgeSeconds;
    this.clock = clock;
    this.latest = null;
  }

  submit(label: TrustLabel): void {
    this.latest = { label, at: this.clock() };
  }

  async classify(_signal: AbortSignal): Promise<TrustLabel> {
    if (this.latest === null) return "no_signal";
    if (this.clock() - this.latest.at > this.maxAgeSeconds) return "no_signal";
    return this.latest.label;
  }
}
