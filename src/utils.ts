// Shared helpers for the guard engine.

import type { Clock } from "./types.js";

/** Monotonic clock in seconds, unaffected by wall-clock adjustments. */
export const monotonicSeconds: Clock = () => performance.now() / 1000;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Sleep for `ms` milliseconds. Resolves early (without rejecting) when the
 * signal aborts, so a stop request never waits out a full idle period.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Replace `{name}` placeholders. Unknown placeholders are left as-is. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match,
  );
}
