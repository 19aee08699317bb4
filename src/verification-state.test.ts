// Unit tests for VerificationState

import { describe, it, expect, vi } from "vitest";
import { VerificationState } from "./verification-state.js";

function makeLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("VerificationState", () => {
  it("initializes unverified with the construction instant", () => {
    const state = new VerificationState(12, makeLogger());
    expect(state.get()).toBe(false);
    expect(state.snapshot()).toEqual({ verified: false, lastChanged: 12 });
  });

  it("fires listeners exactly once per flip", () => {
    const state = new VerificationState(0, makeLogger());
    const listener = vi.fn();
    state.onChange(listener);

    expect(state.set(false, 1)).toBe(false);
    expect(state.set(true, 2)).toBe(true);
    expect(state.set(true, 3)).toBe(false);
    expect(state.set(true, 4)).toBe(false);
    expect(state.set(false, 5)).toBe(true);

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener).toHaveBeenNthCalledWith(1, { verified: true, lastChanged: 2 });
    expect(listener).toHaveBeenNthCalledWith(2, { verified: false, lastChanged: 5 });
  });

  it("re-confirming a value keeps the previous lastChanged", () => {
    const state = new VerificationState(0, makeLogger());
    state.set(true, 2);
    state.set(true, 9);
    expect(state.snapshot()).toEqual({ verified: true, lastChanged: 2 });
  });

  it("publishes frozen snapshots", () => {
    const state = new VerificationState(0, makeLogger());
    const before = state.snapshot();
    state.set(true, 1);
    const after = state.snapshot();

    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(after)).toBe(true);
    expect(after).not.toBe(before);
    expect(before).toEqual({ verified: false, lastChanged: 0 });
  });

  it("stops notifying after unsubscribe", () => {
    const state = new VerificationState(0, makeLogger());
    const listener = vi.fn();
    const unsubscribe = state.onChange(listener);

    unsubscribe();
    state.set(true, 1);
    expect(listener).not.toHaveBeenCalled();
  });

  it("logs a throwing listener and still notifies the others", () => {
    const logger = makeLogger();
    const state = new VerificationState(0, logger);
    const second = vi.fn();
    state.onChange(() => {
      throw new Error("display offline");
    });
    state.onChange(second);

    expect(state.set(true, 1)).toBe(true);
    expect(second).toHaveBeenCalledTimes(1);
    expect(state.get()).toBe(true);
    expect(logger.error).toHaveBeenCalledWith("Verification listener threw: display offline");
  });
});
