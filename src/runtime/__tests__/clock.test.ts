import { afterEach, describe, expect, it, vi } from "vitest";
import { AbortError, boundedSignal, systemClock } from "../clock.ts";

describe("systemClock.sleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the requested delay", async () => {
    vi.useFakeTimers();
    let done = false;
    const sleeping = systemClock.sleep(1_000).then(() => {
      done = true;
    });
    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await sleeping;
    expect(done).toBe(true);
  });

  it("rejects with AbortError when the signal fires", async () => {
    const controller = new AbortController();
    const sleeping = systemClock.sleep(60_000, controller.signal);
    controller.abort();
    await expect(sleeping).rejects.toBeInstanceOf(AbortError);
  });

  it("rejects at once for an already aborted signal", async () => {
    await expect(systemClock.sleep(10, AbortSignal.abort())).rejects.toBeInstanceOf(AbortError);
  });
});

describe("boundedSignal", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("aborts after the timeout and reports it", async () => {
    vi.useFakeTimers();
    const bounded = boundedSignal(500);
    expect(bounded.signal.aborted).toBe(false);
    await vi.advanceTimersByTimeAsync(500);
    expect(bounded.signal.aborted).toBe(true);
    expect(bounded.timedOut()).toBe(true);
    bounded.dispose();
  });

  it("follows the parent signal", () => {
    const parent = new AbortController();
    const bounded = boundedSignal(60_000, parent.signal);
    parent.abort();
    expect(bounded.signal.aborted).toBe(true);
    expect(bounded.timedOut()).toBe(false);
    bounded.dispose();
  });

  it("does not fire after dispose", async () => {
    vi.useFakeTimers();
    const bounded = boundedSignal(100);
    bounded.dispose();
    await vi.advanceTimersByTimeAsync(200);
    expect(bounded.signal.aborted).toBe(false);
  });
});
