/**
 * Tests for retrying a fetch within one citation check.
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import {
  AttemptsExhaustedError,
  FetchCancelledError,
  pause,
  retryDelay,
  retryTransient,
} from "../src/retry.js";
import type { RetryPolicy } from "../src/retry.js";

const policy: RetryPolicy = {
  attempts: 3,
  initialDelayMs: 10,
  maxDelayMs: 100,
  jitterMs: 0,
};

const noPause = async (): Promise<void> => {};
const always = (): boolean => true;

afterEach(() => {
  vi.useRealTimers();
});

describe("retryTransient", () => {
  it("returns the first success without pausing", async () => {
    const attempt = vi.fn().mockResolvedValue("record");
    const wait = vi.fn(noPause);

    expect(await retryTransient(attempt, { policy, isTransient: always, pause: wait })).toBe(
      "record",
    );
    expect(attempt).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });

  it("retries transient failures until one succeeds", async () => {
    const attempt = vi
      .fn()
      .mockRejectedValueOnce(new Error("HTTP 502"))
      .mockRejectedValueOnce(new Error("HTTP 503"))
      .mockResolvedValueOnce("record");

    expect(await retryTransient(attempt, { policy, isTransient: always, pause: noPause })).toBe(
      "record",
    );
    expect(attempt).toHaveBeenCalledTimes(3);
  });

  it("reports the attempt count and the last error once attempts run out", async () => {
    const last = new Error("HTTP 500");
    const attempt = vi.fn().mockRejectedValue(last);

    const err: unknown = await retryTransient(attempt, {
      policy,
      isTransient: always,
      pause: noPause,
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AttemptsExhaustedError);
    expect(err).toMatchObject({
      attempts: 3,
      lastError: last,
      message: "3 attempts failed; last error: HTTP 500",
    });
  });

  it("rethrows a permanent failure at once", async () => {
    const attempt = vi.fn().mockRejectedValue(new Error("HTTP 400"));

    await expect(
      retryTransient(attempt, { policy, isTransient: () => false, pause: noPause }),
    ).rejects.toThrow("HTTP 400");
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it("pauses with capped exponential delays", async () => {
    const delays: number[] = [];
    const attempt = vi.fn().mockRejectedValue(new Error("offline"));

    await expect(
      retryTransient(attempt, {
        policy: { attempts: 5, initialDelayMs: 100, maxDelayMs: 300, jitterMs: 0 },
        isTransient: always,
        pause: async (ms) => {
          delays.push(ms);
        },
      }),
    ).rejects.toBeInstanceOf(AttemptsExhaustedError);

    expect(delays).toEqual([100, 200, 300, 300]);
  });

  it("makes no attempt when the check is already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const attempt = vi.fn().mockResolvedValue("record");

    await expect(
      retryTransient(attempt, { policy, isTransient: always, signal: controller.signal }),
    ).rejects.toThrow("cancelled after 0 attempts");
    expect(attempt).not.toHaveBeenCalled();
  });

  it("stops after the pause in which the check was cancelled", async () => {
    const controller = new AbortController();
    const attempt = vi.fn().mockRejectedValue(new Error("offline"));

    const err: unknown = await retryTransient(attempt, {
      policy,
      isTransient: always,
      signal: controller.signal,
      pause: async () => {
        controller.abort();
      },
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchCancelledError);
    expect(err).toHaveProperty("message", "cancelled after 1 attempt; last error: offline");
    expect(attempt).toHaveBeenCalledTimes(1);
  });
});

describe("pause", () => {
  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    let done = false;
    const waiting = pause(1_000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await waiting;
    expect(done).toBe(true);
  });

  it("ends early and clears its timer when the signal fires", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const waiting = pause(60_000, controller.signal);
    expect(vi.getTimerCount()).toBe(1);

    controller.abort();
    await waiting;

    expect(vi.getTimerCount()).toBe(0);
  });

  it("resolves at once for a signal that already fired", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    controller.abort();

    await pause(60_000, controller.signal);
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe("retryDelay", () => {
  it("doubles from the initial delay", () => {
    const slow: RetryPolicy = { attempts: 4, initialDelayMs: 100, maxDelayMs: 10_000, jitterMs: 0 };
    expect([1, 2, 3].map((n) => retryDelay(n, slow))).toEqual([100, 200, 400]);
  });

  it("adds jitter scaled by the random source", () => {
    const jittery: RetryPolicy = { attempts: 3, initialDelayMs: 100, maxDelayMs: 10_000, jitterMs: 50 };
    expect(retryDelay(1, jittery, () => 0.5)).toBe(125);
    expect(retryDelay(2, jittery, () => 0)).toBe(200);
  });
});
