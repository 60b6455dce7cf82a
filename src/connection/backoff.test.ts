import { describe, it, expect } from "vitest";
import { computeBackoffDelay, type BackoffPolicy } from "./backoff.js";
import { canTransition } from "./connection-state.js";

const policy: BackoffPolicy = { minDelayMs: 1_000, maxDelayMs: 30_000, jitter: 1 };

describe("computeBackoffDelay", () => {
  it("starts at the minimum delay without jitter", () => {
    expect(computeBackoffDelay(0, policy, () => 0)).toBe(1_000);
  });

  it("doubles per attempt", () => {
    const delays = [0, 1, 2, 3].map((k) => computeBackoffDelay(k, policy, () => 0));

    expect(delays).toEqual([1_000, 2_000, 4_000, 8_000]);
  });

  it("stretches by at most one doubling step", () => {
    expect(computeBackoffDelay(1, policy, () => 0.5)).toBe(3_000);
    expect(computeBackoffDelay(1, policy, () => 1)).toBeLessThanOrEqual(4_000);
  });

  it("caps at the maximum delay", () => {
    expect(computeBackoffDelay(10, policy, () => 0)).toBe(30_000);
    expect(computeBackoffDelay(4, policy, () => 0.9)).toBe(30_000);
  });

  it("is non-decreasing and bounded for any jitter sequence", () => {
    const randoms = [0.99, 0, 0.5, 0.01, 0.75, 0.999, 0.2, 0, 0.6, 0.4, 0.3, 0.8];
    let previous = 0;

    randoms.forEach((r, k) => {
      const delay = computeBackoffDelay(k, policy, () => r);
      expect(delay).toBeGreaterThanOrEqual(previous);
      expect(delay).toBeLessThanOrEqual(policy.maxDelayMs);
      previous = delay;
    });
  });

  it("treats negative attempts as the first", () => {
    expect(computeBackoffDelay(-1, policy, () => 0)).toBe(1_000);
  });

  it("clamps out-of-range jitter", () => {
    const wild: BackoffPolicy = { ...policy, jitter: 5 };

    expect(computeBackoffDelay(0, wild, () => 0.5)).toBe(1_500);
  });
});

describe("canTransition", () => {
  it("only leaves disconnected through connecting", () => {
    expect(canTransition("disconnected", "connecting")).toBe(true);
    expect(canTransition("disconnected", "connected")).toBe(false);
    expect(canTransition("disconnected", "reconnecting")).toBe(false);
  });

  it("only reaches connected from connecting", () => {
    expect(canTransition("connecting", "connected")).toBe(true);
    expect(canTransition("reconnecting", "connected")).toBe(false);
    expect(canTransition("failed", "connected")).toBe(false);
  });

  it("lets stop() end any active state", () => {
    expect(canTransition("connecting", "disconnected")).toBe(true);
    expect(canTransition("connected", "disconnected")).toBe(true);
    expect(canTransition("reconnecting", "disconnected")).toBe(true);
    expect(canTransition("failed", "disconnected")).toBe(true);
  });
});
