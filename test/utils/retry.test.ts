import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { retryWithBackoff } from "../../src/utils/retry";

describe("retryWithBackoff", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it("returns the first successful result", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockResolvedValueOnce("ok");

    await expect(
      retryWithBackoff(fn, { baseDelayMs: 0, jitterMs: 0 })
    ).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("gives up after maxAttempts and rethrows the last error", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockRejectedValueOnce(new Error("third"));

    await expect(
      retryWithBackoff(fn, { maxAttempts: 3, baseDelayMs: 0, jitterMs: 0 })
    ).rejects.toThrow("third");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry errors rejected by shouldRetry", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("404"));

    await expect(
      retryWithBackoff(fn, {
        baseDelayMs: 0,
        shouldRetry: (err) => !(err instanceof Error && err.message === "404")
      })
    ).rejects.toThrow("404");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("doubles the delay after each failed attempt", async () => {
    vi.useFakeTimers();
    const setTimeoutSpy = vi.spyOn(globalThis, "setTimeout");
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("502"))
      .mockRejectedValueOnce(new Error("502"))
      .mockResolvedValueOnce("ok");

    const result = retryWithBackoff(fn, {
      maxAttempts: 3,
      baseDelayMs: 300,
      jitterMs: 0
    });
    await vi.runAllTimersAsync();

    await expect(result).resolves.toBe("ok");
    expect(setTimeoutSpy.mock.calls.map(([, delay]) => delay)).toEqual([300, 600]);
  });

  it("caps the delay at maxDelayMs", async () => {
    vi.useFakeTimers();
    const setTimeoutSpy = vi.spyOn(globalThis, "setTimeout");
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("a"))
      .mockRejectedValueOnce(new Error("b"))
      .mockRejectedValueOnce(new Error("c"))
      .mockResolvedValueOnce("ok");

    const result = retryWithBackoff(fn, {
      maxAttempts: 4,
      baseDelayMs: 1000,
      maxDelayMs: 1500,
      jitterMs: 0
    });
    await vi.runAllTimersAsync();

    await expect(result).resolves.toBe("ok");
    expect(setTimeoutSpy.mock.calls.map(([, delay]) => delay)).toEqual([
      1000, 1500, 1500
    ]);
  });
});
