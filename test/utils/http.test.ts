import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  HttpStatusError,
  fetchTextWithRetry,
  isUnparsableUrlError
} from "../../src/utils/http";

const URL_UNDER_TEST = "https://court.example.gov/player?clip=1";

/** The shape fetch rejects with when its input is not a URL. */
function unparsableUrlError(input: string): TypeError {
  const cause = Object.assign(new TypeError("Invalid URL"), {
    code: "ERR_INVALID_URL",
    input
  });
  return new TypeError(`Failed to parse URL from ${input}`, { cause });
}

describe("fetchTextWithRetry", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns status and body of a non-retryable response", async () => {
    const fetchImpl = vi.fn(
      async (_url: string, _init?: RequestInit) =>
        new Response("missing", { status: 404 })
    );

    await expect(
      fetchTextWithRetry(URL_UNDER_TEST, undefined, { fetchImpl, baseDelayMs: 0 })
    ).resolves.toEqual({ status: 404, body: "missing" });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("releases the body of a retried response before the next attempt", async () => {
    const badGateway = new Response("Bad Gateway", { status: 502 });
    const fetchImpl = vi
      .fn<(url: string, init?: RequestInit) => Promise<Response>>()
      .mockResolvedValueOnce(badGateway)
      .mockResolvedValueOnce(new Response("ok"));

    await expect(
      fetchTextWithRetry(URL_UNDER_TEST, undefined, {
        fetchImpl,
        baseDelayMs: 0,
        jitterMs: 0
      })
    ).resolves.toEqual({ status: 200, body: "ok" });
    expect(badGateway.bodyUsed).toBe(true);
  });

  it("gives up with HttpStatusError once the attempts are used", async () => {
    const fetchImpl = vi.fn(
      async (_url: string, _init?: RequestInit) =>
        new Response("Bad Gateway", { status: 502 })
    );

    const error = await fetchTextWithRetry(URL_UNDER_TEST, undefined, {
      fetchImpl,
      maxAttempts: 2,
      baseDelayMs: 0,
      jitterMs: 0
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({
      status: 502,
      message: `Server error 502 for ${URL_UNDER_TEST}`
    });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("does not retry a URL fetch cannot parse", async () => {
    const fetchImpl = vi.fn(async (url: string, _init?: RequestInit) => {
      throw unparsableUrlError(url);
    });

    await expect(
      fetchTextWithRetry("not a url", undefined, { fetchImpl, baseDelayMs: 0 })
    ).rejects.toThrow("Failed to parse URL from not a url");
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(console.warn).not.toHaveBeenCalled();
  });
});

describe("isUnparsableUrlError", () => {
  it("recognises only the invalid-URL failure", () => {
    expect(isUnparsableUrlError(unparsableUrlError("x"))).toBe(true);
    expect(isUnparsableUrlError(new TypeError("fetch failed"))).toBe(false);
    expect(
      isUnparsableUrlError(
        new TypeError("fetch failed", { cause: new Error("ECONNREFUSED") })
      )
    ).toBe(false);
    expect(isUnparsableUrlError("ERR_INVALID_URL")).toBe(false);
  });
});
