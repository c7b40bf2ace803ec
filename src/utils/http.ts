import { retryWithBackoff, type RetryOptions } from "./retry";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const DEFAULT_RETRY_STATUSES: readonly number[] = [500, 502, 504];

export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string
  ) {
    super(`Server error ${status} for ${url}`);
    this.name = "HttpStatusError";
  }
}

/**
 * True for the error fetch raises when the URL itself cannot be parsed; no
 * later attempt can succeed.
 */
export function isUnparsableUrlError(err: unknown): boolean {
  if (!(err instanceof TypeError) || !(err.cause instanceof Error)) return false;
  return "code" in err.cause && err.cause.code === "ERR_INVALID_URL";
}

export interface TextResponse {
  status: number;
  body: string;
}

export interface FetchWithRetryOptions
  extends Omit<RetryOptions, "shouldRetry"> {
  /** Statuses answered with another attempt; any other status is returned as-is. */
  retryStatuses?: readonly number[];
  /** Per-attempt limit covering connect and body read. */
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

/**
 * Wraps fetch with automated retry logic for transient failures and reads the body.
 * Network-level exceptions (refused connections, resets, timeouts, a body that
 * fails mid-read) and the statuses listed in retryStatuses trigger another
 * attempt; every other response is handed back with its status. A URL that
 * fetch cannot parse fails on the first attempt.
 * @param url - The destination endpoint
 * @param init - Standard RequestInit options (headers, method, body, etc.)
 * @param options - Retry schedule, retryable statuses and per-attempt timeout
 * @returns A promise resolving to the final status and body text
 * @example
 * await fetchTextWithRetry('https://example.gov/player', { method: 'GET' }, { maxAttempts: 3 })
 */
export async function fetchTextWithRetry(
  url: string,
  init?: RequestInit,
  options: FetchWithRetryOptions = {}
): Promise<TextResponse> {
  const {
    retryStatuses = DEFAULT_RETRY_STATUSES,
    timeoutMs,
    fetchImpl = fetch,
    ...retryOptions
  } = options;

  return retryWithBackoff(async () => {
    const res = await fetchImpl(url, {
      ...init,
      signal: timeoutMs ? AbortSignal.timeout(timeoutMs) : init?.signal
    });

    if (retryStatuses.includes(res.status)) {
      // Release the connection before the next attempt
      await res.body?.cancel();
      throw new HttpStatusError(res.status, url);
    }

    return { status: res.status, body: await res.text() };
  }, { ...retryOptions, shouldRetry: (err) => !isUnparsableUrlError(err) });
}
