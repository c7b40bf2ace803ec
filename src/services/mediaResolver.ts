import { ResolutionError, errorMessage } from "../errors";
import { extractFirstMatch } from "../scrapers/utils";
import {
  DEFAULT_RETRY_STATUSES,
  type FetchLike,
  fetchTextWithRetry
} from "../utils/http";

export const MANIFEST_URL_PATTERN = /https?:\/\/[^\s"'<>]+\.m3u8/;

export interface MediaResolverOptions {
  maxAttempts?: number;
  /** Seconds; the wait before retry n is backoffFactor * 2^(n-1) */
  backoffFactor?: number;
  timeoutMs?: number;
  userAgent?: string;
  retryStatuses?: readonly number[];
  fetchImpl?: FetchLike;
}

/**
 * Turns media player pages into HLS manifest URLs.
 * One instance per run: it owns the retry policy, headers and fetch
 * implementation used for every player page of that run.
 */
export class MediaResolver {
  private readonly maxAttempts: number;
  private readonly backoffFactor: number;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly retryStatuses: readonly number[];
  private readonly fetchImpl?: FetchLike;

  constructor(options: MediaResolverOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoffFactor = options.backoffFactor ?? 0.3;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.userAgent = options.userAgent ?? "Mozilla/5.0";
    this.retryStatuses = options.retryStatuses ?? DEFAULT_RETRY_STATUSES;
    this.fetchImpl = options.fetchImpl;
  }

  /**
   * Fetches a media player page and returns the first .m3u8 address in its body.
   * @param mediaPlayerUrl - Absolute URL of the player page
   * @returns The manifest URL exactly as it appears in the page
   * @throws ResolutionError if the page is unreachable after retries or holds no manifest
   */
  async resolveOrThrow(mediaPlayerUrl: string): Promise<string> {
    let body: string;
    try {
      const res = await fetchTextWithRetry(
        mediaPlayerUrl,
        { headers: { "User-Agent": this.userAgent } },
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: Math.round(this.backoffFactor * 1000),
          maxDelayMs: Number.POSITIVE_INFINITY,
          jitterMs: 0,
          retryStatuses: this.retryStatuses,
          timeoutMs: this.timeoutMs,
          fetchImpl: this.fetchImpl
        }
      );
      body = res.body;
    } catch (err: unknown) {
      throw new ResolutionError(
        `Error loading media player page: ${errorMessage(err)}`,
        mediaPlayerUrl,
        { cause: err }
      );
    }

    const manifestUrl = extractFirstMatch(body, MANIFEST_URL_PATTERN);
    if (!manifestUrl) {
      throw new ResolutionError(
        `No .m3u8 manifest found on media player page`,
        mediaPlayerUrl
      );
    }
    return manifestUrl;
  }

  /**
   * Same as resolveOrThrow, but reports failures on the console and returns null.
   * @param mediaPlayerUrl - Absolute URL of the player page
   */
  async resolve(mediaPlayerUrl: string): Promise<string | null> {
    try {
      return await this.resolveOrThrow(mediaPlayerUrl);
    } catch (err: unknown) {
      console.error(`[Resolver] ${errorMessage(err)} (${mediaPlayerUrl})`);
      return null;
    }
  }
}
