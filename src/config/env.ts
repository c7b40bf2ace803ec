import "dotenv/config";
import { homedir } from "os";
import { join } from "path";

export const ARCHIVE_URL =
  "https://www.azcourts.gov/AZ-Supreme-Court/Live-Archived-Video";

// Origin of the embedded viewer; player links in its markup are relative to it
export const VIEWER_BASE_URL = "https://azcourts.granicus.com/";

export interface AppConfig {
  archiveUrl: string;
  listingBaseUrl: string;
  outputDir: string;
  audioFormat: string;
  ytDlpPath: string;
  http: {
    timeoutMs: number;
    maxAttempts: number;
    backoffFactor: number;
    userAgent: string;
  };
  browser: {
    headless: boolean;
    executablePath?: string;
  };
}

function parsePositiveNumber(
  name: string,
  raw: string | undefined,
  fallback: number,
  integer: boolean
): number {
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
    throw new Error(
      `${name} must be a non-negative ${integer ? "integer" : "number"}, got "${raw}"`
    );
  }
  return value;
}

/**
 * Loads runtime settings from process.env (and a local .env file, if present).
 * Every key is optional; numeric keys are validated and rejected when malformed.
 * @param env - The environment to read, process.env unless overridden
 * @throws Error if a numeric setting cannot be parsed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const {
    ARCHIVE_URL: archiveUrl,
    LISTING_BASE_URL,
    OUTPUT_DIR,
    AUDIO_FORMAT,
    YTDLP_PATH,
    HTTP_TIMEOUT_MS,
    HTTP_MAX_ATTEMPTS,
    HTTP_BACKOFF_FACTOR,
    HTTP_USER_AGENT,
    BROWSER_HEADLESS,
    BROWSER_EXECUTABLE_PATH
  } = env;

  const maxAttempts = parsePositiveNumber(
    "HTTP_MAX_ATTEMPTS",
    HTTP_MAX_ATTEMPTS,
    3,
    true
  );
  if (maxAttempts < 1) throw new Error("HTTP_MAX_ATTEMPTS must be at least 1");

  return {
    archiveUrl: archiveUrl || ARCHIVE_URL,
    listingBaseUrl: LISTING_BASE_URL || VIEWER_BASE_URL,
    outputDir: OUTPUT_DIR || join(homedir(), "Downloads"),
    audioFormat: AUDIO_FORMAT || "mp3",
    ytDlpPath: YTDLP_PATH || "yt-dlp",
    http: {
      timeoutMs: parsePositiveNumber(
        "HTTP_TIMEOUT_MS",
        HTTP_TIMEOUT_MS,
        10_000,
        true
      ),
      maxAttempts,
      backoffFactor: parsePositiveNumber(
        "HTTP_BACKOFF_FACTOR",
        HTTP_BACKOFF_FACTOR,
        0.3,
        false
      ),
      userAgent: HTTP_USER_AGENT || "Mozilla/5.0"
    },
    browser: {
      headless: BROWSER_HEADLESS?.toLowerCase() !== "false",
      executablePath: BROWSER_EXECUTABLE_PATH || undefined
    }
  };
}
