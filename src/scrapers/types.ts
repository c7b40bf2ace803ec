export interface CaseListing {
  /** Trimmed text of the listing row's first column (e.g., 'State v. Smith CR-20-0001-PR') */
  caseName: string;

  /** Absolute address of the player page that embeds the stream */
  mediaPlayerUrl: string;
}

export interface ListingExtraction {
  cases: CaseListing[];

  /** Rows dropped for missing columns, name, anchor or URL */
  skippedRows: number;
}

export interface ResolvedCase {
  caseName: string;

  /** The .m3u8 address, or null when the player page yielded none */
  manifestUrl: string | null;
}

export interface DownloadRequest {
  /** Output path without extension; yt-dlp appends the audio extension */
  outputPathPrefix: string;
  manifestUrl: string;
}

/*
 * Browser capabilities the listing fetcher relies on. Playwright backs these
 * in production (clients/browserClient.ts); tests supply an in-memory fake.
 */

export interface BrowserElement {
  innerText(): Promise<string>;
  click(): Promise<void>;
}

export interface BrowserFrame {
  waitForSelector(
    selector: string,
    options?: { state?: "attached" | "visible" }
  ): Promise<void>;
  queryAll(selector: string): Promise<BrowserElement[]>;
  innerHTML(selector: string): Promise<string>;
}

export interface BrowserSession {
  /** Navigates and resolves once network activity has gone idle */
  goto(url: string): Promise<void>;
  findFrame(urlPattern: RegExp): BrowserFrame | null;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<BrowserSession>;
