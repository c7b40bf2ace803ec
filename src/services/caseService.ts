import type { AudioDownloader, DownloadOutcome } from "../clients/ytDlpClient";
import { DownloadError, errorMessage } from "../errors";
import type { CaseListing, ResolvedCase } from "../scrapers/types";
import { sanitizeFilename } from "../scrapers/utils";
import type { MediaResolver } from "./mediaResolver";

export interface ProcessedCase extends ResolvedCase {
  manifestUrl: string;
  fileTitle: string;
}

export class CaseService {
  constructor(
    private resolver: MediaResolver,
    private downloader: AudioDownloader
  ) {}

  /**
   * Derives the output file name for a case. Names that sanitize to nothing
   * fall back to their position in the listing.
   * @param caseName The case name as listed
   * @param position 1-based position of the case in the year's listing
   */
  fileTitleFor(caseName: string, position: number): string {
    return sanitizeFilename(caseName) || `case_${position}`;
  }

  /**
   * Runs one case end to end: resolve the manifest, then extract its audio.
   * Two listings with the same sanitized name write to the same file; the
   * later download overwrites the earlier one.
   * @param listing The case name and media player URL from the listing table
   * @param targetDir Directory the audio file is written to
   * @param position 1-based position of the case in the year's listing
   * @throws ResolutionError if the player page is unreachable or holds no manifest
   * @throws DownloadError if yt-dlp fails to start or exits non-zero
   */
  async processCase(
    listing: CaseListing,
    targetDir: string,
    position: number
  ): Promise<ProcessedCase> {
    const fileTitle = this.fileTitleFor(listing.caseName, position);
    console.log(`\n--- Processing case: ${fileTitle} ---`);

    const manifestUrl = await this.resolver.resolveOrThrow(
      listing.mediaPlayerUrl
    );

    const outcome: DownloadOutcome = await this.downloader
      .download(manifestUrl, fileTitle, targetDir)
      .catch((err: unknown) => {
        throw new DownloadError(
          `Download failed for ${fileTitle}: ${errorMessage(err)}`,
          null,
          { cause: err }
        );
      });

    if (!outcome.ok) {
      const reason =
        outcome.exitCode !== null
          ? `exit code ${outcome.exitCode}`
          : `signal ${outcome.signal}`;
      throw new DownloadError(
        `Download failed for ${fileTitle} (${reason})`,
        outcome.exitCode
      );
    }

    console.log(`Finished: ${fileTitle}`);
    return {
      caseName: listing.caseName,
      manifestUrl,
      fileTitle
    };
  }
}
