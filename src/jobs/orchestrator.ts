import { join } from "path";
import type { AudioDownloader } from "../clients/ytDlpClient";
import { DownloadError, FailureType, errorMessage } from "../errors";
import {
  extractCaseLinks,
  fetchYearListingHtml
} from "../scrapers/AZ/supremeCourt";
import type { BrowserLauncher } from "../scrapers/types";
import { CaseService } from "../services/caseService";
import { JobReporter, LogLevel, type RunSummary } from "../services/jobReporter";
import type { MediaResolver } from "../services/mediaResolver";

export interface DownloadJobOptions {
  outputDir: string;
  launchBrowser: BrowserLauncher;
  resolver: MediaResolver;
  downloader: AudioDownloader;
  archiveUrl?: string;
  listingBaseUrl?: string;
}

/**
 * Entry point for one run over a year of archived oral arguments.
 * 1. Renders the year's listing in a browser and parses it into cases.
 * 2. Resolves and downloads each case in listing order, one at a time.
 * 3. Records each case's failure without stopping the run.
 * 4. Prints and returns the run summary.
 * @param year - Canonical four-digit year, already validated
 * @param options - Output location and the collaborators for each stage
 * @throws FrameNotFoundError / TabNotFoundError (or a navigation error) if
 * the listing cannot be retrieved; no case is processed in that event
 */
export async function runDownloadJob(
  year: string,
  options: DownloadJobOptions
): Promise<RunSummary> {
  const {
    outputDir,
    launchBrowser,
    resolver,
    downloader,
    archiveUrl,
    listingBaseUrl
  } = options;

  const downloadDir = join(outputDir, year);
  const reporter = new JobReporter(year);
  const caseService = new CaseService(resolver, downloader);

  reporter.startRun(downloadDir);

  try {
    reporter.log(LogLevel.INFO, "Loading archive listing...");
    const html = await fetchYearListingHtml(year, { launchBrowser, archiveUrl });
    const { cases, skippedRows } = extractCaseLinks(html, listingBaseUrl);

    reporter.recordListing(cases.length, skippedRows);
    reporter.log(LogLevel.INFO, `Found ${cases.length} cases.`);
    if (skippedRows > 0) {
      reporter.log(
        LogLevel.WARN,
        `Skipped ${skippedRows} listing rows without a usable video link.`
      );
    }

    for (const [index, listing] of cases.entries()) {
      try {
        await caseService.processCase(listing, downloadDir, index + 1);
        reporter.recordSuccess();
      } catch (err: unknown) {
        const type =
          err instanceof DownloadError
            ? FailureType.DOWNLOAD
            : FailureType.RESOLUTION;
        reporter.recordFailure(listing.caseName, type, errorMessage(err));
        // We do NOT throw here; the remaining cases still get processed
      }
    }

    return reporter.finishRun();
  } catch (criticalError: unknown) {
    reporter.finishRun(
      criticalError instanceof Error
        ? criticalError
        : new Error(errorMessage(criticalError))
    );
    throw criticalError; // Re-throw so the process exits non-zero
  }
}
