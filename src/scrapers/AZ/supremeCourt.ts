import * as cheerio from "cheerio";
import { ARCHIVE_URL, VIEWER_BASE_URL } from "../../config/env";
import { FrameNotFoundError, TabNotFoundError } from "../../errors";
import type { BrowserLauncher, CaseListing, ListingExtraction } from "../types";
import { extractFirstMatch } from "../utils";

// The archive page embeds a Granicus "view publisher" for view 11; the
// year tabs and case table are rendered inside it by client-side script.
export const VIEWER_FRAME_PATTERN =
  /granicus\.com\/ViewPublisher\.php\?view_id=11/;

const TAB_GROUP_SELECTOR = "ul.TabbedPanelsTabGroup";
const TAB_SELECTOR = "ul.TabbedPanelsTabGroup li.TabbedPanelsTab";
const VISIBLE_PANEL_SELECTOR = "div.TabbedPanelsContentVisible";

const LISTING_ROW_SELECTOR = "tr.listingRow";
const MIN_COLUMNS = 5;
const VIDEO_COLUMN = 4;
const PLAYER_URL_PATTERN = /window\.open\('([^']+)'/;

/**
 * Renders the archive page in a headless browser and returns the markup of
 * the case table for one year.
 * The session is closed whether the lookup succeeds or fails. No retries.
 * @param year - Canonical four-digit year, matched exactly against the tab labels
 * @param options.launchBrowser - Opens a browser session (Playwright in production)
 * @param options.archiveUrl - Page hosting the viewer frame
 * @returns The inner HTML of the visible tab panel
 * @throws FrameNotFoundError if the viewer frame is missing from the page
 * @throws TabNotFoundError if no tab is labelled with the year
 */
export async function fetchYearListingHtml(
  year: string,
  options: { launchBrowser: BrowserLauncher; archiveUrl?: string }
): Promise<string> {
  const { launchBrowser, archiveUrl = ARCHIVE_URL } = options;

  const session = await launchBrowser();
  try {
    await session.goto(archiveUrl);

    const frame = session.findFrame(VIEWER_FRAME_PATTERN);
    if (!frame) {
      throw new FrameNotFoundError(
        `Could not find the viewer frame on ${archiveUrl}. The archive page layout may have changed.`,
        VIEWER_FRAME_PATTERN.source
      );
    }

    // The tab list is attached before the widget script makes it visible
    await frame.waitForSelector(TAB_GROUP_SELECTOR, { state: "attached" });

    const tabs = await frame.queryAll(TAB_SELECTOR);
    const labels: string[] = [];
    let clicked = false;

    for (const tab of tabs) {
      const label = (await tab.innerText()).trim();
      labels.push(label);
      if (label === year) {
        await tab.click();
        clicked = true;
        break;
      }
    }

    if (!clicked) {
      throw new TabNotFoundError(
        `Could not find a tab for year ${year} (tabs: ${labels.join(", ") || "none"}).`,
        year,
        labels
      );
    }

    await frame.waitForSelector(VISIBLE_PANEL_SELECTOR);
    return await frame.innerHTML(VISIBLE_PANEL_SELECTOR);
  } finally {
    await session.close();
  }
}

/**
 * Parses one year's case table into listings, in document order.
 * Rows with fewer than five cells, an empty name, no click-handler anchor in
 * the video column, or an unusable player URL are skipped and counted.
 * Duplicate case names are kept: they may be separate hearings.
 * @param html - Inner markup of the visible tab panel
 * @param baseUrl - Base for resolving player links; scheme-relative links
 * ("//host/path") pick up its https scheme
 * @returns The listings and the number of rows dropped
 */
export function extractCaseLinks(
  html: string,
  baseUrl: string = VIEWER_BASE_URL
): ListingExtraction {
  const $ = cheerio.load(html);

  const cases: CaseListing[] = [];
  let skippedRows = 0;

  $(LISTING_ROW_SELECTOR).each((_, row) => {
    const cells = $(row).find("td");
    if (cells.length < MIN_COLUMNS) {
      skippedRows++;
      return;
    }

    const caseName = cells.eq(0).text().trim();
    const onclick = cells.eq(VIDEO_COLUMN).find("a[onclick]").first().attr("onclick");
    const rawUrl = onclick ? extractFirstMatch(onclick, PLAYER_URL_PATTERN) : null;
    const mediaPlayerUrl = rawUrl ? resolvePlayerUrl(rawUrl, baseUrl) : null;

    if (!caseName || !mediaPlayerUrl) {
      skippedRows++;
      return;
    }

    cases.push({ caseName, mediaPlayerUrl });
  });

  return { cases, skippedRows };
}

function resolvePlayerUrl(rawUrl: string, baseUrl: string): string | null {
  try {
    return new URL(rawUrl.replace(/&amp;/g, "&"), baseUrl).toString();
  } catch {
    // Not a URL the viewer could have opened either
    return null;
  }
}
