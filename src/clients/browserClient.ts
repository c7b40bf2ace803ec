import { chromium, type Browser, type Frame } from "playwright-core";
import type {
  BrowserElement,
  BrowserFrame,
  BrowserLauncher,
  BrowserSession
} from "../scrapers/types";

const NAVIGATION_TIMEOUT_MS = 60_000;

function wrapFrame(frame: Frame): BrowserFrame {
  return {
    async waitForSelector(selector, options) {
      await frame.waitForSelector(selector, { state: options?.state });
    },
    async queryAll(selector) {
      const handles = await frame.$$(selector);
      return handles.map(
        (handle): BrowserElement => ({
          innerText: () => handle.innerText(),
          click: () => handle.click()
        })
      );
    },
    innerHTML(selector) {
      return frame.locator(selector).innerHTML();
    }
  };
}

/**
 * Creates a launcher that opens a Chromium page through Playwright.
 * Playwright does not ship browsers with the npm package; point
 * executablePath at a local Chrome/Chromium or run `npx playwright install chromium`.
 * @param options.headless - Run without a window (defaults to true)
 * @param options.executablePath - Explicit browser binary to drive
 */
export function createPlaywrightLauncher(
  options: { headless?: boolean; executablePath?: string } = {}
): BrowserLauncher {
  const { headless = true, executablePath } = options;

  return async (): Promise<BrowserSession> => {
    const browser: Browser = await chromium.launch({ headless, executablePath });

    try {
      const page = await browser.newPage();
      page.setDefaultTimeout(NAVIGATION_TIMEOUT_MS);

      return {
        async goto(url) {
          await page.goto(url, { waitUntil: "networkidle" });
        },
        findFrame(urlPattern) {
          const frame = page.frame({ url: urlPattern });
          return frame ? wrapFrame(frame) : null;
        },
        async close() {
          await browser.close();
        }
      };
    } catch (err) {
      await browser.close();
      throw err;
    }
  };
}
