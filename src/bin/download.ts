#!/usr/bin/env node

import { createPlaywrightLauncher } from "../clients/browserClient";
import { YtDlpAudioDownloader } from "../clients/ytDlpClient";
import { loadConfig } from "../config/env";
import { InvalidInputError } from "../errors";
import { runDownloadJob } from "../jobs/orchestrator";
import { MediaResolver } from "../services/mediaResolver";
import { parseCliArgs, usage } from "../utils/cli";
import { runSentinelCheck } from "../utils/sentinel";

async function main() {
  let year: string;
  let outputDir: string | undefined;

  try {
    const args = parseCliArgs(process.argv.slice(2));
    if (args.help || !args.year) {
      console.log(usage());
      process.exit(0);
    }
    year = args.year;
    outputDir = args.outputDir;
  } catch (err) {
    if (err instanceof InvalidInputError) {
      console.error(`${usage()}\n\nError: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  try {
    const config = loadConfig();

    await runSentinelCheck({ ytDlpPath: config.ytDlpPath });

    console.log(
      "========================================\n",
      `🚀 Starting Run: AZ Supreme Court oral arguments ${year}`,
      "\n========================================"
    );

    await runDownloadJob(year, {
      outputDir: outputDir ?? config.outputDir,
      archiveUrl: config.archiveUrl,
      listingBaseUrl: config.listingBaseUrl,
      launchBrowser: createPlaywrightLauncher(config.browser),
      resolver: new MediaResolver(config.http),
      downloader: new YtDlpAudioDownloader({
        binary: config.ytDlpPath,
        audioFormat: config.audioFormat,
        userAgent: config.http.userAgent
      })
    });
    process.exit(0);
  } catch (err) {
    console.error(`💥 Fatal Run Error [${year}]:`, err);
    process.exit(1);
  }
}

void main();
