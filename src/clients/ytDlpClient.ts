import { spawn } from "child_process";
import { mkdir } from "fs/promises";
import { join } from "path";
import { getYtDlpAudioArgs } from "../config/yt-dlp";
import type { DownloadRequest } from "../scrapers/types";

export type DownloadOutcome =
  | { ok: true; outputPathPrefix: string }
  | { ok: false; exitCode: number | null; signal: NodeJS.Signals | null };

export interface AudioDownloader {
  /**
   * Pulls the stream behind a manifest URL and writes its audio track to
   * `<targetDir>/<title>.<ext>`.
   * @throws Error only when the downloader process cannot be started
   */
  download(
    manifestUrl: string,
    title: string,
    targetDir: string
  ): Promise<DownloadOutcome>;
}

export interface YtDlpOptions {
  binary?: string;
  audioFormat?: string;
  userAgent?: string;
}

/**
 * Runs yt-dlp as a child process, one download at a time.
 * Progress goes straight to the terminal; the exit code decides the outcome.
 */
export class YtDlpAudioDownloader implements AudioDownloader {
  private readonly binary: string;
  private readonly audioFormat: string;
  private readonly userAgent?: string;

  constructor(options: YtDlpOptions = {}) {
    this.binary = options.binary ?? "yt-dlp";
    this.audioFormat = options.audioFormat ?? "mp3";
    this.userAgent = options.userAgent;
  }

  async download(
    manifestUrl: string,
    title: string,
    targetDir: string
  ): Promise<DownloadOutcome> {
    await mkdir(targetDir, { recursive: true });

    const request: DownloadRequest = {
      outputPathPrefix: join(targetDir, title),
      manifestUrl
    };
    const args = getYtDlpAudioArgs(
      request.manifestUrl,
      `${request.outputPathPrefix}.%(ext)s`,
      { audioFormat: this.audioFormat, userAgent: this.userAgent }
    );

    console.log(`[${title}] Starting yt-dlp audio extraction...`);
    const ytDlpProcess = spawn(this.binary, args, { stdio: "inherit" });

    // Kill yt-dlp if the main Node process dies
    const cleanupListener = () => {
      if (!ytDlpProcess.killed) {
        console.warn(
          `[${title}] 🧹 Killing orphaned yt-dlp process (PID: ${ytDlpProcess.pid})...`
        );
        ytDlpProcess.kill("SIGKILL");
      }
    };
    process.on("exit", cleanupListener);

    try {
      return await new Promise<DownloadOutcome>((resolve, reject) => {
        ytDlpProcess.once("error", (err) => {
          reject(new Error(`Failed to start ${this.binary}: ${err.message}`, { cause: err }));
        });
        ytDlpProcess.once("close", (code, signal) => {
          if (code === 0) {
            resolve({ ok: true, outputPathPrefix: request.outputPathPrefix });
          } else {
            resolve({ ok: false, exitCode: code, signal });
          }
        });
      });
    } finally {
      process.off("exit", cleanupListener);
    }
  }
}
