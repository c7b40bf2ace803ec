import { execFile } from "child_process";
import { promisify } from "util";
import { errorMessage } from "../errors";

const execFileAsync = promisify(execFile);

async function readToolVersion(binary: string, versionFlag: string): Promise<string> {
  const { stdout } = await execFileAsync(binary, [versionFlag], {
    timeout: 15_000
  });
  return stdout.split("\n")[0].trim();
}

/**
 * Verifies that the external tools the run depends on are installed.
 * Run this before launching the browser so a missing tool fails fast.
 * @param options.ytDlpPath - yt-dlp binary to check (defaults to "yt-dlp" on PATH)
 * @throws Error if yt-dlp cannot be executed
 */
export async function runSentinelCheck(
  options: { ytDlpPath?: string } = {}
): Promise<void> {
  const { ytDlpPath = "yt-dlp" } = options;

  console.log(
    `[${new Date().toLocaleTimeString()}] 🛡️ Running Sentinel Tooling Check...`
  );

  // --- CRITICAL: yt-dlp ---
  try {
    const version = await readToolVersion(ytDlpPath, "--version");
    console.log(`    ✅ yt-dlp: ${version}`);
  } catch (err: unknown) {
    throw new Error(
      `CRITICAL: ${ytDlpPath} is not runnable. Stopping job. (${errorMessage(err)})`
    );
  }

  // --- NON-CRITICAL: ffmpeg ---
  try {
    const version = await readToolVersion("ffmpeg", "-version");
    console.log(`    ✅ ffmpeg: ${version}`);
  } catch (err: unknown) {
    console.warn("    ⚠️  WARNING: ffmpeg check failed.");
    console.warn(
      "   Listing and resolution will proceed, but audio extraction will likely fail."
    );
    console.warn(`   Reason: ${errorMessage(err)}`);
    // We do NOT throw here. The job continues.
  }
}
