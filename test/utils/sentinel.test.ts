import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runSentinelCheck } from "../../src/utils/sentinel";

type ExecCallback = (
  err: Error | null,
  result?: { stdout: string; stderr: string }
) => void;

const installed = vi.hoisted(() => ({ tools: new Set<string>() }));

// Callback-style stand-in; promisify resolves with the result object.
vi.mock("child_process", async (importOriginal) => ({
  ...(await importOriginal<typeof import("child_process")>()),
  execFile: vi.fn(
    (file: string, _args: string[], _options: object, callback: ExecCallback) => {
      if (installed.tools.has(file)) {
        callback(null, { stdout: `${file} 1.2.3\nextra banner line\n`, stderr: "" });
      } else {
        callback(new Error(`spawn ${file} ENOENT`));
      }
    }
  )
}));

describe("runSentinelCheck", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    installed.tools.clear();
    vi.restoreAllMocks();
  });

  it("passes when yt-dlp and ffmpeg both run", async () => {
    installed.tools.add("yt-dlp");
    installed.tools.add("ffmpeg");

    await expect(runSentinelCheck()).resolves.toBeUndefined();
    expect(console.log).toHaveBeenCalledWith("    ✅ yt-dlp: yt-dlp 1.2.3");
    expect(console.log).toHaveBeenCalledWith("    ✅ ffmpeg: ffmpeg 1.2.3");
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("stops the job when the configured yt-dlp binary is missing", async () => {
    installed.tools.add("ffmpeg");

    await expect(
      runSentinelCheck({ ytDlpPath: "/opt/bin/yt-dlp" })
    ).rejects.toThrow(
      "CRITICAL: /opt/bin/yt-dlp is not runnable. Stopping job. (spawn /opt/bin/yt-dlp ENOENT)"
    );
  });

  it("only warns when ffmpeg is missing", async () => {
    installed.tools.add("yt-dlp");

    await expect(runSentinelCheck()).resolves.toBeUndefined();
    expect(console.warn).toHaveBeenCalledWith(
      "    ⚠️  WARNING: ffmpeg check failed."
    );
    expect(console.warn).toHaveBeenCalledWith("   Reason: spawn ffmpeg ENOENT");
  });
});
