export const COMMON_CONFIG = [
  // The manifest is one hearing, even though an HLS playlist can list
  // several renditions.
  "--no-playlist",

  // Drop the video track once the stream is down; needs ffmpeg on PATH.
  "--extract-audio",

  // Skip yt-dlp's on-disk cache of extractor data between runs.
  "--no-cache-dir",

  // If the server doesn't respond within 30 seconds, the connection is dropped.
  // Prevents the run from hanging on a dead stream.
  "--socket-timeout",
  "30",

  // HLS streams arrive in fragments; a failed one is retried this many times
  // before the whole download is given up.
  "--fragment-retries",
  "10",

  // Wait between retries so the CDN doesn't rate-limit us.
  "--retry-sleep",
  "5",

  // Uses yt-dlp's internal HLS downloader rather than handing the fetch to ffmpeg.
  "--hls-prefer-native"
];

export interface AudioArgsOptions {
  audioFormat: string;
  userAgent?: string;
}

/**
 * Builds the yt-dlp argument list for pulling the audio track of one HLS manifest.
 * @param manifestUrl - The .m3u8 address resolved from the media player page
 * @param outputTemplate - Output path with yt-dlp's `%(ext)s` placeholder
 * @param options - Target codec and the User-Agent to present to the CDN
 * @returns A flat array of strings suitable for spawning a child process
 * @example
 * getYtDlpAudioArgs("https://cdn.example/v.m3u8", "/out/2021/Case.%(ext)s", { audioFormat: "mp3" })
 */
export function getYtDlpAudioArgs(
  manifestUrl: string,
  outputTemplate: string,
  options: AudioArgsOptions
): string[] {
  const { audioFormat, userAgent } = options;

  return [
    ...COMMON_CONFIG,
    "--audio-format",
    audioFormat,
    ...(userAgent ? ["--user-agent", userAgent] : []),
    "--output",
    outputTemplate,
    manifestUrl
  ];
}
