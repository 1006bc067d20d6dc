import path from "path";

export const AUDIO_FORMAT = "mp3";
export const AUDIO_QUALITY = "128K";

export const COMMON_CONFIG = [
  // Only the single video, even when the URL carries a playlist parameter.
  "--no-playlist",

  // Skip the on-disk cache; scheduled runs start from a clean environment.
  "--no-cache-dir",

  // If the server doesn't respond within 30 seconds, the connection is dropped.
  // Prevents a scheduled run from hanging indefinitely on a dead link.
  "--socket-timeout",
  "30",

  // Retry failed DASH fragments before giving up on the whole download.
  "--fragment-retries",
  "10",

  // Back off between retries so rate limiting clears.
  "--retry-sleep",
  "5"
];

const AUDIO_CONFIG = [
  // Extract audio and transcode it to MP3 with ffmpeg.
  "--extract-audio",
  "--audio-format",
  AUDIO_FORMAT,
  "--audio-quality",
  AUDIO_QUALITY
];

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/**
 * Local path of the extracted audio for a video. yt-dlp writes it there and
 * later steps read it; the name depends only on the video id.
 */
export function audioPathFor(audioDir: string, videoId: string): string {
  return path.join(audioDir, `${videoId}.${AUDIO_FORMAT}`);
}

/**
 * Constructs the argument list for extracting a video's audio track with yt-dlp.
 * The output template keeps the file name keyed on the video id so reruns find it.
 * @param videoId - The YouTube video id
 * @param audioDir - Directory receiving the audio file
 * @returns A flat array of strings suitable for spawning a child process
 */
export function getYtDlpArgs(videoId: string, audioDir: string): string[] {
  const outputArgs = [
    "--output",
    path.join(audioDir, `${videoId}.%(ext)s`)
  ];

  return [...COMMON_CONFIG, ...AUDIO_CONFIG, ...outputArgs, watchUrl(videoId)];
}
