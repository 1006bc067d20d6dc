import { getYtDlpArgs } from "../config/yt-dlp";
import { runCommand } from "../utils/commands";

export type YtDlpResult =
  | { success: true }
  | { success: false; message: string };

/**
 * Extracts the audio track of a video into the audio directory as MP3.
 * A non-zero exit is reported as a failure with yt-dlp's stderr attached
 * rather than thrown, so one bad video doesn't stop the batch.
 * @param ytDlpPath - yt-dlp executable
 * @param videoId - The YouTube video id
 * @param audioDir - Destination directory
 */
export async function extractAudio(
  ytDlpPath: string,
  videoId: string,
  audioDir: string
): Promise<YtDlpResult> {
  try {
    const { code, stderr } = await runCommand(
      ytDlpPath,
      getYtDlpArgs(videoId, audioDir)
    );

    if (code !== 0) {
      return {
        success: false,
        message: `yt-dlp failed (code ${code}): ${stderr.trim()}`
      };
    }
    return { success: true };
  } catch (err: unknown) {
    return {
      success: false,
      message: err instanceof Error ? err.message : String(err)
    };
  }
}
