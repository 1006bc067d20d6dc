import { rename, rm } from "fs/promises";
import { runCommand } from "../utils/commands";

export function getMetadataArgs(
  inputPath: string,
  outputPath: string,
  tags: Record<string, string>
): string[] {
  const metadataArgs = Object.entries(tags).flatMap(([key, value]) => [
    "-metadata",
    `${key}=${value}`
  ]);

  return [
    "-hide_banner",
    "-loglevel",
    "error",
    "-y",
    "-i",
    inputPath,
    // Audio stream only; copied, never re-encoded
    "-map",
    "0:a",
    "-c",
    "copy",
    "-id3v2_version",
    "3",
    ...metadataArgs,
    outputPath
  ];
}

/**
 * Rewrites an MP3's ID3 tags in place.
 * ffmpeg can't edit in place, so it writes a sibling temp file that then replaces the original.
 * @param ffmpegPath - ffmpeg executable
 * @param filePath - MP3 to tag
 * @param tags - ffmpeg metadata keys (title, artist, album, genre, date, comment)
 * @throws Error with ffmpeg's stderr when it exits non-zero
 */
export async function writeId3Tags(
  ffmpegPath: string,
  filePath: string,
  tags: Record<string, string>
): Promise<void> {
  const tempPath = `${filePath}.tagging.mp3`;

  const { code, stderr } = await runCommand(
    ffmpegPath,
    getMetadataArgs(filePath, tempPath, tags)
  );

  if (code !== 0) {
    await rm(tempPath, { force: true });
    throw new Error(`ffmpeg failed (code ${code}): ${stderr.trim()}`);
  }

  await rename(tempPath, filePath);
}
