import { mkdir, stat } from "fs/promises";
import { extractAudio } from "../clients/ytDlpClient";
import { audioPathFor, watchUrl } from "../config/yt-dlp";
import type { UploadRecord } from "../db/types";
import { isMissingFileError } from "../db/jsonFile";
import type { RunLogger } from "./jobReporter";

export interface AudioFetcher {
  /**
   * Resolves a video to a local audio file.
   * @returns Path of the audio file
   * @throws Error when no audio file exists afterwards
   */
  fetch(video: UploadRecord): Promise<string>;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (err: unknown) {
    if (isMissingFileError(err)) return false;
    throw err;
  }
}

export class YtDlpAudioFetcher implements AudioFetcher {
  constructor(
    private ytDlpPath: string,
    private audioDir: string,
    private logger: RunLogger
  ) {}

  async fetch(video: UploadRecord): Promise<string> {
    const outputPath = audioPathFor(this.audioDir, video.id);

    // Left over from an earlier run whose upload failed
    if (await fileExists(outputPath)) {
      this.logger.info(`[${video.id}] Audio already exists: ${outputPath}`);
      return outputPath;
    }

    await mkdir(this.audioDir, { recursive: true });
    this.logger.info(`[${video.id}] Downloading: ${watchUrl(video.id)}`);
    const result = await extractAudio(this.ytDlpPath, video.id, this.audioDir);

    if (!result.success) {
      throw new Error(result.message);
    }
    if (!(await fileExists(outputPath))) {
      throw new Error(`yt-dlp exited cleanly but ${outputPath} is missing`);
    }

    return outputPath;
  }
}
