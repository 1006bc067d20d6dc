import { writeId3Tags } from "../clients/ffmpegClient";
import type { PodcastMetadata } from "../config/env";
import type { UploadRecord } from "../db/types";
import { parseCaseInfo } from "../utils/caseInfo";

export interface AudioTagger {
  readonly enabled: boolean;
  tag(filePath: string, video: UploadRecord): Promise<void>;
}

/**
 * Maps a video onto ffmpeg's ID3 metadata keys
 * (title→TIT2, artist→TPE1, album→TALB, genre→TCON, date→TDRC, comment→COMM).
 */
export function buildId3Tags(
  video: UploadRecord,
  podcast: PodcastMetadata
): Record<string, string> {
  const tags: Record<string, string> = {
    title: video.title,
    artist: podcast.author,
    album: podcast.title,
    genre: "Podcast"
  };

  const year = video.published_at.slice(0, 4);
  if (year) tags.date = year;

  const { docket } = parseCaseInfo(video.title);
  if (docket) tags.comment = docket;

  return tags;
}

export class FfmpegTagger implements AudioTagger {
  readonly enabled = true;

  constructor(
    private ffmpegPath: string,
    private podcast: PodcastMetadata
  ) {}

  async tag(filePath: string, video: UploadRecord): Promise<void> {
    await writeId3Tags(
      this.ffmpegPath,
      filePath,
      buildId3Tags(video, this.podcast)
    );
  }
}

/** Used when ffmpeg is not installed; files go out untagged. */
export class NoopTagger implements AudioTagger {
  readonly enabled = false;

  async tag(): Promise<void> {}
}
