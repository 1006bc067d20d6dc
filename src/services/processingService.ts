import { rm, stat } from "fs/promises";
import type { EpisodeRepository } from "../db/episodeRepository";
import type { Episode, UploadRecord } from "../db/types";
import type { AudioFetcher } from "./audioFetcher";
import type { FeedPublisher } from "./feedService";
import type { JobReporter } from "./jobReporter";
import type { AudioStorage } from "./storageService";
import type { AudioTagger } from "./taggingService";

export interface ProcessingCapabilities {
  fetcher: AudioFetcher;
  tagger: AudioTagger;
  storage: AudioStorage;
  feed: FeedPublisher;
}

export interface ProcessingSummary {
  /** Full catalog as persisted at the end of the run */
  catalog: Episode[];
  /** Episodes created by this run */
  processed: Episode[];
  /** Input ids already present in the catalog */
  skipped: string[];
  /** Input ids whose audio could not be fetched */
  failed: string[];
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ProcessingService {
  constructor(
    private episodeRepo: EpisodeRepository,
    private capabilities: ProcessingCapabilities,
    private reporter: JobReporter,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Turns uploads into episodes, then persists the catalog and rebuilds the feed from it.
   * Uploads already in the catalog are skipped without touching their audio, which makes
   * replaying the same input harmless. A failed fetch drops only that upload.
   * @param videos Uploads reported by discovery, in the order to process them
   * @returns What happened to each input and the resulting catalog
   */
  async run(videos: UploadRecord[]): Promise<ProcessingSummary> {
    const catalog = await this.episodeRepo.findAll();
    const knownIds = new Set(catalog.map((ep) => ep.video_id));

    const processed: Episode[] = [];
    const skipped: string[] = [];
    const failed: string[] = [];

    for (const video of videos) {
      if (knownIds.has(video.id)) {
        this.reporter.info(`Skipping already processed: ${video.id}`);
        this.reporter.incrementSkipped();
        skipped.push(video.id);
        continue;
      }

      const episode = await this.processVideo(video);
      if (episode) {
        catalog.push(episode);
        knownIds.add(episode.video_id);
        processed.push(episode);
        this.reporter.incrementProcessed();
      } else {
        failed.push(video.id);
        this.reporter.incrementFailed();
      }
    }

    await this.episodeRepo.saveAll(catalog);
    await this.capabilities.feed.publish(catalog);
    this.reporter.info(`Feed regenerated with ${catalog.length} episode(s)`);

    return { catalog, processed, skipped, failed };
  }

  /**
   * Runs fetch → tag → upload → finalize for one upload.
   * Only the fetch step can fail the upload; tagging, storage and cleanup
   * problems degrade the episode instead.
   * @param video The upload to process
   * @returns The new episode, or null when no audio could be fetched
   */
  async processVideo(video: UploadRecord): Promise<Episode | null> {
    const { fetcher, tagger, storage } = this.capabilities;
    this.reporter.info(`--- Processing: ${video.title} ---`);

    let audioPath: string;
    try {
      audioPath = await fetcher.fetch(video);
    } catch (err: unknown) {
      this.reporter.error(
        `[${video.id}] Failed to download audio: ${describe(err)}`
      );
      return null;
    }

    if (tagger.enabled) {
      try {
        await tagger.tag(audioPath, video);
        this.reporter.info(`[${video.id}] Tagged: ${audioPath}`);
      } catch (err: unknown) {
        this.reporter.warn(`[${video.id}] Tagging skipped: ${describe(err)}`);
      }
    }

    // Size is read before the local file can be removed below
    const fileSize = await stat(audioPath)
      .then((s) => s.size)
      .catch(() => 0);

    let audioUrl: string | null = null;
    if (storage.enabled) {
      try {
        audioUrl = await storage.upload(audioPath, video.id);
      } catch (err: unknown) {
        this.reporter.warn(`[${video.id}] Upload failed: ${describe(err)}`);
      }
    }

    const episode: Episode = {
      video_id: video.id,
      title: video.title,
      description: video.description,
      published_at: video.published_at,
      audio_url: audioUrl,
      file_size: fileSize,
      processed_at: this.clock().toISOString()
    };

    if (audioUrl) {
      try {
        await rm(audioPath, { force: true });
        this.reporter.info(`[${video.id}] Cleaned up local file`);
      } catch (err: unknown) {
        this.reporter.warn(
          `[${video.id}] Could not remove ${audioPath}: ${describe(err)}`
        );
      }
    } else {
      this.reporter.warn(
        `[${video.id}] No audio URL; keeping ${audioPath} for a later run`
      );
    }

    return episode;
  }
}
