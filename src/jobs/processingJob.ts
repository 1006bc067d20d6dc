import type { ProcessingConfig } from "../config/env";
import { EpisodeRepository } from "../db/episodeRepository";
import { readJsonFile } from "../db/jsonFile";
import { StateRepository } from "../db/stateRepository";
import { type UploadRecord, uploadRecordListSchema } from "../db/types";
import { JobReporter } from "../services/jobReporter";
import {
  type ProcessingCapabilities,
  type ProcessingSummary,
  ProcessingService
} from "../services/processingService";
import { runSentinelCheck } from "../utils/sentinel";

export interface ProcessingJobDeps {
  /** Skips the sentinel check when provided */
  capabilities?: ProcessingCapabilities;
  reporter?: JobReporter;
  clock?: () => Date;
}

export interface ProcessingJobResult {
  summary: ProcessingSummary | null;
  /** Ids newly added to the seen set by this run */
  acknowledged: number;
}

/**
 * Loads the discovery output. A missing file and an empty list both mean
 * there is nothing to do.
 */
export async function loadNewVideos(filePath: string): Promise<UploadRecord[] | null> {
  return readJsonFile(filePath, uploadRecordListSchema.nullable(), () => null);
}

/**
 * Ids from this run's input that now have a catalog entry, whether created
 * by this run or by an earlier one. Failed fetches are left out so discovery
 * reports them again.
 */
export function consumedIds(
  videos: UploadRecord[],
  summary: ProcessingSummary
): string[] {
  const inCatalog = new Set(summary.catalog.map((ep) => ep.video_id));
  return videos.map((v) => v.id).filter((id) => inCatalog.has(id));
}

/**
 * The processing stage entry point.
 * 1. Reads new_videos.json written by `monitor --json`.
 * 2. Runs the sentinel check to pick tagging and storage backends.
 * 3. Processes every upload, persists the catalog and rebuilds the feed.
 * 4. Acknowledges the consumed ids in the monitor state.
 * @param config - Processing settings
 * @param deps - Overrides for tests
 * @throws A critical error if yt-dlp is missing or a data file is malformed
 */
export async function runProcessingJob(
  config: ProcessingConfig,
  deps: ProcessingJobDeps = {}
): Promise<ProcessingJobResult> {
  const reporter = deps.reporter ?? new JobReporter("process");
  const clock = deps.clock ?? (() => new Date());

  reporter.startRun();

  try {
    const videos = await loadNewVideos(config.paths.newVideosFile);
    if (videos === null) {
      reporter.info(`No ${config.paths.newVideosFile} file found`);
      return { summary: null, acknowledged: 0 };
    }
    if (videos.length === 0) {
      reporter.info("No new videos to process");
      return { summary: null, acknowledged: 0 };
    }

    reporter.incrementDiscovered(videos.length);
    reporter.info(`Processing ${videos.length} new video(s)...`);

    const capabilities =
      deps.capabilities ?? (await runSentinelCheck(config, reporter));

    const service = new ProcessingService(
      new EpisodeRepository(config.paths.episodesFile),
      capabilities,
      reporter,
      clock
    );
    const summary = await service.run(videos);

    const acknowledged = await new StateRepository(
      config.paths.stateFile
    ).acknowledge(consumedIds(videos, summary));
    if (acknowledged > 0) {
      reporter.info(`Marked ${acknowledged} video(s) as seen`);
    }
    if (summary.failed.length > 0) {
      reporter.warn(
        `${summary.failed.length} video(s) will be retried next run: ${summary.failed.join(", ")}`
      );
    }

    reporter.finishRun();
    return { summary, acknowledged };
  } catch (criticalError: unknown) {
    const criticalMessage =
      criticalError instanceof Error
        ? criticalError.message
        : String(criticalError);
    reporter.error(`CRITICAL JOB FAILURE: ${criticalMessage}`);
    reporter.finishRun(
      criticalError instanceof Error
        ? criticalError
        : new Error(criticalMessage)
    );
    throw criticalError; // Re-throw so the caller exits non-zero
  }
}
