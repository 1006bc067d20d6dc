import type { ProcessingConfig } from "../config/env";
import {
  assertBucketReachable,
  createStorageClient
} from "../clients/s3Client";
import { YtDlpAudioFetcher } from "../services/audioFetcher";
import { FileFeedPublisher } from "../services/feedService";
import type { JobReporter } from "../services/jobReporter";
import type { ProcessingCapabilities } from "../services/processingService";
import {
  type AudioStorage,
  B2AudioStorage,
  NoopStorage
} from "../services/storageService";
import {
  type AudioTagger,
  FfmpegTagger,
  NoopTagger
} from "../services/taggingService";
import { checkCommand } from "./commands";

async function resolveTagger(
  config: ProcessingConfig,
  reporter: JobReporter
): Promise<AudioTagger> {
  if (await checkCommand(config.ffmpegPath, ["-version"])) {
    reporter.info(`    ✅ ffmpeg: Available`);
    return new FfmpegTagger(config.ffmpegPath, config.podcast);
  }

  reporter.warn("WARNING: ffmpeg not found, ID3 tagging will be skipped");
  return new NoopTagger();
}

async function resolveStorage(
  config: ProcessingConfig,
  reporter: JobReporter
): Promise<AudioStorage> {
  if (!config.storage) {
    reporter.warn("WARNING: B2 credentials not set, uploads will be skipped");
    return new NoopStorage();
  }

  const client = createStorageClient(config.storage);
  try {
    await assertBucketReachable(client, config.storage.bucket);
    reporter.info(`    ✅ B2 bucket ${config.storage.bucket}: Reachable`);
    return new B2AudioStorage(client, config.storage, reporter);
  } catch (err: unknown) {
    const errorMessage =
      err instanceof Error ? err.message : JSON.stringify(err);

    reporter.warn("WARNING: B2 health check failed, uploads will be skipped");
    reporter.warn(`Reason: ${errorMessage}`);
    return new NoopStorage();
  }
}

/**
 * Verifies the external tools and services the processing stage relies on and
 * picks an implementation for every optional capability.
 * Run this at the start of the processing job, before the catalog is read.
 * @param config - Processing settings
 * @param reporter - Run reporter receiving the check results
 * @returns The capabilities to process with; unavailable ones are no-ops
 * @throws Error if yt-dlp is missing, since no episode can be produced without it
 */
export async function runSentinelCheck(
  config: ProcessingConfig,
  reporter: JobReporter
): Promise<ProcessingCapabilities> {
  reporter.info(`🛡️ Running Sentinel Infrastructure Check...`);

  // --- CRITICAL: yt-dlp ---
  if (!(await checkCommand(config.ytDlpPath, ["--version"]))) {
    throw new Error(
      `CRITICAL: yt-dlp not runnable at '${config.ytDlpPath}'. Stopping job.`
    );
  }
  reporter.info(`    ✅ yt-dlp: Available`);

  // --- NON-CRITICAL: ffmpeg, B2 ---
  const tagger = await resolveTagger(config, reporter);
  const storage = await resolveStorage(config, reporter);

  return {
    fetcher: new YtDlpAudioFetcher(
      config.ytDlpPath,
      config.paths.audioDir,
      reporter
    ),
    tagger,
    storage,
    feed: new FileFeedPublisher(config.paths.feedFile, config.podcast)
  };
}
