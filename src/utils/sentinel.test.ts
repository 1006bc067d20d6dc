import { S3Client } from "@aws-sdk/client-s3";
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { assertBucketReachable, createStorageClient } from "../clients/s3Client";
import { loadProcessingConfig, type ProcessingConfig } from "../config/env";
import { YtDlpAudioFetcher } from "../services/audioFetcher";
import { FileFeedPublisher } from "../services/feedService";
import { JobReporter } from "../services/jobReporter";
import { B2AudioStorage, NoopStorage } from "../services/storageService";
import { FfmpegTagger, NoopTagger } from "../services/taggingService";
import { checkCommand } from "./commands";
import { runSentinelCheck } from "./sentinel";

vi.mock("./commands", () => ({
  checkCommand: vi.fn()
}));

vi.mock("../clients/s3Client", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../clients/s3Client")>();
  return {
    ...actual,
    createStorageClient: vi.fn(),
    assertBucketReachable: vi.fn()
  };
});

const withStorage: ProcessingConfig = loadProcessingConfig({
  B2_APPLICATION_KEY_ID: "test-key-id",
  B2_APPLICATION_KEY: "test-secret"
});
const withoutStorage: ProcessingConfig = loadProcessingConfig({});

function availableTools(...tools: string[]): void {
  vi.mocked(checkCommand).mockImplementation(async (cmd) => tools.includes(cmd));
}

describe("runSentinelCheck", () => {
  let reporter: JobReporter;
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    reporter = new JobReporter("process", { quiet: true });
    vi.mocked(createStorageClient).mockClear();
    vi.mocked(createStorageClient).mockReturnValue(
      new S3Client({ region: "us-west-004" })
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.mocked(checkCommand).mockReset();
    vi.mocked(assertBucketReachable).mockReset();
  });

  it("stops the job when yt-dlp is not runnable", async () => {
    availableTools("ffmpeg");

    await expect(runSentinelCheck(withStorage, reporter)).rejects.toThrow(
      "CRITICAL: yt-dlp not runnable at 'yt-dlp'. Stopping job."
    );
  });

  it("uses the real backends when every tool and the bucket are available", async () => {
    availableTools("yt-dlp", "ffmpeg");
    vi.mocked(assertBucketReachable).mockResolvedValue(undefined);

    const capabilities = await runSentinelCheck(withStorage, reporter);

    expect(capabilities.fetcher).toBeInstanceOf(YtDlpAudioFetcher);
    expect(capabilities.tagger).toBeInstanceOf(FfmpegTagger);
    expect(capabilities.storage).toBeInstanceOf(B2AudioStorage);
    expect(capabilities.feed).toBeInstanceOf(FileFeedPublisher);
    expect(warn).not.toHaveBeenCalled();
  });

  it("substitutes no-ops for a missing ffmpeg and missing credentials", async () => {
    availableTools("yt-dlp");

    const capabilities = await runSentinelCheck(withoutStorage, reporter);

    expect(capabilities.tagger).toBeInstanceOf(NoopTagger);
    expect(capabilities.storage).toBeInstanceOf(NoopStorage);
    expect(createStorageClient).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("skips uploads when the bucket cannot be reached", async () => {
    availableTools("yt-dlp", "ffmpeg");
    vi.mocked(assertBucketReachable).mockRejectedValue(new Error("InvalidAccessKeyId"));

    const capabilities = await runSentinelCheck(withStorage, reporter);

    expect(capabilities.storage).toBeInstanceOf(NoopStorage);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("Reason: InvalidAccessKeyId"));
  });
});
