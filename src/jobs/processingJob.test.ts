import { existsSync } from "fs";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadProcessingConfig, type ProcessingConfig } from "../config/env";
import { EpisodeRepository } from "../db/episodeRepository";
import { StateRepository } from "../db/stateRepository";
import type { UploadRecord } from "../db/types";
import type { AudioFetcher } from "../services/audioFetcher";
import { FileFeedPublisher } from "../services/feedService";
import { JobReporter } from "../services/jobReporter";
import type { ProcessingCapabilities } from "../services/processingService";
import type { AudioStorage } from "../services/storageService";
import { NoopTagger } from "../services/taggingService";
import { consumedIds, loadNewVideos, runProcessingJob } from "./processingJob";

const clock = () => new Date("2024-06-01T08:00:00Z");

function video(id: string): UploadRecord {
  return {
    id,
    title: `Commonwealth v. ${id}, SJC-200`,
    published_at: "2024-03-01T14:00:00Z",
    description: ""
  };
}

class FakeFetcher implements AudioFetcher {
  failing = new Set<string>();

  constructor(private audioDir: string) {}

  async fetch(v: UploadRecord): Promise<string> {
    if (this.failing.has(v.id)) throw new Error("yt-dlp failed (code 1): gone");
    const filePath = path.join(this.audioDir, `${v.id}.mp3`);
    await writeFile(filePath, "audio");
    return filePath;
  }
}

class FakeStorage implements AudioStorage {
  readonly enabled = true;

  async upload(_filePath: string, videoId: string): Promise<string | null> {
    return `https://cdn.test/episodes/${videoId}.mp3`;
  }
}

describe("runProcessingJob", () => {
  let dir: string;
  let config: ProcessingConfig;
  let fetcher: FakeFetcher;
  let capabilities: ProcessingCapabilities;

  const run = () =>
    runProcessingJob(config, {
      capabilities,
      reporter: new JobReporter("process", { quiet: true }),
      clock
    });

  const writeInput = (videos: UploadRecord[]) =>
    writeFile(config.paths.newVideosFile, JSON.stringify(videos), "utf8");

  beforeEach(async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    dir = await mkdtemp(path.join(os.tmpdir(), "processing-job-"));
    config = loadProcessingConfig({
      STATE_FILE: path.join(dir, "state.json"),
      NEW_VIDEOS_FILE: path.join(dir, "new_videos.json"),
      EPISODES_FILE: path.join(dir, "episodes.json"),
      FEED_FILE: path.join(dir, "feed.xml"),
      AUDIO_DIR: dir
    });
    fetcher = new FakeFetcher(dir);
    capabilities = {
      fetcher,
      tagger: new NoopTagger(),
      storage: new FakeStorage(),
      feed: new FileFeedPublisher(config.paths.feedFile, config.podcast)
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("does nothing when there is no input file", async () => {
    const result = await run();

    expect(result).toEqual({ summary: null, acknowledged: 0 });
    expect(existsSync(config.paths.episodesFile)).toBe(false);
    expect(existsSync(config.paths.feedFile)).toBe(false);
  });

  it("does nothing for an empty input list", async () => {
    await writeInput([]);

    const result = await run();

    expect(result).toEqual({ summary: null, acknowledged: 0 });
    expect(existsSync(config.paths.feedFile)).toBe(false);
  });

  it("acknowledges only the ids that reached the catalog", async () => {
    await new StateRepository(config.paths.stateFile).save({
      seen_ids: ["old"],
      last_check: "2024-05-01T00:00:00.000Z"
    });
    fetcher.failing.add("b");
    await writeInput([video("a"), video("b")]);

    const result = await run();

    expect(result.acknowledged).toBe(1);
    expect(result.summary?.failed).toEqual(["b"]);
    expect(await new StateRepository(config.paths.stateFile).load()).toEqual({
      seen_ids: ["old", "a"],
      last_check: "2024-05-01T00:00:00.000Z"
    });

    const catalog = await new EpisodeRepository(config.paths.episodesFile).findAll();
    expect(catalog).toEqual([
      {
        video_id: "a",
        title: "Commonwealth v. a, SJC-200",
        description: "",
        published_at: "2024-03-01T14:00:00Z",
        audio_url: "https://cdn.test/episodes/a.mp3",
        file_size: 5,
        processed_at: "2024-06-01T08:00:00.000Z"
      }
    ]);

    const feed = await readFile(config.paths.feedFile, "utf8");
    expect(feed).toContain('<guid isPermaLink="false">a</guid>');
    expect(feed).not.toContain('<guid isPermaLink="false">b</guid>');
  });

  it("replays the same input without new work", async () => {
    await writeInput([video("a")]);
    await run();

    const second = await run();

    expect(second.acknowledged).toBe(0);
    expect(second.summary?.skipped).toEqual(["a"]);
    expect(second.summary?.processed).toEqual([]);
    expect(second.summary?.catalog.map((ep) => ep.video_id)).toEqual(["a"]);
  });

  it("rejects a malformed input file", async () => {
    await writeFile(config.paths.newVideosFile, "{not json", "utf8");

    await expect(run()).rejects.toThrow(
      `Invalid JSON in ${config.paths.newVideosFile}`
    );
    expect(existsSync(config.paths.episodesFile)).toBe(false);
  });
});

describe("loadNewVideos", () => {
  it("returns null for a missing file", async () => {
    expect(await loadNewVideos(path.join(os.tmpdir(), "missing-new-videos.json"))).toBeNull();
  });
});

describe("consumedIds", () => {
  it("keeps input ids that have a catalog entry", () => {
    const ids = consumedIds([video("a"), video("b"), video("c")], {
      catalog: [
        {
          video_id: "c",
          title: "",
          description: "",
          published_at: "",
          audio_url: null,
          file_size: 0,
          processed_at: ""
        },
        {
          video_id: "a",
          title: "",
          description: "",
          published_at: "",
          audio_url: null,
          file_size: 0,
          processed_at: ""
        }
      ],
      processed: [],
      skipped: [],
      failed: ["b"]
    });

    expect(ids).toEqual(["a", "c"]);
  });
});
