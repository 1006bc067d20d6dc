import { describe, expect, it } from "vitest";
import {
  DEFAULT_B2_BUCKET,
  DEFAULT_CHANNEL_ID,
  loadDiscoveryConfig,
  loadPodcastMetadata,
  loadProcessingConfig,
  loadStorageConfig
} from "./env";

describe("loadDiscoveryConfig", () => {
  it("requires a YouTube API key", () => {
    expect(() => loadDiscoveryConfig({})).toThrow("YOUTUBE_API_KEY is required");
    expect(() => loadDiscoveryConfig({ YOUTUBE_API_KEY: "  " })).toThrow(
      "YOUTUBE_API_KEY is required"
    );
  });

  it("fills in the default channel and state file", () => {
    expect(loadDiscoveryConfig({ YOUTUBE_API_KEY: "test-key" })).toEqual({
      youtubeApiKey: "test-key",
      channelId: DEFAULT_CHANNEL_ID,
      stateFile: "state.json"
    });
  });

  it("honours overrides", () => {
    const config = loadDiscoveryConfig({
      YOUTUBE_API_KEY: "test-key",
      YOUTUBE_CHANNEL_ID: "UCtestchannel",
      STATE_FILE: "/tmp/monitor-state.json"
    });

    expect(config.channelId).toBe("UCtestchannel");
    expect(config.stateFile).toBe("/tmp/monitor-state.json");
  });
});

describe("loadStorageConfig", () => {
  it("returns null without both credentials", () => {
    expect(loadStorageConfig({})).toBeNull();
    expect(loadStorageConfig({ B2_APPLICATION_KEY_ID: "test-id" })).toBeNull();
    expect(loadStorageConfig({ B2_APPLICATION_KEY: "test-secret" })).toBeNull();
  });

  it("defaults bucket, endpoint and strips the trailing slash of the base URL", () => {
    const config = loadStorageConfig({
      B2_APPLICATION_KEY_ID: "test-id",
      B2_APPLICATION_KEY: "test-secret",
      PODCAST_BASE_URL: "https://cdn.test/podcast/"
    });

    expect(config).toEqual({
      keyId: "test-id",
      applicationKey: "test-secret",
      bucket: DEFAULT_B2_BUCKET,
      endpoint: "https://s3.us-west-004.backblazeb2.com",
      region: "us-west-004",
      publicBaseUrl: "https://cdn.test/podcast"
    });
  });
});

describe("loadProcessingConfig", () => {
  it("works without any optional settings", () => {
    const config = loadProcessingConfig({});

    expect(config.storage).toBeNull();
    expect(config.paths).toEqual({
      stateFile: "state.json",
      newVideosFile: "new_videos.json",
      episodesFile: "episodes.json",
      feedFile: "feed.xml",
      audioDir: "audio"
    });
    expect(config.ytDlpPath).toBe("yt-dlp");
    expect(config.ffmpegPath).toBe("ffmpeg");
  });
});

describe("loadPodcastMetadata", () => {
  it("has no artwork unless PODCAST_IMAGE is set", () => {
    expect(loadPodcastMetadata({}).imageUrl).toBeNull();
    expect(
      loadPodcastMetadata({ PODCAST_IMAGE: "https://cdn.test/cover.jpg" }).imageUrl
    ).toBe("https://cdn.test/cover.jpg");
  });

  it("uses the court's defaults", () => {
    const podcast = loadPodcastMetadata({});

    expect(podcast.title).toBe("SJC Oral Arguments");
    expect(podcast.author).toBe("Massachusetts Supreme Judicial Court");
    expect(podcast.category).toBe("Government");
  });
});
