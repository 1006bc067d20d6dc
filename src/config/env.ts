import "dotenv/config";

export const DEFAULT_CHANNEL_ID = "UCOftbmknBche29CG41v19cA";
export const DEFAULT_B2_BUCKET = "sjc-podcast";
export const DEFAULT_B2_ENDPOINT = "https://s3.us-west-004.backblazeb2.com";
export const DEFAULT_B2_REGION = "us-west-004";
export const DEFAULT_PUBLIC_BASE_URL =
  "https://f000.backblazeb2.com/file/sjc-podcast";

export interface DataPaths {
  stateFile: string;
  newVideosFile: string;
  episodesFile: string;
  feedFile: string;
  audioDir: string;
}

export interface PodcastMetadata {
  title: string;
  description: string;
  author: string;
  email: string;
  website: string;
  imageUrl: string | null;
  category: string;
  language: string;
}

export interface StorageConfig {
  keyId: string;
  applicationKey: string;
  bucket: string;
  endpoint: string;
  region: string;
  publicBaseUrl: string;
}

export interface DiscoveryConfig {
  youtubeApiKey: string;
  channelId: string;
  stateFile: string;
}

export interface ProcessingConfig {
  paths: DataPaths;
  podcast: PodcastMetadata;
  /** null when B2 credentials are absent; uploads are then skipped */
  storage: StorageConfig | null;
  ytDlpPath: string;
  ffmpegPath: string;
}

type Env = Record<string, string | undefined>;

function envOr(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

export function loadDataPaths(env: Env = process.env): DataPaths {
  return {
    stateFile: envOr(env, "STATE_FILE", "state.json"),
    newVideosFile: envOr(env, "NEW_VIDEOS_FILE", "new_videos.json"),
    episodesFile: envOr(env, "EPISODES_FILE", "episodes.json"),
    feedFile: envOr(env, "FEED_FILE", "feed.xml"),
    audioDir: envOr(env, "AUDIO_DIR", "audio")
  };
}

/**
 * Podcast channel metadata used for ID3 tags and the RSS channel block.
 * Every field has a default; PODCAST_* variables override them.
 */
export function loadPodcastMetadata(env: Env = process.env): PodcastMetadata {
  const imageUrl = env.PODCAST_IMAGE?.trim();

  return {
    title: envOr(env, "PODCAST_TITLE", "SJC Oral Arguments"),
    description: envOr(
      env,
      "PODCAST_DESCRIPTION",
      "Oral argument recordings from the Massachusetts Supreme Judicial Court"
    ),
    author: envOr(
      env,
      "PODCAST_AUTHOR",
      "Massachusetts Supreme Judicial Court"
    ),
    email: envOr(env, "PODCAST_EMAIL", "sjc@example.com"),
    website: envOr(
      env,
      "PODCAST_WEBSITE",
      "https://www.mass.gov/orgs/supreme-judicial-court"
    ),
    imageUrl: imageUrl ? imageUrl : null,
    category: envOr(env, "PODCAST_CATEGORY", "Government"),
    language: envOr(env, "PODCAST_LANGUAGE", "en")
  };
}

/**
 * Reads the B2 (S3-compatible) storage settings.
 * Missing credentials are not an error: the caller gets null and uploads are soft-skipped.
 * @param env - Environment map to read from (defaults to process.env)
 * @returns The storage settings, or null when either credential is absent
 */
export function loadStorageConfig(env: Env = process.env): StorageConfig | null {
  const keyId = env.B2_APPLICATION_KEY_ID?.trim();
  const applicationKey = env.B2_APPLICATION_KEY?.trim();

  if (!keyId || !applicationKey) return null;

  return {
    keyId,
    applicationKey,
    bucket: envOr(env, "B2_BUCKET", DEFAULT_B2_BUCKET),
    endpoint: envOr(env, "B2_ENDPOINT", DEFAULT_B2_ENDPOINT),
    region: envOr(env, "B2_REGION", DEFAULT_B2_REGION),
    publicBaseUrl: envOr(env, "PODCAST_BASE_URL", DEFAULT_PUBLIC_BASE_URL).replace(
      /\/+$/,
      ""
    )
  };
}

/**
 * Validates and loads the settings the discovery stage needs.
 * The YouTube API key is the only hard requirement of the whole pipeline.
 * @returns A validated DiscoveryConfig
 * @throws Error if YOUTUBE_API_KEY is missing, with instructions for obtaining one
 */
export function loadDiscoveryConfig(env: Env = process.env): DiscoveryConfig {
  const youtubeApiKey = env.YOUTUBE_API_KEY?.trim();

  if (!youtubeApiKey) {
    throw new Error(
      [
        "YOUTUBE_API_KEY is required",
        "",
        "To get an API key:",
        "1. Go to https://console.cloud.google.com/",
        "2. Create a project (or select existing)",
        "3. Enable 'YouTube Data API v3'",
        "4. Create credentials -> API Key",
        "5. export YOUTUBE_API_KEY='your-key-here'"
      ].join("\n")
    );
  }

  return {
    youtubeApiKey,
    channelId: envOr(env, "YOUTUBE_CHANNEL_ID", DEFAULT_CHANNEL_ID),
    stateFile: loadDataPaths(env).stateFile
  };
}

export function loadProcessingConfig(env: Env = process.env): ProcessingConfig {
  return {
    paths: loadDataPaths(env),
    podcast: loadPodcastMetadata(env),
    storage: loadStorageConfig(env),
    ytDlpPath: envOr(env, "YT_DLP_PATH", "yt-dlp"),
    ffmpegPath: envOr(env, "FFMPEG_PATH", "ffmpeg")
  };
}
