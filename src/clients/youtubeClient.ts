/**
 * YouTube Data API v3 client
 *
 * Reads the channel's uploads playlist with playlistItems.list, which costs
 * 1 quota unit per page (search.list costs 100).
 */

import { z } from "zod";
import type { UploadRecord } from "../db/types";
import { fetchWithRetry } from "../utils/http";

const YOUTUBE_API_BASE = "https://www.googleapis.com/youtube/v3/";

/** playlistItems.list hard cap per call */
export const YOUTUBE_MAX_PAGE_SIZE = 50;

/** Descriptions are display-only and get cut to this many characters */
export const DESCRIPTION_PREVIEW_LENGTH = 200;

const playlistItemsResponseSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z
    .array(
      z.object({
        snippet: z.object({
          title: z.string(),
          description: z.string().optional(),
          publishedAt: z.string(),
          resourceId: z.object({ videoId: z.string() })
        })
      })
    )
    .default([])
});

export type PlaylistItemsResponse = z.infer<typeof playlistItemsResponseSchema>;

/**
 * Anything that can list the most recent uploads, newest first.
 */
export interface UploadSource {
  fetchRecentUploads(maxResults?: number): Promise<UploadRecord[]>;
}

/**
 * Derive the uploads playlist id from a channel id (UC... -> UU...).
 * Saves a channels.list round trip per run.
 */
export function uploadsPlaylistIdFor(channelId: string): string {
  if (!channelId.startsWith("UC")) {
    throw new Error(`Not a channel id: ${channelId}`);
  }
  return `UU${channelId.slice(2)}`;
}

export function toUploadRecord(
  item: PlaylistItemsResponse["items"][number]
): UploadRecord {
  const { snippet } = item;
  return {
    id: snippet.resourceId.videoId,
    title: snippet.title,
    published_at: snippet.publishedAt,
    description: (snippet.description ?? "").slice(0, DESCRIPTION_PREVIEW_LENGTH)
  };
}

export class YouTubeClient implements UploadSource {
  constructor(
    private apiKey: string,
    private channelId: string
  ) {}

  /**
   * Fetches a single page of the uploads playlist.
   * @param playlistId The uploads playlist id
   * @param pageSize Items to request, clamped to the API cap
   * @param pageToken Continuation token from the previous page
   */
  async fetchPlaylistPage(
    playlistId: string,
    pageSize: number,
    pageToken?: string
  ): Promise<PlaylistItemsResponse> {
    const url = new URL("playlistItems", YOUTUBE_API_BASE);
    url.searchParams.set("part", "snippet");
    url.searchParams.set("playlistId", playlistId);
    url.searchParams.set(
      "maxResults",
      String(Math.min(Math.max(pageSize, 1), YOUTUBE_MAX_PAGE_SIZE))
    );
    url.searchParams.set("key", this.apiKey);
    if (pageToken) url.searchParams.set("pageToken", pageToken);

    const res = await fetchWithRetry(url.toString(), undefined, {
      maxAttempts: 4,
      baseDelayMs: 500,
      maxDelayMs: 8000
    });

    return playlistItemsResponseSchema.parse(await res.json());
  }

  /**
   * Fetches the most recent uploads of the configured channel, in playlist order.
   * Follows page tokens until maxResults items are collected or the playlist ends.
   * @param maxResults How many uploads to return (default one full page)
   */
  async fetchRecentUploads(
    maxResults: number = YOUTUBE_MAX_PAGE_SIZE
  ): Promise<UploadRecord[]> {
    if (maxResults <= 0) return [];

    const playlistId = uploadsPlaylistIdFor(this.channelId);
    const uploads: UploadRecord[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.fetchPlaylistPage(
        playlistId,
        maxResults - uploads.length,
        pageToken
      );
      uploads.push(...page.items.map(toUploadRecord));
      pageToken = page.nextPageToken;
    } while (pageToken && uploads.length < maxResults);

    return uploads.slice(0, maxResults);
  }
}
