import { mkdir, writeFile } from "fs/promises";
import path from "path";
import type { PodcastMetadata } from "../config/env";
import { watchUrl } from "../config/yt-dlp";
import type { Episode } from "../db/types";
import { parseCaseInfo } from "../utils/caseInfo";

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function escapeCdata(s: string): string {
  return s.replace(/\]\]>/g, "]]]]><![CDATA[>");
}

function cdata(s: string): string {
  return `<![CDATA[${escapeCdata(s)}]]>`;
}

/** RFC-822 date for pubDate; unparseable input falls back to the raw string */
export function toRfc822(iso: string): string {
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? iso : date.toUTCString();
}

/**
 * Newest first by published_at. Array.prototype.sort is stable, so episodes
 * sharing a timestamp keep their catalog order.
 */
export function sortEpisodesForFeed(episodes: Episode[]): Episode[] {
  return [...episodes].sort((a, b) => {
    if (a.published_at === b.published_at) return 0;
    return a.published_at > b.published_at ? -1 : 1;
  });
}

function renderItem(ep: Episode): string {
  const { docket } = parseCaseInfo(ep.title);

  let out = `    <item>
      <title>${cdata(ep.title)}</title>
      <description>${cdata(ep.description)}</description>
      <link>${escapeXml(watchUrl(ep.video_id))}</link>
      <guid isPermaLink="false">${escapeXml(ep.video_id)}</guid>
      <pubDate>${escapeXml(toRfc822(ep.published_at))}</pubDate>
`;
  if (ep.audio_url) {
    out += `      <enclosure url="${escapeXml(ep.audio_url)}" length="${ep.file_size}" type="audio/mpeg"/>\n`;
  }
  if (docket) {
    out += `      <itunes:subtitle>${escapeXml(`Docket: ${docket}`)}</itunes:subtitle>\n`;
  }
  out += `    </item>\n`;
  return out;
}

/**
 * Builds the full podcast RSS document from the episode catalog.
 * The output depends only on its inputs (no build timestamp), so an unchanged
 * catalog yields a byte-identical feed.
 * @param episodes - The complete catalog, in insertion order
 * @param podcast - Channel metadata
 * @returns RSS 2.0 XML with the iTunes namespace
 */
export function generateFeedXml(
  episodes: Episode[],
  podcast: PodcastMetadata
): string {
  const website = escapeXml(podcast.website);

  let out = `<?xml version="1.0" encoding="UTF-8"?>
<rss xmlns:itunes="http://www.itunes.com/dtds/podcast-1.0.dtd" version="2.0">
  <channel>
    <title>${cdata(podcast.title)}</title>
    <link>${website}</link>
    <description>${cdata(podcast.description)}</description>
    <language>${escapeXml(podcast.language)}</language>
    <itunes:author>${cdata(podcast.author)}</itunes:author>
    <itunes:owner>
      <itunes:name>${cdata(podcast.author)}</itunes:name>
      <itunes:email>${escapeXml(podcast.email)}</itunes:email>
    </itunes:owner>
    <itunes:category text="${escapeXml(podcast.category)}"/>
    <itunes:explicit>false</itunes:explicit>
`;
  if (podcast.imageUrl) {
    const image = escapeXml(podcast.imageUrl);
    out += `    <itunes:image href="${image}"/>
    <image>
      <url>${image}</url>
      <title>${cdata(podcast.title)}</title>
      <link>${website}</link>
    </image>
`;
  }

  for (const ep of sortEpisodesForFeed(episodes)) {
    out += renderItem(ep);
  }

  out += `  </channel>
</rss>
`;
  return out;
}

export interface FeedPublisher {
  publish(episodes: Episode[]): Promise<void>;
}

export class FileFeedPublisher implements FeedPublisher {
  constructor(
    private feedFile: string,
    private podcast: PodcastMetadata
  ) {}

  async publish(episodes: Episode[]): Promise<void> {
    await mkdir(path.dirname(path.resolve(this.feedFile)), { recursive: true });
    await writeFile(
      this.feedFile,
      generateFeedXml(episodes, this.podcast),
      "utf8"
    );
  }
}
