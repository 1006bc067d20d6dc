import { describe, expect, it } from "vitest";
import { loadPodcastMetadata } from "../config/env";
import { buildId3Tags, NoopTagger } from "./taggingService";

const podcast = loadPodcastMetadata({});

describe("buildId3Tags", () => {
  it("maps a docketed video onto ID3 fields", () => {
    expect(
      buildId3Tags(
        {
          id: "abc",
          title: "Commonwealth v. X, SJC-13444",
          published_at: "2023-11-02T15:00:00Z",
          description: ""
        },
        podcast
      )
    ).toEqual({
      title: "Commonwealth v. X, SJC-13444",
      artist: "Massachusetts Supreme Judicial Court",
      album: "SJC Oral Arguments",
      genre: "Podcast",
      date: "2023",
      comment: "SJC-13444"
    });
  });

  it("omits the comment and year when there is nothing to put there", () => {
    expect(
      buildId3Tags(
        { id: "abc", title: "Bar Admission Ceremony", published_at: "", description: "" },
        podcast
      )
    ).toEqual({
      title: "Bar Admission Ceremony",
      artist: "Massachusetts Supreme Judicial Court",
      album: "SJC Oral Arguments",
      genre: "Podcast"
    });
  });
});

describe("NoopTagger", () => {
  it("is disabled and does nothing", async () => {
    const tagger = new NoopTagger();

    expect(tagger.enabled).toBe(false);
    await expect(tagger.tag()).resolves.toBeUndefined();
  });
});
