import { existsSync } from "fs";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCommand } from "../utils/commands";
import { getMetadataArgs, writeId3Tags } from "./ffmpegClient";

vi.mock("../utils/commands", () => ({
  runCommand: vi.fn()
}));

describe("getMetadataArgs", () => {
  it("copies the audio stream and writes each tag", () => {
    expect(
      getMetadataArgs("in.mp3", "out.mp3", { title: "T", comment: "SJC-1" })
    ).toEqual([
      "-hide_banner",
      "-loglevel",
      "error",
      "-y",
      "-i",
      "in.mp3",
      "-map",
      "0:a",
      "-c",
      "copy",
      "-id3v2_version",
      "3",
      "-metadata",
      "title=T",
      "-metadata",
      "comment=SJC-1",
      "out.mp3"
    ]);
  });
});

describe("writeId3Tags", () => {
  let dir: string;
  let filePath: string;
  let tempPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "ffmpeg-"));
    filePath = path.join(dir, "abc.mp3");
    tempPath = `${filePath}.tagging.mp3`;
    await writeFile(filePath, "original");
  });

  afterEach(async () => {
    vi.mocked(runCommand).mockReset();
    await rm(dir, { recursive: true, force: true });
  });

  it("replaces the original with the tagged copy", async () => {
    vi.mocked(runCommand).mockImplementation(async (_cmd, args) => {
      await writeFile(args[args.length - 1], "tagged");
      return { code: 0, stderr: "" };
    });

    await writeId3Tags("ffmpeg", filePath, { title: "T" });

    expect(runCommand).toHaveBeenCalledWith(
      "ffmpeg",
      getMetadataArgs(filePath, tempPath, { title: "T" })
    );
    expect(await readFile(filePath, "utf8")).toBe("tagged");
    expect(existsSync(tempPath)).toBe(false);
  });

  it("removes the partial output and keeps the original when ffmpeg fails", async () => {
    vi.mocked(runCommand).mockImplementation(async (_cmd, args) => {
      await writeFile(args[args.length - 1], "partial");
      return { code: 1, stderr: "Invalid data found when processing input\n" };
    });

    await expect(writeId3Tags("ffmpeg", filePath, { title: "T" })).rejects.toThrow(
      "ffmpeg failed (code 1): Invalid data found when processing input"
    );
    expect(await readFile(filePath, "utf8")).toBe("original");
    expect(existsSync(tempPath)).toBe(false);
  });
});
