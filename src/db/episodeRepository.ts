import { readJsonFile, writeJsonFile } from "./jsonFile";
import { type Episode, episodeCatalogSchema } from "./types";

export class EpisodeRepository {
  constructor(private filePath: string) {}

  /**
   * Loads the full episode catalog in insertion order.
   * A missing catalog file is treated as an empty catalog.
   */
  async findAll(): Promise<Episode[]> {
    return readJsonFile(this.filePath, episodeCatalogSchema, () => []);
  }

  /**
   * Overwrites the catalog file with the given episodes.
   */
  async saveAll(episodes: Episode[]): Promise<void> {
    await writeJsonFile(this.filePath, episodes);
  }
}
