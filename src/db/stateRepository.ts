import { readJsonFile, writeJsonFile } from "./jsonFile";
import { type MonitorState, monitorStateSchema } from "./types";

export function emptyState(): MonitorState {
  return { seen_ids: [], last_check: null };
}

/**
 * Returns the seen ids extended with the given ids, keeping first-seen order and
 * dropping duplicates. The seen set only ever grows.
 */
export function mergeSeenIds(seenIds: string[], ids: string[]): string[] {
  return [...new Set([...seenIds, ...ids])];
}

export class StateRepository {
  constructor(private filePath: string) {}

  /**
   * Loads the monitor state, or an empty state when the file does not exist yet.
   * @throws Error if the file exists but is not valid state JSON
   */
  async load(): Promise<MonitorState> {
    return readJsonFile(this.filePath, monitorStateSchema, emptyState);
  }

  async save(state: MonitorState): Promise<void> {
    await writeJsonFile(this.filePath, {
      seen_ids: mergeSeenIds([], state.seen_ids),
      last_check: state.last_check
    });
  }

  /**
   * Records a discovery check: adds the reported ids to the seen set and stamps last_check.
   * @param ids The ids that were reported by this check
   * @param checkedAt Time of the check
   * @returns The state as persisted
   */
  async commitCheck(ids: string[], checkedAt: Date): Promise<MonitorState> {
    const state = await this.load();
    const next: MonitorState = {
      seen_ids: mergeSeenIds(state.seen_ids, ids),
      last_check: checkedAt.toISOString()
    };
    await this.save(next);
    return next;
  }

  /**
   * Acknowledges ids consumed downstream. Unlike commitCheck this leaves last_check alone,
   * and it skips the write entirely when every id is already seen.
   * @param ids The ids to mark as seen
   * @returns The number of ids that were not yet in the seen set
   */
  async acknowledge(ids: string[]): Promise<number> {
    const state = await this.load();
    const merged = mergeSeenIds(state.seen_ids, ids);
    const added = merged.length - state.seen_ids.length;

    if (added > 0) {
      await this.save({ seen_ids: merged, last_check: state.last_check });
    }
    return added;
  }
}
