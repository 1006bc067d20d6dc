import type { UploadSource } from "../clients/youtubeClient";
import type { StateRepository } from "../db/stateRepository";
import type { UploadRecord } from "../db/types";

export enum DiscoveryMode {
  LIST = "list",
  INIT = "init",
  CHECK = "check",
  ALL = "all"
}

export interface Partition {
  fresh: UploadRecord[];
  seen: UploadRecord[];
}

/**
 * Splits uploads into ones never reported before and ones already in the seen set.
 * Both halves keep the source order.
 */
export function partitionUploads(
  uploads: UploadRecord[],
  seenIds: Iterable<string>
): Partition {
  const seenSet = new Set(seenIds);
  const fresh: UploadRecord[] = [];
  const seen: UploadRecord[] = [];

  for (const upload of uploads) {
    (seenSet.has(upload.id) ? seen : fresh).push(upload);
  }
  return { fresh, seen };
}

export interface ReportOptions {
  /**
   * Whether reported ids are written to the seen set. False when output is piped
   * to the processing stage, which acknowledges ids itself once they are in the catalog.
   */
  commit: boolean;
}

export class DiscoveryService {
  constructor(
    private source: UploadSource,
    private stateRepo: StateRepository,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Lists the most recent uploads without reading or writing state.
   * @param count Number of uploads to return
   */
  async listRecent(count: number): Promise<UploadRecord[]> {
    return this.source.fetchRecentUploads(count);
  }

  /**
   * Marks every currently visible upload as seen so that only later uploads
   * are reported. Nothing is handed to processing.
   * @param options Commit policy; without commit this only previews the baseline
   * @returns The uploads that were (or would be) marked
   */
  async initialize(options: ReportOptions): Promise<UploadRecord[]> {
    const uploads = await this.source.fetchRecentUploads();

    if (options.commit) await this.commit(uploads);
    return uploads;
  }

  /**
   * Reports uploads not yet in the seen set, in source order.
   * @param options Commit policy for the reported ids
   */
  async checkForNew(options: ReportOptions): Promise<UploadRecord[]> {
    const [uploads, state] = await Promise.all([
      this.source.fetchRecentUploads(),
      this.stateRepo.load()
    ]);
    const { fresh } = partitionUploads(uploads, state.seen_ids);

    if (options.commit) await this.commit(fresh);
    return fresh;
  }

  /**
   * Reports every visible upload regardless of seen state (backfill).
   * @param options Commit policy for the reported ids
   */
  async backfill(options: ReportOptions): Promise<UploadRecord[]> {
    const uploads = await this.source.fetchRecentUploads();

    if (options.commit) await this.commit(uploads);
    return uploads;
  }

  private async commit(reported: UploadRecord[]): Promise<void> {
    await this.stateRepo.commitCheck(
      reported.map((u) => u.id),
      this.clock()
    );
  }
}
