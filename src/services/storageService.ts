import type { S3Client } from "@aws-sdk/client-s3";
import {
  buildEpisodeObjectKey,
  buildPublicUrl,
  objectExists,
  uploadFile
} from "../clients/s3Client";
import type { StorageConfig } from "../config/env";
import type { RunLogger } from "./jobReporter";

export interface AudioStorage {
  readonly enabled: boolean;
  /**
   * Sends a local audio file to durable storage.
   * @returns The public URL, or null when the file was not stored
   */
  upload(filePath: string, videoId: string): Promise<string | null>;
}

export class B2AudioStorage implements AudioStorage {
  readonly enabled = true;

  constructor(
    private client: S3Client,
    private config: StorageConfig,
    private logger: RunLogger
  ) {}

  async upload(filePath: string, videoId: string): Promise<string | null> {
    const key = buildEpisodeObjectKey(videoId);
    const url = buildPublicUrl(this.config.publicBaseUrl, key);

    try {
      // Idempotency Check
      if (await objectExists(this.client, this.config.bucket, key)) {
        this.logger.info(`[${videoId}] Skip upload: already stored at ${key}`);
        return url;
      }

      this.logger.info(`[${videoId}] Uploading to B2: ${key}`);
      const bytes = await uploadFile({
        client: this.client,
        bucket: this.config.bucket,
        key,
        filePath,
        contentType: "audio/mpeg"
      });
      this.logger.info(`[${videoId}] Uploaded ${bytes} bytes`);
      return url;
    } catch (err: unknown) {
      this.logger.warn(
        `[${videoId}] Upload failed, keeping local file: ${
          err instanceof Error ? err.message : String(err)
        }`
      );
      return null;
    }
  }
}

/** Used when B2 credentials are missing or the bucket is unreachable. */
export class NoopStorage implements AudioStorage {
  readonly enabled = false;

  async upload(): Promise<string | null> {
    return null;
  }
}
