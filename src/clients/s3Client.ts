import {
  S3Client,
  HeadObjectCommand,
  HeadBucketCommand,
  S3ServiceException
} from "@aws-sdk/client-s3";
import { NodeHttpHandler } from "@smithy/node-http-handler";
import { Upload } from "@aws-sdk/lib-storage";
import { createReadStream } from "fs";
import type { StorageConfig } from "../config/env";

const PART_SIZE = 1024 * 1024 * 8;

/**
 * Creates an S3 client pointed at the Backblaze B2 S3-compatible endpoint.
 * @param config - B2 credentials, region and endpoint
 */
export function createStorageClient(config: StorageConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    credentials: {
      accessKeyId: config.keyId,
      secretAccessKey: config.applicationKey
    },
    maxAttempts: 5, // Retry transient network errors
    requestHandler: new NodeHttpHandler({
      connectionTimeout: 5_000, // 5 seconds to establish connection
      socketTimeout: 120_000 // 2 minutes of inactivity allowed before timing out
    })
  });
}

/**
 * Builds the remote key for an episode's audio file.
 * @example
 * buildEpisodeObjectKey("dQw4w9WgXcQ") // returns "episodes/dQw4w9WgXcQ.mp3"
 */
export function buildEpisodeObjectKey(videoId: string): string {
  return `episodes/${videoId}.mp3`;
}

export function buildPublicUrl(publicBaseUrl: string, key: string): string {
  return `${publicBaseUrl.replace(/\/+$/, "")}/${key}`;
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof S3ServiceException &&
    (err.$metadata?.httpStatusCode === 404 || err.name === "NotFound")
  );
}

/**
 * Checks for the existence of an object using a metadata-only request.
 * @param client - The storage client
 * @param bucket - Bucket to look in
 * @param key - The object key to check
 * @returns true if the object exists, false if it is missing (404)
 * @throws Error if a non-404 network or permission error occurs
 */
export async function objectExists(
  client: S3Client,
  bucket: string,
  key: string
): Promise<boolean> {
  try {
    await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
    return true;
  } catch (err: unknown) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

/**
 * Verifies the bucket is reachable with the configured credentials.
 * @throws Error describing why the bucket could not be reached
 */
export async function assertBucketReachable(
  client: S3Client,
  bucket: string
): Promise<void> {
  await client.send(new HeadBucketCommand({ Bucket: bucket }));
}

/**
 * Streams a local file into the bucket with a multipart upload.
 * @param input - Client, destination and the local file to send
 * @returns Number of bytes reported by the uploader
 * @throws Error wrapping the uploader failure; the partial upload is aborted
 */
export async function uploadFile(input: {
  client: S3Client;
  bucket: string;
  key: string;
  filePath: string;
  contentType: string;
}): Promise<number> {
  const { client, bucket, key, filePath, contentType } = input;

  const upload = new Upload({
    client,
    params: {
      Bucket: bucket,
      Key: key,
      Body: createReadStream(filePath),
      ContentType: contentType
    },
    partSize: PART_SIZE,
    queueSize: 2,
    leavePartsOnError: false
  });

  let totalBytes = 0;
  upload.on("httpUploadProgress", (p) => {
    totalBytes = p.loaded ?? totalBytes;
  });

  try {
    await upload.done();
    return totalBytes;
  } catch (err: unknown) {
    const errorMessage =
      err instanceof Error ? err.message : JSON.stringify(err);
    throw new Error(`[Upload Failed] ${key}: ${errorMessage}`, { cause: err });
  }
}
