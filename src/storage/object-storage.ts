/**
 * Object storage primitives for re-hosted submission images
 */

import {
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  paginateListObjectsV2,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";

import { StorageAccessError } from "../errors.js";
import { errorMessage, storageLogger } from "../logger.js";

import type { StorageConfig } from "../config.js";

export interface ObjectStorage {
  /** Bucket the signed URLs point into, used to recover object paths */
  readonly bucket: string;
  put(body: Uint8Array, path: string, contentType?: string): Promise<void>;
  /** Sign a GET URL for an existing object; never touches its bytes */
  sign(path: string, ttlSeconds: number): Promise<string>;
  list(prefix: string): Promise<string[]>;
  /** Returns the number of objects actually deleted */
  delete(paths: string[]): Promise<number>;
}

// S3 caps DeleteObjects at 1000 keys per request
const DELETE_BATCH_SIZE = 1000;

export class S3ObjectStorage implements ObjectStorage {
  readonly bucket: string;
  private readonly client: S3Client;

  constructor(config: StorageConfig, client?: S3Client) {
    this.bucket = config.bucket;
    this.client =
      client ??
      new S3Client({
        region: config.region,
        credentials: {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        },
        ...(config.endpoint !== null
          ? { endpoint: config.endpoint, forcePathStyle: true }
          : {}),
      });
  }

  async put(
    body: Uint8Array,
    path: string,
    contentType = "application/octet-stream"
  ): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: path,
          Body: body,
          ContentType: contentType,
        })
      );
      storageLogger.debug({ path, bytes: body.byteLength }, "Uploaded object");
    } catch (error) {
      throw new StorageAccessError(
        `Upload failed for ${path}: ${errorMessage(error)}`,
        path,
        error
      );
    }
  }

  async sign(path: string, ttlSeconds: number): Promise<string> {
    if (path === "") {
      throw new StorageAccessError("Cannot sign an empty object path", path);
    }

    try {
      // Presigning is local; check the object is reachable first
      await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: path })
      );
      return await getSignedUrl(
        this.client,
        new GetObjectCommand({ Bucket: this.bucket, Key: path }),
        { expiresIn: ttlSeconds }
      );
    } catch (error) {
      throw new StorageAccessError(
        `Signing failed for ${path}: ${errorMessage(error)}`,
        path,
        error
      );
    }
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];

    try {
      const pages = paginateListObjectsV2(
        { client: this.client },
        { Bucket: this.bucket, Prefix: prefix }
      );
      for await (const page of pages) {
        for (const object of page.Contents ?? []) {
          if (object.Key !== undefined) keys.push(object.Key);
        }
      }
    } catch (error) {
      throw new StorageAccessError(
        `Listing failed for prefix ${prefix}: ${errorMessage(error)}`,
        prefix,
        error
      );
    }

    return keys;
  }

  async delete(paths: string[]): Promise<number> {
    let deleted = 0;

    for (let start = 0; start < paths.length; start += DELETE_BATCH_SIZE) {
      const batch = paths.slice(start, start + DELETE_BATCH_SIZE);
      try {
        const result = await this.client.send(
          new DeleteObjectsCommand({
            Bucket: this.bucket,
            Delete: {
              Objects: batch.map((key) => ({ Key: key })),
              Quiet: true,
            },
          })
        );
        const failures = result.Errors ?? [];
        for (const failure of failures) {
          storageLogger.warn(
            { path: failure.Key, code: failure.Code, message: failure.Message },
            "Object could not be deleted"
          );
        }
        deleted += batch.length - failures.length;
      } catch (error) {
        throw new StorageAccessError(
          `Delete failed: ${errorMessage(error)}`,
          batch[0] ?? null,
          error
        );
      }
    }

    return deleted;
  }

  /** Release the client's sockets */
  destroy(): void {
    this.client.destroy();
  }
}

/**
 * Delete every object under a prefix, returning how many were removed
 */
export async function purgePrefix(
  storage: ObjectStorage,
  prefix: string
): Promise<number> {
  const paths = await storage.list(prefix);
  if (paths.length === 0) {
    storageLogger.info({ prefix }, "No objects to delete");
    return 0;
  }

  const deleted = await storage.delete(paths);
  storageLogger.info({ prefix, found: paths.length, deleted }, "Purged prefix");
  return deleted;
}
