import {
  GetObjectCommand,
  PutObjectCommand,
  S3Client,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";
import { describeError, StorageError } from "../extraction/errors.js";
import { logger } from "../extraction/logger.js";
import type { BlobStore } from "../extraction/types.js";
import { formatS3Url } from "./s3-path.js";

export interface S3BlobStoreOptions {
  region: string;
  /** S3-compatible endpoint (MinIO and friends); enables path-style addressing. */
  endpoint?: string;
}

export function createS3Client(options: S3BlobStoreOptions): S3Client {
  const config: S3ClientConfig = { region: options.region };
  if (options.endpoint) {
    config.endpoint = options.endpoint;
    config.forcePathStyle = true;
  }
  return new S3Client(config);
}

export class S3BlobStore implements BlobStore {
  constructor(private readonly client: S3Client) {}

  async get(bucket: string, key: string): Promise<Uint8Array> {
    logger.info("Downloading object", { bucket, key });
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!response.Body) {
        throw new StorageError("No body in S3 response", { bucket, key });
      }
      const data = await response.Body.transformToByteArray();
      logger.info("Downloaded object", { bucket, key, bytes: data.byteLength });
      return data;
    } catch (err) {
      if (err instanceof StorageError) throw err;
      throw new StorageError(`Error downloading s3://${bucket}/${key}: ${describeError(err)}`, { bucket, key }, { cause: err });
    }
  }

  async put(bucket: string, key: string, bytes: Uint8Array, contentType: string): Promise<string> {
    try {
      await this.client.send(
        new PutObjectCommand({ Bucket: bucket, Key: key, Body: bytes, ContentType: contentType }),
      );
    } catch (err) {
      throw new StorageError(`Error uploading s3://${bucket}/${key}: ${describeError(err)}`, { bucket, key }, { cause: err });
    }
    logger.info("Uploaded object", { bucket, key, bytes: bytes.byteLength });
    return formatS3Url({ bucket, key });
  }
}
