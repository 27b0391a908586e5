import {
  S3Client,
  S3ServiceException,
  CreateMultipartUploadCommand,
  UploadPartCommand,
  CompleteMultipartUploadCommand,
  AbortMultipartUploadCommand,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  DeleteObjectsCommand,
} from "@aws-sdk/client-s3";
import type { IBlobStorage } from "../../domain/interfaces/iblob.storage";

// Multipart upload threshold: use multipart for blobs larger than 5MB
const MULTIPART_UPLOAD_THRESHOLD = 5 * 1024 * 1024;
const MULTIPART_PART_SIZE = 5 * 1024 * 1024;

export interface S3BlobStorageConfig {
  bucket: string;
  region?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  endpoint?: string; // For S3-compatible services like MinIO
  forcePathStyle?: boolean;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof S3ServiceException &&
    (error.name === "NotFound" || error.name === "NoSuchKey" || error.$metadata.httpStatusCode === 404)
  );
}

/**
 * Blob storage on an S3 bucket.
 */
export class S3BlobStorage implements IBlobStorage {
  private s3Client: S3Client;
  private bucket: string;

  constructor(config: S3BlobStorageConfig) {
    const region = config.region || "us-east-1";
    console.log(`[S3BlobStorage] Initializing bucket ${config.bucket} in region ${region}`);

    this.bucket = config.bucket;
    this.s3Client = new S3Client({
      region,
      credentials: config.credentials,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle || false,
    });
  }

  async put(key: string, data: Buffer, contentType: string): Promise<void> {
    if (data.length > MULTIPART_UPLOAD_THRESHOLD) {
      await this.multipartUpload(key, data, contentType);
      return;
    }

    await this.s3Client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: data,
        ContentType: contentType,
      })
    );
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      const response = await this.s3Client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) {
        return null;
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.s3Client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    // S3 answers a delete of a missing key with success
    await this.s3Client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }

  async deletePrefix(prefix: string): Promise<number> {
    let deleted = 0;
    let continuationToken: string | undefined;

    do {
      const listing = await this.s3Client.send(
        new ListObjectsV2Command({ Bucket: this.bucket, Prefix: prefix, ContinuationToken: continuationToken })
      );
      const keys = (listing.Contents ?? []).flatMap((object) => (object.Key ? [{ Key: object.Key }] : []));

      if (keys.length > 0) {
        await this.s3Client.send(
          new DeleteObjectsCommand({ Bucket: this.bucket, Delete: { Objects: keys, Quiet: true } })
        );
        deleted += keys.length;
      }

      continuationToken = listing.IsTruncated ? listing.NextContinuationToken : undefined;
    } while (continuationToken);

    return deleted;
  }

  private async multipartUpload(key: string, buffer: Buffer, contentType: string): Promise<void> {
    let uploadId: string | undefined;

    try {
      const createResponse = await this.s3Client.send(
        new CreateMultipartUploadCommand({ Bucket: this.bucket, Key: key, ContentType: contentType })
      );
      uploadId = createResponse.UploadId;
      if (!uploadId) {
        throw new Error("Failed to create multipart upload");
      }

      const parts: Array<{ ETag: string; PartNumber: number }> = [];
      const totalParts = Math.ceil(buffer.length / MULTIPART_PART_SIZE);

      for (let partNumber = 1; partNumber <= totalParts; partNumber++) {
        const start = (partNumber - 1) * MULTIPART_PART_SIZE;
        const end = Math.min(start + MULTIPART_PART_SIZE, buffer.length);

        const partResponse = await this.s3Client.send(
          new UploadPartCommand({
            Bucket: this.bucket,
            Key: key,
            PartNumber: partNumber,
            UploadId: uploadId,
            Body: buffer.subarray(start, end),
          })
        );
        if (!partResponse.ETag) {
          throw new Error(`Failed to upload part ${partNumber}`);
        }
        parts.push({ ETag: partResponse.ETag, PartNumber: partNumber });
      }

      await this.s3Client.send(
        new CompleteMultipartUploadCommand({
          Bucket: this.bucket,
          Key: key,
          UploadId: uploadId,
          MultipartUpload: { Parts: parts },
        })
      );
    } catch (error) {
      if (uploadId) {
        try {
          await this.s3Client.send(
            new AbortMultipartUploadCommand({ Bucket: this.bucket, Key: key, UploadId: uploadId })
          );
        } catch (abortError) {
          // The upload error below is the one callers see
          console.error("[S3BlobStorage] Failed to abort multipart upload:", abortError);
        }
      }
      throw error;
    }
  }
}
