import { S3Client, PutObjectCommand } from "@aws-sdk/client-s3";
import type { DocumentReference } from "../types/DocumentReference.js";
import type { ObjectStorage } from "../types/Capabilities.js";
import { logger } from "../utils/logger.js";

export interface S3StorageOptions {
  /** Log the content instead of uploading it */
  localStorage?: boolean;
}

/**
 * ObjectStorage backed by S3
 */
export function createS3Storage(
  s3Client: S3Client,
  { localStorage = process.env.LOCAL_STORAGE === "true" }: S3StorageOptions = {}
): ObjectStorage {
  async function putText(target: DocumentReference, body: string): Promise<void> {
    if (localStorage) {
      const fileName = target.key.slice(target.key.lastIndexOf("/") + 1);
      logger.logContent(
        "Local storage mode - skipping upload",
        { bucket: target.bucket, key: target.key },
        { content: body, prefix: fileName.replace(/\.txt$/, ""), suffix: "upload" }
      );
      return;
    }

    logger.log("Uploading file to S3", { bucket: target.bucket, key: target.key, bytes: body.length });

    await s3Client.send(
      new PutObjectCommand({
        Bucket: target.bucket,
        Key: target.key,
        Body: body,
        ContentType: "text/plain; charset=utf-8",
      })
    );

    logger.log("File uploaded to S3", { bucket: target.bucket, key: target.key });
  }

  return { putText };
}
