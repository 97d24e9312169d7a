import {
  TextractClient,
  DetectDocumentTextCommand,
  StartDocumentTextDetectionCommand,
  GetDocumentTextDetectionCommand,
  type Block,
  type JobStatus,
} from "@aws-sdk/client-textract";
import type { DocumentReference } from "../types/DocumentReference.js";
import type { OcrBlock, OcrJobStatus, OcrService } from "../types/Capabilities.js";

function toBlocks(blocks: Block[] | undefined): OcrBlock[] {
  return (blocks ?? []).map((block) => ({
    blockType: block.BlockType ?? "UNKNOWN",
    text: block.Text,
  }));
}

/**
 * PARTIAL_SUCCESS means some pages were not processed, which would leave gaps in the text
 */
function toJobStatus(status: JobStatus | undefined): OcrJobStatus {
  switch (status) {
    case "IN_PROGRESS":
      return "IN_PROGRESS";
    case "SUCCEEDED":
      return "SUCCEEDED";
    default:
      return "FAILED";
  }
}

function toS3Object(document: DocumentReference) {
  return { S3Object: { Bucket: document.bucket, Name: document.key } };
}

/**
 * OcrService backed by Amazon Textract text detection
 */
export function createTextractOcr(client: TextractClient): OcrService {
  return {
    async detectText(document) {
      const result = await client.send(new DetectDocumentTextCommand({ Document: toS3Object(document) }));
      return toBlocks(result.Blocks);
    },

    async startTextDetection(document) {
      const result = await client.send(
        new StartDocumentTextDetectionCommand({ DocumentLocation: toS3Object(document) })
      );
      if (!result.JobId) {
        throw new Error(`Textract returned no job id for s3://${document.bucket}/${document.key}`);
      }
      return result.JobId;
    },

    async getTextDetection(jobId, nextToken) {
      const result = await client.send(
        new GetDocumentTextDetectionCommand({ JobId: jobId, NextToken: nextToken })
      );
      return {
        status: toJobStatus(result.JobStatus),
        blocks: toBlocks(result.Blocks),
        nextToken: result.NextToken,
        statusMessage: result.StatusMessage,
      };
    },
  };
}
