import type { S3Event } from "aws-lambda";
import {
  createAwsPipeline,
  processUpload,
  type Pipeline,
} from "../services/SummaryPipelineService.js";
import { logger } from "../utils/logger.js";

let pipeline: Promise<Pipeline> | undefined;

/**
 * Build the pipeline on first use and keep it for the container's lifetime.
 * A failed build is forgotten so the next invocation tries again.
 */
function getPipeline(): Promise<Pipeline> {
  if (!pipeline) {
    pipeline = createAwsPipeline().catch((error: unknown) => {
      logger.warn("Failed to build summarization pipeline", error);
      pipeline = undefined;
      throw error;
    });
  }
  return pipeline;
}

/**
 * Document Summarizer Lambda - Triggered by S3 object-created notifications
 * Extracts text with Textract, summarizes it with OpenAI and writes {key}-summary.txt
 */
export async function handler(event: S3Event) {
  logger.log("Processing upload event", { records: event.Records?.length ?? 0 });

  const result = await processUpload(event, getPipeline);
  logger.log("Upload processed", result);
  return result;
}
