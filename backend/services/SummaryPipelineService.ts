import { setTimeout as sleep } from "timers/promises";
import { S3Client } from "@aws-sdk/client-s3";
import { TextractClient } from "@aws-sdk/client-textract";
import type { ObjectStorage, OcrService, TextModel } from "../types/Capabilities.js";
import type { ChunkSummary } from "../types/ChunkSummary.js";
import type { DocumentReference } from "../types/DocumentReference.js";
import type { HandlerResult } from "../types/HandlerResult.js";
import { uploadEventSchema } from "../types/UploadEvent.js";
import { config, type PipelineSettings } from "../utils/config.js";
import { classifyDocument, isSummaryArtifact, toSummaryKey } from "../utils/documentFormat.js";
import { MalformedTriggerError, SummarizerError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { ChunkService } from "./ChunkService.js";
import { createOpenAiClient, createOpenAiTextModel } from "./OpenAiService.js";
import { createReduceService, type ReduceService } from "./ReduceService.js";
import { createS3Storage } from "./S3Service.js";
import { createSummarizeService, type SummarizeService } from "./SummarizeService.js";
import { createTextExtractService, type TextExtractService } from "./TextExtractService.js";
import { createTextractOcr } from "./TextractService.js";

export interface Capabilities {
  storage: ObjectStorage;
  ocr: OcrService;
  textModel: TextModel;
}

export interface Pipeline {
  storage: ObjectStorage;
  extractor: TextExtractService;
  summarizer: SummarizeService;
  reducer: ReduceService;
  maxTokensPerChunk: number;
}

export function createPipeline(
  capabilities: Capabilities,
  settings: PipelineSettings,
  modelId: string,
  wait: (ms: number) => Promise<void> = (ms) => sleep(ms)
): Pipeline {
  const summarizer = createSummarizeService({
    model: capabilities.textModel,
    modelId,
    maxOutputTokens: settings.maxOutputTokens,
    throttleBaseDelayMs: settings.throttleBaseDelayMs,
    maxThrottleRetries: settings.maxThrottleRetries,
    sleep: wait,
  });

  return {
    storage: capabilities.storage,
    extractor: createTextExtractService({
      ocr: capabilities.ocr,
      sleep: wait,
      pollIntervalMs: settings.pollIntervalMs,
      maxPollAttempts: settings.maxPollAttempts,
    }),
    summarizer,
    reducer: createReduceService({ summarizer, maxTokensPerChunk: settings.maxTokensPerChunk }),
    maxTokensPerChunk: settings.maxTokensPerChunk,
  };
}

/**
 * Build the pipeline on S3, Textract and OpenAI. Called once per Lambda container.
 */
export async function createAwsPipeline(): Promise<Pipeline> {
  const [apiKey, modelId] = await Promise.all([
    config.getRequired("OPENAI_API_KEY"),
    config.getModelId(),
  ]);

  return createPipeline(
    {
      storage: createS3Storage(new S3Client({})),
      ocr: createTextractOcr(new TextractClient({})),
      textModel: createOpenAiTextModel(createOpenAiClient(apiKey)),
    },
    config.loadSettings(),
    modelId
  );
}

/**
 * Read the document reference from the first record of an S3 notification.
 * Object keys arrive URL-encoded with "+" for spaces.
 */
export function parseUploadEvent(event: unknown): DocumentReference {
  const parsed = uploadEventSchema.safeParse(event);
  if (!parsed.success) {
    throw new MalformedTriggerError("Event does not carry an S3 bucket name and object key");
  }

  const record = parsed.data.Records[0];
  try {
    return {
      bucket: record.s3.bucket.name,
      key: decodeURIComponent(record.s3.object.key.replace(/\+/g, " ")),
    };
  } catch (error) {
    throw new MalformedTriggerError(`Object key is not valid URL encoding: ${record.s3.object.key}`, {
      cause: error,
    });
  }
}

async function summarizeDocument(document: DocumentReference, pipeline: Pipeline): Promise<string> {
  const text = await pipeline.extractor.extract(document);
  const chunks = ChunkService.chunkText(text, pipeline.maxTokensPerChunk);
  logger.log("Text chunked", { key: document.key, chunkCount: chunks.length });

  const summariesByIndex = new Map<number, ChunkSummary>();
  for (const chunk of chunks) {
    summariesByIndex.set(chunk.index, await pipeline.summarizer.summarize(chunk));
  }

  const summary = await pipeline.reducer.reduce([...summariesByIndex.values()]);
  logger.log("Summary ready", {
    key: document.key,
    chunkCount: summary.chunkCount,
    reduced: summary.reduced,
    characters: summary.text.length,
  });
  return summary.text;
}

/**
 * Summarize the uploaded document and write the summary next to it.
 * The pipeline is loaded only once the event and document format are accepted.
 * Nothing is written unless every step succeeds.
 */
export async function processUpload(
  event: unknown,
  loadPipeline: () => Promise<Pipeline>
): Promise<HandlerResult> {
  try {
    const document = parseUploadEvent(event);

    if (isSummaryArtifact(document.key)) {
      logger.log("Skipping summary artifact", { bucket: document.bucket, key: document.key });
      return { statusCode: 200, body: `Skipped ${document.key}: already a summary` };
    }

    classifyDocument(document.key);

    const pipeline = await loadPipeline();
    const summary = await summarizeDocument(document, pipeline);

    const target: DocumentReference = { bucket: document.bucket, key: toSummaryKey(document.key) };
    await pipeline.storage.putText(target, summary);

    return { statusCode: 200, body: `Summary written to s3://${target.bucket}/${target.key}` };
  } catch (error) {
    if (error instanceof SummarizerError) {
      logger.error("Document summarization failed", {
        kind: error.kind,
        message: error.message,
        cause: error.cause,
      });
      return { statusCode: error.statusCode, body: error.message };
    }

    logger.error("Unexpected error while summarizing document", error);
    return {
      statusCode: 500,
      body: `Unexpected error: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}
