import type { DocumentReference } from "../types/DocumentReference.js";
import type { OcrBlock, OcrJobPage, OcrService } from "../types/Capabilities.js";
import type {
  ExtractionJobState,
  PendingExtractionJob,
  TerminalExtractionJob,
} from "../types/ExtractionJob.js";
import { classifyDocument } from "../utils/documentFormat.js";
import {
  ExtractionFailedError,
  ExtractionJobFailedError,
  ExtractionTimeoutError,
  SummarizerError,
} from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export interface TextExtractOptions {
  ocr: OcrService;
  sleep: (ms: number) => Promise<void>;
  pollIntervalMs: number;
  maxPollAttempts: number;
}

export interface TextExtractService {
  extract(document: DocumentReference): Promise<string>;
}

/**
 * Join the text of LINE blocks in service order, one line each
 */
export function linesToText(blocks: OcrBlock[]): string {
  return blocks
    .filter((block) => block.blockType === "LINE")
    .map((block) => `${block.text ?? ""}\n`)
    .join("");
}

export function isTerminal(state: ExtractionJobState): state is TerminalExtractionJob {
  return state.status !== "SUBMITTED" && state.status !== "POLLING";
}

/**
 * Apply one poll result to a pending job. A job still in progress after
 * maxAttempts polls times out.
 */
export function advanceExtractionJob(
  state: PendingExtractionJob,
  page: OcrJobPage,
  maxAttempts: number
): ExtractionJobState {
  const attempts = state.attempts + 1;
  const { jobId } = state;

  switch (page.status) {
    case "SUCCEEDED":
      return { status: "SUCCEEDED", jobId, attempts, blocks: page.blocks, nextToken: page.nextToken };
    case "FAILED":
      return { status: "FAILED", jobId, attempts, statusMessage: page.statusMessage };
    case "IN_PROGRESS":
      return attempts >= maxAttempts
        ? { status: "TIMED_OUT", jobId, attempts }
        : { status: "POLLING", jobId, attempts };
  }
}

export function createTextExtractService(options: TextExtractOptions): TextExtractService {
  const { ocr, sleep, pollIntervalMs, maxPollAttempts } = options;

  async function pollUntilTerminal(jobId: string): Promise<TerminalExtractionJob> {
    let state: PendingExtractionJob = { status: "SUBMITTED", jobId, attempts: 0 };

    for (;;) {
      await sleep(pollIntervalMs);
      const page = await ocr.getTextDetection(jobId);
      const next = advanceExtractionJob(state, page, maxPollAttempts);
      if (isTerminal(next)) {
        return next;
      }
      state = next;
    }
  }

  /**
   * Run a text detection job and collect the blocks of every result page
   */
  async function detectDocumentText(document: DocumentReference): Promise<OcrBlock[]> {
    const jobId = await ocr.startTextDetection(document);
    logger.log("Started text detection job", { jobId, bucket: document.bucket, key: document.key });

    const job = await pollUntilTerminal(jobId);

    switch (job.status) {
      case "FAILED":
        throw new ExtractionJobFailedError(jobId, job.statusMessage);
      case "TIMED_OUT":
        throw new ExtractionTimeoutError(jobId, job.attempts);
      case "SUCCEEDED": {
        const blocks = [...job.blocks];
        let nextToken = job.nextToken;
        let pages = 1;
        while (nextToken) {
          const page = await ocr.getTextDetection(jobId, nextToken);
          blocks.push(...page.blocks);
          nextToken = page.nextToken;
          pages++;
        }
        logger.log("Text detection job finished", {
          jobId,
          polls: job.attempts,
          pages,
          blocks: blocks.length,
        });
        return blocks;
      }
    }
  }

  async function extract(document: DocumentReference): Promise<string> {
    const format = classifyDocument(document.key);
    logger.log("Extracting text", { bucket: document.bucket, key: document.key, format });

    let blocks: OcrBlock[];
    try {
      blocks =
        format === "image" ? await ocr.detectText(document) : await detectDocumentText(document);
    } catch (error) {
      if (error instanceof SummarizerError) {
        throw error;
      }
      throw new ExtractionFailedError(
        `Text extraction failed for s3://${document.bucket}/${document.key}`,
        { cause: error }
      );
    }

    const text = linesToText(blocks);
    logger.log("Text extracted", { key: document.key, characters: text.length });
    return text;
  }

  return { extract };
}
