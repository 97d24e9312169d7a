import type { OcrBlock } from "./Capabilities.js";

/**
 * Lifecycle of an asynchronous text detection job:
 * SUBMITTED -> POLLING -> SUCCEEDED | FAILED | TIMED_OUT
 */
export type ExtractionJobState =
  | { status: "SUBMITTED"; jobId: string; attempts: 0 }
  | { status: "POLLING"; jobId: string; attempts: number }
  | {
      status: "SUCCEEDED";
      jobId: string;
      attempts: number;
      /** Blocks from the first result page */
      blocks: OcrBlock[];
      nextToken?: string;
    }
  | { status: "FAILED"; jobId: string; attempts: number; statusMessage?: string }
  | { status: "TIMED_OUT"; jobId: string; attempts: number };

export type PendingExtractionJob = Extract<ExtractionJobState, { status: "SUBMITTED" | "POLLING" }>;

export type TerminalExtractionJob = Exclude<ExtractionJobState, PendingExtractionJob>;
