import type { DocumentReference } from "./DocumentReference.js";

export interface OcrBlock {
  /** e.g. "PAGE", "LINE", "WORD" */
  blockType: string;
  text?: string;
}

export type OcrJobStatus = "IN_PROGRESS" | "SUCCEEDED" | "FAILED";

/**
 * One poll of a text detection job. nextToken is set while more result pages remain.
 */
export interface OcrJobPage {
  status: OcrJobStatus;
  blocks: OcrBlock[];
  nextToken?: string;
  statusMessage?: string;
}

export interface OcrService {
  detectText(document: DocumentReference): Promise<OcrBlock[]>;
  startTextDetection(document: DocumentReference): Promise<string>;
  getTextDetection(jobId: string, nextToken?: string): Promise<OcrJobPage>;
}

export interface TextModelRequest {
  modelId: string;
  system: string;
  prompt: string;
  maxOutputTokens: number;
  temperature: number;
  stopSequences: string[];
}

export interface TextModel {
  /**
   * Resolves to the completion text, or undefined when the response carried none.
   * Rejects with ThrottlingError when the service is rate limiting.
   */
  invoke(request: TextModelRequest): Promise<string | undefined>;
}

export interface ObjectStorage {
  putText(target: DocumentReference, body: string): Promise<void>;
}
