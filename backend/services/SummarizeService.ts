import type { TextModel, TextModelRequest } from "../types/Capabilities.js";
import type { ChunkSummary } from "../types/ChunkSummary.js";
import type { TextChunk } from "../types/TextChunk.js";
import {
  RateLimitExceededError,
  SummarizationFailedError,
  ThrottlingError,
} from "../utils/errors.js";
import { logger } from "../utils/logger.js";

const SUMMARY_SYSTEM_PROMPT = `You are an academic research assistant. You write precise, neutral summaries of documents in the style of an academic abstract.

Rules:
- Cover the main arguments, findings and conclusions of the text
- Keep names, figures and dates that matter to the content
- Do not add information that is not in the text
- Write plain prose without headings or bullet points`;

const CONDENSE_SYSTEM_PROMPT =
  "You distill multiple summaries of consecutive parts of one document into a single coherent overview.";

export const TEMPERATURE = 0.1;
export const STOP_SEQUENCES = ["\n\nUser:"];
export const MISSING_SUMMARY = "[No summary was returned for this section.]";

function buildSummaryPrompt(text: string): string {
  return `Summarize the following part of a document.\n\n<text>\n${text}\n</text>`;
}

function buildCondensePrompt(summaries: string): string {
  return `Combine these section summaries, given in document order, into one overview.\n\n<summaries>\n${summaries}\n</summaries>`;
}

export interface SummarizeOptions {
  model: TextModel;
  modelId: string;
  maxOutputTokens: number;
  /** Delay before the first retry; doubled for every further retry */
  throttleBaseDelayMs: number;
  maxThrottleRetries: number;
  sleep: (ms: number) => Promise<void>;
}

export interface SummarizeService {
  summarize(chunk: TextChunk): Promise<ChunkSummary>;
  /** Single reduction pass over already summarized text */
  condense(summaries: string): Promise<string>;
}

export function createSummarizeService(options: SummarizeOptions): SummarizeService {
  const { model, modelId, maxOutputTokens, throttleBaseDelayMs, maxThrottleRetries, sleep } =
    options;

  async function invokeWithBackoff(system: string, prompt: string): Promise<string> {
    const request: TextModelRequest = {
      modelId,
      system,
      prompt,
      maxOutputTokens,
      temperature: TEMPERATURE,
      stopSequences: STOP_SEQUENCES,
    };

    for (let attempt = 0; ; attempt++) {
      try {
        const completion = await model.invoke(request);
        if (completion === undefined) {
          logger.warn("Model returned no completion, using placeholder", { modelId });
          return MISSING_SUMMARY;
        }
        return completion;
      } catch (error) {
        if (!(error instanceof ThrottlingError)) {
          throw new SummarizationFailedError(`Model ${modelId} call failed`, { cause: error });
        }
        if (attempt >= maxThrottleRetries) {
          throw new RateLimitExceededError(attempt + 1, { cause: error });
        }
        const delayMs = throttleBaseDelayMs * 2 ** attempt;
        logger.warn("Model is throttling, backing off", { modelId, attempt: attempt + 1, delayMs });
        await sleep(delayMs);
      }
    }
  }

  async function summarize(chunk: TextChunk): Promise<ChunkSummary> {
    logger.log("Summarizing chunk", { chunkIndex: chunk.index, characters: chunk.text.length });
    const text = await invokeWithBackoff(SUMMARY_SYSTEM_PROMPT, buildSummaryPrompt(chunk.text));
    return { chunkIndex: chunk.index, text };
  }

  async function condense(summaries: string): Promise<string> {
    logger.log("Condensing chunk summaries", { characters: summaries.length });
    return invokeWithBackoff(CONDENSE_SYSTEM_PROMPT, buildCondensePrompt(summaries));
  }

  return { summarize, condense };
}
