import type { ChunkSummary, FinalSummary } from "../types/ChunkSummary.js";
import { estimateTokens } from "../utils/tokens.js";
import { logger } from "../utils/logger.js";
import type { SummarizeService } from "./SummarizeService.js";

export const EMPTY_DOCUMENT_SUMMARY = "No text could be extracted from the document.";

export interface ReduceOptions {
  summarizer: Pick<SummarizeService, "condense">;
  maxTokensPerChunk: number;
}

export interface ReduceService {
  reduce(summaries: ChunkSummary[]): Promise<FinalSummary>;
}

export function createReduceService(options: ReduceOptions): ReduceService {
  const { summarizer, maxTokensPerChunk } = options;

  /**
   * Join chunk summaries in document order. When the result is over the chunk
   * budget it is condensed once; the condensed text is final whatever its size.
   */
  async function reduce(summaries: ChunkSummary[]): Promise<FinalSummary> {
    if (summaries.length === 0) {
      return { text: EMPTY_DOCUMENT_SUMMARY, chunkCount: 0, reduced: false };
    }

    const joined = [...summaries]
      .sort((a, b) => a.chunkIndex - b.chunkIndex)
      .map((summary) => summary.text)
      .join("\n");

    const tokens = estimateTokens(joined);
    if (tokens <= maxTokensPerChunk) {
      return { text: joined, chunkCount: summaries.length, reduced: false };
    }

    logger.log("Joined summaries exceed chunk budget, condensing", {
      chunkCount: summaries.length,
      tokens,
      maxTokensPerChunk,
    });
    const text = await summarizer.condense(joined);
    return { text, chunkCount: summaries.length, reduced: true };
  }

  return { reduce };
}
