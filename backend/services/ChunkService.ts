import type { TextChunk } from "../types/TextChunk.js";
import { maxCharsForTokens } from "../utils/tokens.js";

/**
 * Split text into contiguous slices of maxTokensPerChunk worth of characters.
 * Slices ignore word boundaries; the last one is shorter. Empty text gives no chunks.
 */
function chunkText(text: string, maxTokensPerChunk: number): TextChunk[] {
  if (!Number.isInteger(maxTokensPerChunk) || maxTokensPerChunk <= 0) {
    throw new RangeError(`maxTokensPerChunk must be a positive integer, got ${maxTokensPerChunk}`);
  }

  const maxChars = maxCharsForTokens(maxTokensPerChunk);
  const chunks: TextChunk[] = [];

  for (let start = 0; start < text.length; start += maxChars) {
    const end = Math.min(start + maxChars, text.length);
    chunks.push({ index: chunks.length, start, end, text: text.slice(start, end) });
  }

  return chunks;
}

export const ChunkService = {
  chunkText,
};
