import { describe, it, expect } from "vitest";
import { ChunkService } from "./ChunkService.js";

describe("ChunkService.chunkText", () => {
  it("slices text into 4-characters-per-token chunks in order", () => {
    const chunks = ChunkService.chunkText("abcdefghij", 1);

    expect(chunks).toEqual([
      { index: 0, start: 0, end: 4, text: "abcd" },
      { index: 1, start: 4, end: 8, text: "efgh" },
      { index: 2, start: 8, end: 10, text: "ij" },
    ]);
  });

  it("gives full-size chunks when the length is a multiple of the chunk size", () => {
    const chunks = ChunkService.chunkText("abcdefgh", 1);

    expect(chunks.map((chunk) => chunk.text)).toEqual(["abcd", "efgh"]);
  });

  it("splits mid-word", () => {
    const chunks = ChunkService.chunkText("hello world", 1);

    expect(chunks.map((chunk) => chunk.text)).toEqual(["hell", "o wo", "rld"]);
  });

  it("produces ceil(L / M) chunks that join back to the input", () => {
    const maxTokens = 3;
    const maxChars = maxTokens * 4;

    for (const length of [1, 11, 12, 13, 100, 241]) {
      const text = Array.from({ length }, (_, i) => String.fromCharCode(97 + (i % 26))).join("");
      const chunks = ChunkService.chunkText(text, maxTokens);

      expect(chunks).toHaveLength(Math.ceil(length / maxChars));
      expect(chunks.map((chunk) => chunk.text).join("")).toBe(text);
      expect(chunks.slice(0, -1).every((chunk) => chunk.text.length === maxChars)).toBe(true);
      expect(chunks[chunks.length - 1].text.length).toBe(length % maxChars || maxChars);
    }
  });

  it("returns no chunks for empty text", () => {
    expect(ChunkService.chunkText("", 100)).toEqual([]);
  });

  it.each([0, -1, 1.5, Number.NaN])("rejects a budget of %s tokens", (budget) => {
    expect(() => ChunkService.chunkText("text", budget)).toThrow(RangeError);
  });
});
