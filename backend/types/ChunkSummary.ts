export interface ChunkSummary {
  /** Index of the source chunk, used to reassemble summaries in document order */
  chunkIndex: number;
  text: string;
}

export interface FinalSummary {
  text: string;
  chunkCount: number;
  /** True when the joined chunk summaries went through a condensing pass */
  reduced: boolean;
}
