/**
 * A contiguous slice of the extracted text; start/end are character offsets into it
 */
export interface TextChunk {
  readonly index: number;
  readonly start: number;
  readonly end: number;
  readonly text: string;
}
