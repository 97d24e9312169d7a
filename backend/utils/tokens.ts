// Shared by the chunker and the reducer's overflow check so both agree on what fits.
export const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function maxCharsForTokens(tokens: number): number {
  return tokens * CHARS_PER_TOKEN;
}
