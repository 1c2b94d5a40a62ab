// Heuristic ratio, not derived from any tokenizer. Estimates are
// order-of-magnitude figures, not billing counts.
export const CHARS_PER_TOKEN = 4;

export function estimateTokens(
  charCount: number,
  charsPerToken: number = CHARS_PER_TOKEN,
): number {
  if (!Number.isInteger(charCount) || charCount < 0) {
    throw new RangeError(
      `charCount must be a non-negative integer, got ${charCount}`,
    );
  }
  if (!Number.isFinite(charsPerToken) || charsPerToken <= 0) {
    throw new RangeError(
      `charsPerToken must be a positive number, got ${charsPerToken}`,
    );
  }
  return Math.ceil(charCount / charsPerToken);
}

export function estimateTextTokens(
  text: string,
  charsPerToken: number = CHARS_PER_TOKEN,
): number {
  return estimateTokens(text.length, charsPerToken);
}
