// Rough token estimate: whitespace-separated words times a fixed multiplier.

export const TOKENS_PER_WORD = 1.3;

/**
 * Estimates the token count of a text.
 */
export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  return Math.floor(words.length * TOKENS_PER_WORD);
}
