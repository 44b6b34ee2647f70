export function words(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function countWords(text: string): number {
  return words(text).length;
}

export function isBlank(text: string | null | undefined): boolean {
  return !text || text.trim().length === 0;
}

/** Rough token count for stored messages: four characters per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function splitSentences(text: string): string[] {
  return text
    .trim()
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Leading sentences of `text`, taken greedily while the total stays within
 * `maxWords`. A first sentence longer than the budget is cut at `maxWords`
 * words and marked with an ellipsis.
 */
export function extractiveSummary(text: string, maxWords: number): string {
  const sentences = splitSentences(text);
  const picked: string[] = [];
  let budget = maxWords;

  for (const sentence of sentences) {
    const length = countWords(sentence);
    if (length > budget) break;
    picked.push(sentence);
    budget -= length;
  }

  if (picked.length > 0) {
    return picked.join(' ');
  }

  const leading = words(text);
  const cut = leading.slice(0, maxWords).join(' ');
  return leading.length > maxWords ? `${cut}...` : cut;
}
