// packages/llm/src/tokens.ts

export function countTokens(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'in', 'is',
  'it', 'of', 'on', 'or', 'that', 'the', 'to', 'was', 'were', 'which', 'who', 'with',
]);

/** Distinct lowercase words in order of first appearance, stopwords dropped. */
export function extractKeywords(text: string, max = 10): string[] {
  const out: string[] = [];
  for (const word of text.toLowerCase().split(/[^a-z0-9]+/)) {
    if (!word || STOPWORDS.has(word) || out.includes(word)) continue;
    out.push(word);
    if (out.length >= max) break;
  }
  return out;
}
