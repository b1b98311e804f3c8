const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'but', 'by', 'for', 'i', 'im', "i'm", 'in', 'is',
  'it', "it's", 'me', 'my', 'of', 'on', 'or', 'so', 'that', 'the', 'this', 'to', 'was', 'with', 'you'
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .split(/[^a-z0-9']+/)
    .map(token => token.replace(/^'+|'+$/g, ''))
    .filter(token => token.length > 0);
}

export function contentTokens(text: string): Set<string> {
  return new Set(tokenize(text).filter(token => !STOPWORDS.has(token)));
}

// Jaccard overlap of content words, 0-1
export function similarity(a: string, b: string): number {
  const left = contentTokens(a);
  const right = contentTokens(b);
  if (left.size === 0 && right.size === 0) return 0;

  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function truncate(text: string, maxLength: number): string {
  const normalized = text.split(/\s+/).filter(Boolean).join(' ');
  return normalized.length > maxLength ? `${normalized.substring(0, maxLength)}...` : normalized;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
