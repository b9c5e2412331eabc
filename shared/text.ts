const STOP_WORDS: ReadonlySet<string> = new Set([
  "a", "an", "the", "is", "are", "was", "were", "be", "been", "being",
  "of", "to", "in", "on", "for", "with", "and", "or", "but", "if", "then",
  "it", "its", "this", "that", "these", "those", "as", "at", "by", "from",
  "what", "which", "who", "whom", "how", "when", "where", "why",
  "do", "does", "did", "has", "have", "had", "can", "will", "would", "should",
  "i", "you", "he", "she", "we", "they", "me", "him", "her", "us", "them",
  "my", "your", "his", "our", "their", "not", "no", "so", "than", "too",
  "very", "just", "about", "into", "over", "also", "there", "here",
]);

const STEM_LENGTH = 5;

export function normalizeText(text: string): string {
  return text.normalize("NFD").replaceAll(/[\u0300-\u036f]/g, "").toLowerCase();
}

export function tokenize(text: string): readonly string[] {
  return normalizeText(text)
    .replaceAll(/[^\p{L}\p{N}\p{M}\s]/gu, " ")
    .split(/\s+/)
    .filter((w) => w.length > 0);
}

export function contentTokens(text: string): readonly string[] {
  return tokenize(text).filter((w) => w.length >= 2 && !STOP_WORDS.has(w));
}

/** Crude prefix stem so that "capital" and "capitals" compare equal. */
export function stem(word: string): string {
  return word.length > STEM_LENGTH ? word.slice(0, STEM_LENGTH) : word;
}

export function stemSet(words: readonly string[]): ReadonlySet<string> {
  return new Set(words.map(stem));
}

export function splitSentences(text: string): readonly string[] {
  return text
    .split(/(?<=[.!?])\s+|(?<=[。！？])\s*|\n+/)
    .map((s) => s.trim())
    .filter((s) => tokenize(s).length > 0);
}

export function normalizePhrase(text: string): string {
  return tokenize(text).join(" ");
}

export function clampScore(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function roundScore(value: number): number {
  return Math.round(clampScore(value) * 10_000) / 10_000;
}
