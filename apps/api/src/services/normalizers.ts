const STOPWORDS = new Set([
  "about", "after", "again", "also", "among", "been", "before", "being", "between", "both",
  "could", "does", "doing", "down", "during", "each", "from", "further", "have", "having",
  "here", "into", "just", "more", "most", "much", "must", "only", "other", "over", "same",
  "should", "some", "such", "than", "that", "their", "them", "then", "there", "these",
  "they", "this", "those", "through", "under", "until", "very", "were", "what", "when",
  "where", "which", "while", "will", "with", "within", "would", "your", "yours", "ours"
]);

export function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

export function toNumber(value: unknown): number | null {
  const number = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(number)) {
    return null;
  }
  return number;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function roundScore(value: number, digits = 3): number {
  return Number(value.toFixed(digits));
}

/** Length in code points, so emoji and astral characters count once. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n/g, "\n")
    .replace(/[ \t]{2,}/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function splitSentences(text: string, minLength = 1): string[] {
  return normalizeWhitespace(text)
    .split(/(?<=[.!?])\s+|\n+/)
    .map((item) => item.trim())
    .filter((item) => item.length >= minLength);
}

export function stripTrailingPunctuation(text: string): string {
  return text.replace(/[\s.,;:!?]+$/g, "").trim();
}

/** Case-folded, punctuation-free form used for duplicate detection. */
export function normalizeForComparison(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}%\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((item) => item.length > 0);
}

export function contentWords(text: string): string[] {
  return tokenize(text).filter((item) => item.length >= 4 && !STOPWORDS.has(item) && !/^\d+$/.test(item));
}

/**
 * Bare numeric values mentioned in the text: "42%", "$1,200" and "42 percent"
 * all yield their number without symbols or thousands separators. Single digits
 * are skipped unless they carry a percent sign or currency symbol.
 */
export function extractNumbers(text: string): string[] {
  const found = new Set<string>();
  const pattern = /([$€£]\s?)?(\d{1,3}(?:,\d{3})+|\d+)(\.\d+)?(\s?(?:%|percent\b))?/gi;
  for (const match of text.matchAll(pattern)) {
    const currency = match[1];
    const whole = (match[2] ?? "").replace(/,/g, "");
    const fraction = match[3] ?? "";
    const percent = match[4];
    const value = `${whole}${fraction}`;
    if (!whole) {
      continue;
    }
    if (whole.length === 1 && !fraction && !currency && !percent) {
      continue;
    }
    found.add(value);
  }
  return [...found];
}

export function truncateAtWord(text: string, maxChars: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxChars) {
    return text;
  }
  const sliced = chars.slice(0, maxChars).join("");
  const lastSpace = sliced.lastIndexOf(" ");
  const base = lastSpace > maxChars * 0.6 ? sliced.slice(0, lastSpace) : sliced;
  return stripTrailingPunctuation(base);
}

/**
 * Shortens text to maxChars by keeping whole sentences in their original order,
 * falling back to a word-boundary cut when even the first sentence is too long.
 */
export function fitToLength(text: string, maxChars: number): string {
  const normalized = normalizeWhitespace(text);
  if (charLength(normalized) <= maxChars) {
    return normalized;
  }

  const sentences = splitSentences(normalized);
  let result = "";
  for (const sentence of sentences) {
    const candidate = result ? `${result} ${sentence}` : sentence;
    if (charLength(candidate) > maxChars) {
      break;
    }
    result = candidate;
  }

  if (result) {
    return result;
  }
  return truncateAtWord(normalized, maxChars);
}

export function cosineSimilarity(left: number[], right: number[]): number {
  const size = Math.min(left.length, right.length);
  if (size === 0) {
    return 0;
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < size; index += 1) {
    const a = left[index] ?? 0;
    const b = right[index] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}
