import type { CharCount, CharFrequency, Report, WordCount } from "./types.js";

const NON_WORD = /[^\p{L}\p{N}_]/gu;

// Word separators. Unlike \s this covers U+001C-U+001F and U+0085, and
// U+FEFF is not one.
const SPACE = "\\t\\n\\v\\f\\r\\x1c-\\x1f \\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000";
const SPACE_RUN = new RegExp(`[${SPACE}]+`, "u");
const NON_SPACE = new RegExp(`[^${SPACE}]`, "u");

// --- Tokenization ---
function splitWords(text: string): string[] {
  return text.split(SPACE_RUN).filter((w) => w.length > 0);
}

function isBlank(s: string): boolean {
  return !NON_SPACE.test(s);
}

/** Strip everything but letters, digits and underscores */
export function cleanWord(word: string): string {
  return word.replace(NON_WORD, "");
}

function codePoints(s: string): number {
  return [...s].length;
}

/** Round to `places` decimals; exact halves go to the even neighbour */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5 && (floor + 0.5) / factor === value) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Math.round(scaled) / factor;
}

// --- Counts ---
export function countWords(text: string): number {
  return splitWords(text).length;
}

/** Code points in the raw text, whitespace included */
export function countCharacters(text: string): number {
  return codePoints(text);
}

export function countSentences(text: string): number {
  return text
    .split(/[.!?]+/)
    .filter((s) => !isBlank(s)).length;
}

export function countParagraphs(text: string): number {
  return text
    .split("\n\n")
    .filter((p) => !isBlank(p)).length;
}

export function averageWordLength(text: string): number {
  const lengths = splitWords(text)
    .map(cleanWord)
    .filter((w) => w.length > 0)
    .map(codePoints);
  if (lengths.length === 0) return 0;
  return lengths.reduce((sum, n) => sum + n, 0) / lengths.length;
}

// --- Frequency ---

/**
 * Most frequent cleaned, lowercased words. Equal counts keep the order in
 * which the words first appear.
 */
export function wordFrequency(text: string, topN = 10): WordCount[] {
  if (topN <= 0) return [];
  const freq = new Map<string, number>();
  for (const token of splitWords(text.toLowerCase())) {
    const w = cleanWord(token);
    if (w) freq.set(w, (freq.get(w) ?? 0) + 1);
  }
  return [...freq.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, topN)
    .map(([word, count]) => ({ word, count }));
}

export function characterFrequency(text: string): CharFrequency {
  const freq: CharFrequency = new Map();
  for (const ch of text.toLowerCase()) freq.set(ch, (freq.get(ch) ?? 0) + 1);
  return freq;
}

/** Descending by count; ties stay in table order */
export function sortCharacterFrequency(freq: CharFrequency): CharCount[] {
  return [...freq.entries()]
    .map(([char, count]) => ({ char, count }))
    .sort((a, b) => b.count - a.count);
}

// --- Report ---
export function generateReport(text: string): Report {
  return {
    characters: countCharacters(text),
    words: countWords(text),
    sentences: countSentences(text),
    paragraphs: countParagraphs(text),
    averageWordLength: roundTo(averageWordLength(text), 2),
    topWords: wordFrequency(text, 5),
  };
}
