import { characterFrequency, countWords, generateReport, sortCharacterFrequency } from "./stats.js";
import type { OutputFormat } from "./types.js";

const LETTER = /^\p{L}$/u;

export interface FormatOptions {
  path: string;
  top?: number;
}

/** Printable label for a character in the simple listing */
export function charLabel(char: string): string {
  if (char === " ") return "space";
  if (char === "\n") return "newline";
  return char;
}

// ─── Renderers ───────────────────────────────────────────────────────────────

export function formatBanner(text: string, path: string): string[] {
  const lines = [
    "============= BOOKBOT =============",
    `Analyzing book found at ${path}...`,
    "",
    "--------- Word Count ---------",
    `Found ${countWords(text)} total words`,
    "--------- Character Count -------",
  ];
  for (const { char, count } of sortCharacterFrequency(characterFrequency(text))) {
    if (LETTER.test(char)) lines.push(`${char}: ${count}`);
  }
  lines.push("=============== END ===============");
  return lines;
}

export function formatSimple(text: string, top = 10): string[] {
  const lines = [`${countWords(text)} words found in the document`, "Character frequency analysis:"];
  for (const { char, count } of sortCharacterFrequency(characterFrequency(text)).slice(0, top)) {
    lines.push(`  '${charLabel(char)}': ${count}`);
  }
  return lines;
}

export function formatJson(text: string): string[] {
  return JSON.stringify(generateReport(text), null, 2).split("\n");
}

export function formatBook(text: string, format: OutputFormat, opts: FormatOptions): string[] {
  switch (format) {
    case "banner":
      return formatBanner(text, opts.path);
    case "simple":
      return formatSimple(text, opts.top);
    case "json":
      return formatJson(text);
  }
}
