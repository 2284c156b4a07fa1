// ─── Statistics types ────────────────────────────────────────────────────────

/** One entry of the word frequency table */
export interface WordCount {
  word: string;
  count: number;
}

/** One entry of a sorted character frequency table */
export interface CharCount {
  char: string;
  count: number;
}

/** Lowercase character → occurrences, in first-seen order */
export type CharFrequency = Map<string, number>;

/** Aggregate snapshot for one text */
export interface Report {
  readonly characters: number;
  readonly words: number;
  readonly sentences: number;
  readonly paragraphs: number;
  readonly averageWordLength: number; // rounded to 2 decimals
  readonly topWords: readonly WordCount[];
}

// ─── CLI types ───────────────────────────────────────────────────────────────

export type OutputFormat = "banner" | "simple" | "json";

export interface CliOptions {
  path: string;
  format: OutputFormat;
  top: number; // characters listed by the simple format
}

/** Where the CLI writes its output */
export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}
