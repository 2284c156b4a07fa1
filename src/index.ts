export type { CharCount, CharFrequency, CliIo, CliOptions, OutputFormat, Report, WordCount } from "./types.js";
export { BookNotFoundError, BookReadError, ConfigError, LoadError, isLoadError } from "./errors.js";
export type { LoadErrorKind } from "./errors.js";
export { loadBook } from "./loader.js";
export {
  averageWordLength,
  characterFrequency,
  cleanWord,
  countCharacters,
  countParagraphs,
  countSentences,
  countWords,
  generateReport,
  roundTo,
  sortCharacterFrequency,
  wordFrequency,
} from "./stats.js";
export { charLabel, formatBanner, formatBook, formatJson, formatSimple } from "./format.js";
export type { FormatOptions } from "./format.js";
export { FORMATS, resolveOptions, splitArgs } from "./config.js";
export { USAGE, runCli } from "./cli.js";
