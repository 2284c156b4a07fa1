import { resolveOptions, splitArgs } from "./config.js";
import { ConfigError, isLoadError } from "./errors.js";
import { formatBook } from "./format.js";
import { loadBook } from "./loader.js";
import type { CliIo, CliOptions } from "./types.js";

export const USAGE = "Usage: bookbot <path_to_book>";

function bold(s: string) { return `\x1b[1m${s}\x1b[0m`; }
function dim(s: string) { return `\x1b[2m${s}\x1b[0m`; }
function cyan(s: string) { return `\x1b[36m${s}\x1b[0m`; }

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function printHelp(io: CliIo) {
  const log = io.out;
  log(bold("bookbot") + " — word and character statistics for a text file\n");
  log(`Usage: bookbot ${dim("<path_to_book>")} [options]\n`);
  log("Options:");
  log(`  ${cyan("--format")} ${dim("<banner|simple|json>")}  Output format (default: banner)`);
  log(`  ${cyan("--top")}    ${dim("<n>")}                   Characters listed by --format simple (default: 10)`);
  log(`  ${cyan("--help")}                         Show this help\n`);
  log("Examples:");
  log(`  ${dim("$ bookbot books/frankenstein.txt")}`);
  log(`  ${dim("$ bookbot books/frankenstein.txt --format simple --top 5")}`);
  log(`  ${dim("$ bookbot books/frankenstein.txt --format json")}`);
}

// ─── Main ────────────────────────────────────────────────────────────────────

/** Run the CLI against `args` (argv without node and script). Returns the exit code. */
export function runCli(args: string[], io: CliIo = consoleIo): number {
  const raw = splitArgs(args);

  if (raw.help) {
    printHelp(io);
    return 0;
  }

  if (raw.positionals.length !== 1) {
    io.out(USAGE);
    return 1;
  }

  let options: CliOptions;
  try {
    options = resolveOptions(raw.positionals[0], raw);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    io.err(`error: ${e.message}`);
    return 1;
  }

  let text: string;
  try {
    text = loadBook(options.path);
  } catch (e) {
    if (!isLoadError(e)) throw e;
    // Load failures are reported but do not change the exit status.
    io.out(`Error: ${e.message}`);
    return 0;
  }

  for (const line of formatBook(text, options.format, options)) io.out(line);
  return 0;
}
