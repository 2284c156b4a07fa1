import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { CliOptions } from "./types.js";

export const FORMATS = ["banner", "simple", "json"] as const;

const VALUE_FLAGS = ["--format", "--top"];

const optionsSchema = z.object({
  path: z.string().min(1, "path to book must not be empty"),
  format: z.enum(FORMATS).default("banner"),
  top: z.coerce.number().int().positive().default(10),
});

/** argv split into positionals and raw flag values */
export interface RawArgs {
  positionals: string[];
  format?: string;
  top?: string;
  help: boolean;
}

export function splitArgs(args: string[]): RawArgs {
  const raw: RawArgs = { positionals: [], help: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      raw.help = true;
    } else if (VALUE_FLAGS.includes(arg)) {
      const value = i + 1 < args.length ? args[++i] : "";
      if (arg === "--format") raw.format = value;
      else raw.top = value;
    } else {
      raw.positionals.push(arg);
    }
  }
  return raw;
}

/** Validate raw flags; path must already be known to be a single positional */
export function resolveOptions(path: string, raw: RawArgs): CliOptions {
  const result = optionsSchema.safeParse({ path, format: raw.format, top: raw.top });
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  return result.data;
}
