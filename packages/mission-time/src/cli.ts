import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

import { createJsConverter } from "@mission-time/converter-js";
import { formatFloat } from "@mission-time/core";

import { DateTime } from "./datetime/dateTime.js";
import { createTimeEngine } from "./engine/createTimeEngine.js";
import type { Clock, Environment } from "./engine/now.js";
import { NOW_ENV_VAR } from "./engine/now.js";
import { UsageError } from "./errors.js";
import type { DayStart, TimeResult } from "./types.js";

/** Formats printed for every conversion, in order. */
export const CLI_OUTPUT_FORMATS = ["fits", "caldate", "date", "secs", "jd"] as const;

/** Options parsed from CLI arguments (after validation). */
export interface CliOptions {
  time?: string;
  format?: string;
  dayStart: DayStart;
}

export type ParseResult =
  | {
      kind: "help";
    }
  | {
      kind: "run";
      options: CliOptions;
    };

/**
 * Returns a help/usage string for the `convert-time` CLI.
 */
export function usage(): string {
  return [
    "Convert a time to the standard mission formats",
    "",
    "Usage:",
    "  convert-time [--day-start midnight|noon] [time] [format]",
    "",
    "Arguments:",
    "  time     Input time in any supported format (default: now)",
    "  format   Input format, when auto-detection would pick the wrong one",
    "",
    "Flags:",
    "  --day-start midnight|noon   Time of day for date-only inputs (default: midnight)",
    "",
    `Set ${NOW_ENV_VAR} to a literal time to override "now".`,
    "",
    "Exit codes:",
    "  0 = converted",
    "  1 = conversion failed",
    "  2 = usage error",
  ].join("\n");
}

// Negative and explicitly signed numbers (relday offsets) are values, not flags.
const SIGNED_NUMBER_RE = /^[+-](?:\d|\.\d)/;

/**
 * Parses raw CLI argv into a strongly-typed run or help request.
 */
export function parseCliArgs(rawArgv: readonly string[]): ParseResult {
  const positionals: string[] = [];
  let dayStart: DayStart = "midnight";
  let parsingFlags = true;

  for (let i = 0; i < rawArgv.length; i++) {
    const arg = rawArgv[i];
    if (arg === undefined) continue;

    if (!parsingFlags || !arg.startsWith("-") || SIGNED_NUMBER_RE.test(arg)) {
      positionals.push(arg);
      continue;
    }

    if (arg === "--") {
      parsingFlags = false;
      continue;
    }

    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    }

    if (arg === "--day-start") {
      const next = rawArgv[i + 1];
      if (next !== "midnight" && next !== "noon") {
        throw new UsageError("--day-start must be one of: midnight, noon");
      }
      dayStart = next;
      i++;
      continue;
    }

    throw new UsageError(`unknown flag: ${arg}`);
  }

  if (positionals.length > 2) {
    throw new UsageError(`unexpected positional arguments: ${positionals.slice(2).join(" ")}`);
  }

  const [time, format] = positionals;
  return {
    kind: "run",
    options: {
      dayStart,
      ...(time !== undefined ? { time } : {}),
      ...(format !== undefined ? { format } : {}),
    },
  };
}

/** IO dependencies for {@link main} (abstracted for testing). */
export interface MainIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Defaults to `process.env`. */
  env?: Environment;
  /** Defaults to the system clock. */
  clock?: Clock;
}

function printable(result: TimeResult): string {
  return typeof result === "number" ? formatFloat(result) : result;
}

/**
 * CLI entrypoint: converts one time and prints it in each of {@link CLI_OUTPUT_FORMATS}.
 */
export function main(rawArgv: readonly string[], io: MainIo): number {
  try {
    const parsed = parseCliArgs(rawArgv);

    if (parsed.kind === "help") {
      io.stdout.write(`${usage()}\n`);
      return 0;
    }

    const { time, format, dayStart } = parsed.options;
    const engine = createTimeEngine({
      dayStart,
      converter: createJsConverter({ onWarning: (message) => io.stderr.write(`warning: ${message}\n`) }),
      ...(io.env !== undefined ? { env: io.env } : {}),
      ...(io.clock !== undefined ? { clock: io.clock } : {}),
    });

    const handle = new DateTime(time, { engine, format });
    const lines = CLI_OUTPUT_FORMATS.map((name) => printable(handle.get(name)));

    io.stdout.write(`${lines.join("\n")}\n`);
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);

    if (err instanceof UsageError) {
      io.stderr.write(`error: ${message}\n\n${usage()}\n`);
      return 2;
    }

    io.stderr.write(`error: ${message}\n`);
    return 1;
  }
}

const isMain =
  process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url));

if (isMain) {
  process.exitCode = main(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
  });
}
