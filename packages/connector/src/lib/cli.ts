/**
 * Command-line plumbing shared by the tools
 *
 * Each tool declares its options once; the same list drives argv parsing
 * and the usage text. Exit codes: 0 on success (and for -h), 1 otherwise.
 */

import { describeError } from "./errors.js";
import { LOG_LEVEL_NAMES, isLogLevel, setupLogger, type LogLevel } from "./logger.js";

const logger = setupLogger("cli");

export interface OptionSpec {
  /** Long name without dashes, also the key in the parsed values */
  long: string;
  /** Single-letter alias without dash */
  short?: string;
  /** Present for options that take a value */
  metavar?: string;
  help: string;
}

export interface ParsedArgv {
  help: boolean;
  values: Map<string, string>;
  flags: Set<string>;
}

export type ParseResult<T> = { kind: "help" } | { kind: "run"; args: T };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const HELP_OPTION: OptionSpec = { long: "help", short: "h", help: "show this help message and exit" };

function optionLabel(option: OptionSpec): string {
  const names = option.short ? `-${option.short}, --${option.long}` : `--${option.long}`;
  return option.metavar ? `${names} ${option.metavar}` : names;
}

export function formatUsage(program: string, description: string, specs: readonly OptionSpec[]): string {
  const all = [HELP_OPTION, ...specs];
  const synopsis = all
    .map((option) => {
      const name = option.short ? `-${option.short}` : `--${option.long}`;
      return option.metavar ? `[${name} ${option.metavar}]` : `[${name}]`;
    })
    .join(" ");
  const width = Math.max(...all.map((option) => optionLabel(option).length)) + 2;
  const lines = all.map((option) => `  ${optionLabel(option).padEnd(width)}${option.help}`);
  return [`usage: ${program} ${synopsis}`, "", description, "", "options:", ...lines].join("\n");
}

export function parseArgv(argv: readonly string[], specs: readonly OptionSpec[]): ParsedArgv {
  const parsed: ParsedArgv = { help: false, values: new Map(), flags: new Set() };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      parsed.help = true;
      continue;
    }

    let name = arg;
    let inlineValue: string | undefined;
    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq > 0) {
      name = arg.slice(0, eq);
      inlineValue = arg.slice(eq + 1);
    }

    const option = specs.find((candidate) =>
      name.startsWith("--") ? name === `--${candidate.long}` : candidate.short !== undefined && name === `-${candidate.short}`
    );
    if (!option) {
      throw new UsageError(`unrecognized argument: ${arg}`);
    }

    if (!option.metavar) {
      if (inlineValue !== undefined) {
        throw new UsageError(`argument --${option.long}: ignored explicit argument '${inlineValue}'`);
      }
      parsed.flags.add(option.long);
      continue;
    }

    const value = inlineValue ?? argv[i + 1];
    if (value === undefined || (inlineValue === undefined && value.startsWith("-") && value.length > 1)) {
      throw new UsageError(`argument ${optionLabel(option)}: expected one argument`);
    }
    if (inlineValue === undefined) {
      i++;
    }
    parsed.values.set(option.long, value);
  }

  return parsed;
}

export function parseNonNegativeInt(value: string, option: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`argument --${option}: invalid non-negative integer: '${value}'`);
  }
  return parseInt(value, 10);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === undefined || value === "") {
    return fallback;
  }
  if (!isLogLevel(value)) {
    throw new UsageError(`invalid log level: '${value}' (choose from ${LOG_LEVEL_NAMES.join(", ")})`);
  }
  return value;
}

/**
 * Print usage plus the reason to stderr; returns the exit code for a usage failure.
 */
export function usageFailure(usage: string, program: string, reason: string): number {
  console.error(`${usage}\n\n${program}: error: ${reason}`);
  return 1;
}

/**
 * Run a tool's main function and exit with its code. Errors are logged and exit 1.
 */
export async function runCli(main: () => Promise<number>): Promise<void> {
  let code: number;
  try {
    code = await main();
  } catch (error) {
    logger.error(describeError(error));
    code = 1;
  }
  process.exit(code);
}
