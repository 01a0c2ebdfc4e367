import { afterEach, describe, expect, it, vi } from "vitest";
import {
  UsageError,
  formatUsage,
  parseArgv,
  parseLogLevel,
  parseNonNegativeInt,
  usageFailure,
  type OptionSpec,
} from "./cli.js";

const SPECS: OptionSpec[] = [
  { long: "config", short: "c", metavar: "<file>", help: "config file" },
  { long: "dry-run", help: "do nothing" },
];

describe("parseArgv", () => {
  it("reads short and long options", () => {
    const parsed = parseArgv(["-c", "a.json", "--dry-run"], SPECS);

    expect(parsed.help).toBe(false);
    expect(parsed.values.get("config")).toBe("a.json");
    expect(parsed.flags.has("dry-run")).toBe(true);
  });

  it("accepts --name=value", () => {
    expect(parseArgv(["--config=b.json"], SPECS).values.get("config")).toBe("b.json");
  });

  it("lets the last occurrence win", () => {
    expect(parseArgv(["-c", "a.json", "--config", "b.json"], SPECS).values.get("config")).toBe("b.json");
  });

  it("recognizes -h and --help", () => {
    expect(parseArgv(["-h"], SPECS).help).toBe(true);
    expect(parseArgv(["--dry-run", "--help"], SPECS).help).toBe(true);
  });

  it("rejects unknown arguments", () => {
    expect(() => parseArgv(["-x"], SPECS)).toThrow(new UsageError("unrecognized argument: -x"));
  });

  it("rejects an option missing its value", () => {
    const expected = "argument -c, --config <file>: expected one argument";
    expect(() => parseArgv(["-c"], SPECS)).toThrow(expected);
    expect(() => parseArgv(["-c", "--dry-run"], SPECS)).toThrow(expected);
  });

  it("rejects a value given to a flag", () => {
    expect(() => parseArgv(["--dry-run=yes"], SPECS)).toThrow("argument --dry-run: ignored explicit argument 'yes'");
  });
});

describe("formatUsage", () => {
  it("lists every option under the synopsis", () => {
    const usage = formatUsage("tool", "Does things", [SPECS[0]]);

    expect(usage.split("\n")).toEqual([
      "usage: tool [-h] [-c <file>]",
      "",
      "Does things",
      "",
      "options:",
      "  -h, --help           show this help message and exit",
      "  -c, --config <file>  config file",
    ]);
  });
});

describe("parseNonNegativeInt", () => {
  it("parses digits", () => {
    expect(parseNonNegativeInt("0", "days")).toBe(0);
    expect(parseNonNegativeInt("12", "days")).toBe(12);
  });

  it("rejects anything else", () => {
    expect(() => parseNonNegativeInt("1.5", "days")).toThrow("argument --days: invalid non-negative integer: '1.5'");
    expect(() => parseNonNegativeInt("abc", "days")).toThrow(UsageError);
  });
});

describe("parseLogLevel", () => {
  it("falls back when unset or empty", () => {
    expect(parseLogLevel(undefined, "info")).toBe("info");
    expect(parseLogLevel("", "warn")).toBe("warn");
  });

  it("accepts known levels and rejects others", () => {
    expect(parseLogLevel("debug", "info")).toBe("debug");
    expect(() => parseLogLevel("loud", "info")).toThrow(
      "invalid log level: 'loud' (choose from debug, info, warn, error)"
    );
  });
});

describe("usageFailure", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints usage and the reason to stderr", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(usageFailure("usage: tool [-h]", "tool", "missing file")).toBe(1);
    expect(stderr).toHaveBeenCalledWith("usage: tool [-h]\n\ntool: error: missing file");
  });
});
