/**
 * youtube-download command line
 */

import { formatUsage, parseArgv, parseLogLevel, type OptionSpec, type ParseResult } from "../../lib/cli.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "../../lib/logger.js";

export const PROGRAM = "youtube-download";

const DESCRIPTION = "Download YouTube videos that have been added to a particular playlist";

export const YOUTUBE_DOWNLOAD_OPTIONS: readonly OptionSpec[] = [
  { long: "config", short: "c", metavar: "<file>", help: "config file (default: google_oauth.json)" },
  { long: "playlist", short: "p", metavar: "<name>", help: "youtube playlist name to watch (default: Download)" },
  { long: "target", short: "t", metavar: "<folder>", help: "target folder (default: ~/Download)" },
  { long: "log", short: "l", metavar: "<file>", help: "log file (default: youtube_download.log)" },
  { long: "log-level", metavar: "<level>", help: `one of ${LOG_LEVEL_NAMES.join(", ")} (default: $PIM_LOG_LEVEL or info)` },
];

export interface YouTubeDownloadArgs {
  configFile: string;
  playlist: string;
  targetFolder: string;
  logFile: string;
  logLevel: LogLevel;
}

export function youtubeDownloadUsage(): string {
  return formatUsage(PROGRAM, DESCRIPTION, YOUTUBE_DOWNLOAD_OPTIONS);
}

export function parseYouTubeDownloadArgs(
  argv: readonly string[],
  env: Record<string, string | undefined> = {}
): ParseResult<YouTubeDownloadArgs> {
  const parsed = parseArgv(argv, YOUTUBE_DOWNLOAD_OPTIONS);
  if (parsed.help) {
    return { kind: "help" };
  }
  const { values } = parsed;
  return {
    kind: "run",
    args: {
      configFile: values.get("config") ?? "google_oauth.json",
      playlist: values.get("playlist") ?? "Download",
      targetFolder: values.get("target") ?? "~/Download",
      logFile: values.get("log") ?? "youtube_download.log",
      logLevel: parseLogLevel(values.get("log-level") ?? env.PIM_LOG_LEVEL, "info"),
    },
  };
}
