/**
 * calendar-sync command line
 */

import {
  UsageError,
  formatUsage,
  parseArgv,
  parseLogLevel,
  parseNonNegativeInt,
  type OptionSpec,
  type ParseResult,
} from "../../lib/cli.js";
import { DataError } from "../../lib/errors.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "../../lib/logger.js";
import { isValidTimeZone, localTimeZone } from "../../lib/time.js";
import { parseFieldList } from "./reconcile.js";
import type { EventField } from "./types.js";
import { DEFAULT_FUTURE_DAYS, DEFAULT_PAST_DAYS } from "./window.js";

export const PROGRAM = "calendar-sync";

const DESCRIPTION = "One-way synchronization of calendars (from Office 365 to Google)";

export const CALENDAR_SYNC_OPTIONS: readonly OptionSpec[] = [
  { long: "exchange", short: "e", metavar: "<file>", help: "Exchange (Office 365) config file (default: o365_oauth.json)" },
  { long: "source", short: "s", metavar: "<name>", help: "source calendar name (default: Calendar)" },
  { long: "google", short: "g", metavar: "<file>", help: "Google config file (default: google_oauth.json)" },
  { long: "target", short: "t", metavar: "<name>", help: "target calendar name (default: primary)" },
  { long: "log", short: "l", metavar: "<file>", help: "log file (default: calendar_sync.log)" },
  { long: "past-days", metavar: "N", help: `days before today to synchronize (default: ${DEFAULT_PAST_DAYS})` },
  { long: "future-days", metavar: "N", help: `days after today to synchronize (default: ${DEFAULT_FUTURE_DAYS})` },
  { long: "timezone", metavar: "<tz>", help: "IANA time zone for all-day events (default: $PIM_TIMEZONE or local)" },
  { long: "compare", metavar: "<fields>", help: "comma-separated fields compared for updates (default: all)" },
  { long: "dry-run", help: "log the planned changes without writing" },
  { long: "log-level", metavar: "<level>", help: `one of ${LOG_LEVEL_NAMES.join(", ")} (default: $PIM_LOG_LEVEL or info)` },
];

export interface CalendarSyncArgs {
  exchangeConfig: string;
  sourceCalendar: string;
  googleConfig: string;
  targetCalendar: string;
  logFile: string;
  pastDays: number;
  futureDays: number;
  timeZone: string;
  /** Unset means every field */
  fields?: EventField[];
  dryRun: boolean;
  logLevel: LogLevel;
}

export function calendarSyncUsage(): string {
  return formatUsage(PROGRAM, DESCRIPTION, CALENDAR_SYNC_OPTIONS);
}

export function parseCalendarSyncArgs(
  argv: readonly string[],
  env: Record<string, string | undefined> = {}
): ParseResult<CalendarSyncArgs> {
  const parsed = parseArgv(argv, CALENDAR_SYNC_OPTIONS);
  if (parsed.help) {
    return { kind: "help" };
  }
  const { values } = parsed;

  const timeZone = values.get("timezone") ?? (env.PIM_TIMEZONE || localTimeZone());
  if (!isValidTimeZone(timeZone)) {
    throw new UsageError(`unknown time zone: '${timeZone}'`);
  }

  let fields: EventField[] | undefined;
  const compare = values.get("compare");
  if (compare !== undefined) {
    try {
      fields = parseFieldList(compare);
    } catch (error) {
      if (error instanceof DataError) {
        throw new UsageError(`argument --compare: ${error.message}`);
      }
      throw error;
    }
  }

  const pastDays = values.get("past-days");
  const futureDays = values.get("future-days");

  return {
    kind: "run",
    args: {
      exchangeConfig: values.get("exchange") ?? "o365_oauth.json",
      sourceCalendar: values.get("source") ?? "Calendar",
      googleConfig: values.get("google") ?? "google_oauth.json",
      targetCalendar: values.get("target") ?? "primary",
      logFile: values.get("log") ?? "calendar_sync.log",
      pastDays: pastDays === undefined ? DEFAULT_PAST_DAYS : parseNonNegativeInt(pastDays, "past-days"),
      futureDays: futureDays === undefined ? DEFAULT_FUTURE_DAYS : parseNonNegativeInt(futureDays, "future-days"),
      timeZone,
      fields,
      dryRun: parsed.flags.has("dry-run"),
      logLevel: parseLogLevel(values.get("log-level") ?? env.PIM_LOG_LEVEL, "info"),
    },
  };
}
