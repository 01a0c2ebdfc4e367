#!/usr/bin/env npx tsx
/**
 * Calendar Sync CLI
 *
 * Usage:
 *   npx tsx src/services/calendar-sync/cli.ts [-e o365_oauth.json] [-s Calendar] [-g google_oauth.json] [-t primary]
 *     [-l calendar_sync.log] [--past-days 7] [--future-days 28] [--timezone Europe/Budapest]
 *     [--compare title,start,end] [--dry-run] [--log-level debug|info|warn|error]
 */

import { config } from "dotenv";
import { UsageError, runCli, usageFailure } from "../../lib/cli.js";
import { HttpClient } from "../../lib/http.js";
import { setLogFile, setLogLevel } from "../../lib/logger.js";
import { ExchangeClient } from "../exchange/api-client.js";
import { ExchangeCredentials, openExchangeConfig } from "../exchange/auth.js";
import { ExchangeCalendarSource } from "../exchange/calendar-source.js";
import { CALENDAR_SCOPE, GoogleCredentials, openGoogleConfig } from "../google/auth.js";
import { GoogleCalendarClient } from "../google-calendar/api-client.js";
import { GoogleCalendarTarget } from "../google-calendar/calendar-target.js";
import { PROGRAM, calendarSyncUsage, parseCalendarSyncArgs, type CalendarSyncArgs } from "./args.js";
import { syncCalendars } from "./orchestrator.js";
import { buildSyncWindow } from "./window.js";

async function main(): Promise<number> {
  config();

  let args: CalendarSyncArgs;
  try {
    const parsed = parseCalendarSyncArgs(process.argv.slice(2), process.env);
    if (parsed.kind === "help") {
      console.log(calendarSyncUsage());
      return 0;
    }
    args = parsed.args;
  } catch (error) {
    if (error instanceof UsageError) {
      return usageFailure(calendarSyncUsage(), PROGRAM, error.message);
    }
    throw error;
  }

  const exchangeConfig = openExchangeConfig(args.exchangeConfig);
  if (!exchangeConfig.exists()) {
    return usageFailure(calendarSyncUsage(), PROGRAM, `Exchange config file not found: ${args.exchangeConfig}`);
  }
  const googleConfig = openGoogleConfig(args.googleConfig);
  if (!googleConfig.exists()) {
    return usageFailure(calendarSyncUsage(), PROGRAM, `Google config file not found: ${args.googleConfig}`);
  }

  setLogLevel(args.logLevel);
  setLogFile(args.logFile);

  const http = new HttpClient();
  const exchange = new ExchangeClient({
    credentials: new ExchangeCredentials(exchangeConfig, http),
    http,
    emailAddress: exchangeConfig.load().email_address,
  });
  const google = new GoogleCalendarClient(new GoogleCredentials(googleConfig, http, [CALENDAR_SCOPE]), http);

  await syncCalendars({
    source: new ExchangeCalendarSource(exchange, args.sourceCalendar, args.timeZone),
    target: new GoogleCalendarTarget(google, args.targetCalendar, { timeZone: args.timeZone }),
    window: buildSyncWindow(new Date(), args.pastDays, args.futureDays),
    fields: args.fields,
    dryRun: args.dryRun,
  });
  return 0;
}

await runCli(main);
