#!/usr/bin/env npx tsx
/**
 * Office 365 OAuth CLI
 *
 * Obtains the first refresh token for calendar-sync.
 *
 * Usage:
 *   npx tsx src/services/exchange/oauth-cli.ts [-c o365_oauth.json]
 */

import { config } from "dotenv";
import { UsageError, runCli, usageFailure } from "../../lib/cli.js";
import { HttpClient } from "../../lib/http.js";
import { oauthUsage, parseOAuthArgs, runAuthorizationFlow, type OAuthArgs } from "../../lib/oauth-flow.js";
import { ExchangeCredentials, authorizationUrl, openExchangeConfig } from "./auth.js";

const PROGRAM = "exchange-oauth";
const DEFAULT_CONFIG = "o365_oauth.json";
const usage = (): string => oauthUsage(PROGRAM, "Office 365 (Exchange Online) OAuth authorization", DEFAULT_CONFIG);

async function main(): Promise<number> {
  config();

  let args: OAuthArgs;
  try {
    const parsed = parseOAuthArgs(process.argv.slice(2), DEFAULT_CONFIG);
    if (parsed.kind === "help") {
      console.log(usage());
      return 0;
    }
    args = parsed.args;
  } catch (error) {
    if (error instanceof UsageError) {
      return usageFailure(usage(), PROGRAM, error.message);
    }
    throw error;
  }

  const configFile = openExchangeConfig(args.configFile);
  if (!configFile.exists()) {
    return usageFailure(usage(), PROGRAM, `No such config file: ${args.configFile}`);
  }

  const credentials = new ExchangeCredentials(configFile, new HttpClient());
  await runAuthorizationFlow(
    {
      authorizationUrl: authorizationUrl(configFile.load()),
      exchangeCode: (code) => credentials.exchangeCode(code),
    },
    args.configFile
  );
  return 0;
}

await runCli(main);
