#!/usr/bin/env npx tsx
/**
 * Google OAuth CLI
 *
 * Obtains a refresh token for the scopes listed in the config file
 * (calendar by default; add the YouTube scope for youtube-download).
 *
 * Usage:
 *   npx tsx src/services/google/oauth-cli.ts [-c google_oauth.json]
 */

import { config } from "dotenv";
import { UsageError, runCli, usageFailure } from "../../lib/cli.js";
import { HttpClient } from "../../lib/http.js";
import { oauthUsage, parseOAuthArgs, runAuthorizationFlow, type OAuthArgs } from "../../lib/oauth-flow.js";
import { GoogleCredentials, authorizationUrl, openGoogleConfig } from "./auth.js";

const PROGRAM = "google-oauth";
const DEFAULT_CONFIG = "google_oauth.json";
const usage = (): string => oauthUsage(PROGRAM, "Google OAuth authorization", DEFAULT_CONFIG);

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

  const configFile = openGoogleConfig(args.configFile);
  if (!configFile.exists()) {
    return usageFailure(usage(), PROGRAM, `No such config file: ${args.configFile}`);
  }

  const credentials = new GoogleCredentials(configFile, new HttpClient());
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
