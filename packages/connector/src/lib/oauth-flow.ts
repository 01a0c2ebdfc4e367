/**
 * Interactive authorization-code flow
 *
 * Used once per account to obtain the first refresh token: the user opens
 * the printed URL, grants access, and pastes back the URL the browser was
 * redirected to. The code in it is exchanged for tokens, which the
 * credential provider stores in the config file.
 */

import { createInterface } from "node:readline/promises";
import { formatUsage, parseArgv, type OptionSpec, type ParseResult } from "./cli.js";
import { extractAuthorizationCode } from "./credentials.js";
import { setupLogger } from "./logger.js";

const logger = setupLogger("oauth");

export type Prompt = (question: string) => Promise<string>;

export interface AuthorizationCodeFlow {
  /** Where the user grants access */
  authorizationUrl: string;
  /** Redeem the code and persist the refresh token */
  exchangeCode(code: string): Promise<unknown>;
}

export interface OAuthArgs {
  configFile: string;
}

function oauthOptions(defaultConfig: string): OptionSpec[] {
  return [{ long: "config", short: "c", metavar: "<file>", help: `config file (default: ${defaultConfig})` }];
}

export function oauthUsage(program: string, description: string, defaultConfig: string): string {
  return formatUsage(program, description, oauthOptions(defaultConfig));
}

export function parseOAuthArgs(argv: readonly string[], defaultConfig: string): ParseResult<OAuthArgs> {
  const parsed = parseArgv(argv, oauthOptions(defaultConfig));
  if (parsed.help) {
    return { kind: "help" };
  }
  return { kind: "run", args: { configFile: parsed.values.get("config") ?? defaultConfig } };
}

export const promptLine: Prompt = async (question) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
};

export async function runAuthorizationFlow(
  flow: AuthorizationCodeFlow,
  configFile: string,
  prompt: Prompt = promptLine
): Promise<void> {
  console.log(`Open this URL in a browser and grant access:\n\n${flow.authorizationUrl}\n`);
  const redirectUrl = await prompt("Paste the URL you were redirected to: ");
  await flow.exchangeCode(extractAuthorizationCode(redirectUrl));
  logger.info(`Refresh token saved to ${configFile}`);
}
