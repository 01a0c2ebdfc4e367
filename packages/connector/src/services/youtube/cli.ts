#!/usr/bin/env npx tsx
/**
 * YouTube Playlist Download CLI
 *
 * Usage:
 *   npx tsx src/services/youtube/cli.ts [-c google_oauth.json] [-p Download] [-t ~/Download]
 *     [-l youtube_download.log] [--log-level debug|info|warn|error]
 */

import { existsSync, statSync } from "node:fs";
import { config } from "dotenv";
import { UsageError, runCli, usageFailure } from "../../lib/cli.js";
import { HttpClient } from "../../lib/http.js";
import { setLogFile, setLogLevel } from "../../lib/logger.js";
import { GoogleCredentials, YOUTUBE_SCOPE, openGoogleConfig } from "../google/auth.js";
import { YouTubeClient } from "./api-client.js";
import { PROGRAM, parseYouTubeDownloadArgs, youtubeDownloadUsage, type YouTubeDownloadArgs } from "./args.js";
import { VideoDownloader, expandHome } from "./download.js";
import { downloadPlaylist } from "./orchestrator.js";

async function main(): Promise<number> {
  config();

  let args: YouTubeDownloadArgs;
  try {
    const parsed = parseYouTubeDownloadArgs(process.argv.slice(2), process.env);
    if (parsed.kind === "help") {
      console.log(youtubeDownloadUsage());
      return 0;
    }
    args = parsed.args;
  } catch (error) {
    if (error instanceof UsageError) {
      return usageFailure(youtubeDownloadUsage(), PROGRAM, error.message);
    }
    throw error;
  }

  const googleConfig = openGoogleConfig(args.configFile);
  if (!googleConfig.exists()) {
    return usageFailure(youtubeDownloadUsage(), PROGRAM, `No such config file: ${args.configFile}`);
  }
  const targetFolder = expandHome(args.targetFolder);
  if (!existsSync(targetFolder) || !statSync(targetFolder).isDirectory()) {
    return usageFailure(youtubeDownloadUsage(), PROGRAM, `No such target folder: ${args.targetFolder}`);
  }

  setLogLevel(args.logLevel);
  setLogFile(args.logFile);

  const http = new HttpClient();
  await downloadPlaylist({
    playlists: new YouTubeClient(new GoogleCredentials(googleConfig, http, [YOUTUBE_SCOPE]), http),
    downloader: new VideoDownloader(targetFolder),
    playlistTitle: args.playlist,
  });
  return 0;
}

await runCli(main);
