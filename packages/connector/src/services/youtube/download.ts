/**
 * Video download through yt-dlp
 *
 * The command runs in the target folder, so yt-dlp's default output template
 * decides the file name. Its output is discarded; only stderr is kept for the
 * error message when it fails.
 */

import { spawn } from "node:child_process";
import { homedir } from "node:os";
import { join } from "node:path";
import { CommandError } from "../../lib/errors.js";
import { setupLogger } from "../../lib/logger.js";

const logger = setupLogger("youtube-download");

export const DOWNLOAD_COMMAND = "yt-dlp";
/** Prefer mp4 video with m4a audio */
export const DOWNLOAD_ARGS: readonly string[] = ["-S", "ext:mp4:m4a"];

export type CommandRunner = (command: string, args: readonly string[], cwd: string) => Promise<void>;

export interface Downloader {
  download(videoId: string): Promise<void>;
}

export function videoUrl(videoId: string): string {
  return `https://youtu.be/${videoId}`;
}

/**
 * Expand a leading "~" to the user's home directory.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") {
    return home;
  }
  if (path.startsWith("~/")) {
    return join(home, path.slice(2));
  }
  return path;
}

export function spawnCommand(command: string, args: readonly string[], cwd: string): Promise<void> {
  const commandLine = [command, ...args].join(" ");
  const child = spawn(command, args, { cwd, stdio: ["ignore", "ignore", "pipe"] });

  return new Promise<void>((resolve, reject) => {
    let stderr = "";
    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("close", (code) => {
      if (code === 0) {
        resolve();
        return;
      }
      const lastLine = stderr.trim().split("\n").pop() ?? "";
      reject(
        new CommandError(
          commandLine,
          code,
          `${command} exited with code ${code}${lastLine ? `: ${lastLine}` : ""}`
        )
      );
    });

    child.on("error", (error) => {
      reject(new CommandError(commandLine, null, `Cannot run ${command}: ${error.message}`, { cause: error }));
    });
  });
}

export class VideoDownloader implements Downloader {
  private readonly targetFolder: string;
  private readonly run: CommandRunner;

  constructor(targetFolder: string, run: CommandRunner = spawnCommand) {
    this.targetFolder = expandHome(targetFolder);
    this.run = run;
  }

  async download(videoId: string): Promise<void> {
    const args = [...DOWNLOAD_ARGS, videoUrl(videoId)];
    logger.debug(`Performing command: ${[DOWNLOAD_COMMAND, ...args].join(" ")} (in ${this.targetFolder})`);
    const startTime = performance.now();
    await this.run(DOWNLOAD_COMMAND, args, this.targetFolder);
    const elapsed = Math.round((performance.now() - startTime) / 10) / 100;
    logger.info(`Downloaded ${videoUrl(videoId)} (${elapsed}s)`);
  }
}
