/**
 * Playlist Download Orchestrator
 *
 * Drains a playlist: each item is downloaded, then removed from the playlist.
 * The first failed download stops the run and leaves that item (and every
 * later one) on the playlist for the next run.
 */

import { describeError } from "../../lib/errors.js";
import { setupLogger } from "../../lib/logger.js";
import type { Playlist, PlaylistItem } from "./api-client.js";
import type { Downloader } from "./download.js";

const logger = setupLogger("youtube");

// Types
export interface PlaylistStore {
  findPlaylistByTitle(title: string): Promise<Playlist>;
  listPlaylistItems(playlistId: string): Promise<PlaylistItem[]>;
  deletePlaylistItem(itemId: string): Promise<void>;
}

export interface PlaylistDownloadOptions {
  playlists: PlaylistStore;
  downloader: Downloader;
  playlistTitle: string;
}

export interface PlaylistDownloadResult {
  downloaded: number;
  elapsedSeconds: number;
}

export async function downloadPlaylist(options: PlaylistDownloadOptions): Promise<PlaylistDownloadResult> {
  const { playlists, downloader, playlistTitle } = options;
  const startTime = performance.now();
  logger.info(`Starting download of playlist "${playlistTitle}"`);

  try {
    const playlist = await playlists.findPlaylistByTitle(playlistTitle);
    const items = await playlists.listPlaylistItems(playlist.id);

    let downloaded = 0;
    for (const item of items) {
      const videoId = item.snippet.resourceId.videoId;
      await downloader.download(videoId);
      await playlists.deletePlaylistItem(item.id);
      logger.debug(`Deleted playlist item: ${item.snippet.title} (${videoId})`);
      downloaded++;
    }

    const elapsedSeconds = Math.round((performance.now() - startTime) / 10) / 100;
    logger.info(`Playlist download completed in ${elapsedSeconds}s: ${downloaded} video(s)`);
    return { downloaded, elapsedSeconds };
  } catch (error) {
    const elapsed = Math.round((performance.now() - startTime) / 10) / 100;
    logger.error(`Playlist download failed after ${elapsed}s: ${describeError(error)}`);
    throw error;
  }
}
