/**
 * YouTube Data API Client
 *
 * The three calls the playlist downloader needs: find one of the user's
 * playlists by title, list its items, delete an item.
 */

import { z } from "zod";
import { withAccessToken, type CredentialProvider } from "../../lib/credentials.js";
import { ApiError, DataError } from "../../lib/errors.js";
import type { HttpClient, HttpMethod, RequestOptions } from "../../lib/http.js";
import { setupLogger } from "../../lib/logger.js";
import { parseWith } from "../../lib/schema.js";

const logger = setupLogger("youtube-api");

export const YOUTUBE_API_BASE = "https://www.googleapis.com/youtube/v3";
const MAX_RESULTS_PER_PAGE = 50;

// Types
const playlistSchema = z.object({
  id: z.string(),
  snippet: z.object({ title: z.string() }),
});

export type Playlist = z.infer<typeof playlistSchema>;

const playlistListSchema = z.object({
  items: z.array(playlistSchema).default([]),
  nextPageToken: z.string().optional(),
});

const playlistItemSchema = z.object({
  id: z.string(),
  snippet: z.object({
    title: z.string().default(""),
    resourceId: z.object({ videoId: z.string().min(1) }),
  }),
});

export type PlaylistItem = z.infer<typeof playlistItemSchema>;

const playlistItemListSchema = z.object({
  items: z.array(playlistItemSchema).default([]),
  nextPageToken: z.string().optional(),
});

export class YouTubeClient {
  private readonly credentials: CredentialProvider;
  private readonly http: HttpClient;
  private readonly baseUrl: string;

  constructor(credentials: CredentialProvider, http: HttpClient, baseUrl: string = YOUTUBE_API_BASE) {
    this.credentials = credentials;
    this.http = http;
    this.baseUrl = baseUrl;
  }

  private async call(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    return withAccessToken(
      this.credentials,
      (token) =>
        this.http.requestJson(method, `${this.baseUrl}${path}`, {
          ...options,
          headers: { Authorization: `Bearer ${token}`, ...options.headers },
        }),
      (error) => error instanceof ApiError && error.statusCode === 401
    );
  }

  /**
   * First playlist of the authenticated user titled `title`.
   */
  async findPlaylistByTitle(title: string): Promise<Playlist> {
    let pageToken: string | undefined;
    do {
      const data = await this.call("GET", "/playlists", {
        query: { part: "snippet,contentDetails", mine: true, maxResults: MAX_RESULTS_PER_PAGE, pageToken },
      });
      const page = parseWith(playlistListSchema, data, "playlists.list response");
      const playlist = page.items.find((item) => item.snippet.title === title);
      if (playlist) {
        logger.debug(`Resolved playlist "${title}" -> ${playlist.id}`);
        return playlist;
      }
      pageToken = page.nextPageToken;
    } while (pageToken);
    throw new DataError(`No such playlist: ${title}`);
  }

  async listPlaylistItems(playlistId: string): Promise<PlaylistItem[]> {
    const items: PlaylistItem[] = [];
    let pageToken: string | undefined;
    do {
      const data = await this.call("GET", "/playlistItems", {
        query: { part: "snippet,contentDetails", playlistId, maxResults: MAX_RESULTS_PER_PAGE, pageToken },
      });
      const page = parseWith(playlistItemListSchema, data, "playlistItems.list response");
      items.push(...page.items);
      pageToken = page.nextPageToken;
    } while (pageToken);
    logger.debug(`Fetched ${items.length} playlist items`);
    return items;
  }

  async deletePlaylistItem(itemId: string): Promise<void> {
    await this.call("DELETE", "/playlistItems", { query: { id: itemId } });
  }
}
