/**
 * YouTube playlist downloader
 */

export { YouTubeClient, type Playlist, type PlaylistItem } from "./api-client.js";
export { VideoDownloader, expandHome, spawnCommand, videoUrl, type CommandRunner, type Downloader } from "./download.js";
export { downloadPlaylist, type PlaylistDownloadOptions, type PlaylistDownloadResult, type PlaylistStore } from "./orchestrator.js";
export { parseYouTubeDownloadArgs, youtubeDownloadUsage, type YouTubeDownloadArgs } from "./args.js";
