/**
 * @pim-tools/connector
 *
 * Personal information management tools:
 * one-way Exchange to Google calendar sync, OAuth helpers for both
 * providers, and a playlist-triggered video downloader.
 */

// Re-export services as namespaces to avoid conflicts
export * as calendarSync from "./services/calendar-sync/index.js";
export * as exchange from "./services/exchange/index.js";
export * as google from "./services/google/index.js";
export * as googleCalendar from "./services/google-calendar/index.js";
export * as youtube from "./services/youtube/index.js";

// Re-export lib utilities
export * from "./lib/config-file.js";
export * from "./lib/credentials.js";
export * from "./lib/errors.js";
export * from "./lib/http.js";
export * from "./lib/logger.js";
export * from "./lib/retry.js";
