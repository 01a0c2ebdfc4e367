/**
 * Google Calendar API Client
 *
 * Typed calls to the Calendar v3 REST API. Handles pagination for
 * calendarList.list and events.list, and replays a call once after a 401
 * with a freshly refreshed token.
 *
 * Writes send the event ETag in If-Match so a concurrent change is refused
 * by Google (HTTP 412) instead of being overwritten.
 */

import { z } from "zod";
import { withAccessToken, type CredentialProvider } from "../../lib/credentials.js";
import { ApiError, DataError } from "../../lib/errors.js";
import type { HttpClient, HttpMethod, RequestOptions } from "../../lib/http.js";
import { setupLogger } from "../../lib/logger.js";
import { parseWith } from "../../lib/schema.js";

const logger = setupLogger("gcal-api");

export const CALENDAR_API_BASE = "https://www.googleapis.com/calendar/v3";
const MAX_RESULTS_PER_PAGE = 2500;

// Types
const eventDateTimeSchema = z.object({
  dateTime: z.string().optional(),
  date: z.string().optional(),
  timeZone: z.string().optional(),
});

export const googleEventSchema = z
  .object({
    id: z.string(),
    etag: z.string().optional(),
    status: z.string().optional(),
    summary: z.string().optional(),
    description: z.string().optional(),
    location: z.string().optional(),
    htmlLink: z.string().optional(),
    start: eventDateTimeSchema.optional(),
    end: eventDateTimeSchema.optional(),
    extendedProperties: z
      .object({
        private: z.record(z.string()).optional(),
        shared: z.record(z.string()).optional(),
      })
      .optional(),
  })
  .passthrough();

export type GoogleEvent = z.infer<typeof googleEventSchema>;

export type EventDateTime = z.infer<typeof eventDateTimeSchema>;

const eventListSchema = z.object({
  items: z.array(googleEventSchema).default([]),
  nextPageToken: z.string().optional(),
});

const calendarListEntrySchema = z.object({
  id: z.string(),
  summary: z.string().optional(),
  summaryOverride: z.string().optional(),
  primary: z.boolean().optional(),
});

export type CalendarListEntry = z.infer<typeof calendarListEntrySchema>;

const calendarListSchema = z.object({
  items: z.array(calendarListEntrySchema).default([]),
  nextPageToken: z.string().optional(),
});

export interface GoogleEventInput {
  summary: string;
  description?: string;
  location?: string;
  start: EventDateTime;
  end: EventDateTime;
  extendedProperties: { private: Record<string, string> };
}

export type DeleteOutcome = "deleted" | "missing";

export function isUnauthorized(error: unknown): boolean {
  return error instanceof ApiError && error.statusCode === 401;
}

export class GoogleCalendarClient {
  private readonly credentials: CredentialProvider;
  private readonly http: HttpClient;
  private readonly baseUrl: string;

  constructor(credentials: CredentialProvider, http: HttpClient, baseUrl: string = CALENDAR_API_BASE) {
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
      isUnauthorized
    );
  }

  async listCalendars(): Promise<CalendarListEntry[]> {
    const calendars: CalendarListEntry[] = [];
    let pageToken: string | undefined;
    do {
      const data = await this.call("GET", "/users/me/calendarList", { query: { pageToken } });
      const page = parseWith(calendarListSchema, data, "calendarList response");
      calendars.push(...page.items);
      pageToken = page.nextPageToken;
    } while (pageToken);
    return calendars;
  }

  /**
   * Match on summary, the user's summaryOverride, or "primary" for the primary calendar.
   */
  async findCalendarByName(name: string): Promise<CalendarListEntry> {
    const calendars = await this.listCalendars();
    const calendar = calendars.find(
      (entry) =>
        entry.summary === name || entry.summaryOverride === name || (name === "primary" && entry.primary === true)
    );
    if (!calendar) {
      throw new DataError(`No such Google calendar: ${name}`);
    }
    logger.debug(`Resolved Google calendar "${name}" -> ${calendar.id}`);
    return calendar;
  }

  /**
   * Expanded (single) events overlapping [timeMin, timeMax), all pages.
   */
  async listEvents(calendarId: string, timeMin: Date, timeMax: Date): Promise<GoogleEvent[]> {
    const events: GoogleEvent[] = [];
    let pageToken: string | undefined;
    let pages = 0;
    do {
      const data = await this.call("GET", `/calendars/${encodeURIComponent(calendarId)}/events`, {
        query: {
          timeMin: timeMin.toISOString(),
          timeMax: timeMax.toISOString(),
          singleEvents: true,
          maxResults: MAX_RESULTS_PER_PAGE,
          pageToken,
        },
      });
      const page = parseWith(eventListSchema, data, "events.list response");
      events.push(...page.items);
      pageToken = page.nextPageToken;
      pages++;
    } while (pageToken);
    logger.debug(`Fetched ${events.length} events in ${pages} page(s)`);
    return events;
  }

  async insertEvent(calendarId: string, event: GoogleEventInput): Promise<GoogleEvent> {
    const data = await this.call("POST", `/calendars/${encodeURIComponent(calendarId)}/events`, {
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(event),
      query: { sendUpdates: "none" },
    });
    return parseWith(googleEventSchema, data, "events.insert response");
  }

  async updateEvent(calendarId: string, eventId: string, event: GoogleEventInput, etag?: string): Promise<GoogleEvent> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (etag) {
      headers["If-Match"] = etag;
    }
    const data = await this.call(
      "PUT",
      `/calendars/${encodeURIComponent(calendarId)}/events/${encodeURIComponent(eventId)}`,
      { headers, body: JSON.stringify(event), query: { sendUpdates: "none" } }
    );
    return parseWith(googleEventSchema, data, "events.update response");
  }

  /**
   * Delete an event; an event that is already gone (404/410) is reported as "missing".
   */
  async deleteEvent(calendarId: string, eventId: string, etag?: string): Promise<DeleteOutcome> {
    const headers: Record<string, string> = {};
    if (etag) {
      headers["If-Match"] = etag;
    }
    try {
      await this.call("DELETE", `/calendars/${encodeURIComponent(calendarId)}/events/${encodeURIComponent(eventId)}`, {
        headers,
        query: { sendUpdates: "none" },
      });
      return "deleted";
    } catch (error) {
      if (error instanceof ApiError && (error.statusCode === 404 || error.statusCode === 410)) {
        return "missing";
      }
      throw error;
    }
  }
}
