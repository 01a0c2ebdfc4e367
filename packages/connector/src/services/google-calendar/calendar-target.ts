/**
 * Google calendar as a sync target
 *
 * Reads only the events carrying this tool's marker and applies the
 * create / update / delete operations decided by the reconciler.
 *
 * Writes are not retried after an ambiguous failure: a create that timed out
 * may have landed, so the run fails and the next run re-reads the calendar.
 */

import { ApiError, WriteConflictError } from "../../lib/errors.js";
import { setupLogger } from "../../lib/logger.js";
import type { CalendarEvent, SyncWindow, TargetCalendar, TargetEvent } from "../calendar-sync/types.js";
import { isInWindow } from "../calendar-sync/window.js";
import type { DeleteOutcome, GoogleCalendarClient } from "./api-client.js";
import { DEFAULT_MARKER_KEY, fromGoogleEvent, toGoogleEventInput } from "./mapping.js";

const logger = setupLogger("gcal-target");

export interface GoogleCalendarTargetOptions {
  timeZone: string;
  markerKey?: string;
}

function rethrowConflict(error: unknown, eventId: string): never {
  if (error instanceof ApiError && error.statusCode === 412) {
    throw new WriteConflictError(eventId, `Google event ${eventId} was changed by someone else since it was read`);
  }
  throw error;
}

export class GoogleCalendarTarget implements TargetCalendar {
  private readonly client: GoogleCalendarClient;
  private readonly calendarName: string;
  private readonly timeZone: string;
  private readonly markerKey: string;
  private calendarId: string | null = null;

  constructor(client: GoogleCalendarClient, calendarName: string, options: GoogleCalendarTargetOptions) {
    this.client = client;
    this.calendarName = calendarName;
    this.timeZone = options.timeZone;
    this.markerKey = options.markerKey ?? DEFAULT_MARKER_KEY;
  }

  private async resolveCalendarId(): Promise<string> {
    if (this.calendarId === null) {
      this.calendarId = (await this.client.findCalendarByName(this.calendarName)).id;
    }
    return this.calendarId;
  }

  async list(window: SyncWindow): Promise<TargetEvent[]> {
    const startTime = performance.now();
    const calendarId = await this.resolveCalendarId();
    const events = await this.client.listEvents(calendarId, window.start, window.end);

    const managed: TargetEvent[] = [];
    for (const event of events) {
      const mapped = fromGoogleEvent(event, this.markerKey, this.timeZone);
      if (mapped !== null && isInWindow(mapped.start, window)) {
        managed.push(mapped);
      }
    }

    const elapsed = Math.round((performance.now() - startTime) / 10) / 100;
    logger.info(
      `Fetched ${events.length} events from Google calendar "${this.calendarName}", ${managed.length} managed (${elapsed}s)`
    );
    return managed;
  }

  async create(event: CalendarEvent): Promise<TargetEvent> {
    const calendarId = await this.resolveCalendarId();
    const created = await this.client.insertEvent(calendarId, toGoogleEventInput(event, this.markerKey, this.timeZone));
    logger.debug(`Event created: ${event.title}, ${event.start.toISOString()} (${created.htmlLink ?? created.id})`);
    return { ...event, id: created.id, etag: created.etag };
  }

  async update(id: string, event: CalendarEvent, etag?: string): Promise<void> {
    const calendarId = await this.resolveCalendarId();
    try {
      await this.client.updateEvent(calendarId, id, toGoogleEventInput(event, this.markerKey, this.timeZone), etag);
    } catch (error) {
      rethrowConflict(error, id);
    }
    logger.debug(`Event updated: ${event.title}, ${event.start.toISOString()}`);
  }

  async delete(id: string, etag?: string): Promise<void> {
    const calendarId = await this.resolveCalendarId();
    let outcome: DeleteOutcome;
    try {
      outcome = await this.client.deleteEvent(calendarId, id, etag);
    } catch (error) {
      rethrowConflict(error, id);
    }
    if (outcome === "missing") {
      logger.warn(`Event ${id} was already deleted`);
    } else {
      logger.debug(`Event deleted: ${id}`);
    }
  }
}
