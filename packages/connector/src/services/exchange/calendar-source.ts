/**
 * Exchange calendar as a sync source
 *
 * Lists the occurrences of one named calendar within a window and maps them
 * to provider-neutral events keyed by their EWS ItemId.
 */

import { setupLogger } from "../../lib/logger.js";
import { formatZonedDate, zonedMidnight } from "../../lib/time.js";
import { normalizeOptionalText } from "../calendar-sync/normalize.js";
import type { CalendarEvent, SourceReader, SyncWindow } from "../calendar-sync/types.js";
import { isInWindow } from "../calendar-sync/window.js";
import type { ExchangeClient } from "./api-client.js";
import type { EwsCalendarItem } from "./ews-xml.js";

const logger = setupLogger("ews-calendar");

const HALF_DAY_MS = 12 * 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Calendar date of an all-day boundary. The boundary is midnight in the
 * organizer's zone, expressed in UTC; the zone offset that lands it on a
 * midnight names the date. Without zone data, take the date half a day later.
 */
function allDayDate(value: string, zoneOffsets: readonly number[], timeZone: string): string {
  const instant = new Date(value).getTime();
  for (const offset of zoneOffsets) {
    const local = instant + offset * 60 * 1000;
    if (local % DAY_MS === 0) {
      return new Date(local).toISOString().slice(0, 10);
    }
  }
  return formatZonedDate(new Date(instant + HALF_DAY_MS), timeZone);
}

function allDayBoundary(value: string, zoneOffsets: readonly number[], timeZone: string): Date {
  return zonedMidnight(allDayDate(value, zoneOffsets, timeZone), timeZone);
}

export function toCalendarEvent(item: EwsCalendarItem, timeZone: string): CalendarEvent {
  return {
    key: item.id,
    title: item.subject,
    start: item.isAllDay ? allDayBoundary(item.start, item.startZoneOffsets, timeZone) : new Date(item.start),
    end: item.isAllDay ? allDayBoundary(item.end, item.startZoneOffsets, timeZone) : new Date(item.end),
    allDay: item.isAllDay,
    location: normalizeOptionalText(item.location),
    body: normalizeOptionalText(item.body),
  };
}

export class ExchangeCalendarSource implements SourceReader {
  private readonly client: ExchangeClient;
  private readonly calendarName: string;
  private readonly timeZone: string;
  private folderId: string | null = null;

  constructor(client: ExchangeClient, calendarName: string, timeZone: string) {
    this.client = client;
    this.calendarName = calendarName;
    this.timeZone = timeZone;
  }

  async list(window: SyncWindow): Promise<CalendarEvent[]> {
    const startTime = performance.now();
    if (this.folderId === null) {
      this.folderId = (await this.client.findCalendarByName(this.calendarName)).id;
    }

    const refs = await this.client.findCalendarItems(this.folderId, window.start, window.end);
    const items = await this.client.getCalendarItems(refs.map((ref) => ref.id));

    const events = items
      .filter((item) => !item.isCancelled)
      .map((item) => toCalendarEvent(item, this.timeZone))
      .filter((event) => isInWindow(event.start, window));

    const elapsed = Math.round((performance.now() - startTime) / 10) / 100;
    logger.info(`Fetched ${events.length} events from Exchange calendar "${this.calendarName}" (${elapsed}s)`);
    return events;
  }
}
