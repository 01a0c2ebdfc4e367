/**
 * Conversion between Google Calendar events and provider-neutral events.
 *
 * The correlation key lives in extendedProperties.private[markerKey]. Private
 * properties belong to this calendar's copy of the event and are readable by
 * any client with access to the calendar; the tool-specific key name
 * (pimCalendarSyncKey) keeps the marker apart from other integrations.
 */

import { DataError } from "../../lib/errors.js";
import { formatZonedDate, zonedMidnight } from "../../lib/time.js";
import { normalizeOptionalText } from "../calendar-sync/normalize.js";
import type { CalendarEvent, TargetEvent } from "../calendar-sync/types.js";
import type { EventDateTime, GoogleEvent, GoogleEventInput } from "./api-client.js";

export const DEFAULT_MARKER_KEY = "pimCalendarSyncKey";

export function markerOf(event: GoogleEvent, markerKey: string): string | undefined {
  return event.extendedProperties?.private?.[markerKey];
}

function parseEventTime(value: EventDateTime | undefined, eventId: string, timeZone: string): { at: Date; allDay: boolean } {
  if (value?.dateTime) {
    return { at: new Date(value.dateTime), allDay: false };
  }
  if (value?.date) {
    return { at: zonedMidnight(value.date, timeZone), allDay: true };
  }
  throw new DataError(`Google event ${eventId} has neither dateTime nor date`);
}

/**
 * The managed copy of a source event, or null for events this tool did not create.
 */
export function fromGoogleEvent(event: GoogleEvent, markerKey: string, timeZone: string): TargetEvent | null {
  const key = markerOf(event, markerKey);
  if (key === undefined || event.status === "cancelled") {
    return null;
  }
  const start = parseEventTime(event.start, event.id, timeZone);
  const end = parseEventTime(event.end, event.id, timeZone);
  return {
    id: event.id,
    etag: event.etag,
    key,
    title: event.summary ?? "",
    start: start.at,
    end: end.at,
    allDay: start.allDay,
    location: normalizeOptionalText(event.location),
    body: normalizeOptionalText(event.description),
  };
}

export function toGoogleEventInput(event: CalendarEvent, markerKey: string, timeZone: string): GoogleEventInput {
  const input: GoogleEventInput = {
    summary: event.title,
    start: event.allDay ? { date: formatZonedDate(event.start, timeZone) } : { dateTime: event.start.toISOString() },
    end: event.allDay ? { date: formatZonedDate(event.end, timeZone) } : { dateTime: event.end.toISOString() },
    extendedProperties: { private: { [markerKey]: event.key } },
  };
  const location = normalizeOptionalText(event.location);
  if (location !== undefined) {
    input.location = location;
  }
  const body = normalizeOptionalText(event.body);
  if (body !== undefined) {
    input.description = body;
  }
  return input;
}
