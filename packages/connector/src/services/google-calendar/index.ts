/**
 * Google Calendar Service
 *
 * Calendar v3 client and the sync target built on it.
 */

export {
  CALENDAR_API_BASE,
  GoogleCalendarClient,
  type CalendarListEntry,
  type DeleteOutcome,
  type GoogleEvent,
  type GoogleEventInput,
} from "./api-client.js";
export { GoogleCalendarTarget, type GoogleCalendarTargetOptions } from "./calendar-target.js";
export { DEFAULT_MARKER_KEY, fromGoogleEvent, markerOf, toGoogleEventInput } from "./mapping.js";
