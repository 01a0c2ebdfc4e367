/**
 * Calendar Sync
 *
 * Provider-neutral reconciliation of a source calendar into a target calendar.
 */

export * from "./types.js";
export { buildSyncWindow, describeWindow, isInWindow, DEFAULT_PAST_DAYS, DEFAULT_FUTURE_DAYS } from "./window.js";
export { diffEvents, fieldEquals, isEmptyPlan, parseFieldList, reconcile, type ReconcileOptions } from "./reconcile.js";
export { normalizeOptionalText } from "./normalize.js";
export { syncCalendars, type CalendarSyncOptions, type CalendarSyncResult } from "./orchestrator.js";
export { parseCalendarSyncArgs, calendarSyncUsage, type CalendarSyncArgs } from "./args.js";
