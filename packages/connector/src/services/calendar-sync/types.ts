/**
 * Calendar sync types
 *
 * Provider-neutral event model plus the capability interfaces each provider
 * implements. Any calendar that can `list` plugs in as a source; one that can
 * also `create` / `update` / `delete` plugs in as a target.
 */

export interface CalendarEvent {
  /** Correlation key: the source system's stable id for this event */
  key: string;
  title: string;
  start: Date;
  end: Date;
  allDay: boolean;
  location?: string;
  body?: string;
}

/** An event as it exists in the target calendar */
export interface TargetEvent extends CalendarEvent {
  /** Provider id of the target copy */
  id: string;
  /** Provider version tag, sent back on writes to detect concurrent changes */
  etag?: string;
}

/** Half-open time range: start inclusive, end exclusive */
export interface SyncWindow {
  start: Date;
  end: Date;
}

export const EVENT_FIELDS = ["title", "start", "end", "allDay", "location", "body"] as const;

export type EventField = (typeof EVENT_FIELDS)[number];

export interface EventUpdate<S extends CalendarEvent = CalendarEvent, T extends CalendarEvent = TargetEvent> {
  source: S;
  target: T;
  changed: EventField[];
}

export interface SyncPlan<S extends CalendarEvent = CalendarEvent, T extends CalendarEvent = TargetEvent> {
  toCreate: S[];
  toUpdate: EventUpdate<S, T>[];
  toDelete: T[];
}

export interface SourceReader {
  list(window: SyncWindow): Promise<CalendarEvent[]>;
}

/** Lists only events this tool manages (those carrying its correlation-key marker) */
export interface TargetReader {
  list(window: SyncWindow): Promise<TargetEvent[]>;
}

export interface TargetWriter {
  create(event: CalendarEvent): Promise<TargetEvent>;
  update(id: string, event: CalendarEvent, etag?: string): Promise<void>;
  delete(id: string, etag?: string): Promise<void>;
}

export type TargetCalendar = TargetReader & TargetWriter;
