/**
 * Calendar reconciliation
 *
 * Decides which target events to create, update or delete so the target
 * converges on the source. Events are matched on their correlation key only,
 * never on title or time. Pure: no I/O, inputs are not mutated.
 */

import { DataError } from "../../lib/errors.js";
import { EVENT_FIELDS, type CalendarEvent, type EventField, type SyncPlan, type SyncWindow, type TargetEvent } from "./types.js";
import { isInWindow } from "./window.js";

export interface ReconcileOptions {
  /** Fields whose difference triggers an update (default: all of EVENT_FIELDS) */
  fields?: readonly EventField[];
  /** When given, events of either side starting outside it are ignored */
  window?: SyncWindow;
}

function toWholeSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function normalizeText(value: string | undefined): string {
  return value === undefined ? "" : value;
}

export function fieldEquals(field: EventField, a: CalendarEvent, b: CalendarEvent): boolean {
  switch (field) {
    case "title":
      return a.title === b.title;
    case "start":
      return toWholeSeconds(a.start) === toWholeSeconds(b.start);
    case "end":
      return toWholeSeconds(a.end) === toWholeSeconds(b.end);
    case "allDay":
      return a.allDay === b.allDay;
    case "location":
      return normalizeText(a.location) === normalizeText(b.location);
    case "body":
      return normalizeText(a.body) === normalizeText(b.body);
  }
}

/**
 * Fields among `fields` that differ between the two events.
 */
export function diffEvents(
  source: CalendarEvent,
  target: CalendarEvent,
  fields: readonly EventField[] = EVENT_FIELDS
): EventField[] {
  return fields.filter((field) => !fieldEquals(field, source, target));
}

/**
 * Parse a comma-separated field list such as "title,start,end".
 */
export function parseFieldList(value: string): EventField[] {
  const names = value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  if (names.length === 0) {
    throw new DataError("Field list is empty");
  }
  const fields: EventField[] = [];
  for (const name of names) {
    const field = EVENT_FIELDS.find((candidate) => candidate === name);
    if (field === undefined) {
      throw new DataError(`Unknown event field "${name}" (expected one of: ${EVENT_FIELDS.join(", ")})`);
    }
    if (!fields.includes(field)) {
      fields.push(field);
    }
  }
  return fields;
}

export function reconcile<S extends CalendarEvent, T extends TargetEvent>(
  sourceEvents: readonly S[],
  targetEvents: readonly T[],
  options: ReconcileOptions = {}
): SyncPlan<S, T> {
  const fields = options.fields ?? EVENT_FIELDS;
  const window = options.window;
  const inScope = (event: CalendarEvent): boolean => window === undefined || isInWindow(event.start, window);

  const sourceByKey = new Map<string, S>();
  for (const event of sourceEvents) {
    if (!inScope(event)) continue;
    if (event.key.length === 0) {
      throw new DataError(`Source event "${event.title}" at ${event.start.toISOString()} has an empty correlation key`);
    }
    if (sourceByKey.has(event.key)) {
      throw new DataError(`Duplicate correlation key in source: ${event.key}`);
    }
    sourceByKey.set(event.key, event);
  }

  // A retried create can leave two copies behind: keep the lowest id, drop the rest
  const targetByKey = new Map<string, T>();
  const toDelete: T[] = [];
  const sortedTargets = targetEvents.filter(inScope).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  for (const event of sortedTargets) {
    if (targetByKey.has(event.key)) {
      toDelete.push(event);
    } else {
      targetByKey.set(event.key, event);
    }
  }

  const plan: SyncPlan<S, T> = { toCreate: [], toUpdate: [], toDelete };

  for (const [key, source] of sourceByKey) {
    const target = targetByKey.get(key);
    if (target === undefined) {
      plan.toCreate.push(source);
      continue;
    }
    const changed = diffEvents(source, target, fields);
    if (changed.length > 0) {
      plan.toUpdate.push({ source, target, changed });
    }
  }

  for (const [key, target] of targetByKey) {
    if (!sourceByKey.has(key)) {
      plan.toDelete.push(target);
    }
  }

  return plan;
}

export function isEmptyPlan(plan: SyncPlan<CalendarEvent, TargetEvent>): boolean {
  return plan.toCreate.length === 0 && plan.toUpdate.length === 0 && plan.toDelete.length === 0;
}
