/**
 * Calendar Sync Orchestrator
 *
 * One reconciliation pass: read both calendars fresh, compute the plan,
 * then apply deletes, updates and creates in that order. There is no
 * rollback; a failure leaves the target as the last successful write left it.
 */

import { describeError } from "../../lib/errors.js";
import { setupLogger, type Logger } from "../../lib/logger.js";
import { reconcile } from "./reconcile.js";
import type { EventField, SourceReader, SyncWindow, TargetCalendar } from "./types.js";
import { describeWindow, isInWindow } from "./window.js";

const defaultLogger = setupLogger("calendar-sync");

// Types
export interface CalendarSyncResult {
  created: number;
  updated: number;
  deleted: number;
  unchanged: number;
  dryRun: boolean;
  elapsedSeconds: number;
}

export interface CalendarSyncOptions {
  source: SourceReader;
  target: TargetCalendar;
  window: SyncWindow;
  /** Fields compared for update detection */
  fields?: readonly EventField[];
  /** Compute and log the plan without writing */
  dryRun?: boolean;
  /** Log sink for this run (defaults to the "calendar-sync" logger) */
  logger?: Logger;
}

/**
 * Converge the target calendar on the source within the window.
 *
 * @returns Counts of applied (or, in a dry run, planned) operations
 */
export async function syncCalendars(options: CalendarSyncOptions): Promise<CalendarSyncResult> {
  const { source, target, window, fields, dryRun = false, logger = defaultLogger } = options;
  const startTime = performance.now();
  logger.info(`Starting calendar sync (${describeWindow(window)})${dryRun ? " [dry run]" : ""}`);

  try {
    const sourceEvents = await source.list(window);
    const targetEvents = await target.list(window);
    const plan = reconcile(sourceEvents, targetEvents, { fields, window });

    const inWindow = sourceEvents.filter((event) => isInWindow(event.start, window)).length;
    const result: CalendarSyncResult = {
      created: plan.toCreate.length,
      updated: plan.toUpdate.length,
      deleted: plan.toDelete.length,
      unchanged: inWindow - plan.toCreate.length - plan.toUpdate.length,
      dryRun,
      elapsedSeconds: 0,
    };

    if (dryRun) {
      for (const event of plan.toDelete) logger.info(`Would delete: ${event.title} (${event.start.toISOString()})`);
      for (const { source: event, changed } of plan.toUpdate) {
        logger.info(`Would update: ${event.title} (${event.start.toISOString()}) [${changed.join(", ")}]`);
      }
      for (const event of plan.toCreate) logger.info(`Would create: ${event.title} (${event.start.toISOString()})`);
    } else {
      for (const event of plan.toDelete) {
        await target.delete(event.id, event.etag);
      }
      for (const { source: event, target: existing, changed } of plan.toUpdate) {
        logger.debug(`Updating ${event.title}: ${changed.join(", ")} changed`);
        await target.update(existing.id, event, existing.etag);
      }
      for (const event of plan.toCreate) {
        await target.create(event);
      }
    }

    result.elapsedSeconds = Math.round((performance.now() - startTime) / 10) / 100;
    logger.info(
      `Calendar sync completed in ${result.elapsedSeconds}s: created=${result.created}, updated=${result.updated}, ` +
        `deleted=${result.deleted}, unchanged=${result.unchanged}`
    );
    return result;
  } catch (error) {
    const elapsed = Math.round((performance.now() - startTime) / 10) / 100;
    logger.error(`Calendar sync failed after ${elapsed}s: ${describeError(error)}`);
    throw error;
  }
}
