import { describe, expect, it } from "vitest";
import { DataError } from "../../lib/errors.js";
import { diffEvents } from "../calendar-sync/reconcile.js";
import type { CalendarEvent } from "../calendar-sync/types.js";
import { DEFAULT_MARKER_KEY, fromGoogleEvent, markerOf, toGoogleEventInput } from "./mapping.js";

const TZ = "Europe/Budapest";

describe("fromGoogleEvent", () => {
  it("should skip events without the marker", () => {
    expect(fromGoogleEvent({ id: "e1", summary: "Dentist" }, DEFAULT_MARKER_KEY, TZ)).toBeNull();
    expect(
      fromGoogleEvent(
        { id: "e1", extendedProperties: { private: { otherTool: "x" } } },
        DEFAULT_MARKER_KEY,
        TZ
      )
    ).toBeNull();
  });

  it("should skip cancelled events", () => {
    expect(
      fromGoogleEvent(
        { id: "e1", status: "cancelled", extendedProperties: { private: { [DEFAULT_MARKER_KEY]: "occ-1" } } },
        DEFAULT_MARKER_KEY,
        TZ
      )
    ).toBeNull();
  });

  it("should map a managed timed event", () => {
    const event = fromGoogleEvent(
      {
        id: "e1",
        etag: '"3"',
        summary: "Standup",
        location: "Room 1 ",
        description: "Line one\r\nLine two",
        start: { dateTime: "2026-10-20T09:00:00+02:00" },
        end: { dateTime: "2026-10-20T09:15:00+02:00" },
        extendedProperties: { private: { [DEFAULT_MARKER_KEY]: "occ-1" } },
      },
      DEFAULT_MARKER_KEY,
      TZ
    );

    expect(event).toEqual({
      id: "e1",
      etag: '"3"',
      key: "occ-1",
      title: "Standup",
      start: new Date("2026-10-20T07:00:00Z"),
      end: new Date("2026-10-20T07:15:00Z"),
      allDay: false,
      location: "Room 1",
      body: "Line one\nLine two",
    });
  });

  it("should map all-day dates to local midnight", () => {
    const event = fromGoogleEvent(
      {
        id: "e2",
        start: { date: "2026-10-23" },
        end: { date: "2026-10-25" },
        extendedProperties: { private: { [DEFAULT_MARKER_KEY]: "occ-2" } },
      },
      DEFAULT_MARKER_KEY,
      TZ
    );

    expect(event?.allDay).toBe(true);
    expect(event?.title).toBe("");
    expect(event?.start).toEqual(new Date("2026-10-22T22:00:00Z"));
    expect(event?.end).toEqual(new Date("2026-10-24T22:00:00Z"));
  });

  it("should reject a managed event without times", () => {
    expect(() =>
      fromGoogleEvent({ id: "e3", extendedProperties: { private: { [DEFAULT_MARKER_KEY]: "occ-3" } } }, DEFAULT_MARKER_KEY, TZ)
    ).toThrow(new DataError("Google event e3 has neither dateTime nor date"));
  });
});

describe("toGoogleEventInput", () => {
  it("should write timed events as instants with the marker", () => {
    const event: CalendarEvent = {
      key: "occ-1",
      title: "Standup",
      start: new Date("2026-10-20T07:00:00Z"),
      end: new Date("2026-10-20T07:15:00Z"),
      allDay: false,
      location: "   ",
      body: "Agenda",
    };

    expect(toGoogleEventInput(event, "syncKey", TZ)).toEqual({
      summary: "Standup",
      start: { dateTime: "2026-10-20T07:00:00.000Z" },
      end: { dateTime: "2026-10-20T07:15:00.000Z" },
      extendedProperties: { private: { syncKey: "occ-1" } },
      description: "Agenda",
    });
  });

  it("should write all-day events as dates in the configured zone", () => {
    const input = toGoogleEventInput(
      {
        key: "occ-2",
        title: "Offsite",
        start: new Date("2026-10-22T22:00:00Z"),
        end: new Date("2026-10-24T22:00:00Z"),
        allDay: true,
      },
      DEFAULT_MARKER_KEY,
      TZ
    );

    expect(input.start).toEqual({ date: "2026-10-23" });
    expect(input.end).toEqual({ date: "2026-10-25" });
  });

  it("should read back what it writes without differences", () => {
    const event: CalendarEvent = {
      key: "occ-2",
      title: "Offsite",
      start: new Date("2026-10-22T22:00:00Z"),
      end: new Date("2026-10-24T22:00:00Z"),
      allDay: true,
      location: "Lake house",
    };
    const input = toGoogleEventInput(event, DEFAULT_MARKER_KEY, TZ);

    const readBack = fromGoogleEvent({ id: "e9", ...input }, DEFAULT_MARKER_KEY, TZ);

    expect(readBack).not.toBeNull();
    expect(readBack && diffEvents(event, readBack)).toEqual([]);
    expect(markerOf({ id: "e9", ...input }, DEFAULT_MARKER_KEY)).toBe("occ-2");
  });
});
