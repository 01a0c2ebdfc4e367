import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { setupServer } from "msw/node";
import { http, HttpResponse } from "msw";
import type { TokenRequestOptions } from "../../lib/credentials.js";
import { ApiError, DataError } from "../../lib/errors.js";
import { HttpClient } from "../../lib/http.js";
import { RetryPolicy } from "../../lib/retry.js";
import { GoogleCalendarClient, type GoogleEventInput } from "./api-client.js";

const BASE = "https://calendar.test.local/calendar/v3";
const EVENTS = `${BASE}/calendars/team-calendar/events`;
const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: "error" }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

function createCredentials() {
  return {
    getAccessToken: vi.fn(async (options?: TokenRequestOptions) => ({
      token: options?.forceRefresh ? "fresh-token" : "stale-token",
      expiresAt: new Date("2026-10-19T13:00:00Z"),
    })),
  };
}

function createClient(credentials = createCredentials()): GoogleCalendarClient {
  const client = new HttpClient({ retry: new RetryPolicy({}, vi.fn().mockResolvedValue(undefined)) });
  return new GoogleCalendarClient(credentials, client, BASE);
}

const INPUT: GoogleEventInput = {
  summary: "Standup",
  start: { dateTime: "2026-10-20T07:00:00.000Z" },
  end: { dateTime: "2026-10-20T07:15:00.000Z" },
  extendedProperties: { private: { pimCalendarSyncKey: "occ-1" } },
};

describe("GoogleCalendarClient", () => {
  describe("findCalendarByName", () => {
    it("should page through the calendar list", async () => {
      const tokens: Array<string | null> = [];
      server.use(
        http.get(`${BASE}/users/me/calendarList`, ({ request }) => {
          const pageToken = new URL(request.url).searchParams.get("pageToken");
          tokens.push(pageToken);
          return pageToken === null
            ? HttpResponse.json({ items: [{ id: "me-primary", summary: "me@example.com", primary: true }], nextPageToken: "p2" })
            : HttpResponse.json({ items: [{ id: "team-calendar", summary: "Team", summaryOverride: "Work mirror" }] });
        })
      );
      const client = createClient();

      expect(await client.findCalendarByName("Work mirror")).toEqual({
        id: "team-calendar",
        summary: "Team",
        summaryOverride: "Work mirror",
      });
      expect((await client.findCalendarByName("primary")).id).toBe("me-primary");
      expect(tokens).toEqual([null, "p2", null, "p2"]);
    });

    it("should reject an unknown calendar", async () => {
      server.use(http.get(`${BASE}/users/me/calendarList`, () => HttpResponse.json({ items: [] })));

      await expect(createClient().findCalendarByName("Nope")).rejects.toThrow(
        new DataError("No such Google calendar: Nope")
      );
    });
  });

  describe("listEvents", () => {
    it("should request expanded events in the range and follow pages", async () => {
      const queries: Array<Record<string, string>> = [];
      server.use(
        http.get(EVENTS, ({ request }) => {
          const params = new URL(request.url).searchParams;
          queries.push(Object.fromEntries(params));
          return params.get("pageToken") === null
            ? HttpResponse.json({ items: [{ id: "e1" }], nextPageToken: "next" })
            : HttpResponse.json({ items: [{ id: "e2" }] });
        })
      );

      const events = await createClient().listEvents(
        "team-calendar",
        new Date("2026-10-12T00:00:00Z"),
        new Date("2026-11-16T00:00:00Z")
      );

      expect(events.map((event) => event.id)).toEqual(["e1", "e2"]);
      expect(queries[0]).toEqual({
        timeMin: "2026-10-12T00:00:00.000Z",
        timeMax: "2026-11-16T00:00:00.000Z",
        singleEvents: "true",
        maxResults: "2500",
      });
      expect(queries[1].pageToken).toBe("next");
    });

    it("should reject a malformed page", async () => {
      server.use(http.get(EVENTS, () => HttpResponse.json({ items: [{ summary: "no id" }] })));

      await expect(
        createClient().listEvents("team-calendar", new Date("2026-10-12T00:00:00Z"), new Date("2026-11-16T00:00:00Z"))
      ).rejects.toThrow("Unexpected events.list response at items.0.id: Required");
    });
  });

  describe("writes", () => {
    it("should insert without notifying attendees", async () => {
      const received: unknown[] = [];
      server.use(
        http.post(EVENTS, async ({ request }) => {
          expect(new URL(request.url).searchParams.get("sendUpdates")).toBe("none");
          received.push(await request.json());
          return HttpResponse.json({ id: "new-id", etag: '"1"' });
        })
      );

      const created = await createClient().insertEvent("team-calendar", INPUT);

      expect(created).toEqual({ id: "new-id", etag: '"1"' });
      expect(received).toEqual([INPUT]);
    });

    it("should send the etag as If-Match on update", async () => {
      const ifMatch: Array<string | null> = [];
      server.use(
        http.put(`${EVENTS}/e1`, ({ request }) => {
          ifMatch.push(request.headers.get("If-Match"));
          return HttpResponse.json({ id: "e1", etag: '"2"' });
        })
      );

      await createClient().updateEvent("team-calendar", "e1", INPUT, '"1"');

      expect(ifMatch).toEqual(['"1"']);
    });

    it("should report an event that is already gone as missing", async () => {
      server.use(
        http.delete(`${EVENTS}/e1`, () => new HttpResponse(null, { status: 204 })),
        http.delete(`${EVENTS}/e2`, () => HttpResponse.json({ error: { code: 410, message: "Gone" } }, { status: 410 }))
      );
      const client = createClient();

      expect(await client.deleteEvent("team-calendar", "e1", '"1"')).toBe("deleted");
      expect(await client.deleteEvent("team-calendar", "e2")).toBe("missing");
    });

    it("should surface a failed precondition", async () => {
      server.use(
        http.delete(`${EVENTS}/e1`, () =>
          HttpResponse.json({ error: { code: 412, message: "Precondition Failed" } }, { status: 412 })
        )
      );

      const error = await createClient()
        .deleteEvent("team-calendar", "e1", '"1"')
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ statusCode: 412 });
    });
  });

  it("should replay a call once with a refreshed token after a 401", async () => {
    server.use(
      http.get(EVENTS, ({ request }) =>
        request.headers.get("Authorization") === "Bearer fresh-token"
          ? HttpResponse.json({ items: [] })
          : HttpResponse.json({ error: { code: 401, message: "Invalid Credentials" } }, { status: 401 })
      )
    );
    const credentials = createCredentials();

    const events = await createClient(credentials).listEvents(
      "team-calendar",
      new Date("2026-10-12T00:00:00Z"),
      new Date("2026-11-16T00:00:00Z")
    );

    expect(events).toEqual([]);
    expect(credentials.getAccessToken).toHaveBeenLastCalledWith({ forceRefresh: true });
  });
});
