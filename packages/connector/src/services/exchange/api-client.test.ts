import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { setupServer } from "msw/node";
import { http, HttpResponse } from "msw";
import type { TokenRequestOptions } from "../../lib/credentials.js";
import { DataError } from "../../lib/errors.js";
import { HttpClient } from "../../lib/http.js";
import { RetryPolicy } from "../../lib/retry.js";
import { ExchangeClient } from "./api-client.js";
import { findFolderResponse, findItemResponse, getItemResponse } from "./ews-responses.fixture.js";

const EWS = "https://ews.test.local/EWS/Exchange.asmx";
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

function createClient(credentials = createCredentials(), calendarViewPageSize = 500): ExchangeClient {
  const sleep = vi.fn().mockResolvedValue(undefined);
  return new ExchangeClient({
    credentials,
    http: new HttpClient({ retry: new RetryPolicy({}, sleep) }),
    emailAddress: "user@example.com",
    endpoint: EWS,
    calendarViewPageSize,
  });
}

const xml = (body: string) => HttpResponse.xml(body);

describe("ExchangeClient", () => {
  it("should send the bearer token and anchor mailbox", async () => {
    const seen: Array<string | null> = [];
    server.use(
      http.post(EWS, ({ request }) => {
        seen.push(request.headers.get("Authorization"), request.headers.get("X-AnchorMailbox"));
        return xml(findFolderResponse([{ id: "cal-1", name: "Calendar" }], true, 1));
      })
    );

    await createClient().listFolders();

    expect(seen).toEqual(["Bearer stale-token", "user@example.com"]);
  });

  it("should page through folders and find a calendar by name", async () => {
    const offsets: string[] = [];
    server.use(
      http.post(EWS, async ({ request }) => {
        const offset = /Offset="(\d+)"/.exec(await request.text())?.[1] ?? "";
        offsets.push(offset);
        return offset === "0"
          ? xml(findFolderResponse([{ id: "cal-1", name: "Calendar" }, { id: "inbox", name: "Inbox", kind: "Folder" }], false, 2))
          : xml(findFolderResponse([{ id: "cal-2", name: "Team" }], true, 3));
      })
    );

    const calendar = await createClient().findCalendarByName("Team");

    expect(calendar).toEqual({ id: "cal-2", displayName: "Team", isCalendar: true });
    expect(offsets).toEqual(["0", "2"]);
  });

  it("should only match calendar folders", async () => {
    server.use(
      http.post(EWS, () => xml(findFolderResponse([{ id: "inbox", name: "Inbox", kind: "Folder" }], true, 1)))
    );

    await expect(createClient().findCalendarByName("Inbox")).rejects.toThrow(
      new DataError("No such Exchange calendar: Inbox")
    );
  });

  it("should refresh the token once after a 401", async () => {
    server.use(
      http.post(EWS, ({ request }) => {
        if (request.headers.get("Authorization") === "Bearer stale-token") {
          return new HttpResponse("token expired", { status: 401 });
        }
        return xml(findFolderResponse([{ id: "cal-1", name: "Calendar" }], true, 1));
      })
    );
    const credentials = createCredentials();

    const folders = await createClient(credentials).listFolders();

    expect(folders).toHaveLength(1);
    expect(credentials.getAccessToken).toHaveBeenCalledTimes(2);
    expect(credentials.getAccessToken).toHaveBeenLastCalledWith({ forceRefresh: true });
  });

  it("should re-open a truncated calendar view from the last start", async () => {
    const starts: string[] = [];
    server.use(
      http.post(EWS, async ({ request }) => {
        const start = /StartDate="([^"]+)"/.exec(await request.text())?.[1] ?? "";
        starts.push(start);
        if (start === "2026-10-12T00:00:00.000Z") {
          return xml(
            findItemResponse(
              [
                { id: "occ-1", start: "2026-10-20T09:00:00Z" },
                { id: "occ-2", start: "2026-10-21T10:00:00Z" },
              ],
              false
            )
          );
        }
        return xml(
          findItemResponse(
            [
              { id: "occ-2", start: "2026-10-21T10:00:00Z" },
              { id: "occ-3", start: "2026-10-22T08:00:00Z" },
            ],
            true
          )
        );
      })
    );

    const items = await createClient(createCredentials(), 2).findCalendarItems(
      "cal-1",
      new Date("2026-10-12T00:00:00Z"),
      new Date("2026-11-16T00:00:00Z")
    );

    expect(items.map((item) => item.id)).toEqual(["occ-1", "occ-2", "occ-3"]);
    expect(starts).toEqual(["2026-10-12T00:00:00.000Z", "2026-10-21T10:00:00.000Z"]);
  });

  it("should fail when a truncated view makes no progress", async () => {
    server.use(
      http.post(EWS, () =>
        xml(
          findItemResponse(
            [
              { id: "occ-1", start: "2026-10-12T00:00:00Z" },
              { id: "occ-2", start: "2026-10-12T00:00:00Z" },
            ],
            false
          )
        )
      )
    );

    await expect(
      createClient(createCredentials(), 2).findCalendarItems(
        "cal-1",
        new Date("2026-10-12T00:00:00Z"),
        new Date("2026-11-16T00:00:00Z")
      )
    ).rejects.toThrow("More than 2 Exchange items start at 2026-10-12T00:00:00.000Z; cannot page further");
  });

  it("should read items in batches of 50", async () => {
    const batchSizes: number[] = [];
    server.use(
      http.post(EWS, async ({ request }) => {
        const ids = Array.from((await request.text()).matchAll(/<t:ItemId Id="([^"]+)"/g), (match) => match[1]);
        batchSizes.push(ids.length);
        return xml(getItemResponse(ids.map((id) => ({ id, subject: id, start: "2026-10-20T09:00:00Z" }))));
      })
    );
    const ids = Array.from({ length: 51 }, (_, i) => `occ-${i}`);

    const items = await createClient().getCalendarItems(ids);

    expect(batchSizes).toEqual([50, 1]);
    expect(items.map((item) => item.id)).toEqual(ids);
  });
});
