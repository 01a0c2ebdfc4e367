/**
 * Exchange Web Services API Client
 *
 * OAuth 2.0 bearer authentication and SOAP calls against Exchange Online.
 * Data fetching only: the sync never writes to the source calendar.
 *
 * All EWS operations used here are reads, so every request is marked
 * idempotent and may be retried.
 */

import { withAccessToken, type CredentialProvider } from "../../lib/credentials.js";
import { ApiError, DataError } from "../../lib/errors.js";
import type { HttpClient } from "../../lib/http.js";
import { setupLogger } from "../../lib/logger.js";
import { EXCHANGE_SERVER } from "./auth.js";
import {
  buildFindCalendarItems,
  buildFindFolder,
  buildGetCalendarItems,
  parseFindFolderResponse,
  parseFindItemResponse,
  parseGetItemResponse,
  type EwsCalendarItem,
  type EwsFolder,
  type EwsItemRef,
} from "./ews-xml.js";

const logger = setupLogger("ews-api");

export const EWS_URL = `https://${EXCHANGE_SERVER}/EWS/Exchange.asmx`;
const FOLDER_PAGE_SIZE = 100;
const CALENDAR_VIEW_PAGE_SIZE = 500;
const GET_ITEM_BATCH_SIZE = 50;

export interface ExchangeClientOptions {
  credentials: CredentialProvider;
  http: HttpClient;
  emailAddress: string;
  endpoint?: string;
  calendarViewPageSize?: number;
}

export class ExchangeClient {
  private readonly credentials: CredentialProvider;
  private readonly http: HttpClient;
  private readonly emailAddress: string;
  private readonly endpoint: string;
  private readonly calendarViewPageSize: number;

  constructor(options: ExchangeClientOptions) {
    this.credentials = options.credentials;
    this.http = options.http;
    this.emailAddress = options.emailAddress;
    this.endpoint = options.endpoint ?? EWS_URL;
    this.calendarViewPageSize = options.calendarViewPageSize ?? CALENDAR_VIEW_PAGE_SIZE;
  }

  private async call(soapBody: string): Promise<string> {
    return withAccessToken(
      this.credentials,
      async (token) => {
        const response = await this.http.request("POST", this.endpoint, {
          headers: {
            Authorization: `Bearer ${token}`,
            "Content-Type": "text/xml; charset=utf-8",
            "X-AnchorMailbox": this.emailAddress,
          },
          body: soapBody,
          idempotent: true,
        });
        return response.text();
      },
      (error) => error instanceof ApiError && error.statusCode === 401
    );
  }

  /**
   * All folders below the mailbox root (paged).
   */
  async listFolders(): Promise<EwsFolder[]> {
    const folders: EwsFolder[] = [];
    let offset = 0;
    while (true) {
      const page = parseFindFolderResponse(await this.call(buildFindFolder(this.emailAddress, offset, FOLDER_PAGE_SIZE)));
      folders.push(...page.folders);
      if (page.includesLastItemInRange || page.folders.length === 0) {
        return folders;
      }
      offset = page.nextOffset;
    }
  }

  async findCalendarByName(name: string): Promise<EwsFolder> {
    const folders = await this.listFolders();
    const calendar = folders.find((folder) => folder.isCalendar && folder.displayName === name);
    if (!calendar) {
      throw new DataError(`No such Exchange calendar: ${name}`);
    }
    logger.debug(`Resolved Exchange calendar "${name}"`);
    return calendar;
  }

  /**
   * Occurrence ids overlapping [start, end).
   *
   * A CalendarView cannot be paged by offset; when a page is truncated the
   * view is re-opened from the last start seen. Items seen twice are dropped.
   */
  async findCalendarItems(folderId: string, start: Date, end: Date): Promise<EwsItemRef[]> {
    const seen = new Map<string, EwsItemRef>();
    let cursor = start;
    while (true) {
      const page = parseFindItemResponse(
        await this.call(buildFindCalendarItems(folderId, cursor, end, this.calendarViewPageSize))
      );
      for (const item of page.items) {
        if (!seen.has(item.id)) {
          seen.set(item.id, item);
        }
      }
      if (page.includesLastItemInRange) {
        return Array.from(seen.values());
      }

      const lastStart = page.items.reduce((latest, item) => Math.max(latest, new Date(item.start).getTime()), 0);
      if (lastStart <= cursor.getTime()) {
        throw new DataError(
          `More than ${this.calendarViewPageSize} Exchange items start at ${cursor.toISOString()}; cannot page further`
        );
      }
      logger.debug(`Calendar view truncated, continuing from ${new Date(lastStart).toISOString()}`);
      cursor = new Date(lastStart);
    }
  }

  async getCalendarItems(itemIds: readonly string[]): Promise<EwsCalendarItem[]> {
    const items: EwsCalendarItem[] = [];
    for (let i = 0; i < itemIds.length; i += GET_ITEM_BATCH_SIZE) {
      const batch = itemIds.slice(i, i + GET_ITEM_BATCH_SIZE);
      items.push(...parseGetItemResponse(await this.call(buildGetCalendarItems(batch))));
    }
    return items;
  }
}
