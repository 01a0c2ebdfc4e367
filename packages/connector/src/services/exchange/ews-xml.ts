/**
 * Exchange Web Services SOAP request builders and response parsers.
 *
 * Covers the three operations the calendar reader needs:
 * - FindFolder: locate a calendar folder by display name
 * - FindItem with a CalendarView: list occurrence ids in a time range
 * - GetItem: read subject, times, location and text body of those ids
 *
 * No external XML parser dependency -- EWS responses have a predictable
 * structure, so simple string matching is enough. Element names are matched
 * with any namespace prefix.
 */

import { DataError, RateLimitError } from "../../lib/errors.js";

const SOAP_NS = "http://schemas.xmlsoap.org/soap/envelope/";
const TYPES_NS = "http://schemas.microsoft.com/exchange/services/2006/types";
const MESSAGES_NS = "http://schemas.microsoft.com/exchange/services/2006/messages";
export const SERVER_VERSION = "Exchange2013_SP1";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EwsFolder {
  id: string;
  displayName: string;
  isCalendar: boolean;
}

export interface FindFolderPage {
  folders: EwsFolder[];
  includesLastItemInRange: boolean;
  nextOffset: number;
}

export interface EwsItemRef {
  id: string;
  start: string;
}

export interface FindItemPage {
  items: EwsItemRef[];
  includesLastItemInRange: boolean;
}

export interface EwsCalendarItem {
  id: string;
  subject: string;
  start: string;
  end: string;
  isAllDay: boolean;
  isCancelled: boolean;
  /** UTC offsets (minutes east) of the periods in the item's start time zone */
  startZoneOffsets: number[];
  location?: string;
  body?: string;
}

/** A ResponseMessage with ResponseClass="Error" */
export class EwsResponseError extends Error {
  readonly responseCode: string;

  constructor(responseCode: string, message: string) {
    super(`${responseCode}: ${message}`);
    this.name = "EwsResponseError";
    this.responseCode = responseCode;
  }
}

// ---------------------------------------------------------------------------
// XML helpers
// ---------------------------------------------------------------------------

interface XmlElement {
  attributes: string;
  content: string;
}

const PREFIX = "(?:[A-Za-z][\\w.-]*:)?";

function elementPattern(name: string, flags: string): RegExp {
  return new RegExp(`<${PREFIX}${name}(\\s[^>]*?)?(?:/>|>([\\s\\S]*?)</${PREFIX}${name}>)`, flags);
}

export function findElements(xml: string, name: string): XmlElement[] {
  const elements: XmlElement[] = [];
  for (const match of xml.matchAll(elementPattern(name, "g"))) {
    elements.push({ attributes: match[1] ?? "", content: match[2] ?? "" });
  }
  return elements;
}

export function findElement(xml: string, name: string): XmlElement | null {
  const match = elementPattern(name, "").exec(xml);
  return match ? { attributes: match[1] ?? "", content: match[2] ?? "" } : null;
}

export function getAttribute(attributes: string, name: string): string | undefined {
  const match = new RegExp(`(?:^|\\s)${name}="([^"]*)"`).exec(attributes);
  return match ? decodeXml(match[1]) : undefined;
}

function textOf(xml: string, name: string): string | undefined {
  const element = findElement(xml, name);
  return element ? decodeXml(element.content) : undefined;
}

export function decodeXml(text: string): string {
  return text
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#x([0-9a-fA-F]+);/g, (_, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => String.fromCodePoint(parseInt(dec, 10)))
    .replace(/&amp;/g, "&");
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

// ---------------------------------------------------------------------------
// Request builders
// ---------------------------------------------------------------------------

function envelope(body: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<soap:Envelope xmlns:soap="${SOAP_NS}" xmlns:t="${TYPES_NS}" xmlns:m="${MESSAGES_NS}">
  <soap:Header>
    <t:RequestServerVersion Version="${SERVER_VERSION}" />
  </soap:Header>
  <soap:Body>
${body}
  </soap:Body>
</soap:Envelope>`;
}

/**
 * Deep FindFolder from the mailbox root, one indexed page at a time.
 */
export function buildFindFolder(emailAddress: string, offset: number, pageSize: number): string {
  return envelope(`    <m:FindFolder Traversal="Deep">
      <m:FolderShape>
        <t:BaseShape>IdOnly</t:BaseShape>
        <t:AdditionalProperties>
          <t:FieldURI FieldURI="folder:DisplayName" />
        </t:AdditionalProperties>
      </m:FolderShape>
      <m:IndexedPageFolderView MaxEntriesReturned="${pageSize}" Offset="${offset}" BasePoint="Beginning" />
      <m:ParentFolderIds>
        <t:DistinguishedFolderId Id="msgfolderroot">
          <t:Mailbox><t:EmailAddress>${escapeXml(emailAddress)}</t:EmailAddress></t:Mailbox>
        </t:DistinguishedFolderId>
      </m:ParentFolderIds>
    </m:FindFolder>`);
}

/**
 * FindItem over a CalendarView: recurring series are expanded into occurrences.
 */
export function buildFindCalendarItems(folderId: string, start: Date, end: Date, maxEntries: number): string {
  return envelope(`    <m:FindItem Traversal="Shallow">
      <m:ItemShape>
        <t:BaseShape>IdOnly</t:BaseShape>
        <t:AdditionalProperties>
          <t:FieldURI FieldURI="calendar:Start" />
        </t:AdditionalProperties>
      </m:ItemShape>
      <m:CalendarView MaxEntriesReturned="${maxEntries}" StartDate="${start.toISOString()}" EndDate="${end.toISOString()}" />
      <m:ParentFolderIds>
        <t:FolderId Id="${escapeXml(folderId)}" />
      </m:ParentFolderIds>
    </m:FindItem>`);
}

export function buildGetCalendarItems(itemIds: readonly string[]): string {
  const ids = itemIds.map((id) => `        <t:ItemId Id="${escapeXml(id)}" />`).join("\n");
  return envelope(`    <m:GetItem>
      <m:ItemShape>
        <t:BaseShape>IdOnly</t:BaseShape>
        <t:BodyType>Text</t:BodyType>
        <t:AdditionalProperties>
          <t:FieldURI FieldURI="item:Subject" />
          <t:FieldURI FieldURI="item:Body" />
          <t:FieldURI FieldURI="calendar:Start" />
          <t:FieldURI FieldURI="calendar:End" />
          <t:FieldURI FieldURI="calendar:IsAllDayEvent" />
          <t:FieldURI FieldURI="calendar:IsCancelled" />
          <t:FieldURI FieldURI="calendar:StartTimeZone" />
          <t:FieldURI FieldURI="calendar:Location" />
        </t:AdditionalProperties>
      </m:ItemShape>
      <m:ItemIds>
${ids}
      </m:ItemIds>
    </m:GetItem>`);
}

// ---------------------------------------------------------------------------
// Response parsers
// ---------------------------------------------------------------------------

/**
 * Return the body of each `<name>ResponseMessage`, throwing on the first error.
 * ErrorServerBusy is the EWS throttling signal and maps to RateLimitError.
 */
export function responseMessages(xml: string, operation: string): string[] {
  const fault = findElement(xml, "Fault");
  if (fault) {
    throw new EwsResponseError("SoapFault", textOf(fault.content, "faultstring") ?? "unknown fault");
  }

  const messages = findElements(xml, `${operation}ResponseMessage`);
  if (messages.length === 0) {
    throw new DataError(`EWS ${operation} response contains no response messages`);
  }
  for (const message of messages) {
    const responseClass = getAttribute(message.attributes, "ResponseClass");
    if (responseClass === "Error") {
      const code = textOf(message.content, "ResponseCode") ?? "UnknownError";
      const text = textOf(message.content, "MessageText") ?? "";
      if (code === "ErrorServerBusy") {
        const backOff = /Name="BackOffMilliseconds"[^>]*>(\d+)</.exec(message.content);
        throw new RateLimitError(backOff ? Math.ceil(parseInt(backOff[1], 10) / 1000) : null, `EWS server busy: ${text}`);
      }
      throw new EwsResponseError(code, text);
    }
  }
  return messages.map((message) => message.content);
}

function rootFolderOf(message: string, operation: string): XmlElement {
  const root = findElement(message, "RootFolder");
  if (!root) {
    throw new DataError(`EWS ${operation} response has no RootFolder`);
  }
  return root;
}

export function parseFindFolderResponse(xml: string): FindFolderPage {
  const [message] = responseMessages(xml, "FindFolder");
  const root = rootFolderOf(message, "FindFolder");

  const folders: EwsFolder[] = [];
  for (const [kind, isCalendar] of [
    ["CalendarFolder", true],
    ["Folder", false],
    ["ContactsFolder", false],
    ["TasksFolder", false],
    ["SearchFolder", false],
  ] as const) {
    for (const element of findElements(root.content, kind)) {
      const folderId = findElement(element.content, "FolderId");
      const id = folderId ? getAttribute(folderId.attributes, "Id") : undefined;
      if (!id) {
        throw new DataError("EWS folder without FolderId");
      }
      folders.push({ id, displayName: textOf(element.content, "DisplayName") ?? "", isCalendar });
    }
  }

  return {
    folders,
    includesLastItemInRange: getAttribute(root.attributes, "IncludesLastItemInRange") !== "false",
    nextOffset: parseInt(getAttribute(root.attributes, "IndexedPagingOffset") ?? "0", 10),
  };
}

export function parseFindItemResponse(xml: string): FindItemPage {
  const [message] = responseMessages(xml, "FindItem");
  const root = rootFolderOf(message, "FindItem");

  const items: EwsItemRef[] = findElements(root.content, "CalendarItem").map((element) => {
    const itemId = findElement(element.content, "ItemId");
    const id = itemId ? getAttribute(itemId.attributes, "Id") : undefined;
    const start = textOf(element.content, "Start");
    if (!id || !start) {
      throw new DataError("EWS calendar item without ItemId or Start");
    }
    return { id, start };
  });

  return {
    items,
    includesLastItemInRange: getAttribute(root.attributes, "IncludesLastItemInRange") !== "false",
  };
}

/**
 * Parse an xs:duration bias such as `-PT5H30M` into minutes.
 */
export function parseBiasMinutes(value: string): number | null {
  const match = /^(-)?PT(?:(\d+)H)?(?:(\d+)M)?$/.exec(value);
  if (!match || (match[2] === undefined && match[3] === undefined)) {
    return null;
  }
  const minutes = parseInt(match[2] ?? "0", 10) * 60 + parseInt(match[3] ?? "0", 10);
  return match[1] ? -minutes : minutes;
}

// EWS biases are UTC minus local time
function zoneOffsets(itemXml: string): number[] {
  const zone = findElement(itemXml, "StartTimeZone");
  if (!zone) {
    return [];
  }
  const offsets: number[] = [];
  for (const period of findElements(zone.content, "Period")) {
    const bias = parseBiasMinutes(getAttribute(period.attributes, "Bias") ?? "");
    if (bias !== null && !offsets.includes(-bias)) {
      offsets.push(-bias);
    }
  }
  return offsets;
}

export function parseGetItemResponse(xml: string): EwsCalendarItem[] {
  const items: EwsCalendarItem[] = [];
  for (const message of responseMessages(xml, "GetItem")) {
    for (const element of findElements(message, "CalendarItem")) {
      const itemId = findElement(element.content, "ItemId");
      const id = itemId ? getAttribute(itemId.attributes, "Id") : undefined;
      const start = textOf(element.content, "Start");
      const end = textOf(element.content, "End");
      if (!id || !start || !end) {
        throw new DataError(`EWS calendar item ${id ?? "(no id)"} is missing ItemId, Start or End`);
      }
      items.push({
        id,
        subject: textOf(element.content, "Subject") ?? "",
        start,
        end,
        isAllDay: textOf(element.content, "IsAllDayEvent") === "true",
        isCancelled: textOf(element.content, "IsCancelled") === "true",
        startZoneOffsets: zoneOffsets(element.content),
        location: textOf(element.content, "Location"),
        body: textOf(element.content, "Body"),
      });
    }
  }
  return items;
}
