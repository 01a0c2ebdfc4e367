/**
 * Exchange Online (Office 365) calendar source
 */

export { ExchangeClient, EWS_URL, type ExchangeClientOptions } from "./api-client.js";
export {
  ExchangeCredentials,
  authorizationUrl,
  exchangeConfigSchema,
  openExchangeConfig,
  tokenUrl,
  type ExchangeConfig,
} from "./auth.js";
export { ExchangeCalendarSource, toCalendarEvent } from "./calendar-source.js";
export { EwsResponseError, type EwsCalendarItem, type EwsFolder, type EwsItemRef } from "./ews-xml.js";
