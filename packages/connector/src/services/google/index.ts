/**
 * Google OAuth 2.0 credentials shared by the Calendar and YouTube clients
 */

export {
  CALENDAR_SCOPE,
  YOUTUBE_SCOPE,
  GoogleCredentials,
  authorizationUrl,
  configuredScopes,
  googleConfigSchema,
  openGoogleConfig,
  type GoogleConfig,
} from "./auth.js";
