/**
 * Google Workspace integration (Gmail, Calendar) behind narrow provider interfaces.
 */

export {
  type CalendarClientOptions,
  type CalendarProvider,
  createCalendarClient,
  parseFreeBusy,
} from "./calendar-client.js";
export { ProviderError, type ProviderErrorKind, normalizeProviderError } from "./errors.js";
export { createGmailClient, type GmailClientOptions, type MailProvider } from "./gmail-client.js";
export { GOOGLE_SCOPES, type GoogleScope } from "./types.js";
export { parseScopeList, scopeSatisfies, toScopeUrl } from "./scopes.js";
export type {
  AccessToken,
  BusyInterval,
  EmailMessage,
  EmailSummary,
  EventSummary,
  FreeBusyResult,
  LinkedAccount,
  NewEvent,
  OutgoingEmail,
  SentEmail,
} from "./types.js";
