/**
 * Shared types for Google Workspace integration (Gmail, Calendar).
 */

// -----------------------------------------------------------------------------
// OAuth Types
// -----------------------------------------------------------------------------

export const GOOGLE_SCOPES = [
  "gmail.readonly",
  "gmail.modify",
  "gmail.send",
  "calendar",
  "calendar.events",
] as const;

export type GoogleScope = (typeof GOOGLE_SCOPES)[number];

export type AccessToken = {
  token: string;
  scopes: GoogleScope[];
  expiresAt: number; // Unix timestamp (ms)
  sessionId: string;
};

export type LinkedAccount = {
  sessionId: string;
  subject: string; // identity-provider subject
  email?: string;
  displayName?: string;
  refreshToken: string;
  grantedScopes: GoogleScope[];
  linkedAt: number;
};

// -----------------------------------------------------------------------------
// Gmail Types
// -----------------------------------------------------------------------------

export type EmailSummary = {
  id: string;
  threadId: string;
  from: string;
  to: string[];
  subject: string;
  date: string; // ISO 8601 when parseable, raw header otherwise
  snippet: string;
  unread: boolean;
  labels: string[];
};

export type EmailMessage = EmailSummary & {
  cc?: string[];
  messageIdHeader?: string; // RFC 2822 Message-ID, used for threading replies
  body: string; // plain text, falling back to HTML
};

export type OutgoingEmail = {
  to: string;
  subject: string;
  body: string;
  threadId?: string;
  inReplyTo?: string;
  references?: string;
};

export type SentEmail = {
  id: string;
  threadId: string;
};

// -----------------------------------------------------------------------------
// Calendar Types
// -----------------------------------------------------------------------------

export type EventSummary = {
  id: string;
  title: string;
  start: string; // ISO 8601 date-time, or YYYY-MM-DD for all-day events
  end: string;
  allDay: boolean;
  attendees: string[];
  location?: string;
  description?: string;
  status: "confirmed" | "tentative" | "cancelled";
};

export type NewEvent = {
  title: string;
  start: string;
  end: string;
  attendees: string[];
  description?: string;
  location?: string;
};

export type BusyInterval = {
  start: string;
  end: string;
};

export type FreeBusyResult = {
  /** Busy intervals keyed by calendar id ("primary" or an attendee email). */
  busy: Record<string, BusyInterval[]>;
  /** Calendars Google could not read (notFound, groupTooBig, ...). */
  unreadable: string[];
};
