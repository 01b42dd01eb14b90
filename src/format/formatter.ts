/**
 * Compact text renderings of Gmail and Calendar records for the agent.
 *
 * Every function here tolerates missing fields and caps free text at the
 * configured budget so a single tool result cannot flood the agent context.
 */

import type {
  EmailMessage,
  EmailSummary,
  EventSummary,
  OutgoingEmail,
  SentEmail,
} from "../google/types.js";
import type { TimeRange } from "../agents/tools/availability.js";

export const DEFAULT_MAX_CHARS = 500;
export const ELLIPSIS = "…";

export function truncate(text: string | undefined, maxChars = DEFAULT_MAX_CHARS): string {
  const value = text ?? "";
  if (value.length <= maxChars) return value;
  return `${value.slice(0, Math.max(maxChars - 1, 0)).trimEnd()}${ELLIPSIS}`;
}

function oneLine(text: string | undefined, maxChars: number): string {
  return truncate((text ?? "").replace(/\s+/g, " ").trim(), maxChars);
}

function orPlaceholder(value: string | undefined, placeholder: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : placeholder;
}

/** ISO instant without milliseconds, e.g. 2024-10-15T09:00:00Z. */
export function formatInstant(epochMs: number): string {
  if (!Number.isFinite(epochMs)) return "(unknown time)";
  return new Date(epochMs).toISOString().replace(/\.\d{3}Z$/, "Z");
}

function formatTimestamp(value: string | undefined): string {
  if (!value) return "(unknown time)";
  if (!value.includes("T")) return value;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? value : formatInstant(parsed);
}

// -----------------------------------------------------------------------------
// Gmail
// -----------------------------------------------------------------------------

export function formatEmailList(emails: EmailSummary[], maxChars = DEFAULT_MAX_CHARS): string {
  if (emails.length === 0) return "No emails found.";

  return emails
    .map((email, index) => {
      const flag = email.unread ? " (unread)" : "";
      return (
        `${index + 1}. [ID: ${orPlaceholder(email.id, "?")}]${flag} ` +
        `From: ${oneLine(orPlaceholder(email.from, "(unknown sender)"), maxChars)} | ` +
        `Subject: ${oneLine(orPlaceholder(email.subject, "(no subject)"), maxChars)} | ` +
        `Date: ${orPlaceholder(email.date, "(unknown date)")} | ` +
        `Preview: ${oneLine(email.snippet, maxChars)}`
      );
    })
    .join("\n");
}

export function formatEmail(
  message: EmailMessage,
  thread: EmailMessage[],
  maxChars = DEFAULT_MAX_CHARS,
): string {
  const lines = [
    "Email:",
    `ID: ${orPlaceholder(message.id, "?")} | Thread: ${orPlaceholder(message.threadId, "?")}`,
    `From: ${orPlaceholder(message.from, "(unknown sender)")}`,
    `To: ${message.to.length > 0 ? message.to.join(", ") : "(unknown recipient)"}`,
  ];
  if (message.cc && message.cc.length > 0) lines.push(`Cc: ${message.cc.join(", ")}`);
  lines.push(
    `Date: ${orPlaceholder(message.date, "(unknown date)")}`,
    `Subject: ${orPlaceholder(message.subject, "(no subject)")}`,
    "",
    "--- Body ---",
    truncate(orPlaceholder(message.body, message.snippet || "(empty)"), maxChars),
  );

  const others = thread.filter((item) => item.id !== message.id);
  if (others.length > 0) {
    lines.push("", `--- Thread (${others.length} other message${others.length === 1 ? "" : "s"}) ---`);
    others.forEach((item, index) => {
      lines.push(
        `${index + 1}. From: ${orPlaceholder(item.from, "(unknown sender)")} | ` +
          `Subject: ${orPlaceholder(item.subject, "(no subject)")} | ` +
          `Date: ${orPlaceholder(item.date, "(unknown date)")}`,
      );
      const body = oneLine(item.body || item.snippet, maxChars);
      if (body) lines.push(body);
    });
  }

  return lines.join("\n").trim();
}

/**
 * Split "Name <addr>" into its parts; bare addresses have no name.
 */
export function parseAddress(value: string): { name?: string; email?: string } {
  const match = /^\s*"?([^"<]*?)"?\s*<([^>]+)>\s*$/.exec(value);
  if (match) {
    const name = match[1]?.trim();
    return { name: name || undefined, email: match[2]?.trim() };
  }
  const bare = value.trim();
  return bare.includes("@") ? { email: bare } : { name: bare || undefined };
}

export function replySubject(subject: string): string {
  if (/^re:/i.test(subject.trim())) return subject.trim();
  return `Re: ${subject}`.trim();
}

export function formatDraftReply(
  message: EmailMessage,
  instructions: string,
  maxChars = DEFAULT_MAX_CHARS,
): string {
  const sender = parseAddress(message.from);
  const recipient = sender.email ?? orPlaceholder(message.from, "(unknown sender)");
  const greetingName = sender.name ?? sender.email ?? "there";

  return [
    "Draft reply (not sent):",
    `To: ${recipient}`,
    `Subject: ${replySubject(message.subject)}`,
    `Reply to ID: ${orPlaceholder(message.id, "?")}`,
    "",
    `Hi ${greetingName},`,
    "",
    instructions.trim(),
    "",
    "Best,",
    "",
    "--- Original ---",
    `From: ${orPlaceholder(message.from, "(unknown sender)")}`,
    `Subject: ${orPlaceholder(message.subject, "(no subject)")}`,
    `Date: ${orPlaceholder(message.date, "(unknown date)")}`,
    "",
    truncate(orPlaceholder(message.body, message.snippet), maxChars),
  ]
    .join("\n")
    .trim();
}

export function formatSentEmail(
  email: OutgoingEmail,
  sent: SentEmail,
  maxChars = DEFAULT_MAX_CHARS,
): string {
  const kind = email.inReplyTo || email.threadId ? "Reply sent" : "Email sent";
  return (
    `${kind} to ${email.to} with subject "${oneLine(email.subject, maxChars)}". ` +
    `Message ID: ${sent.id}.`
  );
}

// -----------------------------------------------------------------------------
// Calendar
// -----------------------------------------------------------------------------

export function formatEvent(event: EventSummary, maxChars = DEFAULT_MAX_CHARS): string {
  const parts: string[] = [];
  if (event.allDay) {
    parts.push(`All day on ${orPlaceholder(event.start, "(unknown date)")}`);
  } else {
    parts.push(`${formatTimestamp(event.start)} to ${formatTimestamp(event.end)}`);
  }
  parts.push(oneLine(orPlaceholder(event.title, "(No title)"), maxChars));
  if (event.attendees.length > 0) parts.push(`attendees: ${event.attendees.join(", ")}`);
  if (event.location) parts.push(`location: ${oneLine(event.location, maxChars)}`);
  if (event.id) parts.push(`id: ${event.id}`);
  return parts.join(" - ");
}

export function formatSchedule(
  events: EventSummary[],
  startDate: string,
  days: number,
  maxChars = DEFAULT_MAX_CHARS,
): string {
  const span = `${days} day${days === 1 ? "" : "s"}`;
  if (events.length === 0) return `No events found from ${startDate} for ${span}.`;
  return [
    `Schedule from ${startDate} for ${span}:`,
    ...events.map((event) => formatEvent(event, maxChars)),
  ].join("\n");
}

function unknownAvailability(unreadable: readonly string[]): string | undefined {
  if (unreadable.length === 0) return undefined;
  const names = unreadable.map((id) => (id === "primary" ? "your calendar" : id));
  return `Availability unknown for: ${names.join(", ")} (calendar not readable).`;
}

export function formatAvailability(
  conflicts: TimeRange[],
  window: TimeRange,
  unreadable: readonly string[] = [],
): string {
  const range = `${formatInstant(window.start)} to ${formatInstant(window.end)}`;
  const unknown = unknownAvailability(unreadable);
  if (conflicts.length === 0) {
    return unknown
      ? `No conflicts from ${range} on the calendars that could be read. ${unknown}`
      : `Free from ${range}.`;
  }
  const list = conflicts
    .map((c) => `${formatInstant(c.start)} to ${formatInstant(c.end)}`)
    .join(", ");
  const result = `Not available from ${range}. Conflicts: ${list}.`;
  return unknown ? `${result} ${unknown}` : result;
}

export function formatFreeSlots(
  slots: TimeRange[],
  date: string,
  durationMinutes: number,
  unreadable: readonly string[] = [],
): string {
  const lines =
    slots.length === 0
      ? [`No free slots on ${date} for ${durationMinutes} minutes.`]
      : [
          `Free slots on ${date} for ${durationMinutes} minutes:`,
          ...slots.map((s) => `${formatInstant(s.start)} to ${formatInstant(s.end)}`),
        ];
  const unknown = unknownAvailability(unreadable);
  if (unknown) lines.push(`${unknown} These slots ignore that calendar.`);
  return lines.join("\n");
}

export function formatCreatedEvent(event: EventSummary, maxChars = DEFAULT_MAX_CHARS): string {
  let result =
    `Event created: ${oneLine(orPlaceholder(event.title, "(No title)"), maxChars)} ` +
    `(${formatTimestamp(event.start)} to ${formatTimestamp(event.end)})`;
  if (event.attendees.length > 0) {
    result = `${result} with attendees: ${event.attendees.join(", ")}`;
  }
  if (event.id) result = `${result}. Event ID: ${event.id}`;
  return `${result}.`;
}

export function formatDeletedEvent(eventId: string, alreadyDeleted: boolean): string {
  return alreadyDeleted
    ? `Event ${eventId} was already deleted.`
    : `Event ${eventId} deleted.`;
}

// -----------------------------------------------------------------------------
// Failures
// -----------------------------------------------------------------------------

export type FailureCode =
  | "InvalidArgument"
  | "NotFound"
  | "RateLimited"
  | "Unavailable"
  | "AmbiguousSideEffect";

/**
 * One-sentence failure text for the agent. `activity` reads as a gerund
 * phrase ("sending the email"); provider internals never appear here.
 */
export function formatFailure(code: FailureCode, activity: string, detail?: string): string {
  switch (code) {
    case "InvalidArgument":
      return `Invalid arguments while ${activity}: ${detail ?? "check the input"}.`;
    case "NotFound":
      return `Not found while ${activity}${detail ? `: ${detail}` : ""}. It may not exist or may be inaccessible.`;
    case "RateLimited":
      return `Google's rate limit was reached while ${activity}. Try again in a few moments.`;
    case "Unavailable":
      return `Google could not be reached while ${activity}. Try again later.`;
    case "AmbiguousSideEffect":
      return (
        `Warning: the request timed out while ${activity}, so its effect is unknown. ` +
        "It may already have happened; check before trying again."
      );
  }
}
