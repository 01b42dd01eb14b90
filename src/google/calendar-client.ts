/**
 * Google Calendar API client wrapper bound to a single access token.
 */

import { type calendar_v3, google } from "googleapis";

import { withTimeout } from "../utils/timeout.js";
import { normalizeProviderError } from "./errors.js";
import type { EventSummary, FreeBusyResult, NewEvent } from "./types.js";

export type CalendarProvider = {
  listEvents(timeMin: string, timeMax: string): Promise<EventSummary[]>;
  createEvent(event: NewEvent): Promise<EventSummary>;
  deleteEvent(eventId: string): Promise<void>;
  freeBusy(
    calendarIds: string[],
    timeMin: string,
    timeMax: string,
  ): Promise<FreeBusyResult>;
};

export type CalendarClientOptions = {
  timeoutMs: number;
  calendarId?: string;
};

/**
 * Create a Google Calendar API client with the given access token.
 */
export function createCalendarClient(
  accessToken: string,
  options: CalendarClientOptions,
): CalendarProvider {
  const auth = new google.auth.OAuth2();
  auth.setCredentials({ access_token: accessToken });
  const calendar = google.calendar({
    version: "v3",
    auth,
    timeout: options.timeoutMs,
  });
  const calendarId = options.calendarId ?? "primary";

  async function call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(run(), options.timeoutMs, operation);
    } catch (err) {
      throw normalizeProviderError(err, operation);
    }
  }

  return {
    async listEvents(timeMin, timeMax) {
      const response = await call("calendar.events.list", () =>
        calendar.events.list({
          calendarId,
          timeMin,
          timeMax,
          singleEvents: true,
          orderBy: "startTime",
          maxResults: 250,
        }),
      );
      return (response.data.items ?? [])
        .map(parseCalendarEvent)
        .filter((event) => event.status !== "cancelled");
    },

    async createEvent(event) {
      const response = await call("calendar.events.insert", () =>
        calendar.events.insert({
          calendarId,
          sendUpdates: event.attendees.length > 0 ? "all" : "none",
          requestBody: {
            summary: event.title,
            description: event.description,
            location: event.location,
            start: toEventDateTime(event.start),
            end: toEventDateTime(event.end),
            attendees:
              event.attendees.length > 0
                ? event.attendees.map((email) => ({ email }))
                : undefined,
          },
        }),
      );
      return parseCalendarEvent(response.data);
    },

    async deleteEvent(eventId) {
      await call("calendar.events.delete", () =>
        calendar.events.delete({ calendarId, eventId, sendUpdates: "all" }),
      );
    },

    /**
     * Check free/busy times across multiple calendars.
     */
    async freeBusy(calendarIds, timeMin, timeMax) {
      const response = await call("calendar.freebusy.query", () =>
        calendar.freebusy.query({
          requestBody: {
            timeMin,
            timeMax,
            items: calendarIds.map((id) => ({ id })),
          },
        }),
      );
      return parseFreeBusy(response.data, calendarIds);
    },
  };
}

/**
 * Split a freebusy response into busy intervals and calendars Google could
 * not read. A requested calendar missing from the response counts as unreadable.
 */
export function parseFreeBusy(
  data: calendar_v3.Schema$FreeBusyResponse,
  requested: readonly string[],
): FreeBusyResult {
  const busy: FreeBusyResult["busy"] = {};
  const unreadable: string[] = [];
  const calendars = data.calendars ?? {};
  for (const calId of requested) {
    const entry = calendars[calId];
    if (!entry || (entry.errors ?? []).length > 0) {
      unreadable.push(calId);
      continue;
    }
    busy[calId] = (entry.busy ?? [])
      .filter((b) => b.start && b.end)
      .map((b) => ({ start: b.start ?? "", end: b.end ?? "" }));
  }
  return { busy, unreadable };
}

/**
 * Date-only values become all-day events; anything with a time is sent as a
 * UTC date-time.
 */
export function toEventDateTime(value: string): calendar_v3.Schema$EventDateTime {
  if (!value.includes("T")) return { date: value };
  return { dateTime: toRfc3339(value) };
}

/**
 * Normalize an ISO 8601 timestamp to RFC 3339 UTC. Values without an offset
 * are read as UTC.
 */
export function toRfc3339(value: string): string {
  if (!value.includes("T")) return value;
  const hasOffset = /(Z|[+-]\d{2}:?\d{2})$/i.test(value);
  const parsed = new Date(hasOffset ? value : `${value}Z`);
  if (Number.isNaN(parsed.getTime())) return value;
  return parsed.toISOString().replace(/\.000Z$/, "Z");
}

/**
 * Parse Google Calendar API event response into our types.
 */
export function parseCalendarEvent(event: calendar_v3.Schema$Event): EventSummary {
  const allDay = !event.start?.dateTime && Boolean(event.start?.date);
  const status = event.status;
  return {
    id: event.id ?? "",
    title: event.summary ?? "",
    start: event.start?.dateTime ?? event.start?.date ?? "",
    end: event.end?.dateTime ?? event.end?.date ?? "",
    allDay,
    attendees: (event.attendees ?? [])
      .map((a) => a.email ?? "")
      .filter((email) => email !== ""),
    location: event.location ?? undefined,
    description: event.description ?? undefined,
    status:
      status === "tentative" || status === "cancelled" ? status : "confirmed",
  };
}
