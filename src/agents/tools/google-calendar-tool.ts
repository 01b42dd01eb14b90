/**
 * Google Calendar tools for the agent.
 */

import { Type } from "@sinclair/typebox";

import {
  formatAvailability,
  formatCreatedEvent,
  formatDeletedEvent,
  formatFreeSlots,
  formatSchedule,
} from "../../format/formatter.js";
import { type CalendarProvider, toRfc3339 } from "../../google/calendar-client.js";
import { findFreeSlots, mergeBusy, overlapping, type TimeRange } from "./availability.js";
import {
  checkEmails,
  checkTimeRange,
  DATE_PATTERN,
  defineTool,
  isCalendarDate,
  isGone,
  requireTimeArg,
  sideEffect,
} from "./common.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

const DateArg = Type.String({
  pattern: DATE_PATTERN,
  description: "Date in YYYY-MM-DD format",
});

const TimeArg = (description: string) =>
  Type.String({
    description: `${description}, ISO 8601 (e.g. 2024-01-15T14:00:00Z; no offset means UTC)`,
  });

const Attendees = Type.Optional(
  Type.Array(Type.String(), {
    default: [],
    description: "Attendee email addresses",
  }),
);

function dayStart(date: string): number {
  return Date.parse(`${date}T00:00:00Z`);
}

function isoRange(range: TimeRange): { timeMin: string; timeMax: string } {
  return {
    timeMin: new Date(range.start).toISOString(),
    timeMax: new Date(range.end).toISOString(),
  };
}

function checkDate(date: string): string[] {
  return isCalendarDate(date) ? [] : [`date ${JSON.stringify(date)} is not a valid calendar date`];
}

/**
 * Busy time across the user's primary calendar and every attendee's, plus the
 * calendars Google could not read.
 */
async function busyWithin(
  calendar: CalendarProvider,
  attendees: readonly string[],
  window: TimeRange,
): Promise<{ busy: TimeRange[]; unreadable: string[] }> {
  const { timeMin, timeMax } = isoRange(window);
  const calendarIds = ["primary", ...new Set(attendees.map((a) => a.trim()))];
  const result = await calendar.freeBusy(calendarIds, timeMin, timeMax);
  return { busy: mergeBusy(result.busy), unreadable: result.unreadable };
}

export const getScheduleTool = defineTool({
  name: "get_schedule",
  label: "Get schedule",
  description: "List calendar events starting on a date (UTC) for a number of days.",
  activity: "reading the calendar",
  scope: "calendar.events",
  parameters: Type.Object({
    date: DateArg,
    days: Type.Optional(
      Type.Integer({ minimum: 1, maximum: 31, default: 1, description: "Days to cover (1-31)" }),
    ),
  }),
  check(args) {
    return checkDate(args.date);
  },
  async run(args, ctx) {
    const days = args.days ?? 1;
    const start = dayStart(args.date);
    const { timeMin, timeMax } = isoRange({ start, end: start + days * DAY_MS });
    const events = await ctx.calendar.listEvents(timeMin, timeMax);
    return formatSchedule(events, args.date, days, ctx.maxChars);
  },
});

export const checkAvailabilityTool = defineTool({
  name: "check_availability",
  label: "Check availability",
  description:
    "Check whether the user, and optionally other attendees, are free for the whole time range.",
  activity: "checking availability",
  scope: "calendar.events",
  parameters: Type.Object({
    start_time: TimeArg("Range start"),
    end_time: TimeArg("Range end"),
    attendees: Attendees,
  }),
  check(args) {
    return [
      ...checkTimeRange(args.start_time, args.end_time),
      ...checkEmails("attendees", args.attendees ?? []),
    ];
  },
  async run(args, ctx) {
    const window = {
      start: requireTimeArg("start_time", args.start_time),
      end: requireTimeArg("end_time", args.end_time),
    };
    const { busy, unreadable } = await busyWithin(ctx.calendar, args.attendees ?? [], window);
    return formatAvailability(overlapping(busy, window), window, unreadable);
  },
});

export const findFreeSlotsTool = defineTool({
  name: "find_free_slots",
  label: "Find free slots",
  description:
    "Find gaps of at least the given length inside working hours (UTC) on a date, " +
    "where the user and all attendees are free.",
  activity: "finding free slots",
  scope: "calendar.events",
  parameters: Type.Object({
    date: DateArg,
    duration_minutes: Type.Optional(
      Type.Integer({
        minimum: 1,
        maximum: 1440,
        default: 30,
        description: "Minimum slot length in minutes (default: 30)",
      }),
    ),
    attendees: Attendees,
  }),
  check(args) {
    return [...checkDate(args.date), ...checkEmails("attendees", args.attendees ?? [])];
  },
  async run(args, ctx) {
    const duration = args.duration_minutes ?? 30;
    const day = dayStart(args.date);
    const window = {
      start: day + ctx.workday.startHour * HOUR_MS,
      end: day + ctx.workday.endHour * HOUR_MS,
    };
    const { busy, unreadable } = await busyWithin(ctx.calendar, args.attendees ?? [], window);
    return formatFreeSlots(
      findFreeSlots(busy, window, duration * 60_000),
      args.date,
      duration,
      unreadable,
    );
  },
});

export const createEventTool = defineTool({
  name: "create_event",
  label: "Create event",
  description:
    "Create an event on the user's primary calendar. Invitations are sent when attendees " +
    "are given. Pass two dates (end exclusive) for an all-day event.",
  activity: "creating the event",
  scope: "calendar.events",
  parameters: Type.Object({
    title: Type.String({ description: "Event title" }),
    start_time: TimeArg("Start"),
    end_time: TimeArg("End"),
    attendees: Attendees,
    description: Type.Optional(Type.String()),
    location: Type.Optional(Type.String()),
  }),
  check(args) {
    const issues: string[] = [];
    if (!args.title.trim()) issues.push("title must not be empty");
    issues.push(...checkTimeRange(args.start_time, args.end_time));
    if (args.start_time.includes("T") !== args.end_time.includes("T")) {
      issues.push("start_time and end_time must both be dates or both be date-times");
    }
    issues.push(...checkEmails("attendees", args.attendees ?? []));
    return issues;
  },
  async run(args, ctx) {
    const created = await sideEffect(() =>
      ctx.calendar.createEvent({
        title: args.title.trim(),
        start: toRfc3339(args.start_time.trim()),
        end: toRfc3339(args.end_time.trim()),
        attendees: (args.attendees ?? []).map((a) => a.trim()),
        description: args.description?.trim() || undefined,
        location: args.location?.trim() || undefined,
      }),
    );
    return formatCreatedEvent(created, ctx.maxChars);
  },
});

export const deleteEventTool = defineTool({
  name: "delete_event",
  label: "Delete event",
  description: "Delete an event by ID. Deleting an event that is already gone succeeds.",
  activity: "deleting the event",
  scope: "calendar.events",
  parameters: Type.Object({
    event_id: Type.String({ minLength: 1, description: "Event ID from get_schedule" }),
  }),
  async run(args, ctx) {
    try {
      await ctx.calendar.deleteEvent(args.event_id);
    } catch (err) {
      if (isGone(err)) return formatDeletedEvent(args.event_id, true);
      throw err;
    }
    return formatDeletedEvent(args.event_id, false);
  },
});
