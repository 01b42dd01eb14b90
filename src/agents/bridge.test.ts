import { describe, expect, it } from "vitest";

import { CredentialResolver } from "../auth/credential-resolver.js";
import { MemoryLinkedAccountStore } from "../auth/linked-accounts.js";
import { formatFailure } from "../format/formatter.js";
import { ProviderError } from "../google/errors.js";
import type { EmailMessage } from "../google/types.js";
import { createSilentLogger } from "../logging.js";
import { SinkDispatcher } from "../observability/sink.js";
import {
  FakeCalendarProvider,
  FakeIdentityProvider,
  FakeMailProvider,
  linkedAccount,
  RecordingSink,
} from "../testing/fakes.js";
import { createToolBridge } from "./bridge.js";
import { TOOL_NAMES, type ToolName, toAgentResult } from "./tools/common.js";

const NOW = Date.parse("2024-10-15T08:00:00Z");

const lunch: EmailMessage = {
  id: "msg-1",
  threadId: "thr-1",
  from: "Ada Lovelace <ada@example.com>",
  to: ["me@example.com"],
  subject: "Lunch",
  date: "2024-10-15T07:30:00.000Z",
  snippet: "Are you free?",
  unread: true,
  labels: ["INBOX"],
  messageIdHeader: "<lunch-1@mail.example.com>",
  body: "Are you free for lunch tomorrow?",
};

const VALID_ARGS: Record<ToolName, Record<string, unknown>> = {
  list_emails: {},
  get_email: { email_id: "msg-1" },
  search_emails: { query: "lunch" },
  draft_reply: { email_id: "msg-1", instructions: "Say noon works" },
  send_email: { to: "ada@example.com", subject: "Hi", body: "Hello" },
  get_schedule: { date: "2024-10-15" },
  check_availability: {
    start_time: "2024-10-15T10:00:00Z",
    end_time: "2024-10-15T11:00:00Z",
  },
  find_free_slots: { date: "2024-10-15" },
  create_event: {
    title: "Sync",
    start_time: "2024-10-15T10:00:00Z",
    end_time: "2024-10-15T11:00:00Z",
  },
  delete_event: { event_id: "evt-1" },
};

function setup() {
  const logger = createSilentLogger();
  const accounts = new MemoryLinkedAccountStore([
    linkedAccount({ sessionId: "s1" }),
    linkedAccount({ sessionId: "reader", grantedScopes: ["gmail.readonly"] }),
    linkedAccount({ sessionId: "sender", grantedScopes: ["gmail.send"] }),
  ]);
  const identityProvider = new FakeIdentityProvider(() => NOW);
  const credentials = new CredentialResolver({
    accounts,
    identityProvider,
    safetyMarginMs: 60_000,
    refreshTimeoutMs: 5_000,
    now: () => NOW,
    logger,
  });
  const mail = new FakeMailProvider([lunch]);
  const calendar = new FakeCalendarProvider();
  const sink = new RecordingSink();
  const bridge = createToolBridge({
    credentials,
    createMailProvider: () => mail,
    createCalendarProvider: () => calendar,
    dispatcher: new SinkDispatcher([sink], 1_000, logger),
    maxChars: 500,
    workday: { startHour: 9, endHour: 18 },
    now: () => NOW,
    logger,
  });
  const providerCalls = () => mail.totalCalls + calendar.totalCalls;
  return { bridge, identityProvider, mail, calendar, sink, providerCalls };
}

describe("tool bridge", () => {
  it("rejects unknown tool names", async () => {
    const { bridge, identityProvider } = setup();
    expect(await bridge.invoke("delete_everything", {}, "s1")).toEqual({
      status: "error",
      code: "InvalidArgument",
      text: "Unknown tool: delete_everything.",
      retryable: false,
    });
    expect(identityProvider.calls).toBe(0);
  });

  it("describes every tool in a fixed order", () => {
    const { bridge } = setup();
    expect(bridge.definitions().map((d) => d.name)).toEqual([...TOOL_NAMES]);
  });

  it.each(TOOL_NAMES)(
    "asks to connect Google for %s when the session has no linked account",
    async (name) => {
      const { bridge, providerCalls } = setup();
      const outcome = await bridge.invoke(name, VALID_ARGS[name], "stranger");

      expect(outcome.status).toBe("auth_required");
      if (outcome.status !== "auth_required") return;
      expect(outcome.interruption.type).toBe("google_auth_required");
      expect(outcome.interruption.action).toBe("connect_google_account");
      expect(outcome.interruption.reason).toBe("no_linked_account");
      expect(providerCalls()).toBe(0);
    },
  );

  it("refuses to send with a read-only grant", async () => {
    const { bridge, mail, identityProvider } = setup();
    const outcome = await bridge.invoke("send_email", VALID_ARGS.send_email, "reader");

    expect(outcome).toEqual({
      status: "auth_required",
      interruption: {
        type: "google_auth_required",
        message:
          "Your Google account has not granted the permission needed for sending the email. Reconnect it and approve the requested access.",
        action: "connect_google_account",
        reason: "insufficient_scope",
        requiredScopes: ["https://www.googleapis.com/auth/gmail.send"],
      },
    });
    expect(mail.calls.sendMessage).toBe(0);
    expect(identityProvider.calls).toBe(0);
  });

  it("asks for read access before replying with a send-only grant", async () => {
    const { bridge, identityProvider, providerCalls } = setup();
    const outcome = await bridge.invoke(
      "send_email",
      { to: "ada@example.com", body: "Noon works", reply_to_id: "msg-1" },
      "sender",
    );

    expect(outcome).toEqual({
      status: "auth_required",
      interruption: {
        type: "google_auth_required",
        message:
          "Your Google account has not granted the permission needed for sending the email. Reconnect it and approve the requested access.",
        action: "connect_google_account",
        reason: "insufficient_scope",
        requiredScopes: [
          "https://www.googleapis.com/auth/gmail.send",
          "https://www.googleapis.com/auth/gmail.readonly",
        ],
      },
    });
    expect(identityProvider.calls).toBe(0);
    expect(providerCalls()).toBe(0);
  });

  it("sends a new message with a send-only grant", async () => {
    const { bridge, mail } = setup();
    const outcome = await bridge.invoke("send_email", VALID_ARGS.send_email, "sender");

    expect(outcome.status).toBe("ok");
    expect(mail.calls.getMessage).toBe(0);
    expect(mail.calls.sendMessage).toBe(1);
  });

  describe("argument validation", () => {
    it("rejects an empty search query without contacting anyone", async () => {
      const { bridge, identityProvider, providerCalls } = setup();
      const outcome = await bridge.invoke("search_emails", { query: "   " }, "s1");

      expect(outcome).toEqual({
        status: "error",
        code: "InvalidArgument",
        text: "Invalid arguments while searching emails: query must not be empty.",
        retryable: false,
      });
      expect(identityProvider.calls).toBe(0);
      expect(providerCalls()).toBe(0);
    });

    it("rejects create_event when start is not before end", async () => {
      const { bridge, providerCalls } = setup();
      const outcome = await bridge.invoke(
        "create_event",
        { title: "Sync", start_time: "2024-10-15T11:00:00Z", end_time: "2024-10-15T11:00:00Z" },
        "s1",
      );

      expect(outcome.status === "error" && outcome.text).toBe(
        "Invalid arguments while creating the event: start_time must be before end_time.",
      );
      expect(providerCalls()).toBe(0);
    });

    it("rejects invalid attendee addresses", async () => {
      const { bridge, providerCalls } = setup();
      const outcome = await bridge.invoke(
        "create_event",
        { ...VALID_ARGS.create_event, attendees: ["not-an-address"] },
        "s1",
      );

      expect(outcome.status === "error" && outcome.text).toBe(
        'Invalid arguments while creating the event: attendees contains an invalid email address: "not-an-address".',
      );
      expect(providerCalls()).toBe(0);
    });

    it("reports schema violations by argument name", async () => {
      const { bridge, providerCalls } = setup();
      const outcome = await bridge.invoke("list_emails", { max_results: 0 }, "s1");

      expect(outcome.status).toBe("error");
      if (outcome.status !== "error") return;
      expect(outcome.code).toBe("InvalidArgument");
      expect(outcome.text.startsWith("Invalid arguments while listing emails: max_results: ")).toBe(
        true,
      );
      expect(providerCalls()).toBe(0);
    });

    it("rejects arguments that are not an object", async () => {
      const { bridge } = setup();
      const outcome = await bridge.invoke("list_emails", ["x"], "s1");
      expect(outcome.status === "error" && outcome.text).toBe(
        "Invalid arguments while listing emails: arguments must be a JSON object.",
      );
    });

    it("coerces numeric strings and applies defaults", async () => {
      const { bridge, mail } = setup();
      const outcome = await bridge.invoke("list_emails", { max_results: "5" }, "s1");

      expect(outcome.status).toBe("ok");
      expect(mail.calls.listMessages).toBe(1);
    });
  });

  describe("gmail", () => {
    it("lists the inbox", async () => {
      const { bridge } = setup();
      expect(await bridge.invoke("list_emails", {}, "s1")).toEqual({
        status: "ok",
        text: "1. [ID: msg-1] (unread) From: Ada Lovelace <ada@example.com> | Subject: Lunch | Date: 2024-10-15T07:30:00.000Z | Preview: Are you free?",
      });
    });

    it("threads a reply and derives its subject", async () => {
      const { bridge, mail } = setup();
      const outcome = await bridge.invoke(
        "send_email",
        { to: "ada@example.com", body: "Noon works", reply_to_id: "msg-1" },
        "s1",
      );

      expect(outcome).toEqual({
        status: "ok",
        text: 'Reply sent to ada@example.com with subject "Re: Lunch". Message ID: sent-1.',
      });
      expect(mail.sent).toEqual([
        {
          to: "ada@example.com",
          subject: "Re: Lunch",
          body: "Noon works",
          threadId: "thr-1",
          inReplyTo: "<lunch-1@mail.example.com>",
          references: "<lunch-1@mail.example.com>",
        },
      ]);
    });

    it("reports a missing message as not found", async () => {
      const { bridge } = setup();
      expect(await bridge.invoke("get_email", { email_id: "gone" }, "s1")).toEqual({
        status: "error",
        code: "NotFound",
        text: "Not found while reading the email. It may not exist or may be inaccessible.",
        retryable: false,
      });
    });

    it("flags a send that timed out as an unknown side effect and does not retry", async () => {
      const { bridge, mail } = setup();
      mail.failNext(
        "sendMessage",
        new ProviderError("Unavailable", "gmail.messages.send timed out", { ambiguous: true }),
      );

      const outcome = await bridge.invoke("send_email", VALID_ARGS.send_email, "s1");

      expect(outcome).toEqual({
        status: "error",
        code: "AmbiguousSideEffect",
        text: formatFailure("AmbiguousSideEffect", "sending the email"),
        retryable: false,
      });
      expect(mail.calls.sendMessage).toBe(1);
    });

    it("treats a timed-out read as plainly unavailable", async () => {
      const { bridge, mail } = setup();
      mail.failNext(
        "getMessage",
        new ProviderError("Unavailable", "gmail.messages.get timed out", { ambiguous: true }),
      );

      const outcome = await bridge.invoke("get_email", { email_id: "msg-1" }, "s1");

      expect(outcome).toEqual({
        status: "error",
        code: "Unavailable",
        text: "Google could not be reached while reading the email. Try again later.",
        retryable: true,
      });
    });

    it("suggests retrying later when rate limited", async () => {
      const { bridge, mail } = setup();
      mail.failNext(
        "listMessages",
        new ProviderError("RateLimited", "gmail.messages.list failed (HTTP 429)", { status: 429 }),
      );

      const outcome = await bridge.invoke("list_emails", {}, "s1");

      expect(outcome).toEqual({
        status: "error",
        code: "RateLimited",
        text: "Google's rate limit was reached while listing emails. Try again in a few moments.",
        retryable: true,
      });
    });

    it("drops a token Google rejects and refreshes on the next call", async () => {
      const { bridge, mail, identityProvider } = setup();
      mail.failNext(
        "listMessages",
        new ProviderError("Unauthorized", "gmail.messages.list failed (HTTP 401)", { status: 401 }),
      );

      const first = await bridge.invoke("list_emails", {}, "s1");
      expect(first.status === "auth_required" && first.interruption.reason).toBe(
        "token_rejected",
      );

      const second = await bridge.invoke("list_emails", {}, "s1");
      expect(second.status).toBe("ok");
      expect(identityProvider.calls).toBe(2);
    });

    it("hides unexpected failures behind a short message", async () => {
      const { bridge, mail } = setup();
      mail.failNext("listMessages", new TypeError("cannot read properties of undefined"));

      expect(await bridge.invoke("list_emails", {}, "s1")).toEqual({
        status: "error",
        code: "Unavailable",
        text: "Google could not be reached while listing emails. Try again later.",
        retryable: true,
      });
    });
  });

  describe("calendar", () => {
    it("shows a created event exactly once in the schedule", async () => {
      const { bridge } = setup();
      const created = await bridge.invoke(
        "create_event",
        {
          title: "Design review",
          start_time: "2024-10-15T14:00:00Z",
          end_time: "2024-10-15T15:00:00Z",
        },
        "s1",
      );
      expect(created).toEqual({
        status: "ok",
        text: "Event created: Design review (2024-10-15T14:00:00Z to 2024-10-15T15:00:00Z). Event ID: evt-1.",
      });

      expect(await bridge.invoke("get_schedule", { date: "2024-10-15" }, "s1")).toEqual({
        status: "ok",
        text: "Schedule from 2024-10-15 for 1 day:\n2024-10-15T14:00:00Z to 2024-10-15T15:00:00Z - Design review - id: evt-1",
      });
    });

    it("reads offset-less times as UTC", async () => {
      const { bridge, calendar } = setup();
      await bridge.invoke(
        "create_event",
        { title: "Sync", start_time: "2024-10-15T10:00:00", end_time: "2024-10-15T10:30:00" },
        "s1",
      );
      expect(calendar.events.get("evt-1")?.start).toBe("2024-10-15T10:00:00Z");
    });

    it("deletes idempotently", async () => {
      const { bridge } = setup();
      await bridge.invoke("create_event", VALID_ARGS.create_event, "s1");

      expect(await bridge.invoke("delete_event", { event_id: "evt-1" }, "s1")).toEqual({
        status: "ok",
        text: "Event evt-1 deleted.",
      });
      expect(await bridge.invoke("delete_event", { event_id: "evt-1" }, "s1")).toEqual({
        status: "ok",
        text: "Event evt-1 was already deleted.",
      });
    });

    it("reports a forbidden delete as a failure", async () => {
      const { bridge, calendar } = setup();
      await bridge.invoke("create_event", VALID_ARGS.create_event, "s1");
      calendar.failNext(
        "deleteEvent",
        new ProviderError("NotFound", "calendar.events.delete failed (HTTP 403)", {
          status: 403,
          reason: "forbiddenForNonOrganizer",
        }),
      );

      expect(await bridge.invoke("delete_event", { event_id: "evt-1" }, "s1")).toEqual({
        status: "error",
        code: "NotFound",
        text: "Not found while deleting the event. It may not exist or may be inaccessible.",
        retryable: false,
      });
      expect(calendar.events.has("evt-1")).toBe(true);
    });

    it("flags a create that timed out as an unknown side effect", async () => {
      const { bridge, calendar } = setup();
      calendar.failNext(
        "createEvent",
        new ProviderError("Unavailable", "calendar.events.insert timed out", { ambiguous: true }),
      );

      const outcome = await bridge.invoke("create_event", VALID_ARGS.create_event, "s1");

      expect(outcome.status === "error" && outcome.code).toBe("AmbiguousSideEffect");
      expect(calendar.calls.createEvent).toBe(1);
    });

    it("never offers a free slot that availability reports busy", async () => {
      const { bridge, calendar } = setup();
      await bridge.invoke(
        "create_event",
        { title: "Standup", start_time: "2024-10-15T10:00:00Z", end_time: "2024-10-15T11:00:00Z" },
        "s1",
      );
      calendar.externalBusy.set("grace@example.com", [
        { start: "2024-10-15T13:00:00Z", end: "2024-10-15T14:30:00Z" },
      ]);
      const attendees = ["grace@example.com"];

      const slots = await bridge.invoke(
        "find_free_slots",
        { date: "2024-10-15", duration_minutes: 60, attendees },
        "s1",
      );
      expect(slots).toEqual({
        status: "ok",
        text: [
          "Free slots on 2024-10-15 for 60 minutes:",
          "2024-10-15T09:00:00Z to 2024-10-15T10:00:00Z",
          "2024-10-15T11:00:00Z to 2024-10-15T13:00:00Z",
          "2024-10-15T14:30:00Z to 2024-10-15T18:00:00Z",
        ].join("\n"),
      });

      const slotLines = slots.status === "ok" ? slots.text.split("\n").slice(1) : [];
      for (const line of slotLines) {
        const [start_time, end_time] = line.split(" to ");
        const check = await bridge.invoke(
          "check_availability",
          { start_time, end_time, attendees },
          "s1",
        );
        expect(check).toEqual({ status: "ok", text: `Free from ${line}.` });
      }

      expect(
        await bridge.invoke(
          "check_availability",
          { start_time: "2024-10-15T12:30:00Z", end_time: "2024-10-15T13:30:00Z", attendees },
          "s1",
        ),
      ).toEqual({
        status: "ok",
        text: "Not available from 2024-10-15T12:30:00Z to 2024-10-15T13:30:00Z. Conflicts: 2024-10-15T13:00:00Z to 2024-10-15T14:30:00Z.",
      });
    });
  });

  describe("unreadable calendars", () => {
    it("does not call an attendee free when their calendar could not be read", async () => {
      const { bridge, calendar } = setup();
      calendar.unreadable.add("bob@example.com");

      expect(
        await bridge.invoke(
          "check_availability",
          { ...VALID_ARGS.check_availability, attendees: ["bob@example.com"] },
          "s1",
        ),
      ).toEqual({
        status: "ok",
        text: "No conflicts from 2024-10-15T10:00:00Z to 2024-10-15T11:00:00Z on the calendars that could be read. Availability unknown for: bob@example.com (calendar not readable).",
      });
    });

    it("marks free slots that ignore an unreadable calendar", async () => {
      const { bridge, calendar } = setup();
      calendar.unreadable.add("bob@example.com");

      expect(
        await bridge.invoke(
          "find_free_slots",
          { date: "2024-10-15", attendees: ["bob@example.com"] },
          "s1",
        ),
      ).toEqual({
        status: "ok",
        text: [
          "Free slots on 2024-10-15 for 30 minutes:",
          "2024-10-15T09:00:00Z to 2024-10-15T18:00:00Z",
          "Availability unknown for: bob@example.com (calendar not readable). These slots ignore that calendar.",
        ].join("\n"),
      });
    });
  });

  describe("observability", () => {
    it("records each call with free text redacted", async () => {
      const { bridge, sink } = setup();
      await bridge.invoke("send_email", VALID_ARGS.send_email, "s1");
      await bridge.flush();

      expect(sink.records).toEqual([
        {
          tool: "send_email",
          arguments: { to: "ada@example.com", subject: "Hi", body: "[5 chars]" },
          resultSummary: 'Email sent to ada@example.com with subject "Hi". Message ID: sent-1.',
          status: "ok",
          errorCode: undefined,
          durationMs: 0,
          sessionId: "s1",
          timestamp: "2024-10-15T08:00:00.000Z",
        },
      ]);
    });

    it("records interruptions with their reason", async () => {
      const { bridge, sink } = setup();
      await bridge.invoke("list_emails", {}, "stranger");
      await bridge.flush();

      expect(sink.records[0]?.status).toBe("auth_required");
      expect(sink.records[0]?.errorCode).toBe("no_linked_account");
    });

    it("returns the result even when the sink fails", async () => {
      const { bridge, sink } = setup();
      sink.failWith = new Error("sink down");

      const outcome = await bridge.invoke("list_emails", {}, "s1");
      await bridge.flush();

      expect(outcome.status).toBe("ok");
      expect(sink.records).toEqual([]);
    });
  });
});

describe("toAgentResult", () => {
  it("hands the agent text or the interruption object", async () => {
    const { bridge } = setup();
    expect(toAgentResult(await bridge.invoke("delete_event", { event_id: "x" }, "s1"))).toBe(
      "Event x was already deleted.",
    );
    expect(toAgentResult(await bridge.invoke("list_emails", {}, "stranger"))).toEqual({
      type: "google_auth_required",
      message: "Connect your Google account so I can continue listing emails.",
      action: "connect_google_account",
      reason: "no_linked_account",
      requiredScopes: ["https://www.googleapis.com/auth/gmail.readonly"],
    });
  });
});
