/**
 * Gmail tools for the agent: inbox listing, search, reading, drafting and sending.
 */

import { Type } from "@sinclair/typebox";

import {
  formatDraftReply,
  formatEmail,
  formatEmailList,
  formatSentEmail,
  replySubject,
} from "../../format/formatter.js";
import type { OutgoingEmail } from "../../google/types.js";
import { checkEmails, defineTool, sideEffect } from "./common.js";

const MaxResults = Type.Optional(
  Type.Integer({
    minimum: 1,
    maximum: 100,
    default: 10,
    description: "Maximum number of messages to return (1-100, default: 10)",
  }),
);

const EmailId = Type.String({
  minLength: 1,
  description: "Gmail message ID, as shown by list_emails or search_emails",
});

export const listEmailsTool = defineTool({
  name: "list_emails",
  label: "List emails",
  description: "List the most recent messages in the user's inbox, newest first.",
  activity: "listing emails",
  scope: "gmail.readonly",
  parameters: Type.Object({ max_results: MaxResults }),
  async run(args, ctx) {
    const emails = await ctx.mail.listMessages({
      maxResults: args.max_results ?? 10,
      labelIds: ["INBOX"],
    });
    return formatEmailList(emails, ctx.maxChars);
  },
});

export const getEmailTool = defineTool({
  name: "get_email",
  label: "Read email",
  description: "Read one message in full, together with the rest of its thread.",
  activity: "reading the email",
  scope: "gmail.readonly",
  parameters: Type.Object({ email_id: EmailId }),
  async run(args, ctx) {
    const message = await ctx.mail.getMessage(args.email_id);
    const thread = message.threadId ? await ctx.mail.getThread(message.threadId) : [];
    return formatEmail(message, thread, ctx.maxChars);
  },
});

export const searchEmailsTool = defineTool({
  name: "search_emails",
  label: "Search emails",
  description: `Search messages with a Gmail query (same syntax as the Gmail search box).

Examples:
- Unread: search_emails { query: "is:unread" }
- From a person: search_emails { query: "from:boss@example.com" }
- By subject and date: search_emails { query: "subject:invoice after:2024/01/01" }`,
  activity: "searching emails",
  scope: "gmail.readonly",
  parameters: Type.Object({
    query: Type.String({ description: "Gmail search query" }),
    max_results: MaxResults,
  }),
  check(args) {
    return args.query.trim() ? [] : ["query must not be empty"];
  },
  async run(args, ctx) {
    const emails = await ctx.mail.listMessages({
      query: args.query.trim(),
      maxResults: args.max_results ?? 10,
    });
    return formatEmailList(emails, ctx.maxChars);
  },
});

export const draftReplyTool = defineTool({
  name: "draft_reply",
  label: "Draft reply",
  description:
    "Compose a reply to a message following the given instructions. Nothing is sent; " +
    "use send_email with reply_to_id once the user approves the draft.",
  activity: "drafting the reply",
  scope: "gmail.readonly",
  parameters: Type.Object({
    email_id: EmailId,
    instructions: Type.String({ description: "What the reply should say" }),
  }),
  check(args) {
    return args.instructions.trim() ? [] : ["instructions must not be empty"];
  },
  async run(args, ctx) {
    const message = await ctx.mail.getMessage(args.email_id);
    return formatDraftReply(message, args.instructions, ctx.maxChars);
  },
});

export const sendEmailTool = defineTool({
  name: "send_email",
  label: "Send email",
  description:
    "Send a plain-text email. Pass reply_to_id to answer an existing message in its thread; " +
    "the subject then defaults to the original's with a Re: prefix.",
  activity: "sending the email",
  scope: "gmail.send",
  extraScopes(args) {
    // A reply reads the original message for its thread and headers.
    return args.reply_to_id ? ["gmail.readonly"] : [];
  },
  parameters: Type.Object({
    to: Type.String({ description: "Recipient email address" }),
    subject: Type.Optional(Type.String({ default: "" })),
    body: Type.String({ description: "Plain-text message body" }),
    reply_to_id: Type.Optional(
      Type.String({ minLength: 1, description: "Message ID being replied to" }),
    ),
  }),
  check(args) {
    const issues = checkEmails("to", [args.to]);
    if (!args.body.trim()) issues.push("body must not be empty");
    if (!args.reply_to_id && !args.subject?.trim()) {
      issues.push("subject must not be empty unless replying");
    }
    return issues;
  },
  async run(args, ctx) {
    const email: OutgoingEmail = {
      to: args.to.trim(),
      subject: args.subject?.trim() ?? "",
      body: args.body,
    };

    if (args.reply_to_id) {
      const original = await ctx.mail.getMessage(args.reply_to_id);
      email.threadId = original.threadId || undefined;
      if (original.messageIdHeader) {
        email.inReplyTo = original.messageIdHeader;
        email.references = original.messageIdHeader;
      }
      if (!email.subject) email.subject = replySubject(original.subject);
    }

    const sent = await sideEffect(() => ctx.mail.sendMessage(email));
    return formatSentEmail(email, sent);
  },
});
