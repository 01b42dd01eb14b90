/**
 * Gmail API client wrapper bound to a single access token.
 */

import { type gmail_v1, google } from "googleapis";

import { mapWithConcurrency } from "../utils/concurrency.js";
import { withTimeout } from "../utils/timeout.js";
import { normalizeProviderError, ProviderError } from "./errors.js";
import type {
  EmailMessage,
  EmailSummary,
  OutgoingEmail,
  SentEmail,
} from "./types.js";

export type MailProvider = {
  listMessages(options: {
    query?: string;
    maxResults: number;
    labelIds?: string[];
  }): Promise<EmailSummary[]>;
  getMessage(messageId: string): Promise<EmailMessage>;
  getThread(threadId: string): Promise<EmailMessage[]>;
  sendMessage(email: OutgoingEmail): Promise<SentEmail>;
};

export type GmailClientOptions = {
  timeoutMs: number;
};

const METADATA_HEADERS = ["From", "To", "Cc", "Subject", "Date", "Message-ID"];

// Metadata fetches in flight per listing.
const METADATA_CONCURRENCY = 10;

/**
 * Create a Gmail API client with the given access token.
 */
export function createGmailClient(
  accessToken: string,
  options: GmailClientOptions,
): MailProvider {
  const auth = new google.auth.OAuth2();
  auth.setCredentials({ access_token: accessToken });
  const gmail = google.gmail({ version: "v1", auth, timeout: options.timeoutMs });

  async function call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(run(), options.timeoutMs, operation);
    } catch (err) {
      throw normalizeProviderError(err, operation);
    }
  }

  async function getMetadata(messageId: string): Promise<EmailMessage> {
    const response = await call("gmail.messages.get", () =>
      gmail.users.messages.get({
        userId: "me",
        id: messageId,
        format: "metadata",
        metadataHeaders: METADATA_HEADERS,
      }),
    );
    return parseGmailMessage(response.data, false);
  }

  return {
    /**
     * List messages, optionally filtered by Gmail query syntax.
     * @see https://support.google.com/mail/answer/7190
     */
    async listMessages({ query, maxResults, labelIds }) {
      const response = await call("gmail.messages.list", () =>
        gmail.users.messages.list({
          userId: "me",
          q: query,
          labelIds,
          maxResults,
        }),
      );

      const ids = (response.data.messages ?? [])
        .map((m) => m.id)
        .filter((id): id is string => typeof id === "string" && id !== "");
      if (ids.length === 0) return [];

      const messages = await mapWithConcurrency(ids, METADATA_CONCURRENCY, async (id) => {
        try {
          return await getMetadata(id);
        } catch (err) {
          // Deleted between the list and the fetch.
          if (err instanceof ProviderError && err.status === 404) return undefined;
          throw err;
        }
      });
      return messages.filter((m): m is EmailMessage => m !== undefined);
    },

    async getMessage(messageId) {
      const response = await call("gmail.messages.get", () =>
        gmail.users.messages.get({ userId: "me", id: messageId, format: "full" }),
      );
      return parseGmailMessage(response.data, true);
    },

    async getThread(threadId) {
      const response = await call("gmail.threads.get", () =>
        gmail.users.threads.get({ userId: "me", id: threadId, format: "full" }),
      );
      return (response.data.messages ?? []).map((m) => parseGmailMessage(m, true));
    },

    async sendMessage(email) {
      const response = await call("gmail.messages.send", () =>
        gmail.users.messages.send({
          userId: "me",
          requestBody: {
            raw: buildRawMessage(email),
            threadId: email.threadId,
          },
        }),
      );
      return {
        id: response.data.id ?? "",
        threadId: response.data.threadId ?? email.threadId ?? "",
      };
    },
  };
}

/**
 * Parse Gmail API message response into our types.
 */
export function parseGmailMessage(
  message: gmail_v1.Schema$Message,
  includeBody: boolean,
): EmailMessage {
  const headers = message.payload?.headers ?? [];
  const getHeader = (name: string) =>
    headers.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value ??
    "";

  const labels = message.labelIds ?? [];
  const cc = parseAddressList(getHeader("cc"));
  const messageIdHeader = getHeader("message-id");

  return {
    id: message.id ?? "",
    threadId: message.threadId ?? "",
    from: getHeader("from"),
    to: parseAddressList(getHeader("to")),
    cc: cc.length > 0 ? cc : undefined,
    subject: getHeader("subject"),
    date: parseEmailDate(getHeader("date")),
    snippet: message.snippet ?? "",
    unread: labels.includes("UNREAD"),
    labels,
    messageIdHeader: messageIdHeader || undefined,
    body: includeBody && message.payload ? extractBodyText(message.payload) : "",
  };
}

/**
 * Parse email address list (e.g., "John <john@example.com>, Jane <jane@example.com>").
 */
export function parseAddressList(value: string): string[] {
  if (!value.trim()) return [];
  // Split by comma, but be careful of commas inside quotes
  return value
    .split(/,(?=(?:[^"]*"[^"]*")*[^"]*$)/)
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Convert email date string to ISO 8601, keeping the raw value if unparseable.
 */
function parseEmailDate(dateStr: string): string {
  if (!dateStr) return "";
  const date = new Date(dateStr);
  return Number.isNaN(date.getTime()) ? dateStr : date.toISOString();
}

/**
 * Prefer the first text/plain part; fall back to text/html with tags stripped.
 */
export function extractBodyText(payload: gmail_v1.Schema$MessagePart): string {
  let text: string | undefined;
  let html: string | undefined;

  function processPayload(part: gmail_v1.Schema$MessagePart) {
    const mimeType = part.mimeType ?? "";

    if (mimeType === "text/plain" && part.body?.data && text === undefined) {
      text = decodeBase64Url(part.body.data);
    } else if (mimeType === "text/html" && part.body?.data && html === undefined) {
      html = decodeBase64Url(part.body.data);
    }

    for (const subPart of part.parts ?? []) {
      processPayload(subPart);
    }
  }

  processPayload(payload);

  if (text !== undefined) return text.trim();
  if (html !== undefined) return htmlToText(html);
  return "";
}

function htmlToText(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, "")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/p>/gi, "\n")
    .replace(/<[^>]+>/g, "")
    .replace(/&nbsp;/g, " ")
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/[ \t]+/g, " ")
    .replace(/\n\s*\n+/g, "\n\n")
    .trim();
}

function decodeBase64Url(data: string): string {
  return Buffer.from(data, "base64url").toString("utf-8");
}

function sanitizeHeader(value: string): string {
  return value.replace(/[\r\n]+/g, " ").trim();
}

function encodeHeaderWord(value: string): string {
  // RFC 2047 encoded-word for anything outside printable ASCII
  if (/^[\x20-\x7e]*$/.test(value)) return value;
  return `=?UTF-8?B?${Buffer.from(value, "utf-8").toString("base64")}?=`;
}

/**
 * Build an RFC 2822 message and encode it as base64url for `messages.send`.
 */
export function buildRawMessage(email: OutgoingEmail): string {
  const headers = [
    `To: ${sanitizeHeader(email.to)}`,
    `Subject: ${encodeHeaderWord(sanitizeHeader(email.subject))}`,
    "MIME-Version: 1.0",
    'Content-Type: text/plain; charset="UTF-8"',
    "Content-Transfer-Encoding: base64",
  ];
  if (email.inReplyTo) {
    headers.push(`In-Reply-To: ${sanitizeHeader(email.inReplyTo)}`);
  }
  if (email.references) {
    headers.push(`References: ${sanitizeHeader(email.references)}`);
  }

  const body = Buffer.from(email.body, "utf-8")
    .toString("base64")
    .replace(/(.{76})/g, "$1\r\n");

  const message = `${headers.join("\r\n")}\r\n\r\n${body}`;
  return Buffer.from(message, "utf-8").toString("base64url");
}
