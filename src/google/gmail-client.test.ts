import { describe, expect, it } from "vitest";

import {
  buildRawMessage,
  extractBodyText,
  parseAddressList,
  parseGmailMessage,
} from "./gmail-client.js";

const b64 = (value: string) => Buffer.from(value, "utf-8").toString("base64url");

describe("parseGmailMessage", () => {
  it("maps headers, labels and the unread flag", () => {
    const parsed = parseGmailMessage(
      {
        id: "msg-1",
        threadId: "thr-1",
        snippet: "See you at lunch",
        labelIds: ["INBOX", "UNREAD"],
        payload: {
          headers: [
            { name: "From", value: "Ada <ada@example.com>" },
            { name: "To", value: '"Lovelace, Ada" <ada@example.com>, bob@example.com' },
            { name: "Subject", value: "Lunch" },
            { name: "Date", value: "Tue, 15 Oct 2024 10:30:00 +0000" },
            { name: "Message-ID", value: "<abc@mail.example.com>" },
          ],
        },
      },
      false,
    );

    expect(parsed).toEqual({
      id: "msg-1",
      threadId: "thr-1",
      from: "Ada <ada@example.com>",
      to: ['"Lovelace, Ada" <ada@example.com>', "bob@example.com"],
      cc: undefined,
      subject: "Lunch",
      date: "2024-10-15T10:30:00.000Z",
      snippet: "See you at lunch",
      unread: true,
      labels: ["INBOX", "UNREAD"],
      messageIdHeader: "<abc@mail.example.com>",
      body: "",
    });
  });

  it("tolerates a message with no payload", () => {
    const parsed = parseGmailMessage({ id: "m" }, true);
    expect(parsed.from).toBe("");
    expect(parsed.date).toBe("");
    expect(parsed.unread).toBe(false);
    expect(parsed.body).toBe("");
  });

  it("keeps unparseable dates as-is", () => {
    const parsed = parseGmailMessage(
      { payload: { headers: [{ name: "Date", value: "sometime" }] } },
      false,
    );
    expect(parsed.date).toBe("sometime");
  });
});

describe("extractBodyText", () => {
  it("prefers text/plain over html in multipart payloads", () => {
    expect(
      extractBodyText({
        mimeType: "multipart/alternative",
        parts: [
          { mimeType: "text/html", body: { data: b64("<p>Hi <b>there</b></p>") } },
          { mimeType: "text/plain", body: { data: b64("Hi there\n") } },
        ],
      }),
    ).toBe("Hi there");
  });

  it("falls back to html with tags stripped", () => {
    expect(
      extractBodyText({
        mimeType: "text/html",
        body: { data: b64("<p>Hello&nbsp;world</p><br>Bye &amp; thanks") },
      }),
    ).toBe("Hello world\n\nBye & thanks");
  });
});

describe("parseAddressList", () => {
  it("returns an empty list for blank headers", () => {
    expect(parseAddressList("  ")).toEqual([]);
  });
});

describe("buildRawMessage", () => {
  it("encodes a threaded reply with base64 body", () => {
    const raw = buildRawMessage({
      to: "bob@example.com",
      subject: "Re: Lunch",
      body: "Sounds good",
      threadId: "thr-1",
      inReplyTo: "<abc@mail.example.com>",
      references: "<abc@mail.example.com>",
    });
    const decoded = Buffer.from(raw, "base64url").toString("utf-8");
    expect(decoded).toBe(
      [
        "To: bob@example.com",
        "Subject: Re: Lunch",
        "MIME-Version: 1.0",
        'Content-Type: text/plain; charset="UTF-8"',
        "Content-Transfer-Encoding: base64",
        "In-Reply-To: <abc@mail.example.com>",
        "References: <abc@mail.example.com>",
        "",
        Buffer.from("Sounds good").toString("base64"),
      ].join("\r\n"),
    );
  });

  it("strips header line breaks and encodes non-ASCII subjects", () => {
    const raw = buildRawMessage({
      to: "bob@example.com\r\nBcc: eve@example.com",
      subject: "Café",
      body: "x",
    });
    const decoded = Buffer.from(raw, "base64url").toString("utf-8");
    const lines = decoded.split("\r\n");
    expect(lines[0]).toBe("To: bob@example.com Bcc: eve@example.com");
    expect(lines[1]).toBe(
      `Subject: =?UTF-8?B?${Buffer.from("Café").toString("base64")}?=`,
    );
  });
});
