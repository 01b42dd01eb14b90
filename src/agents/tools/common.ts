import type { Static, TObject } from "@sinclair/typebox";

import { ToolArgumentError } from "../../errors.js";
import type { FailureCode } from "../../format/formatter.js";
import type { CalendarProvider } from "../../google/calendar-client.js";
import { ProviderError } from "../../google/errors.js";
import type { MailProvider } from "../../google/gmail-client.js";
import type { GoogleScope } from "../../google/types.js";

export const TOOL_NAMES = [
  "list_emails",
  "get_email",
  "search_emails",
  "draft_reply",
  "send_email",
  "get_schedule",
  "check_availability",
  "find_free_slots",
  "create_event",
  "delete_event",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

// -----------------------------------------------------------------------------
// Outcomes
// -----------------------------------------------------------------------------

export type AuthRequiredReason =
  | "no_linked_account"
  | "refresh_failed"
  | "insufficient_scope"
  | "token_rejected";

export type GoogleAuthInterruption = {
  type: "google_auth_required";
  message: string;
  action: "connect_google_account";
  reason: AuthRequiredReason;
  requiredScopes: string[];
};

export type ToolErrorCode = FailureCode;

export type ToolOutcome =
  | { status: "ok"; text: string }
  | { status: "auth_required"; interruption: GoogleAuthInterruption }
  | { status: "error"; code: ToolErrorCode; text: string; retryable: boolean };

/** What the agent runtime receives: plain text, or an interruption to branch on. */
export type AgentToolResult = string | GoogleAuthInterruption;

export function toAgentResult(outcome: ToolOutcome): AgentToolResult {
  switch (outcome.status) {
    case "ok":
    case "error":
      return outcome.text;
    case "auth_required":
      return outcome.interruption;
  }
}

// -----------------------------------------------------------------------------
// Definitions
// -----------------------------------------------------------------------------

export type ToolRunContext = {
  mail: MailProvider;
  calendar: CalendarProvider;
  maxChars: number;
  workday: { startHour: number; endHour: number };
};

export type ToolDefinition<TParams extends TObject = TObject> = {
  name: ToolName;
  label: string;
  description: string;
  /** Gerund phrase used in user-facing messages, e.g. "sending the email". */
  activity: string;
  scope: GoogleScope;
  /** Scopes these arguments need on top of `scope`. */
  extraScopes?(args: Static<TParams>): GoogleScope[];
  parameters: TParams;
  /** Semantic checks beyond the schema; returns human-readable issues. */
  check?(args: Static<TParams>): string[];
  run(args: Static<TParams>, ctx: ToolRunContext): Promise<string>;
};

export type AnyAgentTool = ToolDefinition;

/** JSON Schema description handed to the agent runtime. */
export type ToolDescriptor = {
  name: ToolName;
  description: string;
  parameters: TObject;
};

/** Every scope a call with these arguments needs, primary scope first. */
export function requiredScopes<TParams extends TObject>(
  tool: ToolDefinition<TParams>,
  args: Static<TParams>,
): GoogleScope[] {
  const extra = tool.extraScopes?.(args) ?? [];
  return [tool.scope, ...extra.filter((scope) => scope !== tool.scope)];
}

export function defineTool<TParams extends TObject>(
  definition: ToolDefinition<TParams>,
): ToolDefinition<TParams> {
  return definition;
}

// -----------------------------------------------------------------------------
// Side effects
// -----------------------------------------------------------------------------

/** A side-effecting call failed in a way that leaves its effect unknown. */
export class AmbiguousSideEffectError extends Error {
  constructor(cause: ProviderError) {
    super(cause.message, { cause });
    this.name = "AmbiguousSideEffectError";
  }
}

/**
 * Run a call that changes state at Google. Timeouts and dropped connections
 * surface as AmbiguousSideEffectError; nothing is retried.
 */
export async function sideEffect<T>(call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof ProviderError && err.ambiguous) {
      throw new AmbiguousSideEffectError(err);
    }
    throw err;
  }
}

// -----------------------------------------------------------------------------
// Argument helpers
// -----------------------------------------------------------------------------

const EMAIL_PATTERN = /^[^\s@<>(),;:"]+@[^\s@<>(),;:"]+\.[^\s@<>(),;:"]+$/;

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value.trim());
}

export const DATE_PATTERN = "^\\d{4}-\\d{2}-\\d{2}$";

/** True for a real calendar date in YYYY-MM-DD form. */
export function isCalendarDate(value: string): boolean {
  if (!new RegExp(DATE_PATTERN).test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

/**
 * Epoch ms for a YYYY-MM-DD date or an ISO 8601 date-time (offset-less
 * values are UTC); undefined when unparseable.
 */
export function parseTimeArg(value: string): number | undefined {
  const trimmed = value.trim();
  if (!trimmed.includes("T")) {
    return isCalendarDate(trimmed) ? Date.parse(`${trimmed}T00:00:00Z`) : undefined;
  }
  const hasOffset = /(Z|[+-]\d{2}:?\d{2})$/i.test(trimmed);
  const parsed = Date.parse(hasOffset ? trimmed : `${trimmed}Z`);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function requireTimeArg(field: string, value: string): number {
  const parsed = parseTimeArg(value);
  if (parsed === undefined) {
    throw new ToolArgumentError([`${field} is not a valid ISO 8601 time`]);
  }
  return parsed;
}

export function checkTimeRange(
  start: string,
  end: string,
  names: { start: string; end: string } = { start: "start_time", end: "end_time" },
): string[] {
  const startMs = parseTimeArg(start);
  const endMs = parseTimeArg(end);
  const issues: string[] = [];
  if (startMs === undefined) issues.push(`${names.start} is not a valid ISO 8601 time`);
  if (endMs === undefined) issues.push(`${names.end} is not a valid ISO 8601 time`);
  if (startMs !== undefined && endMs !== undefined && startMs >= endMs) {
    issues.push(`${names.start} must be before ${names.end}`);
  }
  return issues;
}

export function checkEmails(field: string, values: readonly string[]): string[] {
  return values
    .filter((value) => !isValidEmail(value))
    .map((value) => `${field} contains an invalid email address: ${JSON.stringify(value)}`);
}

/** Google answered 404 or 410; a 403 means the caller may not touch it. */
export function isGone(err: unknown): boolean {
  return err instanceof ProviderError && (err.status === 404 || err.status === 410);
}
