/**
 * Runs one agent tool call: validate arguments, resolve a scoped token, call
 * Google, format the result. Every path ends in a ToolOutcome; nothing here
 * throws to the agent runtime and nothing is retried.
 */

import type { Static, TObject } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import type { CredentialResolver } from "../auth/credential-resolver.js";
import { CredentialError, ToolArgumentError, formatErrorMessage } from "../errors.js";
import { formatFailure, truncate } from "../format/formatter.js";
import type { CalendarProvider } from "../google/calendar-client.js";
import { ProviderError } from "../google/errors.js";
import type { MailProvider } from "../google/gmail-client.js";
import { toScopeUrl } from "../google/scopes.js";
import type { AccessToken, GoogleScope } from "../google/types.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging.js";
import { redactArguments, type SinkDispatcher } from "../observability/sink.js";
import { findBridgeTool } from "./bridge-tools.js";
import {
  AmbiguousSideEffectError,
  type AnyAgentTool,
  type AuthRequiredReason,
  requiredScopes,
  type ToolErrorCode,
  type ToolOutcome,
} from "./tools/common.js";

export type ToolCall = {
  name: string;
  arguments: unknown;
  sessionId: string;
};

export type InvocationPhase = "validating" | "resolving" | "calling";

export type ToolInvocationContext = {
  credentials: Pick<CredentialResolver, "resolve" | "invalidate">;
  createMailProvider(token: AccessToken): MailProvider;
  createCalendarProvider(token: AccessToken): CalendarProvider;
  dispatcher?: SinkDispatcher;
  maxChars: number;
  workday: { startHour: number; endHour: number };
  now?: () => number;
  logger?: SubsystemLogger;
};

const SUMMARY_MAX_CHARS = 200;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeIssuePath(path: string): string {
  return path.replace(/^\//, "").replaceAll("/", ".") || "arguments";
}

/** Clean, default, coerce and check raw JSON arguments against a tool schema. */
export function validateToolArguments<T extends TObject>(
  schema: T,
  raw: unknown,
): Static<T> {
  const input = raw === undefined || raw === null ? {} : raw;
  if (!isRecord(input)) {
    throw new ToolArgumentError(["arguments must be a JSON object"]);
  }

  const value = Value.Convert(
    schema,
    Value.Default(schema, Value.Clean(schema, Value.Clone(input))),
  );
  if (!Value.Check(schema, value)) {
    const issues = [...Value.Errors(schema, value)].map(
      (error) => `${describeIssuePath(error.path)}: ${error.message}`,
    );
    throw new ToolArgumentError(issues.length > 0 ? issues : ["arguments are invalid"]);
  }
  return value;
}

function authRequired(
  tool: AnyAgentTool,
  reason: AuthRequiredReason,
  scopes: readonly GoogleScope[],
): ToolOutcome {
  const messages: Record<AuthRequiredReason, string> = {
    no_linked_account: `Connect your Google account so I can continue ${tool.activity}.`,
    refresh_failed:
      "Your Google authorization has expired or was revoked. Reconnect your Google account to continue.",
    insufficient_scope: `Your Google account has not granted the permission needed for ${tool.activity}. Reconnect it and approve the requested access.`,
    token_rejected:
      "Google rejected the stored authorization. Reconnect your Google account to continue.",
  };
  return {
    status: "auth_required",
    interruption: {
      type: "google_auth_required",
      message: messages[reason],
      action: "connect_google_account",
      reason,
      requiredScopes: scopes.map(toScopeUrl),
    },
  };
}

function failure(
  code: ToolErrorCode,
  activity: string,
  detail?: string,
): ToolOutcome {
  return {
    status: "error",
    code,
    text: formatFailure(code, activity, detail),
    retryable: code === "RateLimited" || code === "Unavailable",
  };
}

function credentialOutcome(
  tool: AnyAgentTool,
  err: CredentialError,
  scopes: readonly GoogleScope[],
): ToolOutcome {
  switch (err.code) {
    case "NoLinkedAccount":
      return authRequired(tool, "no_linked_account", scopes);
    case "RefreshFailed":
      return authRequired(tool, "refresh_failed", scopes);
    case "InsufficientScope":
      return authRequired(tool, "insufficient_scope", scopes);
    case "Unavailable":
      return failure("Unavailable", tool.activity);
  }
}

export async function invokeTool(
  context: ToolInvocationContext,
  call: ToolCall,
): Promise<ToolOutcome> {
  const now = context.now ?? Date.now;
  const log = context.logger ?? createSubsystemLogger("tools");
  const startedAt = now();

  const tool = findBridgeTool(call.name);
  let phase: InvocationPhase = "validating";

  const outcome = await (async (): Promise<ToolOutcome> => {
    if (!tool) {
      return {
        status: "error",
        code: "InvalidArgument",
        text: `Unknown tool: ${call.name}.`,
        retryable: false,
      };
    }

    let scopes: GoogleScope[] = [tool.scope];
    try {
      const args = validateToolArguments(tool.parameters, call.arguments);
      const issues = tool.check?.(args) ?? [];
      if (issues.length > 0) throw new ToolArgumentError(issues);

      phase = "resolving";
      scopes = requiredScopes(tool, args);
      const token = await context.credentials.resolve(call.sessionId, scopes);

      phase = "calling";
      const text = await tool.run(args, {
        mail: context.createMailProvider(token),
        calendar: context.createCalendarProvider(token),
        maxChars: context.maxChars,
        workday: context.workday,
      });
      return { status: "ok", text };
    } catch (err) {
      if (err instanceof ToolArgumentError) {
        return failure("InvalidArgument", tool.activity, err.issues.join("; "));
      }
      if (err instanceof CredentialError) {
        return credentialOutcome(tool, err, scopes);
      }
      if (err instanceof AmbiguousSideEffectError) {
        log.warn("Side effect outcome unknown", {
          tool: tool.name,
          sessionId: call.sessionId,
          error: err.message,
        });
        return failure("AmbiguousSideEffect", tool.activity);
      }
      if (err instanceof ProviderError) {
        if (err.kind === "Unauthorized") {
          context.credentials.invalidate(call.sessionId);
          return authRequired(tool, "token_rejected", scopes);
        }
        if (err.kind === "InvalidArgument") {
          return failure("InvalidArgument", tool.activity, "Google rejected the request");
        }
        return failure(err.kind, tool.activity);
      }
      log.error("Tool call failed unexpectedly", {
        tool: tool.name,
        phase,
        sessionId: call.sessionId,
        error: formatErrorMessage(err),
      });
      return failure("Unavailable", tool.activity);
    }
  })();

  const durationMs = now() - startedAt;
  const errorCode =
    outcome.status === "error"
      ? outcome.code
      : outcome.status === "auth_required"
        ? outcome.interruption.reason
        : undefined;

  log.info("Tool call finished", {
    tool: call.name,
    sessionId: call.sessionId,
    status: outcome.status,
    errorCode,
    phase,
    durationMs,
  });

  context.dispatcher?.dispatch({
    tool: call.name,
    arguments: isRecord(call.arguments) ? redactArguments(call.arguments) : {},
    resultSummary:
      outcome.status === "auth_required"
        ? outcome.interruption.message
        : truncate(outcome.text, SUMMARY_MAX_CHARS),
    status: outcome.status,
    errorCode,
    durationMs,
    sessionId: call.sessionId,
    timestamp: new Date(startedAt).toISOString(),
  });

  return outcome;
}
