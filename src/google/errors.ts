/**
 * Normalization of Google API failures into the bridge's provider taxonomy.
 */

import { GaxiosError } from "gaxios";

import { TimeoutError } from "../errors.js";

export type ProviderErrorKind =
  | "Unauthorized"
  | "NotFound"
  | "RateLimited"
  | "InvalidArgument"
  | "Unavailable";

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly status?: number;
  readonly reason?: string;
  /** The request may have reached Google before failing (timeout, reset). */
  readonly ambiguous: boolean;

  constructor(
    kind: ProviderErrorKind,
    message: string,
    options: {
      status?: number;
      reason?: string;
      ambiguous?: boolean;
      cause?: unknown;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.kind = kind;
    this.status = options.status;
    this.reason = options.reason;
    this.ambiguous = options.ambiguous ?? false;
  }
}

const RATE_LIMIT_REASONS = new Set([
  "rateLimitExceeded",
  "userRateLimitExceeded",
  "quotaExceeded",
  "dailyLimitExceeded",
]);

const SCOPE_REASONS = new Set([
  "insufficientPermissions",
  "ACCESS_TOKEN_SCOPE_INSUFFICIENT",
  "authError",
]);

// Failures after the request may already have been written to the socket.
const IN_FLIGHT_CODES = new Set([
  "ETIMEDOUT",
  "ESOCKETTIMEDOUT",
  "ECONNRESET",
  "ECONNABORTED",
  "EPIPE",
]);

// Failures before anything reached Google.
const CONNECT_CODES = new Set([
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ENETUNREACH",
  "EHOSTUNREACH",
]);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined;
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

/**
 * Pull the first `reason` out of a Google JSON error body:
 * `{ error: { errors: [{ reason }], details: [{ reason }] } }`.
 */
export function extractGoogleErrorReason(data: unknown): string | undefined {
  const error = readProperty(data, "error");
  for (const listKey of ["errors", "details"]) {
    const list = readProperty(error, listKey);
    if (!Array.isArray(list)) continue;
    for (const entry of list) {
      const reason = readProperty(entry, "reason");
      if (typeof reason === "string") return reason;
    }
  }
  return undefined;
}

function classifyStatus(status: number, reason?: string): ProviderErrorKind {
  if (status === 401) return "Unauthorized";
  if (status === 429) return "RateLimited";
  if (status === 403) {
    if (reason && RATE_LIMIT_REASONS.has(reason)) return "RateLimited";
    if (reason && SCOPE_REASONS.has(reason)) return "Unauthorized";
    return "NotFound";
  }
  if (status === 404 || status === 410) return "NotFound";
  if (status >= 500) return "Unavailable";
  return "InvalidArgument";
}

function errorCode(err: unknown): string | undefined {
  const code = readProperty(err, "code");
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

export function normalizeProviderError(
  err: unknown,
  operation: string,
): ProviderError {
  if (err instanceof ProviderError) return err;

  if (err instanceof TimeoutError) {
    return new ProviderError("Unavailable", `${operation} timed out`, {
      ambiguous: true,
      cause: err,
    });
  }

  const status =
    err instanceof GaxiosError
      ? (err.response?.status ?? err.status)
      : undefined;

  if (err instanceof GaxiosError && typeof status === "number") {
    const reason = extractGoogleErrorReason(err.response?.data);
    const kind = classifyStatus(status, reason);
    return new ProviderError(kind, `${operation} failed (HTTP ${status})`, {
      status,
      reason,
      cause: err,
    });
  }

  const code = errorCode(err);
  if (code && IN_FLIGHT_CODES.has(code)) {
    return new ProviderError("Unavailable", `${operation} failed: ${code}`, {
      reason: code,
      ambiguous: true,
      cause: err,
    });
  }
  if (code && CONNECT_CODES.has(code)) {
    return new ProviderError("Unavailable", `${operation} failed: ${code}`, {
      reason: code,
      cause: err,
    });
  }
  if (readProperty(err, "type") === "request-timeout") {
    return new ProviderError("Unavailable", `${operation} timed out`, {
      ambiguous: true,
      cause: err,
    });
  }

  return new ProviderError("Unavailable", `${operation} failed unexpectedly`, {
    cause: err,
  });
}
