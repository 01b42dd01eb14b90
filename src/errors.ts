/**
 * Error types shared across the bridge. Each carries a `code` so callers can
 * branch without string matching.
 */

export type CredentialErrorCode =
  | "NoLinkedAccount"
  | "RefreshFailed"
  | "InsufficientScope"
  | "Unavailable";

export class CredentialError extends Error {
  readonly code: CredentialErrorCode;
  readonly sessionId: string;

  constructor(code: CredentialErrorCode, sessionId: string, message: string) {
    super(message);
    this.name = "CredentialError";
    this.code = code;
    this.sessionId = sessionId;
  }
}

export class ToolArgumentError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join("; "));
    this.name = "ToolArgumentError";
    this.issues = issues;
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
