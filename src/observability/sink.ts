/**
 * Best-effort delivery of tool-call records to the learning/observability
 * platform. Nothing here may delay or alter a tool result.
 */

import { formatErrorMessage } from "../errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging.js";
import { withTimeout } from "../utils/timeout.js";

export type ToolCallRecord = {
  tool: string;
  arguments: Record<string, unknown>;
  resultSummary: string;
  status: "ok" | "auth_required" | "error";
  errorCode?: string;
  durationMs: number;
  sessionId: string;
  timestamp: string; // ISO 8601
};

/** Body posted to the observability platform. */
export type WireToolCallRecord = {
  tool: string;
  arguments: Record<string, unknown>;
  result_summary: string;
  status: ToolCallRecord["status"];
  error_code?: string;
  duration: number; // ms
  session_id: string;
  timestamp: string;
};

export function toWireRecord(record: ToolCallRecord): WireToolCallRecord {
  return {
    tool: record.tool,
    arguments: record.arguments,
    result_summary: record.resultSummary,
    status: record.status,
    error_code: record.errorCode,
    duration: record.durationMs,
    session_id: record.sessionId,
    timestamp: record.timestamp,
  };
}

export type ToolCallSink = {
  record(record: ToolCallRecord): Promise<void>;
};

const REDACTED_ARGUMENTS = new Set(["body", "instructions"]);

/** Strip free-text payloads before records leave the process. */
export function redactArguments(
  args: Record<string, unknown>,
): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args)) {
    redacted[key] =
      REDACTED_ARGUMENTS.has(key) && typeof value === "string"
        ? `[${value.length} chars]`
        : value;
  }
  return redacted;
}

export function createHttpSink(options: {
  url: string;
  apiKey?: string;
  timeoutMs: number;
}): ToolCallSink {
  return {
    async record(record) {
      const headers: Record<string, string> = {
        "Content-Type": "application/json",
      };
      if (options.apiKey) headers.Authorization = `Bearer ${options.apiKey}`;

      const response = await fetch(options.url, {
        method: "POST",
        headers,
        body: JSON.stringify(toWireRecord(record)),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`Observability sink responded ${response.status}`);
      }
    },
  };
}

export function createLogSink(logger?: SubsystemLogger): ToolCallSink {
  const log = logger ?? createSubsystemLogger("tool-calls");
  return {
    async record(record) {
      log.info("Tool call", { ...record });
    },
  };
}

/**
 * Fire-and-forget dispatcher. Deliveries are bounded in time, failures are
 * logged and dropped, and `flush()` waits for whatever is still pending.
 */
export class SinkDispatcher {
  private readonly pending = new Set<Promise<void>>();
  private readonly log: SubsystemLogger;

  constructor(
    private readonly sinks: ToolCallSink[],
    private readonly timeoutMs: number,
    logger?: SubsystemLogger,
  ) {
    this.log = logger ?? createSubsystemLogger("observability");
  }

  dispatch(record: ToolCallRecord): void {
    for (const sink of this.sinks) {
      const delivery = this.deliver(sink, record);
      this.pending.add(delivery);
      void delivery.finally(() => this.pending.delete(delivery));
    }
  }

  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private async deliver(sink: ToolCallSink, record: ToolCallRecord): Promise<void> {
    try {
      // Defer so the sink never runs on the caller's stack.
      await Promise.resolve();
      await withTimeout(sink.record(record), this.timeoutMs, "observability sink");
    } catch (err) {
      this.log.warn("Dropped tool-call record", {
        tool: record.tool,
        error: formatErrorMessage(err),
      });
    }
  }
}
