import type { SalvoErrorCode } from "../types/index.js";

const DEFAULT_MAX_ENTRIES = 500;
const DEFAULT_LIST_LIMIT = 100;
const MAX_DEPTH = 6;
const SENSITIVE_KEY = /prompt|secret|token|password/i;

export interface EventResultSummary {
  status: "ok" | "error";
  message: string;
  errorCode?: SalvoErrorCode;
}

export interface ToolInvocationEvent {
  timestamp: string;
  toolName: string;
  sessionId?: string;
  params: unknown;
  resultSummary: EventResultSummary;
  durationMs: number;
}

export type EventLogRecordInput = Omit<ToolInvocationEvent, "timestamp"> & { timestamp?: string };

export interface EventLogQuery {
  limit?: number;
  toolName?: string;
}

export interface ToolCallStats {
  calls: number;
  errors: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null;
};

/** Prompt text is replaced by its length so a reader can still tell an empty prompt from a long one. */
const redactSensitive = (value: unknown): string => {
  return typeof value === "string" ? `[REDACTED:${value.length} chars]` : "[REDACTED]";
};

const scrub = (value: unknown, depth: number): unknown => {
  if (depth > MAX_DEPTH) {
    return "[TRUNCATED]";
  }

  if (Array.isArray(value)) {
    return value.map((entry) => scrub(entry, depth + 1));
  }

  if (!isRecord(value)) {
    return value;
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [
      key,
      SENSITIVE_KEY.test(key) ? redactSensitive(entry) : scrub(entry, depth + 1)
    ])
  );
};

/** Bounded in-memory history of MCP tool calls, newest last. */
export class EventLog {
  private readonly events: ToolInvocationEvent[] = [];

  public constructor(private readonly maxEntries: number = DEFAULT_MAX_ENTRIES) {}

  public record(input: EventLogRecordInput): ToolInvocationEvent {
    const event: ToolInvocationEvent = {
      timestamp: input.timestamp ?? new Date().toISOString(),
      toolName: input.toolName,
      ...(input.sessionId === undefined ? {} : { sessionId: input.sessionId }),
      params: scrub(input.params, 0),
      resultSummary: input.resultSummary,
      durationMs: input.durationMs
    };

    this.events.push(event);
    const overflow = this.events.length - this.maxEntries;
    if (overflow > 0) {
      this.events.splice(0, overflow);
    }

    return event;
  }

  public list(query: EventLogQuery = {}): readonly ToolInvocationEvent[] {
    const limit = Math.max(1, query.limit ?? DEFAULT_LIST_LIMIT);
    const matching =
      query.toolName === undefined ? this.events : this.events.filter((event) => event.toolName === query.toolName);
    return matching.slice(-limit);
  }

  /** Call and error counts per tool over the retained history. */
  public stats(): Record<string, ToolCallStats> {
    const stats: Record<string, ToolCallStats> = {};
    for (const event of this.events) {
      const entry = stats[event.toolName] ?? { calls: 0, errors: 0 };
      entry.calls += 1;
      if (event.resultSummary.status === "error") {
        entry.errors += 1;
      }
      stats[event.toolName] = entry;
    }

    return stats;
  }
}
