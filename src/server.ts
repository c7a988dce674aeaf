import { readFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z, type AnyZodObject, type ZodTypeAny } from "zod";

import type { SalvoRuntime } from "./runtime.js";
import { createSalvoError, isSalvoErrorCode, type SalvoError, type SalvoErrorCode } from "./types/index.js";
import { EventLog, type EventResultSummary } from "./utils/event-log.js";
import { isNodeError } from "./utils/atomic-write.js";
import type { Logger } from "./utils/logger.js";

const FALLBACK_VERSION = "0.0.0-dev";
const SERVER_NAME = "salvo";

const PackageJsonSchema = z.object({
  version: z.string().min(1)
});

export interface ToolMeta {
  warnings?: readonly string[];
  suggestions?: readonly string[];
}

/** What a tool handler returns: validated `data` plus advice the client may surface. */
export interface ToolResult<TData> {
  data: TData;
  meta?: ToolMeta;
}

export interface SalvoServerMetadata {
  name: string;
  version: string;
}

export interface SalvoToolContext {
  runtime: SalvoRuntime;
  metadata: SalvoServerMetadata;
  startedAtMs: number;
  eventLog: EventLog;
  logger: Logger;
  /** Aborted when the client cancels the request. */
  signal?: AbortSignal;
}

export interface SalvoToolDefinition<TInputSchema extends AnyZodObject, TOutputSchema extends ZodTypeAny> {
  name: string;
  title: string;
  description: string;
  inputSchema: TInputSchema;
  outputSchema: TOutputSchema;
  annotations?: {
    readOnlyHint?: boolean;
  };
  handler(
    input: z.infer<TInputSchema>,
    context: SalvoToolContext
  ): Promise<ToolResult<z.infer<TOutputSchema>>> | ToolResult<z.infer<TOutputSchema>>;
}

export type RegisteredSalvoTool = SalvoToolDefinition<AnyZodObject, ZodTypeAny>;

export interface SalvoServerConfig {
  runtime: SalvoRuntime;
  logger?: Logger;
  eventLogMaxEntries?: number;
}

type ToolEnvelope =
  | { [key: string]: unknown; ok: true; tool: string; result: ToolResult<unknown> }
  | { [key: string]: unknown; ok: false; tool: string; error: SalvoError };

const readPackageVersion = async (packagePath: string): Promise<string | null> => {
  let raw: string;
  try {
    raw = await readFile(packagePath, "utf8");
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return null;
    }

    throw error;
  }

  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.version : null;
  } catch (error: unknown) {
    if (error instanceof SyntaxError) {
      return null;
    }

    throw error;
  }
};

const resolveServerVersion = async (): Promise<string> => {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(moduleDir, "..", "package.json"),
    path.resolve(moduleDir, "..", "..", "package.json"),
    path.resolve(process.cwd(), "package.json")
  ];

  for (const candidate of candidates) {
    const version = await readPackageVersion(candidate);
    if (version !== null) {
      return version;
    }
  }

  return FALLBACK_VERSION;
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null;
};

const issuesOf = (error: z.ZodError): Array<{ path: string; code: string; message: string }> => {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    code: issue.code,
    message: issue.message
  }));
};

const normalizeError = (error: unknown): SalvoError => {
  if (error instanceof z.ZodError) {
    return createSalvoError("INVALID_INPUT", "Input validation failed.", false, { issues: issuesOf(error) });
  }

  if (isRecord(error) && typeof error.code === "string" && typeof error.message === "string") {
    const code: SalvoErrorCode = isSalvoErrorCode(error.code) ? error.code : "INTERNAL_ERROR";
    return createSalvoError(
      code,
      error.message,
      typeof error.retriable === "boolean" ? error.retriable : false,
      isRecord(error.details) ? error.details : undefined
    );
  }

  if (error instanceof Error) {
    return createSalvoError("INTERNAL_ERROR", error.message, false);
  }

  return createSalvoError("INTERNAL_ERROR", "Unexpected server error.", false, {
    value: String(error)
  });
};

const failure = (tool: string, error: SalvoError): ToolEnvelope => {
  return { ok: false, tool, error };
};

const summarize = (envelope: ToolEnvelope): EventResultSummary => {
  if (envelope.ok) {
    return { status: "ok", message: "ok" };
  }

  return { status: "error", message: envelope.error.message, errorCode: envelope.error.code };
};

const extractSessionId = (envelope: ToolEnvelope): string | undefined => {
  if (!envelope.ok || !isRecord(envelope.result.data)) {
    return undefined;
  }

  const candidate = envelope.result.data.sessionId;
  return typeof candidate === "string" && candidate.length > 0 ? candidate : undefined;
};

const toMcpResult = (envelope: ToolEnvelope) => {
  return {
    ...(envelope.ok ? {} : { isError: true }),
    content: [{ type: "text" as const, text: JSON.stringify(envelope, null, 2) }],
    structuredContent: envelope
  };
};

export const defineSalvoTool = <TInputSchema extends AnyZodObject, TOutputSchema extends ZodTypeAny>(
  definition: SalvoToolDefinition<TInputSchema, TOutputSchema>
): SalvoToolDefinition<TInputSchema, TOutputSchema> => {
  return definition;
};

/** MCP stdio server exposing the staging and fire operations as tools. */
export class SalvoServer {
  private readonly mcp: McpServer;
  private readonly runtime: SalvoRuntime;
  private readonly logger: Logger;
  private readonly eventLog: EventLog;
  private readonly metadata: SalvoServerMetadata;
  private readonly startedAtMs = Date.now();
  private readonly tools = new Map<string, RegisteredSalvoTool>();

  private constructor(config: SalvoServerConfig, version: string) {
    this.runtime = config.runtime;
    this.logger = config.logger ?? config.runtime.logger.child("server");
    this.eventLog = new EventLog(config.eventLogMaxEntries);
    this.metadata = { name: SERVER_NAME, version };
    this.mcp = new McpServer({ ...this.metadata });
  }

  public static async create(config: SalvoServerConfig): Promise<SalvoServer> {
    const version = await resolveServerVersion();
    return new SalvoServer(config, version);
  }

  public registerTools(definitions: readonly RegisteredSalvoTool[]): void {
    for (const definition of definitions) {
      this.registerTool(definition);
    }
  }

  public async startStdio(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.mcp.connect(transport);
    this.logger.info("Salvo server connected on stdio transport.", {
      toolCount: this.tools.size
    });
  }

  /** Stops any fire session this process runs, then closes the transport. */
  public async close(): Promise<void> {
    await this.runtime.controller.stop();
    await this.mcp.close();
  }

  public getEventLog(): EventLog {
    return this.eventLog;
  }

  public getMetadata(): SalvoServerMetadata {
    return this.metadata;
  }

  public getToolNames(): readonly string[] {
    return [...this.tools.keys()].sort((left, right) => left.localeCompare(right));
  }

  private registerTool(definition: RegisteredSalvoTool): void {
    if (this.tools.has(definition.name)) {
      throw createSalvoError("INTERNAL_ERROR", `Tool "${definition.name}" is already registered.`, false);
    }
    this.tools.set(definition.name, definition);

    this.mcp.registerTool(
      definition.name,
      {
        title: definition.title,
        description: definition.description,
        inputSchema: definition.inputSchema.shape,
        annotations: {
          readOnlyHint: definition.annotations?.readOnlyHint ?? false
        }
      },
      async (rawInput: unknown, extra: { signal: AbortSignal }) => {
        const startedAtMs = Date.now();
        const envelope = await this.invoke(definition, rawInput, extra.signal);
        const sessionId = extractSessionId(envelope);
        this.eventLog.record({
          toolName: definition.name,
          params: rawInput,
          resultSummary: summarize(envelope),
          durationMs: Date.now() - startedAtMs,
          ...(sessionId === undefined ? {} : { sessionId })
        });
        return toMcpResult(envelope);
      }
    );
  }

  /** Validates input, runs the handler and validates its output; never throws. */
  private async invoke(definition: RegisteredSalvoTool, rawInput: unknown, signal: AbortSignal): Promise<ToolEnvelope> {
    const parsedInput = definition.inputSchema.safeParse(rawInput);
    if (!parsedInput.success) {
      return failure(
        definition.name,
        createSalvoError("INVALID_INPUT", "Input validation failed.", false, { issues: issuesOf(parsedInput.error) })
      );
    }

    try {
      const result = await definition.handler(parsedInput.data, this.buildToolContext(signal));
      const parsedOutput = definition.outputSchema.safeParse(result.data);
      if (!parsedOutput.success) {
        return failure(
          definition.name,
          createSalvoError("INTERNAL_ERROR", `Tool "${definition.name}" produced invalid output.`, false, {
            issues: issuesOf(parsedOutput.error)
          })
        );
      }

      return {
        ok: true,
        tool: definition.name,
        result: { data: parsedOutput.data, ...(result.meta === undefined ? {} : { meta: result.meta }) }
      };
    } catch (error: unknown) {
      const normalized = normalizeError(error);
      this.logger.warn("Tool call failed.", { tool: definition.name, code: normalized.code });
      return failure(definition.name, normalized);
    }
  }

  private buildToolContext(signal: AbortSignal): SalvoToolContext {
    return {
      runtime: this.runtime,
      metadata: this.metadata,
      startedAtMs: this.startedAtMs,
      eventLog: this.eventLog,
      logger: this.logger,
      signal
    };
  }
}
