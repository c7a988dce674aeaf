#!/usr/bin/env node

import path from "node:path";
import process from "node:process";

import { parseCliArgs, USAGE, type CliCommand } from "./cli-args.js";
import { loadConfig, updateUserValue, type ConfigLocation } from "./config/index.js";
import { createSalvoRuntime, type SalvoRuntime } from "./runtime.js";
import { SalvoServer } from "./server.js";
import { coreTools } from "./tools/index.js";
import { isSalvoError } from "./types/index.js";
import { createLogger, type LogFormat, type Logger } from "./utils/logger.js";

const EXIT_CONFIG_INVALID = 2;

/** stdout carries MCP frames under `serve`, and stderr may be a log file there. */
const logFormatFor = (command: CliCommand): LogFormat => {
  return process.stderr.isTTY && command.kind !== "serve" ? "text" : "json";
};

const writeJson = (value: unknown): void => {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
};

const toErrorMessage = (error: unknown): string => {
  if (isSalvoError(error) || error instanceof Error) {
    return error.message;
  }

  return String(error);
};

/** SIGINT and SIGTERM stop the fire session instead of killing the process mid-burst. */
const stopFireOnSignals = (runtime: SalvoRuntime, logger: Logger): (() => void) => {
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info("Received signal; stopping fire.", { signal });
    void runtime.controller.stop().catch((error: unknown) => {
      logger.error("Stop after signal failed.", { message: toErrorMessage(error) });
      process.exitCode = 1;
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return () => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  };
};

const runServe = async (runtime: SalvoRuntime, logger: Logger): Promise<void> => {
  const server = await SalvoServer.create({ runtime, logger: logger.child("server") });
  server.registerTools(coreTools);

  const shutdownState = {
    started: false
  };
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shutdownState.started) {
      return;
    }

    shutdownState.started = true;
    logger.info("Received shutdown signal.", { signal });

    await server.close();
    logger.info("Salvo server shutdown complete.");
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });

  logger.info("Starting salvo MCP server.", { configDir: runtime.configDir });
  await server.startStdio();
};

const runCommand = async (command: Exclude<CliCommand, { kind: "help" | "prompt" }>, runtime: SalvoRuntime, logger: Logger) => {
  switch (command.kind) {
    case "stage": {
      const result = await runtime.stage({
        ...(command.count === undefined ? {} : { count: command.count }),
        ...(command.wipe === undefined ? {} : { wipe: command.wipe })
      });
      writeJson({
        ...result,
        placements: result.placements.map((placement) => ({
          windowId: placement.handle.id,
          x: placement.x,
          y: placement.y
        }))
      });
      return;
    }
    case "fire": {
      const detach = stopFireOnSignals(runtime, logger);
      try {
        const { kind: _kind, ...request } = command;
        writeJson(await runtime.controller.fire(request));
      } finally {
        detach();
      }
      return;
    }
    case "stop":
      writeJson(await runtime.controller.stop());
      return;
    case "status":
      writeJson(await runtime.controller.status());
      return;
    case "serve":
      await runServe(runtime, logger);
      return;
  }
};

const main = async (): Promise<void> => {
  const parsed = parseCliArgs(process.argv.slice(2));
  const command = parsed.command;

  if (command.kind === "help") {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  const configDir = path.resolve(parsed.configDir ?? process.env.SALVO_CONFIG_DIR ?? process.cwd());
  const location: ConfigLocation = { configDir };

  if (command.kind === "prompt") {
    const userPath = await updateUserValue(location, "DEFAULT_PROMPT", command.text);
    createLogger({ scope: "cli", format: logFormatFor(command) }).info("Saved the default prompt.", { path: userPath });
    return;
  }

  const loaded = await loadConfig(location);
  const format = logFormatFor(command);
  const logger = createLogger({ scope: "cli", level: loaded.config.logLevel, format });
  logger.debug("Configuration loaded.", { layers: loaded.layers.map((layer) => layer.path) });

  const runtime = createSalvoRuntime({
    config: loaded.config,
    configDir,
    logger: createLogger({ level: loaded.config.logLevel, format })
  });
  await runCommand(command, runtime, logger);
};

void main().catch((error: unknown) => {
  const message = toErrorMessage(error);
  createLogger({ scope: "cli" }).error("salvo failed.", {
    ...(isSalvoError(error) ? { code: error.code, details: error.details } : {}),
    error: message
  });
  process.stderr.write(`${message}\n`);
  process.exitCode = isSalvoError(error) && error.code === "CONFIG_INVALID" ? EXIT_CONFIG_INVALID : 1;
});
