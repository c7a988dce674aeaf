import { spawn } from "node:child_process";

import { createSalvoError } from "../types/index.js";

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  input?: string;
  timeoutMs?: number;
  /**
   * Defaults to true. Without it stdout and stderr are not piped and the call settles when the
   * command exits, even while a background child it left behind is still running (`xclip` keeps
   * one alive to serve the selection).
   */
  captureOutput?: boolean;
}

export type CommandRunner = (command: string, args: readonly string[], options?: CommandOptions) => Promise<CommandOutput>;

export interface DetachedSpawnResult {
  pid?: number;
}

export type DetachedSpawner = (command: string, args: readonly string[]) => Promise<DetachedSpawnResult>;

const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;

/**
 * Runs a command to completion, feeding `input` on stdin. A non-zero exit, a spawn failure or a
 * timeout rejects with BACKEND_FAILED.
 */
export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const captureOutput = options.captureOutput ?? true;

  return await new Promise<CommandOutput>((resolve, reject) => {
    const child = spawn(command, [...args], {
      stdio: captureOutput ? ["pipe", "pipe", "pipe"] : ["pipe", "ignore", "ignore"],
      timeout: options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS
    });
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout?.on("data", (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });
    child.stderr?.on("data", (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    child.once("error", (error: Error) => {
      reject(
        createSalvoError("BACKEND_FAILED", `Failed to run "${command}": ${error.message}`, true, {
          command,
          args: [...args]
        })
      );
    });

    const settle = (code: number | null, signal: NodeJS.Signals | null): void => {
      const stdout = Buffer.concat(stdoutChunks).toString("utf8");
      const stderr = Buffer.concat(stderrChunks).toString("utf8");
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }

      reject(
        createSalvoError("BACKEND_FAILED", `"${command} ${args.join(" ")}" exited with ${code ?? signal ?? "unknown status"}.`, true, {
          command,
          args: [...args],
          exitCode: code,
          signal,
          stderr: stderr.trim()
        })
      );
    };
    // "close" waits for every holder of the pipes; "exit" only for the command itself.
    if (captureOutput) {
      child.once("close", settle);
    } else {
      child.once("exit", settle);
    }

    child.stdin?.on("error", () => {
      // EPIPE when the command exits before reading stdin; settle reports the outcome.
    });
    child.stdin?.end(options.input ?? "");
  });
};

/**
 * Starts a process that outlives this one. Resolves once the process has started, rejects with
 * BACKEND_FAILED when it cannot be started at all.
 */
export const spawnDetached: DetachedSpawner = async (command, args) => {
  return await new Promise<DetachedSpawnResult>((resolve, reject) => {
    const child = spawn(command, [...args], {
      detached: true,
      stdio: "ignore"
    });

    child.once("error", (error: Error) => {
      reject(
        createSalvoError("BACKEND_FAILED", `Failed to launch "${command}": ${error.message}`, true, {
          command,
          args: [...args]
        })
      );
    });

    child.once("spawn", () => {
      child.unref();
      resolve(child.pid === undefined ? {} : { pid: child.pid });
    });
  });
};
