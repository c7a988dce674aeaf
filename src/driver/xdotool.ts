import {
  createSalvoError,
  isSalvoError,
  windowId,
  type DisplaySize,
  type Point,
  type WindowGeometry,
  type WindowHandle,
  type WindowId
} from "../types/index.js";
import { createLogger, type Logger } from "../utils/index.js";
import { runCommand, spawnDetached, type CommandRunner, type DetachedSpawner } from "./command.js";
import {
  MOUSE_BUTTONS,
  type DesktopDriver,
  type LaunchedProcess,
  type MouseButton,
  type WindowQueryOptions
} from "./index.js";

const XDOTOOL = "xdotool";

export interface ClipboardCommand {
  command: string;
  args: readonly string[];
}

export const DEFAULT_CLIPBOARD_COMMANDS: readonly ClipboardCommand[] = [
  { command: "xclip", args: ["-selection", "clipboard"] },
  { command: "wl-copy", args: [] }
];

export interface XdotoolDriverOptions {
  runner?: CommandRunner;
  spawner?: DetachedSpawner;
  clipboardCommands?: readonly ClipboardCommand[];
  logger?: Logger;
}

/**
 * Parses `KEY=value` lines printed by `xdotool ... --shell`.
 */
export const parseShellOutput = (output: string): Record<string, string> => {
  const values: Record<string, string> = {};
  for (const line of output.split("\n")) {
    const separator = line.indexOf("=");
    if (separator > 0) {
      values[line.slice(0, separator).trim()] = line.slice(separator + 1).trim();
    }
  }

  return values;
};

const readInteger = (values: Record<string, string>, key: string): number | undefined => {
  const raw = values[key];
  if (raw === undefined || !/^-?\d+$/.test(raw)) {
    return undefined;
  }

  return Number(raw);
};

const parseWindowIds = (output: string): WindowId[] => {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => /^\d+$/.test(line))
    .map((line) => windowId(line));
};

/**
 * Window enumeration, arrangement and input injection through the `xdotool` command-line tool, and
 * clipboard writes through `xclip` with `wl-copy` as the fallback.
 */
export class XdotoolDriver implements DesktopDriver {
  public readonly name = "xdotool";

  private readonly runner: CommandRunner;
  private readonly spawner: DetachedSpawner;
  private readonly clipboardCommands: readonly ClipboardCommand[];
  private readonly logger: Logger;

  public constructor(options: XdotoolDriverOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.spawner = options.spawner ?? spawnDetached;
    this.clipboardCommands = options.clipboardCommands ?? DEFAULT_CLIPBOARD_COMMANDS;
    this.logger = options.logger ?? createLogger({ scope: "driver:xdotool" });
  }

  public async query(pattern: string, options: WindowQueryOptions = {}): Promise<WindowHandle[]> {
    const ids =
      options.pids === undefined
        ? await this.search(["--onlyvisible", "--name", pattern])
        : await this.searchByPids(pattern, options.pids);

    return await Promise.all(
      ids.map(async (id) => ({
        id,
        title: await this.windowName(id)
      }))
    );
  }

  public async geometry(id: WindowId): Promise<WindowGeometry | undefined> {
    let output: string;
    try {
      output = await this.xdotool(["getwindowgeometry", "--shell", id]);
    } catch (error: unknown) {
      if (isSalvoError(error) && error.code === "BACKEND_FAILED") {
        return undefined;
      }

      throw error;
    }

    const values = parseShellOutput(output);
    const x = readInteger(values, "X");
    const y = readInteger(values, "Y");
    const width = readInteger(values, "WIDTH");
    const height = readInteger(values, "HEIGHT");
    if (x === undefined || y === undefined || width === undefined || height === undefined) {
      return undefined;
    }

    return { x, y, width, height };
  }

  public async displaySize(): Promise<DisplaySize> {
    const output = await this.xdotool(["getdisplaygeometry"]);
    const [width, height] = output.trim().split(/\s+/).map(Number);
    if (width === undefined || height === undefined || !Number.isInteger(width) || !Number.isInteger(height)) {
      throw createSalvoError("BACKEND_FAILED", "Unable to read the display geometry.", true, { output });
    }

    return { width, height };
  }

  public async resize(id: WindowId, width: number, height: number): Promise<void> {
    await this.xdotool(["windowsize", id, String(width), String(height)]);
  }

  public async move(id: WindowId, x: number, y: number): Promise<void> {
    await this.xdotool(["windowmove", id, String(x), String(y)]);
  }

  public async close(id: WindowId): Promise<void> {
    await this.xdotool(["windowkill", id]);
  }

  public async spawn(command: string, args: readonly string[]): Promise<LaunchedProcess> {
    this.logger.debug("Launching window.", { command, args: [...args] });
    return await this.spawner(command, args);
  }

  public async activate(id: WindowId): Promise<void> {
    await this.xdotool(["windowactivate", "--sync", id]);
  }

  public async pointerLocation(): Promise<Point> {
    const values = parseShellOutput(await this.xdotool(["getmouselocation", "--shell"]));
    const x = readInteger(values, "X");
    const y = readInteger(values, "Y");
    if (x === undefined || y === undefined) {
      throw createSalvoError("BACKEND_FAILED", "Unable to read the pointer location.", true, { values });
    }

    return { x, y };
  }

  public async movePointer(point: Point, relativeTo?: WindowId): Promise<void> {
    const windowArgs = relativeTo === undefined ? [] : ["--window", relativeTo];
    await this.xdotool(["mousemove", ...windowArgs, String(point.x), String(point.y)]);
  }

  public async click(button: MouseButton, id?: WindowId): Promise<void> {
    const windowArgs = id === undefined ? [] : ["--window", id];
    await this.xdotool(["click", ...windowArgs, String(button)]);
  }

  public async scroll(ticks: number, id?: WindowId): Promise<void> {
    if (ticks === 0) {
      return;
    }

    const button = ticks > 0 ? MOUSE_BUTTONS.wheelUp : MOUSE_BUTTONS.wheelDown;
    const windowArgs = id === undefined ? [] : ["--window", id];
    await this.xdotool(["click", ...windowArgs, "--repeat", String(Math.abs(ticks)), String(button)]);
  }

  public async sendKeys(id: WindowId, keys: readonly string[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }

    await this.xdotool(["key", "--window", id, ...keys]);
  }

  public async setText(text: string): Promise<void> {
    const failures: string[] = [];
    for (const candidate of this.clipboardCommands) {
      try {
        await this.runner(candidate.command, candidate.args, { input: text, captureOutput: false });
        return;
      } catch (error: unknown) {
        failures.push(isSalvoError(error) || error instanceof Error ? error.message : String(error));
      }
    }

    throw createSalvoError("BACKEND_FAILED", "No clipboard command accepted the text.", true, {
      commands: this.clipboardCommands.map((candidate) => candidate.command),
      failures
    });
  }

  private async xdotool(args: readonly string[]): Promise<string> {
    const output = await this.runner(XDOTOOL, args);
    return output.stdout;
  }

  private async search(args: readonly string[]): Promise<WindowId[]> {
    try {
      return parseWindowIds(await this.xdotool(["search", ...args]));
    } catch (error: unknown) {
      // xdotool search exits with status 1 when nothing matches.
      if (isSalvoError(error) && error.code === "BACKEND_FAILED" && error.details?.exitCode === 1) {
        return [];
      }

      throw error;
    }
  }

  private async searchByPids(pattern: string, pids: readonly number[]): Promise<WindowId[]> {
    const seen = new Set<WindowId>();
    for (const pid of pids) {
      const ids = await this.search(["--onlyvisible", "--pid", String(pid), "--name", pattern]);
      ids.forEach((id) => seen.add(id));
    }

    return [...seen];
  }

  private async windowName(id: WindowId): Promise<string> {
    try {
      return (await this.xdotool(["getwindowname", id])).trim();
    } catch (error: unknown) {
      this.logger.debug("Window name unavailable.", {
        windowId: id,
        message: isSalvoError(error) || error instanceof Error ? error.message : String(error)
      });
      return "";
    }
  }
}
