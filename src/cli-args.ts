import { createSalvoError, type ActiveFireMode, type SalvoError } from "./types/index.js";

export const USAGE = `Usage:
  salvo stage [--count <n>] [--wipe]
  salvo fire [--auto [<rounds>]] [--burst <n>] [--prompt <text>]
  salvo stop
  salvo status
  salvo prompt <text...>
  salvo serve
  salvo help

Options:
  --config-dir <dir>  Directory holding .system_env, .session_env and .user_env
                      (default: $SALVO_CONFIG_DIR, then the working directory)
`;

export type CliCommand =
  | { kind: "stage"; count?: number; wipe?: boolean }
  | { kind: "fire"; mode: ActiveFireMode; rounds?: number; burstCount?: number; prompt?: string }
  | { kind: "stop" }
  | { kind: "status" }
  | { kind: "prompt"; text: string }
  | { kind: "serve" }
  | { kind: "help" };

export interface ParsedCliArgs {
  command: CliCommand;
  configDir?: string;
}

const usageError = (message: string): SalvoError => {
  return createSalvoError("INVALID_INPUT", `${message}\n\n${USAGE}`, false);
};

const isCount = (value: string | undefined): value is string => {
  return value !== undefined && /^\d+$/.test(value);
};

const parseCount = (name: string, value: string | undefined, minimum: number): number => {
  if (!isCount(value) || Number(value) < minimum) {
    throw usageError(`Expected an integer of at least ${minimum} for "${name}".`);
  }

  return Number(value);
};

/** Splits `--name=value` or takes the value from the next argument. */
const readOption = (
  args: readonly string[],
  index: number,
  name: string
): { matched: boolean; value?: string; consumed: number } => {
  const argument = args[index];
  if (argument === name) {
    const value = args[index + 1];
    return value === undefined ? { matched: true, consumed: 1 } : { matched: true, value, consumed: 2 };
  }

  if (argument?.startsWith(`${name}=`) === true) {
    return { matched: true, value: argument.slice(name.length + 1), consumed: 1 };
  }

  return { matched: false, consumed: 0 };
};

const parseStage = (args: readonly string[]): CliCommand => {
  let count: number | undefined;
  let wipe: boolean | undefined;

  for (let index = 0; index < args.length; ) {
    const countOption = readOption(args, index, "--count");
    if (countOption.matched) {
      count = parseCount("--count", countOption.value, 1);
      index += countOption.consumed;
      continue;
    }

    if (args[index] === "--wipe") {
      wipe = true;
      index += 1;
      continue;
    }

    throw usageError(`Unknown option "${args[index] ?? ""}" for "stage".`);
  }

  return {
    kind: "stage",
    ...(count === undefined ? {} : { count }),
    ...(wipe === undefined ? {} : { wipe })
  };
};

const parseFire = (args: readonly string[]): CliCommand => {
  let mode: ActiveFireMode = "semi";
  let rounds: number | undefined;
  let burstCount: number | undefined;
  let prompt: string | undefined;

  for (let index = 0; index < args.length; ) {
    const argument = args[index];
    if (argument === "--auto") {
      mode = "auto";
      const next = args[index + 1];
      if (isCount(next)) {
        rounds = Number(next);
        index += 2;
      } else {
        index += 1;
      }
      continue;
    }

    if (argument?.startsWith("--auto=") === true) {
      mode = "auto";
      rounds = parseCount("--auto", argument.slice("--auto=".length), 0);
      index += 1;
      continue;
    }

    const burstOption = readOption(args, index, "--burst");
    if (burstOption.matched) {
      burstCount = parseCount("--burst", burstOption.value, 1);
      index += burstOption.consumed;
      continue;
    }

    const promptOption = readOption(args, index, "--prompt");
    if (promptOption.matched) {
      if (promptOption.value === undefined || promptOption.value.length === 0) {
        throw usageError('Missing value for "--prompt".');
      }
      prompt = promptOption.value;
      index += promptOption.consumed;
      continue;
    }

    throw usageError(`Unknown option "${argument ?? ""}" for "fire".`);
  }

  return {
    kind: "fire",
    mode,
    ...(rounds === undefined ? {} : { rounds }),
    ...(burstCount === undefined ? {} : { burstCount }),
    ...(prompt === undefined ? {} : { prompt })
  };
};

const expectNoOptions = (command: string, args: readonly string[]): void => {
  const [first] = args;
  if (first !== undefined) {
    throw usageError(`Unknown option "${first}" for "${command}".`);
  }
};

export const parseCliArgs = (args: readonly string[]): ParsedCliArgs => {
  let configDir: string | undefined;
  const rest: string[] = [];

  for (let index = 0; index < args.length; ) {
    const option = readOption(args, index, "--config-dir");
    if (option.matched) {
      if (option.value === undefined || option.value.length === 0) {
        throw usageError('Missing value for "--config-dir".');
      }
      configDir = option.value;
      index += option.consumed;
      continue;
    }

    const argument = args[index];
    if (argument !== undefined) {
      rest.push(argument);
    }
    index += 1;
  }

  const withConfigDir = (command: CliCommand): ParsedCliArgs => {
    return configDir === undefined ? { command } : { command, configDir };
  };

  const [name, ...options] = rest;
  switch (name) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return withConfigDir({ kind: "help" });
    case "stage":
      return withConfigDir(parseStage(options));
    case "fire":
      return withConfigDir(parseFire(options));
    case "stop":
      expectNoOptions(name, options);
      return withConfigDir({ kind: "stop" });
    case "status":
      expectNoOptions(name, options);
      return withConfigDir({ kind: "status" });
    case "serve":
      expectNoOptions(name, options);
      return withConfigDir({ kind: "serve" });
    case "prompt": {
      const text = options.join(" ").trim();
      if (text.length === 0) {
        throw usageError('"prompt" needs the prompt text.');
      }
      return withConfigDir({ kind: "prompt", text });
    }
    default:
      throw usageError(`Unknown command "${name}".`);
  }
};
