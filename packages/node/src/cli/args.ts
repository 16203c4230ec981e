/**
 * packages/node/src/cli/args.ts — Command-line parsing.
 */

import {
  CommwheelError,
  DEFAULT_TOGGLE_KEY,
  type Frame,
  type FrameEdit,
  frameFromText,
} from "@commwheel/core";
import { DEFAULT_CONFIG_FILE } from "../config/jsonFile.js";

export type CliCommand =
  | Readonly<{ kind: "run" }>
  | Readonly<{ kind: "play"; name: string }>
  | Readonly<{ kind: "frames"; name: string; savePath?: string }>
  | Readonly<{ kind: "edit"; path: string; edit: FrameEdit }>
  | Readonly<{ kind: "config-set"; name: string; stride?: number; delaySeconds?: number }>
  | Readonly<{ kind: "help" }>;

export type CliOptions = Readonly<{
  command: CliCommand;
  configPath: string;
  menuPath?: string;
  toggleKey: string;
  dryRun: boolean;
  verbose: boolean;
  animationFiles: readonly string[];
}>;

type MutableOptions = {
  configPath: string;
  menuPath?: string;
  toggleKey: string;
  dryRun: boolean;
  verbose: boolean;
  help: boolean;
  animationFiles: string[];
  stride?: number;
  delaySeconds?: number;
  savePath?: string;
  text?: string;
};

export const USAGE = [
  "commwheel",
  "",
  "Usage:",
  "  commwheel [run]                      Interactive overlay (. toggles, 1-9 select, Esc back)",
  "  commwheel play <name>                Play one animation after a 3 s countdown",
  "  commwheel frames <name> [--save <file>]",
  "                                       Print the chat payloads of an animation",
  "  commwheel config set <name> [--stride <n>] [--delay <seconds>]",
  "  commwheel edit <file> append [--text <text>]",
  "  commwheel edit <file> replace <n> --text <text>",
  "  commwheel edit <file> remove <n>",
  "  commwheel edit <file> move <n> up|down",
  "                                       Edit frame <n> (1-based) of an animation file",
  "",
  "Options:",
  `  --config <file>        Animation settings (default ${DEFAULT_CONFIG_FILE})`,
  "  --menu <file>          Menu definition (default: built-in menu)",
  `  --toggle-key <key>     Overlay toggle key (default "${DEFAULT_TOGGLE_KEY}")`,
  "  --animation <file>     Load an animation file (repeatable)",
  "  --save <file>          Also write the animation to an animation file",
  '  --text <text>          Frame text for edit; "\\n" starts a new line',
  "  --dry-run              Log keystrokes instead of sending them",
  "  --verbose, -v          Debug logging",
  "  --help, -h             Show this help",
].join("\n");

function invalid(message: string): CommwheelError {
  return new CommwheelError("INVALID_PROPS", message);
}

function parsePositiveInt(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw invalid(`${flag} must be an integer >= 1, got "${value}"`);
  }
  return n;
}

function parsePositiveSeconds(flag: string, value: string): number {
  const n = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(n) || n <= 0) {
    throw invalid(`${flag} must be a positive number of seconds, got "${value}"`);
  }
  return n;
}

const VALUE_FLAGS: ReadonlySet<string> = new Set([
  "--config",
  "--menu",
  "--toggle-key",
  "--animation",
  "--stride",
  "--delay",
  "--save",
  "--text",
]);

/**
 * @throws CommwheelError INVALID_PROPS for unknown options, missing values
 *   and malformed commands
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: MutableOptions = {
    configPath: DEFAULT_CONFIG_FILE,
    toggleKey: DEFAULT_TOGGLE_KEY,
    dryRun: false,
    verbose: false,
    help: false,
    animationFiles: [],
  };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
      continue;
    }
    if (arg === "--dry-run") {
      options.dryRun = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
    if (VALUE_FLAGS.has(flag)) {
      let value: string | undefined;
      if (flag !== arg) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[i + 1];
        i++;
      }
      if (value === undefined || value.length === 0) throw invalid(`Missing value for ${flag}`);
      switch (flag) {
        case "--config":
          options.configPath = value;
          break;
        case "--menu":
          options.menuPath = value;
          break;
        case "--toggle-key":
          options.toggleKey = value;
          break;
        case "--animation":
          options.animationFiles.push(value);
          break;
        case "--stride":
          options.stride = parsePositiveInt(flag, value);
          break;
        case "--delay":
          options.delaySeconds = parsePositiveSeconds(flag, value);
          break;
        case "--save":
          options.savePath = value;
          break;
        case "--text":
          options.text = value;
          break;
      }
      continue;
    }
    if (arg.startsWith("-") && arg !== "-") {
      throw invalid(`Unknown option: ${arg}`);
    }
    positionals.push(arg);
  }

  const { help, stride, delaySeconds, savePath, text, ...shared } = options;
  const flags = { stride, delaySeconds, savePath, text };
  const command = help ? { kind: "help" as const } : toCommand(positionals, flags);
  if (command.kind !== "help") {
    const timingFlags = stride !== undefined || delaySeconds !== undefined;
    if (timingFlags && command.kind !== "config-set") {
      throw invalid("--stride and --delay only apply to config set");
    }
    if (savePath !== undefined && command.kind !== "frames") {
      throw invalid("--save only applies to frames");
    }
    if (text !== undefined && command.kind !== "edit") {
      throw invalid("--text only applies to edit");
    }
  }
  return Object.freeze({ ...shared, command });
}

type CommandFlags = Readonly<{
  stride: number | undefined;
  delaySeconds: number | undefined;
  savePath: string | undefined;
  text: string | undefined;
}>;

/** `--text` spells line breaks as a literal backslash-n. */
function frameFromFlag(text: string): Frame {
  return frameFromText(text.replace(/\\n/gu, "\n"));
}

function toFrameEdit(
  op: string | undefined,
  args: readonly string[],
  text: string | undefined,
): FrameEdit {
  const [position, direction, extra] = args;
  const index = (): number => {
    if (position === undefined) throw invalid(`edit ${op ?? ""} needs a frame number`);
    return parsePositiveInt("frame number", position) - 1;
  };
  switch (op) {
    case "append":
      if (position !== undefined) throw invalid(`Unexpected argument: ${position}`);
      return text === undefined ? { kind: "append" } : { kind: "append", frame: frameFromFlag(text) };
    case "remove":
      if (direction !== undefined) throw invalid(`Unexpected argument: ${direction}`);
      return { kind: "remove", index: index() };
    case "replace":
      if (direction !== undefined) throw invalid(`Unexpected argument: ${direction}`);
      if (text === undefined) throw invalid("edit replace needs --text");
      return { kind: "replace", index: index(), frame: frameFromFlag(text) };
    case "move": {
      const at = index();
      if (direction !== "up" && direction !== "down") {
        throw invalid(`edit move needs up or down, got "${direction ?? ""}"`);
      }
      if (extra !== undefined) throw invalid(`Unexpected argument: ${extra}`);
      return { kind: "move", index: at, direction };
    }
    default:
      throw invalid(`Unknown edit operation: ${op ?? "(none)"}`);
  }
}

function toCommand(positionals: readonly string[], flags: CommandFlags): CliCommand {
  const { stride, delaySeconds } = flags;
  const [verb, ...rest] = positionals;
  switch (verb) {
    case undefined:
    case "run":
      if (rest.length > 0) throw invalid(`Unexpected argument: ${rest[0] ?? ""}`);
      return { kind: "run" };
    case "play":
    case "frames": {
      const [name, extra] = rest;
      if (name === undefined) throw invalid(`${verb} needs an animation name`);
      if (extra !== undefined) throw invalid(`Unexpected argument: ${extra}`);
      if (verb === "play") return { kind: "play", name };
      return flags.savePath === undefined
        ? { kind: "frames", name }
        : { kind: "frames", name, savePath: flags.savePath };
    }
    case "edit": {
      const [path, op, ...args] = rest;
      if (path === undefined) throw invalid("edit needs an animation file");
      return { kind: "edit", path, edit: toFrameEdit(op, args, flags.text) };
    }
    case "config": {
      const [sub, name, extra] = rest;
      if (sub !== "set") throw invalid(`Unknown config command: ${sub ?? "(none)"}`);
      if (name === undefined) throw invalid("config set needs an animation name");
      if (extra !== undefined) throw invalid(`Unexpected argument: ${extra}`);
      if (stride === undefined && delaySeconds === undefined) {
        throw invalid("config set needs --stride and/or --delay");
      }
      return { kind: "config-set", name, stride, delaySeconds };
    }
    default:
      throw invalid(`Unknown command: ${verb}`);
  }
}
