/**
 * packages/node/src/cli.ts — `commwheel` entry point.
 */

import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
  type InputBackend,
  type Sleep,
  createAnimationStore,
  createLogger,
  createHotkeyBridge,
  createOverlay,
  describeError,
  realSleep,
} from "@commwheel/core";
import { createDryRunBackend } from "./backend/dryRunBackend.js";
import { createNutBackend } from "./backend/nutBackend.js";
import { USAGE, parseCliArgs } from "./cli/args.js";
import {
  editAnimationFile,
  playAnimation,
  printFrames,
  runInteractive,
  saveFrames,
  setAnimationConfig,
} from "./cli/commands.js";
import { registerAnimationFile } from "./config/animationFile.js";
import { createJsonFilePersistence } from "./config/jsonFile.js";
import { loadMenuFile } from "./config/menuFile.js";
import { createTerminalHotkeySource } from "./hotkeys/terminalSource.js";
import { type LogStream, createConsoleLog } from "./log.js";

export type CliDeps = Readonly<{
  stdout?: LogStream;
  stderr?: LogStream;
  /** Replaces both the nut-js and the dry-run backend. */
  backend?: InputBackend;
  sleep?: Sleep;
}>;

function onSigint(handler: () => void): () => void {
  process.once("SIGINT", handler);
  return () => {
    process.off("SIGINT", handler);
  };
}

/**
 * Run the CLI with `argv` (without the node and script paths).
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  let options: ReturnType<typeof parseCliArgs>;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    stderr.write(`commwheel: ${describeError(err)}\n\n${USAGE}\n`);
    return 2;
  }
  if (options.command.kind === "help") {
    stdout.write(`${USAGE}\n`);
    return 0;
  }

  const log = createConsoleLog({ stream: stderr, minLevel: options.verbose ? "debug" : "info" });
  const cliLog = createLogger(log, "cli");
  const sleep = deps.sleep ?? realSleep;

  try {
    const command = options.command;
    if (command.kind === "edit") {
      await editAnimationFile(command.path, command.edit, stdout);
      return 0;
    }

    const store = createAnimationStore({
      persistence: createJsonFilePersistence(options.configPath),
      log,
    });
    await store.load();
    for (const file of options.animationFiles) {
      const loaded = await registerAnimationFile(store, file);
      cliLog("debug", `loaded animation ${loaded.name} from ${file}`);
    }

    switch (command.kind) {
      case "frames":
        printFrames(store, command.name, stdout);
        if (command.savePath !== undefined) {
          await saveFrames(store, command.name, command.savePath, stdout);
        }
        return 0;
      case "config-set":
        await setAnimationConfig(store, command.name, command.stride, command.delaySeconds, stdout);
        return 0;
      case "play":
      case "run":
        break;
    }

    const menu = options.menuPath === undefined ? undefined : await loadMenuFile(options.menuPath);
    const backend = deps.backend ?? (options.dryRun ? createDryRunBackend(log) : createNutBackend());
    const overlay = createOverlay({ backend, store, menu, sleep, log });

    if (command.kind === "play") {
      let cancel: (() => void) | null = null;
      const off = onSigint(() => cancel?.());
      try {
        const result = await playAnimation({
          overlay,
          name: command.name,
          out: stdout,
          sleep,
          onCancellable: (fn) => {
            cancel = fn;
          },
        });
        return result.status === "failed" ? 1 : 0;
      } finally {
        off();
      }
    }

    const bridge = createHotkeyBridge({
      machine: overlay.machine,
      toggleKey: options.toggleKey,
      log,
    });
    let quit: () => void = () => {};
    const until = new Promise<void>((res) => {
      quit = res;
    });
    const source = createTerminalHotkeySource({ onInterrupt: () => quit() });
    await runInteractive({ overlay, bridge, source, out: stdout, until });
    return 0;
  } catch (err) {
    cliLog("error", describeError(err), err);
    return 1;
  }
}

const isMain = process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1]);
if (isMain) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`commwheel error: ${describeError(err)}\n`);
      process.exitCode = 1;
    },
  );
}
