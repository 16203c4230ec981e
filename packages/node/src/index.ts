/**
 * @commwheel/node
 *
 * Node host for the commwheel overlay: OS input through nut-js, JSON file
 * persistence, terminal hotkeys, console logging and the `commwheel` CLI.
 */

export { createDryRunBackend } from "./backend/dryRunBackend.js";
export {
  type NutApi,
  type NutBackendOptions,
  createNutBackend,
  nutKeyFor,
} from "./backend/nutBackend.js";
export {
  DEFAULT_CONFIG_FILE,
  createJsonFilePersistence,
  readJsonFile,
  writeJsonFile,
} from "./config/jsonFile.js";
export {
  type LoadedAnimationFile,
  animationNameFromPath,
  loadAnimationFile,
  registerAnimationFile,
  saveAnimationFile,
} from "./config/animationFile.js";
export { loadMenuFile } from "./config/menuFile.js";
export {
  type KeypressInput,
  type TerminalHotkeySourceOptions,
  createTerminalHotkeySource,
  isInterrupt,
  keypressToHotkey,
} from "./hotkeys/terminalSource.js";
export {
  type ConsoleLogOptions,
  type LogStream,
  createConsoleLog,
  formatLogEvent,
} from "./log.js";
export { type CliCommand, type CliOptions, USAGE, parseCliArgs } from "./cli/args.js";
export { type CliDeps, runCli } from "./cli.js";
