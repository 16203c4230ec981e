/**
 * packages/node/src/config/jsonFile.ts — JSON documents on disk.
 *
 * A missing file reads as undefined. Any other read failure, and unparseable
 * JSON, is a CONFIG_LOAD_ERROR; write failures are PERSISTENCE_ERRORs.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import {
  CommwheelError,
  type ConfigPersistence,
  type PersistedAnimationConfig,
  describeError,
} from "@commwheel/core";

export const DEFAULT_CONFIG_FILE = "animation_config.json";

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT"
  );
}

/**
 * @returns the parsed document, or undefined when the file does not exist
 * @throws CommwheelError CONFIG_LOAD_ERROR when the file cannot be read or parsed
 */
export async function readJsonFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw new CommwheelError("CONFIG_LOAD_ERROR", `cannot read ${path}: ${describeError(err)}`, {
      cause: err,
    });
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new CommwheelError("CONFIG_LOAD_ERROR", `${path} is not valid JSON: ${describeError(err)}`, {
      cause: err,
    });
  }
}

/**
 * Write `value` as indented JSON, creating parent directories.
 * @throws CommwheelError PERSISTENCE_ERROR when the write fails
 */
export async function writeJsonFile(path: string, value: unknown): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, "utf8");
  } catch (err) {
    throw new CommwheelError("PERSISTENCE_ERROR", `cannot write ${path}: ${describeError(err)}`, {
      cause: err,
    });
  }
}

export function createJsonFilePersistence(path: string = DEFAULT_CONFIG_FILE): ConfigPersistence {
  return Object.freeze({
    read: () => readJsonFile(path),
    write: (snapshot: PersistedAnimationConfig) => writeJsonFile(path, snapshot),
  });
}
