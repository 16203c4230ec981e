/**
 * packages/node/src/config/menuFile.ts — Menu file loading.
 */

import { CommwheelError, type MenuDefinition, parseMenuDefinition } from "@commwheel/core";
import { readJsonFile } from "./jsonFile.js";

/**
 * Read a menu file.
 * @throws CommwheelError NOT_FOUND when the file does not exist
 * @throws CommwheelError CONFIG_LOAD_ERROR when it cannot be read or parsed
 */
export async function loadMenuFile(path: string): Promise<MenuDefinition> {
  const raw = await readJsonFile(path);
  if (raw === undefined) {
    throw new CommwheelError("NOT_FOUND", `menu file not found: ${path}`);
  }
  const parsed = parseMenuDefinition(raw);
  if (!parsed.ok) {
    throw new CommwheelError("CONFIG_LOAD_ERROR", `${path}: ${parsed.error.detail}`);
  }
  return parsed.value;
}
