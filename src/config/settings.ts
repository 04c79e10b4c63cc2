import { homedir } from "node:os";
import path from "node:path";

import { expandPath, resolveEnv } from "../utils/env.js";

export const BOOTSTRAP_PATH_ENV = "PERSONA_BOOTSTRAP_PATH";
export const PERSONA_HOME_DIRNAME = ".persona";
export const BOOTSTRAP_FILENAME = "instance.jsonc";

export function personaHome(homeDir: string = homedir()): string {
  return path.join(homeDir, PERSONA_HOME_DIRNAME);
}

export function defaultBootstrapPath(homeDir: string = homedir()): string {
  return path.join(personaHome(homeDir), BOOTSTRAP_FILENAME);
}

/**
 * Picks the bootstrap document location: an explicit override, then
 * `PERSONA_BOOTSTRAP_PATH` (or its `_FILE` variant), then
 * `~/.persona/instance.jsonc`.
 */
export function resolveBootstrapPath(override?: string, homeDir: string = homedir()): string {
  const candidate = override?.trim() || resolveEnv(BOOTSTRAP_PATH_ENV);
  if (candidate) {
    return expandPath(candidate, process.cwd(), homeDir);
  }
  return defaultBootstrapPath(homeDir);
}
