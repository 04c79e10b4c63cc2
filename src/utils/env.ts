import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";

function readFileValue(filePath: string): string | undefined {
  try {
    const content = readFileSync(filePath, "utf-8").trim();
    return content.length > 0 ? content : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Reads `name` from the environment. A `${name}_FILE` variable wins when it
 * points at a readable, non-empty file.
 */
export function resolveEnv(name: string, fallback?: string): string | undefined {
  const filePath = process.env[`${name}_FILE`];
  if (filePath) {
    const fromFile = readFileValue(filePath);
    if (fromFile !== undefined) {
      return fromFile;
    }
  }
  const direct = process.env[name]?.trim();
  if (direct !== undefined && direct !== "") {
    return direct;
  }
  return fallback;
}

/**
 * Expands a leading `~` and resolves relative paths against `baseDir`.
 * Empty input stays empty.
 */
export function expandPath(input: string, baseDir: string, homeDir: string = homedir()): string {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return "";
  }
  if (trimmed === "~") {
    return homeDir;
  }
  if (trimmed.startsWith("~/")) {
    return path.join(homeDir, trimmed.slice(2));
  }
  return path.resolve(baseDir, trimmed);
}
