/**
 * Shared filesystem locations and helpers used across CLI modules.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { getSdkPathHome } from "@sdkpath/core";

export const SDKPATH_HOME = getSdkPathHome();
export const CONFIG_PATH = path.join(SDKPATH_HOME, "config.yaml");
export const SESSIONS_DIR = path.join(SDKPATH_HOME, "sessions");
export const TRACES_DIR = path.join(SDKPATH_HOME, "traces");

export function readFileIfExists(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return null;
    throw error;
  }
}

export function mkdirp(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
