/**
 * Utility functions for sdkpath
 */

import * as os from "node:os";
import * as path from "node:path";

/**
 * Expand ~ to home directory in path
 */
export function expandPath(p: string): string {
  if (p.startsWith("~")) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

/**
 * Contract home directory to ~ in path
 */
export function contractPath(p: string): string {
  const home = os.homedir();
  if (p.startsWith(home)) {
    return "~" + p.slice(home.length);
  }
  return p;
}

/**
 * Get the sdkpath home directory (config, sessions, traces)
 */
export function getSdkPathHome(): string {
  return expandPath("~/.sdkpath");
}

/**
 * Split a search path into its entries, dropping empty ones.
 * Windows separates entries with `;`.
 */
export function splitSearchPath(searchPath: string, delimiter: string = ";"): string[] {
  return searchPath
    .split(delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Collect the locale hints the process was started with, most specific first.
 *
 * Windows shells rarely set LC_ALL or LANG, so there the list usually ends
 * at the ICU default locale. That is the regional format setting, which can
 * differ from the display language; set `language` in config.yaml to pin it.
 */
export function getSystemLocales(env: NodeJS.ProcessEnv = process.env): string[] {
  const locales: string[] = [];
  for (const key of ["LC_ALL", "LC_MESSAGES", "LANG", "LANGUAGE"]) {
    const value = env[key];
    if (value) locales.push(...value.split(":"));
  }
  locales.push(Intl.DateTimeFormat().resolvedOptions().locale);
  return locales.filter((locale) => locale.length > 0);
}
