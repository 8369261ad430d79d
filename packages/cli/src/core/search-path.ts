/**
 * Search Path Reader: reads the executable search path the audit inspects.
 *
 * Machine scope reads the system-wide PATH from the registry, which is what
 * newly started programs inherit; process scope reads this process's PATH.
 */
import { execFileSync } from "node:child_process";
import type { PathScope } from "@sdkpath/core";

export const MACHINE_ENVIRONMENT_KEY =
  "HKLM\\SYSTEM\\CurrentControlSet\\Control\\Session Manager\\Environment";

export interface SearchPathReading {
  value: string;
  source: PathScope;
  /** Why machine scope fell back to the process PATH */
  fallbackReason?: string;
}

export interface ReadSearchPathOptions {
  scope: PathScope;
  env?: NodeJS.ProcessEnv;
}

/**
 * Pull the Path value out of `reg query ... /v Path` output.
 */
export function parseRegQueryOutput(stdout: string): string | null {
  for (const line of stdout.split(/\r?\n/)) {
    const match = line.match(/^\s+Path\s+REG_(?:EXPAND_)?SZ\s+(.*)$/i);
    if (match) return match[1].trimEnd();
  }
  return null;
}

/**
 * Expand `%NAME%` references the way Windows expands REG_EXPAND_SZ values.
 * Lookup ignores case; unknown names stay as written.
 */
export function expandWindowsEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  const lookup = new Map<string, string>();
  for (const [key, val] of Object.entries(env)) {
    if (val !== undefined) lookup.set(key.toUpperCase(), val);
  }
  return value.replace(/%([^%;]+)%/g, (token, name: string) => lookup.get(name.toUpperCase()) ?? token);
}

export function readProcessSearchPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.PATH ?? env.Path ?? "";
}

export function readMachineSearchPath(env: NodeJS.ProcessEnv = process.env): string {
  const stdout = execFileSync("reg", ["query", MACHINE_ENVIRONMENT_KEY, "/v", "Path"], {
    encoding: "utf-8",
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
  });
  const value = parseRegQueryOutput(stdout);
  if (value === null) {
    throw new Error("reg query output did not contain a Path value");
  }
  return expandWindowsEnvVars(value, env);
}

export function readSearchPath(opts: ReadSearchPathOptions): SearchPathReading {
  const env = opts.env ?? process.env;
  if (opts.scope === "process") {
    return { value: readProcessSearchPath(env), source: "process" };
  }

  try {
    return { value: readMachineSearchPath(env), source: "machine" };
  } catch (error) {
    return {
      value: readProcessSearchPath(env),
      source: "process",
      fallbackReason: error instanceof Error ? error.message : String(error),
    };
  }
}
