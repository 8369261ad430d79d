/**
 * Watch Command for sdkpath CLI
 *
 * Runs the check once at start, then again after every recompilation in the
 * watched directories. Results are kept in memory for the life of the
 * watcher, so a message appears only when the PATH verdict changes.
 */

import { Command } from "commander";
import { isTargetPlatform } from "@sdkpath/core";
import { loadConfig } from "../core/config-loader.js";
import { errorMessage } from "../core/fs-helpers.js";
import { getTracer } from "../core/global-tracer.js";
import { MemoryResultStore } from "../core/session-store.js";
import { getWatchPaths, startWatcher } from "../core/watcher.js";
import {
  type CheckDeps,
  type CheckOptions,
  createHostDeps,
  formatCheckOutput,
  resolveMarkupMode,
  runCheck,
} from "./check.js";

export type WatchOptions = Omit<CheckOptions, "json" | "force">;

export interface WatchSession {
  /** Runs one check and prints its diagnostic, if any */
  runOnce: () => Promise<void>;
  watchPaths: string[];
}

/**
 * Build the per-trigger callback for a watch session.
 */
export function createWatchSession(
  dirs: string[],
  options: WatchOptions,
  deps: CheckDeps,
  print: (line: string) => void = console.log,
  cwd: string = process.cwd(),
): WatchSession {
  const mode = resolveMarkupMode(options, deps.env);
  return {
    watchPaths: getWatchPaths(cwd, dirs),
    runOnce: async () => {
      const output = formatCheckOutput(runCheck(options, deps), mode);
      if (output) print(output);
    },
  };
}

export const watchCommand = new Command("watch")
  .description("Re-run the check whenever sources or build output change")
  .argument("[dirs...]", "Directories to watch (defaults to the current directory)")
  .option("--raw", "Keep <color> markup instead of rendering it")
  .option("--plain", "Strip <color> markup")
  .option("-p, --show-positive", "Also report passing results")
  .option("-l, --lang <tag>", "Force the message language (en, fr)")
  .option("-s, --scope <scope>", "PATH to inspect: machine or process")
  .action(async (dirs: string[], options: WatchOptions) => {
    if (!isTargetPlatform()) return;

    const log = getTracer().createTrace("watch");

    try {
      const deps = createHostDeps(log, new MemoryResultStore());
      const config = loadConfig(deps.configPath);
      const session = createWatchSession(dirs, options, deps);

      await session.runOnce();

      const stop = startWatcher(
        session.watchPaths,
        async () => {
          log.info({ scope: "watcher", op: "trigger", msg: "Recompilation detected" });
          await session.runOnce();
        },
        {
          debounceMs: config.debounceMs,
          extensions: config.watchExtensions,
          onError: (error, watchPath) => {
            log.error({ scope: "watcher", op: watchPath ? "watch" : "trigger", path: watchPath, msg: "Watch error", error: errorMessage(error) });
            console.error("Watch error:", errorMessage(error));
          },
        },
      );

      console.log(`Watching ${session.watchPaths.join(", ")} (Ctrl-C to stop)`);
      process.once("SIGINT", () => {
        stop();
        process.exit(0);
      });
    } catch (error) {
      log.error({ scope: "command", op: "watch", msg: "Watch failed", error: errorMessage(error) });
      console.error("Error running watch:", errorMessage(error));
      process.exit(1);
    }
  });
