/**
 * Watcher Module
 *
 * Watches project directories for recompilation (source or build output
 * changes) and triggers a new audit. Uses Node 20+ recursive fs.watch with
 * debouncing, so one build that touches many files runs one audit.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { DEFAULT_WATCH_EXTENSIONS } from "@sdkpath/core";

export interface WatcherOptions {
  debounceMs?: number;
  extensions?: readonly string[];
  /** Receives failures to watch a directory and failures of the callback */
  onError?: (error: unknown, watchPath?: string) => void;
}

/**
 * Resolve the directories to watch, relative to the project root.
 */
export function getWatchPaths(projectRoot: string, dirs: readonly string[] = []): string[] {
  if (dirs.length === 0) return [path.resolve(projectRoot)];
  return [...new Set(dirs.map((dir) => path.resolve(projectRoot, dir)))];
}

/**
 * Determine if a changed filename counts as a recompilation event.
 */
export function shouldTriggerAudit(
  filename: string,
  extensions: readonly string[] = DEFAULT_WATCH_EXTENSIONS,
): boolean {
  const ext = path.extname(filename).toLowerCase();
  return ext.length > 0 && extensions.some((candidate) => candidate.toLowerCase() === ext);
}

/**
 * Start watching directories and run the callback after changes settle.
 * Returns an abort function to stop watching.
 */
export function startWatcher(
  watchPaths: readonly string[],
  onRecompile: () => Promise<void>,
  options: WatcherOptions = {},
): () => void {
  const { debounceMs = 500, extensions = DEFAULT_WATCH_EXTENSIONS } = options;
  const onError = options.onError ?? ((error: unknown) => console.error("Watch audit error:", error));
  const abortController = new AbortController();
  let debounceTimer: ReturnType<typeof setTimeout> | null = null;

  const triggerAudit = () => {
    if (debounceTimer) clearTimeout(debounceTimer);
    debounceTimer = setTimeout(() => {
      debounceTimer = null;
      onRecompile().catch((err: unknown) => onError(err));
    }, debounceMs);
  };

  for (const watchPath of watchPaths) {
    try {
      fs.watch(
        watchPath,
        { signal: abortController.signal, recursive: true },
        (_eventType, filename) => {
          if (filename && shouldTriggerAudit(filename.toString(), extensions)) {
            triggerAudit();
          }
        },
      );
    } catch (error) {
      onError(error, watchPath);
    }
  }

  return () => {
    if (debounceTimer) clearTimeout(debounceTimer);
    abortController.abort();
  };
}
