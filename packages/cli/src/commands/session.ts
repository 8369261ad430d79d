/**
 * Session Command for sdkpath CLI
 *
 * Shows or forgets the audit result recorded for the calling shell.
 */

import { Command } from "commander";
import { stringify as yamlStringify } from "yaml";
import { contractPath } from "@sdkpath/core";
import { errorMessage } from "../core/fs-helpers.js";
import { getTracer } from "../core/global-tracer.js";
import { FileResultStore, pruneStaleSessions, resolveSessionId, sessionFilePath } from "../core/session-store.js";

export function formatSessionShow(sessionId: string, store: FileResultStore): string {
  const doc = store.read();
  if (!doc) {
    return `No result recorded for session ${sessionId}`;
  }
  return [`Session ${sessionId} (${contractPath(store.filePath)})`, yamlStringify(doc).trimEnd()].join("\n");
}

function currentStore(): { sessionId: string; store: FileResultStore } {
  const sessionId = resolveSessionId();
  return { sessionId, store: new FileResultStore(sessionFilePath(sessionId)) };
}

function runOrExit(label: string, fn: () => void): void {
  try {
    fn();
  } catch (error) {
    const log = getTracer().createTrace("session");
    log.error({ scope: "session", op: label, msg: `session ${label} failed`, error: errorMessage(error) });
    console.error(`Error running session ${label}:`, errorMessage(error));
    process.exit(1);
  }
}

const showCommand = new Command("show")
  .description("Print the result recorded for this shell session")
  .action(() => {
    runOrExit("show", () => {
      const { sessionId, store } = currentStore();
      console.log(formatSessionShow(sessionId, store));
    });
  });

const clearCommand = new Command("clear")
  .description("Forget this shell session's result so the next check reports again")
  .action(() => {
    runOrExit("clear", () => {
      const { sessionId, store } = currentStore();
      store.clear();
      console.log(`Cleared session ${sessionId}`);
    });
  });

const pruneCommand = new Command("prune")
  .description("Remove results left behind by shells that have exited")
  .action(() => {
    runOrExit("prune", () => {
      const removed = pruneStaleSessions();
      console.log(`Removed ${removed.length} stale session(s)`);
    });
  });

export const sessionCommand = new Command("session")
  .description("Inspect or reset the per-shell audit result")
  .addCommand(showCommand)
  .addCommand(clearCommand)
  .addCommand(pruneCommand);
