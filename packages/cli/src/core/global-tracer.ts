import path from "node:path";
import { Tracer } from "./tracer.js";
import { TRACES_DIR } from "./fs-helpers.js";

const DB_PATH = path.join(TRACES_DIR, "trace.db");
const SNAPSHOT_DIR = path.join(TRACES_DIR, "snapshots");

let _tracer: Tracer | null = null;

export function getTracer(): Tracer {
  if (!_tracer) {
    _tracer = new Tracer(DB_PATH, {
      snapshotDir: SNAPSHOT_DIR,
      debugMode: process.argv.includes("--debug"),
    });
  }
  return _tracer;
}

// Auto-vacuum on process exit
process.on("exit", () => {
  if (_tracer) {
    try {
      _tracer.vacuum();
      _tracer.close();
    } catch (error) {
      process.stderr.write(`sdkpath: could not close trace store: ${error instanceof Error ? error.message : String(error)}\n`);
    }
    _tracer = null;
  }
});
