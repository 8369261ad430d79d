import { Command } from "commander";
import os from "node:os";
import fs from "node:fs";
import type { LogEntry } from "@sdkpath/core";
import { errorMessage } from "../core/fs-helpers.js";
import { getTracer } from "../core/global-tracer.js";
import type { TraceQueryOptions } from "../core/trace-store.js";

export type ReportFormat = "jsonl" | "json" | "table";

export interface ReportOptions {
  cmd?: string;
  level?: string;
  scope?: string;
  classification?: string;
  trace?: string;
  since?: string;
  limit: string;
  format: string;
  full?: boolean;
  output?: string;
}

const UNIT_MS: Record<string, number> = { m: 60_000, h: 3_600_000, d: 86_400_000 };

export function parseSince(since: string, now: number = Date.now()): number {
  const match = since.match(/^(\d+)(m|h|d)$/);
  if (match) {
    const [, num, unit] = match;
    return now - parseInt(num, 10) * UNIT_MS[unit];
  }
  const ts = new Date(since).getTime();
  if (Number.isNaN(ts)) {
    throw new Error(`Invalid --since value "${since}" (use 30m, 1h, 7d, or an ISO date)`);
  }
  return ts;
}

export function parseFormat(format: string): ReportFormat {
  if (format === "jsonl" || format === "json" || format === "table") return format;
  throw new Error(`Unsupported format "${format}" (expected jsonl, json or table)`);
}

export function buildEnvSection(): Record<string, unknown> {
  return {
    _section: "env",
    os: `${os.platform()} ${os.release()}`,
    node: process.version,
    arch: os.arch(),
    hostname: os.hostname(),
  };
}

export function buildQuery(opts: ReportOptions, now: number = Date.now()): TraceQueryOptions {
  const limit = parseInt(opts.limit, 10);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Invalid --limit value "${opts.limit}"`);
  }
  return {
    cmd: opts.cmd,
    level: opts.level,
    scope: opts.scope,
    classification: opts.classification,
    traceId: opts.trace,
    since: opts.since ? parseSince(opts.since, now) : undefined,
    limit,
  };
}

function formatTableRow(e: LogEntry): string {
  const time = new Date(e.ts).toISOString().slice(0, 23);
  return `${time.padEnd(24)} ${e.level.padEnd(6)} ${e.cmd.padEnd(8)} ${e.scope.padEnd(12)} ${(e.classification ?? "—").padEnd(20)} ${e.msg}`;
}

export function formatReport(
  entries: LogEntry[],
  format: ReportFormat,
  env?: Record<string, unknown>,
): string {
  const lines: string[] = [];

  if (format === "jsonl") {
    for (const e of entries) {
      lines.push(JSON.stringify({ _section: "trace", ...e }));
    }
  } else if (format === "json") {
    lines.push(JSON.stringify(entries, null, 2));
  } else {
    lines.push(`${"TIME".padEnd(24)} ${"LEVEL".padEnd(6)} ${"CMD".padEnd(8)} ${"SCOPE".padEnd(12)} ${"RESULT".padEnd(20)} MSG`);
    lines.push("─".repeat(96));
    for (const e of entries) {
      lines.push(formatTableRow(e));
    }
  }

  if (env) {
    lines.push(JSON.stringify(env));
  }

  return lines.join("\n") + "\n";
}

export const reportCommand = new Command("report")
  .description("Query the audit trace log")
  .option("--cmd <cmd>", "Filter by command (check, watch)")
  .option("--level <level>", "Filter by log level (debug, info, warn, error)")
  .option("--scope <scope>", "Filter by scope (platform, search-path, session, audit, watcher)")
  .option("--classification <classification>", "Filter by audit classification")
  .option("--trace <traceId>", "Filter by trace ID")
  .option("--since <time>", "Time filter: 1h, 30m, 7d, or ISO date", "1h")
  .option("--limit <n>", "Max entries to return", "100")
  .option("--format <fmt>", "Output format: jsonl, table, json", "jsonl")
  .option("--full", "Append an environment section", false)
  .option("--output <path>", "Write report to file instead of stdout")
  .action((opts: ReportOptions) => {
    const tracer = getTracer();
    try {
      const format = parseFormat(opts.format);
      const entries = tracer.query(buildQuery(opts));
      const output = formatReport(entries, format, opts.full ? buildEnvSection() : undefined);

      if (opts.output) {
        fs.writeFileSync(opts.output, output);
        console.log(`Report written to ${opts.output}`);
      } else {
        process.stdout.write(output);
      }
    } catch (error) {
      tracer.createTrace("report").error({ scope: "command", op: "report", msg: "Report failed", error: errorMessage(error) });
      console.error("Error running report:", errorMessage(error));
      process.exit(1);
    }
  });
