/**
 * Check Command for sdkpath CLI
 *
 * Audits the executable search path for the .NET SDK:
 * - Skips entirely on hosts other than Windows
 * - Reads the machine PATH (or this process's PATH) and the mounted drives
 * - Compares the result with the one recorded earlier in this shell session
 * - Prints a diagnostic only when the result changed (positive results stay
 *   quiet unless --show-positive is set)
 */

import { Command } from "commander";
import {
  type AuditClassification,
  type AuditOutcome,
  type AuditResultStore,
  type AuditSeverity,
  type LanguageTag,
  type MarkupMode,
  type PathScope,
  type SdkPathConfig,
  type VolumeRoot,
  SdkPathAuditor,
  classifyResult,
  getSystemLocales,
  isTargetPlatform,
  normalizeLanguage,
  pathScopeSchema,
  renderMarkup,
  resolveLanguage,
  severityOf,
  splitSearchPath,
} from "@sdkpath/core";
import { loadConfig } from "../core/config-loader.js";
import { CONFIG_PATH, errorMessage } from "../core/fs-helpers.js";
import { getTracer } from "../core/global-tracer.js";
import { readSearchPath, type ReadSearchPathOptions, type SearchPathReading } from "../core/search-path.js";
import {
  FileResultStore,
  pruneStaleSessions,
  resolveSessionId,
  sessionFilePath,
} from "../core/session-store.js";
import type { TraceLogger } from "../core/tracer.js";
import { listVolumeRoots } from "../core/volumes.js";

// ============================================================================
// Types
// ============================================================================

export interface CheckOptions {
  json?: boolean;
  raw?: boolean;
  plain?: boolean;
  showPositive?: boolean;
  lang?: string;
  scope?: string;
  force?: boolean;
}

export interface CheckDeps {
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
  configPath: string;
  store: AuditResultStore;
  log: TraceLogger;
  readSearchPath: (opts: ReadSearchPathOptions) => SearchPathReading;
  listVolumeRoots: () => VolumeRoot[];
  pruneSessions?: () => string[];
}

export interface SkippedCheck {
  status: "skipped";
  platform: string;
}

export interface CompletedCheck {
  status: "completed";
  platform: string;
  outcome: AuditOutcome["kind"];
  classification: AuditClassification;
  severity: AuditSeverity;
  displayed: boolean;
  message: string | null;
  language: LanguageTag;
  searchPathSource: PathScope;
  searchPathEntries: number;
  volumeRoots: VolumeRoot[];
}

export type CheckReport = SkippedCheck | CompletedCheck;

// ============================================================================
// Option Parsing
// ============================================================================

export function parseLanguageOption(value: string | undefined): LanguageTag | undefined {
  if (value === undefined) return undefined;
  const language = normalizeLanguage(value);
  if (!language) {
    throw new Error(`Unsupported language "${value}" (expected en or fr)`);
  }
  return language;
}

export function parseScopeOption(value: string | undefined): PathScope | undefined {
  if (value === undefined) return undefined;
  const parsed = pathScopeSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Unsupported scope "${value}" (expected machine or process)`);
  }
  return parsed.data;
}

export function resolveMarkupMode(options: CheckOptions, env: NodeJS.ProcessEnv = process.env): MarkupMode {
  if (options.raw) return "raw";
  if (options.plain || env.NO_COLOR) return "plain";
  return "ansi";
}

export function configOverrides(options: CheckOptions): Partial<SdkPathConfig> {
  return {
    showPositiveMessages: options.showPositive ? true : undefined,
    pathScope: parseScopeOption(options.scope),
  };
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Run one audit against the host. Pure no-op (nothing read, stored, or
 * printed) when the host is not Windows.
 */
export function runCheck(options: CheckOptions, deps: CheckDeps): CheckReport {
  const { log } = deps;

  if (!isTargetPlatform(deps.platform)) {
    return { status: "skipped", platform: deps.platform };
  }

  const forceLanguage = parseLanguageOption(options.lang);
  const config = loadConfig(deps.configPath, configOverrides(options));

  if (deps.pruneSessions) {
    try {
      const removed = deps.pruneSessions();
      if (removed.length > 0) {
        log.debug({ scope: "session", op: "prune", msg: `Removed ${removed.length} stale session(s)`, data: { removed } });
      }
    } catch (error) {
      log.warn({ scope: "session", op: "prune", msg: "Could not prune stale sessions", error: errorMessage(error) });
    }
  }

  if (options.force) {
    deps.store.clear();
    log.debug({ scope: "session", op: "clear", msg: "Cleared previous result (--force)" });
  }

  const started = Date.now();
  const reading = deps.readSearchPath({ scope: config.pathScope, env: deps.env });
  if (reading.fallbackReason) {
    log.warn({
      scope: "search-path",
      op: "read",
      msg: "Machine PATH unavailable, using process PATH",
      error: reading.fallbackReason,
    });
  }

  const volumeRoots = deps.listVolumeRoots();
  log.debug({ scope: "audit", op: "scan", msg: `Probing ${volumeRoots.length} volume(s)`, data: { volumeRoots } });

  const language = resolveLanguage(config.language, getSystemLocales(deps.env));
  const auditor = new SdkPathAuditor({
    store: deps.store,
    language,
    showPositiveMessages: config.showPositiveMessages,
    sdkFolderMarker: config.sdkFolderMarker,
    onStoreError: (operation, error) => {
      log.warn({ scope: "session", op: operation, msg: "Session store unavailable", error: errorMessage(error) });
    },
  });

  const outcome = auditor.audit(reading.value, volumeRoots, forceLanguage);
  const classification = outcome.kind === "changed" ? outcome.classification : classifyResult(outcome.result);
  const severity = severityOf(classification);

  for (const [bitness, matched] of [["64", outcome.result.path64], ["32", outcome.result.path32]] as const) {
    const volume = matched ? volumeRoots.find((root) => matched.startsWith(root)) : undefined;
    if (volume) {
      log.debug({ scope: "audit", op: "match", volume, path: matched, msg: `${bitness}-bit SDK found on ${volume}` });
    }
  }

  log.info({
    scope: "audit",
    op: outcome.kind,
    platform: deps.platform,
    classification,
    language: forceLanguage ?? language,
    path: outcome.result.path64 || outcome.result.path32 || undefined,
    msg: `Audit ${outcome.kind}: ${classification}`,
    dur: Date.now() - started,
  });

  return {
    status: "completed",
    platform: deps.platform,
    outcome: outcome.kind,
    classification,
    severity,
    displayed: outcome.kind === "changed" && outcome.displayed,
    message: outcome.kind === "changed" ? outcome.message : null,
    language: forceLanguage ?? language,
    searchPathSource: reading.source,
    searchPathEntries: splitSearchPath(reading.value).length,
    volumeRoots,
  };
}

/**
 * Wire runCheck to the real host: registry PATH, drive letters, and the
 * session file for the calling shell.
 */
export function createHostDeps(log: TraceLogger, store?: AuditResultStore): CheckDeps {
  return {
    platform: process.platform,
    env: process.env,
    configPath: CONFIG_PATH,
    store: store ?? new FileResultStore(sessionFilePath(resolveSessionId())),
    log,
    readSearchPath,
    listVolumeRoots: () => listVolumeRoots(),
    pruneSessions: () => pruneStaleSessions(),
  };
}

// ============================================================================
// Formatting Functions
// ============================================================================

/**
 * Terminal output for a check: the diagnostic when there is one, nothing
 * otherwise.
 */
export function formatCheckOutput(report: CheckReport, mode: MarkupMode): string | null {
  if (report.status !== "completed" || !report.message) return null;
  return renderMarkup(report.message, mode);
}

export function formatCheckJson(report: CheckReport): string {
  return JSON.stringify(report, null, 2);
}

// ============================================================================
// Commander.js Command
// ============================================================================

export const checkCommand = new Command("check")
  .description("Check that the 64-bit .NET SDK is on PATH ahead of the 32-bit one")
  .option("-j, --json", "Output as JSON")
  .option("--raw", "Keep <color> markup instead of rendering it")
  .option("--plain", "Strip <color> markup")
  .option("-p, --show-positive", "Also report passing results")
  .option("-l, --lang <tag>", "Force the message language for this run (en, fr)")
  .option("-s, --scope <scope>", "PATH to inspect: machine or process")
  .option("-f, --force", "Forget this session's previous result first")
  .action((options: CheckOptions) => {
    // Off Windows the trace store is never opened
    if (!isTargetPlatform()) return;

    const log = getTracer().createTrace("check");
    try {
      const report = runCheck(options, createHostDeps(log));

      if (options.json) {
        console.log(formatCheckJson(report));
      } else {
        const output = formatCheckOutput(report, resolveMarkupMode(options));
        if (output) console.log(output);
      }

      if (report.status === "completed" && report.severity === "fail") {
        process.exit(1);
      }
    } catch (error) {
      log.error({ scope: "command", op: "check", msg: "Check failed", error: errorMessage(error) });
      console.error("Error running check:", errorMessage(error));
      process.exit(1);
    }
  });
