/**
 * Tests for the check command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { AuditResultStore } from "@sdkpath/core";

vi.mock("../core/global-tracer.js", () => ({
  getTracer: () => ({
    createTrace: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), traceId: "check-test" }),
  }),
}));

import { MemoryResultStore } from "../core/session-store.js";
import type { ReadSearchPathOptions, SearchPathReading } from "../core/search-path.js";
import {
  type CheckDeps,
  formatCheckJson,
  formatCheckOutput,
  parseLanguageOption,
  parseScopeOption,
  resolveMarkupMode,
  runCheck,
} from "./check.js";

const P64 = "C:\\Program Files\\dotnet\\";
const P32 = "C:\\Program Files (x86)\\dotnet\\";

function createLog() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), traceId: "check-test" };
}

describe("check command", () => {
  let tmpDir: string;
  let searchPath: string;
  let deps: CheckDeps & { log: ReturnType<typeof createLog> };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sdkpath-check-"));
    searchPath = "C:\\Windows";
    deps = {
      platform: "win32",
      env: { LANG: "en_US.UTF-8" },
      configPath: path.join(tmpDir, "config.yaml"),
      store: new MemoryResultStore(),
      log: createLog(),
      readSearchPath: vi.fn((opts: ReadSearchPathOptions): SearchPathReading => ({ value: searchPath, source: opts.scope })),
      listVolumeRoots: vi.fn(() => ["C:\\"]),
      pruneSessions: vi.fn(() => []),
    };
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("platform gate", () => {
    it("does nothing on other platforms", () => {
      const save = vi.spyOn(deps.store, "save");
      const report = runCheck({}, { ...deps, platform: "linux" });

      expect(report).toEqual({ status: "skipped", platform: "linux" });
      expect(deps.readSearchPath).not.toHaveBeenCalled();
      expect(deps.listVolumeRoots).not.toHaveBeenCalled();
      expect(deps.pruneSessions).not.toHaveBeenCalled();
      expect(save).not.toHaveBeenCalled();
      expect(deps.log.debug).not.toHaveBeenCalled();
      expect(formatCheckOutput(report, "ansi")).toBeNull();
    });
  });

  describe("runCheck", () => {
    it("keeps a 64-bit-only result quiet by default", () => {
      searchPath = `C:\\Windows;${P64}`;
      const report = runCheck({}, deps);

      expect(report).toEqual({
        status: "completed",
        platform: "win32",
        outcome: "changed",
        classification: "sdk64-only",
        severity: "pass",
        displayed: false,
        message: null,
        language: "en",
        searchPathSource: "machine",
        searchPathEntries: 2,
        volumeRoots: ["C:\\"],
      });
    });

    it("reports unchanged on the second identical run", () => {
      searchPath = P32;
      const first = runCheck({}, deps);
      const second = runCheck({}, deps);

      expect(first.status === "completed" && first.displayed).toBe(true);
      expect(second.status === "completed" && second.outcome).toBe("unchanged");
      expect(second.status === "completed" && second.classification).toBe("sdk32-only");
      expect(second.status === "completed" && second.severity).toBe("fail");
      expect(formatCheckOutput(second, "plain")).toBeNull();
    });

    it("shows positive results with --show-positive", () => {
      searchPath = `${P64};${P32}`;
      const report = runCheck({ showPositive: true }, deps);

      expect(report.status === "completed" && report.classification).toBe("both-correct-order");
      expect(formatCheckOutput(report, "plain")?.split("\n")[0]).toBe(
        `TEST PASSED → .NET SDK (64-bit) is in the PATH before the 32-bit version. 64-bit SDK path: ${P64}`,
      );
    });

    it("shows positive results when the config file enables them", () => {
      fs.writeFileSync(deps.configPath, "showPositiveMessages: true\n");
      searchPath = P64;
      const report = runCheck({}, deps);
      expect(report.status === "completed" && report.displayed).toBe(true);
    });

    it("prints not-found with the search path line", () => {
      const output = formatCheckOutput(runCheck({}, deps), "plain");
      const lines = output?.split("\n") ?? [];

      expect(lines[0]).toBe("TEST FAILED → .NET SDK is not found in the PATH. ");
      expect(lines[lines.length - 1]).toBe("Current system PATH where executables are searched for: C:\\Windows");
    });

    it("renders markup as ANSI by default", () => {
      const output = formatCheckOutput(runCheck({}, deps), "ansi");
      expect(output?.startsWith("\u001b[31mTEST FAILED\u001b[0m → ")).toBe(true);
    });

    it("forces the language for one run", () => {
      searchPath = `${P32};${P64}`;
      const report = runCheck({ lang: "fr" }, deps);

      expect(report.status === "completed" && report.language).toBe("fr");
      expect(formatCheckOutput(report, "raw")?.startsWith("<color=yellow>TEST PARTIELLEMENT ÉCHOUÉ</color>")).toBe(true);
    });

    it("uses the system locale when the config says auto", () => {
      const report = runCheck({}, { ...deps, env: { LANG: "fr_CA.UTF-8" } });
      expect(report.status === "completed" && report.language).toBe("fr");
    });

    it("forgets the previous result with --force", () => {
      runCheck({}, deps);
      const report = runCheck({ force: true }, deps);
      expect(report.status === "completed" && report.outcome).toBe("changed");
    });

    it("passes the configured scope to the reader", () => {
      runCheck({ scope: "process" }, deps);
      expect(deps.readSearchPath).toHaveBeenCalledWith({ scope: "process", env: { LANG: "en_US.UTF-8" } });
    });

    it("logs a fallback from the machine PATH", () => {
      deps.readSearchPath = () => ({ value: P64, source: "process", fallbackReason: "spawn reg ENOENT" });
      const report = runCheck({}, deps);

      expect(report.status === "completed" && report.searchPathSource).toBe("process");
      expect(deps.log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ scope: "search-path", error: "spawn reg ENOENT" }),
      );
    });

    it("keeps going when the session store fails", () => {
      const broken: AuditResultStore = {
        load: () => {
          throw new Error("EACCES");
        },
        save: () => {
          throw new Error("EROFS");
        },
        clear: () => {},
      };
      const report = runCheck({}, { ...deps, store: broken });

      expect(report.status === "completed" && report.displayed).toBe(true);
      expect(deps.log.warn).toHaveBeenCalledWith(expect.objectContaining({ scope: "session", op: "load", error: "EACCES" }));
      expect(deps.log.warn).toHaveBeenCalledWith(expect.objectContaining({ scope: "session", op: "save", error: "EROFS" }));
    });

    it("logs and continues when pruning fails", () => {
      deps.pruneSessions = () => {
        throw new Error("EBUSY");
      };
      const report = runCheck({}, deps);
      expect(report.status).toBe("completed");
      expect(deps.log.warn).toHaveBeenCalledWith(expect.objectContaining({ op: "prune", error: "EBUSY" }));
    });

    it("records the outcome in the trace", () => {
      searchPath = P32;
      runCheck({}, deps);
      expect(deps.log.info).toHaveBeenCalledWith(
        expect.objectContaining({ scope: "audit", op: "changed", classification: "sdk32-only", path: P32 }),
      );
    });

    it("traces the volume each install was found on", () => {
      searchPath = `D:\\Program Files (x86)\\dotnet\\;${P64}`;
      runCheck({}, { ...deps, listVolumeRoots: () => ["C:\\", "D:\\"] });

      expect(deps.log.debug).toHaveBeenCalledWith(
        expect.objectContaining({ scope: "audit", op: "match", volume: "C:\\", path: P64 }),
      );
      expect(deps.log.debug).toHaveBeenCalledWith(
        expect.objectContaining({ op: "match", volume: "D:\\", path: "D:\\Program Files (x86)\\dotnet\\" }),
      );
    });

    it("rejects an invalid config", () => {
      fs.writeFileSync(deps.configPath, "language: de\n");
      expect(() => runCheck({}, deps)).toThrow(/language/);
    });
  });

  describe("formatCheckJson", () => {
    it("serializes the report", () => {
      const report = runCheck({}, { ...deps, platform: "darwin" });
      expect(JSON.parse(formatCheckJson(report))).toEqual({ status: "skipped", platform: "darwin" });
    });
  });
});

describe("option parsing", () => {
  it("normalizes languages and rejects unsupported ones", () => {
    expect(parseLanguageOption(undefined)).toBeUndefined();
    expect(parseLanguageOption("FR-ca")).toBe("fr");
    expect(() => parseLanguageOption("de")).toThrow('Unsupported language "de" (expected en or fr)');
  });

  it("validates the PATH scope", () => {
    expect(parseScopeOption("process")).toBe("process");
    expect(() => parseScopeOption("user")).toThrow('Unsupported scope "user" (expected machine or process)');
  });

  it("picks the markup mode", () => {
    expect(resolveMarkupMode({ raw: true, plain: true }, {})).toBe("raw");
    expect(resolveMarkupMode({ plain: true }, {})).toBe("plain");
    expect(resolveMarkupMode({}, { NO_COLOR: "1" })).toBe("plain");
    expect(resolveMarkupMode({}, {})).toBe("ansi");
  });
});
