import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { ConfigError, loadConfig } from "./config-loader.js";

describe("loadConfig", () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sdkpath-config-"));
    configPath = path.join(tmpDir, "config.yaml");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns defaults when the file is missing", () => {
    const config = loadConfig(configPath);
    expect(config.showPositiveMessages).toBe(false);
    expect(config.sdkFolderMarker).toBe("dotnet\\");
    expect(config.pathScope).toBe("machine");
  });

  it("returns defaults for an empty file", () => {
    fs.writeFileSync(configPath, "");
    expect(loadConfig(configPath).language).toBe("auto");
  });

  it("reads settings from YAML", () => {
    fs.writeFileSync(configPath, "showPositiveMessages: true\nlanguage: fr\nwatchExtensions: [.cs]\n");
    const config = loadConfig(configPath);
    expect(config.showPositiveMessages).toBe(true);
    expect(config.language).toBe("fr");
    expect(config.watchExtensions).toEqual([".cs"]);
  });

  it("lets overrides win over the file, ignoring undefined ones", () => {
    fs.writeFileSync(configPath, "language: fr\npathScope: process\n");
    const config = loadConfig(configPath, { language: "en", pathScope: undefined });
    expect(config.language).toBe("en");
    expect(config.pathScope).toBe("process");
  });

  it("names the offending keys", () => {
    fs.writeFileSync(configPath, "language: de\ndebounceMs: -5\n");
    try {
      loadConfig(configPath);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.issues.map((issue) => issue.split(":")[0]).sort()).toEqual(["debounceMs", "language"]);
    }
  });

  it("rejects invalid YAML and non-mapping documents", () => {
    fs.writeFileSync(configPath, "language: [en");
    expect(() => loadConfig(configPath)).toThrow(ConfigError);

    fs.writeFileSync(configPath, "- en\n- fr\n");
    expect(() => loadConfig(configPath)).toThrow(/must contain a mapping/);
  });
});
