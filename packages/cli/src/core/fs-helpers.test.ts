import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CONFIG_PATH, SDKPATH_HOME, SESSIONS_DIR, errorMessage, isErrnoException, mkdirp, readFileIfExists } from "./fs-helpers.js";

describe("fs-helpers", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sdkpath-fs-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("keeps config and sessions under the sdkpath home", () => {
    expect(CONFIG_PATH).toBe(path.join(SDKPATH_HOME, "config.yaml"));
    expect(SESSIONS_DIR).toBe(path.join(SDKPATH_HOME, "sessions"));
  });

  describe("readFileIfExists", () => {
    it("returns file content", () => {
      const file = path.join(tmpDir, "a.txt");
      fs.writeFileSync(file, "hello");
      expect(readFileIfExists(file)).toBe("hello");
    });

    it("returns null for a missing file", () => {
      expect(readFileIfExists(path.join(tmpDir, "missing.txt"))).toBeNull();
    });

    it("rethrows other errors", () => {
      expect(() => readFileIfExists(tmpDir)).toThrow();
    });
  });

  it("mkdirp creates nested directories", () => {
    const dir = path.join(tmpDir, "a", "b");
    mkdirp(dir);
    expect(fs.statSync(dir).isDirectory()).toBe(true);
  });

  it("describes errors", () => {
    const err = Object.assign(new Error("nope"), { code: "EACCES" });
    expect(isErrnoException(err)).toBe(true);
    expect(isErrnoException("nope")).toBe(false);
    expect(errorMessage(err)).toBe("nope");
    expect(errorMessage(42)).toBe("42");
  });
});
