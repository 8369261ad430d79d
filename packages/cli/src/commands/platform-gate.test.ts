/**
 * check and watch leave no trace on hosts other than Windows
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

describe("commands off Windows", () => {
  let home: string;
  const realPlatform = process.platform;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "sdkpath-gate-"));
    vi.stubEnv("HOME", home);
    vi.stubEnv("USERPROFILE", home);
    Object.defineProperty(process, "platform", { value: "linux" });
    vi.resetModules();
  });

  afterEach(() => {
    Object.defineProperty(process, "platform", { value: realPlatform });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    fs.rmSync(home, { recursive: true, force: true });
  });

  it("check creates nothing under the home directory and prints nothing", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const { checkCommand } = await import("./check.js");

    await checkCommand.parseAsync(["node", "check"]);

    expect(fs.readdirSync(home, { recursive: true })).toEqual([]);
    expect(log).not.toHaveBeenCalled();
  });

  it("watch returns without opening the trace store", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const { watchCommand } = await import("./watch.js");

    await watchCommand.parseAsync(["node", "watch"]);

    expect(fs.readdirSync(home, { recursive: true })).toEqual([]);
    expect(log).not.toHaveBeenCalled();
  });
});
