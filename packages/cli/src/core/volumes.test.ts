import { describe, it, expect, vi } from "vitest";

vi.mock("node:fs", () => ({
  existsSync: vi.fn((root: string) => root === "C:\\" || root === "E:\\"),
}));

describe("listVolumeRoots", () => {
  it("probes drive letters in order with fs by default", async () => {
    const { listVolumeRoots } = await import("./volumes.js");
    expect(listVolumeRoots()).toEqual(["C:\\", "E:\\"]);
  });

  it("accepts a custom probe", async () => {
    const { listVolumeRoots } = await import("./volumes.js");
    const probe = vi.fn(() => false);
    expect(listVolumeRoots(probe)).toEqual([]);
    expect(probe).toHaveBeenCalledTimes(26);
    expect(probe).toHaveBeenNthCalledWith(1, "A:\\");
  });
});
