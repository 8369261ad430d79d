/**
 * Volume enumeration: the drive roots that currently exist on this host.
 */
import { existsSync } from "node:fs";
import type { VolumeRoot } from "@sdkpath/core";

export const DRIVE_LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ".split("");

export function listVolumeRoots(exists: (root: string) => boolean = existsSync): VolumeRoot[] {
  return DRIVE_LETTERS.map((letter) => `${letter}:\\`).filter((root) => exists(root));
}
